import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';

import { CentralScoreRequestDTO } from './dto';
import { FacebookService } from './facebook.service';
import { CentralScoreResponse } from './interfaces';

@Controller()
export class FacebookController {
  constructor(private readonly facebookService: FacebookService) {}

  /**
   * Calculates the social score of an identity from its Facebook profiles.
   *
   * Responds 400 when the request names no Facebook profile, 404 when none
   * of them could be fetched and 503 when the stored session is unusable.
   *
   * @param dto - Identity, profile requests and optional callback URL.
   */
  @Post('facebook-score')
  @HttpCode(HttpStatus.OK)
  public async centralScore(
    @Body() dto: CentralScoreRequestDTO,
  ): Promise<CentralScoreResponse> {
    return this.facebookService.centralScore(dto);
  }
}
