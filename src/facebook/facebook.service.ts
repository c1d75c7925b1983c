import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';

import { FacebookConfigService, ScoringConfigService } from '@libs/config';
import {
  aggregateScores,
  EmptyInputError,
  ProfileScoreResult,
  scoreProfilePage,
  SocialScoreResponse,
} from '@libs/scoring';
import { SentryClientService } from '@libs/sentry';
import { mapSettled } from '@libs/utils';

import { SCORE_COMPLETED_EVENT, ScoreCompletedEvent } from '../callback';
import { MetricsService } from '../metrics';
import { CentralScoreRequestDTO } from './dto';
import { FacebookSessionError } from './errors';
import {
  CentralScoreResponse,
  FACEBOOK_NETWORK,
  PROFILE_PAGE_FETCHER,
  ProfilePageFetcher,
  SOCIAL_SCORE_REQUEST_TYPE,
} from './interfaces';
import { selectFacebookUsernames } from './utils';

@Injectable()
export class FacebookService {
  private readonly logger = new Logger(FacebookService.name);

  constructor(
    @Inject(PROFILE_PAGE_FETCHER)
    private readonly fetcher: ProfilePageFetcher,
    private readonly facebookConfig: FacebookConfigService,
    private readonly scoringConfig: ScoringConfigService,
    private readonly eventEmitter: EventEmitter2,
    private readonly sentry: SentryClientService,
    private readonly metricsService: MetricsService,
  ) {}

  /**
   * Scores every Facebook profile of a request and averages the results.
   *
   * Profiles are fetched concurrently; a profile whose page cannot be
   * obtained is dropped. When a callback URL is given the response is also
   * delivered in the background.
   *
   * @param dto - The central score request.
   *
   * @returns The averaged social score for the requested identity.
   */
  public async centralScore(
    dto: CentralScoreRequestDTO,
  ): Promise<CentralScoreResponse> {
    const usernames = selectFacebookUsernames(
      dto.requests,
      SOCIAL_SCORE_REQUEST_TYPE,
      FACEBOOK_NETWORK,
    );

    if (usernames.length === 0) {
      this.metricsService.recordScoreRequest(FACEBOOK_NETWORK, 'bad_request');
      throw new BadRequestException('No Facebook score requests found');
    }

    this.logger.log(
      `Scoring ${usernames.length} Facebook profile(s) for ${dto.fayda_number}`,
    );

    const settled = await mapSettled(
      usernames,
      this.facebookConfig.concurrency,
      (username) => this.scoreProfile(username),
    );

    const results: ProfileScoreResult[] = [];
    let sessionFailed = false;

    settled.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        if (outcome.value) {
          results.push(outcome.value);
        }
        return;
      }

      const reason: unknown = outcome.reason;
      sessionFailed = sessionFailed || reason instanceof FacebookSessionError;
      this.logger.warn(
        `Dropping profile ${usernames[index]}: ${
          reason instanceof Error ? reason.message : String(reason)
        }`,
      );
    });

    const score = this.aggregate(dto.fayda_number, results, sessionFailed);

    const response: CentralScoreResponse = {
      fayda_number: dto.fayda_number,
      combined_scores: {
        [SOCIAL_SCORE_REQUEST_TYPE]: score,
      },
    };

    this.metricsService.recordScoreRequest(FACEBOOK_NETWORK, 'scored');
    this.logger.log(
      `Scored ${dto.fayda_number}: ${score.score} (${score.risk_level}) from ${results.length}/${usernames.length} profile(s)`,
    );

    if (dto.callbackUrl) {
      this.eventEmitter.emit(
        SCORE_COMPLETED_EVENT,
        new ScoreCompletedEvent(dto.callbackUrl, response),
      );
    }

    return response;
  }

  /**
   * Fetches and scores one profile.
   *
   * @returns The scaled result, or null when the page could not be fetched.
   */
  public async scoreProfile(
    username: string,
  ): Promise<ProfileScoreResult | null> {
    const html = await this.fetcher.fetch(username);

    if (html === null) {
      this.logger.warn(`No profile page found for ${username}`);
      return null;
    }

    const result = scoreProfilePage(html, username, {
      range: this.scoringConfig.rawRange,
      onSignalError: (signal, error) =>
        this.logger.debug(
          `Signal ${signal} fell back to its default for ${username}: ${String(error)}`,
        ),
    });

    this.metricsService.recordProfileScore(
      FACEBOOK_NETWORK,
      result.tier,
      result.score,
    );
    this.logger.log(
      `Profile ${username} scored ${result.score} (tier ${result.tier})`,
    );

    return result;
  }

  private aggregate(
    faydaNumber: string,
    results: ProfileScoreResult[],
    sessionFailed: boolean,
  ): SocialScoreResponse {
    if (results.length === 0 && sessionFailed) {
      this.metricsService.recordScoreRequest(FACEBOOK_NETWORK, 'unauthenticated');
      this.sentry.sendException(
        new FacebookSessionError('No Facebook profile could be fetched'),
        { faydaNumber },
      );
      throw new ServiceUnavailableException(
        'Facebook session is not authenticated',
      );
    }

    try {
      return aggregateScores(faydaNumber, results);
    } catch (error) {
      if (error instanceof EmptyInputError) {
        this.metricsService.recordScoreRequest(FACEBOOK_NETWORK, 'no_profiles');
        throw new NotFoundException('No valid Facebook profiles processed');
      }
      throw error;
    }
  }
}
