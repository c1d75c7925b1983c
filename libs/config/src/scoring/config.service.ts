import { Injectable, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { createRawScoreRange, RawScoreRange } from '@libs/scoring';

@Injectable()
export class ScoringConfigService implements OnModuleInit {
  private range: RawScoreRange | null = null;

  constructor(private readonly config: ConfigService) {}

  /**
   * Fails startup on an empty or inverted raw range.
   */
  public onModuleInit(): void {
    this.range = createRawScoreRange(this.rawMin, this.rawMax);
  }

  public get rawMin(): number {
    return this.config.getOrThrow<number>('scoring.rawMin');
  }

  public get rawMax(): number {
    return this.config.getOrThrow<number>('scoring.rawMax');
  }

  /**
   * Raw range the weighted totals are scaled from.
   */
  public get rawRange(): RawScoreRange {
    if (!this.range) {
      this.range = createRawScoreRange(this.rawMin, this.rawMax);
    }
    return this.range;
  }
}
