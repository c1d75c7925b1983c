import { Injectable } from '@nestjs/common';
import {
  Counter,
  Histogram,
  Registry,
  collectDefaultMetrics,
} from 'prom-client';

export type FetchOutcome = 'success' | 'not_found' | 'error';
export type DeliveryOutcome = 'delivered' | 'failed';

@Injectable()
export class MetricsService {
  private readonly registry = new Registry();
  private readonly httpRequestDuration: Histogram<string>;
  private readonly httpRequestTotal: Counter<string>;
  private readonly httpRequestErrors: Counter<string>;
  private readonly profileFetchTotal: Counter<string>;
  private readonly profileFetchDuration: Histogram<string>;
  private readonly profileScore: Histogram<string>;
  private readonly scoreRequestsTotal: Counter<string>;
  private readonly callbackDeliveriesTotal: Counter<string>;
  private readonly callbackAttempts: Histogram<string>;

  constructor() {
    // Collect default metrics (CPU, memory, etc.)
    collectDefaultMetrics({ register: this.registry });

    this.httpRequestDuration = new Histogram({
      name: 'http_request_duration_seconds',
      help: 'Duration of HTTP requests in seconds',
      labelNames: ['method', 'route', 'status'],
      buckets: [0.1, 0.3, 0.5, 0.7, 1, 3, 5, 7, 10, 30],
      registers: [this.registry],
    });

    this.httpRequestTotal = new Counter({
      name: 'http_requests_total',
      help: 'Total number of HTTP requests',
      labelNames: ['method', 'route', 'status'],
      registers: [this.registry],
    });

    this.httpRequestErrors = new Counter({
      name: 'http_request_errors_total',
      help: 'Total number of HTTP request errors',
      labelNames: ['method', 'route', 'status'],
      registers: [this.registry],
    });

    this.profileFetchTotal = new Counter({
      name: 'profile_fetch_total',
      help: 'Profile page fetches by outcome',
      labelNames: ['network', 'outcome'],
      registers: [this.registry],
    });

    this.profileFetchDuration = new Histogram({
      name: 'profile_fetch_duration_seconds',
      help: 'Duration of profile page fetches in seconds',
      labelNames: ['network', 'outcome'],
      buckets: [0.5, 1, 2, 5, 10, 20, 30, 60],
      registers: [this.registry],
    });

    this.profileScore = new Histogram({
      name: 'profile_scaled_score',
      help: 'Scaled score of each scored profile',
      labelNames: ['network', 'tier'],
      buckets: [350, 400, 450, 500, 550, 600, 650, 700, 750, 800, 850],
      registers: [this.registry],
    });

    this.scoreRequestsTotal = new Counter({
      name: 'score_requests_total',
      help: 'Scoring requests by result',
      labelNames: ['network', 'result'],
      registers: [this.registry],
    });

    this.callbackDeliveriesTotal = new Counter({
      name: 'callback_deliveries_total',
      help: 'Callback deliveries by outcome',
      labelNames: ['outcome'],
      registers: [this.registry],
    });

    this.callbackAttempts = new Histogram({
      name: 'callback_delivery_attempts',
      help: 'Attempts used per callback delivery',
      labelNames: ['outcome'],
      buckets: [1, 2, 3, 5],
      registers: [this.registry],
    });
  }

  public get contentType(): string {
    return this.registry.contentType;
  }

  public async metrics(): Promise<string> {
    return this.registry.metrics();
  }

  recordHttpRequest(
    method: string,
    route: string,
    statusCode: number,
    duration: number,
  ): void {
    const labels = {
      method,
      route,
      status: statusCode.toString(),
    };

    this.httpRequestDuration.observe(labels, duration);
    this.httpRequestTotal.inc(labels);

    if (statusCode >= 400) {
      this.httpRequestErrors.inc(labels);
    }
  }

  recordProfileFetch(
    network: string,
    outcome: FetchOutcome,
    duration: number,
  ): void {
    const labels = { network, outcome };

    this.profileFetchTotal.inc(labels);
    this.profileFetchDuration.observe(labels, duration);
  }

  recordProfileScore(network: string, tier: string, score: number): void {
    this.profileScore.observe({ network, tier }, score);
  }

  /**
   * Result is `scored`, `no_profiles` or `unauthenticated`.
   */
  recordScoreRequest(network: string, result: string): void {
    this.scoreRequestsTotal.inc({ network, result });
  }

  recordCallbackDelivery(outcome: DeliveryOutcome, attempts: number): void {
    this.callbackDeliveriesTotal.inc({ outcome });
    this.callbackAttempts.observe({ outcome }, attempts);
  }
}
