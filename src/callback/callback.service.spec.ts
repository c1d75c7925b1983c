import { Test } from '@nestjs/testing';

import { CallbackConfigService } from '@libs/config';
import { SentryClientService } from '@libs/sentry';

import { MetricsService } from '../metrics';
import { backoffDelay, CallbackService } from './callback.service';

const mockPost = jest.fn();

jest.mock('axios', () => ({
  __esModule: true,
  default: { create: jest.fn(() => ({ post: mockPost })) },
}));

describe('backoffDelay', () => {
  it('grows linearly with the attempt number', () => {
    expect([1, 2, 3].map((attempt) => backoffDelay(1000, attempt))).toEqual([
      1000, 2000, 3000,
    ]);
  });
});

describe('CallbackService', () => {
  let service: CallbackService;

  const sentry = { sendWarning: jest.fn() };
  const metrics = { recordCallbackDelivery: jest.fn() };
  const payload = { fayda_number: 'FN-0001' };

  beforeEach(async () => {
    jest.clearAllMocks();
    mockPost.mockReset();

    const moduleRef = await Test.createTestingModule({
      providers: [
        CallbackService,
        {
          provide: CallbackConfigService,
          useValue: { timeout: 1000, maxAttempts: 3, baseDelay: 0 },
        },
        { provide: SentryClientService, useValue: sentry },
        { provide: MetricsService, useValue: metrics },
      ],
    }).compile();

    service = moduleRef.get(CallbackService);
  });

  it('posts the payload once when the receiver accepts it', async () => {
    mockPost.mockResolvedValueOnce({ status: 200 });

    await expect(
      service.deliver('https://callback.test/scores', payload),
    ).resolves.toBe(true);
    expect(mockPost).toHaveBeenCalledTimes(1);
    expect(mockPost).toHaveBeenCalledWith('https://callback.test/scores', payload);
    expect(metrics.recordCallbackDelivery).toHaveBeenCalledWith('delivered', 1);
  });

  it('retries until an attempt succeeds', async () => {
    mockPost
      .mockRejectedValueOnce(new Error('Request failed with status code 502'))
      .mockResolvedValueOnce({ status: 204 });

    await expect(
      service.deliver('https://callback.test/scores', payload),
    ).resolves.toBe(true);
    expect(mockPost).toHaveBeenCalledTimes(2);
    expect(metrics.recordCallbackDelivery).toHaveBeenCalledWith('delivered', 2);
  });

  it('gives up after the configured attempts without throwing', async () => {
    mockPost.mockRejectedValue(new Error('connect ECONNREFUSED'));

    await expect(
      service.deliver('https://callback.test/scores', payload),
    ).resolves.toBe(false);
    expect(mockPost).toHaveBeenCalledTimes(3);
    expect(metrics.recordCallbackDelivery).toHaveBeenCalledWith('failed', 3);
    expect(sentry.sendWarning).toHaveBeenCalledWith(
      'Callback delivery exhausted',
      { url: 'https://callback.test/scores', attempts: 3 },
    );
  });
});
