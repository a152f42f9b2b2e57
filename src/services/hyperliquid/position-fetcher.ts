import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { PositionMap } from '@/types/monitoring';
import { ApiError, RateLimitError, getErrorMessage } from '@/utils/error-handler';
import { logger } from '@/utils/logger';

export interface PositionFetcher {
  /** Open perp positions of the wallet, keyed by upper-case token symbol. */
  fetchPositions(address: string): Promise<PositionMap>;
}

export interface HyperliquidFetcherConfig {
  infoUrl: string;
  timeoutMs: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
}

export type HttpPoster = Pick<AxiosInstance, 'post'>;

const numeric = z
  .union([z.string(), z.number()])
  .transform(value => Number(value))
  .pipe(z.number().finite());

const assetPositionSchema = z.object({
  position: z.object({
    coin: z.string().min(1),
    szi: numeric,
    positionValue: numeric.optional(),
  }),
});

const clearinghouseStateSchema = z.object({
  assetPositions: z.array(z.unknown()).default([]),
});

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export function parseClearinghouseState(payload: unknown, address: string): PositionMap {
  const state = clearinghouseStateSchema.safeParse(payload);
  if (!state.success) {
    throw new ApiError(`Malformed clearinghouseState response for ${address}`, 502);
  }

  const positions: PositionMap = new Map();
  for (const entry of state.data.assetPositions) {
    const parsed = assetPositionSchema.safeParse(entry);
    if (!parsed.success) {
      logger.warn('Skipping malformed position entry', {
        address,
        issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      });
      continue;
    }

    const { coin, szi, positionValue } = parsed.data.position;
    if (szi === 0) {
      continue;
    }
    positions.set(coin.toUpperCase(), { size: szi, usdValue: positionValue ?? 0 });
  }

  return positions;
}

/**
 * Reads perp positions from the Hyperliquid info endpoint. Rate limits,
 * server errors and transport failures are retried with exponential
 * backoff; any other status fails the call at once.
 */
export class HyperliquidPositionFetcher implements PositionFetcher {
  private readonly http: HttpPoster;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(
    private readonly config: HyperliquidFetcherConfig,
    http?: HttpPoster,
    wait: (ms: number) => Promise<void> = sleep
  ) {
    this.http = http ?? axios.create({
      timeout: config.timeoutMs,
      headers: { 'Content-Type': 'application/json' },
    });
    this.wait = wait;
  }

  private backoff(attempt: number): number {
    return this.config.retryBaseDelayMs * Math.pow(2, attempt);
  }

  async fetchPositions(address: string): Promise<PositionMap> {
    const payload = { type: 'clearinghouseState', user: address, dex: '' };
    const attempts = Math.max(1, this.config.maxAttempts);

    for (let attempt = 0; ; attempt++) {
      let status: number;
      let data: unknown;
      try {
        const response = await this.http.post<unknown>(this.config.infoUrl, payload, {
          timeout: this.config.timeoutMs,
          validateStatus: () => true,
        });
        status = response.status;
        data = response.data;
      } catch (error) {
        // No response at all: timeout, reset or refused connection.
        const message = getErrorMessage(error);
        if (attempt + 1 >= attempts) {
          throw new ApiError(`Position request failed for ${address} after ${attempts} attempts: ${message}`, 503);
        }
        const delay = this.backoff(attempt);
        logger.warn(`Position request failed, retrying in ${delay}ms`, {
          address,
          error: message,
          attempt: attempt + 1,
          maxAttempts: attempts,
        });
        await this.wait(delay);
        continue;
      }

      if (status >= 200 && status < 300) {
        const positions = parseClearinghouseState(data, address);
        logger.debug(`Fetched ${positions.size} positions`, { address });
        return positions;
      }

      const retryable = status === 429 || status >= 500;
      if (!retryable) {
        throw new ApiError(`Position request rejected for ${address} with status ${status}`, status);
      }

      if (attempt + 1 >= attempts) {
        if (status === 429) {
          throw new RateLimitError(`Rate limited fetching ${address} after ${attempts} attempts`);
        }
        throw new ApiError(`Server error ${status} fetching ${address} after ${attempts} attempts`, status);
      }

      const delay = this.backoff(attempt);
      logger.warn(`Position request returned ${status}, retrying in ${delay}ms`, {
        address,
        attempt: attempt + 1,
        maxAttempts: attempts,
      });
      await this.wait(delay);
    }
  }
}
