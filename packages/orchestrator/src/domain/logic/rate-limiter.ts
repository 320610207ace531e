/**
 * @file packages/orchestrator/src/domain/logic/rate-limiter.ts
 * @description Per-client sliding-window admission control.
 */

import { inject, singleton } from 'tsyringe';
import { TOKENS } from '../interfaces/tokens.js';
import type {
  RateLimitBackend,
  RateLimitBackends,
} from '../interfaces/rate-limit-backend.interface.js';
import { ConfigService } from '../../infrastructure/config/config-service.js';
import { Logger } from '../../logger.js';
import { errorMessage } from '../errors/app-error.js';

export const RATE_LIMIT_KEY_PREFIX = 'rate_limit:orchestrator:';

/** Seconds a window key outlives its last request. */
const EXPIRY_GRACE_SECONDS = 60;

export interface RateLimitDescription {
  storage: RateLimitBackend['kind'];
  maxRequests: number;
  windowSeconds: number;
}

/**
 * Admits at most `maxRequests` per client within the trailing window.
 *
 * The check and the write are separate round trips, so concurrent requests
 * from one client can overshoot the limit by the number in flight. When the
 * shared backend fails the in-process window takes over for this instance.
 */
@singleton()
export class RateLimiter {
  private readonly maxRequests: number;
  private readonly windowSeconds: number;

  constructor(
    @inject(ConfigService) config: ConfigService,
    @inject(TOKENS.RateLimitBackends) private backends: RateLimitBackends,
    @inject(Logger) private logger: Logger,
  ) {
    const { maxRequests, windowSeconds } = config.get('rateLimit');
    this.maxRequests = maxRequests;
    this.windowSeconds = windowSeconds;
  }

  /**
   * Records the request and returns true when the client is under its limit.
   * Rejected requests are not recorded.
   */
  async admit(clientId: string): Promise<boolean> {
    const key = `${RATE_LIMIT_KEY_PREFIX}${clientId}`;
    const now = Date.now();

    if (this.backends.remote) {
      try {
        return await this.admitWith(this.backends.remote, key, now);
      } catch (err) {
        this.logger.warn('[RateLimiter] Shared backend failed, using in-process window', {
          event: 'rate_limit_fallback',
          error: errorMessage(err),
        });
      }
    }

    return this.admitWith(this.backends.local, key, now);
  }

  describe(): RateLimitDescription {
    return {
      storage: (this.backends.remote ?? this.backends.local).kind,
      maxRequests: this.maxRequests,
      windowSeconds: this.windowSeconds,
    };
  }

  /**
   * Pings the active backend; used by the health endpoint.
   */
  async ping(): Promise<void> {
    await (this.backends.remote ?? this.backends.local).ping();
  }

  private async admitWith(backend: RateLimitBackend, key: string, now: number): Promise<boolean> {
    await backend.removeOlderThan(key, now - this.windowSeconds * 1000);
    const count = await backend.count(key);
    if (count >= this.maxRequests) return false;

    await backend.add(key, now);
    await backend.expire(key, this.windowSeconds + EXPIRY_GRACE_SECONDS);
    return true;
  }
}
