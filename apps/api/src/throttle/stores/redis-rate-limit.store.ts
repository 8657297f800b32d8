import { Logger } from '@nestjs/common';
import type { RateLimitHit, RateLimitStore } from './rate-limit-store.interface';

export type ExecReply = [error: Error | null, result: unknown];

/** The MULTI commands a hit issues; an ioredis pipeline provides them. */
export interface RateLimitTransaction {
  set(key: string, value: string, px: 'PX', milliseconds: number, nx: 'NX'): RateLimitTransaction;
  incr(key: string): RateLimitTransaction;
  pttl(key: string): RateLimitTransaction;
  exec(): Promise<ExecReply[] | null>;
}

/** The part of an ioredis client the store uses. */
export interface RateLimitClient {
  multi(): RateLimitTransaction;
}

function replyNumber(reply: ExecReply | undefined, command: string): number {
  if (!reply) {
    throw new Error(`Missing ${command} reply in rate-limit transaction`);
  }
  const [error, result] = reply;
  if (error) {
    throw error;
  }
  return Number(result);
}

/**
 * Redis-backed fixed-window store, shared by every API instance.
 *
 * One MULTI/EXEC round trip per hit:
 *   SET key 0 PX window NX   opens the window only if none is active
 *   INCR key                 counts the hit
 *   PTTL key                 time left in the window
 */
export class RedisRateLimitStore implements RateLimitStore {
  private readonly logger = new Logger(RedisRateLimitStore.name);

  constructor(private readonly client: RateLimitClient) {}

  async hit(key: string, windowMs: number): Promise<RateLimitHit> {
    const replies = await this.client
      .multi()
      .set(key, '0', 'PX', windowMs, 'NX')
      .incr(key)
      .pttl(key)
      .exec();

    if (!replies) {
      this.logger.error(`Rate-limit transaction for "${key}" was aborted`);
      throw new Error('Rate-limit transaction aborted');
    }

    const count = replyNumber(replies[1], 'INCR');
    const ttl = replyNumber(replies[2], 'PTTL');

    return {
      count,
      resetInMs: ttl > 0 ? ttl : windowMs,
    };
  }
}
