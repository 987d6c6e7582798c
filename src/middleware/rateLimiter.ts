import type { FastifyReply, FastifyRequest } from 'fastify';
import type Redis from 'ioredis';
import { randomUUID } from 'node:crypto';

const GLOBAL_RATE_LIMIT_KEY = 'global_rate_limit:';

export interface RateLimitOptions {
  windowSeconds: number;
  maxRequests: number;
}

/** A sliding window of request timestamps per key. */
export interface RequestWindowStore {
  /** Drops entries older than the window and returns how many remain. */
  countRecent(key: string, now: number, windowSeconds: number): Promise<number>;
  record(key: string, now: number, windowSeconds: number): Promise<void>;
}

export class RedisWindowStore implements RequestWindowStore {
  constructor(private readonly redis: Redis) {}

  async countRecent(key: string, now: number, windowSeconds: number): Promise<number> {
    const results = await this.redis
      .pipeline()
      .zremrangebyscore(key, 0, now - windowSeconds * 1000)
      .zcard(key)
      .exec();

    const [, zcard] = results ?? [];
    if (!zcard) {
      return 0;
    }
    const [error, count] = zcard;
    if (error) {
      throw error;
    }
    return typeof count === 'number' ? count : 0;
  }

  async record(key: string, now: number, windowSeconds: number): Promise<void> {
    await this.redis
      .multi()
      .zadd(key, now, `${now}-${randomUUID()}`)
      .expire(key, windowSeconds + 10)
      .exec();
  }
}

export const createRateLimiter = (store: RequestWindowStore, options: RateLimitOptions) =>
  async function rateLimiterMiddleware(request: FastifyRequest, reply: FastifyReply) {
    const ip = request.ip || 'unknown';
    const rateLimitKey = `${GLOBAL_RATE_LIMIT_KEY}${ip}`;
    const currentTime = Date.now();

    try {
      const requestCount = await store.countRecent(rateLimitKey, currentTime, options.windowSeconds);

      if (requestCount >= options.maxRequests) {
        return reply.status(429).send({
          error: 'Too many requests. Please slow down',
          retryAfter: options.windowSeconds
        });
      }

      await store.record(rateLimitKey, currentTime, options.windowSeconds);
    } catch (error) {
      // Requests go through while the limiter's backing store is unavailable.
      request.log.error({ err: error }, 'Rate limiter error');
    }
  };
