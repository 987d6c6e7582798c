import mongoose from 'mongoose';
import Redis from 'ioredis';
import type { FastifyBaseLogger } from 'fastify';

export const maskUri = (uri: string) => uri.replace(/\/\/([^:]+):([^@]+)@/, '//$1:****@');

export const connectDatabase = async (uri: string, log: FastifyBaseLogger) => {
  mongoose.connection.on('disconnected', () => {
    log.warn('MongoDB disconnected');
  });

  mongoose.connection.on('error', (error) => {
    log.error({ err: error }, 'MongoDB error');
  });

  log.info({ uri: maskUri(uri) }, 'Connecting to MongoDB...');
  await mongoose.connect(uri, { serverSelectionTimeoutMS: 30_000 });
  log.info('MongoDB connected successfully');
};

export const disconnectDatabase = () => mongoose.disconnect();

/** Created without connecting; call `connectRedis` once a logger is available. */
export const createRedisClient = (url: string) =>
  new Redis(url, {
    lazyConnect: true,
    tls: url.startsWith('rediss://') ? {} : undefined,
    retryStrategy: (times) => Math.min(times * 50, 2000),
    maxRetriesPerRequest: 3
  });

export const connectRedis = async (redis: Redis, log: FastifyBaseLogger) => {
  redis.on('connect', () => {
    log.info('Redis connected successfully');
  });

  redis.on('error', (error) => {
    log.error({ err: error }, 'Redis connection error');
  });

  await redis.connect();
};
