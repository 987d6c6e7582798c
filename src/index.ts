import 'dotenv/config';
import { buildApp } from './app';
import { connectDatabase, connectRedis, createRedisClient, disconnectDatabase } from './config/database';
import { loadConfig } from './config/env';
import { RedisWindowStore } from './middleware/rateLimiter';
import { MongoTeamRegistrationStore } from './stores/mongoTeamRegistrationStore';
import { MongoUserStore } from './stores/mongoUserStore';

async function start() {
  const config = loadConfig();
  const redis = config.rateLimit.redisUrl ? createRedisClient(config.rateLimit.redisUrl) : undefined;
  const teamRegistrations = new MongoTeamRegistrationStore(config.registration);

  const { app: fastify, services } = await buildApp({
    config,
    stores: { users: new MongoUserStore(), teamRegistrations },
    rateLimitStore: redis ? new RedisWindowStore(redis) : undefined
  });

  const shutdown = async (signal: string) => {
    fastify.log.info({ signal }, 'Shutting down gracefully...');
    try {
      await fastify.close();
      await disconnectDatabase();
      await redis?.quit();
      process.exit(0);
    } catch (error) {
      fastify.log.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));

  try {
    if (redis) {
      await connectRedis(redis, fastify.log);
    } else {
      fastify.log.warn('REDIS_URL not set, rate limiting disabled');
    }

    await connectDatabase(config.mongodbUri, fastify.log);
    await teamRegistrations.syncSequence();

    const { username, password } = config.admin;
    if (password) {
      services.userService
        .ensureDefaultAdmin(username, password)
        .then((admin) => {
          if (admin) {
            fastify.log.info({ username: admin.username }, 'Default admin created');
          }
        })
        .catch((error: unknown) => {
          fastify.log.error({ err: error }, 'Failed to create default admin');
        });
    } else {
      fastify.log.warn('ADMIN_PASSWORD not set, skipping default admin bootstrap');
    }

    await fastify.listen({ port: config.port, host: config.host });
  } catch (error) {
    fastify.log.error({ err: error }, 'Error starting server');
    process.exit(1);
  }
}

start().catch((error: unknown) => {
  console.error('Error starting server:', error);
  process.exit(1);
});
