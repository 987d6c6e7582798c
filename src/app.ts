import Fastify from 'fastify';
import cors from '@fastify/cors';
import type { AppConfig } from './config/env';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createRateLimiter, type RequestWindowStore } from './middleware/rateLimiter';
import { authRoutes } from './routes/authRoutes';
import { healthRoutes, rootRoutes } from './routes/healthRoutes';
import { teamRegistrationRoutes } from './routes/teamRegistrationRoutes';
import type { AppServices } from './routes/types';
import { userRoutes } from './routes/userRoutes';
import { AuthService } from './services/authService';
import { TeamRegistrationService } from './services/teamRegistrationService';
import { UserService } from './services/userService';
import type { Stores } from './stores/types';

export const API_PREFIX = '/api/v1';

export interface BuildAppOptions {
  config: AppConfig;
  stores: Stores;
  /** Rate limiting is off without one. */
  rateLimitStore?: RequestWindowStore;
  now?: () => Date;
}

export async function buildApp({ config, stores, rateLimitStore, now }: BuildAppOptions) {
  const fastify = Fastify({
    logger: { level: config.logLevel }
  });

  const authService = new AuthService(stores.users, config.auth);
  const services: AppServices = {
    authService,
    userService: new UserService(stores.users, authService),
    teamRegistrationService: new TeamRegistrationService(stores.teamRegistrations, stores.users, now)
  };

  fastify.decorateRequest('user', null);

  await fastify.register(cors, {
    origin: config.corsOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS']
  });

  if (rateLimitStore) {
    fastify.addHook('onRequest', createRateLimiter(rateLimitStore, config.rateLimit));
  }

  fastify.setErrorHandler(errorHandler);
  fastify.setNotFoundHandler(notFoundHandler);

  await fastify.register(rootRoutes);
  await fastify.register(healthRoutes, { prefix: API_PREFIX });
  await fastify.register(authRoutes, { prefix: `${API_PREFIX}/auth`, services });
  await fastify.register(userRoutes, { prefix: `${API_PREFIX}/users`, services });
  await fastify.register(teamRegistrationRoutes, { prefix: `${API_PREFIX}/team-registrations`, services });

  return { app: fastify, services };
}
