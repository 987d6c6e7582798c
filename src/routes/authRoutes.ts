import { FastifyInstance } from 'fastify';
import { loginSchema } from '../schemas/auth';
import type { RouteOptions } from './types';

export const authRoutes = async (fastify: FastifyInstance, opts: RouteOptions) => {
  const { authService } = opts.services;

  fastify.post('/login', async (request, reply) => {
    const { username, password } = loginSchema.parse(request.body);
    const result = await authService.login(username, password);

    request.log.info({ userId: result.user.id, role: result.user.role }, 'User logged in');

    return reply.send({
      message: 'Login successful',
      user: {
        id: result.user.id,
        username: result.user.username,
        role: result.user.role
      },
      token: result.token
    });
  });
};
