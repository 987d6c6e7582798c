import { FastifyInstance } from 'fastify';
import { createAuthMiddleware } from '../middleware/auth';
import { idParamsSchema } from '../schemas/common';
import { createUserSchema, updateUserSchema } from '../schemas/user';
import { parsePagination } from '../utils/pagination';
import type { RouteOptions } from './types';

export const userRoutes = async (fastify: FastifyInstance, opts: RouteOptions) => {
  const { authService, userService } = opts.services;

  fastify.addHook('preHandler', createAuthMiddleware(authService));

  fastify.post('/', async (request, reply) => {
    const input = createUserSchema.parse(request.body);
    const { user, generatedPassword } = await userService.createUser(input);

    request.log.info({ userId: user.id, role: user.role }, 'User created');

    return reply.status(201).send({
      message: 'User created successfully',
      user: generatedPassword === undefined ? user : { ...user, password: generatedPassword }
    });
  });

  fastify.get('/', async (request, reply) => {
    const pagination = parsePagination(request.query);
    const { users, total } = await userService.listUsers(pagination);

    return reply.send({
      users,
      pagination: { page: pagination.page, limit: pagination.limit, total }
    });
  });

  fastify.get('/:id', async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const user = await userService.getUser(id);
    return reply.send({ user });
  });

  fastify.put('/:id', async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const input = updateUserSchema.parse(request.body ?? {});
    const user = await userService.updateUser(id, input);

    return reply.send({ message: 'User updated successfully', user });
  });

  fastify.delete('/:id', async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    await userService.deleteUser(id);

    request.log.info({ userId: id }, 'User deleted');
    return reply.send({ message: 'User deleted successfully' });
  });
};
