import { FastifyInstance } from 'fastify';
import { createAuthMiddleware, requireRole, requireUser } from '../middleware/auth';
import { idParamsSchema } from '../schemas/common';
import {
  allocateSchema,
  createTeamRegistrationSchema,
  evaluateSchema,
  regNumberParamsSchema,
  registrationActionSchema,
  teamIdParamsSchema,
  teamRegistrationQuerySchema,
  trackParamsSchema,
  updateTeamRegistrationSchema
} from '../schemas/teamRegistration';
import { parsePagination } from '../utils/pagination';
import type { RouteOptions } from './types';

export const teamRegistrationRoutes = async (fastify: FastifyInstance, opts: RouteOptions) => {
  const { authService, teamRegistrationService } = opts.services;
  const authenticate = createAuthMiddleware(authService);

  fastify.post('/', async (request, reply) => {
    const details = createTeamRegistrationSchema.parse(request.body);
    const team = await teamRegistrationService.submit(details);

    request.log.info({ registrationNumber: team.registrationNumber, teamId: team.teamId }, 'Team registration submitted');

    return reply.status(201).send({ message: 'Team registration created successfully', team });
  });

  fastify.get('/', { preHandler: authenticate }, async (request, reply) => {
    const filter = teamRegistrationQuerySchema.parse(request.query ?? {});
    const pagination = parsePagination(request.query);
    const { teams, total } = await teamRegistrationService.list(filter, pagination);

    return reply.send({
      teams,
      pagination: { page: pagination.page, limit: pagination.limit, total }
    });
  });

  fastify.get('/stats', { preHandler: authenticate }, async (_request, reply) => {
    const stats = await teamRegistrationService.stats();
    return reply.send({ stats });
  });

  fastify.get('/allocated', {
    preHandler: [authenticate, requireRole('judge', 'Only judges can view allocated teams')]
  }, async (request, reply) => {
    const judge = requireUser(request);
    const teams = await teamRegistrationService.listAllocated(judge.id);
    return reply.send({ teams });
  });

  fastify.get('/reg/:regNumber', { preHandler: authenticate }, async (request, reply) => {
    const { regNumber } = regNumberParamsSchema.parse(request.params);
    const team = await teamRegistrationService.getByRegistrationNumber(regNumber);
    return reply.send({ team });
  });

  fastify.get('/team/:teamId', { preHandler: authenticate }, async (request, reply) => {
    const { teamId } = teamIdParamsSchema.parse(request.params);
    const team = await teamRegistrationService.getByTeamId(teamId);
    return reply.send({ team });
  });

  fastify.get('/track/:track', { preHandler: authenticate }, async (request, reply) => {
    const { track } = trackParamsSchema.parse(request.params);
    const pagination = parsePagination(request.query);
    const { teams, total } = await teamRegistrationService.list({ track }, pagination);

    return reply.send({
      teams,
      track,
      pagination: { page: pagination.page, limit: pagination.limit, total }
    });
  });

  fastify.get('/:id', { preHandler: authenticate }, async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const team = await teamRegistrationService.getById(id);
    return reply.send({ team });
  });

  fastify.put('/:id', { preHandler: authenticate }, async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const fields = updateTeamRegistrationSchema.parse(request.body ?? {});
    const team = await teamRegistrationService.edit(id, fields);

    return reply.send({ message: 'Team registration updated successfully', team });
  });

  fastify.delete('/:id', { preHandler: authenticate }, async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    await teamRegistrationService.delete(id);

    request.log.info({ registrationId: id }, 'Team registration deleted');
    return reply.send({ message: 'Team registration deleted successfully' });
  });

  fastify.put('/:id/action', { preHandler: authenticate }, async (request, reply) => {
    const user = requireUser(request);
    const { id } = idParamsSchema.parse(request.params);
    const { action, reason, actionedBy } = registrationActionSchema.parse(request.body);

    const team = await teamRegistrationService.act(id, action, actionedBy ?? user.username, reason);

    request.log.info({ registrationId: id, action, actor: team.actionedBy }, 'Team registration actioned');
    return reply.send({
      message: `Team registration ${action === 'approve' ? 'approved' : 'rejected'} successfully`,
      team
    });
  });

  fastify.put('/:id/allocate', {
    preHandler: [authenticate, requireRole('admin', 'Only admin can allocate teams')]
  }, async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const { judgeId } = allocateSchema.parse(request.body);
    const team = await teamRegistrationService.allocate(id, judgeId);

    return reply.send({ message: 'Team allocated to judge', team });
  });

  fastify.put('/:id/evaluate', {
    preHandler: [authenticate, requireRole('judge', 'Only judges can evaluate teams')]
  }, async (request, reply) => {
    const judge = requireUser(request);
    const { id } = idParamsSchema.parse(request.params);
    const { decision, reason } = evaluateSchema.parse(request.body);
    const team = await teamRegistrationService.evaluate(id, judge, decision, reason);

    return reply.send({ message: 'Team evaluation updated', team });
  });
};
