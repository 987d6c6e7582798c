import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { ApiError, StoreError, fromStoreError } from '../errors';

const INTERNAL_ERROR_BODY = {
  error: 'Internal server error',
  message: 'Something went wrong on our end'
};

const sendApiError = (reply: FastifyReply, error: ApiError) => {
  if (error.kind === 'internal') {
    return reply.status(500).send(INTERNAL_ERROR_BODY);
  }
  return reply
    .status(error.statusCode)
    .send(error.details === undefined ? { error: error.message } : { error: error.message, details: error.details });
};

export const errorHandler = (error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply) => {
  if (error instanceof ZodError) {
    return reply.status(400).send({
      error: 'Invalid request data',
      details: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    });
  }

  if (error instanceof ApiError) {
    if (error.kind === 'internal') {
      request.log.error({ err: error }, 'Request failed');
    }
    return sendApiError(reply, error);
  }

  if (error instanceof StoreError) {
    if (error.kind === 'failure') {
      request.log.error({ err: error }, 'Store operation failed');
    }
    return sendApiError(reply, fromStoreError(error));
  }

  // Framework errors such as a malformed JSON body carry their own 4xx status.
  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
    return reply.status(error.statusCode).send({ error: error.message });
  }

  request.log.error({ err: error }, 'Unhandled error');
  return reply.status(500).send(INTERNAL_ERROR_BODY);
};

export const notFoundHandler = (_request: FastifyRequest, reply: FastifyReply) =>
  reply.status(404).send({ error: 'Route not found' });
