import { FastifyInstance } from 'fastify';

export const API_VERSION = '1.0.0';
const SERVICE_MESSAGE = 'Hackathon admin API is running';

export const rootRoutes = async (fastify: FastifyInstance) => {
  fastify.get('/', async () => ({
    message: SERVICE_MESSAGE,
    version: API_VERSION,
    docs: '/api/v1/health'
  }));
};

export const healthRoutes = async (fastify: FastifyInstance) => {
  fastify.get('/health', async () => ({
    status: 'healthy',
    message: SERVICE_MESSAGE,
    version: API_VERSION
  }));
};
