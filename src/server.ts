import Fastify, { type FastifyInstance } from 'fastify';
import fastifyFormbody from '@fastify/formbody';
import { apiRoutes, type ApiOptions } from './routes/api.js';

export async function createServer(options: ApiOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false,
  });

  // Register plugins
  await app.register(fastifyFormbody);

  // Register API routes
  await app.register(apiRoutes, options);

  // Health check endpoint
  app.get('/health', async (_request, reply) => {
    return reply.send({ status: 'ok' });
  });

  return app;
}
