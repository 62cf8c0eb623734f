import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

export interface HealthRouteOptions {
  memoryType: 'memory' | 'redis';
}

export async function healthRoutes(fastify: FastifyInstance, options: HealthRouteOptions) {
  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.send({
      status: 'ok',
      memory: options.memoryType,
      timestamp: new Date().toISOString(),
    });
  });
}
