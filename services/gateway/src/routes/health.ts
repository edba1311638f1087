import type { FastifyInstance } from 'fastify';

import type { AppContext } from '../types';

export const registerHealthRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/healthz', async () => ({ status: 'ok' }));

  app.get('/readyz', async (request, reply) => {
    let database = true;
    try {
      await ctx.todoRepository.ping();
    } catch (error) {
      request.log.warn({ err: error }, 'Database readiness check failed');
      database = false;
    }

    const components: Record<string, boolean> = { database };
    ctx.metrics.readinessGauge.set({ component: 'database' }, database ? 1 : 0);

    if (!database) {
      return reply.status(503).send({ status: 'not_ready', components });
    }
    return { status: 'ready', components };
  });

  app.get('/metrics', async (request, reply) => {
    reply.header('Content-Type', ctx.metrics.register.contentType);
    return ctx.metrics.register.metrics();
  });
};
