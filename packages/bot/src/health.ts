import Fastify, { type FastifyInstance } from 'fastify';
import type { CycleSummary } from './scheduled-tasks.js';

export interface HealthSource {
  isReady(): boolean;
  lastSweep(): CycleSummary | null;
}

export function buildHealthServer(source: HealthSource, clock: () => Date = () => new Date()): FastifyInstance {
  const app = Fastify({ logger: false });

  app.get('/health', async (_request, reply) => {
    const ready = source.isReady();
    const sweep = source.lastSweep();
    reply.status(ready ? 200 : 503);
    return {
      status: ready ? 'ok' : 'starting',
      discord: ready ? 'connected' : 'connecting',
      lastSweep: sweep && { ...sweep, startedAt: sweep.startedAt.toISOString() },
      timestamp: clock().toISOString(),
    };
  });

  return app;
}
