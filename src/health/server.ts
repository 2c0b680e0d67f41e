import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import type { SchedulerState } from '../scheduler/index.js';
import type { HistoryStore } from '../storage/history-store.js';
import { getLogger } from '../lib/logger.js';

let _server: FastifyInstance | null = null;

export interface HealthServerDeps {
  history: HistoryStore;
  getState: () => SchedulerState;
  intervalMs: number;
  now?: () => number;
}

interface HistoryQuery {
  limit?: string;
}

const DEFAULT_HISTORY_LIMIT = 20;
const MAX_HISTORY_LIMIT = 200;

export function buildHealthServer(deps: HealthServerDeps): FastifyInstance {
  const server = Fastify({ logger: false });
  const now = deps.now ?? (() => Date.now());

  // Simple liveness probe
  server.get('/live', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send({ status: 'alive' });
  });

  // Unhealthy when the last run failed or no run finished within 2x the interval
  server.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const state = deps.getState();
    const lastEnd = state.lastCycleEnd;

    let status: 'starting' | 'ok' | 'stale' | 'failing';
    if (!lastEnd) {
      status = 'starting';
    } else if (now() - lastEnd.getTime() > 2 * deps.intervalMs) {
      status = 'stale';
    } else if (state.lastResult?.status === 'failed') {
      status = 'failing';
    } else {
      status = 'ok';
    }

    const healthy = status === 'ok' || status === 'starting';
    return reply.code(healthy ? 200 : 503).send({
      status,
      timestamp: new Date(now()).toISOString(),
      lastRun: lastEnd?.toISOString() ?? null,
      lastRecord: state.lastResult?.record ?? null,
      lastErrors: state.lastResult?.errors ?? [],
      cyclesCompleted: state.cyclesCompleted,
    });
  });

  server.get<{ Querystring: HistoryQuery }>(
    '/history',
    async (request, reply) => {
      const raw = request.query.limit;
      const parsed = raw === undefined ? DEFAULT_HISTORY_LIMIT : Number.parseInt(raw, 10);
      if (Number.isNaN(parsed) || parsed < 1) {
        return reply.code(400).send({ error: 'limit must be a positive integer' });
      }
      const limit = Math.min(parsed, MAX_HISTORY_LIMIT);

      try {
        const records = await deps.history.readAll();
        return reply.code(200).send({ total: records.length, records: records.slice(-limit) });
      } catch (err) {
        getLogger().error({ err }, 'History endpoint error');
        return reply.code(500).send({ error: err instanceof Error ? err.message : String(err) });
      }
    },
  );

  return server;
}

export async function startHealthServer(port: number, deps: HealthServerDeps): Promise<void> {
  _server = buildHealthServer(deps);
  await _server.listen({ port, host: '0.0.0.0' });
}

export async function stopHealthServer(): Promise<void> {
  if (_server) {
    await _server.close();
    _server = null;
  }
}
