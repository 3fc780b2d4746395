import Fastify from 'fastify';
import cors from '@fastify/cors';
import type { AlertDriver } from './queues/scheduler';
import { deriveInsight } from './services/insight';
import { formatFlows, formatMarket, formatRisk, formatWhales } from './services/format';
import type { Snapshot } from './types/snapshot';

export interface AppDeps {
  loadSnapshot: () => Promise<Snapshot>;
  /** Absent when no operator channel is configured. */
  driver?: Pick<AlertDriver, 'runCycle'>;
}

const DEFAULT_WHALE_LIMIT = 10;

export const COMMANDS = [
  { route: 'GET /api/market', description: 'ETH market overview' },
  { route: 'GET /api/flows', description: 'Exchange inflow/outflow stats' },
  { route: 'GET /api/risk', description: 'Stablecoin rotation metrics' },
  { route: 'GET /api/whales?limit=N', description: 'Recent whale transfers' },
  { route: 'GET /api/insight', description: 'Market interpretation' },
  { route: 'POST /api/alerts/check', description: 'Run the alert check now' },
] as const;

const HELP_TEXT = [
  'Whale Watch',
  '',
  ...COMMANDS.map((c) => `${c.route} — ${c.description}`),
  '',
  'Set DASHBOARD_API_URL to your dashboard API; without it every section uses sample data.',
].join('\n');

function parseLimit(raw?: string) {
  const n = Number(raw);
  if (!raw || !Number.isFinite(n)) return DEFAULT_WHALE_LIMIT;
  return Math.max(1, Math.min(100, Math.trunc(n)));
}

// Every request reads a fresh snapshot; nothing is cached between calls.
export async function buildApp(deps: AppDeps) {
  const app = Fastify({ logger: false });
  await app.register(cors, { origin: true });

  app.get('/health', async () => ({ status: 'ok' }));

  app.get('/api/help', async () => ({ commands: COMMANDS, text: HELP_TEXT }));

  app.get('/api/market', async () => {
    const snap = await deps.loadSnapshot();
    return { source: snap.sources.market, data: snap.market, text: formatMarket(snap.market, snap.fetched_at) };
  });

  app.get('/api/flows', async () => {
    const snap = await deps.loadSnapshot();
    return { source: snap.sources.exchange_flows, data: snap.exchange_flows, text: formatFlows(snap.exchange_flows) };
  });

  app.get('/api/risk', async () => {
    const snap = await deps.loadSnapshot();
    return { source: snap.sources.stablecoin, data: snap.stablecoin, text: formatRisk(snap.stablecoin) };
  });

  app.get<{ Querystring: { limit?: string } }>('/api/whales', async (request) => {
    const limit = parseLimit(request.query.limit);
    const snap = await deps.loadSnapshot();
    return {
      source: snap.sources.whale_transfers,
      data: snap.whale_transfers.slice(0, limit),
      text: formatWhales(snap.whale_transfers, limit),
    };
  });

  app.get('/api/insight', async () => {
    const lines = deriveInsight(await deps.loadSnapshot());
    return { lines, text: lines.join('\n') };
  });

  // Manual alert check (same cycle the scheduler runs)
  app.post('/api/alerts/check', async (_request, reply) => {
    if (!deps.driver) {
      return reply.code(503).send({ error: 'operator channel not configured' });
    }
    return deps.driver.runCycle();
  });

  return app;
}
