import type { z } from 'zod';
import { DASHBOARD_PATHS, type DashboardClient } from '../clients/dashboard';
import { FALLBACK_SNAPSHOT } from './fallback';
import {
  ExchangeFlowsSchema,
  MarketSchema,
  StablecoinSchema,
  WhaleTransfersSchema,
  type FetchResult,
  type SectionKey,
  type SectionSource,
  type Snapshot,
  type Transfer,
} from '../types/snapshot';

const SECTION_KEYS: readonly SectionKey[] = ['market', 'exchange_flows', 'stablecoin', 'whale_transfers'];

/**
 * Fetches the four dashboard sections concurrently and merges them into one
 * frozen Snapshot. Each section is either the live payload or its sample
 * fallback; sections never block each other and no section is ever half live.
 */
export async function buildSnapshot(client: DashboardClient, now: () => number = Date.now): Promise<Snapshot> {
  const [m, f, s, w] = (
    await Promise.allSettled([
      client.fetch(DASHBOARD_PATHS.market),
      client.fetch(DASHBOARD_PATHS.exchange_flows),
      client.fetch(DASHBOARD_PATHS.stablecoin),
      client.fetch(DASHBOARD_PATHS.whale_transfers),
    ])
  ).map(toResult);

  const market = liveObject(m, MarketSchema);
  const flows = liveObject(f, ExchangeFlowsSchema);
  const stable = liveObject(s, StablecoinSchema);
  const whales = liveTransfers(w);

  const sources: Record<SectionKey, SectionSource> = {
    market: market ? 'live' : 'fallback',
    exchange_flows: flows ? 'live' : 'fallback',
    stablecoin: stable ? 'live' : 'fallback',
    whale_transfers: whales ? 'live' : 'fallback',
  };

  const degraded = SECTION_KEYS.filter((k) => sources[k] === 'fallback');
  if (degraded.length) {
    console.debug(`Snapshot degraded, sample data used for: ${degraded.join(', ')}`);
  }

  const transfers: readonly Transfer[] = whales ?? FALLBACK_SNAPSHOT.whale_transfers;

  return Object.freeze({
    market: Object.freeze(market ?? FALLBACK_SNAPSHOT.market),
    exchange_flows: Object.freeze(flows ?? FALLBACK_SNAPSHOT.exchange_flows),
    stablecoin: Object.freeze(stable ?? FALLBACK_SNAPSHOT.stablecoin),
    whale_transfers: Object.freeze(transfers.map((t) => Object.freeze(t))),
    sources: Object.freeze(sources),
    fetched_at: now(),
  });
}

function toResult(r: PromiseSettledResult<FetchResult>): FetchResult {
  if (r.status === 'fulfilled') return r.value;
  return { ok: false, reason: r.reason instanceof Error ? r.reason.message : String(r.reason) };
}

function isNonEmptyObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v) && Object.keys(v).length > 0;
}

function liveObject<S extends z.ZodTypeAny>(res: FetchResult, schema: S): z.output<S> | undefined {
  if (!res.ok || !isNonEmptyObject(res.data)) return undefined;
  const parsed = schema.safeParse(res.data);
  return parsed.success ? parsed.data : undefined;
}

// An empty list is a successful answer ("no transfers"), not a failure.
function liveTransfers(res: FetchResult): Transfer[] | undefined {
  if (!res.ok || !Array.isArray(res.data)) return undefined;
  const parsed = WhaleTransfersSchema.safeParse(res.data);
  return parsed.success ? parsed.data : undefined;
}
