import { FALLBACK_SNAPSHOT } from '../src/services/fallback';
import type { Snapshot } from '../src/types/snapshot';

export const FIXED_TIME = Date.UTC(2026, 9, 18, 12, 0, 0);

export function makeSnapshot(overrides: Partial<Snapshot> = {}): Snapshot {
  return {
    ...FALLBACK_SNAPSHOT,
    sources: { market: 'fallback', exchange_flows: 'fallback', stablecoin: 'fallback', whale_transfers: 'fallback' },
    fetched_at: FIXED_TIME,
    ...overrides,
  };
}
