import type { Snapshot, Transfer } from '../types/snapshot';

export type SnapshotSections = Pick<Snapshot, 'market' | 'exchange_flows' | 'stablecoin' | 'whale_transfers'>;

const SAMPLE_TRANSFERS: readonly Transfer[] = Object.freeze([
  Object.freeze({ token: 'USDT', from: '0xc0ba...1a09', to: '0x28c6...1d60', amount: 1_851_370.43 }),
  Object.freeze({ token: 'USDT', from: '0x17dc...403a', to: '0xaa8b...3efb', amount: 39_365_167.96 }),
]);

/** Sample data served per section whenever the live section is unavailable. */
export const FALLBACK_SNAPSHOT: SnapshotSections = Object.freeze({
  market: Object.freeze({
    symbol: 'ETH',
    price_usd: 3757.84,
    price_change_24h_pct: -13.22,
    volume_24h_usd: 104_010_000_000,
    market_cap_usd: 454_450_000_000,
  }),
  exchange_flows: Object.freeze({
    total_inflow: 530_276_600,
    total_outflow: 663_261_947,
    net_flow: -132_985_346,
    sentiment: 'Strong Accumulation (Bullish)',
  }),
  stablecoin: Object.freeze({
    stablecoin_inflow_ratio_pct: 100.0,
    stablecoin_net_flow: -20_000_000,
    mode: 'Risk-Off -> Deploying',
  }),
  whale_transfers: SAMPLE_TRANSFERS,
});
