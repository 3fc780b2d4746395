import { z } from 'zod';

// Upstream fields are loosely typed: anything that is not the expected
// primitive reads as unknown (undefined) instead of failing the section.
const num = z.number().finite().optional().catch(undefined);
const str = z.string().optional().catch(undefined);

export const MarketSchema = z.object({
  symbol: str,
  price_usd: num,
  price_change_24h_pct: num,
  volume_24h_usd: num,
  market_cap_usd: num,
});

export const ExchangeFlowsSchema = z.object({
  total_inflow: num,
  total_outflow: num,
  // outflow - inflow; negative means coins are leaving exchanges
  net_flow: num,
  sentiment: str,
});

export const StablecoinSchema = z.object({
  stablecoin_inflow_ratio_pct: num,
  stablecoin_net_flow: num,
  mode: str,
});

export const TransferSchema = z.object({
  token: str,
  from: str,
  to: str,
  amount: num,
});

export const WhaleTransfersSchema = z.array(TransferSchema);

export type MarketSection = Readonly<z.infer<typeof MarketSchema>>;
export type ExchangeFlowsSection = Readonly<z.infer<typeof ExchangeFlowsSchema>>;
export type StablecoinSection = Readonly<z.infer<typeof StablecoinSchema>>;
export type Transfer = Readonly<z.infer<typeof TransferSchema>>;

export type SectionKey = 'market' | 'exchange_flows' | 'stablecoin' | 'whale_transfers';
export type SectionSource = 'live' | 'fallback';

export interface Snapshot {
  readonly market: MarketSection;
  readonly exchange_flows: ExchangeFlowsSection;
  readonly stablecoin: StablecoinSection;
  readonly whale_transfers: readonly Transfer[];
  readonly sources: Readonly<Record<SectionKey, SectionSource>>;
  /** Epoch ms at which aggregation finished. */
  readonly fetched_at: number;
}

export type FetchResult = { ok: true; data: unknown } | { ok: false; reason: string };
