import type { ExchangeFlowsSection, MarketSection, StablecoinSection, Transfer } from '../types/snapshot';

const usd = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function isNumber(v: unknown): v is number {
  return typeof v === 'number' && Number.isFinite(v);
}

export function fmtUsd(n: number | undefined): string {
  return isNumber(n) ? usd.format(n) : 'N/A';
}

export function fmtPct(n: number | undefined): string {
  if (!isNumber(n)) return 'N/A';
  return `${n >= 0 ? '+' : ''}${n.toFixed(2)}%`;
}

export function shortAddr(addr?: string): string {
  if (!addr) return '';
  if (addr.length < 10) return addr;
  return `${addr.slice(0, 6)}...${addr.slice(-4)}`;
}

/** `YYYY-MM-DD HH:MM:SS`, always UTC. */
export function fmtUtc(ms: number): string {
  return new Date(ms).toISOString().slice(0, 19).replace('T', ' ');
}

export function formatMarket(m: MarketSection, at: number): string {
  return [
    `${m.symbol ?? 'ETH'} Market Overview`,
    '',
    `Price: ${fmtUsd(m.price_usd)} (24h: ${fmtPct(m.price_change_24h_pct)})`,
    `24h Volume: ${fmtUsd(m.volume_24h_usd)}`,
    `Market Cap: ${fmtUsd(m.market_cap_usd)}`,
    `As of ${fmtUtc(at)} UTC`,
  ].join('\n');
}

export function formatFlows(f: ExchangeFlowsSection): string {
  return [
    'Exchange Flows',
    '',
    `Total Inflow: ${fmtUsd(f.total_inflow)}`,
    `Total Outflow: ${fmtUsd(f.total_outflow)}`,
    `Net Flow: ${fmtUsd(f.net_flow)}`,
    `Sentiment: ${f.sentiment ?? 'N/A'}`,
  ].join('\n');
}

export function formatRisk(s: StablecoinSection): string {
  const ratio = s.stablecoin_inflow_ratio_pct;
  return [
    'Stablecoin Rotation / Risk',
    '',
    `Stablecoin Inflow Ratio: ${isNumber(ratio) ? `${ratio}%` : 'N/A'}`,
    `Stablecoin Net Flow: ${fmtUsd(s.stablecoin_net_flow)}`,
    `Mode: ${s.mode ?? 'N/A'}`,
    '',
    'High inflow ratio → risk-off. Outflows → deploying to buy crypto.',
  ].join('\n');
}

export function formatTransfer(t: Transfer): string {
  return `${t.token ?? ''} ${shortAddr(t.from)} → ${shortAddr(t.to)} : ${fmtUsd(t.amount)}`;
}

export function formatWhales(transfers: readonly Transfer[], limit = 10): string {
  const shown = transfers.slice(0, limit);
  if (!shown.length) return 'No recent whale transfers.';
  return ['Recent Whale Transfers', ...shown.map((t) => `- ${formatTransfer(t)}`)].join('\n');
}
