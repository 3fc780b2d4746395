import type { Snapshot } from '../types/snapshot';
import { fmtUsd, fmtUtc, isNumber } from './format';

export const RISK_OFF_RATIO = 70;
export const DEPLOYING_RATIO = 30;

export const INSIGHT_LINES = {
  flowAccumulation: '🔵 Flows: net outflows → accumulation (bullish signal).',
  flowDistribution: '🔴 Flows: net inflows → distribution / sell pressure.',
  flowNeutral: '⚪ Flows: neutral.',
  stableRiskOff: '🟠 Stablecoin: high inflow ratio → risk-off (whales holding safety).',
  stableDeploying: '🟢 Stablecoin: low inflow ratio → deploying into crypto (accumulation).',
  stableMixed: '🟡 Stablecoin: mixed / transitional state.',
  combinedAccumulation: '✅ Combined: whales pulling assets and deploying stablecoins → strong accumulation.',
  combinedDivergence: '⚠️ Combined: tokens leaving but stablecoins coming in → watch closely.',
  combinedBearish: '❌ Combined: distribution plus stablecoin build-up → bearish posture.',
} as const;

/**
 * Reads the snapshot into an ordered list of plain-language insight lines.
 *
 * Header and timestamp are always present; every other line is omitted when
 * the number it depends on is unknown. Only three of the nine sign
 * combinations of (net flow, stablecoin net flow) produce a combined line.
 */
export function deriveInsight(snapshot: Snapshot): string[] {
  const { market, exchange_flows, stablecoin } = snapshot;
  const netFlow = exchange_flows.net_flow;
  const ratio = stablecoin.stablecoin_inflow_ratio_pct;
  const stableNet = stablecoin.stablecoin_net_flow;

  const lines = [`Insight — ${market.symbol ?? 'ETH'} ${fmtUsd(market.price_usd)}`];

  if (isNumber(netFlow)) {
    if (netFlow < 0) lines.push(INSIGHT_LINES.flowAccumulation);
    else if (netFlow > 0) lines.push(INSIGHT_LINES.flowDistribution);
    else lines.push(INSIGHT_LINES.flowNeutral);
  }

  if (isNumber(ratio)) {
    if (ratio >= RISK_OFF_RATIO) lines.push(INSIGHT_LINES.stableRiskOff);
    else if (ratio <= DEPLOYING_RATIO) lines.push(INSIGHT_LINES.stableDeploying);
    else lines.push(INSIGHT_LINES.stableMixed);
  }

  if (isNumber(netFlow) && isNumber(stableNet)) {
    if (netFlow < 0 && stableNet < 0) lines.push(INSIGHT_LINES.combinedAccumulation);
    else if (netFlow < 0 && stableNet > 0) lines.push(INSIGHT_LINES.combinedDivergence);
    else if (netFlow > 0 && stableNet > 0) lines.push(INSIGHT_LINES.combinedBearish);
  }

  lines.push(`As of ${fmtUtc(snapshot.fetched_at)} UTC`);
  return lines;
}
