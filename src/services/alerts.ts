import type { Snapshot } from '../types/snapshot';
import { fmtUsd, isNumber, shortAddr } from './format';

export interface AlertThresholds {
  /** Net flow at or below this is strong accumulation. */
  accumulation: number;
  /** Net flow at or above this is strong distribution. */
  distribution: number;
  /** Single transfers at or above this amount are reported. */
  bigTransfer: number;
}

export const ALERT_THRESHOLDS: Readonly<AlertThresholds> = Object.freeze({
  accumulation: -50_000_000,
  distribution: 50_000_000,
  bigTransfer: 10_000_000,
});

export function evaluateAlerts(snapshot: Snapshot, thresholds: AlertThresholds = ALERT_THRESHOLDS): string[] {
  const alerts: string[] = [];
  const netFlow = snapshot.exchange_flows.net_flow;

  if (isNumber(netFlow)) {
    if (netFlow <= thresholds.accumulation) {
      alerts.push(`🚨 Strong accumulation: net flow ${fmtUsd(netFlow)}`);
    }
    if (netFlow >= thresholds.distribution) {
      alerts.push(`⚠️ Strong distribution: net flow ${fmtUsd(netFlow)}`);
    }
  }

  for (const t of snapshot.whale_transfers) {
    if (isNumber(t.amount) && t.amount >= thresholds.bigTransfer) {
      alerts.push(`🐋 Whale transfer: ${fmtUsd(t.amount)} ${t.token ?? ''} from ${shortAddr(t.from)} to ${shortAddr(t.to)}`);
    }
  }

  return alerts;
}
