/**
 * QuotaEvaluator - sending quota utilization against warning / critical thresholds.
 */

import type { QuotaThresholds, QuotaVerdict } from '../../types/MonitorTypes';
import { InvalidQuotaConfigurationError } from '../../types/MonitorErrors';
import { classifyValue } from '../reputation/MetricClassifier';

/**
 * Utilization on a 0-100 scale. Exceeds 100 when the account is over quota.
 */
export function getUtilizationPercent(volume: number, maxVolume: number): number {
  if (!Number.isFinite(maxVolume) || maxVolume <= 0) {
    throw new InvalidQuotaConfigurationError(maxVolume);
  }
  return Math.max(0, (volume / maxVolume) * 100);
}

export function evaluate(
  volume: number,
  maxVolume: number,
  thresholds: QuotaThresholds,
  metricTimestamp: string = new Date().toISOString()
): QuotaVerdict {
  const utilization = getUtilizationPercent(volume, maxVolume);
  const status = classifyValue(utilization, thresholds.warningPercent, thresholds.criticalPercent);

  return {
    volume,
    max_volume: maxVolume,
    utilization_percent: utilization,
    threshold_percent: status === 'CRITICAL' ? thresholds.criticalPercent : thresholds.warningPercent,
    status,
    metric_timestamp: metricTimestamp,
  };
}
