/**
 * MetricClassifier - partitions reputation series into CRITICAL / WARNING / OK buckets.
 *
 * Only the most recent sample of each series is considered; a series without samples
 * is left out of every bucket. Pure: no clock, no I/O.
 */

import type {
  MetricPoint,
  ReputationSeries,
  ReputationThresholds,
  ReputationVerdict,
  ThresholdStatus,
} from '../../types/MonitorTypes';

export interface LatestSample {
  label: string;
  value: number;
  timestamp: string;
}

/**
 * Latest sample of a series by timestamp. On equal timestamps the first one wins.
 */
export function getLatestSample(series: ReputationSeries): LatestSample | null {
  const count = Math.min(series.timestamps.length, series.values.length);
  if (count === 0) {
    return null;
  }

  let latestIndex = 0;
  for (let i = 1; i < count; i++) {
    if (series.timestamps[i].getTime() > series.timestamps[latestIndex].getTime()) {
      latestIndex = i;
    }
  }

  return {
    label: series.label,
    value: series.values[latestIndex],
    timestamp: series.timestamps[latestIndex].toISOString(),
  };
}

/**
 * Tri-state rule, in order: >= critical, then >= warning, else OK.
 */
export function classifyValue(value: number, warning: number, critical: number): ThresholdStatus {
  if (value >= critical) return 'CRITICAL';
  if (value >= warning) return 'WARNING';
  return 'OK';
}

export function classify(
  series: ReputationSeries[],
  thresholds: ReputationThresholds
): ReputationVerdict {
  const verdict: ReputationVerdict = { critical: [], warning: [], ok: [] };

  for (const metric of series) {
    const latest = getLatestSample(metric);
    if (!latest) continue;

    const { warning, critical } = thresholds[metric.id];
    const status = classifyValue(latest.value, warning, critical);
    const point: MetricPoint = Object.freeze({
      label: latest.label,
      value: latest.value,
      threshold: status === 'CRITICAL' ? critical : warning,
      timestamp: latest.timestamp,
    });

    if (status === 'CRITICAL') {
      verdict.critical.push(point);
    } else if (status === 'WARNING') {
      verdict.warning.push(point);
    } else {
      verdict.ok.push(point);
    }
  }

  return verdict;
}

/**
 * Overall status of a verdict: the most severe non-empty bucket, or null when empty.
 */
export function getReputationStatus(verdict: ReputationVerdict): ThresholdStatus | null {
  if (verdict.critical.length > 0) return 'CRITICAL';
  if (verdict.warning.length > 0) return 'WARNING';
  if (verdict.ok.length > 0) return 'OK';
  return null;
}
