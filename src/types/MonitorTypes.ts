/**
 * Monitor types - severity model, metric verdicts and management policy
 */

export type ThresholdStatus = 'CRITICAL' | 'WARNING' | 'OK';

export const THRESHOLD_CRITICAL: ThresholdStatus = 'CRITICAL';
export const THRESHOLD_WARNING: ThresholdStatus = 'WARNING';
export const THRESHOLD_OK: ThresholdStatus = 'OK';

export type ManagementStrategy = 'alert' | 'managed';

export const SES_MONITOR_STRATEGY_ALERT: ManagementStrategy = 'alert';
export const SES_MONITOR_STRATEGY_MANAGED: ManagementStrategy = 'managed';

export function isManagementStrategy(value: string): value is ManagementStrategy {
  return value === SES_MONITOR_STRATEGY_ALERT || value === SES_MONITOR_STRATEGY_MANAGED;
}

/**
 * Action taken on the account in response to a reputation check.
 */
export type ReputationAction = 'alert' | 'enable' | 'disable';

export const ACTION_ALERT: ReputationAction = 'alert';
export const ACTION_ENABLE: ReputationAction = 'enable';
export const ACTION_DISABLE: ReputationAction = 'disable';

export type ReputationMetricId = 'bounce_rate' | 'complaint_rate';

export const REPUTATION_METRIC_IDS: readonly ReputationMetricId[] = ['bounce_rate', 'complaint_rate'];

/**
 * Percentages are on a 0-100 scale throughout (80% is 80).
 */
export interface ThresholdPair {
  warning: number;
  critical: number;
}

export type ReputationThresholds = Record<ReputationMetricId, ThresholdPair>;

export interface QuotaThresholds {
  warningPercent: number;
  criticalPercent: number;
}

/** One time series as returned by the reputation metrics source. */
export interface ReputationSeries {
  id: ReputationMetricId;
  label: string;
  timestamps: Date[];
  values: number[];
}

/** One reputation measurement, already compared against the threshold that decided its bucket. */
export interface MetricPoint {
  readonly label: string;
  readonly value: number;
  readonly threshold: number;
  readonly timestamp: string;
}

export interface ReputationVerdict {
  critical: MetricPoint[];
  warning: MetricPoint[];
  ok: MetricPoint[];
}

export interface QuotaVerdict {
  volume: number;
  max_volume: number;
  utilization_percent: number;
  /** Threshold the status was decided against (warning threshold for OK). */
  threshold_percent: number;
  status: ThresholdStatus;
  metric_timestamp: string;
}

export interface SendingStats {
  volume: number;
  max_volume: number;
}

export interface NotificationConfig {
  notifyPagingOnReputation: boolean;
  notifyPagingOnQuota: boolean;
  notifyChatOnReputation: boolean;
  notifyChatOnQuota: boolean;
}

/**
 * Identity strings used for display fields and dedup key construction.
 */
export interface AccountIdentity {
  accountName: string;
  region: string;
  environment: string;
  serviceName: string;
  sesConsoleUrl: string;
  sesReputationDashboardUrl: string;
}
