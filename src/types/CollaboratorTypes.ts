/**
 * Interfaces of the remote collaborators the monitor depends on.
 */

import type { ReputationSeries, SendingStats } from './MonitorTypes';

export interface ISendingStatsSource {
  getSendingStats(): Promise<SendingStats>;
}

export interface IReputationMetricsSource {
  /**
   * Bounce-rate and complaint-rate series for `[windowStart, windowEnd]`, values on a 0-100 scale.
   */
  getReputationMetrics(windowStart: Date, windowEnd: Date, periodSeconds: number): Promise<ReputationSeries[]>;
}

/**
 * Account-level sending switch. Mutators are idempotent; callers read before writing.
 */
export interface IAccountControl {
  isSendingEnabled(): Promise<boolean>;
  enableSending(): Promise<void>;
  disableSending(): Promise<void>;
}
