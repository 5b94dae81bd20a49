/**
 * AccountMonitor - runs the sending quota and reputation checks for one cycle, applies the
 * management strategy and queues notifications; sendNotifications() flushes them.
 *
 * Checks never send: they fill the cycle's queues and return a snapshot, so a caller can
 * inspect (or dry-run) before anything leaves the process.
 *
 * Gates (both checks): monitoring flag off, or a strategy other than alert / managed,
 * skips the check entirely. No metric fetch, no account-control call, nothing queued.
 */

import type { IAccountControl, IReputationMetricsSource, ISendingStatsSource } from '../../types/CollaboratorTypes';
import type {
  MetricPoint,
  NotificationConfig,
  QuotaThresholds,
  QuotaVerdict,
  ReputationAction,
  ReputationThresholds,
  ReputationVerdict,
  ThresholdStatus,
} from '../../types/MonitorTypes';
import {
  ACTION_ALERT,
  ACTION_DISABLE,
  ACTION_ENABLE,
  SES_MONITOR_STRATEGY_MANAGED,
  isManagementStrategy,
} from '../../types/MonitorTypes';
import type {
  ChatMessage,
  DeliveryOutcome,
  DeliveryResult,
  NotificationBackend,
  NotificationResponses,
  PagingEvent,
  PendingNotifications,
} from '../../types/NotificationTypes';
import { InvalidQuotaConfigurationError, MonitorError, NotificationFailureError } from '../../types/MonitorErrors';
import { evaluate } from '../quota/QuotaEvaluator';
import { classify, getReputationStatus } from '../reputation/MetricClassifier';
import { PagingPayloadBuilder } from '../notification/PagingPayloadBuilder';
import { ChatPayloadBuilder } from '../notification/ChatPayloadBuilder';
import { DeliveryEngine } from '../notification/DeliveryEngine';
import { NotificationQueues, createNotificationQueues, snapshotQueues } from '../notification/NotificationQueue';
import { iso8601Timestamp, unixTimestamp } from '../../utils/format-helpers';
import { Logger } from '../core/Logger';

export type SkipReason =
  | 'MONITORING_DISABLED'
  | 'INVALID_STRATEGY'
  | 'INVALID_QUOTA_CONFIGURATION'
  | 'CONFIGURATION_ERROR';

export interface CheckResult {
  check: 'sending_quota' | 'reputation';
  skipped: boolean;
  skip_reason?: SkipReason;
  /** Undefined when skipped, or when no reputation metric had data. */
  status?: ThresholdStatus;
  action?: ReputationAction;
  quota?: QuotaVerdict;
  reputation?: ReputationVerdict;
  /** Both queues after this check; empty when skipped. */
  pending: PendingNotifications;
}

export interface CycleResult {
  sending_quota: CheckResult;
  reputation: CheckResult;
  responses: NotificationResponses;
}

export interface CheckOptions {
  /** Defaults to now. */
  targetDate?: Date;
}

export interface ReputationCheckOptions extends CheckOptions {
  periodSeconds?: number;
  metricTimedeltaSeconds?: number;
}

export interface SendOptions {
  raiseOnErrors?: boolean;
  /** Overrides the transports' configured dry-run default. */
  dryRun?: boolean;
}

export interface AccountMonitorConfig {
  managementStrategy: string;
  notify: NotificationConfig;
  quotaThresholds: QuotaThresholds;
  reputationThresholds: ReputationThresholds;
  monitorReputation: boolean;
  monitorSendingQuota: boolean;
  reputationPeriodSeconds: number;
  reputationMetricTimedeltaSeconds: number;
  sendingStats: ISendingStatsSource;
  reputationMetrics: IReputationMetricsSource;
  accountControl: IAccountControl;
  pagingBuilder: PagingPayloadBuilder;
  chatBuilder: ChatPayloadBuilder;
  deliveryEngine: DeliveryEngine;
  logger: Logger;
}

/**
 * Failure per the notification contract: a status in 400..500 inclusive. A transport error
 * with no response (network failure, timeout) counts as a failure too.
 */
export function isFailedOutcome<T>(outcome: DeliveryOutcome<T>): boolean {
  if (outcome.kind === 'error') return true;
  if (outcome.kind === 'response') return outcome.status >= 400 && outcome.status <= 500;
  return false;
}

function emptyPending(): PendingNotifications {
  return { pager_duty: [], slack: [] };
}

export class AccountMonitor {
  private config: AccountMonitorConfig;
  private logger: Logger;

  constructor(config: AccountMonitorConfig) {
    this.config = config;
    this.logger = config.logger;
  }

  /**
   * Quota: CRITICAL triggers paging and posts a chat message; WARNING resolves paging and
   * posts a chat message; OK resolves paging only.
   */
  async handleSendingQuota(queues: NotificationQueues, options: CheckOptions = {}): Promise<CheckResult> {
    const skipReason = this.getSkipReason(this.config.monitorSendingQuota, 'SES account sending quota');
    if (skipReason) {
      return { check: 'sending_quota', skipped: true, skip_reason: skipReason, pending: emptyPending() };
    }

    this.logger.debug('Handling SES account sending quota...');

    const targetDate = options.targetDate ?? new Date();
    const eventIsoTs = iso8601Timestamp(targetDate);
    const eventUnixTs = unixTimestamp(targetDate);

    const { volume, max_volume } = await this.config.sendingStats.getSendingStats();

    let verdict: QuotaVerdict;
    try {
      verdict = evaluate(volume, max_volume, this.config.quotaThresholds, eventIsoTs);
    } catch (error) {
      if (error instanceof InvalidQuotaConfigurationError) {
        this.logger.error('SES sending quota check failed for this cycle', {
          method: 'handleSendingQuota',
          error: error.message,
          error_code: error.error_code,
        });
        return {
          check: 'sending_quota',
          skipped: true,
          skip_reason: 'INVALID_QUOTA_CONFIGURATION',
          pending: emptyPending(),
        };
      }
      throw error;
    }

    this.logger.info('SES sending quota evaluated', {
      method: 'handleSendingQuota',
      utilization_percent: verdict.utilization_percent,
      threshold_percent: verdict.threshold_percent,
      status: verdict.status,
    });

    const { notify } = this.config;
    const pagingEvents: PagingEvent[] = [];
    const chatMessages: ChatMessage[] = [];

    if (notify.notifyPagingOnQuota) {
      this.logger.debug(`PagerDuty alerting is ENABLED, queuing ${verdict.status === 'CRITICAL' ? 'TRIGGER' : 'RESOLVE'} event...`);
      pagingEvents.push(
        this.config.pagingBuilder.buildQuotaEventForStatus(verdict.status, {
          volume,
          maxVolume: max_volume,
          utilizationPercent: verdict.utilization_percent,
          thresholdPercent: verdict.threshold_percent,
          eventIsoTs,
          metricTs: verdict.metric_timestamp,
        })
      );
    }

    if (notify.notifyChatOnQuota && verdict.status !== 'OK') {
      this.logger.debug('Slack notifications is ENABLED, queuing message...');
      chatMessages.push(
        this.config.chatBuilder.buildQuotaTrigger({
          status: verdict.status,
          utilizationPercent: verdict.utilization_percent,
          thresholdPercent: verdict.threshold_percent,
          volume,
          maxVolume: max_volume,
          metricIsoTs: verdict.metric_timestamp,
          eventUnixTs,
        })
      );
    }

    this.enqueueAll(queues, pagingEvents, chatMessages);
    this.logger.debug('SES account sending handler complete.');

    return {
      check: 'sending_quota',
      skipped: false,
      status: verdict.status,
      quota: verdict,
      pending: snapshotQueues(queues),
    };
  }

  /**
   * Reputation: CRITICAL triggers paging with the critical and warning metrics and, when
   * managed, disables sending. WARNING and OK re-enable sending when managed and disabled.
   */
  async handleReputation(queues: NotificationQueues, options: ReputationCheckOptions = {}): Promise<CheckResult> {
    const skipReason = this.getSkipReason(this.config.monitorReputation, 'SES account reputation');
    if (skipReason) {
      return { check: 'reputation', skipped: true, skip_reason: skipReason, pending: emptyPending() };
    }

    this.logger.debug('Handling SES account reputation...');

    const targetDate = options.targetDate ?? new Date();
    const eventIsoTs = iso8601Timestamp(targetDate);
    const eventUnixTs = unixTimestamp(targetDate);
    const periodSeconds = options.periodSeconds ?? this.config.reputationPeriodSeconds;
    const timedeltaSeconds = options.metricTimedeltaSeconds ?? this.config.reputationMetricTimedeltaSeconds;
    const windowStart = new Date(targetDate.getTime() - timedeltaSeconds * 1000);

    const series = await this.config.reputationMetrics.getReputationMetrics(windowStart, targetDate, periodSeconds);
    const verdict = classify(series, this.config.reputationThresholds);
    const status = getReputationStatus(verdict);

    this.logger.info('SES reputation classified', {
      method: 'handleReputation',
      critical: verdict.critical.length,
      warning: verdict.warning.length,
      ok: verdict.ok.length,
      status,
    });

    if (status === null) {
      this.logger.warn('No SES reputation metric data in window, nothing to evaluate', {
        startTime: windowStart.toISOString(),
        endTime: eventIsoTs,
      });
      return { check: 'reputation', skipped: false, reputation: verdict, pending: snapshotQueues(queues) };
    }

    const managed = this.config.managementStrategy === SES_MONITOR_STRATEGY_MANAGED;
    const { notify } = this.config;
    const pagingEvents: PagingEvent[] = [];
    const chatMessages: ChatMessage[] = [];

    // Payloads are built from the planned action; the account is only changed once they exist.
    const sendingEnabled = managed ? await this.config.accountControl.isSendingEnabled() : true;
    let action: ReputationAction = ACTION_ALERT;
    let mutation: (() => Promise<void>) | undefined;

    if (status === 'CRITICAL') {
      const dangerMetrics: MetricPoint[] = [...verdict.critical, ...verdict.warning];

      if (managed) {
        action = ACTION_DISABLE;
        if (sendingEnabled) {
          mutation = () => this.disableSending();
        } else {
          this.logger.debug('SES account sending is already DISABLED');
        }
      }

      if (notify.notifyPagingOnReputation) {
        this.logger.debug('PagerDuty alerting is ENABLED, queuing TRIGGER event...');
        pagingEvents.push(
          this.config.pagingBuilder.buildReputationTrigger({ metrics: dangerMetrics, action, eventIsoTs, eventUnixTs })
        );
      }

      if (notify.notifyChatOnReputation) {
        this.logger.debug('Slack notifications is ENABLED, queuing message...');
        chatMessages.push(
          this.config.chatBuilder.buildReputationTrigger({
            status,
            metrics: dangerMetrics,
            action,
            eventUnixTs,
          })
        );
      }
    } else {
      if (managed && !sendingEnabled) {
        action = ACTION_ENABLE;
        mutation = () => this.enableSending();
      }

      if (status === 'WARNING' && notify.notifyChatOnReputation) {
        this.logger.debug('Slack notifications is ENABLED, queuing message...');
        chatMessages.push(
          this.config.chatBuilder.buildReputationTrigger({
            status,
            metrics: verdict.warning,
            action,
            eventUnixTs,
          })
        );
      } else if (status === 'OK' && action === ACTION_ENABLE && notify.notifyChatOnReputation) {
        this.logger.debug('Slack notifications is ENABLED, queuing recovery message...');
        chatMessages.push(
          this.config.chatBuilder.buildReputationResolve({ metrics: verdict.ok, action, eventUnixTs })
        );
      }
    }

    if (mutation) {
      await mutation();
    }

    this.enqueueAll(queues, pagingEvents, chatMessages);
    this.logger.debug('SES account reputation handler complete.');

    return {
      check: 'reputation',
      skipped: false,
      status,
      action,
      reputation: verdict,
      pending: snapshotQueues(queues),
    };
  }

  /**
   * Drains and delivers both queues. With raiseOnErrors, the first failed delivery of a
   * live backend (pager_duty first, then slack) raises NotificationFailureError carrying
   * every response gathered.
   */
  async sendNotifications(queues: NotificationQueues, options: SendOptions = {}): Promise<NotificationResponses> {
    this.logger.debug('Sending notifications...');
    const responses = await this.config.deliveryEngine.sendAll(queues, options.dryRun);
    this.logger.debug('Finished sending all notifications!');

    if (options.raiseOnErrors) {
      this.checkResponses('pager_duty', responses.pager_duty, responses);
      this.checkResponses('slack', responses.slack, responses);
      this.logger.debug('Notifications were all sent successfully!');
    }

    return responses;
  }

  /**
   * One full cycle: quota check, reputation check, then delivery. A configuration or
   * validation error skips the check it came from; the other check still runs.
   */
  async runCycle(options: ReputationCheckOptions & SendOptions = {}): Promise<CycleResult> {
    const queues = createNotificationQueues();
    const sendingQuota = await this.runCheck('sending_quota', () => this.handleSendingQuota(queues, options));
    const reputation = await this.runCheck('reputation', () => this.handleReputation(queues, options));
    const responses = await this.sendNotifications(queues, options);
    return { sending_quota: sendingQuota, reputation, responses };
  }

  private async runCheck(check: CheckResult['check'], run: () => Promise<CheckResult>): Promise<CheckResult> {
    try {
      return await run();
    } catch (error) {
      if (error instanceof MonitorError && error.error_class !== 'NOTIFICATION') {
        this.logger.error(`SES ${check} check failed for this cycle`, {
          method: 'runCycle',
          error: error.message,
          error_class: error.error_class,
          error_code: error.error_code,
        });
        return { check, skipped: true, skip_reason: 'CONFIGURATION_ERROR', pending: emptyPending() };
      }
      throw error;
    }
  }

  private getSkipReason(enabled: boolean, checkName: string): SkipReason | undefined {
    if (!enabled) {
      this.logger.debug(`${checkName} monitoring is DISABLED, skipping...`);
      return 'MONITORING_DISABLED';
    }
    if (!isManagementStrategy(this.config.managementStrategy)) {
      this.logger.warn(`SES management strategy is not VALID, skipping ${checkName} check`, {
        strategy: this.config.managementStrategy,
      });
      return 'INVALID_STRATEGY';
    }
    return undefined;
  }

  private async disableSending(): Promise<void> {
    this.logger.debug('SES management strategy is managed, status is CRITICAL, DISABLING...');
    await this.config.accountControl.disableSending();
  }

  private async enableSending(): Promise<void> {
    this.logger.debug('SES account sending is currently DISABLED! ENABLING...');
    await this.config.accountControl.enableSending();
  }

  private enqueueAll(queues: NotificationQueues, pagingEvents: PagingEvent[], chatMessages: ChatMessage[]): void {
    pagingEvents.forEach((event) => queues.pager_duty.enqueue(event));
    chatMessages.forEach((message) => queues.slack.enqueue(message));
  }

  private checkResponses<T>(
    backend: NotificationBackend,
    result: DeliveryResult<T>,
    responses: NotificationResponses
  ): void {
    if (!result.sent) {
      this.logger.debug(`${backend} DRY RUN executed, skipping notification checks...`);
      return;
    }

    for (const record of result.results) {
      if (isFailedOutcome(record.outcome)) {
        const status = record.outcome.kind === 'response' ? record.outcome.status : undefined;
        this.logger.error('Notification FAILURE', { backend, identifier: record.identifier, status_code: status });
        throw new NotificationFailureError(backend, record.identifier, status, responses);
      }
    }
  }
}
