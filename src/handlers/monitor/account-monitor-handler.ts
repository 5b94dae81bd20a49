/**
 * SES account monitor handler: one quota + reputation cycle per invocation (scheduled).
 *
 * Configuration is read from the environment on every invocation. A notification failure
 * fails the invocation so the schedule's retry / alarm picks it up.
 */

import { Handler } from 'aws-lambda';
import { SESClient } from '@aws-sdk/client-ses';
import { CloudWatchClient } from '@aws-sdk/client-cloudwatch';
import { z } from 'zod';
import { Logger } from '../../services/core/Logger';
import { SesAccountService } from '../../services/ses/SesAccountService';
import { CloudWatchReputationService } from '../../services/metrics/CloudWatchReputationService';
import { PagingPayloadBuilder } from '../../services/notification/PagingPayloadBuilder';
import { ChatPayloadBuilder } from '../../services/notification/ChatPayloadBuilder';
import { HttpNotificationTransport } from '../../services/notification/HttpNotificationTransport';
import { DeliveryEngine } from '../../services/notification/DeliveryEngine';
import { AccountMonitor, CheckResult } from '../../services/monitor/AccountMonitor';
import { MonitorConfig, loadMonitorConfig } from '../../config/monitorConfig';
import { MonitorError } from '../../types/MonitorErrors';
import type { DeliveryResult } from '../../types/NotificationTypes';
import { getAWSClientConfig } from '../../utils/aws-client-config';

const logger = new Logger('AccountMonitorHandler');

const dryRunFlag = z.preprocess((val) => {
  if (typeof val !== 'string') return val;
  const normalized = val.trim().toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  return val;
}, z.boolean().optional());

/** Scheduled events carry extra fields; only dry_run is read. */
export const AccountMonitorEventSchema = z.preprocess(
  (val) => (val == null ? {} : val),
  z.object({ dry_run: dryRunFlag })
);

export type AccountMonitorEvent = z.infer<typeof AccountMonitorEventSchema>;

export interface CheckSummary {
  skipped: boolean;
  skip_reason?: string;
  status?: string;
  action?: string;
}

export interface AccountMonitorResult {
  success: boolean;
  service_name: string;
  dry_run: boolean;
  sending_quota: CheckSummary;
  reputation: CheckSummary;
  notifications: {
    pager_duty: { sent: boolean; count: number };
    slack: { sent: boolean; count: number };
  };
}

function summarizeCheck(result: CheckResult): CheckSummary {
  return {
    skipped: result.skipped,
    ...(result.skip_reason ? { skip_reason: result.skip_reason } : {}),
    ...(result.status ? { status: result.status } : {}),
    ...(result.action ? { action: result.action } : {}),
  };
}

function summarizeDelivery<T>(result: DeliveryResult<T>): { sent: boolean; count: number } {
  return { sent: result.sent, count: result.results.length };
}

export function buildAccountMonitor(config: MonitorConfig, monitorLogger: Logger = logger): AccountMonitor {
  const awsConfig = getAWSClientConfig(config.identity.region);
  const sesAccount = new SesAccountService(monitorLogger.child('SesAccountService'), new SESClient(awsConfig));
  const reputation = new CloudWatchReputationService(
    monitorLogger.child('CloudWatchReputationService'),
    new CloudWatchClient(awsConfig)
  );

  const deliveryEngine = new DeliveryEngine({
    pagingTransport: new HttpNotificationTransport(
      { url: config.pagerDuty.eventsUrl },
      monitorLogger.child('PagerDutyTransport')
    ),
    chatTransport: new HttpNotificationTransport(
      { url: config.slack.webhookUrl },
      monitorLogger.child('SlackTransport')
    ),
    channels: config.slack.channels,
    pagingDryRun: config.notifyDryRun,
    chatDryRun: config.notifyDryRun,
    logger: monitorLogger.child('DeliveryEngine'),
  });

  return new AccountMonitor({
    managementStrategy: config.managementStrategy,
    notify: config.notify,
    quotaThresholds: config.quotaThresholds,
    reputationThresholds: config.reputationThresholds,
    monitorReputation: config.monitorReputation,
    monitorSendingQuota: config.monitorSendingQuota,
    reputationPeriodSeconds: config.reputationPeriodSeconds,
    reputationMetricTimedeltaSeconds: config.reputationMetricTimedeltaSeconds,
    sendingStats: sesAccount,
    reputationMetrics: reputation,
    accountControl: sesAccount,
    pagingBuilder: new PagingPayloadBuilder({
      identity: config.identity,
      routingKey: config.pagerDuty.routingKey,
    }),
    chatBuilder: new ChatPayloadBuilder({
      identity: config.identity,
      footerIconUrl: config.slack.footerIconUrl,
      iconEmoji: config.slack.iconEmoji,
    }),
    deliveryEngine,
    logger: monitorLogger.child('AccountMonitor'),
  });
}

export async function runAccountMonitor(event: unknown): Promise<AccountMonitorResult> {
  const parsedEvent = AccountMonitorEventSchema.safeParse(event);
  if (!parsedEvent.success) {
    logger.error('Invalid invocation event', { issues: parsedEvent.error.issues });
    throw new Error(`[AccountMonitorHandler] Invalid event: ${parsedEvent.error.message}`);
  }

  const config = loadMonitorConfig();
  logger.setContext({
    accountName: config.identity.accountName,
    region: config.identity.region,
    environment: config.identity.environment,
  });

  const dryRun = parsedEvent.data.dry_run ?? config.notifyDryRun;
  logger.info('SES account monitor invoked', {
    service_name: config.identity.serviceName,
    strategy: config.managementStrategy,
    dry_run: dryRun,
  });

  try {
    const monitor = buildAccountMonitor(config);
    const cycle = await monitor.runCycle({ dryRun, raiseOnErrors: true });

    const result: AccountMonitorResult = {
      success: true,
      service_name: config.identity.serviceName,
      dry_run: dryRun,
      sending_quota: summarizeCheck(cycle.sending_quota),
      reputation: summarizeCheck(cycle.reputation),
      notifications: {
        pager_duty: summarizeDelivery(cycle.responses.pager_duty),
        slack: summarizeDelivery(cycle.responses.slack),
      },
    };

    logger.info('SES account monitor completed', { ...result });
    return result;
  } catch (error) {
    logger.error('SES account monitor failed', {
      error: error instanceof Error ? error.message : String(error),
      ...(error instanceof MonitorError ? { error_class: error.error_class, error_code: error.error_code } : {}),
    });
    throw error;
  }
}

export const handler: Handler<unknown, AccountMonitorResult> = async (event) => runAccountMonitor(event);
