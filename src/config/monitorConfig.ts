/**
 * Monitor configuration from environment variables, validated with Zod.
 * No side effects at import time; call loadMonitorConfig() from the handler.
 */

import { z } from 'zod';
import type {
  AccountIdentity,
  NotificationConfig,
  QuotaThresholds,
  ReputationThresholds,
} from '../types/MonitorTypes';
import { SES_MONITOR_STRATEGY_ALERT } from '../types/MonitorTypes';
import { ConfigurationError } from '../types/MonitorErrors';

export const DEFAULT_PAGER_DUTY_EVENTS_URL = 'https://events.pagerduty.com/v2/enqueue';
export const DEFAULT_SLACK_FOOTER_ICON_URL = 'https://platform.slack-edge.com/img/default_application_icon.png';

/** Coerce env strings like "True", "1", "off" to booleans; empty falls back to the default. */
const envBoolean = (defaultValue: boolean) =>
  z.preprocess((val) => {
    if (val === '' || val == null) return defaultValue;
    if (typeof val === 'boolean') return val;
    const normalized = String(val).trim().toLowerCase();
    if (['true', '1', 'yes', 'y', 'on', 't'].includes(normalized)) return true;
    if (['false', '0', 'no', 'n', 'off', 'f'].includes(normalized)) return false;
    return val;
  }, z.boolean());

const envNumber = (defaultValue: number) =>
  z.preprocess(
    (val) => (val === '' || val == null ? defaultValue : Number(val)),
    z.number().finite()
  );

const envString = (defaultValue: string) =>
  z.preprocess((val) => (val === '' || val == null ? defaultValue : val), z.string());

const optionalEnvString = z.preprocess((val) => (val === '' || val == null ? undefined : val), z.string().optional());

export const MonitorEnvSchema = z.object({
  LAMBDA_AWS_ACCOUNT_NAME: envString('undefined'),
  LAMBDA_AWS_REGION: optionalEnvString,
  AWS_DEFAULT_REGION: optionalEnvString,
  AWS_REGION: optionalEnvString,
  LAMBDA_ENVIRONMENT: envString('undefined'),
  LAMBDA_NAME: envString('ses-account-monitor'),
  LAMBDA_SERVICE_NAME: optionalEnvString,

  MONITOR_SES_REPUTATION: envBoolean(true),
  MONITOR_SES_SENDING_QUOTA: envBoolean(true),

  NOTIFY_DRY_RUN: envBoolean(false),
  NOTIFY_PAGER_DUTY_ON_SES_REPUTATION: envBoolean(false),
  NOTIFY_PAGER_DUTY_ON_SES_SENDING_QUOTA: envBoolean(false),
  NOTIFY_SLACK_ON_SES_REPUTATION: envBoolean(false),
  NOTIFY_SLACK_ON_SES_SENDING_QUOTA: envBoolean(false),

  PAGER_DUTY_EVENTS_URL: envString(DEFAULT_PAGER_DUTY_EVENTS_URL).pipe(z.string().url()),
  PAGER_DUTY_ROUTING_KEY: envString(''),

  SES_BOUNCE_RATE_CRITICAL_PERCENT: envNumber(8),
  SES_BOUNCE_RATE_WARNING_PERCENT: envNumber(5),
  SES_COMPLAINT_RATE_CRITICAL_PERCENT: envNumber(0.04),
  SES_COMPLAINT_RATE_WARNING_PERCENT: envNumber(0.01),
  SES_SENDING_QUOTA_WARNING_PERCENT: envNumber(80),
  SES_SENDING_QUOTA_CRITICAL_PERCENT: envNumber(90),

  SES_CONSOLE_URL: optionalEnvString,
  SES_REPUTATION_DASHBOARD_URL: optionalEnvString,
  SES_REPUTATION_PERIOD: envNumber(900).pipe(z.number().int().positive()),
  SES_REPUTATION_METRIC_TIMEDELTA: envNumber(1800).pipe(z.number().int().positive()),

  // Kept raw: an unknown strategy disables the checks instead of failing config load.
  SES_MONITOR_STRATEGY: envString(SES_MONITOR_STRATEGY_ALERT),

  SLACK_CHANNELS: envString(''),
  SLACK_FOOTER_ICON_URL: envString(DEFAULT_SLACK_FOOTER_ICON_URL),
  SLACK_ICON_EMOJI: optionalEnvString,
  SLACK_WEBHOOK_URL: envString(''),
}).superRefine((env, ctx) => {
  const pagerDutyEnabled = env.NOTIFY_PAGER_DUTY_ON_SES_REPUTATION || env.NOTIFY_PAGER_DUTY_ON_SES_SENDING_QUOTA;
  const slackEnabled = env.NOTIFY_SLACK_ON_SES_REPUTATION || env.NOTIFY_SLACK_ON_SES_SENDING_QUOTA;

  if (pagerDutyEnabled && env.PAGER_DUTY_ROUTING_KEY.trim() === '') {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['PAGER_DUTY_ROUTING_KEY'],
      message: 'required when PagerDuty notifications are enabled',
    });
  }
  if (slackEnabled && env.SLACK_WEBHOOK_URL.trim() === '') {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['SLACK_WEBHOOK_URL'],
      message: 'required when Slack notifications are enabled',
    });
  }
  if (slackEnabled && parseChannels(env.SLACK_CHANNELS).length === 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['SLACK_CHANNELS'],
      message: 'at least one channel is required when Slack notifications are enabled',
    });
  }
});

export interface MonitorConfig {
  identity: AccountIdentity;
  monitorReputation: boolean;
  monitorSendingQuota: boolean;
  managementStrategy: string;
  notify: NotificationConfig;
  notifyDryRun: boolean;
  quotaThresholds: QuotaThresholds;
  reputationThresholds: ReputationThresholds;
  reputationPeriodSeconds: number;
  reputationMetricTimedeltaSeconds: number;
  pagerDuty: {
    eventsUrl: string;
    routingKey: string;
  };
  slack: {
    webhookUrl: string;
    channels: string[];
    footerIconUrl: string;
    iconEmoji?: string;
  };
}

export function parseChannels(value: string): string[] {
  return value
    .split(',')
    .map((channel) => channel.trim())
    .filter((channel) => channel.length > 0);
}

function requireOrdered(name: string, warning: number, critical: number): void {
  if (warning > critical) {
    throw new ConfigurationError(
      `${name} warning threshold (${warning}) must not exceed critical threshold (${critical})`,
      'INVALID_THRESHOLDS'
    );
  }
}

export function loadMonitorConfig(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  const parsed = MonitorEnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid monitor configuration: ${details}`);
  }
  const e = parsed.data;

  const region = e.LAMBDA_AWS_REGION ?? e.AWS_DEFAULT_REGION ?? e.AWS_REGION ?? 'us-east-1';
  const serviceName =
    e.LAMBDA_SERVICE_NAME ?? `${e.LAMBDA_AWS_ACCOUNT_NAME}-${region}-${e.LAMBDA_ENVIRONMENT}-${e.LAMBDA_NAME}`;
  const sesBaseUrl = `https://${region}.console.aws.amazon.com/ses/home?region=${region}`;

  requireOrdered('SES sending quota', e.SES_SENDING_QUOTA_WARNING_PERCENT, e.SES_SENDING_QUOTA_CRITICAL_PERCENT);
  requireOrdered('SES bounce rate', e.SES_BOUNCE_RATE_WARNING_PERCENT, e.SES_BOUNCE_RATE_CRITICAL_PERCENT);
  requireOrdered('SES complaint rate', e.SES_COMPLAINT_RATE_WARNING_PERCENT, e.SES_COMPLAINT_RATE_CRITICAL_PERCENT);

  return {
    identity: {
      accountName: e.LAMBDA_AWS_ACCOUNT_NAME,
      region,
      environment: e.LAMBDA_ENVIRONMENT,
      serviceName,
      sesConsoleUrl: e.SES_CONSOLE_URL ?? `${sesBaseUrl}#dashboard:`,
      sesReputationDashboardUrl: e.SES_REPUTATION_DASHBOARD_URL ?? `${sesBaseUrl}#reputation-dashboard:`,
    },
    monitorReputation: e.MONITOR_SES_REPUTATION,
    monitorSendingQuota: e.MONITOR_SES_SENDING_QUOTA,
    managementStrategy: e.SES_MONITOR_STRATEGY,
    notify: {
      notifyPagingOnReputation: e.NOTIFY_PAGER_DUTY_ON_SES_REPUTATION,
      notifyPagingOnQuota: e.NOTIFY_PAGER_DUTY_ON_SES_SENDING_QUOTA,
      notifyChatOnReputation: e.NOTIFY_SLACK_ON_SES_REPUTATION,
      notifyChatOnQuota: e.NOTIFY_SLACK_ON_SES_SENDING_QUOTA,
    },
    notifyDryRun: e.NOTIFY_DRY_RUN,
    quotaThresholds: {
      warningPercent: e.SES_SENDING_QUOTA_WARNING_PERCENT,
      criticalPercent: e.SES_SENDING_QUOTA_CRITICAL_PERCENT,
    },
    reputationThresholds: {
      bounce_rate: {
        warning: e.SES_BOUNCE_RATE_WARNING_PERCENT,
        critical: e.SES_BOUNCE_RATE_CRITICAL_PERCENT,
      },
      complaint_rate: {
        warning: e.SES_COMPLAINT_RATE_WARNING_PERCENT,
        critical: e.SES_COMPLAINT_RATE_CRITICAL_PERCENT,
      },
    },
    reputationPeriodSeconds: e.SES_REPUTATION_PERIOD,
    reputationMetricTimedeltaSeconds: e.SES_REPUTATION_METRIC_TIMEDELTA,
    pagerDuty: {
      eventsUrl: e.PAGER_DUTY_EVENTS_URL,
      routingKey: e.PAGER_DUTY_ROUTING_KEY,
    },
    slack: {
      webhookUrl: e.SLACK_WEBHOOK_URL,
      channels: parseChannels(e.SLACK_CHANNELS),
      footerIconUrl: e.SLACK_FOOTER_ICON_URL,
      iconEmoji: e.SLACK_ICON_EMOJI,
    },
  };
}
