/**
 * ChatPayloadBuilder - Slack incoming-webhook messages for quota and reputation status.
 *
 * Messages are built without a channel; the delivery engine injects one per configured
 * channel at send time.
 */

import type { AccountIdentity, ThresholdStatus } from '../../types/MonitorTypes';
import { ACTION_ALERT } from '../../types/MonitorTypes';
import type {
  ChannelChatMessage,
  ChatColor,
  ChatField,
  ChatMessage,
  QuotaMessageInput,
  ReputationMessageInput,
} from '../../types/NotificationTypes';
import { MissingRequiredFieldError } from '../../types/MonitorErrors';
import { formatPercent, iso8601Timestamp, unixTimestamp } from '../../utils/format-helpers';

export const CHAT_USERNAME = 'SES Account Monitor';

const STATUS_COLOR: Record<ThresholdStatus, ChatColor> = {
  CRITICAL: 'danger',
  WARNING: 'warning',
  OK: 'ok',
};

export function getColor(status: ThresholdStatus): ChatColor {
  return STATUS_COLOR[status];
}

/**
 * Fallback and primary text for a subject (`SES account reputation`, `SES account sending rate`).
 */
export function buildStatusText(subject: string, status: ThresholdStatus): { fallback: string; primary: string } {
  if (status === 'OK') {
    return {
      fallback: `${subject} has recovered.`,
      primary: `${subject} status is ${status}.`,
    };
  }
  return {
    fallback: `${subject} has breached ${status} threshold.`,
    primary: `${subject} has breached the ${status} threshold.`,
  };
}

export interface ChatPayloadBuilderConfig {
  identity: AccountIdentity;
  footerIconUrl: string;
  iconEmoji?: string;
}

export class ChatPayloadBuilder {
  private identity: AccountIdentity;
  private footerIconUrl: string;
  private iconEmoji?: string;

  constructor(config: ChatPayloadBuilderConfig) {
    this.identity = config.identity;
    this.footerIconUrl = config.footerIconUrl;
    this.iconEmoji = config.iconEmoji;
  }

  /** CRITICAL or WARNING quota message. */
  buildQuotaTrigger(input: QuotaMessageInput): ChatMessage {
    if (input.status === 'OK') {
      throw new MissingRequiredFieldError('status', 'quota trigger requires CRITICAL or WARNING');
    }
    return this.buildQuotaMessage(input);
  }

  buildQuotaResolve(input: Omit<QuotaMessageInput, 'status'>): ChatMessage {
    return this.buildQuotaMessage({ ...input, status: 'OK' });
  }

  /** CRITICAL or WARNING reputation message; requires at least one breaching metric. */
  buildReputationTrigger(input: ReputationMessageInput): ChatMessage {
    if (input.status === 'OK') {
      throw new MissingRequiredFieldError('status', 'reputation trigger requires CRITICAL or WARNING');
    }
    if (!input.metrics || input.metrics.length === 0) {
      throw new MissingRequiredFieldError('metrics', 'reputation trigger');
    }
    return this.buildReputationMessage(input);
  }

  buildReputationResolve(input: Omit<ReputationMessageInput, 'status'>): ChatMessage {
    return this.buildReputationMessage({ ...input, status: 'OK' });
  }

  buildQuotaMessage(input: QuotaMessageInput): ChatMessage {
    const text = buildStatusText('SES account sending rate', input.status);

    const fields: ChatField[] = [
      { title: 'Service', value: `<${this.identity.sesConsoleUrl}|SES Account Sending>`, short: true },
      ...this.buildIdentityFields(input.status),
      { title: 'Time', value: input.metricIsoTs ?? iso8601Timestamp() },
      { title: 'Utilization', value: formatPercent(input.utilizationPercent, 2), short: true },
      { title: 'Threshold', value: formatPercent(input.thresholdPercent, 2), short: true },
      { title: 'Volume', value: input.volume, short: true },
      { title: 'Max Volume', value: input.maxVolume, short: true },
      { title: 'Message', value: text.primary, short: false },
    ];

    return this.buildMessage(text.fallback, input.status, fields, input.eventUnixTs);
  }

  buildReputationMessage(input: ReputationMessageInput): ChatMessage {
    const text = buildStatusText('SES account reputation', input.status);

    const fields: ChatField[] = [
      {
        title: 'Service',
        value: `<${this.identity.sesReputationDashboardUrl}|SES Account Reputation>`,
        short: true,
      },
      ...this.buildIdentityFields(input.status),
      { title: 'Action', value: (input.action ?? ACTION_ALERT).toUpperCase(), short: true },
    ];

    for (const metric of input.metrics) {
      fields.push(
        {
          title: `${metric.label} / Threshold`,
          value: `${formatPercent(metric.value, 2)} / ${formatPercent(metric.threshold, 2)}`,
          short: true,
        },
        { title: `${metric.label} Time`, value: metric.timestamp, short: true }
      );
    }

    fields.push({ title: 'Message', value: text.primary, short: false });

    return this.buildMessage(text.fallback, input.status, fields, input.eventUnixTs);
  }

  private buildIdentityFields(status: ThresholdStatus): ChatField[] {
    return [
      { title: 'Account', value: this.identity.accountName, short: true },
      { title: 'Region', value: this.identity.region, short: true },
      { title: 'Environment', value: this.identity.environment, short: true },
      { title: 'Status', value: status, short: true },
    ];
  }

  private buildMessage(
    fallback: string,
    status: ThresholdStatus,
    fields: ChatField[],
    eventUnixTs?: number
  ): ChatMessage {
    return {
      attachments: [
        {
          fallback,
          color: getColor(status),
          fields,
          footer: this.identity.serviceName,
          footer_icon: this.footerIconUrl,
          ts: eventUnixTs ?? unixTimestamp(),
        },
      ],
      ...(this.iconEmoji ? { icon_emoji: this.iconEmoji } : {}),
      username: CHAT_USERNAME,
    };
  }
}

/**
 * Copy of a message addressed to one channel.
 */
export function withChannel(message: ChatMessage, channel: string): ChannelChatMessage {
  return { channel, ...message };
}
