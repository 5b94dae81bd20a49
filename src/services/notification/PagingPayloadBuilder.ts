/**
 * PagingPayloadBuilder - PagerDuty Events API v2 trigger / resolve events
 *
 * Trigger and resolve events for the same event class share one dedup key
 * (`{service_name}/{event_class}`) so the incident opened by a trigger is closed by
 * the matching resolve.
 */

import type { AccountIdentity, ThresholdStatus } from '../../types/MonitorTypes';
import { ACTION_ALERT, ACTION_DISABLE, ACTION_ENABLE } from '../../types/MonitorTypes';
import type {
  CustomDetailValue,
  PagingEvent,
  PagingEventClass,
  PagingResolveEvent,
  PagingTriggerEvent,
  PagingTriggerPayload,
  QuotaTriggerInput,
  ReputationEventInput,
} from '../../types/NotificationTypes';
import {
  SES_ACCOUNT_REPUTATION_CLASS_TYPE,
  SES_ACCOUNT_SENDING_QUOTA_CLASS_TYPE,
} from '../../types/NotificationTypes';
import { MissingRequiredFieldError, PayloadTooLargeError } from '../../types/MonitorErrors';
import { formatPercent, iso8601Timestamp, toFieldName, unixTimestamp } from '../../utils/format-helpers';

export const MAX_PAYLOAD_SIZE = 512 * 1024;
export const CUSTOM_DETAILS_VERSION = 'v1.2018.06.18';

const ACTION_MESSAGES: Record<string, string> = {
  [ACTION_ALERT]: 'SES account is in danger of being suspended.',
  [ACTION_DISABLE]: 'SES account sending is disabled.',
  [ACTION_ENABLE]: 'SES account sending is enabled.',
};

export interface PagingPayloadBuilderConfig {
  identity: AccountIdentity;
  routingKey: string;
}

export class PagingPayloadBuilder {
  private identity: AccountIdentity;
  private routingKey: string;

  constructor(config: PagingPayloadBuilderConfig) {
    this.identity = config.identity;
    this.routingKey = config.routingKey;
  }

  /**
   * `{service_name}/{event_class}`
   */
  getDedupKey(eventClass: PagingEventClass): string {
    return `${this.identity.serviceName}/${eventClass}`;
  }

  buildQuotaTrigger(input: QuotaTriggerInput): PagingTriggerEvent {
    requireNumber(input.volume, 'volume', 'quota trigger');
    requireNumber(input.maxVolume, 'maxVolume', 'quota trigger');
    requireNumber(input.utilizationPercent, 'utilizationPercent', 'quota trigger');
    requireNumber(input.thresholdPercent, 'thresholdPercent', 'quota trigger');

    return this.buildTrigger(
      'SES account sending quota is at capacity.',
      SES_ACCOUNT_SENDING_QUOTA_CLASS_TYPE,
      {
        aws_account_name: this.identity.accountName,
        aws_region: this.identity.region,
        aws_environment: this.identity.environment,
        volume: input.volume,
        max_volume: input.maxVolume,
        utilization: formatPercent(input.utilizationPercent),
        threshold: formatPercent(input.thresholdPercent),
        ts: String(input.metricTs ?? unixTimestamp()),
        version: CUSTOM_DETAILS_VERSION,
      },
      input.eventIsoTs
    );
  }

  buildQuotaResolve(): PagingResolveEvent {
    return this.buildResolve(SES_ACCOUNT_SENDING_QUOTA_CLASS_TYPE);
  }

  /**
   * Trigger for a reputation breach. Metrics are the danger metrics (critical and warning);
   * an empty list means nothing breached, so it is rejected.
   */
  buildReputationTrigger(input: ReputationEventInput): PagingTriggerEvent {
    if (!input.metrics || input.metrics.length === 0) {
      throw new MissingRequiredFieldError('metrics', 'reputation trigger');
    }

    const action = input.action ?? ACTION_ALERT;
    const details: Record<string, CustomDetailValue> = {
      aws_account_name: this.identity.accountName,
      aws_region: this.identity.region,
      aws_environment: this.identity.environment,
      ts: String(input.eventUnixTs ?? unixTimestamp()),
      version: CUSTOM_DETAILS_VERSION,
      action,
      action_message: ACTION_MESSAGES[action],
    };

    for (const metric of input.metrics) {
      const name = toFieldName(metric.label);
      details[name] = formatPercent(metric.value, 2);
      details[`${name}_threshold`] = formatPercent(metric.threshold, 2);
      details[`${name}_timestamp`] = metric.timestamp;
    }

    return this.buildTrigger(
      'SES account reputation is at dangerous levels.',
      SES_ACCOUNT_REPUTATION_CLASS_TYPE,
      details,
      input.eventIsoTs
    );
  }

  buildReputationResolve(): PagingResolveEvent {
    return this.buildResolve(SES_ACCOUNT_REPUTATION_CLASS_TYPE);
  }

  /**
   * CRITICAL opens the quota incident; WARNING and OK resolve it.
   */
  buildQuotaEventForStatus(status: ThresholdStatus, input: QuotaTriggerInput): PagingEvent {
    return status === 'CRITICAL' ? this.buildQuotaTrigger(input) : this.buildQuotaResolve();
  }

  buildReputationEventForStatus(status: ThresholdStatus, input: ReputationEventInput): PagingEvent {
    return status === 'CRITICAL' ? this.buildReputationTrigger(input) : this.buildReputationResolve();
  }

  private buildTrigger(
    summary: string,
    eventClass: PagingEventClass,
    customDetails: Record<string, CustomDetailValue>,
    timestamp?: string
  ): PagingTriggerEvent {
    const payload: PagingTriggerPayload = {
      summary,
      timestamp: timestamp ?? iso8601Timestamp(),
      source: this.identity.serviceName,
      severity: 'critical',
      component: 'ses',
      group: `aws-${this.identity.accountName}`,
      class: eventClass,
      custom_details: customDetails,
    };

    const event: PagingTriggerEvent = {
      routing_key: this.requireRoutingKey(),
      dedup_key: this.getDedupKey(eventClass),
      event_action: 'trigger',
      payload,
      client: 'AWS Console',
      client_url: this.identity.sesConsoleUrl,
    };

    const size = Buffer.byteLength(JSON.stringify(event), 'utf8');
    if (size > MAX_PAYLOAD_SIZE) {
      throw new PayloadTooLargeError(size, MAX_PAYLOAD_SIZE);
    }

    return event;
  }

  private buildResolve(eventClass: PagingEventClass): PagingResolveEvent {
    return {
      routing_key: this.requireRoutingKey(),
      dedup_key: this.getDedupKey(eventClass),
      event_action: 'resolve',
    };
  }

  private requireRoutingKey(): string {
    if (!this.routingKey) {
      throw new MissingRequiredFieldError('routing_key', 'PagerDuty event');
    }
    return this.routingKey;
  }
}

function requireNumber(value: number | undefined, field: string, context: string): void {
  if (value === undefined || Number.isNaN(value)) {
    throw new MissingRequiredFieldError(field, context);
  }
}
