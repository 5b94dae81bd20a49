/**
 * Notification types - outbound payload shapes and delivery outcomes
 */

import type { MetricPoint, ReputationAction, ThresholdStatus } from './MonitorTypes';

export type NotificationBackend = 'pager_duty' | 'slack';

export type PagingEventClass = 'ses_account_sending_quota' | 'ses_account_reputation';

export const SES_ACCOUNT_SENDING_QUOTA_CLASS_TYPE: PagingEventClass = 'ses_account_sending_quota';
export const SES_ACCOUNT_REPUTATION_CLASS_TYPE: PagingEventClass = 'ses_account_reputation';

export type CustomDetailValue = string | number;

export interface PagingTriggerPayload {
  summary: string;
  timestamp: string;
  source: string;
  severity: 'critical' | 'error' | 'warning' | 'info';
  component: string;
  group: string;
  class: PagingEventClass;
  custom_details: Record<string, CustomDetailValue>;
}

export interface PagingTriggerEvent {
  routing_key: string;
  dedup_key: string;
  event_action: 'trigger';
  payload: PagingTriggerPayload;
  client: string;
  client_url: string;
}

export interface PagingResolveEvent {
  routing_key: string;
  dedup_key: string;
  event_action: 'resolve';
}

export type PagingEvent = PagingTriggerEvent | PagingResolveEvent;

export interface ChatField {
  title: string;
  value: string | number;
  short?: boolean;
}

export interface ChatAttachment {
  fallback: string;
  color: ChatColor;
  fields: ChatField[];
  footer: string;
  footer_icon: string;
  ts: number;
}

export type ChatColor = 'danger' | 'warning' | 'ok';

export interface ChatMessage {
  attachments: ChatAttachment[];
  icon_emoji?: string;
  username: string;
}

export interface ChannelChatMessage extends ChatMessage {
  channel: string;
}

/** Raw result of one outbound call, or the echoed payload of a dry run. */
export type DeliveryOutcome<TPayload> =
  | { kind: 'response'; status: number; body: unknown }
  | { kind: 'error'; message: string; code?: string }
  | { kind: 'dry_run'; payload: TPayload };

export interface DeliveryRecord<TPayload> {
  /** `{event_action}::{dedup_key}` for paging, the channel for chat. */
  identifier: string;
  outcome: DeliveryOutcome<TPayload>;
}

export interface DeliveryResult<TPayload> {
  /** False when a dry run was executed. */
  sent: boolean;
  results: DeliveryRecord<TPayload>[];
}

export interface NotificationResponses {
  pager_duty: DeliveryResult<PagingEvent>;
  slack: DeliveryResult<ChannelChatMessage>;
}

export interface PendingNotifications {
  pager_duty: PagingEvent[];
  slack: ChatMessage[];
}

export interface QuotaMessageInput {
  status: ThresholdStatus;
  utilizationPercent: number;
  thresholdPercent: number;
  volume: number;
  maxVolume: number;
  metricIsoTs?: string;
  eventUnixTs?: number;
}

export interface QuotaTriggerInput {
  volume: number;
  maxVolume: number;
  utilizationPercent: number;
  thresholdPercent: number;
  eventIsoTs?: string;
  metricTs?: string | number;
}

export interface ReputationEventInput {
  metrics: MetricPoint[];
  action?: ReputationAction;
  eventIsoTs?: string;
  eventUnixTs?: number;
}

export interface ReputationMessageInput extends ReputationEventInput {
  status: ThresholdStatus;
}

/**
 * Outbound HTTP collaborator - accepts a JSON payload, reports the status code and body.
 */
export interface INotificationTransport {
  postJson(payload: object): Promise<{ status: number; body: unknown }>;
}
