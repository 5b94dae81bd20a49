/**
 * DeliveryEngine - drains notification queues against the paging and chat transports.
 *
 * - Dry run: no transport call; each event is echoed back as its own outcome, sent=false.
 * - Live: one call per event (per channel for chat), event removed from the queue right
 *   before its call. No retries here.
 * - Failures are returned as outcomes, never thrown. Deciding what counts as a failure
 *   is the caller's job.
 */

import axios from 'axios';
import type {
  ChannelChatMessage,
  ChatMessage,
  DeliveryOutcome,
  DeliveryRecord,
  DeliveryResult,
  INotificationTransport,
  NotificationBackend,
  NotificationResponses,
  PagingEvent,
} from '../../types/NotificationTypes';
import { Logger } from '../core/Logger';
import { NotificationQueue, NotificationQueues } from './NotificationQueue';
import { withChannel } from './ChatPayloadBuilder';

export interface DeliveryEngineConfig {
  pagingTransport: INotificationTransport;
  chatTransport: INotificationTransport;
  channels: string[];
  /** Transport-level defaults; an explicit dryRun argument wins. */
  pagingDryRun?: boolean;
  chatDryRun?: boolean;
  logger: Logger;
}

/**
 * `{event_action}::{dedup_key}`
 */
export function getPagingEventId(event: PagingEvent): string {
  return `${event.event_action}::${event.dedup_key}`;
}

export class DeliveryEngine {
  private pagingTransport: INotificationTransport;
  private chatTransport: INotificationTransport;
  private channels: string[];
  private pagingDryRun: boolean;
  private chatDryRun: boolean;
  private logger: Logger;

  constructor(config: DeliveryEngineConfig) {
    this.pagingTransport = config.pagingTransport;
    this.chatTransport = config.chatTransport;
    this.channels = [...config.channels];
    this.pagingDryRun = config.pagingDryRun ?? false;
    this.chatDryRun = config.chatDryRun ?? false;
    this.logger = config.logger;
  }

  isDryRun(backend: NotificationBackend, dryRun?: boolean): boolean {
    if (dryRun !== undefined) return dryRun;
    return backend === 'pager_duty' ? this.pagingDryRun : this.chatDryRun;
  }

  async sendPaging(
    queue: NotificationQueue<PagingEvent>,
    dryRun?: boolean
  ): Promise<DeliveryResult<PagingEvent>> {
    const results: DeliveryRecord<PagingEvent>[] = [];

    if (this.isDryRun('pager_duty', dryRun)) {
      const events = queue.drain();
      this.logger.debug('PagerDuty DRY RUN enabled, not sending events', { count: events.length });
      for (const event of events) {
        results.push({ identifier: `debug::${getPagingEventId(event)}`, outcome: { kind: 'dry_run', payload: event } });
      }
      return { sent: false, results };
    }

    this.logger.debug('Sending events to PagerDuty', { count: queue.size });

    let event = queue.dequeue();
    while (event !== undefined) {
      const identifier = getPagingEventId(event);
      this.logger.debug('Sending PagerDuty event', { identifier });
      results.push({ identifier, outcome: await this.deliver(this.pagingTransport, event) });
      event = queue.dequeue();
    }

    return { sent: true, results };
  }

  /**
   * Fans each queued message out to every configured channel, channel order within message order.
   */
  async sendChat(
    queue: NotificationQueue<ChatMessage>,
    dryRun?: boolean
  ): Promise<DeliveryResult<ChannelChatMessage>> {
    const results: DeliveryRecord<ChannelChatMessage>[] = [];

    if (this.channels.length === 0 && !queue.isEmpty()) {
      this.logger.warn('No Slack channels configured, queued messages will not be delivered', {
        count: queue.size,
      });
    }

    if (this.isDryRun('slack', dryRun)) {
      const messages = queue.drain();
      this.logger.debug('Slack DRY RUN enabled, not sending messages', { count: messages.length });
      for (const message of messages) {
        for (const channel of this.channels) {
          results.push({ identifier: channel, outcome: { kind: 'dry_run', payload: withChannel(message, channel) } });
        }
      }
      return { sent: false, results };
    }

    this.logger.debug('Sending messages to Slack channels', {
      count: queue.size,
      channels: this.channels.length,
    });

    let message = queue.dequeue();
    while (message !== undefined) {
      for (const channel of this.channels) {
        this.logger.debug('Sending Slack notification', { channel });
        const outcome = await this.deliver(this.chatTransport, withChannel(message, channel));
        results.push({ identifier: channel, outcome });
      }
      message = queue.dequeue();
    }

    return { sent: true, results };
  }

  /**
   * Drains the named backend's queue.
   */
  send(backend: 'pager_duty', queues: NotificationQueues, dryRun?: boolean): Promise<DeliveryResult<PagingEvent>>;
  send(backend: 'slack', queues: NotificationQueues, dryRun?: boolean): Promise<DeliveryResult<ChannelChatMessage>>;
  send(
    backend: NotificationBackend,
    queues: NotificationQueues,
    dryRun?: boolean
  ): Promise<DeliveryResult<PagingEvent> | DeliveryResult<ChannelChatMessage>> {
    return backend === 'pager_duty'
      ? this.sendPaging(queues.pager_duty, dryRun)
      : this.sendChat(queues.slack, dryRun);
  }

  async sendAll(queues: NotificationQueues, dryRun?: boolean): Promise<NotificationResponses> {
    const pagerDuty = await this.sendPaging(queues.pager_duty, dryRun);
    const slack = await this.sendChat(queues.slack, dryRun);
    return { pager_duty: pagerDuty, slack };
  }

  private async deliver<T extends object>(
    transport: INotificationTransport,
    payload: T
  ): Promise<DeliveryOutcome<T>> {
    try {
      const response = await transport.postJson(payload);
      return { kind: 'response', status: response.status, body: response.body };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const code = axios.isAxiosError(error) ? error.code : undefined;
      this.logger.error('Notification transport failed', { error: message, code });
      return { kind: 'error', message, ...(code ? { code } : {}) };
    }
  }
}
