import type { ChatMessage, PagingEvent, PendingNotifications } from '../../types/NotificationTypes';

/**
 * FIFO of pending outbound payloads for one backend. Owned by a single check cycle;
 * not safe for concurrent cycles.
 */
export class NotificationQueue<T> {
  private items: T[] = [];

  enqueue(item: T): void {
    this.items.push(item);
  }

  /** Removes and returns the head, or undefined when empty. */
  dequeue(): T | undefined {
    return this.items.shift();
  }

  /** Removes and returns every item in insertion order. */
  drain(): T[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  /** Copy of the current contents; the queue is left untouched. */
  peek(): T[] {
    return [...this.items];
  }

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }
}

export interface NotificationQueues {
  pager_duty: NotificationQueue<PagingEvent>;
  slack: NotificationQueue<ChatMessage>;
}

export function createNotificationQueues(): NotificationQueues {
  return {
    pager_duty: new NotificationQueue<PagingEvent>(),
    slack: new NotificationQueue<ChatMessage>(),
  };
}

export function snapshotQueues(queues: NotificationQueues): PendingNotifications {
  return {
    pager_duty: queues.pager_duty.peek(),
    slack: queues.slack.peek(),
  };
}
