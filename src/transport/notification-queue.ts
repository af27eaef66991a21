/**
 * Notification queue for BLE responses.
 *
 * Notifications are delivered asynchronously via callbacks. This queue
 * buffers them and provides a Promise-based interface for consuming them,
 * with timeout support.
 */

import { TransportError } from '../exceptions';

interface PendingResolver<T> {
  resolve: (value: T) => void;
  reject: (error: Error) => void;
  timeoutId: ReturnType<typeof setTimeout>;
}

/**
 * Queue bridging notification callbacks into awaited values.
 *
 * - Buffers notifications that arrive before being requested
 * - Queues requests that wait for future notifications
 * - Times out each wait individually
 */
export class NotificationQueue<T> {
  private queue: T[] = [];
  private pendingResolvers: PendingResolver<T>[] = [];

  /**
   * Add a notification to the queue.
   *
   * If there are pending consumers waiting, immediately resolve the oldest one.
   * Otherwise, buffer the notification for future consumption.
   */
  enqueue(value: T): void {
    const pending = this.pendingResolvers.shift();
    if (pending) {
      clearTimeout(pending.timeoutId);
      pending.resolve(value);
    } else {
      this.queue.push(value);
    }
  }

  /**
   * Get the next notification from the queue.
   *
   * If a notification is already buffered, return it immediately.
   * Otherwise, wait for the next notification or timeout.
   *
   * @param timeoutMs - Maximum time to wait in milliseconds
   * @param onTimeout - Builds the error the wait rejects with on timeout
   */
  async dequeue(timeoutMs: number, onTimeout: () => Error): Promise<T> {
    if (this.queue.length > 0) {
      const [head, ...rest] = this.queue;
      this.queue = rest;
      return head;
    }

    return new Promise<T>((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        const index = this.pendingResolvers.findIndex((p) => p.resolve === resolve);
        if (index !== -1) {
          this.pendingResolvers.splice(index, 1);
          reject(onTimeout());
        }
      }, timeoutMs);

      this.pendingResolvers.push({ resolve, reject, timeoutId });
    });
  }

  /**
   * Clear the queue and reject all pending requests.
   *
   * Called when the connection is closed or reset.
   *
   * @param reason - Reason for clearing (default: "Connection closed")
   */
  clear(reason: string = 'Connection closed'): void {
    this.queue = [];

    for (const pending of this.pendingResolvers) {
      clearTimeout(pending.timeoutId);
      pending.reject(new TransportError(reason));
    }

    this.pendingResolvers = [];
  }

  /**
   * Drop buffered notifications without touching pending consumers.
   *
   * @returns Number of notifications dropped
   */
  drain(): number {
    const dropped = this.queue.length;
    this.queue = [];
    return dropped;
  }

  /**
   * Get the number of buffered notifications.
   */
  get size(): number {
    return this.queue.length;
  }

  /**
   * Get the number of pending consumers waiting for notifications.
   */
  get pendingCount(): number {
    return this.pendingResolvers.length;
  }
}
