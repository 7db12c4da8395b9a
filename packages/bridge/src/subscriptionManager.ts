import type { CallFailure, CapabilityName, Subscription } from '@hostbridge/types';
import { BridgeError, logger, toFailure } from '@hostbridge/utils';

export type SubscriptionEndReason = 'cancelled' | 'error' | 'disposed';

export interface SubscriptionHandlers {
  onEvent: (event: unknown, subscriptionId: string) => void;
  onError: (failure: CallFailure, subscriptionId: string) => void;
}

export interface SubscriptionManagerOptions {
  idPrefix?: string;
  onStarted?: (subscriptionId: string, capability: CapabilityName) => void;
  onEnded?: (subscriptionId: string, reason: SubscriptionEndReason) => void;
}

interface SubscriptionRecord {
  id: string;
  capability: CapabilityName;
  active: boolean;
  stop: (() => void) | null;
}

/**
 * Owns the long-lived event streams of one bridge instance. Ids are never reused and a
 * stream that ended never restarts.
 */
export class SubscriptionManager {
  private readonly records = new Map<string, SubscriptionRecord>();
  private nextId = 1;
  private disposed = false;

  constructor(private readonly options: SubscriptionManagerOptions = {}) {}

  start(
    capability: CapabilityName,
    subscribe: (onEvent: (event: unknown) => void, onError: (error: unknown) => void) => () => void,
    handlers: SubscriptionHandlers,
  ): string {
    if (this.disposed) {
      throw new BridgeError('BridgeDisposed', 'Bridge has been disposed');
    }

    const id = `${this.options.idPrefix ?? 'sub'}-${this.nextId++}`;
    const record: SubscriptionRecord = { id, capability, active: true, stop: null };
    this.records.set(id, record);

    const deliver = (event: unknown) => {
      if (!record.active) return;
      handlers.onEvent(event, id);
    };
    const fail = (error: unknown) => {
      if (!record.active) return;
      const failure = toFailure(error);
      logger.warn('[SubscriptionManager] Subscription failed', { subscriptionId: id, capability, failure });
      this.end(record, 'error');
      handlers.onError(failure, id);
    };

    try {
      record.stop = subscribe(deliver, fail);
    } catch (error) {
      this.records.delete(id);
      record.active = false;
      throw error;
    }

    // Ended while the adapter was still setting up
    if (!record.active) {
      this.stopSafely(record);
      return id;
    }

    logger.debug('[SubscriptionManager] Subscription started', { subscriptionId: id, capability });
    this.options.onStarted?.(id, capability);
    return id;
  }

  /** Stops a subscription. Unknown or already-ended ids are a no-op. Returns whether it was active. */
  cancel(id: string): boolean {
    const record = this.records.get(id);
    if (!record || !record.active) {
      return false;
    }
    this.end(record, 'cancelled');
    return true;
  }

  /** Ends every active subscription without disposing the manager. */
  cancelAll(): void {
    for (const record of [...this.records.values()]) {
      this.end(record, 'cancelled');
    }
  }

  /** Ends every active subscription; nothing can be started afterwards. */
  disposeAll(): void {
    this.disposed = true;
    for (const record of [...this.records.values()]) {
      this.end(record, 'disposed');
    }
  }

  get(id: string): Subscription | undefined {
    const record = this.records.get(id);
    if (!record) return undefined;
    return {
      id: record.id,
      capability: record.capability,
      active: record.active,
      cancel: () => {
        this.cancel(record.id);
      },
    };
  }

  get activeCount(): number {
    return this.records.size;
  }

  private end(record: SubscriptionRecord, reason: SubscriptionEndReason): void {
    if (!record.active) return;
    record.active = false;
    this.records.delete(record.id);
    this.stopSafely(record);
    logger.debug('[SubscriptionManager] Subscription ended', { subscriptionId: record.id, reason });
    this.options.onEnded?.(record.id, reason);
  }

  private stopSafely(record: SubscriptionRecord): void {
    const stop = record.stop;
    record.stop = null;
    if (!stop) return;
    try {
      stop();
    } catch (error) {
      logger.error('[SubscriptionManager] Cancelling subscription threw', {
        subscriptionId: record.id,
        error: toFailure(error).message,
      });
    }
  }
}
