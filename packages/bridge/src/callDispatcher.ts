import type { BridgeErrorKind, CallFailure, CallRequest, CallResult } from '@hostbridge/types';
import { BridgeError, logger, matchesResultShape, toFailure } from '@hostbridge/utils';
import type { CapabilityRegistry, PreparedCall, RegistryEntry } from './registry';
import type { PermissionGate } from './permissionGate';
import type { SubscriptionManager } from './subscriptionManager';

export interface CallDispatcherOptions {
  registry: CapabilityRegistry;
  gate: PermissionGate;
  subscriptions: SubscriptionManager;
  callTimeoutMs: number;
  /** Outbound channel for call results. */
  deliver: (result: CallResult) => void;
  deliverEvent: (subscriptionId: string, payload: unknown) => void;
  deliverSubscriptionError: (subscriptionId: string, error: CallFailure) => void;
  onSettled?: (result: CallResult, capability: string, durationMs: number) => void;
}

interface PendingCall {
  capability: string;
  startedAt: number;
  resolve: (result: CallResult) => void;
  timer: ReturnType<typeof setTimeout> | null;
}

const failure = (correlationId: string, kind: BridgeErrorKind, message: string): CallResult => ({
  correlationId,
  outcome: { status: 'failure', error: { kind, message } },
});

/**
 * Routes calls from content to capabilities and guarantees exactly one result per
 * correlation id. Anything a handler throws stops here.
 */
export class CallDispatcher {
  private readonly pending = new Map<string, PendingCall>();
  private disposed = false;

  constructor(private readonly options: CallDispatcherOptions) {}

  dispatch(request: CallRequest): Promise<CallResult> {
    const { correlationId } = request;

    if (this.pending.has(correlationId)) {
      logger.warn('[CallDispatcher] Duplicate correlation id', { correlationId, capability: request.capability });
      const result = failure(correlationId, 'InvalidArguments', `Correlation id ${correlationId} is already in use`);
      this.send(result);
      return Promise.resolve(result);
    }

    return new Promise<CallResult>((resolve) => {
      this.pending.set(correlationId, {
        capability: request.capability,
        startedAt: Date.now(),
        resolve,
        timer: null,
      });
      this.run(request).catch((error: unknown) => {
        logger.error('[CallDispatcher] Unhandled failure while dispatching', {
          correlationId,
          error: toFailure(error).message,
        });
        this.settle(correlationId, { status: 'failure', error: toFailure(error) });
      });
    });
  }

  /** Settles every outstanding call with BridgeDisposed. */
  abandonPending(message: string): void {
    for (const correlationId of [...this.pending.keys()]) {
      this.settle(correlationId, { status: 'failure', error: { kind: 'BridgeDisposed', message } });
    }
  }

  dispose(): void {
    this.disposed = true;
    this.abandonPending('Bridge has been disposed');
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  private async run(request: CallRequest): Promise<void> {
    const { correlationId, capability } = request;

    if (this.disposed) {
      this.fail(correlationId, 'BridgeDisposed', 'Bridge has been disposed');
      return;
    }

    let entry: RegistryEntry;
    try {
      entry = this.options.registry.resolve(capability);
    } catch (error) {
      this.settle(correlationId, { status: 'failure', error: toFailure(error) });
      return;
    }

    const prepared = entry.prepare(request.arguments);
    if (!prepared.ok) {
      this.fail(correlationId, 'InvalidArguments', `${capability}: ${prepared.message}`);
      return;
    }
    const call = prepared.value;
    if (call.mode === 'unavailable') {
      this.fail(correlationId, 'CapabilityUnavailable', `${capability} is not available on this platform`);
      return;
    }

    try {
      const permission = entry.contract.requiredPermission;
      if (permission) {
        const state = await this.options.gate.ensure(permission);
        if (state !== 'granted') {
          this.fail(correlationId, 'PermissionDenied', `${permission} permission is ${state}`);
          return;
        }
      }
      // Navigation or disposal may have settled the call while the prompt was up
      if (!this.pending.has(correlationId)) return;

      await this.execute(correlationId, entry, call);
    } catch (error) {
      this.settle(correlationId, { status: 'failure', error: toFailure(error) });
    }
  }

  private async execute(
    correlationId: string,
    entry: RegistryEntry,
    call: Exclude<PreparedCall, { mode: 'unavailable' }>,
  ): Promise<void> {
    const { contract } = entry;

    if (call.mode === 'watch') {
      // Content learns the subscription id from the result, so anything the adapter
      // reports while subscribing is held until the result has gone out.
      let handleSent = false;
      const held: (() => void)[] = [];
      const relay = (send: () => void) => {
        if (handleSent) send();
        else held.push(send);
      };
      const subscriptionId = this.options.subscriptions.start(contract.name, call.start, {
        onEvent: (event, id) => relay(() => this.options.deliverEvent(id, event)),
        onError: (error, id) => relay(() => this.options.deliverSubscriptionError(id, error)),
      });
      this.settle(correlationId, { status: 'success', value: { watchId: subscriptionId } });
      handleSent = true;
      for (const send of held.splice(0)) {
        send();
      }
      return;
    }

    const timeoutMs = call.timeoutMs === undefined ? this.options.callTimeoutMs : call.timeoutMs;
    const pending = this.pending.get(correlationId);
    if (pending && timeoutMs !== null) {
      pending.timer = setTimeout(() => {
        this.fail(correlationId, 'Timeout', `${contract.name} timed out after ${timeoutMs}ms`);
      }, timeoutMs);
    }

    const value = await call.run();
    if (!matchesResultShape(contract.resultShape, value)) {
      logger.error('[CallDispatcher] Adapter returned a malformed result', {
        correlationId,
        capability: contract.name,
        expected: contract.resultShape,
      });
      throw new BridgeError('OperationFailed', `${contract.name} returned a malformed result`);
    }
    this.settle(correlationId, { status: 'success', value });
  }

  private fail(correlationId: string, kind: BridgeErrorKind, message: string): void {
    this.settle(correlationId, { status: 'failure', error: { kind, message } });
  }

  private settle(correlationId: string, outcome: CallResult['outcome']): void {
    const pending = this.pending.get(correlationId);
    if (!pending) {
      logger.debug('[CallDispatcher] Discarding late completion', { correlationId, status: outcome.status });
      return;
    }
    this.pending.delete(correlationId);
    if (pending.timer) {
      clearTimeout(pending.timer);
    }

    const result: CallResult = { correlationId, outcome };
    const durationMs = Date.now() - pending.startedAt;
    if (outcome.status === 'failure') {
      logger.info('[CallDispatcher] Call failed', {
        correlationId,
        capability: pending.capability,
        kind: outcome.error.kind,
        message: outcome.error.message,
      });
    } else {
      logger.debug('[CallDispatcher] Call succeeded', { correlationId, capability: pending.capability, durationMs });
    }

    this.send(result);
    pending.resolve(result);
    try {
      this.options.onSettled?.(result, pending.capability, durationMs);
    } catch (error) {
      logger.error('[CallDispatcher] onSettled listener threw', { correlationId, error: toFailure(error).message });
    }
  }

  private send(result: CallResult): void {
    try {
      this.options.deliver(result);
    } catch (error) {
      logger.error('[CallDispatcher] Delivering a result to content failed', {
        correlationId: result.correlationId,
        error: toFailure(error).message,
      });
    }
  }
}
