import { randomUUID } from 'node:crypto';
import mitt from 'mitt';
import type { Emitter } from 'mitt';
import type {
  BridgeConfig,
  BridgeEvents,
  CallResult,
  ContentMessage,
  ContentSurface,
  HostMessage,
  ImplementationTable,
  BridgeCapabilityName,
  PlatformAdapter,
} from '@hostbridge/types';
import { BridgeError, isContentMessage, logger, resolveBridgeConfig, toFailure } from '@hostbridge/utils';
import { CAPABILITY_CONTRACTS } from './contracts';
import { buildRegistry } from './registry';
import type { CapabilityRegistry } from './registry';
import { CallDispatcher } from './callDispatcher';
import { PermissionGate } from './permissionGate';
import { permissionStore } from './permissionStore';
import type { PermissionStore } from './permissionStore';
import { SubscriptionManager } from './subscriptionManager';
import { renderFacadeScript } from './facade';

export interface CreateBridgeOptions {
  surface: ContentSurface;
  platform: PlatformAdapter;
  /** Defaults to the process-wide store. */
  permissions?: PermissionStore;
  config?: Partial<BridgeConfig>;
  env?: Record<string, string | undefined>;
}

/**
 * Binds the capability surface to one content surface. Owns its registry, subscriptions
 * and pending calls; permission state is shared through the store.
 */
export class BridgeInstance {
  readonly events: Emitter<BridgeEvents> = mitt<BridgeEvents>();
  readonly config: BridgeConfig;
  readonly registry: CapabilityRegistry;
  readonly gate: PermissionGate;

  private readonly surface: ContentSurface;
  private readonly subscriptions: SubscriptionManager;
  private readonly dispatcher: CallDispatcher;
  private currentLoadId: string | null = null;
  private disposed = false;

  constructor(options: CreateBridgeOptions) {
    const { surface, platform } = options;
    this.surface = surface;
    this.config = resolveBridgeConfig(options.config, options.env);
    this.gate = new PermissionGate(options.permissions ?? permissionStore, platform.permissions);

    this.subscriptions = new SubscriptionManager({
      idPrefix: 'watch',
      onStarted: (subscriptionId, capability) =>
        this.events.emit('subscription:started', { subscriptionId, capability }),
      onEnded: (subscriptionId, reason) => this.events.emit('subscription:ended', { subscriptionId, reason }),
    });

    this.registry = buildRegistry(
      platform.os,
      CAPABILITY_CONTRACTS,
      platform.capabilities,
      this.bridgeCapabilities(),
    );

    this.dispatcher = new CallDispatcher({
      registry: this.registry,
      gate: this.gate,
      subscriptions: this.subscriptions,
      callTimeoutMs: this.config.callTimeoutMs,
      deliver: (result) => this.post({ type: 'result', ...result }),
      deliverEvent: (subscriptionId, payload) => this.post({ type: 'event', subscriptionId, payload }),
      deliverSubscriptionError: (subscriptionId, error) =>
        this.post({ type: 'subscriptionError', subscriptionId, error }),
      onSettled: (result, capability, durationMs) =>
        this.events.emit('call:settled', { ...result, capability, durationMs }),
    });

    logger.info('[Bridge] Created', { os: platform.os, capabilities: this.registry.size });
  }

  get loadId(): string | null {
    return this.currentLoadId;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  get activeSubscriptions(): number {
    return this.subscriptions.activeCount;
  }

  get pendingCalls(): number {
    return this.dispatcher.pendingCount;
  }

  /**
   * Call on every content load. Ends whatever the previous page left running and injects
   * a fresh facade bound to a new load id.
   */
  async load(): Promise<string> {
    if (this.disposed) {
      throw new BridgeError('BridgeDisposed', 'Bridge has been disposed');
    }
    if (this.currentLoadId !== null) {
      logger.debug('[Bridge] Content navigated; ending previous load', { loadId: this.currentLoadId });
      this.subscriptions.cancelAll();
      this.dispatcher.abandonPending('Content navigated away');
    }

    const loadId = randomUUID();
    this.currentLoadId = loadId;
    await this.surface.injectScript(
      renderFacadeScript({
        loadId,
        namespace: this.config.namespace,
        channel: this.config.channel,
        forwardConsole: this.config.forwardConsole,
        notificationPermission: this.gate.check('notifications'),
      }),
    );
    logger.info('[Bridge] Facade injected', { loadId });
    this.events.emit('load', { loadId });
    return loadId;
  }

  /**
   * Entry point for everything content posts. Accepts the serialized form or a parsed
   * object. Resolves with the call's result, or null when the message was dropped.
   */
  async receive(raw: unknown): Promise<CallResult | null> {
    const message = this.parse(raw);
    if (!message) {
      return null;
    }
    if (message.loadId !== this.currentLoadId) {
      logger.debug('[Bridge] Dropping message from a previous load', { loadId: message.loadId });
      return null;
    }

    if (message.type === 'console') {
      this.logConsole(message);
      return null;
    }
    return this.dispatcher.dispatch({
      correlationId: message.correlationId,
      capability: message.capability,
      arguments: message.args,
    });
  }

  /** Idempotent. Nothing is delivered to content for this instance afterwards except failures. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.subscriptions.disposeAll();
    this.dispatcher.dispose();
    logger.info('[Bridge] Disposed', { loadId: this.currentLoadId });
    this.events.emit('disposed');
    this.events.all.clear();
  }

  private bridgeCapabilities(): ImplementationTable<BridgeCapabilityName> {
    return {
      'notification.requestPermission': {
        isAvailable: true,
        mode: 'oneShot',
        invoke: () => this.gate.request('notifications'),
      },
      'geolocation.clearWatch': {
        isAvailable: true,
        mode: 'oneShot',
        invoke: ({ watchId }) => Promise.resolve(this.subscriptions.cancel(watchId)),
      },
    };
  }

  private parse(raw: unknown): ContentMessage | null {
    let value = raw;
    if (typeof raw === 'string') {
      try {
        value = JSON.parse(raw);
      } catch (error) {
        logger.warn('[Bridge] Dropping unparseable message from content', { error: toFailure(error).message });
        return null;
      }
    }
    if (!isContentMessage(value)) {
      logger.warn('[Bridge] Dropping malformed message from content');
      return null;
    }
    return value;
  }

  private logConsole(message: Extract<ContentMessage, { type: 'console' }>): void {
    const line = `Console: ${message.args.join(' ')}`;
    switch (message.level) {
      case 'error':
        logger.error(line);
        break;
      case 'warn':
        logger.warn(line);
        break;
      default:
        logger.info(line);
    }
  }

  private post(message: HostMessage): void {
    try {
      this.surface.postMessage(message);
    } catch (error) {
      logger.error('[Bridge] Posting to content failed', { type: message.type, error: toFailure(error).message });
    }
  }
}

export function createBridge(options: CreateBridgeOptions): BridgeInstance {
  const bridge = new BridgeInstance(options);
  logger.configure({ minLevel: bridge.config.logLevel });
  return bridge;
}
