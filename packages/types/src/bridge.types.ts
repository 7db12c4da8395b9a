import type { CapabilityName } from './capability.types';
import type { LogLevel } from './logger.types';

export type BridgeErrorKind =
  | 'UnknownCapability'
  | 'InvalidArguments'
  | 'PermissionDenied'
  | 'CapabilityUnavailable'
  | 'OperationFailed'
  | 'Timeout'
  | 'BridgeDisposed';

export const BRIDGE_ERROR_KINDS: readonly BridgeErrorKind[] = [
  'UnknownCapability',
  'InvalidArguments',
  'PermissionDenied',
  'CapabilityUnavailable',
  'OperationFailed',
  'Timeout',
  'BridgeDisposed',
];

export interface CallFailure {
  kind: BridgeErrorKind;
  message: string;
}

/**
 * One inbound call from content. `capability` is left as a plain string because content is
 * untrusted; the registry decides whether it names a real capability.
 */
export interface CallRequest {
  correlationId: string;
  capability: string;
  arguments: unknown;
}

export type CallOutcome =
  | { status: 'success'; value: unknown }
  | { status: 'failure'; error: CallFailure };

export interface CallResult {
  correlationId: string;
  outcome: CallOutcome;
}

export interface Subscription {
  readonly id: string;
  readonly capability: CapabilityName;
  readonly cancel: () => void;
  readonly active: boolean;
}

// --- Wire messages ---

/** Script → host. */
export type ContentMessage =
  | {
      type: 'call';
      loadId: string;
      correlationId: string;
      capability: string;
      args: unknown;
    }
  | {
      type: 'console';
      loadId: string;
      level: ConsoleLevel;
      args: string[];
    };

export type ConsoleLevel = 'log' | 'info' | 'warn' | 'error' | 'debug';

/** Host → script. */
export type HostMessage =
  | ({ type: 'result' } & CallResult)
  | { type: 'event'; subscriptionId: string; payload: unknown }
  | { type: 'subscriptionError'; subscriptionId: string; error: CallFailure };

// --- Collaborators ---

/**
 * The embedded renderer the bridge is attached to. Installing the facade and delivering
 * host messages are the only two things the bridge needs from it.
 */
export interface ContentSurface {
  injectScript: (source: string) => void | Promise<void>;
  postMessage: (message: HostMessage) => void;
}

export interface BridgeConfig {
  /** Default timeout applied to one-shot calls. */
  callTimeoutMs: number;
  /** Global object name the facade installs its receiver under. */
  namespace: string;
  /** Script expression the facade posts serialized messages through. */
  channel: string;
  logLevel: LogLevel;
  /** Forward content console output to the host logger. */
  forwardConsole: boolean;
}

export type BridgeEvents = {
  'load': { loadId: string };
  'call:settled': CallResult & { capability: string; durationMs: number };
  'subscription:started': { subscriptionId: string; capability: CapabilityName };
  'subscription:ended': { subscriptionId: string; reason: 'cancelled' | 'error' | 'disposed' };
  'disposed': void;
};
