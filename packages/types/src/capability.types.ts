import type { PermissionKind, PermissionState } from './permission.types';
import type {
  BatteryStatus,
  GeolocationPosition,
  NetworkStatus,
  NotificationOptions,
  OperatingSystem,
  OrientationLockType,
  PositionOptions,
  ScreenOrientationState,
  ShareData,
} from './platform.types';

/** Arguments of capabilities that take none. `null`, `undefined` and `{}` all normalize to this. */
export type EmptyArgs = Record<string, never>;

export interface WatchHandle {
  watchId: string;
}

/**
 * Argument, result and event types of every capability, keyed by its wire name.
 * `event` is `never` for one-shot capabilities.
 */
export interface CapabilitySignatures {
  'clipboard.write': { args: { text: string }; result: boolean; event: never };
  'clipboard.read': { args: EmptyArgs; result: string; event: never };
  'share': { args: ShareData; result: boolean; event: never };
  'notification.requestPermission': { args: EmptyArgs; result: PermissionState; event: never };
  'notification.show': { args: NotificationOptions; result: boolean; event: never };
  'geolocation.getCurrentPosition': { args: PositionOptions; result: GeolocationPosition; event: never };
  'geolocation.watchPosition': { args: PositionOptions; result: WatchHandle; event: GeolocationPosition };
  'geolocation.clearWatch': { args: WatchHandle; result: boolean; event: never };
  'vibrate': { args: { pattern: number | number[] }; result: boolean; event: never };
  'battery.get': { args: EmptyArgs; result: BatteryStatus; event: never };
  'network.get': { args: EmptyArgs; result: NetworkStatus; event: never };
  'screenOrientation.lock': { args: { orientation: OrientationLockType }; result: boolean; event: never };
  'screenOrientation.unlock': { args: EmptyArgs; result: boolean; event: never };
  'screenOrientation.get': { args: EmptyArgs; result: ScreenOrientationState; event: never };
}

export type CapabilityName = keyof CapabilitySignatures;
export type CapabilityArgs<K extends CapabilityName> = CapabilitySignatures[K]['args'];
export type CapabilityResult<K extends CapabilityName> = CapabilitySignatures[K]['result'];
export type CapabilityEvent<K extends CapabilityName> = CapabilitySignatures[K]['event'];

/** Capabilities the bridge serves itself rather than through a platform adapter. */
export type BridgeCapabilityName = 'notification.requestPermission' | 'geolocation.clearWatch';
export type AdapterCapabilityName = Exclude<CapabilityName, BridgeCapabilityName>;

export const CAPABILITY_NAMES: readonly CapabilityName[] = [
  'clipboard.write',
  'clipboard.read',
  'share',
  'notification.requestPermission',
  'notification.show',
  'geolocation.getCurrentPosition',
  'geolocation.watchPosition',
  'geolocation.clearWatch',
  'vibrate',
  'battery.get',
  'network.get',
  'screenOrientation.lock',
  'screenOrientation.unlock',
  'screenOrientation.get',
];

/** Schema tag describing what a capability resolves with. */
export type ResultShape =
  | 'boolean'
  | 'string'
  | 'permissionState'
  | 'position'
  | 'watchHandle'
  | 'battery'
  | 'network'
  | 'orientation';

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; message: string };

export type CallMode = 'oneShot' | 'watch';

/**
 * Static description of one capability. Defined once at startup and never mutated.
 */
export interface CapabilityContract<K extends CapabilityName = CapabilityName> {
  readonly name: K;
  readonly mode: CallMode;
  readonly requiredPermission?: PermissionKind;
  readonly platformSupport: ReadonlySet<OperatingSystem>;
  readonly resultShape: ResultShape;
  readonly parseArgs: (raw: unknown) => ParseResult<CapabilityArgs<K>>;
  /**
   * Per-call timeout override derived from the arguments (e.g. PositionOptions.timeout).
   * `null` runs the call without a timer; `undefined` keeps the bridge default.
   */
  readonly timeoutFor?: (args: CapabilityArgs<K>) => number | null | undefined;
}

export type ContractTable = { readonly [K in CapabilityName]: CapabilityContract<K> };
