import type { PermissionKind, PermissionState } from './permission.types';
import type {
  AdapterCapabilityName,
  CapabilityArgs,
  CapabilityEvent,
  CapabilityName,
  CapabilityResult,
} from './capability.types';

// Represents the *absence* of a specific capability group
export interface CapabilityUnavailable {
  readonly isAvailable: false;
}

// OS families the bridge ships an adapter for
export type OperatingSystem = 'ios' | 'android' | 'macos' | 'windows' | 'linux';

export const MOBILE_OPERATING_SYSTEMS: readonly OperatingSystem[] = ['ios', 'android'];
export const ALL_OPERATING_SYSTEMS: readonly OperatingSystem[] = ['ios', 'android', 'macos', 'windows', 'linux'];

// --- Values crossing the boundary ---

export interface ShareData {
  title?: string;
  text?: string;
  url?: string;
}

export interface NotificationOptions {
  title: string;
  body?: string;
  icon?: string;
  tag?: string;
}

export interface PositionOptions {
  enableHighAccuracy?: boolean;
  timeout?: number;
  maximumAge?: number;
}

export interface GeolocationCoordinates {
  latitude: number;
  longitude: number;
  accuracy: number;
  altitude: number | null;
  altitudeAccuracy: number | null;
  heading: number | null;
  speed: number | null;
}

export interface GeolocationPosition {
  coords: GeolocationCoordinates;
  timestamp: number;
}

export type BatteryChargeState = 'charging' | 'discharging' | 'full' | 'unknown';

export interface BatteryStatus {
  level: number; // 0.0 to 1.0
  charging: boolean;
  chargingTime: number | null; // seconds, null when unknown
  dischargingTime: number | null;
  state: BatteryChargeState;
}

export type ConnectionType = 'wifi' | 'cellular' | 'ethernet' | 'none' | 'unknown';
export type EffectiveConnectionType = 'slow-2g' | '2g' | '3g' | '4g';

export interface NetworkStatus {
  type: ConnectionType;
  effectiveType: EffectiveConnectionType;
  downlink: number; // Mbps, estimated
  rtt: number; // ms, estimated
  saveData: boolean;
}

export type OrientationType =
  | 'portrait-primary'
  | 'portrait-secondary'
  | 'landscape-primary'
  | 'landscape-secondary';

export type OrientationLockType =
  | 'any'
  | 'natural'
  | 'portrait'
  | 'landscape'
  | OrientationType;

export interface ScreenOrientationState {
  type: OrientationType;
  angle: 0 | 90 | 180 | 270;
}

export type DeviceOrientation = 'portraitUp' | 'portraitDown' | 'landscapeLeft' | 'landscapeRight';

export type HapticImpact = 'light' | 'medium' | 'heavy';

// --- Host OS layer (injected) ---

/**
 * The raw OS services a host application wires in (native plugins, a desktop shell,
 * or the in-memory host used by tests). Adapters translate bridge semantics onto these.
 */
export interface HostServices {
  clipboard: {
    setText: (text: string) => Promise<void>;
    getText: () => Promise<string | null>;
  };
  share: {
    shareText: (text: string) => Promise<void>;
  };
  notifications: {
    show: (id: number, title: string, body: string) => Promise<void>;
  };
  location: {
    getCurrentPosition: (options: PositionOptions) => Promise<GeolocationPosition>;
    /** Returns a function that stops the position stream. */
    watchPosition: (
      options: PositionOptions,
      onPosition: (position: GeolocationPosition) => void,
      onError: (error: Error) => void,
    ) => () => void;
  };
  haptics: {
    impact: (style: HapticImpact) => Promise<void>;
  };
  battery: {
    getLevel: () => Promise<number>; // 0 to 100
    getState: () => Promise<'charging' | 'discharging' | 'full' | 'unknown'>;
  };
  connectivity: {
    check: () => Promise<'wifi' | 'mobile' | 'ethernet' | 'none' | 'other'>;
  };
  orientation: {
    setPreferred: (orientations: DeviceOrientation[]) => Promise<void>;
    current: () => Promise<ScreenOrientationState>;
  };
  permissions: PermissionProvider;
}

// --- Adapter contract ---

/** One-shot capability call. Rejects with a BridgeError (anything else maps to OperationFailed). */
export interface OneShotCapability<TArgs, TResult> {
  readonly isAvailable: true;
  readonly mode: 'oneShot';
  invoke: (args: TArgs) => Promise<TResult>;
}

/** Watch-style capability. Returns a cancel thunk. */
export interface WatchCapability<TArgs, TEvent> {
  readonly isAvailable: true;
  readonly mode: 'watch';
  subscribe: (
    args: TArgs,
    onEvent: (event: TEvent) => void,
    onError: (error: unknown) => void,
  ) => () => void;
}

export type OneShotFor<K extends CapabilityName> = OneShotCapability<CapabilityArgs<K>, CapabilityResult<K>>;
export type WatchFor<K extends CapabilityName> = WatchCapability<CapabilityArgs<K>, CapabilityEvent<K>>;
export type ImplementationFor<K extends CapabilityName> = OneShotFor<K> | WatchFor<K>;

export type ImplementationTable<K extends CapabilityName = CapabilityName> = {
  [P in K]: ImplementationFor<P> | CapabilityUnavailable;
};

export interface PermissionProvider {
  status: (kind: PermissionKind) => Promise<PermissionState>;
  request: (kind: PermissionKind) => Promise<PermissionState>;
}

/**
 * Everything one OS family provides to the bridge. Every adapter capability must be
 * present, either implemented or explicitly marked unavailable.
 */
export interface PlatformAdapter {
  readonly os: OperatingSystem;
  readonly permissions: PermissionProvider;
  readonly capabilities: ImplementationTable<AdapterCapabilityName>;
}
