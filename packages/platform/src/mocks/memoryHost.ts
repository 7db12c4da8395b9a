import type {
  DeviceOrientation,
  GeolocationPosition,
  HapticImpact,
  HostServices,
  PermissionKind,
  PermissionState,
  PositionOptions,
  ScreenOrientationState,
} from '@hostbridge/types';

export interface MemoryHostOptions {
  permissions?: Partial<Record<PermissionKind, PermissionState>>;
  /** How OS prompts resolve. `manual` leaves them pending until `answerPrompt`. */
  promptAnswer?: PermissionState | 'manual';
  position?: GeolocationPosition;
  batteryLevel?: number;
  batteryState?: 'charging' | 'discharging' | 'full' | 'unknown';
  connectivity?: 'wifi' | 'mobile' | 'ethernet' | 'none' | 'other';
  orientation?: ScreenOrientationState;
  /** Reported synchronously from inside `watchPosition`, before it returns. */
  watchStartsWith?: 'cachedPosition' | Error;
}

interface PositionWatcher {
  options: PositionOptions;
  onPosition: (position: GeolocationPosition) => void;
  onError: (error: Error) => void;
}

export interface MemoryHost extends HostServices {
  readonly shared: string[];
  readonly shownNotifications: { id: number; title: string; body: string }[];
  readonly impacts: HapticImpact[];
  readonly preferredOrientations: DeviceOrientation[][];
  readonly promptCount: Record<PermissionKind, number>;
  readonly activeWatchers: () => number;
  readonly setPermission: (kind: PermissionKind, state: PermissionState) => void;
  readonly answerPrompt: (kind: PermissionKind, state: PermissionState) => void;
  readonly setPosition: (position: GeolocationPosition) => void;
  readonly emitPosition: (position: GeolocationPosition) => void;
  readonly emitLocationError: (error: Error) => void;
}

export const SAMPLE_POSITION: GeolocationPosition = {
  coords: {
    latitude: 48.8566,
    longitude: 2.3522,
    accuracy: 5,
    altitude: 35,
    altitudeAccuracy: 3,
    heading: null,
    speed: null,
  },
  timestamp: 1700000000000,
};

/**
 * An in-process stand-in for the OS layer. Everything it does is observable so tests can
 * assert on side effects (prompts shown, notifications emitted, watchers left running).
 */
export function createMemoryHost(options: MemoryHostOptions = {}): MemoryHost {
  let clipboardText: string | null = null;
  let position = options.position ?? SAMPLE_POSITION;
  const permissionStates: Record<PermissionKind, PermissionState> = {
    location: options.permissions?.location ?? 'notDetermined',
    notifications: options.permissions?.notifications ?? 'notDetermined',
  };
  const promptAnswer = options.promptAnswer ?? 'granted';
  const pendingPrompts: Record<PermissionKind, ((state: PermissionState) => void)[]> = {
    location: [],
    notifications: [],
  };
  const watchers = new Set<PositionWatcher>();

  const shared: string[] = [];
  const shownNotifications: { id: number; title: string; body: string }[] = [];
  const impacts: HapticImpact[] = [];
  const preferredOrientations: DeviceOrientation[][] = [];
  const promptCount: Record<PermissionKind, number> = { location: 0, notifications: 0 };

  return {
    clipboard: {
      setText: async (text) => {
        clipboardText = text;
      },
      getText: async () => clipboardText,
    },
    share: {
      shareText: async (text) => {
        shared.push(text);
      },
    },
    notifications: {
      show: async (id, title, body) => {
        shownNotifications.push({ id, title, body });
      },
    },
    location: {
      getCurrentPosition: async () => position,
      watchPosition: (watchOptions, onPosition, onError) => {
        const watcher: PositionWatcher = { options: watchOptions, onPosition, onError };
        const first = options.watchStartsWith;
        if (first instanceof Error) {
          onError(first);
          return () => {};
        }
        watchers.add(watcher);
        if (first === 'cachedPosition') {
          onPosition(position);
        }
        return () => {
          watchers.delete(watcher);
        };
      },
    },
    haptics: {
      impact: async (style) => {
        impacts.push(style);
      },
    },
    battery: {
      getLevel: async () => options.batteryLevel ?? 80,
      getState: async () => options.batteryState ?? 'discharging',
    },
    connectivity: {
      check: async () => options.connectivity ?? 'wifi',
    },
    orientation: {
      setPreferred: async (orientations) => {
        preferredOrientations.push(orientations);
      },
      current: async () => options.orientation ?? { type: 'portrait-primary', angle: 0 },
    },
    permissions: {
      status: async (kind) => permissionStates[kind],
      request: (kind) => {
        promptCount[kind] += 1;
        if (promptAnswer !== 'manual') {
          permissionStates[kind] = promptAnswer;
          return Promise.resolve(promptAnswer);
        }
        return new Promise<PermissionState>((resolve) => {
          pendingPrompts[kind].push(resolve);
        });
      },
    },

    shared,
    shownNotifications,
    impacts,
    preferredOrientations,
    promptCount,
    activeWatchers: () => watchers.size,
    setPermission: (kind, state) => {
      permissionStates[kind] = state;
    },
    answerPrompt: (kind, state) => {
      permissionStates[kind] = state;
      const waiting = pendingPrompts[kind].splice(0);
      for (const resolve of waiting) {
        resolve(state);
      }
    },
    setPosition: (next) => {
      position = next;
    },
    emitPosition: (next) => {
      position = next;
      for (const watcher of [...watchers]) {
        watcher.onPosition(next);
      }
    },
    emitLocationError: (error) => {
      for (const watcher of [...watchers]) {
        watcher.onError(error);
      }
    },
  };
}
