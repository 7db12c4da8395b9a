import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import { PERMISSION_KINDS } from '@hostbridge/types';
import type {
  PermissionChange,
  PermissionEvent,
  PermissionKind,
  PermissionProvider,
  PermissionState,
} from '@hostbridge/types';
import { logger } from '@hostbridge/utils';

// States from which an OS dialog may be shown
const PROMPTABLE: readonly PermissionState[] = ['notDetermined', 'denied'];

/**
 * Permission state machine. The OS is the source of truth for observed states; a prompt
 * answer only lands when a prompt was possible from the current state.
 */
export function nextPermissionState(current: PermissionState, event: PermissionEvent): PermissionState {
  switch (event.type) {
    case 'reset':
      return 'notDetermined';
    case 'observed':
      return event.state;
    case 'prompted':
      return PROMPTABLE.includes(current) ? event.state : current;
  }
}

export interface RequestOptions {
  /** Content asked explicitly, so a previous denial may be replayed through the OS dialog. */
  explicit?: boolean;
}

export interface PermissionStoreState {
  states: Record<PermissionKind, PermissionState>;
  lastChange: PermissionChange | null;

  apply: (kind: PermissionKind, event: PermissionEvent) => PermissionChange | null;
  refresh: (kind: PermissionKind, provider: PermissionProvider) => Promise<PermissionState>;
  request: (
    kind: PermissionKind,
    provider: PermissionProvider,
    options?: RequestOptions,
  ) => Promise<PermissionState>;
  reset: () => void;
}

export type PermissionStore = StoreApi<PermissionStoreState>;

const initialStates = (): Record<PermissionKind, PermissionState> => ({
  location: 'notDetermined',
  notifications: 'notDetermined',
});

/**
 * Single writer for OS permission state. Bridge instances read it and route every change
 * through `apply`, so two surfaces never race each other into inconsistent states.
 */
export const createPermissionStore = (): PermissionStore => {
  // One OS prompt per kind at a time; everyone asking meanwhile awaits the same answer
  const inFlight = new Map<PermissionKind, Promise<PermissionState>>();

  return createStore<PermissionStoreState>((set, get) => ({
    states: initialStates(),
    lastChange: null,

    apply: (kind, event) => {
      const from = get().states[kind];
      const to = nextPermissionState(from, event);
      if (from === to) {
        return null;
      }
      const change: PermissionChange = { kind, from, to, cause: event.type };
      if (from === 'granted' && event.type === 'observed') {
        logger.warn('[PermissionStore] Permission revoked outside the bridge', { kind, to });
      } else {
        logger.info('[PermissionStore] Permission changed', { kind, from, to, cause: event.type });
      }
      set((state) => ({ states: { ...state.states, [kind]: to }, lastChange: change }));
      return change;
    },

    refresh: async (kind, provider) => {
      const pending = inFlight.get(kind);
      if (pending) {
        return pending;
      }
      const observed = await provider.status(kind);
      get().apply(kind, { type: 'observed', state: observed });
      return get().states[kind];
    },

    request: (kind, provider, options = {}) => {
      const pending = inFlight.get(kind);
      if (pending) {
        logger.debug('[PermissionStore] Joining in-flight permission prompt', { kind });
        return pending;
      }

      const current = get().states[kind];
      if (current === 'granted' || current === 'restricted') {
        return Promise.resolve(current);
      }
      if (current === 'denied' && !options.explicit) {
        return Promise.resolve(current);
      }

      logger.info('[PermissionStore] Prompting for permission', { kind, from: current });
      const prompt = provider
        .request(kind)
        .then((answer) => {
          get().apply(kind, { type: 'prompted', state: answer });
          return get().states[kind];
        })
        .finally(() => {
          inFlight.delete(kind);
        });
      inFlight.set(kind, prompt);
      return prompt;
    },

    reset: () => {
      for (const kind of PERMISSION_KINDS) {
        get().apply(kind, { type: 'reset' });
      }
    },
  }));
};

/** Process-wide permission state shared by every bridge instance. */
export const permissionStore = createPermissionStore();
