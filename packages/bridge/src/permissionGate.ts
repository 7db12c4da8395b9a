import type { PermissionKind, PermissionProvider, PermissionState } from '@hostbridge/types';
import { logger } from '@hostbridge/utils';
import type { PermissionStore } from './permissionStore';

/**
 * One bridge instance's view of the shared permission store, bound to its platform's
 * permission provider.
 */
export class PermissionGate {
  constructor(
    private readonly store: PermissionStore,
    private readonly provider: PermissionProvider,
  ) {}

  /** Cached state; never touches the OS. */
  check(kind: PermissionKind): PermissionState {
    return this.store.getState().states[kind];
  }

  /**
   * Resolves the state a gated call should act on: polls the OS so external revocations and
   * settings changes are seen, then prompts only if the user was never asked.
   */
  async ensure(kind: PermissionKind): Promise<PermissionState> {
    const observed = await this.store.getState().refresh(kind, this.provider);
    if (observed !== 'notDetermined') {
      return observed;
    }
    return this.store.getState().request(kind, this.provider);
  }

  /** An explicit request from content. May show the OS dialog again after a denial. */
  async request(kind: PermissionKind): Promise<PermissionState> {
    const observed = await this.store.getState().refresh(kind, this.provider);
    if (observed === 'granted' || observed === 'restricted') {
      return observed;
    }
    logger.debug('[PermissionGate] Explicit permission request', { kind, from: observed });
    return this.store.getState().request(kind, this.provider, { explicit: true });
  }
}
