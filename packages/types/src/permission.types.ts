export type PermissionKind = 'location' | 'notifications';

export const PERMISSION_KINDS: readonly PermissionKind[] = ['location', 'notifications'];

export type PermissionState = 'notDetermined' | 'granted' | 'denied' | 'restricted';

/**
 * What moved a permission from one state to another.
 * - `observed`: the OS reported a state when polled (revocation, settings change)
 * - `prompted`: an OS permission dialog was answered
 * - `reset`: the host cleared cached state (tests, OS-level reset)
 */
export type PermissionEvent =
  | { type: 'observed'; state: PermissionState }
  | { type: 'prompted'; state: PermissionState }
  | { type: 'reset' };

export interface PermissionChange {
  kind: PermissionKind;
  from: PermissionState;
  to: PermissionState;
  cause: PermissionEvent['type'];
}
