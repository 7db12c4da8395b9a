import type { HostServices, PermissionProvider, PermissionState, PlatformAdapter } from '@hostbridge/types';
import { createDesktopCapabilities, createImplicitNotificationPermissions } from './desktop';

// No system share sheet and no location service to ask
function createLinuxPermissions(host: HostServices): PermissionProvider {
  const base = createImplicitNotificationPermissions(host);
  return {
    status: (kind) => (kind === 'location' ? Promise.resolve<PermissionState>('restricted') : base.status(kind)),
    request: (kind) => (kind === 'location' ? Promise.resolve<PermissionState>('restricted') : base.request(kind)),
  };
}

export const createLinuxAdapter = (host: HostServices): PlatformAdapter => ({
  os: 'linux',
  permissions: createLinuxPermissions(host),
  capabilities: createDesktopCapabilities(host, { share: false, geolocation: false }),
});
