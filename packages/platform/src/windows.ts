import type { HostServices, PlatformAdapter } from '@hostbridge/types';
import { createDesktopCapabilities, createImplicitNotificationPermissions } from './desktop';

export const createWindowsAdapter = (host: HostServices): PlatformAdapter => ({
  os: 'windows',
  permissions: createImplicitNotificationPermissions(host),
  capabilities: createDesktopCapabilities(host, { share: true, geolocation: true }),
});
