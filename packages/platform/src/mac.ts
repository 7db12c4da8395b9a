import type { HostServices, PlatformAdapter } from '@hostbridge/types';
import { createDesktopCapabilities } from './desktop';

export const createMacAdapter = (host: HostServices): PlatformAdapter => ({
  os: 'macos',
  // macOS prompts for notifications as well as location
  permissions: host.permissions,
  capabilities: createDesktopCapabilities(host, { share: true, geolocation: true }),
});
