import type { HostServices, PlatformAdapter } from '@hostbridge/types';
import { createMobileCapabilities } from './mobile';

export const createAndroidAdapter = (host: HostServices): PlatformAdapter => ({
  os: 'android',
  permissions: host.permissions,
  capabilities: createMobileCapabilities(host),
});
