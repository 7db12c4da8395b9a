import type { HostServices, PlatformAdapter } from '@hostbridge/types';
import { createMobileCapabilities } from './mobile';

export const createIosAdapter = (host: HostServices): PlatformAdapter => ({
  os: 'ios',
  // iOS owns both prompts; a denial sticks until the user flips it in Settings
  permissions: host.permissions,
  capabilities: createMobileCapabilities(host),
});
