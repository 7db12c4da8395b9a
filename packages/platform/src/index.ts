import type { HostServices, OperatingSystem, PlatformAdapter } from '@hostbridge/types';
import { logger } from '@hostbridge/utils';
import { createAndroidAdapter } from './android';
import { createIosAdapter } from './ios';
import { createLinuxAdapter } from './linux';
import { createMacAdapter } from './mac';
import { createWindowsAdapter } from './windows';

export { unavailable, formatShareText, orientationsFor, BATTERY_FALLBACK, NETWORK_FALLBACK, DESKTOP_ORIENTATION } from './common';
export { createAndroidAdapter, createIosAdapter, createLinuxAdapter, createMacAdapter, createWindowsAdapter };

/**
 * Maps a Node.js `process.platform` value onto the OS family whose adapter applies.
 * Embedded runtimes on phones report `ios` / `android` directly.
 */
export function detectOs(platform: string = process.platform): OperatingSystem | null {
  switch (platform) {
    case 'darwin':
      return 'macos';
    case 'win32':
      return 'windows';
    case 'linux':
      return 'linux';
    case 'ios':
      return 'ios';
    case 'android':
      return 'android';
    default:
      return null;
  }
}

const ADAPTER_FACTORIES: Record<OperatingSystem, (host: HostServices) => PlatformAdapter> = {
  ios: createIosAdapter,
  android: createAndroidAdapter,
  macos: createMacAdapter,
  windows: createWindowsAdapter,
  linux: createLinuxAdapter,
};

/**
 * Builds the adapter for the given OS, or for the running one when none is given.
 * Throws when the running platform has no adapter: a bridge without one cannot be built.
 */
export function createPlatformAdapter(host: HostServices, os?: OperatingSystem): PlatformAdapter {
  const target = os ?? detectOs();
  if (target === null) {
    throw new Error(`No platform adapter for "${process.platform}"`);
  }
  logger.debug('[Platform] Creating adapter', { os: target });
  return ADAPTER_FACTORIES[target](host);
}
