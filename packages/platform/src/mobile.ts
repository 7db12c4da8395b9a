import type { HostServices, OneShotFor, ImplementationTable, AdapterCapabilityName } from '@hostbridge/types';
import { BridgeError, logger } from '@hostbridge/utils';
import {
  createBatteryGet,
  createClipboardRead,
  createClipboardWrite,
  createGetCurrentPosition,
  createNetworkGet,
  createNotificationShow,
  createOrientationGet,
  createOrientationLock,
  createOrientationUnlock,
  createShare,
  createWatchPosition,
} from './common';

function totalDuration(pattern: number | number[]): number {
  return Array.isArray(pattern) ? pattern.reduce((sum, step) => sum + step, 0) : pattern;
}

/**
 * Phones map a vibration request onto a single haptic pulse. A zero-length pattern is the
 * Vibration API's way of cancelling, which needs no pulse.
 */
export function createHapticVibrate(host: HostServices): OneShotFor<'vibrate'> {
  return {
    isAvailable: true,
    mode: 'oneShot',
    async invoke({ pattern }) {
      if (totalDuration(pattern) === 0) {
        return true;
      }
      try {
        await host.haptics.impact('medium');
        return true;
      } catch (error) {
        logger.error('[Platform] Haptic feedback failed', { error });
        const detail = error instanceof Error ? error.message : String(error);
        throw new BridgeError('OperationFailed', `Haptic feedback failed: ${detail}`);
      }
    },
  };
}

/**
 * Capabilities every phone OS provides in full.
 */
export function createMobileCapabilities(host: HostServices): ImplementationTable<AdapterCapabilityName> {
  return {
    'clipboard.write': createClipboardWrite(host),
    'clipboard.read': createClipboardRead(host),
    'share': createShare(host),
    'notification.show': createNotificationShow(host),
    'geolocation.getCurrentPosition': createGetCurrentPosition(host),
    'geolocation.watchPosition': createWatchPosition(host),
    'vibrate': createHapticVibrate(host),
    'battery.get': createBatteryGet(host),
    'network.get': createNetworkGet(host),
    'screenOrientation.lock': createOrientationLock(host),
    'screenOrientation.unlock': createOrientationUnlock(host),
    'screenOrientation.get': createOrientationGet(host),
  };
}
