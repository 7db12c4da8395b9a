import type {
  AdapterCapabilityName,
  HostServices,
  OneShotFor,
  ImplementationTable,
  PermissionProvider,
  PermissionState,
} from '@hostbridge/types';
import {
  createBatteryGet,
  createClipboardRead,
  createClipboardWrite,
  createFixedOrientationGet,
  createGetCurrentPosition,
  createNetworkGet,
  createNotificationShow,
  createShare,
  createWatchPosition,
  unavailable,
} from './common';

/**
 * Desktops have no vibration motor. The call succeeds without side effects and reports
 * `false`, the same answer a browser gives when it did not vibrate.
 */
export function createNoopVibrate(): OneShotFor<'vibrate'> {
  return {
    isAvailable: true,
    mode: 'oneShot',
    async invoke() {
      return false;
    },
  };
}

/**
 * Windows and Linux show notifications without asking; only location goes through the host.
 */
export function createImplicitNotificationPermissions(host: HostServices): PermissionProvider {
  return {
    status: (kind) => (kind === 'notifications' ? Promise.resolve<PermissionState>('granted') : host.permissions.status(kind)),
    request: (kind) => (kind === 'notifications' ? Promise.resolve<PermissionState>('granted') : host.permissions.request(kind)),
  };
}

export function createDesktopCapabilities(
  host: HostServices,
  options: { share: boolean; geolocation: boolean },
): ImplementationTable<AdapterCapabilityName> {
  return {
    'clipboard.write': createClipboardWrite(host),
    'clipboard.read': createClipboardRead(host),
    'share': options.share ? createShare(host) : unavailable,
    'notification.show': createNotificationShow(host),
    'geolocation.getCurrentPosition': options.geolocation ? createGetCurrentPosition(host) : unavailable,
    'geolocation.watchPosition': options.geolocation ? createWatchPosition(host) : unavailable,
    'vibrate': createNoopVibrate(),
    'battery.get': createBatteryGet(host),
    'network.get': createNetworkGet(host),
    'screenOrientation.lock': unavailable,
    'screenOrientation.unlock': unavailable,
    'screenOrientation.get': createFixedOrientationGet(),
  };
}
