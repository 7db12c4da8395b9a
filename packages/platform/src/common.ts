import type {
  BatteryStatus,
  CapabilityUnavailable,
  DeviceOrientation,
  HostServices,
  OneShotFor,
  NetworkStatus,
  OrientationLockType,
  ScreenOrientationState,
  ShareData,
  WatchFor,
} from '@hostbridge/types';
import { BridgeError, logger } from '@hostbridge/utils';

// Building blocks shared by every OS family. Each OS file picks the ones that apply and
// decides what is unavailable.

export const unavailable: CapabilityUnavailable = {
  isAvailable: false,
} as const;

const ALL_ORIENTATIONS: DeviceOrientation[] = ['portraitUp', 'portraitDown', 'landscapeLeft', 'landscapeRight'];

function failed(operation: string, error: unknown): BridgeError {
  const detail = error instanceof Error ? error.message : String(error);
  return new BridgeError('OperationFailed', `${operation} failed: ${detail}`);
}

export function createClipboardWrite(host: HostServices): OneShotFor<'clipboard.write'> {
  return {
    isAvailable: true,
    mode: 'oneShot',
    async invoke({ text }) {
      try {
        await host.clipboard.setText(text);
        return true;
      } catch (error) {
        logger.error('[Platform] Clipboard write failed', { error });
        throw failed('Clipboard write', error);
      }
    },
  };
}

export function createClipboardRead(host: HostServices): OneShotFor<'clipboard.read'> {
  return {
    isAvailable: true,
    mode: 'oneShot',
    async invoke() {
      try {
        return (await host.clipboard.getText()) ?? '';
      } catch (error) {
        logger.error('[Platform] Clipboard read failed', { error });
        throw failed('Clipboard read', error);
      }
    },
  };
}

/** Title, text and url on separate lines, empty parts dropped. */
export function formatShareText(data: ShareData): string {
  return [data.title, data.text, data.url]
    .filter((part): part is string => typeof part === 'string' && part.length > 0)
    .join('\n');
}

export function createShare(host: HostServices): OneShotFor<'share'> {
  return {
    isAvailable: true,
    mode: 'oneShot',
    async invoke(data) {
      try {
        await host.share.shareText(formatShareText(data));
        return true;
      } catch (error) {
        logger.error('[Platform] Share failed', { error });
        throw failed('Share', error);
      }
    },
  };
}

export function createNotificationShow(host: HostServices): OneShotFor<'notification.show'> {
  // Monotonic per adapter; the OS only needs ids to be distinct
  let nextId = 1;
  return {
    isAvailable: true,
    mode: 'oneShot',
    async invoke({ title, body }) {
      const id = nextId++;
      try {
        await host.notifications.show(id, title.length > 0 ? title : 'Notification', body ?? '');
        return true;
      } catch (error) {
        logger.error('[Platform] Notification failed', { error, id });
        throw failed('Notification', error);
      }
    },
  };
}

export function createGetCurrentPosition(host: HostServices): OneShotFor<'geolocation.getCurrentPosition'> {
  return {
    isAvailable: true,
    mode: 'oneShot',
    async invoke(options) {
      try {
        return await host.location.getCurrentPosition(options);
      } catch (error) {
        logger.error('[Platform] Geolocation failed', { error });
        throw failed('Geolocation', error);
      }
    },
  };
}

export function createWatchPosition(host: HostServices): WatchFor<'geolocation.watchPosition'> {
  return {
    isAvailable: true,
    mode: 'watch',
    subscribe(options, onEvent, onError) {
      return host.location.watchPosition(options, onEvent, (error) => {
        logger.warn('[Platform] Position stream reported an error', { error: error.message });
        onError(failed('Geolocation watch', error));
      });
    },
  };
}

export const BATTERY_FALLBACK: BatteryStatus = {
  level: 1,
  charging: false,
  chargingTime: null,
  dischargingTime: null,
  state: 'unknown',
};

export function createBatteryGet(host: HostServices): OneShotFor<'battery.get'> {
  return {
    isAvailable: true,
    mode: 'oneShot',
    async invoke() {
      try {
        const [level, state] = await Promise.all([host.battery.getLevel(), host.battery.getState()]);
        const fraction = Math.min(Math.max(level / 100, 0), 1);
        switch (state) {
          case 'charging':
            return { level: fraction, charging: true, chargingTime: null, dischargingTime: null, state };
          case 'discharging':
            return { level: fraction, charging: false, chargingTime: null, dischargingTime: null, state };
          case 'full':
            return { level: fraction, charging: true, chargingTime: 0, dischargingTime: null, state };
          default:
            return { level: fraction, charging: false, chargingTime: null, dischargingTime: null, state: 'unknown' };
        }
      } catch (error) {
        // Content polls this freely; a plausible reading beats a rejected promise
        logger.error('[Platform] Battery read failed, reporting fallback status', { error });
        return { ...BATTERY_FALLBACK };
      }
    },
  };
}

export const NETWORK_FALLBACK: NetworkStatus = {
  type: 'unknown',
  effectiveType: '4g',
  downlink: 10,
  rtt: 50,
  saveData: false,
};

export function createNetworkGet(host: HostServices): OneShotFor<'network.get'> {
  return {
    isAvailable: true,
    mode: 'oneShot',
    async invoke() {
      try {
        const connectivity = await host.connectivity.check();
        switch (connectivity) {
          case 'wifi':
            return { ...NETWORK_FALLBACK, type: 'wifi', downlink: 50 };
          case 'mobile':
            return { ...NETWORK_FALLBACK, type: 'cellular', downlink: 10 };
          case 'ethernet':
            return { ...NETWORK_FALLBACK, type: 'ethernet', downlink: 100 };
          case 'none':
            return { ...NETWORK_FALLBACK, type: 'none', effectiveType: 'slow-2g', downlink: 0 };
          default:
            return { ...NETWORK_FALLBACK };
        }
      } catch (error) {
        logger.error('[Platform] Connectivity check failed, reporting fallback status', { error });
        return { ...NETWORK_FALLBACK };
      }
    },
  };
}

/**
 * Maps a lock request onto the device orientations the OS should allow.
 */
export function orientationsFor(lock: OrientationLockType): DeviceOrientation[] {
  if (lock === 'any' || lock === 'natural') {
    return [...ALL_ORIENTATIONS];
  }
  if (lock.startsWith('portrait')) {
    return ['portraitUp', 'portraitDown'];
  }
  return ['landscapeLeft', 'landscapeRight'];
}

export function createOrientationLock(host: HostServices): OneShotFor<'screenOrientation.lock'> {
  return {
    isAvailable: true,
    mode: 'oneShot',
    async invoke({ orientation }) {
      try {
        await host.orientation.setPreferred(orientationsFor(orientation));
        return true;
      } catch (error) {
        logger.error('[Platform] Screen orientation lock failed', { error, orientation });
        throw failed('Screen orientation lock', error);
      }
    },
  };
}

export function createOrientationUnlock(host: HostServices): OneShotFor<'screenOrientation.unlock'> {
  return {
    isAvailable: true,
    mode: 'oneShot',
    async invoke() {
      try {
        await host.orientation.setPreferred([...ALL_ORIENTATIONS]);
        return true;
      } catch (error) {
        logger.error('[Platform] Screen orientation unlock failed', { error });
        throw failed('Screen orientation unlock', error);
      }
    },
  };
}

export function createOrientationGet(host: HostServices): OneShotFor<'screenOrientation.get'> {
  return {
    isAvailable: true,
    mode: 'oneShot',
    async invoke() {
      try {
        return await host.orientation.current();
      } catch (error) {
        logger.error('[Platform] Screen orientation read failed', { error });
        throw failed('Screen orientation read', error);
      }
    },
  };
}

/** Desktop windows do not rotate. */
export const DESKTOP_ORIENTATION: ScreenOrientationState = { type: 'landscape-primary', angle: 0 };

export function createFixedOrientationGet(): OneShotFor<'screenOrientation.get'> {
  return {
    isAvailable: true,
    mode: 'oneShot',
    async invoke() {
      return { ...DESKTOP_ORIENTATION };
    },
  };
}
