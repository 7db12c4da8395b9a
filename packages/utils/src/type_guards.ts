import {
  BRIDGE_ERROR_KINDS,
  CAPABILITY_NAMES,
  PERMISSION_KINDS,
} from '@hostbridge/types';
import type {
  BatteryStatus,
  BridgeErrorKind,
  CallFailure,
  CapabilityName,
  ConsoleLevel,
  ContentMessage,
  GeolocationPosition,
  NetworkStatus,
  PermissionKind,
  PermissionState,
  ResultShape,
  ScreenOrientationState,
  WatchHandle,
} from '@hostbridge/types';

export function isRecord(obj: unknown): obj is Record<string, unknown> {
  return typeof obj === 'object' && obj !== null && !Array.isArray(obj);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isNullableNumber(value: unknown): value is number | null {
  return value === null || isFiniteNumber(value);
}

export function isCapabilityName(name: unknown): name is CapabilityName {
  return typeof name === 'string' && CAPABILITY_NAMES.some((known) => known === name);
}

export function isBridgeErrorKind(kind: unknown): kind is BridgeErrorKind {
  return typeof kind === 'string' && BRIDGE_ERROR_KINDS.some((known) => known === kind);
}

export function isPermissionKind(kind: unknown): kind is PermissionKind {
  return typeof kind === 'string' && PERMISSION_KINDS.some((known) => known === kind);
}

export function isPermissionState(state: unknown): state is PermissionState {
  return typeof state === 'string' && ['notDetermined', 'granted', 'denied', 'restricted'].includes(state);
}

export function isCallFailure(obj: unknown): obj is CallFailure {
  return isRecord(obj) && isBridgeErrorKind(obj['kind']) && typeof obj['message'] === 'string';
}

export function isConsoleLevel(level: unknown): level is ConsoleLevel {
  return typeof level === 'string' && ['log', 'info', 'warn', 'error', 'debug'].includes(level);
}

/**
 * Validates a raw message posted by content. Content is untrusted: every field is checked.
 */
export function isContentMessage(obj: unknown): obj is ContentMessage {
  if (!isRecord(obj) || typeof obj['loadId'] !== 'string') {
    return false;
  }
  switch (obj['type']) {
    case 'call':
      return (
        typeof obj['correlationId'] === 'string' &&
        obj['correlationId'].length > 0 &&
        typeof obj['capability'] === 'string'
      );
    case 'console':
      return (
        isConsoleLevel(obj['level']) &&
        Array.isArray(obj['args']) &&
        obj['args'].every((arg) => typeof arg === 'string')
      );
    default:
      return false;
  }
}

export function isGeolocationPosition(obj: unknown): obj is GeolocationPosition {
  if (!isRecord(obj) || !isFiniteNumber(obj['timestamp']) || !isRecord(obj['coords'])) {
    return false;
  }
  const coords = obj['coords'];
  return (
    isFiniteNumber(coords['latitude']) &&
    isFiniteNumber(coords['longitude']) &&
    isFiniteNumber(coords['accuracy']) &&
    isNullableNumber(coords['altitude']) &&
    isNullableNumber(coords['altitudeAccuracy']) &&
    isNullableNumber(coords['heading']) &&
    isNullableNumber(coords['speed'])
  );
}

export function isBatteryStatus(obj: unknown): obj is BatteryStatus {
  return (
    isRecord(obj) &&
    isFiniteNumber(obj['level']) &&
    obj['level'] >= 0 &&
    obj['level'] <= 1 &&
    typeof obj['charging'] === 'boolean' &&
    isNullableNumber(obj['chargingTime']) &&
    isNullableNumber(obj['dischargingTime']) &&
    typeof obj['state'] === 'string' &&
    ['charging', 'discharging', 'full', 'unknown'].includes(obj['state'])
  );
}

export function isNetworkStatus(obj: unknown): obj is NetworkStatus {
  return (
    isRecord(obj) &&
    typeof obj['type'] === 'string' &&
    ['wifi', 'cellular', 'ethernet', 'none', 'unknown'].includes(obj['type']) &&
    typeof obj['effectiveType'] === 'string' &&
    ['slow-2g', '2g', '3g', '4g'].includes(obj['effectiveType']) &&
    isFiniteNumber(obj['downlink']) &&
    isFiniteNumber(obj['rtt']) &&
    typeof obj['saveData'] === 'boolean'
  );
}

export function isScreenOrientationState(obj: unknown): obj is ScreenOrientationState {
  return (
    isRecord(obj) &&
    typeof obj['type'] === 'string' &&
    ['portrait-primary', 'portrait-secondary', 'landscape-primary', 'landscape-secondary'].includes(obj['type']) &&
    typeof obj['angle'] === 'number' &&
    [0, 90, 180, 270].includes(obj['angle'])
  );
}

export function isWatchHandle(obj: unknown): obj is WatchHandle {
  return isRecord(obj) && typeof obj['watchId'] === 'string' && obj['watchId'].length > 0;
}

/**
 * Checks a value an adapter produced against the result shape its contract declares.
 */
export function matchesResultShape(shape: ResultShape, value: unknown): boolean {
  switch (shape) {
    case 'boolean':
      return typeof value === 'boolean';
    case 'string':
      return typeof value === 'string';
    case 'permissionState':
      return isPermissionState(value);
    case 'position':
      return isGeolocationPosition(value);
    case 'watchHandle':
      return isWatchHandle(value);
    case 'battery':
      return isBatteryStatus(value);
    case 'network':
      return isNetworkStatus(value);
    case 'orientation':
      return isScreenOrientationState(value);
  }
}
