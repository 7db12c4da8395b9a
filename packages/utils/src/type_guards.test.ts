import { describe, it, expect } from 'vitest';
import {
  isCapabilityName,
  isBridgeErrorKind,
  isCallFailure,
  isContentMessage,
  isGeolocationPosition,
  isBatteryStatus,
  isNetworkStatus,
  isScreenOrientationState,
  matchesResultShape,
} from './type_guards';

const position = {
  coords: {
    latitude: 52.52,
    longitude: 13.405,
    accuracy: 12,
    altitude: null,
    altitudeAccuracy: null,
    heading: null,
    speed: 0,
  },
  timestamp: 1700000000000,
};

describe('isCapabilityName', () => {
  it('should return true for every wire name', () => {
    expect(isCapabilityName('clipboard.write')).toBe(true);
    expect(isCapabilityName('geolocation.clearWatch')).toBe(true);
    expect(isCapabilityName('screenOrientation.get')).toBe(true);
  });

  it('should return false for unknown names and non-strings', () => {
    expect(isCapabilityName('clipboard')).toBe(false);
    expect(isCapabilityName('download')).toBe(false);
    expect(isCapabilityName('')).toBe(false);
    expect(isCapabilityName(undefined)).toBe(false);
    expect(isCapabilityName(42)).toBe(false);
  });
});

describe('isBridgeErrorKind / isCallFailure', () => {
  it('should accept the error taxonomy only', () => {
    expect(isBridgeErrorKind('Timeout')).toBe(true);
    expect(isBridgeErrorKind('PermissionDenied')).toBe(true);
    expect(isBridgeErrorKind('NotFound')).toBe(false);
  });

  it('should require both kind and message', () => {
    expect(isCallFailure({ kind: 'Timeout', message: 'too slow' })).toBe(true);
    expect(isCallFailure({ kind: 'Timeout' })).toBe(false);
    expect(isCallFailure({ kind: 'Oops', message: 'x' })).toBe(false);
    expect(isCallFailure(null)).toBe(false);
  });
});

describe('isContentMessage', () => {
  it('should accept a well-formed call', () => {
    expect(
      isContentMessage({ type: 'call', loadId: 'l1', correlationId: 'l1:1', capability: 'battery.get', args: null }),
    ).toBe(true);
  });

  it('should accept a call whose capability is unknown (the registry rejects it later)', () => {
    expect(
      isContentMessage({ type: 'call', loadId: 'l1', correlationId: 'l1:2', capability: 'teleport', args: {} }),
    ).toBe(true);
  });

  it('should reject calls without a correlation id or load id', () => {
    expect(isContentMessage({ type: 'call', loadId: 'l1', correlationId: '', capability: 'share' })).toBe(false);
    expect(isContentMessage({ type: 'call', loadId: 'l1', capability: 'share' })).toBe(false);
    expect(isContentMessage({ type: 'call', correlationId: 'x', capability: 'share' })).toBe(false);
  });

  it('should accept console messages with string arguments only', () => {
    expect(isContentMessage({ type: 'console', loadId: 'l1', level: 'warn', args: ['a', 'b'] })).toBe(true);
    expect(isContentMessage({ type: 'console', loadId: 'l1', level: 'warn', args: ['a', 1] })).toBe(false);
    expect(isContentMessage({ type: 'console', loadId: 'l1', level: 'trace', args: [] })).toBe(false);
  });

  it('should reject unknown message types and non-objects', () => {
    expect(isContentMessage({ type: 'eval', loadId: 'l1' })).toBe(false);
    expect(isContentMessage('{"type":"call"}')).toBe(false);
    expect(isContentMessage([])).toBe(false);
  });
});

describe('result shape guards', () => {
  it('should validate a geolocation position', () => {
    expect(isGeolocationPosition(position)).toBe(true);
    expect(isGeolocationPosition({ ...position, coords: { ...position.coords, latitude: '52' } })).toBe(false);
    expect(isGeolocationPosition({ coords: position.coords })).toBe(false);
  });

  it('should validate battery status levels as fractions', () => {
    const battery = { level: 0.5, charging: true, chargingTime: null, dischargingTime: null, state: 'charging' };
    expect(isBatteryStatus(battery)).toBe(true);
    expect(isBatteryStatus({ ...battery, level: 50 })).toBe(false);
    expect(isBatteryStatus({ ...battery, state: 'draining' })).toBe(false);
  });

  it('should validate network status', () => {
    expect(
      isNetworkStatus({ type: 'wifi', effectiveType: '4g', downlink: 50, rtt: 50, saveData: false }),
    ).toBe(true);
    expect(
      isNetworkStatus({ type: 'wifi', effectiveType: '5g', downlink: 50, rtt: 50, saveData: false }),
    ).toBe(false);
  });

  it('should validate orientation angles', () => {
    expect(isScreenOrientationState({ type: 'portrait-primary', angle: 0 })).toBe(true);
    expect(isScreenOrientationState({ type: 'portrait-primary', angle: 45 })).toBe(false);
  });

  it('should dispatch matchesResultShape on the shape tag', () => {
    expect(matchesResultShape('boolean', true)).toBe(true);
    expect(matchesResultShape('boolean', 'true')).toBe(false);
    expect(matchesResultShape('string', '')).toBe(true);
    expect(matchesResultShape('permissionState', 'notDetermined')).toBe(true);
    expect(matchesResultShape('permissionState', 'default')).toBe(false);
    expect(matchesResultShape('position', position)).toBe(true);
    expect(matchesResultShape('watchHandle', { watchId: 'w1' })).toBe(true);
    expect(matchesResultShape('watchHandle', { watchId: 1 })).toBe(false);
  });
});
