import { describe, it, expect } from 'vitest';
import { createPlatformAdapter, detectOs } from './index';
import { createMemoryHost } from './mocks/memoryHost';

const availability = (os: Parameters<typeof createPlatformAdapter>[1]) => {
  const adapter = createPlatformAdapter(createMemoryHost(), os);
  return Object.fromEntries(
    Object.entries(adapter.capabilities).map(([name, implementation]) => [name, implementation.isAvailable]),
  );
};

describe('detectOs', () => {
  it('should map Node platform identifiers onto OS families', () => {
    expect(detectOs('darwin')).toBe('macos');
    expect(detectOs('win32')).toBe('windows');
    expect(detectOs('linux')).toBe('linux');
    expect(detectOs('ios')).toBe('ios');
    expect(detectOs('android')).toBe('android');
  });

  it('should return null for platforms without an adapter', () => {
    expect(detectOs('freebsd')).toBeNull();
    expect(detectOs('aix')).toBeNull();
  });
});

describe('createPlatformAdapter', () => {
  it('should build the adapter for the requested OS', () => {
    expect(createPlatformAdapter(createMemoryHost(), 'android').os).toBe('android');
    expect(createPlatformAdapter(createMemoryHost(), 'windows').os).toBe('windows');
  });

  it('should provide every capability on phones', () => {
    const ios = availability('ios');
    expect(Object.values(ios).every((available) => available)).toBe(true);
    expect(Object.keys(ios)).toHaveLength(12);
  });

  it('should mark orientation locking unavailable on desktops', () => {
    const mac = availability('macos');
    expect(mac['screenOrientation.lock']).toBe(false);
    expect(mac['screenOrientation.unlock']).toBe(false);
    expect(mac['screenOrientation.get']).toBe(true);
    expect(mac['vibrate']).toBe(true);
    expect(mac['share']).toBe(true);
  });

  it('should mark share and geolocation unavailable on linux', () => {
    const linux = availability('linux');
    expect(linux['share']).toBe(false);
    expect(linux['geolocation.getCurrentPosition']).toBe(false);
    expect(linux['geolocation.watchPosition']).toBe(false);
    expect(linux['clipboard.write']).toBe(true);
  });
});
