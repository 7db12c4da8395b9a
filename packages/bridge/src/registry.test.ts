import { describe, it, expect, vi, afterEach } from 'vitest';
import type { OneShotFor } from '@hostbridge/types';
import { BridgeError, DuplicateCapabilityError, logger } from '@hostbridge/utils';
import { createLinuxAdapter, createIosAdapter, unavailable } from '@hostbridge/platform';
import { createMemoryHost } from '@hostbridge/platform/mocks';
import { CAPABILITY_CONTRACTS } from './contracts';
import { buildRegistry, CapabilityRegistry } from './registry';

const clipboardRead = (text: string): OneShotFor<'clipboard.read'> => ({
  isAvailable: true,
  mode: 'oneShot',
  invoke: () => Promise.resolve(text),
});

const bridgeOwned = {
  'notification.requestPermission': unavailable,
  'geolocation.clearWatch': unavailable,
};

describe('CapabilityRegistry', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should reject a second contract with the same name', () => {
    const registry = new CapabilityRegistry('ios');
    registry.register(CAPABILITY_CONTRACTS['clipboard.read'], clipboardRead('a'));

    expect(() => registry.register(CAPABILITY_CONTRACTS['clipboard.read'], clipboardRead('b'))).toThrow(
      DuplicateCapabilityError,
    );
    expect(registry.size).toBe(1);
  });

  it('should fail unknown names with UnknownCapability and leave the registry unchanged', () => {
    const registry = new CapabilityRegistry('ios');
    registry.register(CAPABILITY_CONTRACTS['clipboard.read'], clipboardRead('a'));
    registry.freeze();

    let thrown: unknown;
    try {
      registry.resolve('camera.capture');
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(BridgeError);
    expect(thrown).toMatchObject({ kind: 'UnknownCapability', message: 'Unknown capability: camera.capture' });
    expect(registry.names()).toEqual(['clipboard.read']);
    expect(registry.has('camera.capture')).toBe(false);
  });

  it('should refuse registration once frozen', () => {
    const registry = new CapabilityRegistry('ios').freeze();
    expect(() => registry.register(CAPABILITY_CONTRACTS['clipboard.read'], clipboardRead('a'))).toThrow(
      '[CapabilityRegistry] Cannot register clipboard.read after construction',
    );
  });

  it('should refuse an implementation whose mode contradicts the contract', () => {
    const registry = new CapabilityRegistry('ios');
    expect(() =>
      registry.register(CAPABILITY_CONTRACTS['geolocation.watchPosition'], {
        isAvailable: true,
        mode: 'oneShot',
        invoke: () => Promise.resolve({ watchId: 'x' }),
      }),
    ).toThrow('[CapabilityRegistry] geolocation.watchPosition is declared watch but implemented as oneShot');
  });

  it('should bind prepared calls to the implementation with parsed arguments', async () => {
    const registry = new CapabilityRegistry('ios');
    registry.register(CAPABILITY_CONTRACTS['clipboard.read'], clipboardRead('from host'));

    const prepared = registry.resolve('clipboard.read').prepare(null);
    expect(prepared.ok).toBe(true);
    if (!prepared.ok || prepared.value.mode !== 'oneShot') throw new Error('expected a one-shot call');

    expect(prepared.value.timeoutMs).toBeUndefined();
    await expect(prepared.value.run()).resolves.toBe('from host');
  });

  it('should carry argument-derived timeouts', () => {
    const host = createMemoryHost();
    const registry = buildRegistry('ios', CAPABILITY_CONTRACTS, createIosAdapter(host).capabilities, bridgeOwned);

    const prepared = registry.resolve('geolocation.getCurrentPosition').prepare({ timeout: 1500 });
    expect(prepared).toMatchObject({ ok: true, value: { mode: 'oneShot', timeoutMs: 1500 } });
  });

  it('should mark capabilities outside the platform support set unavailable', () => {
    const host = createMemoryHost();
    const registry = buildRegistry('linux', CAPABILITY_CONTRACTS, createLinuxAdapter(host).capabilities, bridgeOwned);

    expect(registry.size).toBe(14);
    expect(registry.resolve('share').available).toBe(false);
    expect(registry.resolve('geolocation.watchPosition').available).toBe(false);
    expect(registry.resolve('screenOrientation.lock').available).toBe(false);
    expect(registry.resolve('clipboard.write').available).toBe(true);
    expect(registry.resolve('screenOrientation.get').available).toBe(true);
  });

  it('should prepare unavailable capabilities without binding an implementation', () => {
    const host = createMemoryHost();
    const registry = buildRegistry('linux', CAPABILITY_CONTRACTS, createLinuxAdapter(host).capabilities, bridgeOwned);

    expect(registry.resolve('share').prepare({ text: 'hello' })).toEqual({ ok: true, value: { mode: 'unavailable' } });
    expect(registry.resolve('share').prepare({})).toEqual({
      ok: false,
      message: 'share needs at least one of title, text or url',
    });
  });

  it('should treat a supported capability the adapter lacks as unavailable and warn', () => {
    const warnSpy = vi.spyOn(logger, 'warn').mockImplementation(() => {});
    const registry = new CapabilityRegistry('ios');
    registry.register(CAPABILITY_CONTRACTS['clipboard.read'], unavailable);

    expect(registry.resolve('clipboard.read').available).toBe(false);
    expect(warnSpy).toHaveBeenCalledWith(
      '[CapabilityRegistry] Adapter offers no implementation for a supported capability',
      { capability: 'clipboard.read', os: 'ios' },
    );
  });
});
