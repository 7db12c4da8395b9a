import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { BridgeError, logger } from '@hostbridge/utils';
import {
  BATTERY_FALLBACK,
  createBatteryGet,
  createClipboardRead,
  createClipboardWrite,
  createNetworkGet,
  createNotificationShow,
  createOrientationLock,
  createShare,
  createWatchPosition,
  formatShareText,
  orientationsFor,
} from './common';
import { createMemoryHost, SAMPLE_POSITION } from './mocks/memoryHost';

describe('platform building blocks', () => {
  let errorSpy: MockInstance<Parameters<typeof logger.error>, ReturnType<typeof logger.error>>;

  beforeEach(() => {
    errorSpy = vi.spyOn(logger, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  // --- clipboard ---
  it('clipboard read should return an empty string when the clipboard is empty', async () => {
    const host = createMemoryHost();
    expect(await createClipboardRead(host).invoke({})).toBe('');
  });

  it('clipboard write should store the text on the host', async () => {
    const host = createMemoryHost();
    expect(await createClipboardWrite(host).invoke({ text: 'copied' })).toBe(true);
    expect(await host.clipboard.getText()).toBe('copied');
  });

  it('clipboard write should reject with OperationFailed when the host throws', async () => {
    const host = createMemoryHost();
    host.clipboard.setText = () => Promise.reject(new Error('pasteboard locked'));

    const result = createClipboardWrite(host).invoke({ text: 'x' });

    await expect(result).rejects.toBeInstanceOf(BridgeError);
    await expect(result).rejects.toMatchObject({
      kind: 'OperationFailed',
      message: 'Clipboard write failed: pasteboard locked',
    });
    expect(errorSpy).toHaveBeenCalledWith('[Platform] Clipboard write failed', expect.any(Object));
  });

  // --- share ---
  it('formatShareText should join non-empty parts with newlines', () => {
    expect(formatShareText({ title: 'Title', text: '', url: 'https://example.test' })).toBe(
      'Title\nhttps://example.test',
    );
    expect(formatShareText({ text: 'only text' })).toBe('only text');
  });

  it('share should hand the formatted text to the share sheet', async () => {
    const host = createMemoryHost();
    await createShare(host).invoke({ title: 'A', text: 'B' });
    expect(host.shared).toEqual(['A\nB']);
  });

  // --- notifications ---
  it('notification show should default the title and body and use increasing ids', async () => {
    const host = createMemoryHost();
    const show = createNotificationShow(host);

    await show.invoke({ title: '' });
    await show.invoke({ title: 'T', body: 'B' });

    expect(host.shownNotifications).toEqual([
      { id: 1, title: 'Notification', body: '' },
      { id: 2, title: 'T', body: 'B' },
    ]);
  });

  // --- battery ---
  it('battery should convert percent to a fraction and map the charge state', async () => {
    const charging = createMemoryHost({ batteryLevel: 42, batteryState: 'charging' });
    expect(await createBatteryGet(charging).invoke({})).toEqual({
      level: 0.42,
      charging: true,
      chargingTime: null,
      dischargingTime: null,
      state: 'charging',
    });

    const full = createMemoryHost({ batteryLevel: 100, batteryState: 'full' });
    expect(await createBatteryGet(full).invoke({})).toEqual({
      level: 1,
      charging: true,
      chargingTime: 0,
      dischargingTime: null,
      state: 'full',
    });
  });

  it('battery should report the fallback status when the host fails', async () => {
    const host = createMemoryHost();
    host.battery.getLevel = () => Promise.reject(new Error('no battery service'));

    expect(await createBatteryGet(host).invoke({})).toEqual(BATTERY_FALLBACK);
    expect(errorSpy).toHaveBeenCalledOnce();
  });

  // --- network ---
  it.each([
    ['wifi', { type: 'wifi', effectiveType: '4g', downlink: 50 }],
    ['mobile', { type: 'cellular', effectiveType: '4g', downlink: 10 }],
    ['ethernet', { type: 'ethernet', effectiveType: '4g', downlink: 100 }],
    ['none', { type: 'none', effectiveType: 'slow-2g', downlink: 0 }],
    ['other', { type: 'unknown', effectiveType: '4g', downlink: 10 }],
  ] as const)('network should map %s connectivity', async (connectivity, expected) => {
    const host = createMemoryHost({ connectivity });
    expect(await createNetworkGet(host).invoke({})).toEqual({ ...expected, rtt: 50, saveData: false });
  });

  // --- orientation ---
  it('orientationsFor should map lock types onto device orientations', () => {
    expect(orientationsFor('portrait')).toEqual(['portraitUp', 'portraitDown']);
    expect(orientationsFor('portrait-secondary')).toEqual(['portraitUp', 'portraitDown']);
    expect(orientationsFor('landscape-primary')).toEqual(['landscapeLeft', 'landscapeRight']);
    expect(orientationsFor('any')).toEqual(['portraitUp', 'portraitDown', 'landscapeLeft', 'landscapeRight']);
    expect(orientationsFor('natural')).toHaveLength(4);
  });

  it('orientation lock should set the preferred orientations', async () => {
    const host = createMemoryHost();
    await createOrientationLock(host).invoke({ orientation: 'landscape' });
    expect(host.preferredOrientations).toEqual([['landscapeLeft', 'landscapeRight']]);
  });

  // --- geolocation watch ---
  it('watchPosition should forward positions until cancelled', () => {
    const host = createMemoryHost();
    const onEvent = vi.fn();
    const cancel = createWatchPosition(host).subscribe({}, onEvent, vi.fn());

    host.emitPosition(SAMPLE_POSITION);
    cancel();
    host.emitPosition(SAMPLE_POSITION);

    expect(onEvent).toHaveBeenCalledOnce();
    expect(host.activeWatchers()).toBe(0);
  });

  it('watchPosition should wrap stream errors as OperationFailed', () => {
    const host = createMemoryHost();
    const onError = vi.fn();
    const warnSpy = vi.spyOn(logger, 'warn').mockImplementation(() => {});
    createWatchPosition(host).subscribe({}, vi.fn(), onError);

    host.emitLocationError(new Error('signal lost'));

    expect(onError).toHaveBeenCalledWith(
      expect.objectContaining({ kind: 'OperationFailed', message: 'Geolocation watch failed: signal lost' }),
    );
    warnSpy.mockRestore();
  });
});
