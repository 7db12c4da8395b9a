import { ALL_OPERATING_SYSTEMS, MOBILE_OPERATING_SYSTEMS } from '@hostbridge/types';
import type {
  CapabilityArgs,
  CapabilityContract,
  CapabilityName,
  ContractTable,
  EmptyArgs,
  NotificationOptions,
  OperatingSystem,
  OrientationLockType,
  ParseResult,
  PositionOptions,
  ShareData,
} from '@hostbridge/types';
import { isRecord } from '@hostbridge/utils';

// ─── Parsing helpers ─────────────────────────────────────────

const ok = <T>(value: T): ParseResult<T> => ({ ok: true, value });
const invalid = <T>(message: string): ParseResult<T> => ({ ok: false, message });

function optionalString(record: Record<string, unknown>, key: string): string | undefined | null {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  return typeof value === 'string' ? value : null;
}

function parseEmpty(raw: unknown): ParseResult<EmptyArgs> {
  if (raw === undefined || raw === null || isRecord(raw)) {
    return ok({});
  }
  return invalid('expected no arguments');
}

function parseClipboardWrite(raw: unknown): ParseResult<{ text: string }> {
  if (!isRecord(raw)) return invalid('expected { text: string }');
  const { text } = raw;
  if (typeof text !== 'string') return invalid('expected { text: string }');
  return ok({ text });
}

function parseShare(raw: unknown): ParseResult<ShareData> {
  if (!isRecord(raw)) {
    return invalid('expected { title?, text?, url? }');
  }
  const data: ShareData = {};
  for (const key of ['title', 'text', 'url'] as const) {
    const value = optionalString(raw, key);
    if (value === null) return invalid(`share ${key} must be a string`);
    if (value !== undefined && value.length > 0) data[key] = value;
  }
  if (data.title === undefined && data.text === undefined && data.url === undefined) {
    return invalid('share needs at least one of title, text or url');
  }
  return ok(data);
}

function parseNotification(raw: unknown): ParseResult<NotificationOptions> {
  const title = isRecord(raw) ? raw['title'] : undefined;
  if (!isRecord(raw) || typeof title !== 'string') {
    return invalid('expected { title: string, body?, icon?, tag? }');
  }
  const options: NotificationOptions = { title };
  for (const key of ['body', 'icon', 'tag'] as const) {
    const value = optionalString(raw, key);
    if (value === null) return invalid(`notification ${key} must be a string`);
    if (value !== undefined) options[key] = value;
  }
  return ok(options);
}

function isNonNegative(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

function parsePositionOptions(raw: unknown): ParseResult<PositionOptions> {
  if (raw === undefined || raw === null) return ok({});
  if (!isRecord(raw)) return invalid('expected PositionOptions');

  const options: PositionOptions = {};
  const { enableHighAccuracy, timeout, maximumAge } = raw;
  if (enableHighAccuracy !== undefined) {
    if (typeof enableHighAccuracy !== 'boolean') return invalid('enableHighAccuracy must be a boolean');
    options.enableHighAccuracy = enableHighAccuracy;
  }
  if (timeout !== undefined) {
    if (!isNonNegative(timeout)) return invalid('timeout must be a non-negative number');
    options.timeout = timeout;
  }
  if (maximumAge !== undefined) {
    if (!isNonNegative(maximumAge)) return invalid('maximumAge must be a non-negative number');
    options.maximumAge = maximumAge;
  }
  return ok(options);
}

function parseWatchHandle(raw: unknown): ParseResult<{ watchId: string }> {
  const watchId = isRecord(raw) ? raw['watchId'] : undefined;
  if (typeof watchId !== 'string' || watchId.length === 0) {
    return invalid('expected { watchId: string }');
  }
  return ok({ watchId });
}

function parseVibrate(raw: unknown): ParseResult<{ pattern: number | number[] }> {
  if (!isRecord(raw)) return invalid('expected { pattern }');
  const { pattern } = raw;
  if (isNonNegative(pattern)) return ok({ pattern });
  if (Array.isArray(pattern) && pattern.every(isNonNegative)) {
    return ok({ pattern: pattern.filter(isNonNegative) });
  }
  return invalid('pattern must be a non-negative number or an array of them');
}

const ORIENTATION_LOCKS: readonly OrientationLockType[] = [
  'any',
  'natural',
  'portrait',
  'landscape',
  'portrait-primary',
  'portrait-secondary',
  'landscape-primary',
  'landscape-secondary',
];

function parseOrientationLock(raw: unknown): ParseResult<{ orientation: OrientationLockType }> {
  if (!isRecord(raw)) return invalid('expected { orientation }');
  const requested = raw['orientation'];
  const orientation = ORIENTATION_LOCKS.find((lock) => lock === requested);
  if (orientation === undefined) {
    return invalid(`unsupported orientation lock: ${String(requested)}`);
  }
  return ok({ orientation });
}

// ─── Contract table ──────────────────────────────────────────

const everywhere: ReadonlySet<OperatingSystem> = new Set(ALL_OPERATING_SYSTEMS);
const mobileOnly: ReadonlySet<OperatingSystem> = new Set(MOBILE_OPERATING_SYSTEMS);
const exceptLinux: ReadonlySet<OperatingSystem> = new Set(ALL_OPERATING_SYSTEMS.filter((os) => os !== 'linux'));

const define = <K extends CapabilityName>(contract: CapabilityContract<K>): CapabilityContract<K> =>
  Object.freeze(contract);

/**
 * The fixed capability surface. `platformSupport` is authoritative: a capability outside it
 * fails with CapabilityUnavailable, whatever the adapter offers.
 */
export const CAPABILITY_CONTRACTS: ContractTable = Object.freeze({
  'clipboard.write': define({
    name: 'clipboard.write',
    mode: 'oneShot',
    platformSupport: everywhere,
    resultShape: 'boolean',
    parseArgs: parseClipboardWrite,
  }),
  'clipboard.read': define({
    name: 'clipboard.read',
    mode: 'oneShot',
    platformSupport: everywhere,
    resultShape: 'string',
    parseArgs: parseEmpty,
  }),
  'share': define({
    name: 'share',
    mode: 'oneShot',
    platformSupport: exceptLinux,
    resultShape: 'boolean',
    parseArgs: parseShare,
  }),
  'notification.requestPermission': define({
    name: 'notification.requestPermission',
    mode: 'oneShot',
    platformSupport: everywhere,
    resultShape: 'permissionState',
    parseArgs: parseEmpty,
    // Waits on the user, not the OS
    timeoutFor: () => null,
  }),
  'notification.show': define({
    name: 'notification.show',
    mode: 'oneShot',
    requiredPermission: 'notifications',
    platformSupport: everywhere,
    resultShape: 'boolean',
    parseArgs: parseNotification,
  }),
  'geolocation.getCurrentPosition': define({
    name: 'geolocation.getCurrentPosition',
    mode: 'oneShot',
    requiredPermission: 'location',
    platformSupport: exceptLinux,
    resultShape: 'position',
    parseArgs: parsePositionOptions,
    timeoutFor: (options: CapabilityArgs<'geolocation.getCurrentPosition'>) =>
      options.timeout !== undefined && options.timeout > 0 ? options.timeout : undefined,
  }),
  'geolocation.watchPosition': define({
    name: 'geolocation.watchPosition',
    mode: 'watch',
    requiredPermission: 'location',
    platformSupport: exceptLinux,
    resultShape: 'watchHandle',
    parseArgs: parsePositionOptions,
  }),
  'geolocation.clearWatch': define({
    name: 'geolocation.clearWatch',
    mode: 'oneShot',
    platformSupport: everywhere,
    resultShape: 'boolean',
    parseArgs: parseWatchHandle,
  }),
  'vibrate': define({
    name: 'vibrate',
    mode: 'oneShot',
    platformSupport: everywhere,
    resultShape: 'boolean',
    parseArgs: parseVibrate,
  }),
  'battery.get': define({
    name: 'battery.get',
    mode: 'oneShot',
    platformSupport: everywhere,
    resultShape: 'battery',
    parseArgs: parseEmpty,
  }),
  'network.get': define({
    name: 'network.get',
    mode: 'oneShot',
    platformSupport: everywhere,
    resultShape: 'network',
    parseArgs: parseEmpty,
  }),
  'screenOrientation.lock': define({
    name: 'screenOrientation.lock',
    mode: 'oneShot',
    platformSupport: mobileOnly,
    resultShape: 'boolean',
    parseArgs: parseOrientationLock,
  }),
  'screenOrientation.unlock': define({
    name: 'screenOrientation.unlock',
    mode: 'oneShot',
    platformSupport: mobileOnly,
    resultShape: 'boolean',
    parseArgs: parseEmpty,
  }),
  'screenOrientation.get': define({
    name: 'screenOrientation.get',
    mode: 'oneShot',
    platformSupport: everywhere,
    resultShape: 'orientation',
    parseArgs: parseEmpty,
  }),
});
