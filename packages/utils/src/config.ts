import { LogLevel } from '@hostbridge/types';
import type { BridgeConfig } from '@hostbridge/types';
import { logger } from './logger';

export const DEFAULT_BRIDGE_CONFIG: BridgeConfig = {
  callTimeoutMs: 10000,
  namespace: 'hostBridge',
  channel: 'window.hostBridgeChannel.postMessage',
  logLevel: LogLevel.INFO,
  forwardConsole: true,
};

type Environment = Record<string, string | undefined>;

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;
const CHANNEL_EXPRESSION = /^[A-Za-z_$][\w$]*(\.[A-Za-z_$][\w$]*)*$/;

function parseLogLevel(value: string): LogLevel | undefined {
  switch (value.toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return undefined;
  }
}

function parseBoolean(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

function parseTimeout(value: number): number | undefined {
  return Number.isInteger(value) && value > 0 ? value : undefined;
}

function fromEnvironment(env: Environment): Partial<BridgeConfig> {
  const config: Partial<BridgeConfig> = {};

  const timeout = env['HOSTBRIDGE_CALL_TIMEOUT_MS'];
  if (timeout !== undefined) {
    const parsed = parseTimeout(Number(timeout));
    if (parsed === undefined) {
      logger.warn('[Config] Ignoring invalid HOSTBRIDGE_CALL_TIMEOUT_MS', { value: timeout });
    } else {
      config.callTimeoutMs = parsed;
    }
  }

  const level = env['HOSTBRIDGE_LOG_LEVEL'];
  if (level !== undefined) {
    const parsed = parseLogLevel(level);
    if (parsed === undefined) {
      logger.warn('[Config] Ignoring invalid HOSTBRIDGE_LOG_LEVEL', { value: level });
    } else {
      config.logLevel = parsed;
    }
  }

  const forward = env['HOSTBRIDGE_FORWARD_CONSOLE'];
  if (forward !== undefined) {
    const parsed = parseBoolean(forward);
    if (parsed === undefined) {
      logger.warn('[Config] Ignoring invalid HOSTBRIDGE_FORWARD_CONSOLE', { value: forward });
    } else {
      config.forwardConsole = parsed;
    }
  }

  return config;
}

function validOverrides(overrides: Partial<BridgeConfig>): Partial<BridgeConfig> {
  const config: Partial<BridgeConfig> = {};
  const { callTimeoutMs, namespace, channel, logLevel, forwardConsole } = overrides;

  if (callTimeoutMs !== undefined) {
    if (parseTimeout(callTimeoutMs) === undefined) {
      logger.warn('[Config] Ignoring invalid callTimeoutMs override', { value: callTimeoutMs });
    } else {
      config.callTimeoutMs = callTimeoutMs;
    }
  }
  // Both are spliced into the injected script, so they must stay plain identifiers
  if (namespace !== undefined) {
    if (IDENTIFIER.test(namespace)) {
      config.namespace = namespace;
    } else {
      logger.warn('[Config] Ignoring invalid namespace override', { value: namespace });
    }
  }
  if (channel !== undefined) {
    if (CHANNEL_EXPRESSION.test(channel)) {
      config.channel = channel;
    } else {
      logger.warn('[Config] Ignoring invalid channel override', { value: channel });
    }
  }
  if (logLevel !== undefined) config.logLevel = logLevel;
  if (forwardConsole !== undefined) config.forwardConsole = forwardConsole;

  return config;
}

/**
 * Resolves the effective bridge configuration: defaults, then environment variables,
 * then explicit overrides.
 */
export function resolveBridgeConfig(
  overrides: Partial<BridgeConfig> = {},
  env: Environment = process.env,
): BridgeConfig {
  return {
    ...DEFAULT_BRIDGE_CONFIG,
    ...fromEnvironment(env),
    ...validOverrides(overrides),
  };
}
