/**
 * Receive configuration
 *
 * Settings come from three layers, highest precedence first: programmatic
 * overrides (CLI flags), a YAML config file, environment variables, then
 * {@link DEFAULT_RECEIVE_CONFIG}. String values in the file that start with
 * `$` are resolved from the environment.
 *
 * Example file:
 *
 * ```yaml
 * relay-url: $CODEDROP_RELAY_URL
 * transit-helper: tcp:transit.example.net:4001
 * code-length: 3
 * verify: true
 * accept-file: false
 * log-level: info
 * ```
 *
 * @module config-loader
 */

import { readFileSync } from 'node:fs';
import * as path from 'node:path';
import yaml from 'js-yaml';
import {
  APP_ID,
  DEFAULT_CODE_LENGTH,
  DEFAULT_RELAY_URL,
  DEFAULT_TRANSIT_HELPER,
  LOG_LEVELS,
} from './constants.js';
import type { ConfigValidationError } from './errors.js';
import type { LogLevel, ReceiveConfig } from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Settings that may appear in a config file */
export interface ReceiveFileConfig {
  relayUrl?: string;
  transitHelper?: string | null;
  codeLength?: number;
  verify?: boolean;
  hideProgress?: boolean;
  acceptFile?: boolean;
  noListen?: boolean;
  logLevel?: LogLevel;
}

export type ConfigLoadResult =
  | { success: true; config: ReceiveFileConfig }
  | { success: false; errors: ConfigValidationError[] };

/** Defaults for everything except the per-invocation fields */
export const DEFAULT_RECEIVE_CONFIG: Omit<ReceiveConfig, 'cwd' | 'code' | 'outputFile'> = {
  appId: APP_ID,
  relayUrl: DEFAULT_RELAY_URL,
  transitHelper: DEFAULT_TRANSIT_HELPER,
  codeLength: DEFAULT_CODE_LENGTH,
  zeroMode: false,
  verify: false,
  hideProgress: false,
  acceptFile: false,
  noListen: false,
  logLevel: 'warn',
};

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Resolve a value that may be an environment variable reference (`$NAME`).
 * Returns undefined when the referenced variable is not set.
 */
export function resolveEnvRef(value: string): string | undefined {
  if (value.startsWith('$')) {
    return process.env[value.slice(1)];
  }
  return value;
}

// ---------------------------------------------------------------------------
// File parsing
// ---------------------------------------------------------------------------

const KNOWN_KEYS = [
  'relay-url',
  'transit-helper',
  'code-length',
  'verify',
  'hide-progress',
  'accept-file',
  'no-listen',
  'log-level',
] as const;

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function readString(
  raw: Record<string, unknown>,
  key: string,
  errors: ConfigValidationError[]
): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    errors.push({ field: key, message: `Expected a string, got ${typeof value}` });
    return undefined;
  }
  const resolved = resolveEnvRef(value);
  if (resolved === undefined) {
    errors.push({ field: key, message: `Environment variable ${value.slice(1)} is not set` });
  }
  return resolved;
}

function readBoolean(
  raw: Record<string, unknown>,
  key: string,
  errors: ConfigValidationError[]
): boolean | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    errors.push({ field: key, message: `Expected true or false, got ${JSON.stringify(value)}` });
    return undefined;
  }
  return value;
}

function transformConfig(raw: Record<string, unknown>, errors: ConfigValidationError[]): ReceiveFileConfig {
  for (const key of Object.keys(raw)) {
    if (!(KNOWN_KEYS as readonly string[]).includes(key)) {
      errors.push({ field: key, message: `Unknown setting "${key}"` });
    }
  }

  const config: ReceiveFileConfig = {};

  const relayUrl = readString(raw, 'relay-url', errors);
  if (relayUrl !== undefined) config.relayUrl = relayUrl;

  // An explicit null disables the transit relay helper
  if (raw['transit-helper'] === null) {
    config.transitHelper = null;
  } else {
    const helper = readString(raw, 'transit-helper', errors);
    if (helper !== undefined) config.transitHelper = helper;
  }

  const codeLength = raw['code-length'];
  if (codeLength !== undefined && codeLength !== null) {
    if (typeof codeLength === 'number' && Number.isInteger(codeLength) && codeLength >= 1) {
      config.codeLength = codeLength;
    } else {
      errors.push({ field: 'code-length', message: 'Must be a positive integer' });
    }
  }

  const verify = readBoolean(raw, 'verify', errors);
  if (verify !== undefined) config.verify = verify;
  const hideProgress = readBoolean(raw, 'hide-progress', errors);
  if (hideProgress !== undefined) config.hideProgress = hideProgress;
  const acceptFile = readBoolean(raw, 'accept-file', errors);
  if (acceptFile !== undefined) config.acceptFile = acceptFile;
  const noListen = readBoolean(raw, 'no-listen', errors);
  if (noListen !== undefined) config.noListen = noListen;

  const logLevel = readString(raw, 'log-level', errors);
  if (logLevel !== undefined) {
    if (isLogLevel(logLevel)) {
      config.logLevel = logLevel;
    } else {
      errors.push({
        field: 'log-level',
        message: `Invalid log level: "${logLevel}". Must be one of: ${LOG_LEVELS.join(', ')}`,
      });
    }
  }

  return config;
}

/**
 * Load receive settings from a YAML string.
 */
export function loadConfigFromString(yamlContent: string): ConfigLoadResult {
  let parsed: unknown;
  try {
    parsed = yaml.load(yamlContent);
  } catch (err) {
    return {
      success: false,
      errors: [{ field: 'yaml', message: `Failed to parse YAML: ${err instanceof Error ? err.message : String(err)}` }],
    };
  }

  // An empty file is a valid, empty configuration
  if (parsed === undefined || parsed === null) {
    return { success: true, config: {} };
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    return {
      success: false,
      errors: [{ field: 'yaml', message: 'YAML content is not a mapping' }],
    };
  }

  const errors: ConfigValidationError[] = [];
  const config = transformConfig({ ...parsed }, errors);
  if (errors.length > 0) {
    return { success: false, errors };
  }
  return { success: true, config };
}

/**
 * Load receive settings from a YAML file.
 *
 * @param filePath - Path to the file. Falls back to `CODEDROP_CONFIG`.
 *   With neither, an empty configuration is returned.
 */
export function loadConfig(filePath?: string): ConfigLoadResult {
  const resolvedPath = filePath ?? process.env['CODEDROP_CONFIG'];
  if (!resolvedPath) {
    return { success: true, config: {} };
  }

  let rawYaml: string;
  try {
    rawYaml = readFileSync(resolvedPath, 'utf-8');
  } catch (err) {
    return {
      success: false,
      errors: [{ field: 'filePath', message: `Failed to read config file: ${err instanceof Error ? err.message : String(err)}` }],
    };
  }
  return loadConfigFromString(rawYaml);
}

// ---------------------------------------------------------------------------
// Building and validation
// ---------------------------------------------------------------------------

/** Per-invocation settings, typically from CLI flags */
export type ReceiveOverrides = Partial<ReceiveConfig>;

/**
 * Build the full config: overrides, then file values, then environment
 * (`CODEDROP_RELAY_URL`, `CODEDROP_TRANSIT_HELPER`), then defaults.
 */
export function buildReceiveConfig(
  fileConfig: ReceiveFileConfig = {},
  overrides: ReceiveOverrides = {}
): ReceiveConfig {
  const defaults = DEFAULT_RECEIVE_CONFIG;
  return {
    appId: overrides.appId ?? defaults.appId,
    relayUrl:
      overrides.relayUrl ??
      fileConfig.relayUrl ??
      process.env['CODEDROP_RELAY_URL'] ??
      defaults.relayUrl,
    transitHelper:
      overrides.transitHelper !== undefined
        ? overrides.transitHelper
        : fileConfig.transitHelper !== undefined
          ? fileConfig.transitHelper
          : process.env['CODEDROP_TRANSIT_HELPER'] ?? defaults.transitHelper,
    code: overrides.code,
    codeLength: overrides.codeLength ?? fileConfig.codeLength ?? defaults.codeLength,
    zeroMode: overrides.zeroMode ?? defaults.zeroMode,
    verify: overrides.verify ?? fileConfig.verify ?? defaults.verify,
    hideProgress: overrides.hideProgress ?? fileConfig.hideProgress ?? defaults.hideProgress,
    acceptFile: overrides.acceptFile ?? fileConfig.acceptFile ?? defaults.acceptFile,
    outputFile: overrides.outputFile,
    cwd: path.resolve(overrides.cwd ?? process.cwd()),
    noListen: overrides.noListen ?? fileConfig.noListen ?? defaults.noListen,
    logLevel: overrides.logLevel ?? fileConfig.logLevel ?? defaults.logLevel,
  };
}

/**
 * Check a built config for combinations the session cannot run with.
 * Returns an empty list when the config is usable.
 */
export function validateReceiveConfig(config: ReceiveConfig): ConfigValidationError[] {
  const errors: ConfigValidationError[] = [];

  if (config.zeroMode && config.code) {
    errors.push({ field: 'code', message: 'A code cannot be combined with zero mode' });
  }
  if (!Number.isInteger(config.codeLength) || config.codeLength < 1) {
    errors.push({ field: 'codeLength', message: 'Must be a positive integer' });
  }
  if (!path.isAbsolute(config.cwd)) {
    errors.push({ field: 'cwd', message: 'Must be an absolute path' });
  }
  if (config.relayUrl.trim() === '') {
    errors.push({ field: 'relayUrl', message: 'Relay URL cannot be empty' });
  }
  if (config.outputFile !== undefined && config.outputFile.trim() === '') {
    errors.push({ field: 'outputFile', message: 'Output name cannot be empty' });
  }

  return errors;
}
