/**
 * Configuration loading, validation, and directory management.
 *
 * Loads user config from ~/.narrator/config.json, merges over bundled
 * defaults, resolves ${VAR_NAME} environment variable references, and
 * validates every field the bridge reads. Zero external dependencies.
 */

import { readFileSync, writeFileSync, mkdirSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { homedir } from 'node:os';
import type { BridgeConfig } from '@narrator/core';
import { ConfigError } from '@narrator/core';
import { DEFAULT_CLASSIFIER_RULES } from '@narrator/bridge';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const NARRATOR_DIR_NAME = '.narrator';
const CONFIG_FILE_NAME = 'config.json';
const LOGS_DIR_NAME = 'logs';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'];
const OBSERVER_NAMES = ['console', 'file'];

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

/** Resolve the narrator home directory (~/.narrator). */
export function getNarratorDir(): string {
  return resolve(homedir(), NARRATOR_DIR_NAME);
}

/** Resolve the path to the user config file. */
export function getConfigPath(): string {
  return join(getNarratorDir(), CONFIG_FILE_NAME);
}

/** Resolve the path to the logs directory. */
export function getLogsDir(): string {
  return join(getNarratorDir(), LOGS_DIR_NAME);
}

// ---------------------------------------------------------------------------
// Default config
// ---------------------------------------------------------------------------

export function getDefaultConfig(): BridgeConfig {
  return {
    gateway: {
      port: 8357,
      host: '127.0.0.1',
    },
    engine: {
      args: [],
    },
    input: {
      pollIntervalMs: 100,
      retryCeiling: 1000,
    },
    broadcast: {
      intervalMs: 100,
    },
    classifier: structuredClone(DEFAULT_CLASSIFIER_RULES),
    observability: {
      observers: ['console'],
      logLevel: 'info',
    },
  };
}

// ---------------------------------------------------------------------------
// .env file loading
// ---------------------------------------------------------------------------

/**
 * Load variables from ~/.narrator/.env into process.env.
 *
 * Supports:
 *   - KEY=value
 *   - KEY="quoted value"
 *   - KEY='single quoted value'
 *   - # comments and blank lines
 *   - export KEY=value (optional export prefix)
 *
 * Existing environment variables are NOT overwritten; the shell environment
 * always takes precedence, so `PORT=9000 narrator serve` still wins.
 */
export function loadEnvFile(): number {
  const envPath = join(getNarratorDir(), '.env');
  if (!existsSync(envPath)) return 0;

  const raw = readFileSync(envPath, 'utf8');
  let loaded = 0;

  for (const line of raw.split('\n')) {
    const trimmed = line.trim();

    // Skip blank lines and comments.
    if (!trimmed || trimmed.startsWith('#')) continue;

    const stripped = trimmed.startsWith('export ')
      ? trimmed.slice(7).trim()
      : trimmed;

    const eqIdx = stripped.indexOf('=');
    if (eqIdx === -1) continue;

    const key = stripped.slice(0, eqIdx).trim();
    let value = stripped.slice(eqIdx + 1).trim();

    if (
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"))
    ) {
      value = value.slice(1, -1);
    }

    if (key && process.env[key] === undefined) {
      process.env[key] = value;
      loaded++;
    }
  }

  return loaded;
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Recursively resolve ${VAR_NAME} references in string values.
 * Missing env vars resolve to an empty string and are collected in `missing`
 * so the caller can warn once per variable.
 */
export function resolveEnvVars(obj: unknown, missing?: Set<string>): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
      const value = process.env[varName];
      if (value === undefined) {
        missing?.add(varName);
      }
      return value ?? '';
    });
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVars(item, missing));
  }

  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVars(value, missing);
    }
    return result;
  }

  return obj;
}

// ---------------------------------------------------------------------------
// Deep merge
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge `source` into `target`. Arrays are replaced, not merged.
 * Returns a new object; neither input is mutated.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
  seen = new WeakSet<object>(),
): Record<string, unknown> {
  if (seen.has(source)) return target; // Circular reference guard.
  seen.add(source);

  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];

    if (isRecord(sourceVal) && isRecord(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal, seen);
    } else {
      result[key] = sourceVal;
    }
  }

  return result;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export interface ValidationError {
  field: string;
  message: string;
}

function section(config: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = config[key];
  return isRecord(value) ? value : {};
}

function isPositiveNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/** Check every field the bridge reads. An empty result means the value is a BridgeConfig. */
export function validateConfig(config: Record<string, unknown>): ValidationError[] {
  const errors: ValidationError[] = [];

  // --- gateway ---
  const gateway = section(config, 'gateway');
  if (typeof gateway.port !== 'number' || !Number.isInteger(gateway.port) || gateway.port < 1 || gateway.port > 65535) {
    errors.push({ field: 'gateway.port', message: 'Port must be a number between 1 and 65535' });
  }
  if (typeof gateway.host !== 'string' || !gateway.host) {
    errors.push({ field: 'gateway.host', message: 'Host is required' });
  }

  // --- engine ---
  const engine = section(config, 'engine');
  if (engine.command !== undefined && typeof engine.command !== 'string') {
    errors.push({ field: 'engine.command', message: 'Must be a string' });
  }
  if (engine.args !== undefined && !isStringArray(engine.args)) {
    errors.push({ field: 'engine.args', message: 'Must be an array of strings' });
  }
  if (engine.cwd !== undefined && typeof engine.cwd !== 'string') {
    errors.push({ field: 'engine.cwd', message: 'Must be a string' });
  }
  if (engine.env !== undefined &&
      !(isRecord(engine.env) && Object.values(engine.env).every((v) => typeof v === 'string'))) {
    errors.push({ field: 'engine.env', message: 'Must be an object of string values' });
  }

  // --- input ---
  const input = section(config, 'input');
  if (!isPositiveNumber(input.pollIntervalMs)) {
    errors.push({ field: 'input.pollIntervalMs', message: 'Must be a positive number' });
  }
  if (!isPositiveNumber(input.retryCeiling) || !Number.isInteger(input.retryCeiling)) {
    errors.push({ field: 'input.retryCeiling', message: 'Must be a positive integer' });
  }

  // --- broadcast ---
  if (!isPositiveNumber(section(config, 'broadcast').intervalMs)) {
    errors.push({ field: 'broadcast.intervalMs', message: 'Must be a positive number' });
  }

  // --- classifier ---
  const classifier = section(config, 'classifier');
  if (typeof classifier.narrativeMarker !== 'string' || !classifier.narrativeMarker) {
    errors.push({ field: 'classifier.narrativeMarker', message: 'Must be a non-empty string' });
  }
  const statusLine = section(classifier, 'statusLine');
  if (typeof statusLine.prefix !== 'string' || !isStringArray(statusLine.tokens)) {
    errors.push({ field: 'classifier.statusLine', message: 'Must have a string prefix and string tokens' });
  }
  for (const key of ['severityTags', 'promptPrefixes', 'trackerMarkers', 'diagnosticPhrases']) {
    if (!isStringArray(classifier[key])) {
      errors.push({ field: `classifier.${key}`, message: 'Must be an array of strings' });
    }
  }

  // --- observability ---
  const observability = section(config, 'observability');
  if (typeof observability.logLevel !== 'string' || !LOG_LEVELS.includes(observability.logLevel)) {
    errors.push({ field: 'observability.logLevel', message: 'Must be one of: debug, info, warn, error' });
  }
  if (!isStringArray(observability.observers) ||
      observability.observers.some((name) => !OBSERVER_NAMES.includes(name))) {
    errors.push({ field: 'observability.observers', message: 'Must be a list of: console, file' });
  }
  if (observability.logFile !== undefined && typeof observability.logFile !== 'string') {
    errors.push({ field: 'observability.logFile', message: 'Must be a string' });
  }

  return errors;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Ensure the ~/.narrator directory structure exists.
 * Creates ~/.narrator/ and ~/.narrator/logs/ with restrictive permissions.
 */
export function ensureConfigDir(): void {
  const narratorDir = getNarratorDir();
  const logsDir = getLogsDir();

  if (!existsSync(narratorDir)) {
    mkdirSync(narratorDir, { recursive: true, mode: 0o700 });
  }

  if (!existsSync(logsDir)) {
    mkdirSync(logsDir, { recursive: true, mode: 0o700 });
  }
}

/**
 * Load and return a fully resolved, validated BridgeConfig.
 *
 * 1. Loads ~/.narrator/.env into process.env (shell wins).
 * 2. Deep-merges ~/.narrator/config.json, if present, over the defaults.
 * 3. Applies the PORT environment variable to gateway.port.
 * 4. Resolves ${VAR_NAME} references.
 * 5. Validates.
 *
 * Throws ConfigLoadError if the file cannot be parsed or validation fails.
 */
export function loadConfig(): BridgeConfig {
  loadEnvFile();

  const defaults = getDefaultConfig();
  let merged: Record<string, unknown> = { ...defaults };

  const configPath = getConfigPath();
  if (existsSync(configPath)) {
    let userConfig: unknown;
    try {
      userConfig = JSON.parse(readFileSync(configPath, 'utf8'));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigLoadError(`Failed to parse ${configPath}: ${message}`);
    }
    if (!isRecord(userConfig)) {
      throw new ConfigLoadError(`Failed to parse ${configPath}: top level must be an object`);
    }
    merged = deepMerge(merged, userConfig);
  }

  // PORT beats the file.
  const envPort = process.env['PORT'];
  if (envPort !== undefined && envPort.trim() !== '') {
    merged = deepMerge(merged, { gateway: { port: Number(envPort) } });
  }

  const missingVars = new Set<string>();
  const resolved = resolveEnvVars(merged, missingVars);

  for (const varName of missingVars) {
    console.warn(`  ⚠  Config references \${${varName}} but it is not set in environment.`);
  }

  if (!isRecord(resolved)) {
    throw new ConfigLoadError('Configuration must be an object');
  }
  assertValidConfig(resolved);
  return resolved;
}

/** Throws ConfigLoadError listing every invalid field. */
export function assertValidConfig(config: Record<string, unknown>): asserts config is Record<string, unknown> & BridgeConfig {
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ConfigLoadError(
      `Configuration validation failed:\n${errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n')}`,
      errors,
    );
  }
}

/**
 * Write a config object to ~/.narrator/config.json.
 * Ensures the directory exists first.
 */
export function saveConfig(config: BridgeConfig): void {
  ensureConfigDir();
  writeFileSync(getConfigPath(), JSON.stringify(config, null, 2) + '\n', {
    encoding: 'utf8',
    mode: 0o600,
  });
}

/**
 * Check whether a user config file exists.
 */
export function configExists(): boolean {
  return existsSync(getConfigPath());
}

// ---------------------------------------------------------------------------
// Error type
// ---------------------------------------------------------------------------

export class ConfigLoadError extends ConfigError {
  constructor(message: string, readonly errors: ValidationError[] = []) {
    super(message, { errors });
    this.name = 'ConfigLoadError';
  }
}
