/**
 * Trackwise: Configuration Management
 *
 * Handles loading, validation, and path resolution for all configuration.
 * Environment variables take precedence over the config file.
 *
 * @module config
 * @version 1.0.0
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { type Config, ConfigSchema, type Result, ok, err } from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

const DEFAULT_BASE_DIR = path.join(os.homedir(), '.trackwise');

export const DEFAULT_CONFIG: Config = {
  tracker: {
    api_root: 'http://localhost:8000',
    timeout_ms: 5000,
  },
  cache: {
    ttl_ms: 600_000,
    sweep_interval_ms: 0,
  },
  telemetry: {
    redact_prompts: false,
  },
  renderer: {
    timeout_ms: 5000,
  },
  paths: {
    base_dir: DEFAULT_BASE_DIR,
    telemetry_file: 'telemetry.jsonl',
    artifact_dir: 'artifacts',
    log_dir: 'logs',
    config_file: 'config.json',
  },
  server: {
    host: '127.0.0.1',
    port: 8765,
  },
  logging: {
    level: 'info',
  },
};

// ═══════════════════════════════════════════════════════════════════════════
// PATH UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function expandPath(inputPath: string): string {
  if (inputPath.startsWith('~/')) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  if (inputPath === '~') {
    return os.homedir();
  }
  return inputPath;
}

export function getBaseDir(config?: Partial<Config>): string {
  return expandPath(config?.paths?.base_dir ?? DEFAULT_CONFIG.paths.base_dir);
}

export function getPath(relativePath: string, config?: Partial<Config>): string {
  if (path.isAbsolute(relativePath)) {
    return relativePath;
  }
  return path.join(getBaseDir(config), relativePath);
}

export function getTelemetryPath(config?: Partial<Config>): string {
  return getPath(config?.paths?.telemetry_file ?? DEFAULT_CONFIG.paths.telemetry_file, config);
}

export function getArtifactsPath(config?: Partial<Config>): string {
  return getPath(config?.paths?.artifact_dir ?? DEFAULT_CONFIG.paths.artifact_dir, config);
}

export function getLogsPath(config?: Partial<Config>): string {
  return getPath(config?.paths?.log_dir ?? DEFAULT_CONFIG.paths.log_dir, config);
}

export function getConfigPath(config?: Partial<Config>): string {
  return getPath(config?.paths?.config_file ?? DEFAULT_CONFIG.paths.config_file, config);
}

// ═══════════════════════════════════════════════════════════════════════════
// DIRECTORY MANAGEMENT
// ═══════════════════════════════════════════════════════════════════════════

export function ensureDirectories(config?: Partial<Config>): Result<void, Error> {
  try {
    for (const dir of [getBaseDir(config), getArtifactsPath(config), getLogsPath(config)]) {
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
      }
    }
    return ok(undefined);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION LOADING
// ═══════════════════════════════════════════════════════════════════════════

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Environment overrides, applied after the file. Only set variables
 * produce keys.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): PlainObject {
  const overrides: PlainObject = {};

  if (env.TRACKER_API_ROOT) {
    overrides.tracker = { api_root: env.TRACKER_API_ROOT };
  }
  if (env.TRACKWISE_CACHE_TTL_MS) {
    overrides.cache = { ttl_ms: Number(env.TRACKWISE_CACHE_TTL_MS) };
  }
  if (env.TRACKWISE_LOG_LEVEL) {
    overrides.logging = { level: env.TRACKWISE_LOG_LEVEL };
  }

  return overrides;
}

/**
 * Load configuration from file, merge with defaults and environment.
 */
export function loadConfig(
  customPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): Result<Config, Error> {
  try {
    const configPath = customPath ?? getConfigPath();
    const expandedPath = expandPath(configPath);

    let userConfig: unknown = {};

    if (fs.existsSync(expandedPath)) {
      const content = fs.readFileSync(expandedPath, 'utf-8');
      userConfig = JSON.parse(content);
    }

    if (!isPlainObject(userConfig)) {
      return err(new Error(`Invalid configuration: ${expandedPath} must contain a JSON object`));
    }

    const merged = deepMerge(deepMerge(DEFAULT_CONFIG, userConfig), readEnvOverrides(env));

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      return err(new Error(`Invalid configuration: ${result.error.message}`));
    }

    return ok(result.data);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// SINGLETON PATTERN
// ═══════════════════════════════════════════════════════════════════════════

let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (cachedConfig === null) {
    const result = loadConfig();
    cachedConfig = result.success ? result.data : DEFAULT_CONFIG;
  }
  return cachedConfig;
}

export function clearConfigCache(): void {
  cachedConfig = null;
}
