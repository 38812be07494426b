export type FetchCacheMode = 'default' | 'no-store' | 'reload' | 'no-cache' | 'force-cache';

export interface EnvConfig {
  NODE_ENV: 'development' | 'production' | 'test';
  LOG_LEVEL: string;
  IMAGE_LAZY_BOUNDARY: string;
  IMAGE_VISIBILITY_THRESHOLD: number;
  IMAGE_FETCH_CACHE: FetchCacheMode;
}

export type EnvSource = Record<string, string | undefined>;

const NODE_ENVS: ReadonlyArray<EnvConfig['NODE_ENV']> = ['development', 'production', 'test'];
const FETCH_CACHE_MODES: ReadonlyArray<FetchCacheMode> = ['default', 'no-store', 'reload', 'no-cache', 'force-cache'];

// Browsers have no `process`; bundlers that define `process.env` still get their values through
export function processEnv(): EnvSource {
  return typeof process !== 'undefined' && process.env ? process.env : {};
}

function getEnvVar(source: EnvSource, key: keyof EnvConfig, defaultValue: string): string {
  return source[key] || defaultValue;
}

function getEnvNumber(source: EnvSource, key: keyof EnvConfig, defaultValue: number): number {
  const value = source[key];
  if (!value) {
    return defaultValue;
  }
  const parsed = parseFloat(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number, got "${value}"`);
  }
  return parsed;
}

function getEnvChoice<T extends string>(
  source: EnvSource,
  key: keyof EnvConfig,
  choices: ReadonlyArray<T>,
  defaultValue: T
): T {
  const value = source[key];
  return choices.find(choice => choice === value) ?? defaultValue;
}

export function readEnv(source: EnvSource = processEnv()): EnvConfig {
  return {
    NODE_ENV: getEnvChoice(source, 'NODE_ENV', NODE_ENVS, 'development'),
    LOG_LEVEL: getEnvVar(source, 'LOG_LEVEL', 'info'),
    IMAGE_LAZY_BOUNDARY: getEnvVar(source, 'IMAGE_LAZY_BOUNDARY', '100px'),
    IMAGE_VISIBILITY_THRESHOLD: getEnvNumber(source, 'IMAGE_VISIBILITY_THRESHOLD', 0.1),
    IMAGE_FETCH_CACHE: getEnvChoice(source, 'IMAGE_FETCH_CACHE', FETCH_CACHE_MODES, 'reload')
  };
}

export const env: EnvConfig = readEnv();

export function validateEnv(config: EnvConfig = env): void {
  const threshold = config.IMAGE_VISIBILITY_THRESHOLD;
  if (threshold < 0 || threshold > 1) {
    throw new Error(`Environment validation failed: IMAGE_VISIBILITY_THRESHOLD must be within 0..1, got ${threshold}`);
  }
  const parts = config.IMAGE_LAZY_BOUNDARY.trim().split(/\s+/);
  if (parts.length > 4 || !parts.every(part => /^-?\d+(\.\d+)?(px|%)$/.test(part))) {
    throw new Error(`Environment validation failed: IMAGE_LAZY_BOUNDARY "${config.IMAGE_LAZY_BOUNDARY}" is not a margin`);
  }
}
