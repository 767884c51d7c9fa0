import dotenv from 'dotenv';
import fs from 'node:fs';
import path from 'node:path';
import { ConfigError } from '../utils/errors.js';

dotenv.config();

export const parsePositiveInt = (rawValue: string | undefined, fallback: number): number => {
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) && parsed > 0 ? Math.round(parsed) : fallback;
};

export const parseNonNegativeInt = (rawValue: string | undefined, fallback: number): number => {
  if (rawValue === undefined || rawValue.trim() === '') {
    return fallback;
  }
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) && parsed >= 0 ? Math.round(parsed) : fallback;
};

export const PORT = parsePositiveInt(process.env.PORT, 8080);
export const IS_PRODUCTION = process.env.NODE_ENV === 'production';
export const DEBUG = process.env.DEBUG === 'true';

export const REQUEST_TIMEOUT_MS = parsePositiveInt(process.env.REQUEST_TIMEOUT_MS, 10000);
export const STALE_AFTER_MS = parsePositiveInt(process.env.STALE_AFTER_MINUTES, 5) * 60 * 1000;
export const UPSTREAM_MAX_RETRIES = parseNonNegativeInt(process.env.UPSTREAM_MAX_RETRIES, 3);
export const UPSTREAM_RETRY_DELAY_MS = parsePositiveInt(process.env.UPSTREAM_RETRY_DELAY_MS, 5000);
export const RATE_LIMIT_WINDOW_MS = parsePositiveInt(process.env.RATE_LIMIT_WINDOW_MS, 60 * 1000);
export const RATE_LIMIT_MAX_REQUESTS = parsePositiveInt(process.env.RATE_LIMIT_MAX_REQUESTS, 120);
export const SECRETS_DIR = process.env.SECRETS_DIR || '/mnt/secrets';
export const STATIC_DIR = process.env.STATIC_DIR || path.resolve(process.cwd(), 'static');

export const DEFAULT_FETCH_BUFFER_SECONDS = 30;

export const UNIT_SYSTEMS = ['e', 'm', 'h'] as const;
export type UnitSystem = (typeof UNIT_SYSTEMS)[number];

const isUnitSystem = (value: string): value is UnitSystem => (UNIT_SYSTEMS as readonly string[]).includes(value);

export interface StationConfig {
  apiBase: string;
  stationId: string;
  units: UnitSystem;
  apiKey: string;
  fetchBufferSeconds: number;
}

interface SecretSourceOptions {
  env?: NodeJS.ProcessEnv;
  secretsDir?: string;
}

const readSecretFile = (secretsDir: string, fileName: string): string | null => {
  const filePath = path.join(secretsDir, fileName);
  if (!fs.existsSync(filePath)) {
    return null;
  }
  try {
    const content = fs.readFileSync(filePath, 'utf8').trim();
    return content || null;
  } catch (error) {
    throw new ConfigError(`Failed to read secret file ${fileName}`, { cause: error });
  }
};

const resolveRequiredSetting = (env: NodeJS.ProcessEnv, secretsDir: string, envName: string, fileName: string): string => {
  const fromEnv = env[envName]?.trim();
  if (fromEnv) {
    return fromEnv;
  }
  const fromFile = readSecretFile(secretsDir, fileName);
  if (fromFile) {
    return fromFile;
  }
  throw new ConfigError(`Missing required setting ${envName} (env var or ${path.join(secretsDir, fileName)})`);
};

export const resolveFetchBufferSeconds = ({ env = process.env, secretsDir = SECRETS_DIR }: SecretSourceOptions = {}): number => {
  const envBuffer = env.FETCH_BUFFER_SECONDS?.trim();
  if (envBuffer) {
    const parsed = parsePositiveInt(envBuffer, 0);
    if (parsed > 0 && Number.isInteger(Number(envBuffer))) {
      console.log(`[Config] Using fetch buffer from env var: ${parsed} seconds`);
      return parsed;
    }
    console.warn(`[Config] Invalid FETCH_BUFFER_SECONDS env var, using default: ${DEFAULT_FETCH_BUFFER_SECONDS} seconds`);
    return DEFAULT_FETCH_BUFFER_SECONDS;
  }

  const fileBuffer = readSecretFile(secretsDir, 'fetch_buffer');
  if (fileBuffer) {
    const parsed = parsePositiveInt(fileBuffer, 0);
    if (parsed > 0 && Number.isInteger(Number(fileBuffer))) {
      console.log(`[Config] Using fetch buffer from file: ${parsed} seconds`);
      return parsed;
    }
    console.warn(`[Config] Invalid fetch_buffer file format, using default: ${DEFAULT_FETCH_BUFFER_SECONDS} seconds`);
    return DEFAULT_FETCH_BUFFER_SECONDS;
  }

  console.log(`[Config] Using default fetch buffer: ${DEFAULT_FETCH_BUFFER_SECONDS} seconds`);
  return DEFAULT_FETCH_BUFFER_SECONDS;
};

export const loadStationConfig = ({ env = process.env, secretsDir = SECRETS_DIR }: SecretSourceOptions = {}): StationConfig => {
  const apiBase = resolveRequiredSetting(env, secretsDir, 'API', 'api');
  const stationId = resolveRequiredSetting(env, secretsDir, 'STATION_ID', 'sid');
  const units = resolveRequiredSetting(env, secretsDir, 'UNITS', 'units');
  const apiKey = resolveRequiredSetting(env, secretsDir, 'API_KEY', 'key');

  if (!URL.canParse(apiBase)) {
    throw new ConfigError(`API must be an absolute URL, got "${apiBase}"`);
  }
  if (!isUnitSystem(units)) {
    throw new ConfigError(`UNITS must be one of ${UNIT_SYSTEMS.join(', ')}, got "${units}"`);
  }

  return {
    apiBase,
    stationId,
    units,
    apiKey,
    fetchBufferSeconds: resolveFetchBufferSeconds({ env, secretsDir }),
  };
};

// Re-read on every request so a rotated secret shows up without a restart.
export const readRandomSecret = ({ env = process.env, secretsDir = SECRETS_DIR }: SecretSourceOptions = {}): string => {
  const fromFile = readSecretFile(secretsDir, 'rsec');
  if (fromFile) {
    return fromFile;
  }
  const fromEnv = env.RANDOM_SECRET?.trim();
  if (fromEnv) {
    return fromEnv;
  }
  throw new ConfigError(`Missing random secret (${path.join(secretsDir, 'rsec')} or RANDOM_SECRET)`);
};
