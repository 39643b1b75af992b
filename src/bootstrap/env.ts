import fs from 'node:fs';
import path from 'node:path';
import process from 'node:process';

import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

import {
  DEFAULT_USER_AGENT,
  HASHDIVE_ORIGIN,
  HASHDIVE_WS_URL,
  defaultPaths,
} from '../config.js';

const ROOT_DIR = process.cwd();
const DOTENV_FILES = ['.env', '.env.local'];

for (const filename of DOTENV_FILES) {
  const filepath = path.join(ROOT_DIR, filename);
  if (fs.existsSync(filepath)) {
    loadEnv({ path: filepath, override: true });
  }
}

if (!process.env.TZ || process.env.TZ.trim() === '') {
  process.env.TZ = 'UTC';
}

const OptionalText = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value.trim()));

const RawEnvSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    TZ: OptionalText,
    HASHDIVE_WS_URL: z.string().trim().url().optional(),
    HASHDIVE_ORIGIN: z.string().trim().url().optional(),
    HASHDIVE_USER_AGENT: OptionalText,
    HASHDIVE_PROTO_DIR: OptionalText,
    HASHDIVE_TEMPLATE: OptionalText,
    HASHDIVE_COOKIES: OptionalText,
    STORAGE_STATE_PATH: OptionalText,
    LOG_DIR: OptionalText,
    HEADLESS: OptionalText,
    BROWSER_CHANNEL: OptionalText,
  })
  .passthrough();

export const coerceBoolean = (value: string | undefined, defaultValue: boolean): boolean => {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }

  return defaultValue;
};

export type Environment = {
  readonly nodeEnv: 'development' | 'test' | 'production';
  readonly timezone: string;
  readonly wsUrl: string;
  readonly origin: string;
  readonly userAgent: string;
  readonly protoDir: string;
  readonly templatePath: string;
  readonly storageStatePath: string;
  readonly cookieOverride?: string;
  readonly logDir: string;
  readonly headless: boolean;
  readonly browserChannel: string;
};

export function readEnvironment(source: NodeJS.ProcessEnv, baseDir: string = ROOT_DIR): Environment {
  const raw = RawEnvSchema.parse(source);
  const defaults = defaultPaths(baseDir);
  const resolvePath = (value: string | undefined, fallback: string): string =>
    value ? path.resolve(baseDir, value) : fallback;

  return {
    nodeEnv: raw.NODE_ENV,
    timezone: raw.TZ ?? 'UTC',
    wsUrl: raw.HASHDIVE_WS_URL ?? HASHDIVE_WS_URL,
    origin: raw.HASHDIVE_ORIGIN ?? HASHDIVE_ORIGIN,
    userAgent: raw.HASHDIVE_USER_AGENT ?? DEFAULT_USER_AGENT,
    protoDir: resolvePath(raw.HASHDIVE_PROTO_DIR, defaults.protoDir),
    templatePath: resolvePath(raw.HASHDIVE_TEMPLATE, defaults.template),
    storageStatePath: resolvePath(raw.STORAGE_STATE_PATH, defaults.storageState),
    cookieOverride: raw.HASHDIVE_COOKIES,
    logDir: resolvePath(raw.LOG_DIR, defaults.logs),
    headless: coerceBoolean(raw.HEADLESS, false),
    browserChannel: raw.BROWSER_CHANNEL ?? 'chrome',
  };
}

export const ENV: Environment = readEnvironment(process.env);
