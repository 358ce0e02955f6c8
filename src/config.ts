import { z } from 'zod';
import { ConfigurationError } from './types.js';

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

// Empty variables are treated as unset
const optionalEnv = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(value => (value === '' ? undefined : value), schema);

const EnvironmentSchema = z.object({
  APPLINKS_ADB_PATH: optionalEnv(z.string().default('adb')),
  APPLINKS_COMMAND_TIMEOUT_MS: optionalEnv(z.coerce.number().int().positive().default(15000)),
  APPLINKS_FETCH_TIMEOUT_MS: optionalEnv(z.coerce.number().int().positive().default(10000)),
  APPLINKS_MAX_MANIFEST_BYTES: optionalEnv(z.coerce.number().int().positive().default(512 * 1024)),
  APPLINKS_USER_AGENT: optionalEnv(z.string().default('applinks-diagnostics-mcp')),
  APPLINKS_LOG_LEVEL: optionalEnv(z.enum(LOG_LEVEL_NAMES).default('info')),
});

export interface AppConfig {
  adbPath: string;
  commandTimeoutMs: number;
  fetchTimeoutMs: number;
  maxManifestBytes: number;
  userAgent: string;
  logLevel: LogLevelName;
}

export const DEFAULT_CONFIG: AppConfig = {
  adbPath: 'adb',
  commandTimeoutMs: 15000,
  fetchTimeoutMs: 10000,
  maxManifestBytes: 512 * 1024,
  userAgent: 'applinks-diagnostics-mcp',
  logLevel: 'info',
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvironmentSchema.safeParse(env);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(String(issue.path[0] ?? 'environment'), issue.message);
  }

  const values = parsed.data;
  return {
    adbPath: values.APPLINKS_ADB_PATH,
    commandTimeoutMs: values.APPLINKS_COMMAND_TIMEOUT_MS,
    fetchTimeoutMs: values.APPLINKS_FETCH_TIMEOUT_MS,
    maxManifestBytes: values.APPLINKS_MAX_MANIFEST_BYTES,
    userAgent: values.APPLINKS_USER_AGENT,
    logLevel: values.APPLINKS_LOG_LEVEL,
  };
}
