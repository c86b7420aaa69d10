import { z } from 'zod';
import { ConfigError } from './types/errors.js';
import { LogLevel } from './services/logger.js';

const DEFAULT_CONFIG_FILE = 'config.json';
const DEFAULT_LOG_FILE = 'porkbun-ddns.log';
const DEFAULT_IP_ECHO_URL = 'https://ipv4.icanhazip.com/';
const DEFAULT_PORKBUN_API_URL = 'https://api-ipv4.porkbun.com/api/json/v3';
const DEFAULT_HEALTHCHECKS_URL = 'https://hc-ping.com';
const DEFAULT_HTTP_TIMEOUT_MS = 10000;

// Blank lines copied from .env.example arrive as ''
function unsetWhenBlank<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(value => (value === '' ? undefined : value), schema);
}

const EnvSchema = z.object({
  CONFIG_FILE: unsetWhenBlank(z.string().default(DEFAULT_CONFIG_FILE)),
  // An empty LOG_FILE turns the file sink off
  LOG_FILE: z.string().default(DEFAULT_LOG_FILE),
  LOG_LEVEL: unsetWhenBlank(
    z
      .string()
      .transform(value => value.toUpperCase())
      .pipe(z.nativeEnum(LogLevel))
      .default('INFO')
  ),
  IP_ECHO_URL: unsetWhenBlank(z.string().url().default(DEFAULT_IP_ECHO_URL)),
  PORKBUN_API_URL: unsetWhenBlank(z.string().url().default(DEFAULT_PORKBUN_API_URL)),
  HEALTHCHECKS_URL: unsetWhenBlank(z.string().url().default(DEFAULT_HEALTHCHECKS_URL)),
  HTTP_TIMEOUT_MS: unsetWhenBlank(z.coerce.number().int().positive().default(DEFAULT_HTTP_TIMEOUT_MS))
});

export interface Settings {
  configFile: string;
  logFile: string | undefined;
  logLevel: LogLevel;
  ipEchoUrl: string;
  porkbunApiUrl: string;
  healthchecksUrl: string;
  httpTimeoutMs: number;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment: ${issues}`);
  }

  const vars = parsed.data;

  return {
    configFile: vars.CONFIG_FILE,
    logFile: vars.LOG_FILE || undefined,
    logLevel: vars.LOG_LEVEL,
    ipEchoUrl: vars.IP_ECHO_URL,
    porkbunApiUrl: vars.PORKBUN_API_URL.replace(/\/+$/, ''),
    healthchecksUrl: vars.HEALTHCHECKS_URL.replace(/\/+$/, ''),
    httpTimeoutMs: vars.HTTP_TIMEOUT_MS,
  };
}
