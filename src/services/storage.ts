import fs from 'fs';
import { z } from 'zod';
import { ConfigError } from '../types/errors.js';
import type { Config, ConfigRepository, Credentials } from '../types/index.js';

// On-disk key names are fixed by existing deployments
const ConfigDocument = z
  .object({
    apikey: z.string().optional(),
    secretapikey: z.string().optional(),
    domain: z.string().min(1, 'domain must not be empty'),
    lastIP: z.string().default(''),
    healthchecksUUID: z.string().default('')
  })
  .catchall(z.string());

export class ConfigStore implements ConfigRepository {
  constructor(readonly path: string) {}

  load(): Config {
    let data: string;

    try {
      data = fs.readFileSync(this.path, 'utf8');
    } catch (error) {
      throw new ConfigError(`Failed to read configuration from ${this.path}: ${describe(error)}`, { cause: error });
    }

    let raw: unknown;

    try {
      raw = JSON.parse(data);
    } catch (error) {
      throw new ConfigError(`Configuration at ${this.path} is not valid JSON: ${describe(error)}`, { cause: error });
    }

    const parsed = ConfigDocument.safeParse(raw);

    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
      throw new ConfigError(`Invalid configuration in ${this.path}: ${issues}`);
    }

    const { apikey, secretapikey, domain, lastIP, healthchecksUUID, ...extra } = parsed.data;

    return {
      apiKey: apikey,
      secretApiKey: secretapikey,
      domain,
      lastIP,
      healthchecksUUID,
      extra
    };
  }

  save(config: Config): void {
    const document: Record<string, string> = { ...config.extra };

    if (config.apiKey !== undefined) {
      document.apikey = config.apiKey;
    }

    if (config.secretApiKey !== undefined) {
      document.secretapikey = config.secretApiKey;
    }

    document.domain = config.domain;
    document.lastIP = config.lastIP;
    document.healthchecksUUID = config.healthchecksUUID;

    try {
      fs.writeFileSync(this.path, `${JSON.stringify(document, null, 2)}\n`);
    } catch (error) {
      throw new ConfigError(`Failed to write configuration to ${this.path}: ${describe(error)}`, { cause: error });
    }
  }

  static getCredentials(config: Config): Credentials {
    const { apiKey, secretApiKey } = config;

    if (!apiKey || !secretApiKey) {
      const missing = [apiKey ? null : 'apikey', secretApiKey ? null : 'secretapikey'].filter(Boolean);
      throw new ConfigError(`Missing API credentials in configuration: ${missing.join(', ')}`);
    }

    return { apiKey, secretApiKey };
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
