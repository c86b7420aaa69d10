import type { NetworkError } from './errors.js';

export interface Config {
  apiKey?: string;
  secretApiKey?: string;
  domain: string;
  lastIP: string;
  healthchecksUUID: string;
  /** Keys the document carries that the updater does not use. */
  extra: Record<string, string>;
}

export interface Credentials {
  apiKey: string;
  secretApiKey: string;
}

export type Result<T, E> =
  | { success: true; data: T }
  | { success: false; error: E };

export interface IpResolver {
  resolve(): Promise<Result<string, NetworkError>>;
}

export interface DnsRecordUpdater {
  readonly name: string;

  update(domain: string, credentials: Credentials, newIp: string): Promise<Result<boolean, NetworkError>>;
}

export interface LivenessReporter {
  ping(identifier: string, message: string): Promise<Result<void, NetworkError>>;
}

export interface ConfigRepository {
  readonly path: string;

  load(): Config;
  save(config: Config): void;
}

export interface RunResult {
  exitCode: number;
  ipChanged: boolean;
  currentIp: string | null;
  message: string;
}
