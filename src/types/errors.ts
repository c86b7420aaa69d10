export type DdnsErrorCode = 'CONFIG_ERROR' | 'NETWORK_ERROR' | 'UPDATE_REJECTED';

export abstract class DdnsError extends Error {
  abstract readonly code: DdnsErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The configuration document or the environment could not be read, parsed
 * or written.
 */
export class ConfigError extends DdnsError {
  readonly code = 'CONFIG_ERROR';
}

/**
 * An HTTP call did not complete: connection failure, timeout, or a response
 * the caller cannot use.
 */
export class NetworkError extends DdnsError {
  readonly code = 'NETWORK_ERROR';

  constructor(
    message: string,
    readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class UpdateRejectedError extends DdnsError {
  readonly code = 'UPDATE_REJECTED';

  constructor(readonly domain: string) {
    super(`DNS provider rejected the 'A' record update for ${domain}`);
  }
}
