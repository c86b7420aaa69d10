import { Logger } from './logger.js';
import { httpRequest } from './http.js';
import { SecurityService } from './security.js';
import type { NetworkError } from '../types/errors.js';
import type { Credentials, DnsRecordUpdater, Result } from '../types/index.js';

/**
 * Porkbun's minimum (and default) TTL, in seconds.
 */
export const RECORD_TTL = 600;

interface EditRecordPayload {
  apikey: string;
  secretapikey: string;
  content: string;
  ttl: number;
}

export interface PorkbunServiceOptions {
  baseUrl: string;
  timeout: number;
}

/**
 * Edits an existing 'A' record through the Porkbun JSON API (v3). Records are
 * never created here.
 */
export class PorkbunService implements DnsRecordUpdater {
  readonly name = 'porkbun';

  constructor(
    private readonly options: PorkbunServiceOptions,
    private readonly logger: Logger
  ) {}

  async update(domain: string, credentials: Credentials, newIp: string): Promise<Result<boolean, NetworkError>> {
    const url = `${this.options.baseUrl}/dns/editByNameType/${domain}/A/`;

    const payload: EditRecordPayload = {
      apikey: credentials.apiKey,
      secretapikey: credentials.secretApiKey,
      content: newIp,
      ttl: RECORD_TTL
    };

    this.logger.debug('Updating DNS record', {
      url,
      apiKey: SecurityService.maskSecret(credentials.apiKey),
      content: newIp,
      ttl: RECORD_TTL
    });

    const response = await httpRequest(url, {
      method: 'POST',
      timeout: this.options.timeout,
      body: JSON.stringify(payload),
      contentType: 'application/json'
    });

    if (!response.success) {
      return response;
    }

    const { statusCode, body } = response.data;

    if (statusCode !== 200) {
      this.logger.debug('Porkbun API returned an error status', { statusCode, body });
      return { success: true, data: false };
    }

    return { success: true, data: true };
  }
}
