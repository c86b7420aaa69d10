import { Logger } from './logger.js';
import { httpRequest } from './http.js';
import { NetworkError } from '../types/errors.js';
import type { IpResolver, Result } from '../types/index.js';

export interface IpDetectorOptions {
  url: string;
  timeout: number;
}

export class IpDetector implements IpResolver {
  constructor(
    private readonly options: IpDetectorOptions,
    private readonly logger: Logger
  ) {}

  async resolve(): Promise<Result<string, NetworkError>> {
    const { url, timeout } = this.options;

    this.logger.debug('Starting IP detection', { service: url });

    const response = await httpRequest(url, { method: 'GET', timeout });

    if (!response.success) {
      return response;
    }

    const { statusCode, body } = response.data;

    if (statusCode !== 200) {
      return {
        success: false,
        error: new NetworkError(`IP echo service responded with HTTP ${statusCode}`, url)
      };
    }

    // Plain text body, newline terminated
    const ip = body.trim();

    if (!ip) {
      return { success: false, error: new NetworkError('IP echo service returned an empty response', url) };
    }

    this.logger.debug('IP detected', { service: url, ip });

    return { success: true, data: ip };
  }
}
