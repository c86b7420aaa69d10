import { Logger } from './logger.js';
import { httpRequest } from './http.js';
import type { NetworkError } from '../types/errors.js';
import type { LivenessReporter, Result } from '../types/index.js';

export interface HealthchecksServiceOptions {
  baseUrl: string;
  timeout: number;
}

// https://healthchecks.io/docs/http_api/
export class HealthchecksService implements LivenessReporter {
  constructor(
    private readonly options: HealthchecksServiceOptions,
    private readonly logger: Logger
  ) {}

  async ping(identifier: string, message: string): Promise<Result<void, NetworkError>> {
    // Either a check UUID or `<ping-key>/<slug>`; both go into the path verbatim
    const url = `${this.options.baseUrl}/${identifier}`;

    const response = await httpRequest(url, {
      method: 'POST',
      timeout: this.options.timeout,
      body: message,
      contentType: 'text/plain; charset=utf-8'
    });

    if (!response.success) {
      return response;
    }

    this.logger.debug('Healthchecks ping sent', { statusCode: response.data.statusCode });

    return { success: true, data: undefined };
  }
}
