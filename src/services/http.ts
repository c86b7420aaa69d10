import http from 'http';
import https from 'https';
import { NetworkError } from '../types/errors.js';
import type { Result } from '../types/index.js';

export interface HttpRequestOptions {
  method: 'GET' | 'POST';
  timeout: number;
  body?: string;
  contentType?: string;
}

export interface HttpResponse {
  statusCode: number;
  body: string;
}

/**
 * Perform a single request. Any status code counts as a completed request;
 * only transport failures come back as errors.
 */
export function httpRequest(url: string, options: HttpRequestOptions): Promise<Result<HttpResponse, NetworkError>> {
  return new Promise(resolve => {
    let urlObj: URL;

    try {
      urlObj = new URL(url);
    } catch (error) {
      resolve({ success: false, error: new NetworkError(`Invalid URL: ${url}`, url, { cause: error }) });
      return;
    }

    const headers: http.OutgoingHttpHeaders = {};

    if (options.body !== undefined) {
      headers['Content-Type'] = options.contentType ?? 'text/plain';
      headers['Content-Length'] = Buffer.byteLength(options.body);
    }

    const requestOptions: https.RequestOptions = {
      method: options.method,
      // IPv4 only: the echo service reports the address family we connect over
      family: 4,
      timeout: options.timeout,
      headers
    };

    const onResponse = (response: http.IncomingMessage): void => {
      let data = '';

      response.setEncoding('utf8');

      response.on('data', (chunk: string) => {
        data += chunk;
      });

      response.on('end', () => {
        resolve({
          success: true,
          data: { statusCode: response.statusCode ?? 0, body: data }
        });
      });

      response.on('error', (error) => {
        resolve({ success: false, error: new NetworkError(`Response failed: ${error.message}`, url, { cause: error }) });
      });
    };

    const request = urlObj.protocol === 'https:'
      ? https.request(urlObj, requestOptions, onResponse)
      : http.request(urlObj, requestOptions, onResponse);

    request.on('timeout', () => {
      request.destroy(new Error(`Request timeout after ${options.timeout}ms`));
    });

    request.on('error', (error) => {
      resolve({ success: false, error: new NetworkError(`${options.method} ${url} failed: ${error.message}`, url, { cause: error }) });
    });

    if (options.body !== undefined) {
      request.write(options.body);
    }

    request.end();
  });
}
