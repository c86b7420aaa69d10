import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { PorkbunService, RECORD_TTL } from './porkbun.js';
import { Logger, LogLevel } from './logger.js';
import { NetworkError } from '../types/errors.js';
import { silentConsole, startDroppingServer, startStubServer, type StubServer } from '../test-utils/stubServer.js';

const credentials = { apiKey: 'test-key', secretApiKey: 'test-secret' };

describe('PorkbunService', () => {
  let server: StubServer;
  let logger: Logger;

  beforeEach(async () => {
    logger = new Logger({ console: silentConsole() });
    server = await startStubServer((app) => {
      app.post('/api/json/v3/dns/editByNameType/home.example.com/A/', (_req, res) => {
        res.status(200).json({ status: 'SUCCESS' });
      });
      app.post('/api/json/v3/dns/editByNameType/unchanged.example.com/A/', (_req, res) => {
        res.status(400).json({ status: 'ERROR', message: 'Edit error: We were unable to edit the DNS record.' });
      });
    });
  });

  afterEach(async () => {
    await server.close();
  });

  it('should use the minimum TTL', () => {
    expect(RECORD_TTL).toBe(600);
  });

  it('should post the new address to the edit-by-name-and-type endpoint', async () => {
    const service = new PorkbunService({ baseUrl: `${server.url}/api/json/v3`, timeout: 1000 }, logger);

    const result = await service.update('home.example.com', credentials, '198.51.100.4');

    expect(result).toEqual({ success: true, data: true });
    expect(server.requests).toHaveLength(1);

    const [request] = server.requests;
    expect(request.method).toBe('POST');
    expect(request.path).toBe('/api/json/v3/dns/editByNameType/home.example.com/A/');
    expect(request.contentType).toBe('application/json');
    expect(JSON.parse(request.body)).toEqual({
      apikey: 'test-key',
      secretapikey: 'test-secret',
      content: '198.51.100.4',
      ttl: 600
    });
  });

  it('should report false for any status other than 200', async () => {
    const service = new PorkbunService({ baseUrl: `${server.url}/api/json/v3`, timeout: 1000 }, logger);

    const result = await service.update('unchanged.example.com', credentials, '198.51.100.4');

    expect(result).toEqual({ success: true, data: false });
  });

  it('should report false when the record path is unknown', async () => {
    const service = new PorkbunService({ baseUrl: `${server.url}/api/json/v3`, timeout: 1000 }, logger);

    const result = await service.update('missing.example.com', credentials, '198.51.100.4');

    expect(result).toEqual({ success: true, data: false });
  });

  it('should return a network error when the connection drops', async () => {
    const dropping = await startDroppingServer();

    try {
      const baseUrl = `${dropping.url}/api/json/v3`;
      const service = new PorkbunService({ baseUrl, timeout: 1000 }, logger);

      const result = await service.update('home.example.com', credentials, '198.51.100.4');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(NetworkError);
        expect(result.error.url).toBe(`${baseUrl}/dns/editByNameType/home.example.com/A/`);
      }
    } finally {
      await dropping.close();
    }
  });

  it('should not log the secret key', async () => {
    const console = silentConsole();
    const service = new PorkbunService(
      { baseUrl: `${server.url}/api/json/v3`, timeout: 1000 },
      new Logger({ console, level: LogLevel.DEBUG })
    );

    await service.update('home.example.com', credentials, '198.51.100.4');

    const lines = console.log.mock.calls.map(([line]) => String(line));
    expect(lines.some(line => line.includes('test-secret'))).toBe(false);
    expect(lines.some(line => line.includes('"apiKey":"********"'))).toBe(true);
  });
});
