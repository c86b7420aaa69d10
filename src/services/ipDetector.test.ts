import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { IpDetector } from './ipDetector.js';
import { Logger } from './logger.js';
import { NetworkError } from '../types/errors.js';
import { silentConsole, startDroppingServer, startStubServer, type StubServer } from '../test-utils/stubServer.js';

describe('IpDetector', () => {
  let server: StubServer;
  let logger: Logger;

  beforeEach(async () => {
    logger = new Logger({ console: silentConsole() });
    server = await startStubServer((app) => {
      app.get('/', (_req, res) => {
        res.type('text/plain').send('203.0.113.7\n');
      });
      app.get('/opaque', (_req, res) => {
        res.type('text/plain').send('  not-an-address  ');
      });
      app.get('/blank', (_req, res) => {
        res.type('text/plain').send(' \n');
      });
      app.get('/down', (_req, res) => {
        res.status(503).send('Service Unavailable');
      });
      app.get('/hang', () => {
        // never answers
      });
    });
  });

  afterEach(async () => {
    await server.close();
  });

  it('should return the trimmed response body', async () => {
    const detector = new IpDetector({ url: `${server.url}/`, timeout: 1000 }, logger);

    const result = await detector.resolve();

    expect(result).toEqual({ success: true, data: '203.0.113.7' });
    expect(server.requests).toHaveLength(1);
    expect(server.requests[0].method).toBe('GET');
    expect(server.requests[0].path).toBe('/');
  });

  it('should accept any non-empty text without validating it', async () => {
    const detector = new IpDetector({ url: `${server.url}/opaque`, timeout: 1000 }, logger);

    const result = await detector.resolve();

    expect(result).toEqual({ success: true, data: 'not-an-address' });
  });

  it('should fail on an empty body', async () => {
    const detector = new IpDetector({ url: `${server.url}/blank`, timeout: 1000 }, logger);

    const result = await detector.resolve();

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(NetworkError);
      expect(result.error.message).toBe('IP echo service returned an empty response');
    }
  });

  it('should fail on a non-200 status', async () => {
    const detector = new IpDetector({ url: `${server.url}/down`, timeout: 1000 }, logger);

    const result = await detector.resolve();

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('IP echo service responded with HTTP 503');
      expect(result.error.url).toBe(`${server.url}/down`);
    }
  });

  it('should fail when the connection drops', async () => {
    const dropping = await startDroppingServer();

    try {
      const url = `${dropping.url}/`;
      const detector = new IpDetector({ url, timeout: 1000 }, logger);

      const result = await detector.resolve();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(NetworkError);
        expect(result.error.code).toBe('NETWORK_ERROR');
        expect(result.error.url).toBe(url);
      }
    } finally {
      await dropping.close();
    }
  });

  it('should fail when the service does not answer in time', async () => {
    const detector = new IpDetector({ url: `${server.url}/hang`, timeout: 50 }, logger);

    const result = await detector.resolve();

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe(`GET ${server.url}/hang failed: Request timeout after 50ms`);
    }
  });
});
