import { describe, it, expect, vi, beforeEach, afterEach, beforeAll, afterAll } from 'vitest';
import { writeFileSync, mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { HttpConnectionFactory, NDJSON_CONTENT_TYPE } from '../../../src/infrastructure/transport/HttpConnectionFactory.js';
import { ConfigurationError } from '../../../src/domain/errors/LoaderErrors.js';

const TEST_DIR = join(tmpdir(), 'ndjson-loader-test-http');
const BULK_URL = 'http://search.test:9200/registry/_bulk?refresh=wait_for';

const mockFetch = vi.fn();

beforeAll(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal('fetch', mockFetch);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

function dnsFailure(host: string): TypeError {
  const cause = Object.assign(new Error(`getaddrinfo ENOTFOUND ${host}`), { code: 'ENOTFOUND' });
  return new TypeError('fetch failed', { cause });
}

describe('HttpConnectionFactory', () => {
  describe('constructor', () => {
    it('should build the bulk endpoint from url and index', () => {
      expect(new HttpConnectionFactory('http://search.test:9200', 'registry').bulkUrl).toBe(BULK_URL);
    });

    it('should drop trailing slashes from the url', () => {
      expect(new HttpConnectionFactory('http://search.test:9200/', 'registry').bulkUrl).toBe(BULK_URL);
    });

    it('should use the configured refresh policy', () => {
      const factory = new HttpConnectionFactory('http://search.test:9200', 'registry', { refresh: 'false' });

      expect(factory.bulkUrl).toBe('http://search.test:9200/registry/_bulk?refresh=false');
    });

    it('should expose the host name', () => {
      expect(new HttpConnectionFactory('https://es.example.org:9243', 'registry').getHostName()).toBe('es.example.org');
    });

    it('should reject an invalid url', () => {
      expect(() => new HttpConnectionFactory('not a url', 'registry')).toThrow(ConfigurationError);
    });
  });

  describe('exchange()', () => {
    it('should POST the written body as NDJSON', async () => {
      mockFetch.mockResolvedValue(new Response('{"errors":false}', { status: 200 }));
      const connection = new HttpConnectionFactory('http://search.test:9200', 'registry').createConnection();

      connection.write('{"index":{"_id":"1"}}\n{"a":1}\n');
      connection.write('{"index":{"_id":"2"}}\n{"a":2}\n');
      const result = await connection.exchange();

      expect(result).toEqual({ ok: true, status: 200, body: '{"errors":false}' });
      expect(mockFetch).toHaveBeenCalledOnce();
      expect(mockFetch).toHaveBeenCalledWith(
        BULK_URL,
        expect.objectContaining({
          method: 'POST',
          headers: { 'content-type': NDJSON_CONTENT_TYPE },
          body: '{"index":{"_id":"1"}}\n{"a":1}\n{"index":{"_id":"2"}}\n{"a":2}\n',
        }),
      );
    });

    it('should send basic auth read from the credentials file', async () => {
      const authFile = join(TEST_DIR, 'auth.cfg');
      writeFileSync(authFile, 'user = loader\npassword = test-secret\n', 'utf-8');
      mockFetch.mockResolvedValue(new Response('{"errors":false}', { status: 200 }));

      const factory = new HttpConnectionFactory('http://search.test:9200', 'registry');
      factory.initAuth(authFile);
      await factory.createConnection().exchange();

      const expected = `Basic ${Buffer.from('loader:test-secret').toString('base64')}`;
      expect(mockFetch).toHaveBeenCalledWith(
        BULK_URL,
        expect.objectContaining({ headers: { 'content-type': NDJSON_CONTENT_TYPE, authorization: expected } }),
      );
    });

    it('should report a non-2xx response with its body', async () => {
      mockFetch.mockResolvedValue(new Response('{"error":{"reason":"no such index"}}', { status: 404 }));
      const connection = new HttpConnectionFactory('http://search.test:9200', 'registry').createConnection();

      const result = await connection.exchange();

      expect(result).toEqual({
        ok: false,
        failure: { kind: 'http', status: 404, url: BULK_URL, errorBody: '{"error":{"reason":"no such index"}}' },
      });
    });

    it('should report an unresolvable host', async () => {
      mockFetch.mockRejectedValue(dnsFailure('search.test'));
      const connection = new HttpConnectionFactory('http://search.test:9200', 'registry').createConnection();

      expect(await connection.exchange()).toEqual({ ok: false, failure: { kind: 'unknown-host', host: 'search.test' } });
    });

    it('should report other network errors as I/O failures', async () => {
      const refused = new TypeError('fetch failed', {
        cause: Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:9200'), { code: 'ECONNREFUSED' }),
      });
      mockFetch.mockRejectedValue(refused);
      const connection = new HttpConnectionFactory('http://search.test:9200', 'registry').createConnection();

      expect(await connection.exchange()).toEqual({ ok: false, failure: { kind: 'io', error: refused } });
    });

    it('should abort a request that exceeds the timeout', async () => {
      mockFetch.mockImplementation(
        (_url: string, init: RequestInit) =>
          new Promise((_resolve, reject) => {
            init.signal?.addEventListener('abort', () => {
              reject(new Error('This operation was aborted'));
            });
          }),
      );
      const connection = new HttpConnectionFactory('http://search.test:9200', 'registry', { timeout: 5 }).createConnection();

      const result = await connection.exchange();

      expect(result.ok).toBe(false);
      expect(!result.ok && result.failure.kind).toBe('io');
    });

    it('should refuse to be exchanged twice', async () => {
      mockFetch.mockResolvedValue(new Response('{"errors":false}', { status: 200 }));
      const connection = new HttpConnectionFactory('http://search.test:9200', 'registry').createConnection();

      await connection.exchange();

      await expect(connection.exchange()).rejects.toThrow('Bulk connection already exchanged');
    });
  });
});
