import type { BulkConnection, ConnectionFactory, ExchangeResult } from '../../domain/ports/ConnectionFactory.js';
import { ConfigurationError } from '../../domain/errors/LoaderErrors.js';
import { basicAuthHeader, readCredentials } from './readCredentials.js';

export const NDJSON_CONTENT_TYPE = 'application/x-ndjson; charset=utf-8';

const UNKNOWN_HOST_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN']);

export interface HttpConnectionFactoryOptions {
  /** Request timeout in milliseconds. Default: `60000`. */
  readonly timeout?: number;
  /** `refresh` parameter of the bulk request. Default: `'wait_for'`. */
  readonly refresh?: 'true' | 'false' | 'wait_for';
}

/**
 * Opens bulk connections to `<url>/<index>/_bulk` using the Fetch API.
 *
 * Requires a runtime with global `fetch` (Node.js >= 18).
 */
export class HttpConnectionFactory implements ConnectionFactory {
  readonly bulkUrl: string;
  private readonly hostName: string;
  private readonly timeout: number;
  private authHeader: string | undefined;

  constructor(url: string, index: string, options?: HttpConnectionFactoryOptions) {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      throw new ConfigurationError(`Invalid store URL: ${url}`);
    }

    const base = url.replace(/\/+$/, '');
    const refresh = options?.refresh ?? 'wait_for';
    this.bulkUrl = `${base}/${encodeURIComponent(index)}/_bulk?refresh=${refresh}`;
    this.hostName = parsed.hostname;
    this.timeout = options?.timeout ?? 60000;
  }

  /** Read the credentials file once; every connection then authenticates with basic auth. */
  initAuth(authFile: string | undefined): void {
    if (!authFile) return;
    this.authHeader = basicAuthHeader(readCredentials(authFile));
  }

  getHostName(): string {
    return this.hostName;
  }

  createConnection(): BulkConnection {
    const headers: Record<string, string> = { 'content-type': NDJSON_CONTENT_TYPE };
    if (this.authHeader) headers['authorization'] = this.authHeader;

    return new HttpBulkConnection(this.bulkUrl, this.hostName, headers, this.timeout);
  }
}

class HttpBulkConnection implements BulkConnection {
  private readonly chunks: string[] = [];
  private sent = false;

  constructor(
    private readonly url: string,
    private readonly hostName: string,
    private readonly headers: Readonly<Record<string, string>>,
    private readonly timeout: number,
  ) {}

  write(text: string): void {
    if (this.sent) throw new Error('Bulk connection already exchanged');
    this.chunks.push(text);
  }

  async exchange(): Promise<ExchangeResult> {
    if (this.sent) throw new Error('Bulk connection already exchanged');
    this.sent = true;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.timeout);

    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers: this.headers,
        body: this.chunks.join(''),
        signal: controller.signal,
      });

      if (!response.ok) {
        return {
          ok: false,
          failure: { kind: 'http', status: response.status, url: this.url, errorBody: await readBody(response) },
        };
      }

      return { ok: true, status: response.status, body: await response.text() };
    } catch (error) {
      if (isUnknownHost(error)) {
        return { ok: false, failure: { kind: 'unknown-host', host: this.hostName } };
      }
      return { ok: false, failure: { kind: 'io', error: error instanceof Error ? error : new Error(String(error)) } };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

async function readBody(response: Response): Promise<string | null> {
  try {
    return await response.text();
  } catch {
    return null;
  }
}

/** `fetch` reports DNS failures as a `TypeError` whose `cause` carries the system error code. */
function isUnknownHost(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const cause: unknown = error.cause;
  if (typeof cause !== 'object' || cause === null || !('code' in cause)) return false;
  return typeof cause.code === 'string' && UNKNOWN_HOST_CODES.has(cause.code);
}
