/**
 * Why a bulk exchange failed before a usable response was received.
 *
 * - `unknown-host`: the store host name did not resolve.
 * - `io`: the request failed without an HTTP status (connection refused, reset, timeout).
 * - `http`: the store answered with a non-2xx status. `errorBody` is `null` when no body could be read.
 */
export type TransportFailure =
  | { readonly kind: 'unknown-host'; readonly host: string }
  | { readonly kind: 'io'; readonly error: Error }
  | {
      readonly kind: 'http';
      readonly status: number;
      readonly url: string;
      readonly errorBody: string | null;
    };

/** Result of one bulk exchange. Connections report failures through this value instead of rejecting. */
export type ExchangeResult =
  | { readonly ok: true; readonly status: number; readonly body: string }
  | { readonly ok: false; readonly failure: TransportFailure };

/**
 * A single-use connection carrying one bulk request.
 *
 * The write phase and the exchange phase never overlap: the body is written
 * with `write()`, then `exchange()` closes it, sends it and reads the response.
 * A connection abandoned before `exchange()` sends nothing.
 */
export interface BulkConnection {
  write(text: string): void;
  exchange(): Promise<ExchangeResult>;
}

/** Opens bulk connections to the store. Authentication is the factory's concern. */
export interface ConnectionFactory {
  createConnection(): BulkConnection;
  /** Host name of the store, for diagnostics. */
  getHostName(): string;
}
