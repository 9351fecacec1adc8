import type { TransportFailure } from '../ports/ConnectionFactory.js';
import { ErrorBodySchema } from '../model/BulkResponse.js';
import { TransportError, UnknownHostError } from '../errors/LoaderErrors.js';
import { lastLine } from './lastLine.js';

/**
 * Extract a human-readable reason from a JSON error body.
 * Returns `null` when the text is not JSON or carries no reason.
 */
export function extractReason(json: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return null;
  }

  const decoded = ErrorBodySchema.safeParse(parsed);
  if (!decoded.success) return null;

  const { error } = decoded.data;
  return typeof error === 'string' ? error : error.reason;
}

/**
 * Turn a failed exchange into the error the load call fails with.
 *
 * Only the message is enriched here; every branch is fatal.
 */
export function classifyTransportFailure(failure: TransportFailure): Error {
  switch (failure.kind) {
    case 'unknown-host':
      return new UnknownHostError(failure.host);
    case 'io':
      return failure.error;
    case 'http': {
      const json = lastLine(failure.errorBody);
      if (json === null) {
        return new TransportError(
          `Server returned HTTP response code: ${String(failure.status)} for URL: ${failure.url}`,
          failure.status,
        );
      }
      return new TransportError(extractReason(json) ?? json, failure.status);
    }
  }
}
