/**
 * Classification of one bulk response item.
 *
 * `tolerated-conflict` is a `create` rejected with 409 because the document
 * already exists. It is subtracted from the persisted count but is not a failure:
 * `create` is used to insert only the documents that are missing.
 */
export type ItemOutcome =
  | { readonly kind: 'success' }
  | { readonly kind: 'tolerated-conflict'; readonly id: string | undefined }
  | { readonly kind: 'error'; readonly id: string | undefined; readonly reason: string };

/** A record the store refused to persist. */
export interface RecordFailure {
  readonly id: string | undefined;
  readonly reason: string;
}
