/** Metadata about the data source, used for logging. */
export interface SourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
}

/**
 * Port for reading NJSON text from any origin (file, buffer, stream).
 *
 * `read()` yields raw chunks; chunk boundaries carry no meaning and may fall
 * in the middle of a line. Breaking out of the iteration must release the
 * underlying resource.
 */
export interface DataSource {
  /** Yield data chunks as strings or Buffers for lazy/streaming consumption. */
  read(): AsyncIterable<string | Buffer>;
  /** Return metadata about the source (file name, size). */
  metadata(): SourceMetadata;
}
