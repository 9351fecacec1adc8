import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

export interface StreamSourceOptions {
  /** File name for metadata. Default: 'stream-input'. */
  readonly fileName?: string;
  /** Size in bytes for metadata (if known). */
  readonly fileSize?: number;
}

/** Data source that wraps an `AsyncIterable` or `ReadableStream`, e.g. `process.stdin` or an upload. */
export class StreamSource implements DataSource {
  private readonly stream: AsyncIterable<string | Buffer> | ReadableStream<string | Uint8Array>;
  private readonly meta: SourceMetadata;
  private consumed = false;

  constructor(
    stream: AsyncIterable<string | Buffer> | ReadableStream<string | Uint8Array>,
    options?: StreamSourceOptions,
  ) {
    this.stream = stream;
    this.meta = {
      fileName: options?.fileName ?? 'stream-input',
      fileSize: options?.fileSize,
    };
  }

  async *read(): AsyncIterable<string | Buffer> {
    if (this.consumed) {
      throw new Error('StreamSource: stream has already been consumed. Streams can only be read once.');
    }
    this.consumed = true;

    if (this.isReadableStream(this.stream)) {
      yield* this.fromReadableStream(this.stream);
      return;
    }

    yield* this.stream;
  }

  metadata(): SourceMetadata {
    return this.meta;
  }

  private isReadableStream(
    stream: AsyncIterable<string | Buffer> | ReadableStream<string | Uint8Array>,
  ): stream is ReadableStream<string | Uint8Array> {
    return 'getReader' in stream && typeof stream.getReader === 'function';
  }

  private async *fromReadableStream(stream: ReadableStream<string | Uint8Array>): AsyncIterable<string | Buffer> {
    const reader = stream.getReader();
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        yield typeof value === 'string' ? value : Buffer.from(value);
      }
    } finally {
      await reader.cancel();
      reader.releaseLock();
    }
  }
}
