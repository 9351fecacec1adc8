import { createReadStream, statSync } from 'node:fs';
import { basename } from 'node:path';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

export interface FilePathSourceOptions {
  /** Encoding for reading the file. Default: 'utf-8'. */
  readonly encoding?: BufferEncoding;
  /** Chunk size in bytes for streaming reads. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
}

/**
 * Data source that streams from a local file path using `createReadStream`. Node.js only.
 *
 * The stream is destroyed when the consumer stops iterating early.
 */
export class FilePathSource implements DataSource {
  private readonly filePath: string;
  private readonly encoding: BufferEncoding;
  private readonly highWaterMark: number;

  constructor(filePath: string, options?: FilePathSourceOptions) {
    this.filePath = filePath;
    this.encoding = options?.encoding ?? 'utf-8';
    this.highWaterMark = options?.highWaterMark ?? 65536;
  }

  async *read(): AsyncIterable<string> {
    const stream = createReadStream(this.filePath, {
      encoding: this.encoding,
      highWaterMark: this.highWaterMark,
    });

    try {
      for await (const chunk of stream) {
        yield String(chunk);
      }
    } finally {
      stream.destroy();
    }
  }

  metadata(): SourceMetadata {
    const stats = statSync(this.filePath);
    return {
      fileName: basename(this.filePath),
      fileSize: stats.size,
    };
  }
}
