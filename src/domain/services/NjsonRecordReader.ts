import type { NjsonRecord } from '../model/NjsonRecord.js';
import { InputContractError } from '../errors/LoaderErrors.js';

/**
 * Reads NJSON records (key line + data line) from a stream of text chunks.
 *
 * Lines are split on `\n` (a preceding `\r` is dropped) and a trailing line
 * terminator does not produce an extra empty line. The reader keeps a
 * single-line lookahead buffer so the loader can tell whether another batch
 * follows without consuming its first key line. `hasMore()` is that check and
 * treats a blank line as the end of input; inside a batch a blank key line is
 * an error unless it is the last line.
 *
 * `close()` must be called on every exit path; it returns the underlying
 * iterator, which releases file handles and stream readers.
 */
export class NjsonRecordReader {
  private readonly iterator: AsyncIterator<string | Buffer>;
  private readonly decoder = new TextDecoder('utf-8');
  private readonly pending: string[] = [];
  private readonly partial: string[] = [];
  private lineNumber = 0;
  private exhausted = false;
  private closed = false;
  private lookahead: string | null | undefined;

  constructor(chunks: AsyncIterable<string | Buffer>) {
    this.iterator = chunks[Symbol.asyncIterator]();
  }

  /** Return the next line without consuming it, or `null` at end of input. */
  async peekLine(): Promise<string | null> {
    if (this.lookahead === undefined) {
      this.lookahead = await this.nextLine();
    }
    return this.lookahead;
  }

  /** Consume and return the next line, or `null` at end of input. */
  async readLine(): Promise<string | null> {
    const line = await this.peekLine();
    this.lookahead = undefined;
    if (line !== null) this.lineNumber++;
    return line;
  }

  /** `true` when the next line exists and is not blank, i.e. another record follows. */
  async hasMore(): Promise<boolean> {
    const line = await this.peekLine();
    return line !== null && line !== '';
  }

  /**
   * Read the next record. Returns `null` at end of input, including a blank
   * last line.
   *
   * @throws InputContractError when a key line is blank or is not followed by a data line.
   */
  async readRecord(): Promise<NjsonRecord | null> {
    const keyLine = await this.readLine();
    if (keyLine === null) return null;

    if (keyLine === '') {
      if ((await this.peekLine()) === null) return null;
      throw new InputContractError(`Blank key line at line ${String(this.lineNumber)}`);
    }

    const dataLine = await this.readLine();
    if (dataLine === null) {
      throw new InputContractError('Premature end of input');
    }

    return { keyLine, dataLine };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.exhausted = true;
    this.pending.length = 0;
    if (this.iterator.return) {
      await this.iterator.return();
    }
  }

  private async nextLine(): Promise<string | null> {
    while (this.pending.length === 0) {
      if (this.exhausted) return null;
      await this.fill();
    }
    return this.pending.shift() ?? null;
  }

  private async fill(): Promise<void> {
    const { done, value } = await this.iterator.next();

    if (done) {
      this.exhausted = true;
      this.partial.push(this.decoder.decode());
      const rest = this.takePartial();
      if (rest !== '') this.pending.push(stripCarriageReturn(rest));
      return;
    }

    const text = typeof value === 'string' ? value : this.decoder.decode(value, { stream: true });
    let start = 0;
    for (let newline = text.indexOf('\n'); newline !== -1; newline = text.indexOf('\n', start)) {
      this.partial.push(text.slice(start, newline));
      this.pending.push(stripCarriageReturn(this.takePartial()));
      start = newline + 1;
    }
    if (start < text.length) this.partial.push(text.slice(start));
  }

  /** Join the pieces of the current line; a long line is assembled once, not per chunk. */
  private takePartial(): string {
    const line = this.partial.join('');
    this.partial.length = 0;
    return line;
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}
