import { InputContractError } from '../errors/LoaderErrors.js';

/**
 * One NJSON record: the bulk action/key line followed by the document line.
 * Both are opaque JSON text; the loader never looks inside them.
 */
export interface NjsonRecord {
  readonly keyLine: string;
  readonly dataLine: string;
}

/** Render a record the way the bulk endpoint expects it: two newline-terminated lines. */
export function toWireLines(record: NjsonRecord): string {
  return `${record.keyLine}\n${record.dataLine}\n`;
}

/**
 * Pair a flat list of lines into records.
 *
 * @throws InputContractError when the list has an odd number of lines.
 */
export function pairLines(lines: readonly string[]): NjsonRecord[] {
  if (lines.length % 2 !== 0) {
    throw new InputContractError('Data list size should be an even number.');
  }

  const records: NjsonRecord[] = [];
  for (let i = 0; i < lines.length; i += 2) {
    records.push({ keyLine: lines[i] ?? '', dataLine: lines[i + 1] ?? '' });
  }
  return records;
}
