import { pino } from 'pino';
import type { Logger } from 'pino';

export interface LogEntry {
  readonly level: number;
  readonly msg: string;
  readonly id?: string;
  readonly reason?: string;
  readonly totalRecords?: number;
}

export const LEVEL_INFO = 30;
export const LEVEL_ERROR = 50;

/** pino logger that keeps every entry in memory instead of writing to stdout. */
export function createCapturingLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(msg: string) {
        entries.push(JSON.parse(msg) as LogEntry);
      },
    },
  );
  return { logger, entries };
}

/** `count` records as alternating key and data lines: `doc-0`, `doc-1`, ... */
export function njsonLines(count: number, action: 'index' | 'create' = 'index'): string[] {
  const lines: string[] = [];
  for (let i = 0; i < count; i++) {
    lines.push(`{"${action}":{"_id":"doc-${String(i)}"}}`);
    lines.push(`{"title":"Document ${String(i)}"}`);
  }
  return lines;
}

/** The same records as `njsonLines`, joined into file content with a trailing newline. */
export function njsonText(count: number): string {
  return njsonLines(count).map((line) => `${line}\n`).join('');
}

/** A bulk response reporting errors, built from item objects. */
export function bulkResponseWithErrors(items: readonly object[]): string {
  return JSON.stringify({ took: 5, errors: true, items });
}
