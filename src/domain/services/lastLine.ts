/**
 * Return the last line of a (possibly multi-line) response body, or `null` when
 * the body has no lines at all. A trailing line terminator does not start a new line.
 */
export function lastLine(text: string | null | undefined): string | null {
  if (!text) return null;

  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') lines.pop();

  return lines.length > 0 ? (lines[lines.length - 1] ?? null) : null;
}
