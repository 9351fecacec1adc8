import { readFileSync } from 'node:fs';
import { ConfigurationError } from '../../domain/errors/LoaderErrors.js';

export interface Credentials {
  readonly user: string;
  readonly password: string;
}

/**
 * Parse a properties-style credentials file.
 *
 * Lines are `key = value` (or `key: value`); blank lines and lines starting
 * with `#` or `!` are ignored. `user` (or `username`) and `password` are required.
 */
export function parseCredentials(text: string, fileName = 'credentials file'): Credentials {
  const entries = new Map<string, string>();

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#') || line.startsWith('!')) continue;

    const match = /^([^=:\s]+)\s*[=:]\s*(.*)$/.exec(line);
    if (!match) continue;

    const [, key, value] = match;
    if (key !== undefined && value !== undefined) {
      entries.set(key.toLowerCase(), value.trim());
    }
  }

  const user = entries.get('user') ?? entries.get('username');
  const password = entries.get('password');
  if (!user || password === undefined) {
    throw new ConfigurationError(`${fileName}: 'user' and 'password' entries are required`);
  }

  return { user, password };
}

/** Read and parse a credentials file. */
export function readCredentials(filePath: string): Credentials {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Could not read credentials file ${filePath}: ${reason}`);
  }
  return parseCredentials(text, filePath);
}

/** Build the value of an `authorization` header for HTTP basic authentication. */
export function basicAuthHeader(credentials: Credentials): string {
  return `Basic ${Buffer.from(`${credentials.user}:${credentials.password}`, 'utf-8').toString('base64')}`;
}
