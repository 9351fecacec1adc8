import { z } from 'zod';
import { ConfigurationError } from './domain/errors/LoaderErrors.js';

/**
 * Settings schema for a `DataLoader`.
 */
export const LoaderSettingsSchema = z.object({
  /** Base URL of the search store, e.g. `http://localhost:9200` */
  url: z.string().url(),

  /** Index (collection) the records are written to */
  index: z.string().min(1),

  /** Credentials file with `user` and `password` entries. No authentication when omitted. */
  authFile: z.string().min(1).optional(),

  /** Records per bulk request */
  batchSize: z.number().int().positive().default(100),

  /** Log progress every N persisted records */
  printProgressSize: z.number().int().positive().default(500),

  /** Request timeout in milliseconds */
  requestTimeout: z.number().positive().default(60000),

  /** `refresh` parameter of the bulk request */
  refresh: z.enum(['true', 'false', 'wait_for']).default('wait_for'),
});

export type LoaderSettings = z.infer<typeof LoaderSettingsSchema>;

/** Settings as accepted from callers, before defaults are applied. */
export type LoaderSettingsInput = z.input<typeof LoaderSettingsSchema>;

/**
 * Validate settings and apply defaults.
 *
 * @throws ConfigurationError listing every invalid setting.
 */
export function parseSettings(input: LoaderSettingsInput): LoaderSettings {
  const result = LoaderSettingsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid loader settings: ${issues.join('; ')}`);
  }
  return result.data;
}
