import { z } from 'zod';

/** Result of a single bulk action (`index` or `create`) as reported by the store. */
export const BulkActionResultSchema = z.object({
  _id: z.string().optional(),
  /** Usually a number, but some clients re-render it as a string such as `"409.0"`. */
  status: z.union([z.number(), z.string()]).optional(),
  error: z
    .object({
      type: z.string().optional(),
      reason: z.string().optional(),
    })
    .passthrough()
    .optional(),
});

export type BulkActionResult = z.infer<typeof BulkActionResultSchema>;

/** One entry of the `items` list, keyed by the action that produced it. Other actions are ignored. */
export const BulkItemSchema = z
  .object({
    index: BulkActionResultSchema.optional(),
    create: BulkActionResultSchema.optional(),
  })
  .passthrough();

export type BulkItem = z.infer<typeof BulkItemSchema>;

export const BulkResponseSchema = z
  .object({
    errors: z.boolean().optional(),
    items: z.array(BulkItemSchema).optional(),
  })
  .passthrough();

export type BulkResponse = z.infer<typeof BulkResponseSchema>;

/** Error body of a rejected request, e.g. `{"error":{"reason":"..."},"status":400}`. */
export const ErrorBodySchema = z.object({
  error: z.union([z.string(), z.object({ reason: z.string() }).passthrough()]),
});
