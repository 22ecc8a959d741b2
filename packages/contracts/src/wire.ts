/**
 * Wire Shapes
 *
 * Zod schemas for the few response shapes the client depends on. Everything
 * else the server returns is passed through untouched as JSON objects.
 */

import { z } from "zod";

/** A decoded JSON object */
export type JsonObject = Record<string, unknown>;

/** Entity ids are integers on most endpoints, UUID strings on a few. */
export const entityIdSchema = z.union([z.number(), z.string()]);

export type EntityId = z.infer<typeof entityIdSchema>;

/** Any response that names a created or referenced resource */
export const identifiedSchema = z.object({ id: entityIdSchema }).passthrough();

/** Paginated index responses */
export const resultsSchema = z
  .object({ results: z.array(z.record(z.unknown())) })
  .passthrough();

export type SearchResults = z.infer<typeof resultsSchema>;

/** A foreman task, as returned by GET foreman_tasks/api/tasks/:id */
export const taskSchema = z
  .object({
    id: entityIdSchema.optional(),
    state: z.string(),
    result: z.string().nullable().optional(),
    humanized: z
      .object({ errors: z.array(z.string()).optional() })
      .passthrough()
      .nullable()
      .optional(),
  })
  .passthrough();

export type TaskInfo = z.infer<typeof taskSchema>;

/** Narrows an unknown value to a plain JSON object. */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
