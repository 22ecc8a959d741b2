/**
 * Response Reshaping
 *
 * Several endpoints name a field differently in responses than in
 * requests. These helpers rewrite a decoded response into the shape
 * read() expects, or pick apart paginated index responses.
 */

import {
  APIResponseError,
  identifiedSchema,
  resultsSchema,
  type EntityId,
  type JsonObject,
} from "@satkit/contracts";

/**
 * Returns a copy of `attrs` with keys renamed per `renames` (from → to).
 * Keys absent from `attrs` are left absent.
 */
export function renameKeys(attrs: JsonObject, renames: Record<string, string>): JsonObject {
  const result: JsonObject = { ...attrs };
  for (const [from, to] of Object.entries(renames)) {
    if (!Object.hasOwn(result, from)) continue;
    const value = result[from];
    delete result[from];
    result[to] = value;
  }
  return result;
}

/**
 * Moves a bare id at `from` into a `{id}` reference at `to`; null stays null.
 * Used where the server sends a relation as a scalar under another name.
 */
export function idReference(attrs: JsonObject, from: string, to: string): JsonObject {
  if (!Object.hasOwn(attrs, from)) return attrs;
  const { [from]: id, ...rest } = attrs;
  return { ...rest, [to]: id === null || id === undefined ? null : { id } };
}

/** The `results` list of an index response. */
export function resultsOf(body: unknown, what: string): JsonObject[] {
  const parsed = resultsSchema.safeParse(body);
  if (!parsed.success) {
    throw new APIResponseError(`Expected a "results" list from ${what}, got ${JSON.stringify(body)}.`);
  }
  return parsed.data.results;
}

/** The id of the only result; `describe` builds the message otherwise. */
export function onlyResultId(
  results: JsonObject[],
  describe: (results: JsonObject[]) => string
): EntityId {
  const [only] = results;
  const parsed = identifiedSchema.safeParse(only);
  if (results.length !== 1 || !parsed.success) {
    throw new APIResponseError(describe(results));
  }
  return parsed.data.id;
}
