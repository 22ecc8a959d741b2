/**
 * Payload Translation
 *
 * Converts between entity values and the JSON the server speaks. Relation
 * fields travel as `<field>_id` / `<field>_ids` in requests, while responses
 * carry them in several shapes:
 *
 *   "user": null                        "user": {"id": 1, "login": "ahayes"}
 *   "user_id": 1                        "user_ids": [1, 42]
 *   "user": [{"id": 1}, {"id": 42}]     "users": [{"id": 1}, {"id": 42}]
 */

import pluralize from "pluralize";
import {
  APIResponseError,
  MissingValueError,
  entityIdSchema,
  identifiedSchema,
  isJsonObject,
  type EntityId,
  type JsonObject,
} from "@satkit/contracts";
import { Entity, type EntityValues, type FieldMap } from "./entity.js";
import { OneToManyField, OneToOneField } from "./fields.js";

function idOf(value: unknown, field: string): EntityId {
  const candidate = isJsonObject(value) ? value.id : value;
  const parsed = entityIdSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new APIResponseError(
      `Cannot read an entity id for the "${field}" field from ${JSON.stringify(value)}.`
    );
  }
  return parsed.data;
}

function idsOf(value: unknown, field: string): EntityId[] {
  if (!Array.isArray(value)) {
    throw new APIResponseError(
      `Expected a list for the "${field}" field, got ${JSON.stringify(value)}.`
    );
  }
  return value.map((item: unknown) => idOf(item, field));
}

// ---------------------------------------------------------------------------
// Responses → ids
// ---------------------------------------------------------------------------

/**
 * Finds the id of a one-to-one relation in a server payload.
 * Returns null for an explicit null and undefined when no key matches.
 */
export function lookupEntityId(field: string, attrs: JsonObject): EntityId | null | undefined {
  if (Object.hasOwn(attrs, field)) {
    const value = attrs[field];
    return value === null ? null : idOf(value, field);
  }
  const idKey = `${field}_id`;
  if (Object.hasOwn(attrs, idKey)) {
    const value = attrs[idKey];
    return value === null ? null : idOf(value, field);
  }
  return undefined;
}

export function getEntityId(field: string, attrs: JsonObject): EntityId | null {
  const id = lookupEntityId(field, attrs);
  if (id === undefined) {
    throw new MissingValueError(field, [field, `${field}_id`], Object.keys(attrs));
  }
  return id;
}

/** Finds the ids of a one-to-many relation; undefined when no key matches. */
export function lookupEntityIds(field: string, attrs: JsonObject): EntityId[] | undefined {
  for (const key of [`${field}_ids`, field, pluralize(field)]) {
    if (Object.hasOwn(attrs, key)) {
      return idsOf(attrs[key], field);
    }
  }
  return undefined;
}

export function getEntityIds(field: string, attrs: JsonObject): EntityId[] {
  const ids = lookupEntityIds(field, attrs);
  if (ids === undefined) {
    throw new MissingValueError(
      field,
      [`${field}_ids`, field, pluralize(field)],
      Object.keys(attrs)
    );
  }
  return ids;
}

// ---------------------------------------------------------------------------
// Values → requests
// ---------------------------------------------------------------------------

/**
 * Builds a request payload from entity values, renaming relation fields to
 * `<field>_id` and `<field>_ids`. Values for unknown names pass through.
 */
export function payload(fields: FieldMap, values: EntityValues): JsonObject {
  const result: JsonObject = { ...values };
  for (const [name, field] of Object.entries(fields)) {
    if (!Object.hasOwn(values, name)) continue;
    const value = values[name];
    if (field instanceof OneToOneField) {
      delete result[name];
      result[`${name}_id`] = value instanceof Entity ? (value.id ?? null) : null;
    } else if (field instanceof OneToManyField) {
      delete result[name];
      result[`${name}_ids`] = Array.isArray(value)
        ? value.map((item: unknown) => (item instanceof Entity ? (item.id ?? null) : null))
        : [];
    }
  }
  return result;
}

/** Narrows a decoded response body to a JSON object. */
export function expectJsonObject(value: unknown, what: string): JsonObject {
  if (!isJsonObject(value)) {
    throw new APIResponseError(`Expected a JSON object from ${what}, got ${JSON.stringify(value)}.`);
  }
  return value;
}

/** The id of the resource a response body describes. */
export function responseId(json: JsonObject, what: string): EntityId {
  const parsed = identifiedSchema.safeParse(json);
  if (!parsed.success) {
    throw new APIResponseError(`Expected an id in the response to ${what}, got ${JSON.stringify(json)}.`);
  }
  return parsed.data.id;
}
