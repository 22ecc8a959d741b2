/**
 * Entity Capabilities
 *
 * The HTTP operations an entity class can support, layered so that each
 * class extends the strongest one it needs:
 *
 *   Entity → ReadableEntity → DeletableEntity → CreatableEntity → UpdatableEntity
 *
 * Every operation comes in three steps. `xxxRaw` sends the request and
 * returns the response, `xxxJson` raises for status and decodes, and `xxx`
 * turns the decoded body into a fresh entity through read().
 *
 * `Self` is the concrete class. spawn() builds a new instance of it, which
 * read() and search() populate; nested resources pass their parent along.
 */

import { isDeepStrictEqual } from "node:util";
import { faker } from "@faker-js/faker";
import {
  APIResponseError,
  BadValueError,
  MissingValueError,
  NoSuchFieldError,
  UnsupportedFilterError,
  resultsSchema,
  type JsonObject,
  type TaskInfo,
} from "@satkit/contracts";
import { StatusCodes } from "http-status-codes";
import { del, get, post, put, type HttpResponse } from "../http/index.js";
import { createLogger } from "../logging/index.js";
import { Entity, type EntityValues } from "./entity.js";
import { OneToManyField, OneToOneField, RelationField } from "./fields.js";
import {
  expectJsonObject,
  lookupEntityId,
  lookupEntityIds,
  getEntityId,
  getEntityIds,
  payload,
  responseId,
} from "./payload.js";
import { handleResponse, pollAcceptedTask } from "./tasks.js";

const logger = createLogger("entity");

export interface ReadOptions<Self> {
  /** Entity to populate instead of a fresh one */
  entity?: Self;
  /** Server payload to read from instead of issuing a GET */
  attrs?: JsonObject;
  /** Fields to leave unset, typically secrets the server never returns */
  ignore?: Iterable<string>;
}

export interface SearchOptions {
  /** Names of the values to search by; all assigned values by default */
  fields?: Iterable<string>;
  /** Raw query parameters merged over the generated ones */
  query?: JsonObject;
  /** Local equality filters, applied after reading every result */
  filters?: EntityValues;
}

export interface CreateOptions {
  /** Fill required, unset fields first */
  createMissing?: boolean;
  /** On 202 Accepted, wait for the server task to finish */
  synchronous?: boolean;
}

export type SynchronousCreateOptions = CreateOptions & { synchronous: true };

export interface DeleteOptions {
  /** Wait for the task when the server answers 202 */
  synchronous?: boolean;
}

// ---------------------------------------------------------------------------
// Read and search
// ---------------------------------------------------------------------------

export abstract class ReadableEntity<Self extends ReadableEntity<Self>> extends Entity {
  /** A new, empty instance of the concrete class, seeded with `values`. */
  protected abstract spawn(values?: EntityValues): Self;

  readRaw(): Promise<HttpResponse> {
    return get(this.path("self"), this.config.getClientOptions());
  }

  async readJson(): Promise<JsonObject> {
    const response = await this.readRaw();
    response.raiseForStatus();
    return expectJsonObject(response.json(), `GET ${response.url}`);
  }

  /**
   * Reads this entity from the server into a new object of the same class.
   * Relations become stubs carrying only an id; read them for the rest.
   */
  async read(options: ReadOptions<Self> = {}): Promise<Self> {
    const entity = options.entity ?? this.spawn();
    const attrs = options.attrs ?? (await this.readJson());
    const ignore = new Set(options.ignore ?? []);

    for (const [name, field] of Object.entries(entity.getFields())) {
      if (ignore.has(name)) continue;
      if (field instanceof OneToOneField) {
        entity.set(name, getEntityId(name, attrs));
      } else if (field instanceof OneToManyField) {
        entity.set(name, getEntityIds(name, attrs));
      } else if (Object.hasOwn(attrs, name)) {
        entity.set(name, attrs[name]);
      } else {
        throw new MissingValueError(name, [name], Object.keys(attrs));
      }
    }
    return entity;
  }

  searchPayload(fields?: Iterable<string>, query: JsonObject = {}): JsonObject {
    const names = fields === undefined ? Object.keys(this.getValues()) : Array.from(fields);
    const schema = this.getFields();
    const result: JsonObject = {};

    for (const name of names) {
      const field = schema[name];
      if (field === undefined) {
        throw new NoSuchFieldError(Object.keys(schema), names);
      }
      if (field instanceof OneToOneField) {
        result[`${name}_id`] = this.getEntity(name)?.id ?? null;
      } else if (field instanceof OneToManyField) {
        result[`${name}_ids`] = this.getEntities(name).map((entity) => entity.id ?? null);
      } else {
        result[name] = this.get(name);
      }
    }
    return { ...result, ...query };
  }

  searchRaw(fields?: Iterable<string>, query?: JsonObject): Promise<HttpResponse> {
    return get(this.path("base"), {
      ...this.config.getClientOptions(),
      data: this.searchPayload(fields, query),
    });
  }

  async searchJson(fields?: Iterable<string>, query?: JsonObject): Promise<JsonObject> {
    const response = await this.searchRaw(fields, query);
    response.raiseForStatus();
    return expectJsonObject(response.json(), `GET ${response.url}`);
  }

  /**
   * Reduces raw search results to values the constructor accepts: known
   * fields only, relations as ids. Absent fields are skipped.
   */
  searchNormalize(results: JsonObject[]): EntityValues[] {
    const fields = this.getFields();
    return results.map((result) => {
      const values: EntityValues = {};
      for (const [name, field] of Object.entries(fields)) {
        const value =
          field instanceof OneToOneField
            ? lookupEntityId(name, result)
            : field instanceof OneToManyField
              ? lookupEntityIds(name, result)
              : Object.hasOwn(result, name)
                ? result[name]
                : undefined;
        if (value !== undefined) values[name] = value;
      }
      return values;
    });
  }

  async search(options: SearchOptions = {}): Promise<Self[]> {
    const json = await this.searchJson(options.fields, options.query);
    const parsed = resultsSchema.safeParse(json);
    if (!parsed.success) {
      throw new APIResponseError(`Search response has no "results" list: ${JSON.stringify(json)}`);
    }
    const entities = this.searchNormalize(parsed.data.results).map((values) => this.spawn(values));
    if (options.filters === undefined) return entities;
    return this.searchFilter(entities, options.filters);
  }

  /**
   * Reads every entity and keeps those whose values equal `filters`.
   * Relation fields cannot be filtered on.
   */
  async searchFilter(entities: Self[], filters: EntityValues): Promise<Self[]> {
    const [first] = entities;
    if (first === undefined) return entities;

    const fields = first.getFields();
    const names = Object.keys(filters);
    if (names.some((name) => !Object.hasOwn(fields, name))) {
      throw new NoSuchFieldError(Object.keys(fields), names);
    }
    for (const name of names) {
      const field = fields[name];
      if (field instanceof RelationField) {
        throw new UnsupportedFilterError(name, field.kind);
      }
    }

    const read: Self[] = [];
    for (const entity of entities) {
      read.push(await entity.read());
    }
    return read.filter((entity) =>
      names.every((name) => isDeepStrictEqual(entity.get(name), filters[name]))
    );
  }
}

// ---------------------------------------------------------------------------
// Delete
// ---------------------------------------------------------------------------

export abstract class DeletableEntity<Self extends DeletableEntity<Self>> extends ReadableEntity<Self> {
  deleteRaw(): Promise<HttpResponse> {
    return del(this.path("self"), this.config.getClientOptions());
  }

  /**
   * Deletes the entity. Resolves to the finished task (202 and synchronous),
   * null (204) or the decoded response.
   */
  async delete(options: DeleteOptions = {}): Promise<unknown> {
    const response = await this.deleteRaw();
    return handleResponse(response, this.config, options.synchronous ?? true);
  }
}

// ---------------------------------------------------------------------------
// Create
// ---------------------------------------------------------------------------

interface Creatable {
  create(options?: CreateOptions & { synchronous?: false }): Promise<Entity>;
}

function isCreatable(entity: Entity): entity is Entity & Creatable {
  return entity instanceof CreatableEntity;
}

export abstract class CreatableEntity<Self extends CreatableEntity<Self>> extends DeletableEntity<Self> {
  /**
   * Populates every required field that has no value. In order of
   * preference: the field's default, a random choice, a newly created
   * target entity (or a one-element list of them), a generated value.
   */
  async createMissing(): Promise<void> {
    for (const [name, field] of Object.entries(this.getFields())) {
      if (!field.required || this.has(name)) continue;

      let value: unknown;
      if (field.default !== undefined) {
        value = field.default;
      } else if (field.choices !== undefined && field.choices.length > 0) {
        value = faker.helpers.arrayElement(field.choices);
      } else if (field instanceof OneToOneField) {
        value = await this.createRelated(field);
      } else if (field instanceof OneToManyField) {
        value = [await this.createRelated(field)];
      } else {
        value = field.genValue();
      }
      logger.debug(`Generated a value for ${this.constructor.name}.${name}`);
      this.set(name, value);
    }
  }

  /** Creates an instance of the field's target, filling its own required fields. */
  protected async createRelated(field: RelationField<unknown>): Promise<Entity> {
    const target = field.genValue();
    const entity = new target(this.config);
    if (!isCreatable(entity)) {
      throw new BadValueError(
        `Cannot create a ${field.target} to fill a required field: it does not support creation.`
      );
    }
    return entity.create({ createMissing: true });
  }

  createPayload(): JsonObject {
    return payload(this.getFields(), this.getValues());
  }

  async createRaw(options: CreateOptions = {}): Promise<HttpResponse> {
    if (options.createMissing ?? false) {
      await this.createMissing();
    }
    return post(this.path("base"), this.createPayload(), this.config.getClientOptions());
  }

  /** The decoded response, or the finished task when `synchronous` polled one */
  async createJson(options: CreateOptions = {}): Promise<JsonObject> {
    const response = await this.createRaw(options);
    const body = await handleResponse(response, this.config, options.synchronous ?? false);
    return expectJsonObject(body, `POST ${response.url}`);
  }

  /**
   * Creates the entity and returns it as the server describes it. With
   * `synchronous`, a 202 Accepted response is followed to the end of its task
   * and the finished task is returned instead.
   */
  create(options: SynchronousCreateOptions): Promise<Self | TaskInfo>;
  create(options?: CreateOptions & { synchronous?: false }): Promise<Self>;
  create(options?: CreateOptions): Promise<Self | TaskInfo>;
  async create(options: CreateOptions = {}): Promise<Self | TaskInfo> {
    const response = await this.createRaw(options);
    response.raiseForStatus();
    if ((options.synchronous ?? false) && response.status === StatusCodes.ACCEPTED) {
      return pollAcceptedTask(response, this.config);
    }
    return this.readCreated(expectJsonObject(response.json(), `POST ${response.url}`));
  }

  /** Turns the create response into the returned entity */
  protected readCreated(json: JsonObject): Promise<Self> {
    return this.read({ attrs: json });
  }

  /**
   * Reads the entity back by the id in the create response.
   * For endpoints whose create response is not a full representation.
   */
  protected readBackById(json: JsonObject): Promise<Self> {
    return this.spawn({ id: responseId(json, `POST ${this.path("base")}`) }).read();
  }
}

// ---------------------------------------------------------------------------
// Update
// ---------------------------------------------------------------------------

export abstract class UpdatableEntity<Self extends UpdatableEntity<Self>> extends CreatableEntity<Self> {
  /** The payload for an update, restricted to `fields` when given. */
  updatePayload(fields?: Iterable<string>): JsonObject {
    const all = this.getValues();
    if (fields === undefined) {
      return payload(this.getFields(), all);
    }
    const values: EntityValues = {};
    for (const name of fields) {
      if (!Object.hasOwn(all, name)) {
        throw new BadValueError(`Cannot update the "${name}" field: it has no value.`);
      }
      values[name] = all[name];
    }
    return payload(this.getFields(), values);
  }

  updateRaw(fields?: Iterable<string>): Promise<HttpResponse> {
    return put(this.path("self"), this.updatePayload(fields), this.config.getClientOptions());
  }

  async updateJson(fields?: Iterable<string>): Promise<JsonObject> {
    const response = await this.updateRaw(fields);
    response.raiseForStatus();
    return expectJsonObject(response.json(), `PUT ${response.url}`);
  }

  async update(fields?: Iterable<string>): Promise<Self> {
    return this.read({ attrs: await this.updateJson(fields) });
  }

  /** Updates, then issues a fresh GET instead of trusting the PUT response. */
  protected async updateThenRead(fields?: Iterable<string>): Promise<Self> {
    await this.updateJson(fields);
    return this.read();
  }
}
