/**
 * Entity Base
 *
 * An Entity is the in-memory form of one REST resource: a schema of field
 * descriptors, the values assigned so far and the server configuration used
 * to talk about it. Subclasses declare their fields in defineFields() and
 * their API path in `meta`; the capability layers in capabilities.ts add
 * the HTTP operations.
 *
 * Relation values are normalized on assignment. An id given for a one-to-one
 * field becomes a stub entity of the target class carrying only that id; a
 * one-to-many field takes an array of ids and/or entities.
 */

import {
  BadValueError,
  IntegerField,
  NoSuchFieldError,
  NoSuchPathError,
  RelationRequiredError,
  entityIdSchema,
  type EntityId,
  type Field,
} from "@satkit/contracts";
import type { ServerConfig } from "../config/index.js";
import { OneToManyField, OneToOneField } from "./fields.js";

export type EntityValues = Record<string, unknown>;

export type FieldMap = Record<string, Field>;

/** Server flavours an entity is available on */
export type ServerMode = "sat" | "sam";

export interface EntityMeta {
  /** Collection path relative to the server URL, or an absolute URL for nested resources */
  apiPath: string;
  serverModes: readonly ServerMode[];
  /** How many instances a fresh server ships with */
  numCreatedByDefault?: number;
}

/** A concrete entity class, as stored in the registry */
export type EntityClass = new (config: ServerConfig, values?: EntityValues) => Entity;

function toEntity(
  target: EntityClass,
  value: unknown,
  config: ServerConfig,
  fieldName: string
): Entity {
  if (value instanceof Entity) return value;
  const id = entityIdSchema.safeParse(value);
  if (!id.success) {
    throw new BadValueError(
      `An inappropriate value was assigned to the "${fieldName}" field. An entity or an entity id should be assigned, but ${JSON.stringify(value)} was given.`
    );
  }
  return new target(config, { id: id.data });
}

export abstract class Entity {
  readonly config: ServerConfig;
  private readonly schema: FieldMap;
  private readonly values = new Map<string, unknown>();

  constructor(config: ServerConfig, values: EntityValues = {}) {
    this.config = config;
    this.schema = this.hasImplicitId()
      ? { id: new IntegerField(), ...this.defineFields() }
      : this.defineFields();

    const received = Object.keys(values);
    if (received.some((name) => !Object.hasOwn(this.schema, name))) {
      throw new NoSuchFieldError(Object.keys(this.schema), received);
    }
    for (const [name, value] of Object.entries(values)) {
      this.set(name, value);
    }
  }

  /**
   * Returns the field schema. Runs inside the base constructor: only
   * `this.config` is available.
   */
  protected abstract defineFields(): FieldMap;

  abstract get meta(): EntityMeta;

  /** Entities identified by some other key override this to drop `id`. */
  protected hasImplicitId(): boolean {
    return true;
  }

  // -------------------------------------------------------------------------
  // Values
  // -------------------------------------------------------------------------

  getFields(): FieldMap {
    return { ...this.schema };
  }

  getValues(): EntityValues {
    return Object.fromEntries(this.values);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  get(name: string): unknown {
    return this.values.get(name);
  }

  /** Assigns a value, applying the relation conversions described above. */
  set(name: string, value: unknown): this {
    const field = this.schema[name];
    if (field === undefined) {
      throw new NoSuchFieldError(Object.keys(this.schema), [name]);
    }

    if (field instanceof OneToOneField) {
      this.values.set(
        name,
        value === null || value === undefined
          ? null
          : toEntity(field.genValue(), value, this.config, name)
      );
    } else if (field instanceof OneToManyField) {
      if (!Array.isArray(value)) {
        throw new BadValueError(
          `An inappropriate value was assigned to the "${name}" field. An array of entities and/or entity ids should be assigned, but ${JSON.stringify(value)} was given.`
        );
      }
      this.values.set(
        name,
        value.map((item: unknown) =>
          item instanceof Entity ? item : toEntity(field.genValue(), item, this.config, name)
        )
      );
    } else {
      this.values.set(name, value);
    }
    return this;
  }

  unset(name: string): this {
    this.values.delete(name);
    return this;
  }

  get id(): EntityId | undefined {
    const parsed = entityIdSchema.safeParse(this.values.get("id"));
    return parsed.success ? parsed.data : undefined;
  }

  /** The one-to-one value of `name`, if it holds an entity */
  getEntity(name: string): Entity | undefined {
    const value = this.values.get(name);
    return value instanceof Entity ? value : undefined;
  }

  /** The entities held by a one-to-many field; empty when unset */
  getEntities(name: string): Entity[] {
    const value = this.values.get(name);
    if (!Array.isArray(value)) return [];
    return value.filter((item: unknown): item is Entity => item instanceof Entity);
  }

  /**
   * The parent entity held in `name`.
   * Nested resources build their paths from it.
   */
  protected requireEntity(name: string): Entity {
    const entity = this.getEntity(name);
    if (entity === undefined) {
      throw new RelationRequiredError(this.constructor.name, name);
    }
    return entity;
  }

  // -------------------------------------------------------------------------
  // Paths
  // -------------------------------------------------------------------------

  /**
   * Returns a fully qualified URL for this entity.
   *
   * - "base", or no argument and no id: the collection URL
   * - "self", or no argument with an id: the collection URL plus the id
   *
   * Subclasses handle their own sub-paths first and defer to this method.
   */
  path(which?: string): string {
    const { apiPath } = this.meta;
    const base = /^https?:\/\//.test(apiPath)
      ? apiPath
      : `${this.config.url.replace(/\/+$/, "")}/${apiPath}`;
    const id = this.id;

    if (which === "base" || (which === undefined && id === undefined)) {
      return base;
    }
    if ((which === "self" || which === undefined) && id !== undefined) {
      return `${base}/${id}`;
    }
    throw new NoSuchPathError(which);
  }

  toString(): string {
    const values = Object.entries(this.getValues())
      .map(([name, value]) => {
        const shown = value instanceof Entity ? value.id : value;
        return `${name}=${JSON.stringify(shown)}`;
      })
      .join(", ");
    return `${this.constructor.name}(${values})`;
  }
}
