/**
 * Relation Fields
 *
 * Descriptors for references to other entities. They name their target
 * instead of importing it, and genValue() resolves the name through the
 * entity registry.
 */

import { Field, type FieldOptions } from "@satkit/contracts";
import type { Entity, EntityClass } from "./entity.js";
import { resolveEntity } from "./registry.js";

export abstract class RelationField<TValue> extends Field<TValue, EntityClass> {
  constructor(
    readonly target: string,
    options: FieldOptions<TValue> = {}
  ) {
    super(options);
  }

  /** The referenced entity class, not an instance */
  genValue(): EntityClass {
    return resolveEntity(this.target);
  }
}

/** A reference to a single entity, or null. */
export class OneToOneField extends RelationField<Entity | null> {}

export class OneToManyField extends RelationField<Entity[]> {}
