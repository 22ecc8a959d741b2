/**
 * Entity Registry: Test Suite
 *
 * Registration, lookup and uniqueness of entity names. Relation fields
 * resolve their targets here.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { EntityNotRegisteredError } from "@satkit/contracts";
import { Entity, type EntityMeta, type FieldMap } from "./entity.js";
import { OneToOneField } from "./fields.js";
import {
  clearEntityRegistry,
  getEntityClass,
  getEntityNames,
  registerEntities,
  registerEntity,
  resolveEntity,
} from "./registry.js";

class Alpha extends Entity {
  protected defineFields(): FieldMap {
    return {};
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/alphas", serverModes: ["sat"] };
  }
}

class Beta extends Alpha {}

// ---------------------------------------------------------------------------
// Reset state between tests
// ---------------------------------------------------------------------------

beforeEach(() => {
  clearEntityRegistry();
});

describe("registerEntity", () => {
  it("registers a class under a name", () => {
    registerEntity("Alpha", Alpha);
    expect(getEntityClass("Alpha")).toBe(Alpha);
  });

  it("accepts the same class twice", () => {
    registerEntity("Alpha", Alpha);
    expect(() => registerEntity("Alpha", Alpha)).not.toThrow();
  });

  it("throws when a name is taken by another class", () => {
    registerEntity("Alpha", Alpha);
    expect(() => registerEntity("Alpha", Beta)).toThrow('Entity "Alpha" is already registered');
  });
});

describe("registerEntities", () => {
  it("registers a map of classes in order", () => {
    registerEntities({ Alpha, Beta });
    expect(getEntityNames()).toEqual(["Alpha", "Beta"]);
  });
});

describe("resolveEntity", () => {
  it("throws EntityNotRegisteredError for unknown names", () => {
    expect(() => resolveEntity("Ghost")).toThrow(EntityNotRegisteredError);
  });

  it("is what relation fields generate", () => {
    registerEntity("Alpha", Alpha);
    expect(new OneToOneField("Alpha").genValue()).toBe(Alpha);
  });
});

describe("clearEntityRegistry", () => {
  it("removes all entities", () => {
    registerEntities({ Alpha, Beta });
    clearEntityRegistry();
    expect(getEntityNames()).toEqual([]);
    expect(getEntityClass("Alpha")).toBeUndefined();
  });
});
