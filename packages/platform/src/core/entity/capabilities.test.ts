/**
 * Entity Capabilities: Test Suite
 *
 * Read, search, create, update and delete against an in-process
 * FakeTransport. Expected URLs and bodies follow the translation rules in
 * payload.ts.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  BadValueError,
  IntegerField,
  MissingValueError,
  NoSuchFieldError,
  StringField,
  UnsupportedFilterError,
} from "@satkit/contracts";
import { ServerConfig } from "../config/index.js";
import { resetTransport, setTransport } from "../http/index.js";
import { FakeTransport } from "../../testing/index.js";
import type { EntityMeta, EntityValues, FieldMap } from "./entity.js";
import { CreatableEntity, ReadableEntity, UpdatableEntity } from "./capabilities.js";
import { OneToManyField, OneToOneField } from "./fields.js";
import { clearEntityRegistry, registerEntities } from "./registry.js";

const config = new ServerConfig({
  url: "https://sat.example.com",
  auth: ["admin", "test-secret"],
});

class Owner extends CreatableEntity<Owner> {
  protected defineFields(): FieldMap {
    return { name: new StringField({ required: true, strType: "alpha" }) };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/owners", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): Owner {
    return new Owner(this.config, values);
  }
}

class Part extends ReadableEntity<Part> {
  protected defineFields(): FieldMap {
    return { label: new StringField() };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/parts", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): Part {
    return new Part(this.config, values);
  }
}

class Widget extends UpdatableEntity<Widget> {
  protected defineFields(): FieldMap {
    return {
      name: new StringField({ required: true }),
      size: new IntegerField(),
      color: new StringField({ required: true, choices: ["red", "blue"] }),
      shape: new StringField({ required: true, default: "round" }),
      owner: new OneToOneField("Owner", { required: true }),
      part: new OneToManyField("Part"),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/widgets", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): Widget {
    return new Widget(this.config, values);
  }
}

/** A complete widget as the server returns it */
function widgetAttrs(overrides: EntityValues = {}): EntityValues {
  return {
    id: 3,
    name: "gear",
    size: 4,
    color: "red",
    shape: "round",
    owner: { id: 7, name: "bob" },
    parts: [{ id: 1 }, { id: 2 }],
    ...overrides,
  };
}

let transport: FakeTransport;

beforeEach(() => {
  clearEntityRegistry();
  registerEntities({ Owner, Part, Widget });
  transport = new FakeTransport();
  setTransport(transport);
  vi.spyOn(console, "debug").mockImplementation(() => {});
});

afterEach(() => {
  resetTransport();
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// Read
// ---------------------------------------------------------------------------

describe("read()", () => {
  it("GETs the entity and hydrates inline relation objects", async () => {
    transport.reply(200, widgetAttrs());
    const widget = await new Widget(config, { id: 3 }).read();

    expect(transport.calls()).toEqual(["GET https://sat.example.com/api/v2/widgets/3"]);
    expect(widget).toBeInstanceOf(Widget);
    expect(widget.get("name")).toBe("gear");
    expect(widget.getEntity("owner")).toBeInstanceOf(Owner);
    expect(widget.getEntity("owner")?.id).toBe(7);
    expect(widget.getEntities("part").map((part) => part.id)).toEqual([1, 2]);
    expect(widget.getEntities("part")[0]).toBeInstanceOf(Part);
  });

  it("hydrates relations given only as _id and _ids", async () => {
    const attrs = widgetAttrs({ owner_id: 7, part_ids: [5] });
    delete attrs.owner;
    delete attrs.parts;
    const widget = await new Widget(config).read({ attrs });

    expect(transport.requests).toHaveLength(0);
    expect(widget.getEntity("owner")?.id).toBe(7);
    expect(widget.getEntities("part").map((part) => part.id)).toEqual([5]);
  });

  it("keeps a null relation null", async () => {
    const widget = await new Widget(config).read({ attrs: widgetAttrs({ owner: null }) });
    expect(widget.get("owner")).toBeNull();
  });

  it("raises MissingValueError when a field is absent", async () => {
    const attrs = widgetAttrs();
    delete attrs.size;
    await expect(new Widget(config).read({ attrs })).rejects.toThrow(MissingValueError);
  });

  it("skips ignored fields", async () => {
    const attrs = widgetAttrs();
    delete attrs.size;
    const widget = await new Widget(config).read({ attrs, ignore: ["size"] });
    expect(widget.has("size")).toBe(false);
  });

  it("sends the configured credentials", async () => {
    transport.reply(200, widgetAttrs());
    await new Widget(config, { id: 3 }).read();
    expect(transport.lastRequest.headers.authorization).toBe(
      `Basic ${Buffer.from("admin:test-secret").toString("base64")}`
    );
  });
});

// ---------------------------------------------------------------------------
// Search
// ---------------------------------------------------------------------------

describe("search()", () => {
  it("builds the query from assigned values", () => {
    const widget = new Widget(config, { name: "gear", owner: 7, part: [1, 2] });
    expect(widget.searchPayload()).toEqual({ name: "gear", owner_id: 7, part_ids: [1, 2] });
    expect(widget.searchPayload(["name"], { per_page: 50 })).toEqual({
      name: "gear",
      per_page: 50,
    });
  });

  it("rejects unknown search fields", () => {
    expect(() => new Widget(config).searchPayload(["colour"])).toThrow(NoSuchFieldError);
  });

  it("GETs the collection and builds entities from the results", async () => {
    transport.reply(200, {
      results: [{ id: 1, name: "gear", owner: { id: 7 }, parts: [{ id: 2 }], extra: "x" }],
    });
    const found = await new Widget(config, { name: "gear", owner: 7 }).search();

    expect(transport.calls()).toEqual([
      "GET https://sat.example.com/api/v2/widgets?name=gear&owner_id=7",
    ]);
    expect(found).toHaveLength(1);
    expect(found[0].id).toBe(1);
    expect(found[0].getEntity("owner")?.id).toBe(7);
    expect(found[0].getEntities("part").map((part) => part.id)).toEqual([2]);
    expect(found[0].has("size")).toBe(false);
  });

  it("merges a raw query over the generated one", async () => {
    transport.reply(200, { results: [] });
    await new Widget(config, { name: "gear" }).search({
      fields: [],
      query: { search: 'name="gear"', per_page: 100 },
    });

    expect(transport.lastRequest.url).toBe(
      "https://sat.example.com/api/v2/widgets?search=name%3D%22gear%22&per_page=100"
    );
  });

  it("normalizes results without touching unknown keys", () => {
    const normalized = new Widget(config).searchNormalize([
      { id: 1, owner_id: null, part_ids: [4], other: true },
    ]);
    expect(normalized).toEqual([{ id: 1, owner: null, part: [4] }]);
  });

  it("filters locally after reading every result", async () => {
    transport
      .reply(200, { results: [{ id: 1 }, { id: 2 }] })
      .reply(200, widgetAttrs({ id: 1, size: 4 }))
      .reply(200, widgetAttrs({ id: 2, size: 8 }));

    const found = await new Widget(config).search({ filters: { size: 8 } });

    expect(transport.calls()).toEqual([
      "GET https://sat.example.com/api/v2/widgets",
      "GET https://sat.example.com/api/v2/widgets/1",
      "GET https://sat.example.com/api/v2/widgets/2",
    ]);
    expect(found.map((widget) => widget.id)).toEqual([2]);
  });

  it("refuses to filter on relation fields", async () => {
    transport.reply(200, { results: [{ id: 1 }] });
    await expect(new Widget(config).search({ filters: { owner: 7 } })).rejects.toThrow(
      UnsupportedFilterError
    );
  });

  it("refuses to filter on unknown fields", async () => {
    transport.reply(200, { results: [{ id: 1 }] });
    await expect(new Widget(config).search({ filters: { colour: "red" } })).rejects.toThrow(
      NoSuchFieldError
    );
  });
});

// ---------------------------------------------------------------------------
// Create
// ---------------------------------------------------------------------------

describe("create()", () => {
  it("POSTs the payload and reads the response", async () => {
    transport.reply(201, widgetAttrs());
    const widget = new Widget(config, { name: "gear", color: "red", owner: 7 });
    const created = await widget.create();

    expect(transport.calls()).toEqual(["POST https://sat.example.com/api/v2/widgets"]);
    expect(transport.jsonBody()).toEqual({ name: "gear", color: "red", owner_id: 7 });
    expect(created.id).toBe(3);
    expect(created.get("name")).toBe("gear");
    expect(widget.id).toBeUndefined();
  });

  it("fills missing required fields, creating related entities first", async () => {
    transport.reply(201, { id: 7, name: "bob" }).reply(201, widgetAttrs());
    const created = await new Widget(config, { name: "gear" }).create({ createMissing: true });

    expect(transport.calls()).toEqual([
      "POST https://sat.example.com/api/v2/owners",
      "POST https://sat.example.com/api/v2/widgets",
    ]);
    expect(transport.jsonBody(0)).toHaveProperty("name", expect.stringMatching(/^[a-zA-Z]+$/));
    expect(transport.jsonBody(1)).toMatchObject({ name: "gear", shape: "round", owner_id: 7 });
    expect(transport.jsonBody(1)).toHaveProperty("color", expect.stringMatching(/^(red|blue)$/));
    expect(created.id).toBe(3);
  });

  it("leaves values alone unless asked to fill them", async () => {
    transport.reply(201, widgetAttrs());
    await new Widget(config, { name: "gear" }).create();
    expect(transport.jsonBody()).toEqual({ name: "gear" });
  });

  it("does not overwrite assigned values", async () => {
    const widget = new Widget(config, { name: "gear", color: "blue", shape: "square", owner: 1 });
    await widget.createMissing();
    expect(widget.getValues()).toMatchObject({ name: "gear", color: "blue", shape: "square" });
    expect(transport.requests).toHaveLength(0);
  });

  it("cannot fill a relation whose target does not support creation", async () => {
    class Holder extends CreatableEntity<Holder> {
      protected defineFields(): FieldMap {
        return { part: new OneToOneField("Part", { required: true }) };
      }

      get meta(): EntityMeta {
        return { apiPath: "api/v2/holders", serverModes: ["sat"] };
      }

      protected spawn(values?: EntityValues): Holder {
        return new Holder(this.config, values);
      }
    }

    await expect(new Holder(config).createMissing()).rejects.toThrow(BadValueError);
  });

  it("waits for the task of a 202 when synchronous and returns it", async () => {
    transport
      .reply(202, { id: "task-1" })
      .reply(200, { id: "task-1", state: "stopped", result: "success" });

    const result = await new Owner(config, { name: "acme" }).create({ synchronous: true });

    expect(transport.calls()).toEqual([
      "POST https://sat.example.com/api/v2/owners",
      "GET https://sat.example.com/foreman_tasks/api/tasks/task-1",
    ]);
    expect(result).toEqual({ id: "task-1", state: "stopped", result: "success" });
  });

  it("reads a synchronous create that completed immediately", async () => {
    transport.reply(201, { id: 7, name: "acme" });
    const result = await new Owner(config, { name: "acme" }).create({ synchronous: true });

    expect(result).toBeInstanceOf(Owner);
    expect(transport.calls()).toEqual(["POST https://sat.example.com/api/v2/owners"]);
  });

  it("returns the finished task from createJson when synchronous", async () => {
    transport
      .reply(202, { id: "task-2" })
      .reply(200, { id: "task-2", state: "stopped", result: "success" });

    const json = await new Owner(config, { name: "acme" }).createJson({ synchronous: true });

    expect(json).toMatchObject({ id: "task-2", result: "success" });
  });
});

// ---------------------------------------------------------------------------
// Update
// ---------------------------------------------------------------------------

describe("update()", () => {
  it("PUTs the named fields and reads the response", async () => {
    transport.reply(200, widgetAttrs({ name: "cog" }));
    const widget = new Widget(config, { id: 3, name: "cog", size: 5, owner: 7 });
    const updated = await widget.update(["name", "owner"]);

    expect(transport.calls()).toEqual(["PUT https://sat.example.com/api/v2/widgets/3"]);
    expect(transport.jsonBody()).toEqual({ name: "cog", owner_id: 7 });
    expect(updated.get("name")).toBe("cog");
  });

  it("sends every value when no fields are named", () => {
    const widget = new Widget(config, { id: 3, name: "cog" });
    expect(widget.updatePayload()).toEqual({ id: 3, name: "cog" });
  });

  it("refuses to update a field without a value", () => {
    expect(() => new Widget(config, { id: 3 }).updatePayload(["size"])).toThrow(BadValueError);
  });
});

// ---------------------------------------------------------------------------
// Delete
// ---------------------------------------------------------------------------

describe("delete()", () => {
  it("returns null for 204", async () => {
    transport.reply(204);
    await expect(new Widget(config, { id: 3 }).delete()).resolves.toBeNull();
    expect(transport.calls()).toEqual(["DELETE https://sat.example.com/api/v2/widgets/3"]);
  });

  it("returns the decoded body for 200", async () => {
    transport.reply(200, { id: 3, name: "gear" });
    await expect(new Widget(config, { id: 3 }).delete()).resolves.toEqual({ id: 3, name: "gear" });
  });

  it("waits for the task on 202", async () => {
    transport
      .reply(202, { id: "task-9" })
      .reply(200, { id: "task-9", state: "stopped", result: "success" });

    await expect(new Widget(config, { id: 3 }).delete()).resolves.toMatchObject({
      id: "task-9",
      result: "success",
    });
    expect(transport.calls()[1]).toBe("GET https://sat.example.com/foreman_tasks/api/tasks/task-9");
  });

  it("returns the 202 body without waiting when not synchronous", async () => {
    transport.reply(202, { id: "task-9" });
    await expect(new Widget(config, { id: 3 }).delete({ synchronous: false })).resolves.toEqual({
      id: "task-9",
    });
    expect(transport.requests).toHaveLength(1);
  });

  it("raises for error statuses", async () => {
    transport.reply(404, { error: "not found" });
    vi.spyOn(console, "warn").mockImplementation(() => {});
    await expect(new Widget(config, { id: 3 }).delete()).rejects.toThrow(
      "HTTP 404 client error for url: https://sat.example.com/api/v2/widgets/3"
    );
  });
});
