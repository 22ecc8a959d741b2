/**
 * Entity Catalogue: Test Suite
 *
 * Registration, URL building, request payload shapes and response
 * reshaping. Nothing here talks to a transport; see the per-entity suites
 * for request sequences.
 */

import { describe, it, expect } from "vitest";
import { BadValueError, NoSuchPathError, RelationRequiredError } from "@satkit/contracts";
import { RelationField, ServerConfig, getEntityClass } from "@satkit/platform";
import {
  Architecture,
  ContentViewPuppetModule,
  DockerHubContainer,
  LifecycleEnvironment,
  Media,
  OperatingSystemParameter,
  Organization,
  Repository,
  Subnet,
  SyncPlan,
  System,
  User,
  entities,
} from "../index.js";

const config = new ServerConfig({
  url: "https://sat.example.com",
  auth: ["admin", "test-secret"],
});

const legacy = new ServerConfig({ url: "https://sat.example.com", version: "6.0" });

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

describe("entity registration", () => {
  it("registers each class under its own name", () => {
    expect(getEntityClass("Media")).toBe(Media);
    expect(getEntityClass("Organization")).toBe(Organization);
    expect(getEntityClass("AbstractComputeResource")).toBe(entities.AbstractComputeResource);
  });

  it("resolves every relation target in the catalogue", () => {
    for (const [name, EntityClass] of Object.entries(entities)) {
      const entity = new EntityClass(config);
      for (const [fieldName, field] of Object.entries(entity.getFields())) {
        if (field instanceof RelationField) {
          expect(() => field.genValue(), `${name}.${fieldName}`).not.toThrow();
        }
      }
    }
  });
});

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

describe("entity paths", () => {
  it("builds the collection path without an id", () => {
    expect(new Architecture(config).path()).toBe("https://sat.example.com/api/v2/architectures");
  });

  it("refuses a self path without an id", () => {
    expect(() => new Architecture(config).path("self")).toThrow(NoSuchPathError);
  });

  it("appends organization sub-paths to the self path", () => {
    expect(new Organization(config, { id: 5 }).path("subscriptions/upload")).toBe(
      "https://sat.example.com/katello/api/v2/organizations/5/subscriptions/upload"
    );
  });

  it("addresses a system by uuid when it has one", () => {
    expect(new System(config, { id: 4, uuid: "abc-123" }).path()).toBe(
      "https://sat.example.com/katello/api/v2/systems/abc-123"
    );
    expect(new System(config, { id: 4 }).path()).toBe(
      "https://sat.example.com/katello/api/v2/systems/4"
    );
  });

  it("nests operating system parameters under their operating system", () => {
    const parameter = new OperatingSystemParameter(config, { operatingsystem: 2, id: 7 });
    expect(parameter.path()).toBe(
      "https://sat.example.com/api/v2/operatingsystems/2/parameters/7"
    );
  });

  it("nests sync plans under their organization", () => {
    const plan = new SyncPlan(config, { organization: 3, id: 9 });
    expect(plan.path("add_products")).toBe(
      "https://sat.example.com/katello/api/v2/organizations/3/sync_plans/9/add_products"
    );
  });

  it("requires the parent of a nested entity", () => {
    expect(() => new OperatingSystemParameter(config).path()).toThrow(
      new RelationRequiredError("OperatingSystemParameter", "operatingsystem")
    );
  });
});

// ---------------------------------------------------------------------------
// Payloads
// ---------------------------------------------------------------------------

describe("entity payloads", () => {
  it("wraps architectures and sends relations as ids", () => {
    const architecture = new Architecture(config, { name: "x86_64", operatingsystem: [1, 2] });
    expect(architecture.createPayload()).toEqual({
      architecture: { name: "x86_64", operatingsystem_ids: [1, 2] },
    });
  });

  it("sends a medium's path_ as path", () => {
    const media = new Media(config, { name: "mirror", path_: "http://mirror.example.com/os" });
    expect(media.createPayload()).toEqual({
      medium: { name: "mirror", path: "http://mirror.example.com/os" },
    });
  });

  it("sends the prior lifecycle environment as prior", () => {
    const environment = new LifecycleEnvironment(config, { name: "dev", organization: 3, prior: 4 });
    expect(environment.createPayload()).toEqual({ name: "dev", organization_id: 3, prior: 4 });
  });

  it("sends a content view puppet module as uuid", () => {
    const puppetModule = new ContentViewPuppetModule(config, {
      content_view: 5,
      puppet_module: "b3c1-ntp",
    });
    expect(puppetModule.createPayload()).toEqual({ content_view_id: 5, uuid: "b3c1-ntp" });
  });

  it("wraps a partial user update", () => {
    const user = new User(config, { id: 2, login: "alice", mail: "alice@example.com" });
    expect(user.updatePayload(["login"])).toEqual({ user: { login: "alice" } });
  });

  it("formats a sync plan's date for the server", () => {
    const plan = new SyncPlan(config, {
      organization: 3,
      name: "nightly",
      interval: "daily",
      enabled: true,
      sync_date: new Date(2024, 0, 2, 3, 4, 5),
    });
    expect(plan.createPayload()).toEqual({
      organization_id: 3,
      name: "nightly",
      interval: "daily",
      enabled: true,
      sync_date: "2024-01-02 03:04:05",
    });
  });
});

// ---------------------------------------------------------------------------
// Server versions
// ---------------------------------------------------------------------------

describe("version-dependent fields", () => {
  it("adds subnet boot and proxy fields from 6.1", () => {
    expect(Object.keys(new Subnet(legacy).getFields())).not.toContain("ipam");
    const ipam = new Subnet(config).getFields().ipam;
    expect(ipam?.default).toBe("DHCP");
  });

  it("drops docker repositories before 6.1", () => {
    const fields = new Repository(legacy).getFields();
    expect(fields.checksum_type).toBeUndefined();
    expect(fields.docker_upstream_name).toBeUndefined();
    expect(fields.content_type?.choices).toEqual(["puppet", "yum", "file"]);
    expect(new Repository(config).getFields().content_type?.choices).toEqual([
      "puppet",
      "yum",
      "file",
      "docker",
    ]);
  });
});

// ---------------------------------------------------------------------------
// Reading server payloads
// ---------------------------------------------------------------------------

describe("response reshaping", () => {
  it("reads a medium's path into path_", async () => {
    const media = await new Media(config).read({
      attrs: {
        id: 1,
        name: "mirror",
        path: "http://mirror.example.com/os",
        operatingsystems: [],
        organizations: [{ id: 3 }],
        locations: [],
        os_family: null,
      },
    });
    expect(media.get("path_")).toBe("http://mirror.example.com/os");
    expect(media.getEntities("organization").map((org) => org.id)).toEqual([3]);
  });

  it("reads a content view puppet module's uuid as a reference", async () => {
    const puppetModule = await new ContentViewPuppetModule(config, { content_view: 5 }).read({
      attrs: { id: 1, author: "puppetlabs", name: "ntp", uuid: "b3c1-ntp" },
    });
    expect(puppetModule.getEntity("puppet_module")?.id).toBe("b3c1-ntp");
    expect(puppetModule.getEntity("content_view")?.id).toBe(5);
  });

  it("renames the camel-cased system fields", async () => {
    const system = await new System(config).read({
      attrs: {
        id: 1,
        uuid: "abc-123",
        name: "web01",
        description: null,
        location: "rack 4",
        release_ver: "",
        service_level: null,
        checkin_time: "2024-01-01 00:00:00",
        hostCollections: [{ id: 3 }],
        installedProducts: [],
        content_view: { id: 2 },
        environment: { id: 5 },
      },
    });
    expect(system.get("last_checkin")).toBe("2024-01-01 00:00:00");
    expect(system.get("installed_products")).toEqual([]);
    expect(system.getEntities("host_collection").map((collection) => collection.id)).toEqual([3]);
    expect(system.has("facts")).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Argument checks
// ---------------------------------------------------------------------------

describe("docker container power", () => {
  it("rejects an unknown action before sending anything", async () => {
    const container = new DockerHubContainer(config, { id: 4 });
    await expect(container.power("restart")).rejects.toThrow(
      new BadValueError("Received restart but expected one of [start, stop, status].")
    );
  });
});
