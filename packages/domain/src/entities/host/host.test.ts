/**
 * Host: Test Suite
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { HostCreateMissingError } from "@satkit/contracts";
import { ServerConfig, resetTransport, setTransport } from "@satkit/platform";
import { FakeTransport } from "@satkit/platform/testing";
import { Host } from "../../index.js";

const config = new ServerConfig({ url: "https://sat.example.com" });

describe("Host", () => {
  let transport: FakeTransport;

  beforeEach(() => {
    transport = new FakeTransport();
    setTransport(transport);
  });

  afterEach(() => {
    resetTransport();
  });

  it("only fills an empty host", async () => {
    const host = new Host(config, { name: "web01", ip: "10.0.0.5" });

    await expect(host.createMissing()).rejects.toThrow(
      new HostCreateMissingError("Found instance attributes: [name, ip]")
    );
    expect(transport.requests).toHaveLength(0);
  });

  it("wraps the create payload", () => {
    const host = new Host(config, { name: "web01", location: 2, organization: 3 });
    expect(host.createPayload()).toEqual({
      host: { name: "web01", location_id: 2, organization_id: 3 },
    });
  });

  it("renames parameters and puppet classes when reading", async () => {
    const host = await new Host(config).read({
      attrs: {
        id: 8,
        name: "web01.example.com",
        architecture_id: 1,
        build: false,
        capabilities: null,
        compute_profile_id: null,
        compute_resource_id: null,
        domain_id: 4,
        enabled: true,
        environment_id: 5,
        hostgroup_id: null,
        parameters: [{ name: "role", value: "web" }],
        image_id: null,
        ip: "10.0.0.5",
        location_id: 2,
        mac: "52:54:00:12:34:56",
        managed: true,
        medium_id: 6,
        model_id: null,
        operatingsystem_id: 7,
        organization_id: 3,
        owner_id: null,
        owner_type: "User",
        provision_method: "build",
        ptable_id: 9,
        puppetclasses: [{ id: 11, name: "ntp" }],
        puppet_proxy_id: null,
        realm_id: null,
        sp_subnet_id: null,
        subnet_id: null,
      },
    });

    expect(host.get("host_parameters_attributes")).toEqual([{ name: "role", value: "web" }]);
    expect(host.getEntities("puppet_classes").map((puppetClass) => puppetClass.id)).toEqual([11]);
    expect(host.has("root_pass")).toBe(false);
  });
});
