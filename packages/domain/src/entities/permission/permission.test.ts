/**
 * Permission: Test Suite
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ServerConfig, resetTransport, setTransport } from "@satkit/platform";
import { FakeTransport } from "@satkit/platform/testing";
import { Permission } from "../../index.js";

const config = new ServerConfig({ url: "https://sat.example.com" });

describe("Permission.searchPermissions", () => {
  let transport: FakeTransport;

  beforeEach(() => {
    transport = new FakeTransport();
    setTransport(transport);
  });

  afterEach(() => {
    resetTransport();
  });

  it("searches by the assigned values with a large page", async () => {
    transport.reply(200, { results: [{ id: 1, name: "view_hosts", resource_type: "Host" }] });

    const results = await new Permission(config, { resource_type: "Host" }).searchPermissions();

    expect(transport.calls()).toEqual([
      "GET https://sat.example.com/api/v2/permissions?per_page=10000&resource_type=Host",
    ]);
    expect(results).toEqual([{ id: 1, name: "view_hosts", resource_type: "Host" }]);
  });

  it("takes a page size", async () => {
    transport.reply(200, { results: [] });

    await new Permission(config, { name: "view_hosts" }).searchPermissions({ perPage: 20 });

    expect(transport.calls()).toEqual([
      "GET https://sat.example.com/api/v2/permissions?per_page=20&name=view_hosts",
    ]);
  });
});
