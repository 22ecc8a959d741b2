/**
 * Lifecycle Environment: Test Suite
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { APIResponseError } from "@satkit/contracts";
import { ServerConfig, resetTransport, setTransport } from "@satkit/platform";
import { FakeTransport } from "@satkit/platform/testing";
import { LifecycleEnvironment } from "../../index.js";

const config = new ServerConfig({ url: "https://sat.example.com" });

const LOOKUP =
  "GET https://sat.example.com/katello/api/v2/environments?name=Library&organization_id=3";

describe("LifecycleEnvironment.createMissing", () => {
  let transport: FakeTransport;

  beforeEach(() => {
    transport = new FakeTransport();
    setTransport(transport);
  });

  afterEach(() => {
    resetTransport();
  });

  it("points prior at the organization's Library", async () => {
    transport.reply(200, { results: [{ id: 9, name: "Library" }] });
    const environment = new LifecycleEnvironment(config, { organization: 3 });

    await environment.createMissing();

    expect(transport.calls()).toEqual([LOOKUP]);
    expect(environment.getEntity("prior")?.id).toBe(9);
    expect(typeof environment.get("name")).toBe("string");
  });

  it("leaves an explicit prior alone", async () => {
    const environment = new LifecycleEnvironment(config, { organization: 3, prior: 4 });

    await environment.createMissing();

    expect(transport.requests).toHaveLength(0);
    expect(environment.getEntity("prior")?.id).toBe(4);
  });

  it("fails unless exactly one Library is found", async () => {
    transport.reply(200, { results: [] });

    await expect(
      new LifecycleEnvironment(config, { organization: 3 }).createMissing()
    ).rejects.toThrow(
      new APIResponseError(
        'Could not find the "Library" lifecycle environment for organization 3. Search results: []'
      )
    );
  });
});
