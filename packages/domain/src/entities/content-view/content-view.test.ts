/**
 * Content View: Test Suite
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ServerConfig, resetTransport, setTransport } from "@satkit/platform";
import { FakeTransport } from "@satkit/platform/testing";
import { ContentView, LifecycleEnvironment } from "../../index.js";

const config = new ServerConfig({ url: "https://sat.example.com" });

const VIEW = "https://sat.example.com/katello/api/v2/content_views/4";

describe("ContentView", () => {
  let transport: FakeTransport;

  beforeEach(() => {
    transport = new FakeTransport();
    setTransport(transport);
  });

  afterEach(() => {
    resetTransport();
  });

  it("publishes and waits for the task", async () => {
    transport
      .reply(202, { id: "task-9" })
      .reply(200, { id: "task-9", state: "stopped", result: "success" });

    const task = await new ContentView(config, { id: 4 }).publish();

    expect(transport.calls()).toEqual([
      `POST ${VIEW}/publish`,
      "GET https://sat.example.com/foreman_tasks/api/tasks/task-9",
    ]);
    expect(transport.jsonBody(0)).toEqual({ id: 4 });
    expect(task).toEqual({ id: "task-9", state: "stopped", result: "success" });
  });

  it("replaces the repository ids", async () => {
    transport.reply(200, { id: 4 });

    await new ContentView(config, { id: 4 }).setRepositoryIds([1, 2]);

    expect(transport.calls()).toEqual([`PUT ${VIEW}`]);
    expect(transport.jsonBody()).toEqual({ repository_ids: [1, 2] });
  });

  it("copies under a new name", async () => {
    transport.reply(200, { id: 5, name: "web-copy" });

    const copy = await new ContentView(config, { id: 4 }).copy("web-copy");

    expect(copy).toEqual({ id: 5, name: "web-copy" });
    expect(transport.jsonBody()).toEqual({ id: 4, name: "web-copy" });
  });

  it("removes the view from an environment given as an entity", async () => {
    transport.reply(202, { id: "task-10" });

    await new ContentView(config, { id: 4 }).deleteFromEnvironment(
      new LifecycleEnvironment(config, { id: 2 }),
      false
    );

    expect(transport.calls()).toEqual([`DELETE ${VIEW}/environments/2`]);
  });

  it("adds a puppet module by author and name", async () => {
    transport.reply(200, { id: 30 });

    await new ContentView(config, { id: 4 }).addPuppetModule("puppetlabs", "ntp");

    expect(transport.calls()).toEqual([`POST ${VIEW}/content_view_puppet_modules`]);
    expect(transport.jsonBody()).toEqual({ author: "puppetlabs", name: "ntp" });
  });
});
