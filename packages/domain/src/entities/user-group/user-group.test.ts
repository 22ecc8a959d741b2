/**
 * User Group: Test Suite
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ServerConfig, resetTransport, setTransport } from "@satkit/platform";
import { FakeTransport } from "@satkit/platform/testing";
import { UserGroup } from "../../index.js";

const config = new ServerConfig({ url: "https://sat.example.com" });

const GROUP = "https://sat.example.com/api/v2/usergroups/5";

const groupAttrs = {
  id: 5,
  name: "operators",
  roles: [{ id: 2 }],
  users: [{ id: 1 }, { id: 4 }],
  usergroups: [],
};

describe("UserGroup.read", () => {
  let transport: FakeTransport;

  beforeEach(() => {
    transport = new FakeTransport();
    setTransport(transport);
  });

  afterEach(() => {
    resetTransport();
  });

  it("fetches admin with an empty PUT when the GET omits it", async () => {
    transport.reply(200, groupAttrs).reply(200, { ...groupAttrs, admin: true });

    const group = await new UserGroup(config, { id: 5 }).read();

    expect(transport.calls()).toEqual([`GET ${GROUP}`, `PUT ${GROUP}`]);
    expect(transport.jsonBody(1)).toEqual({});
    expect(group.get("admin")).toBe(true);
    expect(group.getEntities("user").map((user) => user.id)).toEqual([1, 4]);
  });

  it("skips the PUT when admin is ignored", async () => {
    transport.reply(200, groupAttrs);

    const group = await new UserGroup(config, { id: 5 }).read({ ignore: ["admin"] });

    expect(transport.calls()).toEqual([`GET ${GROUP}`]);
    expect(group.has("admin")).toBe(false);
  });

  it("wraps the create payload", () => {
    const group = new UserGroup(config, { name: "operators", user: [1] });
    expect(group.createPayload()).toEqual({ usergroup: { name: "operators", user_ids: [1] } });
  });
});
