/**
 * User Group Entity
 */

import { BooleanField, StringField, type JsonObject } from "@satkit/contracts";
import {
  CreatableEntity,
  OneToManyField,
  expectJsonObject,
  put,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
  type ReadOptions,
} from "@satkit/platform";

export class UserGroup extends CreatableEntity<UserGroup> {
  protected defineFields(): FieldMap {
    return {
      admin: new BooleanField({ nullable: true }),
      name: new StringField({ required: true }),
      role: new OneToManyField("Role", { nullable: true }),
      user: new OneToManyField("User", { required: true }),
      usergroup: new OneToManyField("UserGroup", { nullable: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/usergroups", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): UserGroup {
    return new UserGroup(this.config, values);
  }

  createPayload(): JsonObject {
    return { usergroup: super.createPayload() };
  }

  /**
   * GET omits `admin`. An empty PUT returns the full record, so it is
   * fetched that way when missing.
   */
  async read(options: ReadOptions<UserGroup> = {}): Promise<UserGroup> {
    const ignore = new Set(options.ignore ?? []);
    const attrs = { ...(options.attrs ?? (await this.readJson())) };
    if (!Object.hasOwn(attrs, "admin") && !ignore.has("admin")) {
      const response = await put(this.path("self"), {}, this.config.getClientOptions());
      response.raiseForStatus();
      attrs.admin = expectJsonObject(response.json(), `PUT ${response.url}`).admin ?? null;
    }
    return super.read({ ...options, attrs, ignore });
  }
}
