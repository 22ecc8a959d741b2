/**
 * Host Group Entity
 *
 * Host groups nest: `parent` comes back from the server as `ancestry`.
 */

import { StringField, type JsonObject } from "@satkit/contracts";
import {
  CreatableEntity,
  OneToManyField,
  OneToOneField,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
  type ReadOptions,
} from "@satkit/platform";
import { idReference } from "../attrs.js";

export class HostGroup extends CreatableEntity<HostGroup> {
  protected defineFields(): FieldMap {
    return {
      architecture: new OneToOneField("Architecture", { nullable: true }),
      domain: new OneToOneField("Domain", { nullable: true }),
      environment: new OneToOneField("Environment", { nullable: true }),
      location: new OneToManyField("Location", { nullable: true }),
      medium: new OneToOneField("Media", { nullable: true }),
      name: new StringField({ required: true }),
      operatingsystem: new OneToOneField("OperatingSystem", { nullable: true }),
      organization: new OneToManyField("Organization", { nullable: true }),
      parent: new OneToOneField("HostGroup", { nullable: true }),
      ptable: new OneToOneField("PartitionTable", { nullable: true }),
      realm: new OneToOneField("Realm", { nullable: true }),
      subnet: new OneToOneField("Subnet", { nullable: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/hostgroups", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): HostGroup {
    return new HostGroup(this.config, values);
  }

  createPayload(): JsonObject {
    return { hostgroup: super.createPayload() };
  }

  async read(options: ReadOptions<HostGroup> = {}): Promise<HostGroup> {
    const attrs = idReference(options.attrs ?? (await this.readJson()), "ancestry", "parent");
    return super.read({ ...options, attrs });
  }
}
