/**
 * Location Entity
 */

import { StringField, type JsonObject } from "@satkit/contracts";
import {
  CreatableEntity,
  OneToManyField,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
  type ReadOptions,
} from "@satkit/platform";

export class Location extends CreatableEntity<Location> {
  protected defineFields(): FieldMap {
    return {
      compute_resource: new OneToManyField("AbstractComputeResource", { nullable: true }),
      config_template: new OneToManyField("ConfigTemplate", { nullable: true }),
      description: new StringField(),
      domain: new OneToManyField("Domain", { nullable: true }),
      environment: new OneToManyField("Environment", { nullable: true }),
      hostgroup: new OneToManyField("HostGroup", { nullable: true }),
      media: new OneToManyField("Media", { nullable: true }),
      name: new StringField({ required: true }),
      organization: new OneToManyField("Organization", { nullable: true }),
      realm: new OneToManyField("Realm", { nullable: true }),
      smart_proxy: new OneToManyField("SmartProxy", { nullable: true }),
      subnet: new OneToManyField("Subnet", { nullable: true }),
      user: new OneToManyField("User", { nullable: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/locations", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): Location {
    return new Location(this.config, values);
  }

  createPayload(): JsonObject {
    return { location: super.createPayload() };
  }

  protected readCreated(json: JsonObject): Promise<Location> {
    return this.readBackById(json);
  }

  /** Realms are not returned reliably and are ignored by default. */
  read(options: ReadOptions<Location> = {}): Promise<Location> {
    return super.read({ ...options, ignore: options.ignore ?? ["realm"] });
  }
}
