/**
 * Environment Entity
 *
 * A puppet environment. Not to be confused with LifecycleEnvironment.
 */

import { StringField, type JsonObject } from "@satkit/contracts";
import {
  CreatableEntity,
  OneToManyField,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
} from "@satkit/platform";

export class Environment extends CreatableEntity<Environment> {
  protected defineFields(): FieldMap {
    return {
      location: new OneToManyField("Location", { nullable: true }),
      // no whitespace allowed
      name: new StringField({ required: true, strType: "alphanumeric" }),
      organization: new OneToManyField("Organization", { nullable: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/environments", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): Environment {
    return new Environment(this.config, values);
  }

  createPayload(): JsonObject {
    return { environment: super.createPayload() };
  }
}
