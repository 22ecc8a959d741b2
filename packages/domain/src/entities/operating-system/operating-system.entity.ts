/**
 * Operating System Entities
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
import { OS_FAMILIES } from "../os-families.js";

export class OperatingSystem extends CreatableEntity<OperatingSystem> {
  protected defineFields(): FieldMap {
    return {
      architecture: new OneToManyField("Architecture"),
      description: new StringField({ nullable: true }),
      family: new StringField({ choices: OS_FAMILIES, nullable: true }),
      major: new StringField({ length: [1, 5], required: true, strType: "numeric" }),
      media: new OneToManyField("Media"),
      minor: new StringField({ length: [1, 16], nullable: true, strType: "numeric" }),
      name: new StringField({ required: true }),
      ptable: new OneToManyField("PartitionTable"),
      release_name: new StringField({ nullable: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/operatingsystems", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): OperatingSystem {
    return new OperatingSystem(this.config, values);
  }

  createPayload(): JsonObject {
    return { operatingsystem: super.createPayload() };
  }
}

/** A parameter attached to one operating system. */
export class OperatingSystemParameter extends CreatableEntity<OperatingSystemParameter> {
  protected defineFields(): FieldMap {
    return {
      name: new StringField({ required: true }),
      operatingsystem: new OneToOneField("OperatingSystem", { required: true }),
      value: new StringField({ required: true }),
    };
  }

  get meta(): EntityMeta {
    return {
      apiPath: `${this.requireEntity("operatingsystem").path("self")}/parameters`,
      serverModes: ["sat"],
    };
  }

  protected spawn(values?: EntityValues): OperatingSystemParameter {
    return new OperatingSystemParameter(this.config, {
      operatingsystem: this.requireEntity("operatingsystem"),
      ...values,
    });
  }

  read(options: ReadOptions<OperatingSystemParameter> = {}): Promise<OperatingSystemParameter> {
    return super.read({ ...options, ignore: options.ignore ?? ["operatingsystem"] });
  }
}
