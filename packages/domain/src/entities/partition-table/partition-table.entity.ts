/**
 * Partition Table Entity
 */

import { StringField } from "@satkit/contracts";
import {
  CreatableEntity,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
} from "@satkit/platform";
import { OS_FAMILIES } from "../os-families.js";

export class PartitionTable extends CreatableEntity<PartitionTable> {
  protected defineFields(): FieldMap {
    return {
      layout: new StringField({ required: true }),
      name: new StringField({ required: true }),
      os_family: new StringField({ choices: OS_FAMILIES, nullable: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/ptables", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): PartitionTable {
    return new PartitionTable(this.config, values);
  }
}
