/**
 * Config Group Entity
 */

import { StringField } from "@satkit/contracts";
import { Entity, type EntityMeta, type FieldMap } from "@satkit/platform";

export class ConfigGroup extends Entity {
  protected defineFields(): FieldMap {
    return { name: new StringField({ required: true }) };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/config_groups", serverModes: ["sat"] };
  }
}
