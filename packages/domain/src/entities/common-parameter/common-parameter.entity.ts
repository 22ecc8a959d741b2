/**
 * Common Parameter Entity
 */

import { StringField } from "@satkit/contracts";
import { Entity, type EntityMeta, type FieldMap } from "@satkit/platform";

export class CommonParameter extends Entity {
  protected defineFields(): FieldMap {
    return {
      name: new StringField({ required: true }),
      value: new StringField({ required: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/common_parameters", serverModes: ["sat"] };
  }
}
