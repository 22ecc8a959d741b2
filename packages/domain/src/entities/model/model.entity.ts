/**
 * Hardware Model Entity
 */

import { StringField } from "@satkit/contracts";
import {
  CreatableEntity,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
} from "@satkit/platform";

export class Model extends CreatableEntity<Model> {
  protected defineFields(): FieldMap {
    return {
      hardware_model: new StringField({ nullable: true }),
      info: new StringField({ nullable: true }),
      name: new StringField({ required: true }),
      vendor_class: new StringField({ nullable: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/models", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): Model {
    return new Model(this.config, values);
  }
}
