/**
 * Puppet Class Entity
 */

import { StringField } from "@satkit/contracts";
import {
  CreatableEntity,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
} from "@satkit/platform";

export class PuppetClass extends CreatableEntity<PuppetClass> {
  protected defineFields(): FieldMap {
    return { name: new StringField({ required: true }) };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/puppetclasses", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): PuppetClass {
    return new PuppetClass(this.config, values);
  }
}
