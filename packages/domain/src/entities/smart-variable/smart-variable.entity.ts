/**
 * Smart Variable Entity
 */

import { StringField } from "@satkit/contracts";
import { Entity, OneToOneField, type EntityMeta, type FieldMap } from "@satkit/platform";

export class SmartVariable extends Entity {
  protected defineFields(): FieldMap {
    return {
      default_value: new StringField({ nullable: true }),
      description: new StringField({ nullable: true }),
      override_value_order: new StringField({ nullable: true }),
      puppetclass: new OneToOneField("PuppetClass", { nullable: true }),
      validator_rule: new StringField({ nullable: true }),
      validator_type: new StringField({ nullable: true }),
      variable: new StringField({ required: true }),
      variable_type: new StringField({ nullable: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/smart_variables", serverModes: ["sat"] };
  }
}
