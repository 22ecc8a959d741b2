/**
 * Override Value Entity
 *
 * Override values also exist under smart class parameters
 * (api/v2/smart_class_parameters/:id/override_values); only the smart
 * variable form is modelled.
 */

import { StringField } from "@satkit/contracts";
import { Entity, OneToOneField, type EntityMeta, type FieldMap } from "@satkit/platform";

export class OverrideValue extends Entity {
  protected defineFields(): FieldMap {
    return {
      match: new StringField({ nullable: true }),
      smart_variable: new OneToOneField("SmartVariable"),
      value: new StringField({ nullable: true }),
    };
  }

  get meta(): EntityMeta {
    return {
      apiPath: "api/v2/smart_variables/:smart_variable_id/override_values",
      serverModes: ["sat"],
    };
  }
}
