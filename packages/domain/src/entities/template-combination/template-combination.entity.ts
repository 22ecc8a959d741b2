/**
 * Template Combination Entity
 */

import { Entity, OneToOneField, type EntityMeta, type FieldMap } from "@satkit/platform";

export class TemplateCombination extends Entity {
  protected defineFields(): FieldMap {
    return {
      config_template: new OneToOneField("ConfigTemplate", { required: true }),
      environment: new OneToOneField("Environment", { nullable: true }),
      hostgroup: new OneToOneField("HostGroup", { nullable: true }),
    };
  }

  get meta(): EntityMeta {
    return {
      apiPath: "api/v2/config_templates/:config_template_id/template_combinations",
      serverModes: ["sat"],
    };
  }
}
