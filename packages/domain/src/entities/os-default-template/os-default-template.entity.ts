/**
 * OS Default Template Entity
 */

import { Entity, OneToOneField, type EntityMeta, type FieldMap } from "@satkit/platform";

export class OSDefaultTemplate extends Entity {
  protected defineFields(): FieldMap {
    return {
      config_template: new OneToOneField("ConfigTemplate", { nullable: true }),
      operatingsystem: new OneToOneField("OperatingSystem"),
      template_kind: new OneToOneField("TemplateKind", { nullable: true }),
    };
  }

  get meta(): EntityMeta {
    return {
      apiPath: "api/v2/operatingsystems/:operatingsystem_id/os_default_templates",
      serverModes: ["sat"],
    };
  }
}
