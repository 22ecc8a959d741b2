/**
 * Image Entity
 */

import { StringField } from "@satkit/contracts";
import { Entity, OneToOneField, type EntityMeta, type FieldMap } from "@satkit/platform";

export class Image extends Entity {
  protected defineFields(): FieldMap {
    return {
      architecture: new OneToOneField("Architecture", { required: true }),
      compute_resource: new OneToOneField("AbstractComputeResource", { required: true }),
      name: new StringField({ required: true }),
      operatingsystem: new OneToOneField("OperatingSystem", { required: true }),
      username: new StringField({ required: true }),
      uuid: new StringField({ required: true }),
    };
  }

  get meta(): EntityMeta {
    return {
      apiPath: "api/v2/compute_resources/:compute_resource_id/images",
      serverModes: ["sat"],
    };
  }
}
