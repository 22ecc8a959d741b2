/**
 * Compute Attribute Entity
 *
 * The VM settings a compute profile applies on one compute resource.
 */

import { Entity, OneToOneField, type EntityMeta, type FieldMap } from "@satkit/platform";

export class ComputeAttribute extends Entity {
  protected defineFields(): FieldMap {
    return {
      compute_profile: new OneToOneField("ComputeProfile", { required: true }),
      compute_resource: new OneToOneField("AbstractComputeResource", { required: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/compute_attributes", serverModes: ["sat"] };
  }
}
