/**
 * Compute Profile Entity
 */

import { StringField } from "@satkit/contracts";
import {
  CreatableEntity,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
} from "@satkit/platform";

export class ComputeProfile extends CreatableEntity<ComputeProfile> {
  protected defineFields(): FieldMap {
    return { name: new StringField({ required: true }) };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/compute_profiles", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): ComputeProfile {
    return new ComputeProfile(this.config, values);
  }
}
