/**
 * GPG Key Entity
 */

import { StringField } from "@satkit/contracts";
import {
  CreatableEntity,
  OneToOneField,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
} from "@satkit/platform";

export class GPGKey extends CreatableEntity<GPGKey> {
  protected defineFields(): FieldMap {
    return {
      content: new StringField({ required: true }),
      name: new StringField({ required: true }),
      organization: new OneToOneField("Organization", { required: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "katello/api/v2/gpg_keys", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): GPGKey {
    return new GPGKey(this.config, values);
  }
}
