/**
 * Realm Entity
 *
 * An identity realm (FreeIPA or Active Directory) served by a smart proxy.
 */

import { StringField, type JsonObject } from "@satkit/contracts";
import {
  OneToManyField,
  OneToOneField,
  UpdatableEntity,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
} from "@satkit/platform";

export class Realm extends UpdatableEntity<Realm> {
  protected defineFields(): FieldMap {
    return {
      location: new OneToManyField("Location"),
      name: new StringField({ required: true }),
      organization: new OneToManyField("Organization"),
      realm_proxy: new OneToOneField("SmartProxy", { required: true }),
      realm_type: new StringField({
        choices: ["Red Hat Identity Management", "Active Directory"],
        required: true,
      }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/realms", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): Realm {
    return new Realm(this.config, values);
  }

  protected readCreated(json: JsonObject): Promise<Realm> {
    return this.readBackById(json);
  }
}
