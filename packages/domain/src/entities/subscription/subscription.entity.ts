/**
 * Subscription Entity
 *
 * Only used as a payload shape; subscriptions are attached through
 * activation keys and organizations.
 */

import { IntegerField, StringField } from "@satkit/contracts";
import {
  Entity,
  OneToManyField,
  OneToOneField,
  type EntityMeta,
  type FieldMap,
} from "@satkit/platform";

export class Subscription extends Entity {
  protected defineFields(): FieldMap {
    return {
      activation_key: new OneToOneField("ActivationKey"),
      pool_uuid: new StringField(),
      quantity: new IntegerField(),
      subscriptions: new OneToManyField("Subscription"),
      system: new OneToOneField("System"),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "katello/api/v2/subscriptions/:id", serverModes: ["sat", "sam"] };
  }
}
