/**
 * Architecture Entity
 */

import { StringField, type JsonObject } from "@satkit/contracts";
import {
  OneToManyField,
  UpdatableEntity,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
} from "@satkit/platform";

export class Architecture extends UpdatableEntity<Architecture> {
  protected defineFields(): FieldMap {
    return {
      name: new StringField({ required: true }),
      operatingsystem: new OneToManyField("OperatingSystem", { nullable: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/architectures", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): Architecture {
    return new Architecture(this.config, values);
  }

  createPayload(): JsonObject {
    return { architecture: super.createPayload() };
  }

  update(fields?: Iterable<string>): Promise<Architecture> {
    return this.updateThenRead(fields);
  }
}
