/**
 * Errata Entity
 */

import { Entity, type EntityMeta, type FieldMap } from "@satkit/platform";

export class Errata extends Entity {
  protected defineFields(): FieldMap {
    return {};
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/errata", serverModes: ["sat"] };
  }
}
