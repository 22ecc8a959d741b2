/**
 * Ping Entity
 */

import { Entity, type EntityMeta, type FieldMap } from "@satkit/platform";

export class Ping extends Entity {
  protected defineFields(): FieldMap {
    return {};
  }

  get meta(): EntityMeta {
    return { apiPath: "katello/api/v2/ping", serverModes: ["sat", "sam"] };
  }
}
