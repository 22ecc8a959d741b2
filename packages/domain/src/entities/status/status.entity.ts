/**
 * Status Entity
 */

import { Entity, type EntityMeta, type FieldMap } from "@satkit/platform";

export class Status extends Entity {
  protected defineFields(): FieldMap {
    return {};
  }

  get meta(): EntityMeta {
    return { apiPath: "katello/api/v2/status", serverModes: ["sat"] };
  }
}
