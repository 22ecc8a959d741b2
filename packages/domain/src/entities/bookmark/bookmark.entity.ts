/**
 * Bookmark Entity
 *
 * A saved search. Carries no HTTP operations.
 */

import { BooleanField, StringField } from "@satkit/contracts";
import { Entity, type EntityMeta, type FieldMap } from "@satkit/platform";

export class Bookmark extends Entity {
  protected defineFields(): FieldMap {
    return {
      controller: new StringField({ required: true }),
      name: new StringField({ required: true }),
      public: new BooleanField({ nullable: true }),
      query: new StringField({ required: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/bookmarks", serverModes: ["sat"] };
  }
}
