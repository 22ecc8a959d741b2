/**
 * Content Upload Entity
 */

import { Entity, OneToOneField, type EntityMeta, type FieldMap } from "@satkit/platform";

export class ContentUpload extends Entity {
  protected defineFields(): FieldMap {
    return { repository: new OneToOneField("Repository", { required: true }) };
  }

  get meta(): EntityMeta {
    return {
      apiPath: "katello/api/v2/repositories/:repository_id/content_uploads",
      serverModes: ["sat"],
    };
  }
}
