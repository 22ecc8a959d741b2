/**
 * Report Entity
 */

import { DateTimeField, ListField, StringField } from "@satkit/contracts";
import { Entity, type EntityMeta, type FieldMap } from "@satkit/platform";

export class Report extends Entity {
  protected defineFields(): FieldMap {
    return {
      host: new StringField({ required: true }),
      logs: new ListField({ nullable: true }),
      reported_at: new DateTimeField({ required: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/reports", serverModes: ["sat"] };
  }
}
