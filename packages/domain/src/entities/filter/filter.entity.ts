/**
 * Filter Entity
 *
 * Grants a role a set of permissions, optionally narrowed by a search.
 */

import { StringField } from "@satkit/contracts";
import {
  CreatableEntity,
  OneToManyField,
  OneToOneField,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
} from "@satkit/platform";

export class Filter extends CreatableEntity<Filter> {
  protected defineFields(): FieldMap {
    return {
      location: new OneToManyField("Location", { nullable: true }),
      organization: new OneToManyField("Organization", { nullable: true }),
      permission: new OneToManyField("Permission", { nullable: true }),
      role: new OneToOneField("Role", { required: true }),
      search: new StringField({ nullable: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/filters", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): Filter {
    return new Filter(this.config, values);
  }
}
