/**
 * Role Entities
 */

import { StringField } from "@satkit/contracts";
import {
  Entity,
  UpdatableEntity,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
} from "@satkit/platform";

export class Role extends UpdatableEntity<Role> {
  protected defineFields(): FieldMap {
    return {
      // the server needs at least 2 characters; 30 is arbitrary
      name: new StringField({ required: true, strType: "alphanumeric", length: [2, 30] }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/roles", serverModes: ["sat", "sam"] };
  }

  protected spawn(values?: EntityValues): Role {
    return new Role(this.config, values);
  }
}

/** LDAP groups mapped onto a role. */
export class RoleLDAPGroups extends Entity {
  protected defineFields(): FieldMap {
    return { name: new StringField({ required: true }) };
  }

  get meta(): EntityMeta {
    return { apiPath: "katello/api/v2/roles/:role_id/ldap_groups", serverModes: ["sat", "sam"] };
  }
}
