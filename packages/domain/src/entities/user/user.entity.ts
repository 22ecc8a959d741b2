/**
 * User Entity
 */

import { BooleanField, EmailField, StringField, type JsonObject } from "@satkit/contracts";
import {
  OneToManyField,
  OneToOneField,
  UpdatableEntity,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
  type ReadOptions,
} from "@satkit/platform";
import { AuthSourceLDAP } from "../auth-source-ldap/auth-source-ldap.entity.js";

/** The internal authentication source every installation ships with */
const INTERNAL_AUTH_SOURCE_ID = 1;

export class User extends UpdatableEntity<User> {
  protected defineFields(): FieldMap {
    return {
      admin: new BooleanField({ nullable: true }),
      auth_source: new OneToOneField("AuthSourceLDAP", {
        default: new AuthSourceLDAP(this.config, { id: INTERNAL_AUTH_SOURCE_ID }),
        required: true,
      }),
      default_location: new OneToOneField("Location", { nullable: true }),
      default_organization: new OneToOneField("Organization", { nullable: true }),
      firstname: new StringField({ length: [1, 50], nullable: true }),
      lastname: new StringField({ length: [1, 50], nullable: true }),
      location: new OneToManyField("Location", { nullable: true }),
      login: new StringField({
        length: [1, 100],
        required: true,
        strType: ["alpha", "alphanumeric", "cjk", "latin1", "utf8"],
      }),
      mail: new EmailField({ required: true }),
      organization: new OneToManyField("Organization", { nullable: true }),
      password: new StringField({ required: true }),
      role: new OneToManyField("Role", { nullable: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/users", serverModes: ["sat", "sam"] };
  }

  protected spawn(values?: EntityValues): User {
    return new User(this.config, values);
  }

  createPayload(): JsonObject {
    return { user: super.createPayload() };
  }

  updatePayload(fields?: Iterable<string>): JsonObject {
    return { user: super.updatePayload(fields) };
  }

  read(options: ReadOptions<User> = {}): Promise<User> {
    return super.read({ ...options, ignore: options.ignore ?? ["password"] });
  }

  update(fields?: Iterable<string>): Promise<User> {
    return this.updateThenRead(fields);
  }
}
