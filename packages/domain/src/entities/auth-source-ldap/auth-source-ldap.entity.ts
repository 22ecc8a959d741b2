/**
 * LDAP Authentication Source Entity
 *
 * When `onthefly_register` is on, the server needs the account password and
 * the attribute mappings as well; createMissing fills those in too.
 */

import { BooleanField, EmailField, IntegerField, StringField } from "@satkit/contracts";
import {
  CreatableEntity,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
  type ReadOptions,
} from "@satkit/platform";

const REGISTRATION_FIELDS = [
  "account_password",
  "attr_firstname",
  "attr_lastname",
  "attr_login",
  "attr_mail",
] as const;

export class AuthSourceLDAP extends CreatableEntity<AuthSourceLDAP> {
  protected defineFields(): FieldMap {
    return {
      account: new StringField({ nullable: true }),
      attr_photo: new StringField({ nullable: true }),
      base_dn: new StringField({ nullable: true }),
      host: new StringField({ required: true, length: [1, 60] }),
      name: new StringField({ required: true, length: [1, 60] }),
      onthefly_register: new BooleanField({ nullable: true }),
      port: new IntegerField({ nullable: true }),
      tls: new BooleanField({ nullable: true }),
      account_password: new StringField({ nullable: true }),
      attr_firstname: new StringField({ nullable: true }),
      attr_lastname: new StringField({ nullable: true }),
      attr_login: new StringField({ nullable: true }),
      attr_mail: new EmailField({ nullable: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/auth_source_ldaps", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): AuthSourceLDAP {
    return new AuthSourceLDAP(this.config, values);
  }

  async createMissing(): Promise<void> {
    await super.createMissing();
    if (this.get("onthefly_register") !== true) return;
    const fields = this.getFields();
    for (const name of REGISTRATION_FIELDS) {
      const field = fields[name];
      if (field !== undefined) this.set(name, field.genValue());
    }
  }

  /** The server never returns the account password. */
  read(options: ReadOptions<AuthSourceLDAP> = {}): Promise<AuthSourceLDAP> {
    return super.read({ ...options, ignore: options.ignore ?? ["account_password"] });
  }
}
