/**
 * Interface Entity
 *
 * A network interface of a host.
 */

import { IPAddressField, MACAddressField, StringField } from "@satkit/contracts";
import { Entity, OneToOneField, type EntityMeta, type FieldMap } from "@satkit/platform";

export class Interface extends Entity {
  protected defineFields(): FieldMap {
    return {
      domain: new OneToOneField("Domain", { nullable: true }),
      host: new OneToOneField("Host", { required: true }),
      type: new StringField({ required: true }),
      ip: new IPAddressField({ required: true }),
      mac: new MACAddressField({ required: true }),
      name: new StringField({ required: true }),
      password: new StringField({ nullable: true }),
      provider: new StringField({ nullable: true }),
      subnet: new OneToOneField("Subnet", { nullable: true }),
      username: new StringField({ nullable: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/hosts/:host_id/interfaces", serverModes: ["sat"] };
  }
}
