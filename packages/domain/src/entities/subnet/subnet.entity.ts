/**
 * Subnet Entity
 *
 * Boot mode, IPAM and the per-service smart proxies arrived in 6.1.
 */

import {
  IPAddressField,
  NetmaskField,
  StringField,
  type JsonObject,
} from "@satkit/contracts";
import {
  OneToManyField,
  OneToOneField,
  CreatableEntity,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
  type ReadOptions,
} from "@satkit/platform";

export class Subnet extends CreatableEntity<Subnet> {
  protected defineFields(): FieldMap {
    const fields: FieldMap = {
      dns_primary: new IPAddressField({ nullable: true }),
      dns_secondary: new IPAddressField({ nullable: true }),
      domain: new OneToManyField("Domain", { nullable: true }),
      from: new IPAddressField({ nullable: true }),
      gateway: new StringField({ nullable: true }),
      mask: new NetmaskField({ required: true }),
      name: new StringField({ required: true }),
      network: new IPAddressField({ required: true }),
      to: new IPAddressField({ nullable: true }),
      vlanid: new StringField({ nullable: true }),
    };
    if (this.config.versionBelow("6.1")) {
      return fields;
    }
    return {
      ...fields,
      boot_mode: new StringField({ choices: ["Static", "DHCP"], default: "DHCP", nullable: true }),
      dhcp: new OneToOneField("SmartProxy", { nullable: true }),
      discovery: new OneToOneField("SmartProxy", { nullable: true }),
      dns: new OneToOneField("SmartProxy", { nullable: true }),
      ipam: new StringField({ choices: ["DHCP", "Internal DB"], default: "DHCP", nullable: true }),
      location: new OneToManyField("Location", { nullable: true }),
      organization: new OneToManyField("Organization", { nullable: true }),
      tftp: new OneToOneField("SmartProxy", { nullable: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/subnets", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): Subnet {
    return new Subnet(this.config, values);
  }

  createPayload(): JsonObject {
    return { subnet: super.createPayload() };
  }

  read(options: ReadOptions<Subnet> = {}): Promise<Subnet> {
    // the server never returns the discovery proxy
    return super.read({ ...options, ignore: options.ignore ?? ["discovery"] });
  }
}
