/**
 * Host Entity
 *
 * A managed machine. A host can only be provisioned once its domain,
 * puppet environment, architecture, partition table, operating system and
 * installation medium agree with each other, so createMissing builds that
 * whole chain rather than filling fields one at a time. It therefore only
 * runs on an empty host.
 */

import {
  BooleanField,
  HostCreateMissingError,
  ListField,
  MACAddressField,
  StringField,
  type JsonObject,
} from "@satkit/contracts";
import {
  OneToManyField,
  OneToOneField,
  UpdatableEntity,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
  type ReadOptions,
} from "@satkit/platform";
import { renameKeys } from "../attrs.js";
import { Architecture } from "../architecture/architecture.entity.js";
import { Domain } from "../domain/domain.entity.js";
import { Environment } from "../environment/environment.entity.js";
import { Media } from "../media/media.entity.js";
import { OperatingSystem } from "../operating-system/operating-system.entity.js";
import { PartitionTable } from "../partition-table/partition-table.entity.js";

export class Host extends UpdatableEntity<Host> {
  protected defineFields(): FieldMap {
    return {
      architecture: new OneToOneField("Architecture", { nullable: true }),
      build: new BooleanField({ nullable: true }),
      capabilities: new StringField({ nullable: true }),
      compute_profile: new OneToOneField("ComputeProfile", { nullable: true }),
      compute_resource: new OneToOneField("AbstractComputeResource", { nullable: true }),
      domain: new OneToOneField("Domain", { nullable: true }),
      enabled: new BooleanField({ nullable: true }),
      environment: new OneToOneField("Environment", { nullable: true }),
      hostgroup: new OneToOneField("HostGroup", { nullable: true }),
      host_parameters_attributes: new ListField({ nullable: true }),
      image: new OneToOneField("Image", { nullable: true }),
      ip: new StringField({ nullable: true }),
      location: new OneToOneField("Location", { required: true }),
      mac: new MACAddressField({ nullable: true }),
      managed: new BooleanField({ nullable: true }),
      medium: new OneToOneField("Media", { nullable: true }),
      model: new OneToOneField("Model", { nullable: true }),
      name: new StringField({ required: true, strType: "alpha" }),
      operatingsystem: new OneToOneField("OperatingSystem", { nullable: true }),
      organization: new OneToOneField("Organization", { required: true }),
      owner: new OneToOneField("User", { nullable: true }),
      owner_type: new StringField({ choices: ["User", "Usergroup"], nullable: true }),
      provision_method: new StringField({ nullable: true }),
      ptable: new OneToOneField("PartitionTable", { nullable: true }),
      puppet_classes: new OneToManyField("PuppetClass", { nullable: true }),
      puppet_proxy: new OneToOneField("SmartProxy", { nullable: true }),
      realm: new OneToOneField("Realm", { nullable: true }),
      root_pass: new StringField({ length: [8, 30] }),
      sp_subnet: new OneToOneField("Subnet", { nullable: true }),
      subnet: new OneToOneField("Subnet", { nullable: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/hosts", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): Host {
    return new Host(this.config, values);
  }

  /**
   * Creates a location, an organization and a consistent provisioning chain,
   * then fills the host's own required fields.
   * Throws HostCreateMissingError if any value is already set.
   */
  async createMissing(): Promise<void> {
    const existing = Object.keys(this.getValues());
    if (existing.length > 0) {
      throw new HostCreateMissingError(`Found instance attributes: [${existing.join(", ")}]`);
    }
    await super.createMissing();

    const fields = this.getFields();
    const name = this.get("name");
    if (typeof name === "string") this.set("name", name.toLowerCase());
    this.set("mac", fields.mac?.genValue());
    this.set("root_pass", fields.root_pass?.genValue());

    const location = this.get("location");
    const organization = this.get("organization");
    const scope = { location: [location], organization: [organization] };
    const options = { createMissing: true };

    this.set("domain", await new Domain(this.config, scope).create(options));
    this.set("environment", await new Environment(this.config, scope).create(options));
    const architecture = await new Architecture(this.config).create(options);
    const ptable = await new PartitionTable(this.config).create(options);
    const operatingsystem = await new OperatingSystem(this.config, {
      architecture: [architecture],
      ptable: [ptable],
    }).create(options);
    this.set("architecture", architecture);
    this.set("ptable", ptable);
    this.set("operatingsystem", operatingsystem);
    this.set(
      "medium",
      await new Media(this.config, { operatingsystem: [operatingsystem], ...scope }).create(options)
    );
  }

  createPayload(): JsonObject {
    return { host: super.createPayload() };
  }

  /** The root password is write-only and is ignored by default. */
  async read(options: ReadOptions<Host> = {}): Promise<Host> {
    const attrs = renameKeys(options.attrs ?? (await this.readJson()), {
      parameters: "host_parameters_attributes",
      puppetclasses: "puppet_classes",
    });
    return super.read({ ...options, attrs, ignore: options.ignore ?? ["root_pass"] });
  }

  update(fields?: Iterable<string>): Promise<Host> {
    return this.updateThenRead(fields);
  }
}
