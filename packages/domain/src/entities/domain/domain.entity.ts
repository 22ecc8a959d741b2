/**
 * Domain Entity
 *
 * A DNS domain hosts are provisioned into.
 */

import { faker } from "@faker-js/faker";
import { ListField, StringField, type JsonObject } from "@satkit/contracts";
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

export class Domain extends UpdatableEntity<Domain> {
  protected defineFields(): FieldMap {
    return {
      dns: new OneToOneField("SmartProxy", { nullable: true }),
      domain_parameters_attributes: new ListField({ nullable: true }),
      fullname: new StringField({ nullable: true }),
      location: new OneToManyField("Location", { nullable: true }),
      name: new StringField({ required: true }),
      organization: new OneToManyField("Organization", { nullable: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/domains", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): Domain {
    return new Domain(this.config, values);
  }

  /** Domain names must be valid hostnames: lowercase alphanumerics. */
  async createMissing(): Promise<void> {
    if (!this.has("name")) {
      this.set("name", faker.string.alphanumeric({ length: 10, casing: "lower" }));
    }
    await super.createMissing();
  }

  createPayload(): JsonObject {
    return { domain: super.createPayload() };
  }

  protected readCreated(json: JsonObject): Promise<Domain> {
    return this.readBackById(json);
  }

  async read(options: ReadOptions<Domain> = {}): Promise<Domain> {
    const attrs = renameKeys(options.attrs ?? (await this.readJson()), {
      parameters: "domain_parameters_attributes",
    });
    return super.read({ ...options, attrs });
  }

  update(fields?: Iterable<string>): Promise<Domain> {
    return this.updateThenRead(fields);
  }
}
