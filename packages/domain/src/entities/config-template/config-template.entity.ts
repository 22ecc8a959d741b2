/**
 * Config Template Entity
 *
 * Provisioning templates and snippets. A template that is not a snippet
 * needs a template kind; createMissing picks one of the kinds every server
 * ships with.
 */

import { faker } from "@faker-js/faker";
import { BooleanField, ListField, StringField, type JsonObject } from "@satkit/contracts";
import {
  OneToManyField,
  OneToOneField,
  UpdatableEntity,
  get,
  handleResponse,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
} from "@satkit/platform";
import { TemplateKind } from "../template-kind/template-kind.entity.js";

const BASE_SUB_PATHS = new Set(["revision", "build_pxe_default"]);

export class ConfigTemplate extends UpdatableEntity<ConfigTemplate> {
  protected defineFields(): FieldMap {
    return {
      audit_comment: new StringField({ nullable: true }),
      locked: new BooleanField({ nullable: true }),
      name: new StringField({ required: true }),
      operatingsystem: new OneToManyField("OperatingSystem", { nullable: true }),
      organization: new OneToManyField("Organization", { nullable: true }),
      snippet: new BooleanField({ required: true, nullable: true }),
      template: new StringField({ required: true }),
      template_combinations: new ListField({ nullable: true }),
      template_kind: new OneToOneField("TemplateKind", { nullable: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/config_templates", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): ConfigTemplate {
    return new ConfigTemplate(this.config, values);
  }

  /** `revision` and `build_pxe_default` hang off the collection, not an entity. */
  path(which?: string): string {
    if (which !== undefined && BASE_SUB_PATHS.has(which)) {
      return `${super.path("base")}/${which}`;
    }
    return super.path(which);
  }

  async createMissing(): Promise<void> {
    await super.createMissing();
    if (this.get("snippet") === false && !this.has("template_kind")) {
      const kind = new TemplateKind(this.config);
      const max = kind.meta.numCreatedByDefault ?? 1;
      this.set("template_kind", kind.set("id", faker.number.int({ min: 1, max })));
    }
  }

  createPayload(): JsonObject {
    return { config_template: super.createPayload() };
  }

  update(fields?: Iterable<string>): Promise<ConfigTemplate> {
    return this.updateThenRead(fields);
  }

  /** The template text at an audited revision. */
  async revision(version: string): Promise<unknown> {
    const response = await get(this.path("revision"), {
      ...this.config.getClientOptions(),
      data: { version },
    });
    return handleResponse(response, this.config);
  }

  /** Rebuilds the PXE default menu on every TFTP proxy. */
  async buildPxeDefault(): Promise<unknown> {
    const response = await get(this.path("build_pxe_default"), this.config.getClientOptions());
    return handleResponse(response, this.config);
  }
}
