/**
 * Content View Puppet Module Entity
 *
 * A puppet module pinned into a content view. The server refers to the
 * module by `uuid` rather than `puppet_module_id`, in both directions.
 */

import { StringField, type JsonObject } from "@satkit/contracts";
import {
  CreatableEntity,
  OneToOneField,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
  type ReadOptions,
} from "@satkit/platform";
import { idReference } from "../attrs.js";

export class ContentViewPuppetModule extends CreatableEntity<ContentViewPuppetModule> {
  protected defineFields(): FieldMap {
    return {
      author: new StringField(),
      content_view: new OneToOneField("ContentView", { required: true }),
      name: new StringField(),
      puppet_module: new OneToOneField("PuppetModule"),
    };
  }

  get meta(): EntityMeta {
    return {
      apiPath: `${this.requireEntity("content_view").path("self")}/content_view_puppet_modules`,
      serverModes: ["sat"],
    };
  }

  protected spawn(values?: EntityValues): ContentViewPuppetModule {
    return new ContentViewPuppetModule(this.config, {
      content_view: this.requireEntity("content_view"),
      ...values,
    });
  }

  async read(options: ReadOptions<ContentViewPuppetModule> = {}): Promise<ContentViewPuppetModule> {
    const attrs = idReference(options.attrs ?? (await this.readJson()), "uuid", "puppet_module");
    return super.read({ ...options, attrs, ignore: options.ignore ?? ["content_view"] });
  }

  createPayload(): JsonObject {
    const { puppet_module_id: uuid, ...data } = super.createPayload();
    return uuid === undefined ? data : { ...data, uuid };
  }
}
