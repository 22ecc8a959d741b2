/**
 * Puppet Module Entity
 *
 * Modules arrive through repository uploads and can only be read. Unlike
 * other entities this one declares no server modes.
 */

import { ListField, StringField, URLField } from "@satkit/contracts";
import {
  OneToManyField,
  ReadableEntity,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
} from "@satkit/platform";

export class PuppetModule extends ReadableEntity<PuppetModule> {
  protected defineFields(): FieldMap {
    return {
      author: new StringField(),
      checksums: new ListField(),
      dependencies: new ListField(),
      description: new StringField(),
      license: new StringField(),
      name: new StringField(),
      project_page: new URLField(),
      repository: new OneToManyField("Repository"),
      source: new URLField(),
      summary: new StringField(),
      version: new StringField(),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "katello/api/v2/puppet_modules", serverModes: [] };
  }

  protected spawn(values?: EntityValues): PuppetModule {
    return new PuppetModule(this.config, values);
  }
}
