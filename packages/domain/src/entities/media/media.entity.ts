/**
 * Media Entity
 *
 * An installation medium. Its URL is stored in `path_` because `path` is
 * the entity's URL builder; the rename is undone on the wire.
 */

import { faker } from "@faker-js/faker";
import { StringField, URLField, type JsonObject } from "@satkit/contracts";
import {
  CreatableEntity,
  OneToManyField,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
  type ReadOptions,
} from "@satkit/platform";
import { renameKeys } from "../attrs.js";
import { MEDIA_OS_FAMILIES } from "../os-families.js";

export class Media extends CreatableEntity<Media> {
  protected defineFields(): FieldMap {
    return {
      path_: new URLField({ required: true }),
      name: new StringField({ required: true }),
      operatingsystem: new OneToManyField("OperatingSystem", { nullable: true }),
      organization: new OneToManyField("Organization", { nullable: true }),
      location: new OneToManyField("Location", { nullable: true }),
      os_family: new StringField({ choices: MEDIA_OS_FAMILIES, nullable: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/media", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): Media {
    return new Media(this.config, values);
  }

  async createMissing(): Promise<void> {
    if (!this.has("path_")) {
      const subdomain = faker.string.alpha({ length: { min: 3, max: 12 }, casing: "lower" });
      this.set("path_", `http://${subdomain}.${faker.internet.domainName()}`);
    }
    await super.createMissing();
  }

  createPayload(): JsonObject {
    return { medium: renameKeys(super.createPayload(), { path_: "path" }) };
  }

  protected readCreated(json: JsonObject): Promise<Media> {
    return this.readBackById(json);
  }

  async read(options: ReadOptions<Media> = {}): Promise<Media> {
    const attrs = renameKeys(options.attrs ?? (await this.readJson()), { path: "path_" });
    return super.read({ ...options, attrs });
  }
}
