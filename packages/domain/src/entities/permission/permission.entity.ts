/**
 * Permission Entity
 *
 * Permissions are fixed by the server. searchPermissions() is a plain
 * index query by name and resource type, returning the raw results.
 */

import { StringField, type JsonObject } from "@satkit/contracts";
import {
  ReadableEntity,
  get,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
} from "@satkit/platform";
import { resultsOf } from "../attrs.js";

export interface PermissionSearchOptions {
  /** Page size (default 10000, large enough for every permission) */
  perPage?: number;
}

export class Permission extends ReadableEntity<Permission> {
  protected defineFields(): FieldMap {
    return {
      name: new StringField({ required: true }),
      resource_type: new StringField({ required: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/permissions", serverModes: ["sat", "sam"] };
  }

  protected spawn(values?: EntityValues): Permission {
    return new Permission(this.config, values);
  }

  async searchPermissions(options: PermissionSearchOptions = {}): Promise<JsonObject[]> {
    const data: JsonObject = { per_page: options.perPage ?? 10_000 };
    if (this.has("name")) data.name = this.get("name");
    if (this.has("resource_type")) data.resource_type = this.get("resource_type");

    const response = await get(this.path("base"), { ...this.config.getClientOptions(), data });
    response.raiseForStatus();
    return resultsOf(response.json(), `GET ${response.url}`);
  }
}
