/**
 * Organization Entity
 *
 * The top-level tenant. Besides CRUD, an organization owns its
 * subscription manifest and the Red Hat products that manifest unlocks.
 */

import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { StringField, type JsonObject } from "@satkit/contracts";
import {
  OneToManyField,
  UpdatableEntity,
  get,
  handleResponse,
  post,
  put,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
  type ReadOptions,
} from "@satkit/platform";
import { resultsOf } from "../attrs.js";
import { formatSyncDate } from "../sync-plan/sync-plan.entity.js";

const SUB_PATHS = new Set([
  "products",
  "subscriptions",
  "subscriptions/delete_manifest",
  "subscriptions/refresh_manifest",
  "subscriptions/upload",
  "sync_plans",
]);

export interface UploadManifestOptions {
  /** Where the server should fetch Red Hat content from */
  repositoryUrl?: string;
  /** Wait for the import task (default true) */
  synchronous?: boolean;
}

export class Organization extends UpdatableEntity<Organization> {
  protected defineFields(): FieldMap {
    return {
      compute_resource: new OneToManyField("AbstractComputeResource"),
      config_template: new OneToManyField("ConfigTemplate"),
      description: new StringField(),
      domain: new OneToManyField("Domain"),
      environment: new OneToManyField("Environment"),
      hostgroup: new OneToManyField("HostGroup"),
      label: new StringField({ strType: "alpha" }),
      media: new OneToManyField("Media"),
      name: new StringField({ required: true }),
      realm: new OneToManyField("Realm"),
      smart_proxy: new OneToManyField("SmartProxy"),
      subnet: new OneToManyField("Subnet"),
      title: new StringField(),
      user: new OneToManyField("User"),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "katello/api/v2/organizations", serverModes: ["sat", "sam"] };
  }

  protected spawn(values?: EntityValues): Organization {
    return new Organization(this.config, values);
  }

  path(which?: string): string {
    if (which !== undefined && SUB_PATHS.has(which)) {
      return `${super.path("self")}/${which}`;
    }
    return super.path(which);
  }

  protected readCreated(json: JsonObject): Promise<Organization> {
    return this.readBackById(json);
  }

  read(options: ReadOptions<Organization> = {}): Promise<Organization> {
    return super.read({ ...options, ignore: options.ignore ?? ["realm"] });
  }

  updatePayload(fields?: Iterable<string>): JsonObject {
    return { organization: super.updatePayload(fields) };
  }

  update(fields?: Iterable<string>): Promise<Organization> {
    return this.updateThenRead(fields);
  }

  // -------------------------------------------------------------------------
  // Subscriptions
  // -------------------------------------------------------------------------

  async subscriptions(): Promise<JsonObject[]> {
    const response = await get(this.path("subscriptions"), this.config.getClientOptions());
    return resultsOf(await handleResponse(response, this.config), `GET ${response.url}`);
  }

  /** Uploads the manifest file at `file` as a multipart form. */
  async uploadManifest(file: string, options: UploadManifestOptions = {}): Promise<unknown> {
    const content = await readFile(file);
    const response = await post(
      this.path("subscriptions/upload"),
      options.repositoryUrl === undefined ? undefined : { repository_url: options.repositoryUrl },
      {
        ...this.config.getClientOptions(),
        files: { content: { content, filename: basename(file) } },
      }
    );
    return handleResponse(response, this.config, options.synchronous ?? true);
  }

  async deleteManifest(synchronous = true): Promise<unknown> {
    const response = await post(
      this.path("subscriptions/delete_manifest"),
      undefined,
      this.config.getClientOptions()
    );
    return handleResponse(response, this.config, synchronous);
  }

  async refreshManifest(synchronous = true): Promise<unknown> {
    const response = await put(
      this.path("subscriptions/refresh_manifest"),
      undefined,
      this.config.getClientOptions()
    );
    return handleResponse(response, this.config, synchronous);
  }

  // -------------------------------------------------------------------------
  // Products and sync plans
  // -------------------------------------------------------------------------

  /** Creates a sync plan that starts now. */
  async syncPlan(name: string, interval: string): Promise<unknown> {
    const response = await post(
      this.path("sync_plans"),
      { interval, name, sync_date: formatSyncDate(new Date()) },
      this.config.getClientOptions()
    );
    return handleResponse(response, this.config);
  }

  async listRhproducts(perPage?: number): Promise<JsonObject[]> {
    const response = await get(this.path("products"), {
      ...this.config.getClientOptions(),
      data: { per_page: perPage },
    });
    return resultsOf(await handleResponse(response, this.config), `GET ${response.url}`);
  }
}
