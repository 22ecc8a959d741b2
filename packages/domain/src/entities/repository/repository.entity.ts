/**
 * Repository Entity
 *
 * A yum, puppet, file or docker repository inside a product. Docker
 * repositories and checksum selection arrived in 6.1; against older
 * servers those fields are left out of the schema.
 */

import {
  APIResponseError,
  BooleanField,
  StringField,
  URLField,
  type EntityId,
  type JsonObject,
} from "@satkit/contracts";
import {
  OneToOneField,
  UpdatableEntity,
  expectJsonObject,
  get,
  handleResponse,
  post,
  sleep,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
  type FileUpload,
} from "@satkit/platform";
import { resultsOf } from "../attrs.js";

/** A small public yum repository, used when no URL is given */
export const FAKE_YUM_REPO = "http://inecas.fedorapeople.org/fakerepos/zoo3/";

const CONTENT_TYPES = ["puppet", "yum", "file", "docker"] as const;

const SUB_PATHS = new Set(["sync", "upload_content"]);

const LOOKUP_ATTEMPTS = 5;

export class Repository extends UpdatableEntity<Repository> {
  /** Milliseconds between lookups while a new repository is not yet indexed */
  static lookupRetryDelay = 5_000;

  protected defineFields(): FieldMap {
    const legacy = this.config.versionBelow("6.1");
    const fields: FieldMap = {
      checksum_type: new StringField({ choices: ["sha1", "sha256"] }),
      content_type: new StringField({
        choices: legacy ? CONTENT_TYPES.filter((type) => type !== "docker") : CONTENT_TYPES,
        default: "yum",
        required: true,
      }),
      docker_upstream_name: new StringField({ default: "busybox" }),
      gpg_key: new OneToOneField("GPGKey"),
      label: new StringField(),
      name: new StringField({ required: true }),
      product: new OneToOneField("Product", { required: true }),
      unprotected: new BooleanField(),
      url: new URLField({ default: FAKE_YUM_REPO, required: true }),
    };
    if (legacy) {
      delete fields.checksum_type;
      delete fields.docker_upstream_name;
    }
    return fields;
  }

  get meta(): EntityMeta {
    return { apiPath: "katello/api/v2/repositories", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): Repository {
    return new Repository(this.config, values);
  }

  path(which?: string): string {
    if (which !== undefined && SUB_PATHS.has(which)) {
      return `${super.path("self")}/${which}`;
    }
    return super.path(which);
  }

  /** Docker repositories also need an upstream image name. */
  async createMissing(): Promise<void> {
    const upstream = this.getFields().docker_upstream_name;
    if (
      this.get("content_type") === "docker" &&
      upstream !== undefined &&
      !this.has("docker_upstream_name")
    ) {
      this.set("docker_upstream_name", upstream.default ?? upstream.genValue());
    }
    await super.createMissing();
  }

  async sync(synchronous = true): Promise<unknown> {
    const response = await post(this.path("sync"), undefined, this.config.getClientOptions());
    return handleResponse(response, this.config, synchronous);
  }

  /**
   * The id of the repository called `name` in organization `orgId`.
   * A repository can take a few seconds to show up in searches, so an
   * empty result is retried.
   */
  async fetchRepoid(orgId: EntityId, name: string): Promise<EntityId> {
    let results: JsonObject[] = [];
    for (let attempt = 0; attempt < LOOKUP_ATTEMPTS; attempt++) {
      const response = await get(this.path(), {
        ...this.config.getClientOptions(),
        data: { organization_id: orgId, name },
      });
      response.raiseForStatus();
      results = resultsOf(response.json(), `GET ${response.url}`);
      if (results.length > 0) break;
      await sleep(Repository.lookupRetryDelay);
    }

    const [only] = results;
    const id = only?.id;
    if (results.length !== 1 || (typeof id !== "number" && typeof id !== "string")) {
      throw new APIResponseError(
        `Found ${results.length} repositories named ${name} in organization ${orgId}: ${JSON.stringify(results)}`
      );
    }
    return id;
  }

  /** Uploads one package or module file straight into the repository. */
  async uploadContent(file: FileUpload): Promise<JsonObject> {
    const response = await post(this.path("upload_content"), undefined, {
      ...this.config.getClientOptions(),
      files: { content: file },
    });
    response.raiseForStatus();
    const json = expectJsonObject(response.json(), `POST ${response.url}`);
    if (json.status !== "success") {
      throw new APIResponseError(
        `Received error when uploading file ${file.filename} to repository ${this.id}: ${JSON.stringify(json)}`
      );
    }
    return json;
  }
}
