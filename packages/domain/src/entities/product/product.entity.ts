/**
 * Product Entity
 *
 * A product groups repositories. Red Hat products come from the
 * organization's manifest and expose repository sets, which are enabled
 * per architecture and release to create repositories.
 */

import { StringField, type EntityId, type JsonObject } from "@satkit/contracts";
import {
  OneToManyField,
  OneToOneField,
  UpdatableEntity,
  get,
  handleResponse,
  put,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
  type ReadOptions,
} from "@satkit/platform";
import { onlyResultId, resultsOf } from "../attrs.js";
import { Organization } from "../organization/organization.entity.js";
import { SyncPlan } from "../sync-plan/sync-plan.entity.js";

export class Product extends UpdatableEntity<Product> {
  protected defineFields(): FieldMap {
    return {
      description: new StringField(),
      gpg_key: new OneToOneField("GPGKey"),
      label: new StringField(),
      name: new StringField({ required: true }),
      organization: new OneToOneField("Organization", { required: true }),
      repository: new OneToManyField("Repository"),
      sync_plan: new OneToOneField("SyncPlan", { nullable: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "katello/api/v2/products", serverModes: ["sat", "sam"] };
  }

  protected spawn(values?: EntityValues): Product {
    return new Product(this.config, values);
  }

  /** Anything under `repository_sets` hangs off the product. */
  path(which?: string): string {
    if (which !== undefined && which.startsWith("repository_sets")) {
      return `${super.path("self")}/${which}`;
    }
    return super.path(which);
  }

  /**
   * Servers before 6.1 identify the organization by label only; it is
   * resolved to an id with an extra search. The sync plan stub is given
   * the product's organization so its path can be built.
   */
  async read(options: ReadOptions<Product> = {}): Promise<Product> {
    let attrs = options.attrs ?? (await this.readJson());
    if (this.config.versionBelow("6.1")) {
      attrs = { ...attrs, organization: { id: await this.organizationIdByLabel(attrs) } };
    }
    const product = await super.read({ ...options, attrs });

    const plan = product.getEntity("sync_plan");
    const organization = product.getEntity("organization");
    if (plan !== undefined && plan.id !== undefined && organization !== undefined) {
      product.set("sync_plan", new SyncPlan(this.config, { id: plan.id, organization }));
    }
    return product;
  }

  private async organizationIdByLabel(attrs: JsonObject): Promise<EntityId> {
    const { organization } = attrs;
    const label =
      typeof organization === "object" && organization !== null && "label" in organization
        ? organization.label
        : undefined;
    const response = await get(new Organization(this.config).path(), {
      ...this.config.getClientOptions(),
      data: { search: `label=${String(label)}` },
    });
    response.raiseForStatus();
    const results = resultsOf(response.json(), `GET ${response.url}`);
    return onlyResultId(
      results,
      () =>
        `Could not find exactly one organization with label "${String(label)}". Actual search results: ${JSON.stringify(results)}`
    );
  }

  // -------------------------------------------------------------------------
  // Red Hat repositories
  // -------------------------------------------------------------------------

  async listRepositorysets(perPage?: number): Promise<JsonObject[]> {
    const response = await get(this.path("repository_sets"), {
      ...this.config.getClientOptions(),
      data: { per_page: perPage },
    });
    response.raiseForStatus();
    return resultsOf(response.json(), `GET ${response.url}`);
  }

  /** The id of the product called `name` in organization `orgId`. */
  async fetchRhproductId(name: string, orgId: EntityId): Promise<EntityId> {
    const response = await get(this.path("base"), {
      ...this.config.getClientOptions(),
      data: { organization_id: orgId, name },
    });
    response.raiseForStatus();
    const results = resultsOf(response.json(), `GET ${response.url}`);
    return onlyResultId(results, () => `The length of the results is: ${results.length}`);
  }

  async fetchReposetId(name: string): Promise<EntityId> {
    const response = await get(this.path("repository_sets"), {
      ...this.config.getClientOptions(),
      data: { name },
    });
    response.raiseForStatus();
    const results = resultsOf(response.json(), `GET ${response.url}`);
    return onlyResultId(results, () => `The length of the results is: ${results.length}`);
  }

  async enableRhrepo(
    baseArch: string,
    releaseVer: string,
    reposetId: EntityId,
    synchronous = true
  ): Promise<unknown> {
    const response = await put(
      this.path(`repository_sets/${reposetId}/enable`),
      { basearch: baseArch, releasever: releaseVer },
      this.config.getClientOptions()
    );
    return handleResponse(response, this.config, synchronous);
  }

  async disableRhrepo(
    baseArch: string,
    releaseVer: string,
    reposetId: EntityId,
    synchronous = true
  ): Promise<unknown> {
    const response = await put(
      this.path(`repository_sets/${reposetId}/disable`),
      { basearch: baseArch, releasever: releaseVer },
      this.config.getClientOptions()
    );
    return handleResponse(response, this.config, synchronous);
  }

  async repositorySetsAvailableRepositories(reposetId: EntityId): Promise<JsonObject[]> {
    const response = await get(
      this.path(`repository_sets/${reposetId}/available_repositories`),
      this.config.getClientOptions()
    );
    return resultsOf(await handleResponse(response, this.config), `GET ${response.url}`);
  }
}
