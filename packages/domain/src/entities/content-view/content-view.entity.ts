/**
 * Content View Entity
 *
 * A curated set of repositories and puppet modules. Publishing creates a
 * ContentViewVersion; the helpers below drive the rest of the view's
 * lifecycle.
 */

import { BooleanField, StringField, type EntityId } from "@satkit/contracts";
import {
  Entity,
  OneToManyField,
  OneToOneField,
  UpdatableEntity,
  del,
  get,
  handleResponse,
  post,
  put,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
} from "@satkit/platform";

const SUB_PATHS = new Set([
  "available_puppet_module_names",
  "available_puppet_modules",
  "content_view_puppet_modules",
  "content_view_versions",
  "copy",
  "publish",
]);

export class ContentView extends UpdatableEntity<ContentView> {
  protected defineFields(): FieldMap {
    return {
      component: new OneToManyField("ContentViewVersion"),
      composite: new BooleanField(),
      description: new StringField(),
      label: new StringField(),
      name: new StringField({ required: true }),
      organization: new OneToOneField("Organization", { required: true }),
      puppet_module: new OneToManyField("PuppetModule"),
      repository: new OneToManyField("Repository"),
      version: new OneToManyField("ContentViewVersion"),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "katello/api/v2/content_views", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): ContentView {
    return new ContentView(this.config, values);
  }

  path(which?: string): string {
    if (which !== undefined && SUB_PATHS.has(which)) {
      return `${super.path("self")}/${which}`;
    }
    return super.path(which);
  }

  async publish(synchronous = true): Promise<unknown> {
    const response = await post(this.path("publish"), { id: this.id }, this.config.getClientOptions());
    return handleResponse(response, this.config, synchronous);
  }

  /** Replaces the view's repositories. */
  async setRepositoryIds(repositoryIds: EntityId[]): Promise<unknown> {
    const response = await put(
      this.path("self"),
      { repository_ids: repositoryIds },
      this.config.getClientOptions()
    );
    return handleResponse(response, this.config);
  }

  async availablePuppetModules(): Promise<unknown> {
    const response = await get(this.path("available_puppet_modules"), this.config.getClientOptions());
    return handleResponse(response, this.config);
  }

  async availablePuppetModuleNames(): Promise<unknown> {
    const response = await get(
      this.path("available_puppet_module_names"),
      this.config.getClientOptions()
    );
    return handleResponse(response, this.config);
  }

  async addPuppetModule(author: string, name: string): Promise<unknown> {
    const response = await post(
      this.path("content_view_puppet_modules"),
      { author, name },
      this.config.getClientOptions()
    );
    return handleResponse(response, this.config);
  }

  /** Copies the view under a new name. */
  async copy(name: string): Promise<unknown> {
    const response = await post(this.path("copy"), { id: this.id, name }, this.config.getClientOptions());
    return handleResponse(response, this.config);
  }

  /** Removes the view from a lifecycle environment, given as an entity or an id. */
  async deleteFromEnvironment(environment: Entity | EntityId, synchronous = true): Promise<unknown> {
    const environmentId = environment instanceof Entity ? environment.id : environment;
    const response = await del(
      `${this.path()}/environments/${environmentId}`,
      this.config.getClientOptions()
    );
    return handleResponse(response, this.config, synchronous);
  }
}
