/**
 * Content View Version Entity
 *
 * Publishing a content view creates a version; promoting a version makes
 * it available in another lifecycle environment.
 */

import type { EntityId } from "@satkit/contracts";
import {
  DeletableEntity,
  OneToManyField,
  OneToOneField,
  handleResponse,
  post,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
} from "@satkit/platform";

export class ContentViewVersion extends DeletableEntity<ContentViewVersion> {
  protected defineFields(): FieldMap {
    return {
      content_view: new OneToOneField("ContentView"),
      environment: new OneToManyField("Environment"),
      puppet_module: new OneToManyField("PuppetModule"),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "katello/api/v2/content_view_versions", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): ContentViewVersion {
    return new ContentViewVersion(this.config, values);
  }

  path(which?: string): string {
    if (which === "promote") {
      return `${super.path("self")}/promote`;
    }
    return super.path(which);
  }

  async promote(environmentId: EntityId, synchronous = true): Promise<unknown> {
    const response = await post(
      this.path("promote"),
      { environment_id: environmentId },
      this.config.getClientOptions()
    );
    return handleResponse(response, this.config, synchronous);
  }
}
