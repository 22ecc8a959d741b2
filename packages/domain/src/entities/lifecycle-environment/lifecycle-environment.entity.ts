/**
 * Lifecycle Environment Entity
 *
 * Environments form a path starting at the organization's "Library". A
 * new environment with no `prior` is appended directly after Library.
 */

import { StringField, type JsonObject } from "@satkit/contracts";
import {
  CreatableEntity,
  OneToOneField,
  get,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
} from "@satkit/platform";
import { onlyResultId, resultsOf } from "../attrs.js";

export const LIBRARY = "Library";

export class LifecycleEnvironment extends CreatableEntity<LifecycleEnvironment> {
  protected defineFields(): FieldMap {
    return {
      description: new StringField(),
      name: new StringField({ required: true }),
      organization: new OneToOneField("Organization", { required: true }),
      prior: new OneToOneField("LifecycleEnvironment"),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "katello/api/v2/environments", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): LifecycleEnvironment {
    return new LifecycleEnvironment(this.config, values);
  }

  createPayload(): JsonObject {
    const { prior_id: prior, ...data } = super.createPayload();
    return prior === undefined ? data : { ...data, prior };
  }

  /** Also points `prior` at the organization's Library when it is unset. */
  async createMissing(): Promise<void> {
    await super.createMissing();
    if (this.get("name") === LIBRARY || this.has("prior")) return;

    const organizationId = this.getEntity("organization")?.id;
    const response = await get(this.path("base"), {
      ...this.config.getClientOptions(),
      data: { name: LIBRARY, organization_id: organizationId },
    });
    response.raiseForStatus();
    const results = resultsOf(response.json(), `GET ${response.url}`);
    this.set(
      "prior",
      onlyResultId(
        results,
        () =>
          `Could not find the "${LIBRARY}" lifecycle environment for organization ${organizationId}. Search results: ${JSON.stringify(results)}`
      )
    );
  }
}
