/**
 * Activation Key Entity
 *
 * A registration token that attaches content hosts to a lifecycle
 * environment and content view on registration.
 */

import { StatusCodes } from "http-status-codes";
import { BooleanField, IntegerField, StringField, type JsonObject } from "@satkit/contracts";
import {
  OneToManyField,
  OneToOneField,
  UpdatableEntity,
  get,
  handleResponse,
  put,
  sleep,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
  type HttpResponse,
} from "@satkit/platform";

const SUB_PATHS = new Set(["add_subscriptions", "content_override", "releases", "remove_subscriptions"]);

const READ_ATTEMPTS = 5;

export class ActivationKey extends UpdatableEntity<ActivationKey> {
  /** Milliseconds between read attempts while the key is not yet visible */
  static readRetryDelay = 5_000;

  protected defineFields(): FieldMap {
    return {
      auto_attach: new BooleanField(),
      content_view: new OneToOneField("ContentView"),
      description: new StringField(),
      environment: new OneToOneField("Environment"),
      host_collection: new OneToManyField("HostCollection"),
      max_content_hosts: new IntegerField(),
      name: new StringField({ required: true }),
      organization: new OneToOneField("Organization", { required: true }),
      unlimited_content_hosts: new BooleanField(),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "katello/api/v2/activation_keys", serverModes: ["sat", "sam"] };
  }

  protected spawn(values?: EntityValues): ActivationKey {
    return new ActivationKey(this.config, values);
  }

  path(which?: string): string {
    if (which !== undefined && SUB_PATHS.has(which)) {
      return `${super.path("self")}/${which}`;
    }
    return super.path(which);
  }

  /**
   * A freshly created key can answer 404 for a few seconds, so a 404 is
   * retried before it is returned.
   */
  async readRaw(): Promise<HttpResponse> {
    let response = await super.readRaw();
    for (
      let attempt = 0;
      attempt < READ_ATTEMPTS && response.status === StatusCodes.NOT_FOUND;
      attempt++
    ) {
      await sleep(ActivationKey.readRetryDelay);
      response = await super.readRaw();
    }
    return response;
  }

  async addSubscriptions(params: JsonObject): Promise<unknown> {
    const response = await put(this.path("add_subscriptions"), params, this.config.getClientOptions());
    return handleResponse(response, this.config);
  }

  async removeSubscriptions(params: JsonObject): Promise<unknown> {
    const response = await put(this.path("remove_subscriptions"), params, this.config.getClientOptions());
    return handleResponse(response, this.config);
  }

  /** Overrides whether a repository is enabled for hosts using this key. */
  async contentOverride(contentLabel: string, value: unknown): Promise<unknown> {
    const response = await put(
      this.path("content_override"),
      { content_override: { content_label: contentLabel, value } },
      this.config.getClientOptions()
    );
    return handleResponse(response, this.config);
  }

  async releases(): Promise<unknown> {
    const response = await get(this.path("releases"), this.config.getClientOptions());
    return handleResponse(response, this.config);
  }
}
