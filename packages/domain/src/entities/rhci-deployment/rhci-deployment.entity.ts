/**
 * RHCI Deployment Entity
 *
 * A deployment managed by the fusor installer plugin. Responses wrap the
 * deployment in a `deployment` key.
 */

import { BooleanField, StringField, type EntityId, type JsonObject } from "@satkit/contracts";
import {
  OneToOneField,
  UpdatableEntity,
  expectJsonObject,
  handleResponse,
  put,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
  type ReadOptions,
} from "@satkit/platform";

export class RHCIDeployment extends UpdatableEntity<RHCIDeployment> {
  protected defineFields(): FieldMap {
    return {
      deploy_rhev: new BooleanField({ required: true }),
      lifecycle_environment: new OneToOneField("LifecycleEnvironment", { required: true }),
      name: new StringField({ required: true }),
      organization: new OneToOneField("Organization", { required: true }),
      rhev_engine_admin_password: new StringField(),
      rhev_engine_host: new OneToOneField("Host", { required: true }),
      rhev_storage_type: new StringField({ required: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "fusor/api/v21/deployments", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): RHCIDeployment {
    return new RHCIDeployment(this.config, values);
  }

  path(which?: string): string {
    if (which === "deploy") {
      return `${super.path("self")}/deploy`;
    }
    return super.path(which);
  }

  async read(options: ReadOptions<RHCIDeployment> = {}): Promise<RHCIDeployment> {
    const body = options.attrs ?? (await this.readJson());
    const attrs = expectJsonObject(body.deployment, "the deployment payload");
    return super.read({ ...options, attrs, ignore: options.ignore ?? ["rhev_engine_host"] });
  }

  async addHypervisors(hypervisorIds: EntityId[]): Promise<unknown> {
    const response = await put(
      this.path(),
      { discovered_host_ids: hypervisorIds },
      this.config.getClientOptions()
    );
    return handleResponse(response, this.config);
  }

  async deploy(params: JsonObject): Promise<unknown> {
    const response = await put(this.path("deploy"), params, this.config.getClientOptions());
    return handleResponse(response, this.config);
  }
}
