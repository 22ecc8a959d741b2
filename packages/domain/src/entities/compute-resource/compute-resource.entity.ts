/**
 * Compute Resource Entities
 *
 * A compute resource is a virtualization or container provider the server
 * can create hosts on. ComputeResourceBase holds the fields every provider
 * shares; each provider class pins `provider` and adds its own settings.
 * AbstractComputeResource is the provider-agnostic form that relation
 * fields point at.
 */

import {
  BooleanField,
  EmailField,
  StringField,
  URLField,
  type JsonObject,
} from "@satkit/contracts";
import {
  CreatableEntity,
  OneToManyField,
  expectJsonObject,
  put,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
  type ReadOptions,
} from "@satkit/platform";

export const COMPUTE_PROVIDERS = [
  "Docker",
  "EC2",
  "GCE",
  "Libvirt",
  "Openstack",
  "Ovirt",
  "Rackspace",
  "Vmware",
] as const;

export abstract class ComputeResourceBase<
  Self extends ComputeResourceBase<Self>,
> extends CreatableEntity<Self> {
  protected defineFields(): FieldMap {
    return {
      description: new StringField({ nullable: true }),
      location: new OneToManyField("Location"),
      // no whitespace allowed
      name: new StringField({ required: true, strType: ["alphanumeric", "cjk"] }),
      organization: new OneToManyField("Organization"),
      provider: new StringField({ choices: COMPUTE_PROVIDERS, nullable: true }),
      provider_friendly_name: new StringField(),
      url: new URLField({ required: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/compute_resources", serverModes: ["sat"] };
  }

  createPayload(): JsonObject {
    return { compute_resource: super.createPayload() };
  }
}

/** Fields that pin a compute resource to one provider */
function providerFields(provider: (typeof COMPUTE_PROVIDERS)[number]): FieldMap {
  return {
    provider: new StringField({
      choices: COMPUTE_PROVIDERS,
      default: provider,
      required: true,
      nullable: true,
    }),
    provider_friendly_name: new StringField({ default: provider }),
  };
}

export class AbstractComputeResource extends ComputeResourceBase<AbstractComputeResource> {
  protected spawn(values?: EntityValues): AbstractComputeResource {
    return new AbstractComputeResource(this.config, values);
  }
}

// ---------------------------------------------------------------------------
// Docker
// ---------------------------------------------------------------------------

export class DockerComputeResource extends ComputeResourceBase<DockerComputeResource> {
  protected defineFields(): FieldMap {
    return {
      ...super.defineFields(),
      ...providerFields("Docker"),
      email: new EmailField(),
      password: new StringField({ nullable: true }),
      url: new URLField({ required: true }),
      user: new StringField({ nullable: true }),
    };
  }

  protected spawn(values?: EntityValues): DockerComputeResource {
    return new DockerComputeResource(this.config, values);
  }

  protected readCreated(json: JsonObject): Promise<DockerComputeResource> {
    return this.readBackById(json);
  }

  /**
   * Ignores the password by default. The server omits `email` from GET
   * responses; an empty PUT returns it.
   */
  async read(options: ReadOptions<DockerComputeResource> = {}): Promise<DockerComputeResource> {
    const ignore = new Set(options.ignore ?? ["password"]);
    const attrs = { ...(options.attrs ?? (await this.readJson())) };
    if (!Object.hasOwn(attrs, "email") && !ignore.has("email")) {
      const response = await put(this.path("self"), {}, this.config.getClientOptions());
      response.raiseForStatus();
      attrs.email = expectJsonObject(response.json(), `PUT ${response.url}`).email ?? null;
    }
    return super.read({ ...options, attrs, ignore });
  }
}

// ---------------------------------------------------------------------------
// Libvirt
// ---------------------------------------------------------------------------

export class LibvirtComputeResource extends ComputeResourceBase<LibvirtComputeResource> {
  protected defineFields(): FieldMap {
    return {
      ...super.defineFields(),
      ...providerFields("Libvirt"),
      display_type: new StringField({ choices: ["VNC", "SPICE"], required: true }),
      set_console_password: new BooleanField({ nullable: true }),
    };
  }

  protected spawn(values?: EntityValues): LibvirtComputeResource {
    return new LibvirtComputeResource(this.config, values);
  }
}
