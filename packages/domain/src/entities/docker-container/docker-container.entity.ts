/**
 * Docker Container Entities
 *
 * Containers run on a Docker compute resource. DockerContainerBase holds
 * the shared fields and the power and log helpers; DockerHubContainer adds
 * the image coordinates for images pulled from Docker Hub.
 */

import { BadValueError, BooleanField, StringField, type JsonObject } from "@satkit/contracts";
import {
  CreatableEntity,
  OneToManyField,
  OneToOneField,
  get,
  handleResponse,
  put,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
} from "@satkit/platform";

export const POWER_ACTIONS = ["start", "stop", "status"] as const;

export type PowerAction = (typeof POWER_ACTIONS)[number];

export interface LogOptions {
  stdout?: boolean;
  stderr?: boolean;
  /** Number of trailing lines */
  tail?: number;
}

function isPowerAction(action: string): action is PowerAction {
  return POWER_ACTIONS.some((known) => known === action);
}

const SUB_PATHS = new Set(["logs", "power"]);

export abstract class DockerContainerBase<
  Self extends DockerContainerBase<Self>,
> extends CreatableEntity<Self> {
  protected defineFields(): FieldMap {
    return {
      attach_stderr: new BooleanField({ nullable: true }),
      attach_stdin: new BooleanField({ nullable: true }),
      attach_stdout: new BooleanField({ nullable: true }),
      command: new StringField({ required: true, strType: "latin1" }),
      compute_resource: new OneToOneField("AbstractComputeResource"),
      cpu_set: new StringField({ nullable: true }),
      cpu_shares: new StringField({ nullable: true }),
      entrypoint: new StringField({ nullable: true }),
      location: new OneToManyField("Location", { nullable: true }),
      memory: new StringField({ nullable: true }),
      name: new StringField({ required: true, strType: "alphanumeric" }),
      organization: new OneToManyField("Organization", { nullable: true }),
      tty: new BooleanField({ nullable: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "docker/api/v2/containers", serverModes: ["sat"] };
  }

  path(which?: string): string {
    if (which !== undefined && SUB_PATHS.has(which)) {
      return `${super.path("self")}/${which}`;
    }
    return super.path(which);
  }

  createPayload(): JsonObject {
    return { container: super.createPayload() };
  }

  protected readCreated(json: JsonObject): Promise<Self> {
    return this.readBackById(json);
  }

  /** Starts or stops the container, or asks whether it is running. */
  async power(action: string): Promise<unknown> {
    if (!isPowerAction(action)) {
      throw new BadValueError(
        `Received ${action} but expected one of [${POWER_ACTIONS.join(", ")}].`
      );
    }
    const response = await put(
      this.path("power"),
      { power_action: action },
      this.config.getClientOptions()
    );
    return handleResponse(response, this.config);
  }

  /** Container output. Options left out are left to the server's defaults. */
  async logs(options: LogOptions = {}): Promise<unknown> {
    const data: JsonObject = {};
    if (options.stdout !== undefined) data.stdout = options.stdout;
    if (options.stderr !== undefined) data.stderr = options.stderr;
    if (options.tail !== undefined) data.tail = options.tail;
    const response = await get(this.path("logs"), { ...this.config.getClientOptions(), data });
    return handleResponse(response, this.config);
  }
}

export class AbstractDockerContainer extends DockerContainerBase<AbstractDockerContainer> {
  protected spawn(values?: EntityValues): AbstractDockerContainer {
    return new AbstractDockerContainer(this.config, values);
  }
}

export class DockerHubContainer extends DockerContainerBase<DockerHubContainer> {
  protected defineFields(): FieldMap {
    return {
      ...super.defineFields(),
      repository_name: new StringField({ default: "busybox", required: true }),
      tag: new StringField({ default: "latest", required: true }),
    };
  }

  protected spawn(values?: EntityValues): DockerHubContainer {
    return new DockerHubContainer(this.config, values);
  }
}
