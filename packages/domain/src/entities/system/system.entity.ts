/**
 * System Entities
 *
 * A content host registered through subscription-manager. Once registered
 * a system is addressed by its uuid rather than its numeric id.
 */

import { DateTimeField, DictField, ListField, StringField } from "@satkit/contracts";
import {
  Entity,
  CreatableEntity,
  OneToManyField,
  OneToOneField,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
  type ReadOptions,
} from "@satkit/platform";
import { renameKeys } from "../attrs.js";

export class System extends CreatableEntity<System> {
  protected defineFields(): FieldMap {
    return {
      content_view: new OneToOneField("ContentView"),
      description: new StringField(),
      environment: new OneToOneField("LifecycleEnvironment"),
      facts: new DictField({ default: { "uname.machine": "unknown" }, required: true, nullable: true }),
      host_collection: new OneToManyField("HostCollection"),
      installed_products: new ListField({ nullable: true }),
      last_checkin: new DateTimeField(),
      location: new StringField(),
      name: new StringField({ required: true }),
      organization: new OneToOneField("Organization", { required: true }),
      release_ver: new StringField(),
      service_level: new StringField({ nullable: true }),
      uuid: new StringField(),
      // "system" is the only type the server accepts when creating
      type: new StringField({ default: "system", required: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "katello/api/v2/systems", serverModes: ["sat", "sam"] };
  }

  protected spawn(values?: EntityValues): System {
    return new System(this.config, values);
  }

  path(which?: string): string {
    const uuid = this.get("uuid");
    if (typeof uuid === "string" && (which === "self" || which === undefined)) {
      return `${super.path("base")}/${uuid}`;
    }
    return super.path(which);
  }

  async read(options: ReadOptions<System> = {}): Promise<System> {
    const attrs = renameKeys(options.attrs ?? (await this.readJson()), {
      checkin_time: "last_checkin",
      hostCollections: "host_collections",
      installedProducts: "installed_products",
    });
    return super.read({
      ...options,
      attrs,
      ignore: options.ignore ?? ["facts", "organization", "type"],
    });
  }
}

/** The package and package group lists sent to a system. */
export class SystemPackage extends Entity {
  protected defineFields(): FieldMap {
    return {
      groups: new ListField(),
      packages: new ListField(),
      system: new OneToOneField("System", { required: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "katello/api/v2/systems/:system_id/packages", serverModes: ["sat"] };
  }
}
