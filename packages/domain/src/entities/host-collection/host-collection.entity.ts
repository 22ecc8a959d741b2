/**
 * Host Collection Entities
 *
 * A named group of content hosts. The errata and package entities describe
 * bulk actions on a collection and carry no operations.
 */

import { BooleanField, IntegerField, ListField, StringField, type JsonObject } from "@satkit/contracts";
import {
  CreatableEntity,
  Entity,
  OneToManyField,
  OneToOneField,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
} from "@satkit/platform";

const COLLECTION_PATH = "katello/api/v2/organizations/:organization_id/host_collections/:host_collection_id";

export class HostCollection extends CreatableEntity<HostCollection> {
  protected defineFields(): FieldMap {
    return {
      description: new StringField(),
      max_content_hosts: new IntegerField(),
      name: new StringField({ required: true }),
      organization: new OneToOneField("Organization", { required: true }),
      system: new OneToManyField("System"),
      unlimited_content_hosts: new BooleanField(),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "katello/api/v2/host_collections", serverModes: ["sat", "sam"] };
  }

  protected spawn(values?: EntityValues): HostCollection {
    return new HostCollection(this.config, values);
  }

  /** Systems are identified by uuid here. */
  createPayload(): JsonObject {
    const { system_ids: uuids, ...data } = super.createPayload();
    return uuids === undefined ? data : { ...data, system_uuids: uuids };
  }
}

export class HostCollectionErrata extends Entity {
  protected defineFields(): FieldMap {
    return { errata: new OneToManyField("Errata", { required: true }) };
  }

  get meta(): EntityMeta {
    return { apiPath: `${COLLECTION_PATH}/errata`, serverModes: ["sat"] };
  }
}

export class HostCollectionPackage extends Entity {
  protected defineFields(): FieldMap {
    return {
      groups: new ListField(),
      packages: new ListField(),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: `${COLLECTION_PATH}/packages`, serverModes: ["sat"] };
  }
}
