/**
 * Sync Plan Entity
 *
 * A schedule for synchronizing products. Sync plans live under their
 * organization, which must be set before a path can be built.
 */

import { format } from "date-fns";
import {
  BooleanField,
  DateTimeField,
  StringField,
  type EntityId,
  type JsonObject,
} from "@satkit/contracts";
import {
  CreatableEntity,
  OneToManyField,
  OneToOneField,
  handleResponse,
  put,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
  type ReadOptions,
} from "@satkit/platform";

export const SYNC_INTERVALS = ["hourly", "daily", "weekly"] as const;

const SUB_PATHS = new Set(["add_products", "remove_products"]);

/** The server's sync date format, in local time. */
export function formatSyncDate(date: Date): string {
  return format(date, "yyyy-MM-dd HH:mm:ss");
}

export class SyncPlan extends CreatableEntity<SyncPlan> {
  protected defineFields(): FieldMap {
    return {
      description: new StringField(),
      enabled: new BooleanField({ required: true }),
      interval: new StringField({ choices: SYNC_INTERVALS, required: true }),
      name: new StringField({ required: true }),
      organization: new OneToOneField("Organization", { required: true }),
      product: new OneToManyField("Product"),
      sync_date: new DateTimeField({ required: true }),
    };
  }

  get meta(): EntityMeta {
    return {
      apiPath: `${this.requireEntity("organization").path()}/sync_plans`,
      serverModes: ["sat"],
    };
  }

  protected spawn(values?: EntityValues): SyncPlan {
    return new SyncPlan(this.config, {
      organization: this.requireEntity("organization"),
      ...values,
    });
  }

  path(which?: string): string {
    if (which !== undefined && SUB_PATHS.has(which)) {
      return `${super.path("self")}/${which}`;
    }
    return super.path(which);
  }

  read(options: ReadOptions<SyncPlan> = {}): Promise<SyncPlan> {
    return super.read({ ...options, ignore: options.ignore ?? ["organization"] });
  }

  createPayload(): JsonObject {
    const data = super.createPayload();
    return data.sync_date instanceof Date
      ? { ...data, sync_date: formatSyncDate(data.sync_date) }
      : data;
  }

  async addProducts(productIds: EntityId[], synchronous = true): Promise<unknown> {
    const response = await put(
      this.path("add_products"),
      { product_ids: productIds },
      this.config.getClientOptions()
    );
    return handleResponse(response, this.config, synchronous);
  }

  async removeProducts(productIds: EntityId[], synchronous = true): Promise<unknown> {
    const response = await put(
      this.path("remove_products"),
      { product_ids: productIds },
      this.config.getClientOptions()
    );
    return handleResponse(response, this.config, synchronous);
  }
}
