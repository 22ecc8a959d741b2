/**
 * Smart Proxy Entity
 */

import { StringField, URLField } from "@satkit/contracts";
import {
  ReadableEntity,
  handleResponse,
  put,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
} from "@satkit/platform";

export class SmartProxy extends ReadableEntity<SmartProxy> {
  protected defineFields(): FieldMap {
    return {
      name: new StringField({ required: true }),
      url: new URLField({ required: true }),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/smart_proxies", serverModes: ["sat"] };
  }

  protected spawn(values?: EntityValues): SmartProxy {
    return new SmartProxy(this.config, values);
  }

  path(which?: string): string {
    if (which === "refresh") {
      return `${super.path("self")}/refresh`;
    }
    return super.path(which);
  }

  /** Re-reads the features the proxy offers. */
  async refresh(synchronous = true): Promise<unknown> {
    const response = await put(this.path("refresh"), {}, this.config.getClientOptions());
    return handleResponse(response, this.config, synchronous);
  }
}
