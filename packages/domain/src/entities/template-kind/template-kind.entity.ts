/**
 * Template Kind Entity
 *
 * Read-only: the server ships a fixed set of kinds (PXELinux, provision,
 * finish and so on) and offers no way to add more.
 */

import {
  ReadableEntity,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
} from "@satkit/platform";

export class TemplateKind extends ReadableEntity<TemplateKind> {
  protected defineFields(): FieldMap {
    return {};
  }

  get meta(): EntityMeta {
    return { apiPath: "api/v2/template_kinds", serverModes: ["sat"], numCreatedByDefault: 8 };
  }

  protected spawn(values?: EntityValues): TemplateKind {
    return new TemplateKind(this.config, values);
  }
}
