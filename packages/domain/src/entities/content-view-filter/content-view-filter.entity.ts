/**
 * Content View Filter Entities
 *
 * A filter narrows the content a view publishes. The three kinds differ in
 * the `type` they default to; RPM filters can also include packages that
 * are not in any errata.
 */

import { BooleanField, StringField } from "@satkit/contracts";
import {
  CreatableEntity,
  OneToManyField,
  OneToOneField,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
} from "@satkit/platform";

export const FILTER_TYPES = ["erratum", "package_group", "rpm"] as const;

export type FilterType = (typeof FILTER_TYPES)[number];

export abstract class ContentViewFilterBase<
  Self extends ContentViewFilterBase<Self>,
> extends CreatableEntity<Self> {
  /** The `type` createMissing fills in, if any */
  protected get defaultType(): FilterType | undefined {
    return undefined;
  }

  protected defineFields(): FieldMap {
    return {
      content_view: new OneToOneField("ContentView", { required: true }),
      description: new StringField(),
      type: new StringField({ choices: FILTER_TYPES, required: true, default: this.defaultType }),
      inclusion: new BooleanField(),
      name: new StringField({ required: true }),
      repository: new OneToManyField("Repository"),
    };
  }

  get meta(): EntityMeta {
    return { apiPath: "katello/api/v2/content_view_filters", serverModes: ["sat"] };
  }
}

export class AbstractContentViewFilter extends ContentViewFilterBase<AbstractContentViewFilter> {
  protected spawn(values?: EntityValues): AbstractContentViewFilter {
    return new AbstractContentViewFilter(this.config, values);
  }
}

export class ErratumContentViewFilter extends ContentViewFilterBase<ErratumContentViewFilter> {
  protected get defaultType(): FilterType {
    return "erratum";
  }

  protected spawn(values?: EntityValues): ErratumContentViewFilter {
    return new ErratumContentViewFilter(this.config, values);
  }
}

export class PackageGroupContentViewFilter extends ContentViewFilterBase<PackageGroupContentViewFilter> {
  protected get defaultType(): FilterType {
    return "package_group";
  }

  protected spawn(values?: EntityValues): PackageGroupContentViewFilter {
    return new PackageGroupContentViewFilter(this.config, values);
  }
}

export class RPMContentViewFilter extends ContentViewFilterBase<RPMContentViewFilter> {
  protected get defaultType(): FilterType {
    return "rpm";
  }

  protected defineFields(): FieldMap {
    return { ...super.defineFields(), original_packages: new BooleanField() };
  }

  protected spawn(values?: EntityValues): RPMContentViewFilter {
    return new RPMContentViewFilter(this.config, values);
  }
}
