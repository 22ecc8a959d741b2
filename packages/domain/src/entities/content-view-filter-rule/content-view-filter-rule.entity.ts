/**
 * Content View Filter Rule Entity
 *
 * Rules live under their filter, so every rule needs `content_view_filter`
 * before a path can be built. Which fields the server returns depends on
 * the filter type; read() skips the ones a response leaves out.
 */

import { DateField, ListField, StringField } from "@satkit/contracts";
import {
  CreatableEntity,
  OneToOneField,
  type EntityMeta,
  type EntityValues,
  type FieldMap,
  type ReadOptions,
} from "@satkit/platform";

export class ContentViewFilterRule extends CreatableEntity<ContentViewFilterRule> {
  protected defineFields(): FieldMap {
    return {
      content_view_filter: new OneToOneField("AbstractContentViewFilter", { required: true }),
      end_date: new DateField(),
      errata: new OneToOneField("Errata"),
      max_version: new StringField(),
      min_version: new StringField(),
      name: new StringField(),
      start_date: new DateField(),
      types: new ListField(),
      version: new StringField(),
    };
  }

  get meta(): EntityMeta {
    return {
      apiPath: `${this.requireEntity("content_view_filter").path("self")}/rules`,
      serverModes: ["sat"],
    };
  }

  protected spawn(values?: EntityValues): ContentViewFilterRule {
    return new ContentViewFilterRule(this.config, {
      content_view_filter: this.requireEntity("content_view_filter"),
      ...values,
    });
  }

  async read(options: ReadOptions<ContentViewFilterRule> = {}): Promise<ContentViewFilterRule> {
    const attrs = options.attrs ?? (await this.readJson());
    const absent = Object.keys(this.getFields()).filter((name) => !Object.hasOwn(attrs, name));
    return super.read({
      ...options,
      attrs,
      ignore: [...(options.ignore ?? ["content_view_filter"]), ...absent],
    });
  }
}
