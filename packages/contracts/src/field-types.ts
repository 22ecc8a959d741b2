/**
 * Field Types
 *
 * Declarative descriptors for the attributes of an entity. A descriptor
 * knows the semantic type of one attribute and how to generate a plausible
 * random value for it. The `required`, `choices` and `default` metadata only
 * drive value generation (see CreatableEntity.createMissing); nothing here
 * validates values on assignment. A generated value is always one of the
 * field's `choices` when it has any.
 *
 * Every scalar descriptor also exposes the Zod schema its generated values
 * satisfy, so callers can check data they build by hand.
 */

import { faker } from "@faker-js/faker";
import { z } from "zod";

// ---------------------------------------------------------------------------
// Base descriptor
// ---------------------------------------------------------------------------

export interface FieldOptions<TValue> {
  /** Must a value be submitted when creating the entity? */
  required?: boolean;
  /** Values the field may be populated with */
  choices?: readonly TValue[];
  /** Value used by createMissing before anything is generated */
  default?: TValue;
  /** The server enforces uniqueness of this value */
  unique?: boolean;
  /** The server accepts null for this field */
  nullable?: boolean;
}

/**
 * Base class of every descriptor.
 *
 * `TValue` is the type of values stored in the field. `TGenerated` is what
 * genValue returns, which differs only for relation fields: they generate the
 * referenced entity class rather than a value.
 */
export abstract class Field<TValue = unknown, TGenerated = TValue> {
  required: boolean;
  choices?: readonly TValue[];
  default?: TValue;
  unique: boolean;
  nullable: boolean;

  constructor(options: FieldOptions<TValue> = {}) {
    this.required = options.required ?? false;
    this.choices = options.choices;
    this.default = options.default;
    this.unique = options.unique ?? false;
    this.nullable = options.nullable ?? false;
  }

  /** Name used in error messages */
  get kind(): string {
    return this.constructor.name;
  }

  abstract genValue(): TGenerated;
}

/**
 * A descriptor for a plain (non-relation) value.
 *
 * A field with `choices` only ever generates one of them, and its schema
 * accepts nothing else.
 */
export abstract class ScalarField<TValue> extends Field<TValue> {
  genValue(): TValue {
    const choices = this.choices;
    if (choices !== undefined && choices.length > 0) {
      return faker.helpers.arrayElement(choices);
    }
    return this.genRandom();
  }

  /** Zod schema matched by every value genValue returns */
  schema(): z.ZodType<TValue> {
    const base = this.valueSchema();
    const choices = this.choices;
    if (choices === undefined || choices.length === 0) return base;
    return base.refine((value) => choices.includes(value), {
      message: `Expected one of [${choices.map(String).join(", ")}]`,
    });
  }

  /** A random value of the field's type, ignoring choices */
  protected abstract genRandom(): TValue;

  protected abstract valueSchema(): z.ZodType<TValue>;
}

// ---------------------------------------------------------------------------
// Simple scalars
// ---------------------------------------------------------------------------

export class BooleanField extends ScalarField<boolean> {
  protected genRandom(): boolean {
    return faker.datatype.boolean();
  }

  protected valueSchema() {
    return z.boolean();
  }
}

export class EmailField extends ScalarField<string> {
  protected genRandom(): string {
    return faker.internet.email({ provider: "example.com" }).toLowerCase();
  }

  protected valueSchema() {
    return z.string().email();
  }
}

export class FloatField extends ScalarField<number> {
  protected genRandom(): number {
    return faker.number.float({ min: 0, max: 10000 });
  }

  protected valueSchema() {
    return z.number().min(0).max(10000);
  }
}

export interface IntegerFieldOptions extends FieldOptions<number> {
  min?: number;
  max?: number;
}

export class IntegerField extends ScalarField<number> {
  min?: number;
  max?: number;

  constructor(options: IntegerFieldOptions = {}) {
    super(options);
    this.min = options.min;
    this.max = options.max;
  }

  protected genRandom(): number {
    return faker.number.int({
      min: this.min ?? 0,
      max: this.max ?? Number.MAX_SAFE_INTEGER,
    });
  }

  protected valueSchema() {
    let schema = z.number().int();
    if (this.min !== undefined) schema = schema.min(this.min);
    if (this.max !== undefined) schema = schema.max(this.max);
    return schema;
  }
}

export class DictField extends ScalarField<Record<string, unknown>> {
  protected genRandom(): Record<string, unknown> {
    return {};
  }

  protected valueSchema() {
    return z.record(z.unknown());
  }
}

export class ListField extends ScalarField<unknown[]> {
  protected genRandom(): unknown[] {
    return [];
  }

  protected valueSchema() {
    return z.array(z.unknown());
  }
}

// ---------------------------------------------------------------------------
// Dates
// ---------------------------------------------------------------------------

export interface DateFieldOptions extends FieldOptions<Date> {
  min?: Date;
  max?: Date;
}

const DEFAULT_DATE_SPAN_YEARS = 5;
const DAY_MS = 24 * 60 * 60 * 1000;

function dateBounds(min?: Date, max?: Date): { from: Date; to: Date } {
  const now = Date.now();
  const span = DEFAULT_DATE_SPAN_YEARS * 365 * DAY_MS;
  return {
    from: min ?? new Date(now - span),
    to: max ?? new Date(now + span),
  };
}

/** A calendar date. Generated values are UTC midnights. */
export class DateField extends ScalarField<Date> {
  min?: Date;
  max?: Date;

  constructor(options: DateFieldOptions = {}) {
    super(options);
    this.min = options.min;
    this.max = options.max;
  }

  protected genRandom(): Date {
    const { from, to } = dateBounds(this.min, this.max);
    const firstDay = Math.ceil(from.getTime() / DAY_MS);
    const lastDay = Math.floor(to.getTime() / DAY_MS);
    return new Date(faker.number.int({ min: firstDay, max: lastDay }) * DAY_MS);
  }

  protected valueSchema() {
    const { from, to } = dateBounds(this.min, this.max);
    return z.date().min(from).max(to);
  }
}

export class DateTimeField extends ScalarField<Date> {
  min?: Date;
  max?: Date;

  constructor(options: DateFieldOptions = {}) {
    super(options);
    this.min = options.min;
    this.max = options.max;
  }

  protected genRandom(): Date {
    return faker.date.between(dateBounds(this.min, this.max));
  }

  protected valueSchema() {
    const { from, to } = dateBounds(this.min, this.max);
    return z.date().min(from).max(to);
  }
}

// ---------------------------------------------------------------------------
// Strings
// ---------------------------------------------------------------------------

export const STRING_TYPES = [
  "alpha",
  "alphanumeric",
  "numeric",
  "latin1",
  "utf8",
  "cjk",
] as const;

export type StringType = (typeof STRING_TYPES)[number];

export interface StringFieldOptions extends FieldOptions<string> {
  /** `[min, max]` length, or an exact length */
  length?: readonly [number, number] | number;
  /** Character classes to draw from; one is chosen per generated value */
  strType?: StringType | readonly StringType[];
}

function charRange(first: number, last: number): string[] {
  const chars: string[] = [];
  for (let code = first; code <= last; code++) {
    chars.push(String.fromCharCode(code));
  }
  return chars;
}

// Latin-1 supplement letters, minus the multiplication and division signs.
const LATIN1_CHARS = charRange(0xc0, 0xff).filter((c) => c !== "×" && c !== "÷");
const CJK_FIRST = 0x4e00;
const CJK_LAST = 0x9fff;

/**
 * Generates `length` characters of the given type.
 * Every character is a single UTF-16 code unit, so `.length` counts characters.
 */
export function genString(type: StringType, length: number): string {
  switch (type) {
    case "alpha":
      return faker.string.alpha(length);
    case "alphanumeric":
      return faker.string.alphanumeric(length);
    case "numeric":
      return faker.string.numeric({ length, allowLeadingZeros: true });
    case "latin1":
      return faker.string.fromCharacters(LATIN1_CHARS, length);
    case "cjk":
      return Array.from({ length }, () =>
        String.fromCharCode(faker.number.int({ min: CJK_FIRST, max: CJK_LAST }))
      ).join("");
    case "utf8":
      return Array.from({ length }, () =>
        genString(faker.helpers.arrayElement(["alpha", "latin1", "cjk"] as const), 1)
      ).join("");
  }
}

export class StringField extends ScalarField<string> {
  minLength: number;
  maxLength: number;
  strTypes: readonly StringType[];

  constructor(options: StringFieldOptions = {}) {
    super(options);
    const length = options.length ?? [1, 30];
    this.minLength = typeof length === "number" ? length : length[0];
    this.maxLength = typeof length === "number" ? length : length[1];
    const strType = options.strType ?? "utf8";
    this.strTypes = typeof strType === "string" ? [strType] : strType;
  }

  protected genRandom(): string {
    return genString(
      faker.helpers.arrayElement(this.strTypes),
      faker.number.int({ min: this.minLength, max: this.maxLength })
    );
  }

  protected valueSchema(): z.ZodType<string> {
    return z.string().min(this.minLength).max(this.maxLength);
  }
}

// ---------------------------------------------------------------------------
// Network strings
// ---------------------------------------------------------------------------

export class IPAddressField extends StringField {
  protected genRandom(): string {
    return faker.internet.ipv4();
  }

  protected valueSchema() {
    return z.string().ip({ version: "v4" });
  }
}

/** Converts a prefix length (0-32) to a dotted netmask. */
export function prefixToNetmask(prefix: number): string {
  const bits = prefix === 0 ? 0 : (0xffffffff << (32 - prefix)) >>> 0;
  return [24, 16, 8, 0].map((shift) => (bits >>> shift) & 0xff).join(".");
}

const NETMASK_PATTERN =
  /^(255\.255\.255\.(0|128|192|224|240|248|252|254|255)|255\.255\.(0|128|192|224|240|248|252|254|255)\.0|255\.(0|128|192|224|240|248|252|254|255)\.0\.0|(0|128|192|224|240|248|252|254|255)\.0\.0\.0)$/;

export class NetmaskField extends StringField {
  protected genRandom(): string {
    return prefixToNetmask(faker.number.int({ min: 0, max: 32 }));
  }

  protected valueSchema() {
    return z.string().regex(NETMASK_PATTERN);
  }
}

export class MACAddressField extends StringField {
  protected genRandom(): string {
    return faker.internet.mac();
  }

  protected valueSchema() {
    return z.string().regex(/^([0-9a-f]{2}:){5}[0-9a-f]{2}$/);
  }
}

export class URLField extends StringField {
  protected genRandom(): string {
    const scheme = faker.helpers.arrayElement(["http", "https"]);
    const subdomain = faker.string.alpha({ length: { min: 3, max: 12 }, casing: "lower" });
    return `${scheme}://${subdomain}.${faker.internet.domainName()}`;
  }

  protected valueSchema() {
    return z.string().url();
  }
}
