/**
 * Field Types: Test Suite
 *
 * Every descriptor must generate values that satisfy its own declared
 * constraints: length bounds, numeric bounds, character classes and formats.
 * Generation is random, so each property is checked over many samples.
 */

import { describe, it, expect } from "vitest";
import {
  BooleanField,
  DateField,
  DateTimeField,
  DictField,
  EmailField,
  FloatField,
  IntegerField,
  IPAddressField,
  ListField,
  MACAddressField,
  NetmaskField,
  StringField,
  URLField,
  genString,
  prefixToNetmask,
  type ScalarField,
} from "./field-types.js";

const SAMPLES = 50;

function expectSamplesMatchSchema<T>(field: ScalarField<T>) {
  const schema = field.schema();
  for (let i = 0; i < SAMPLES; i++) {
    const value = field.genValue();
    expect(schema.safeParse(value).success).toBe(true);
  }
}

// ---------------------------------------------------------------------------
// Metadata
// ---------------------------------------------------------------------------

describe("Field metadata", () => {
  it("defaults to optional, unique=false, no choices, no default", () => {
    const field = new StringField();
    expect(field.required).toBe(false);
    expect(field.unique).toBe(false);
    expect(field.nullable).toBe(false);
    expect(field.choices).toBeUndefined();
    expect(field.default).toBeUndefined();
  });

  it("records required, choices and default", () => {
    const field = new StringField({
      required: true,
      choices: ["hourly", "daily"],
      default: "daily",
    });
    expect(field.required).toBe(true);
    expect(field.choices).toEqual(["hourly", "daily"]);
    expect(field.default).toBe("daily");
  });

  it("metadata stays mutable for subclasses that tweak inherited fields", () => {
    const field = new StringField();
    field.required = true;
    field.default = "Docker";
    expect(field.required).toBe(true);
    expect(field.default).toBe("Docker");
  });

  it("reports its descriptor kind", () => {
    expect(new IntegerField().kind).toBe("IntegerField");
    expect(new URLField().kind).toBe("URLField");
  });
});

describe("Field choices", () => {
  it("generates only declared string choices", () => {
    const field = new StringField({ choices: ["VNC", "SPICE"] });
    for (let i = 0; i < SAMPLES; i++) {
      expect(["VNC", "SPICE"]).toContain(field.genValue());
    }
  });

  it("generates only declared integer choices", () => {
    const field = new IntegerField({ choices: [1, 2] });
    for (let i = 0; i < SAMPLES; i++) {
      expect([1, 2]).toContain(field.genValue());
    }
  });

  it("overrides the generator of a formatted string field", () => {
    expect(new URLField({ choices: ["https://mirror.example.com"] }).genValue()).toBe(
      "https://mirror.example.com"
    );
  });

  it("schema accepts only the choices", () => {
    const schema = new StringField({ choices: ["VNC", "SPICE"] }).schema();
    expect(schema.safeParse("VNC").success).toBe(true);
    expect(schema.safeParse("RDP").success).toBe(false);
  });

  it("treats an empty choice list as unrestricted", () => {
    const field = new IntegerField({ choices: [], min: 4, max: 4 });
    expect(field.genValue()).toBe(4);
    expect(field.schema().safeParse(4).success).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Scalars
// ---------------------------------------------------------------------------

describe("BooleanField", () => {
  it("generates booleans", () => {
    expectSamplesMatchSchema(new BooleanField());
  });
});

describe("FloatField", () => {
  it("generates floats within [0, 10000]", () => {
    expectSamplesMatchSchema(new FloatField());
  });
});

describe("IntegerField", () => {
  it("respects min and max", () => {
    const field = new IntegerField({ min: 3, max: 7 });
    for (let i = 0; i < SAMPLES; i++) {
      const value = field.genValue();
      expect(Number.isInteger(value)).toBe(true);
      expect(value).toBeGreaterThanOrEqual(3);
      expect(value).toBeLessThanOrEqual(7);
    }
  });

  it("generates the only value when min equals max", () => {
    expect(new IntegerField({ min: 8, max: 8 }).genValue()).toBe(8);
  });

  it("schema rejects values outside the bounds", () => {
    const schema = new IntegerField({ min: 1, max: 10 }).schema();
    expect(schema.safeParse(0).success).toBe(false);
    expect(schema.safeParse(11).success).toBe(false);
    expect(schema.safeParse(2.5).success).toBe(false);
    expect(schema.safeParse(5).success).toBe(true);
  });
});

describe("DictField and ListField", () => {
  it("generate empty containers", () => {
    expect(new DictField().genValue()).toEqual({});
    expect(new ListField().genValue()).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Dates
// ---------------------------------------------------------------------------

describe("DateField", () => {
  const min = new Date("2020-01-01T00:00:00Z");
  const max = new Date("2020-01-31T00:00:00Z");

  it("generates UTC midnights within the bounds", () => {
    const field = new DateField({ min, max });
    for (let i = 0; i < SAMPLES; i++) {
      const value = field.genValue();
      expect(value.getTime()).toBeGreaterThanOrEqual(min.getTime());
      expect(value.getTime()).toBeLessThanOrEqual(max.getTime());
      expect(value.getUTCHours()).toBe(0);
      expect(value.getUTCMinutes()).toBe(0);
    }
  });
});

describe("DateTimeField", () => {
  it("generates instants within the bounds", () => {
    expectSamplesMatchSchema(
      new DateTimeField({
        min: new Date("2015-06-01T00:00:00Z"),
        max: new Date("2015-06-02T00:00:00Z"),
      })
    );
  });
});

// ---------------------------------------------------------------------------
// Strings
// ---------------------------------------------------------------------------

describe("StringField", () => {
  it("defaults to a length between 1 and 30", () => {
    const field = new StringField();
    expect(field.minLength).toBe(1);
    expect(field.maxLength).toBe(30);
    expectSamplesMatchSchema(field);
  });

  it("accepts an exact length", () => {
    const field = new StringField({ length: 12 });
    for (let i = 0; i < SAMPLES; i++) {
      expect(field.genValue()).toHaveLength(12);
    }
  });

  it("respects a length range", () => {
    expectSamplesMatchSchema(new StringField({ length: [2, 5] }));
  });

  it("draws numeric strings from digits only", () => {
    const field = new StringField({ length: [1, 5], strType: "numeric" });
    for (let i = 0; i < SAMPLES; i++) {
      expect(field.genValue()).toMatch(/^[0-9]{1,5}$/);
    }
  });

  it("draws alphanumeric strings without whitespace", () => {
    const field = new StringField({ strType: ["alphanumeric"] });
    for (let i = 0; i < SAMPLES; i++) {
      expect(field.genValue()).toMatch(/^[A-Za-z0-9]+$/);
    }
  });

  it("normalizes a single string type to a list", () => {
    expect(new StringField({ strType: "alpha" }).strTypes).toEqual(["alpha"]);
  });
});

describe("genString", () => {
  it("generates latin1 letters from the supplement block", () => {
    const value = genString("latin1", 20);
    expect(value).toHaveLength(20);
    for (const char of value) {
      const code = char.charCodeAt(0);
      expect(code).toBeGreaterThanOrEqual(0xc0);
      expect(code).toBeLessThanOrEqual(0xff);
    }
  });

  it("generates CJK ideographs", () => {
    const value = genString("cjk", 10);
    expect(value).toMatch(/^[一-鿿]{10}$/);
  });

  it("generates utf8 strings of the requested length", () => {
    expect(genString("utf8", 17)).toHaveLength(17);
  });
});

// ---------------------------------------------------------------------------
// Network strings
// ---------------------------------------------------------------------------

describe("network fields", () => {
  it("IPAddressField generates IPv4 addresses", () => {
    expectSamplesMatchSchema(new IPAddressField());
  });

  it("NetmaskField generates valid netmasks", () => {
    expectSamplesMatchSchema(new NetmaskField());
  });

  it("MACAddressField generates colon separated MAC addresses", () => {
    expectSamplesMatchSchema(new MACAddressField());
  });

  it("URLField generates absolute http(s) URLs", () => {
    const field = new URLField();
    for (let i = 0; i < SAMPLES; i++) {
      expect(field.genValue()).toMatch(/^https?:\/\/[a-z]+\./);
    }
    expectSamplesMatchSchema(field);
  });

  it("EmailField generates addresses at example.com", () => {
    const field = new EmailField();
    for (let i = 0; i < SAMPLES; i++) {
      expect(field.genValue()).toMatch(/^[^@\s]+@example\.com$/);
    }
  });
});

describe("prefixToNetmask", () => {
  it("converts prefix lengths to dotted masks", () => {
    expect(prefixToNetmask(0)).toBe("0.0.0.0");
    expect(prefixToNetmask(8)).toBe("255.0.0.0");
    expect(prefixToNetmask(20)).toBe("255.255.240.0");
    expect(prefixToNetmask(32)).toBe("255.255.255.255");
  });
});
