/**
 * Tests for the Firestore value codec.
 */

import { describe, expect, it } from "vitest";
import { ValidationError } from "../errors/index.js";
import {
  decodeFields,
  decodeValue,
  encodeFields,
  encodeValue,
  formatTimestamp,
  parseDocument,
  parseTimestamp,
} from "../firestore/codec.js";
import { Bytes, GeoPoint } from "../types/index.js";

describe("encodeValue", () => {
  it("should encode scalars", () => {
    expect(encodeValue(null)).toEqual({ nullValue: null });
    expect(encodeValue(undefined)).toEqual({ nullValue: null });
    expect(encodeValue(true)).toEqual({ booleanValue: true });
    expect(encodeValue("hi")).toEqual({ stringValue: "hi" });
  });

  it("should encode integers as decimal strings", () => {
    expect(encodeValue(42)).toEqual({ integerValue: "42" });
    expect(encodeValue(-7)).toEqual({ integerValue: "-7" });
    expect(encodeValue(2n ** 64n)).toEqual({ integerValue: "18446744073709551616" });
  });

  it("should encode non-integers as doubles", () => {
    expect(encodeValue(1.5)).toEqual({ doubleValue: 1.5 });
    expect(encodeValue(NaN)).toEqual({ doubleValue: "NaN" });
    expect(encodeValue(-Infinity)).toEqual({ doubleValue: "-Infinity" });
  });

  it("should encode timestamps at second precision", () => {
    expect(encodeValue(new Date("2024-05-01T12:30:45.123Z"))).toEqual({ timestampValue: "2024-05-01T12:30:45Z" });
  });

  it("should encode bytes and geo points", () => {
    expect(encodeValue(Bytes.fromString("hi"))).toEqual({ bytesValue: "aGk=" });
    expect(encodeValue(new Uint8Array([104, 105]))).toEqual({ bytesValue: "aGk=" });
    expect(encodeValue(new GeoPoint(51.5, -0.12))).toEqual({ geoPointValue: { latitude: 51.5, longitude: -0.12 } });
  });

  it("should encode nested arrays and maps", () => {
    expect(encodeValue({ tags: ["a", 1], owner: { name: "Ada" } })).toEqual({
      mapValue: {
        fields: {
          tags: { arrayValue: { values: [{ stringValue: "a" }, { integerValue: "1" }] } },
          owner: { mapValue: { fields: { name: { stringValue: "Ada" } } } },
        },
      },
    });
    expect(encodeValue([])).toEqual({ arrayValue: { values: [] } });
  });

  it("should encode Map entries as map fields", () => {
    expect(encodeValue(new Map([["count", 2]]))).toEqual({ mapValue: { fields: { count: { integerValue: "2" } } } });
  });
});

describe("encodeFields", () => {
  it("should encode each property", () => {
    expect(encodeFields({ name: "Ada", age: 36 })).toEqual({
      name: { stringValue: "Ada" },
      age: { integerValue: "36" },
    });
  });

  it("should reject anything but an object", () => {
    expect(() => encodeFields([1, 2])).toThrow(ValidationError);
    expect(() => encodeFields("text")).toThrow("Document data must be an object");
    expect(() => encodeFields(null)).toThrow(ValidationError);
  });
});

describe("decodeValue", () => {
  it("should decode safe integers as numbers and larger ones as bigint", () => {
    expect(decodeValue({ integerValue: "42" })).toBe(42);
    expect(decodeValue({ integerValue: "9007199254740993" })).toBe(9007199254740993n);
    expect(decodeValue({ integerValue: 7 })).toBe(7);
  });

  it("should decode doubles including special values", () => {
    expect(decodeValue({ doubleValue: 1.5 })).toBe(1.5);
    expect(decodeValue({ doubleValue: "NaN" })).toBeNaN();
    expect(decodeValue({ doubleValue: "Infinity" })).toBe(Infinity);
  });

  it("should decode timestamps to dates", () => {
    const decoded = decodeValue({ timestampValue: "2024-05-01T12:30:45Z" });
    expect(decoded).toBeInstanceOf(Date);
    expect(decoded instanceof Date && decoded.toISOString()).toBe("2024-05-01T12:30:45.000Z");
  });

  it("should keep unparseable timestamps as strings", () => {
    expect(decodeValue({ timestampValue: "not a time" })).toBe("not a time");
    expect(parseTimestamp("also not a time")).toBe("also not a time");
  });

  it("should decode bytes, geo points and references", () => {
    const bytes = decodeValue({ bytesValue: "aGk=" });
    expect(bytes instanceof Bytes && bytes.toString()).toBe("hi");
    expect(decodeValue({ geoPointValue: { latitude: 1, longitude: 2 } })).toEqual(new GeoPoint(1, 2));
    expect(decodeValue({ referenceValue: "projects/demo-project/databases/(default)/documents/users/ada" })).toBe(
      "projects/demo-project/databases/(default)/documents/users/ada"
    );
  });

  it("should decode empty containers", () => {
    expect(decodeValue({ arrayValue: {} })).toEqual([]);
    expect(decodeValue({ mapValue: {} })).toEqual({});
  });

  it("should pass through values without a known tag", () => {
    expect(decodeValue({ customValue: "x" })).toEqual({ customValue: "x" });
    expect(decodeValue("plain")).toBe("plain");
    expect(decodeValue(undefined)).toBeNull();
  });
});

describe("round trip", () => {
  it("should restore JSON-shaped documents", () => {
    const data = {
      name: "Ada",
      age: 36,
      ratio: 0.25,
      active: true,
      tags: ["math", "engines"],
      address: { city: "London", zip: null },
    };
    expect(decodeFields(encodeFields(data))).toEqual(data);
  });
});

describe("formatTimestamp", () => {
  it("should drop fractional seconds", () => {
    expect(formatTimestamp(new Date("2024-01-01T00:00:00.999Z"))).toBe("2024-01-01T00:00:00Z");
  });

  it("should reject invalid dates", () => {
    expect(() => formatTimestamp(new Date(Number.NaN))).toThrow(ValidationError);
  });
});

describe("parseDocument", () => {
  it("should decode fields and metadata", () => {
    const snapshot = parseDocument({
      name: "projects/demo-project/databases/(default)/documents/users/ada",
      fields: { name: { stringValue: "Ada" }, age: { integerValue: "36" } },
      createTime: "2024-01-01T00:00:00Z",
      updateTime: "2024-01-02T00:00:00Z",
    });

    expect(snapshot.id).toBe("ada");
    expect(snapshot.path).toBe("users/ada");
    expect(snapshot.data).toEqual({ name: "Ada", age: 36 });
    expect(snapshot.createTime?.toISOString()).toBe("2024-01-01T00:00:00.000Z");
    expect(snapshot.updateTime?.toISOString()).toBe("2024-01-02T00:00:00.000Z");
  });

  it("should decode a document without fields as empty data", () => {
    expect(parseDocument({})).toEqual({ data: {} });
  });
});
