import { describe, it, expect } from "vitest";
import { marshallValue, marshallItem } from "../../marshalling/marshall.js";
import { unmarshallValue, unmarshallItem } from "../../marshalling/unmarshall.js";
import {
  describeAttributeValue,
  getAttributeValueType,
  scalarText,
} from "../../marshalling/types.js";

describe("marshallValue()", () => {
  it.each([
    ["a string", "hello", { S: "hello" }],
    ["a number", -3.5, { N: "-3.5" }],
    ["a bigint", BigInt(99), { N: "99" }],
    ["a boolean", false, { BOOL: false }],
    ["null", null, { NULL: true }],
    ["a Date", new Date("2024-03-01T12:00:00.000Z"), { S: "2024-03-01T12:00:00.000Z" }],
  ])("marshalls %s", (_label, value, expected) => {
    expect(marshallValue(value)).toEqual({ success: true, data: expected });
  });

  it("marshalls nested objects and lists, skipping undefined members", () => {
    const result = marshallValue({ street: "Main", lines: [1, "two"], note: undefined });
    expect(result).toEqual({
      success: true,
      data: { M: { street: { S: "Main" }, lines: { L: [{ N: "1" }, { S: "two" }] } } },
    });
  });

  it("marshalls homogeneous sets", () => {
    expect(marshallValue(new Set(["a", "b"]))).toEqual({ success: true, data: { SS: ["a", "b"] } });
    expect(marshallValue(new Set([1, 2]))).toEqual({ success: true, data: { NS: ["1", "2"] } });
  });

  it.each([
    ["Infinity", Infinity],
    ["an empty Set", new Set()],
    ["a mixed Set", new Set(["a", 1])],
    ["a function", () => 1],
    ["an invalid Date", new Date("nope")],
  ])("fails for %s", (_label, value) => {
    expect(marshallValue(value).success).toBe(false);
  });
});

describe("unmarshallValue()", () => {
  it("reverses marshallValue for nested maps", () => {
    const result = unmarshallValue({
      M: { qty: { N: "2" }, ok: { BOOL: true }, tags: { SS: ["x"] }, gone: { NULL: true } },
    });
    expect(result).toEqual({
      success: true,
      data: { qty: 2, ok: true, tags: new Set(["x"]), gone: null },
    });
  });

  it("unmarshalls number sets to numbers", () => {
    expect(unmarshallValue({ NS: ["1", "2.5"] })).toEqual({ success: true, data: new Set([1, 2.5]) });
  });
});

describe("marshallItem() / unmarshallItem()", () => {
  it("converts a plain object to a raw record and back", () => {
    const marshalled = marshallItem({ name: "Ada", age: 36 });
    expect(marshalled).toEqual({ success: true, data: { name: { S: "Ada" }, age: { N: "36" } } });
    if (marshalled.success) {
      expect(unmarshallItem(marshalled.data)).toEqual({ success: true, data: { name: "Ada", age: 36 } });
    }
  });

  it("fails if any value cannot be marshalled", () => {
    expect(marshallItem({ bad: NaN }).success).toBe(false);
  });
});

describe("attribute value helpers", () => {
  it("reports the type tag", () => {
    expect(getAttributeValueType({ BS: [] })).toBe("BS");
    expect(getAttributeValueType({ NULL: true })).toBe("NULL");
  });

  it("describes values without dumping payloads", () => {
    expect(describeAttributeValue({ S: "abc" })).toBe('String("abc")');
    expect(describeAttributeValue({ B: new Uint8Array(4) })).toBe("Binary(4 bytes)");
    expect(describeAttributeValue({ M: { a: { N: "1" } } })).toBe("Map(1 attributes)");
  });

  it("reads scalar key text from S and N only", () => {
    expect(scalarText({ S: "T1#C1" })).toBe("T1#C1");
    expect(scalarText({ N: "7" })).toBe("7");
    expect(scalarText({ BOOL: true })).toBeUndefined();
    expect(scalarText(undefined)).toBeUndefined();
  });
});
