import { describe, it, expect } from "vitest";
import { ok, err } from "../../types/common.js";

describe("ok()", () => {
  it("creates a successful result with the given data", () => {
    const result = ok(42);
    expect(result.success).toBe(true);
    if (result.success) expect(result.data).toBe(42);
  });

  it("keeps object data by reference", () => {
    const data = { pk: "T1#C1" };
    const result = ok(data);
    if (result.success) expect(result.data).toBe(data);
  });

  it("produces a frozen object", () => {
    expect(Object.isFrozen(ok(1))).toBe(true);
  });
});

describe("err()", () => {
  it("creates a failed result with the given error", () => {
    const error = { kind: "store", message: "down" };
    const result = err(error);
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error).toBe(error);
  });

  it("produces a frozen object", () => {
    expect(Object.isFrozen(err("e"))).toBe(true);
  });
});
