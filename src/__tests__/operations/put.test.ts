import { describe, it, expect, vi, beforeEach } from "vitest";
import { executePut } from "../../operations/put.js";
import {
  createMockAdapter,
  customerModel,
  customerRecord,
  memoModel,
  validCustomer,
} from "../fixtures.js";

describe("executePut()", () => {
  let adapter: ReturnType<typeof createMockAdapter>;

  beforeEach(() => {
    adapter = createMockAdapter();
  });

  it("writes the mapped record and returns it", async () => {
    const result = await executePut(customerModel, adapter, validCustomer);
    expect(result).toEqual({ success: true, data: customerRecord });
    expect(adapter.putItem).toHaveBeenCalledOnce();
    expect(adapter.putItem).toHaveBeenCalledWith({ tableName: "AppTable", item: customerRecord });
  });

  it("adds a condition when asked not to overwrite", async () => {
    await executePut(customerModel, adapter, validCustomer, { ifNotExists: true });
    const call = vi.mocked(adapter.putItem).mock.calls[0]?.[0];
    expect(call?.conditionExpression).toBe("attribute_not_exists(#pk)");
    expect(call?.expressionAttributeNames).toEqual({ "#pk": "pk" });
  });

  it("does not write when mapping fails", async () => {
    const result = await executePut(memoModel, adapter, { id: "M1" });
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.kind).toBe("serialization");
    expect(adapter.putItem).not.toHaveBeenCalled();
  });

  it("returns a store error when the adapter throws", async () => {
    const cause = new Error("ConditionalCheckFailed");
    vi.mocked(adapter.putItem).mockRejectedValueOnce(cause);
    const result = await executePut(customerModel, adapter, validCustomer, { ifNotExists: true });
    expect(result).toEqual({
      success: false,
      error: { kind: "store", message: "putItem failed: ConditionalCheckFailed", operation: "putItem", cause },
    });
  });
});
