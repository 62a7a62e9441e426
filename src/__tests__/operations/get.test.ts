import { describe, it, expect, vi, beforeEach } from "vitest";
import { executeGet } from "../../operations/get.js";
import {
  createMockAdapter,
  customerModel,
  customerRecord,
  orderRecord,
} from "../fixtures.js";

describe("executeGet()", () => {
  let adapter: ReturnType<typeof createMockAdapter>;

  beforeEach(() => {
    adapter = createMockAdapter();
  });

  it("reads the record under the derived primary key", async () => {
    await executeGet(customerModel, adapter, { tenantId: "T1", customerId: "C1" }, { consistentRead: true });
    expect(adapter.getItem).toHaveBeenCalledWith({
      tableName: "AppTable",
      key: { pk: { S: "T1#C1" }, sk: { S: "PROFILE" } },
      consistentRead: true,
    });
  });

  it("returns undefined when no record exists", async () => {
    const result = await executeGet(customerModel, adapter, { tenantId: "T1", customerId: "C1" });
    expect(result).toEqual({ success: true, data: undefined });
  });

  it("returns the mapped entity", async () => {
    vi.mocked(adapter.getItem).mockResolvedValueOnce({ item: customerRecord });
    const result = await executeGet(customerModel, adapter, { tenantId: "T1", customerId: "C1" });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data?.customerId).toBe("C1");
      expect(result.data?.email).toBe("ada@example.com");
    }
  });

  it("refuses a record of another shape", async () => {
    vi.mocked(adapter.getItem).mockResolvedValueOnce({ item: orderRecord });
    const result = await executeGet(customerModel, adapter, { tenantId: "T1", customerId: "C1" });
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.message).toBe("Record does not match the Customer discriminator");
  });

  it("does not call the store when the key is incomplete", async () => {
    const result = await executeGet(customerModel, adapter, { tenantId: "T1" });
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.message).toBe('Cannot compute key "pk": source "customerId" has no value');
    expect(adapter.getItem).not.toHaveBeenCalled();
  });

  it("returns a store error when the adapter throws", async () => {
    vi.mocked(adapter.getItem).mockRejectedValueOnce(new Error("throttled"));
    const result = await executeGet(customerModel, adapter, { tenantId: "T1", customerId: "C1" });
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.message).toBe("getItem failed: throttled");
  });
});
