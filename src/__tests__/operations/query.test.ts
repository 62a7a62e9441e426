import { describe, it, expect, vi, beforeEach } from "vitest";
import { executeQuery } from "../../operations/query.js";
import {
  createMockAdapter,
  lineRecord,
  orderModel,
  orderRecord,
} from "../fixtures.js";

describe("executeQuery()", () => {
  let adapter: ReturnType<typeof createMockAdapter>;

  beforeEach(() => {
    adapter = createMockAdapter();
  });

  it("queries the derived partition key", async () => {
    await executeQuery(orderModel, adapter, { orderId: "O1" }, { limit: 25 });
    expect(adapter.query).toHaveBeenCalledOnce();
    expect(adapter.query).toHaveBeenCalledWith({
      tableName: "AppTable",
      keyConditionExpression: "#pk = :pk",
      expressionAttributeNames: { "#pk": "pk" },
      expressionAttributeValues: { ":pk": { S: "ORDER#O1" } },
      exclusiveStartKey: undefined,
      consistentRead: undefined,
      limit: 25,
    });
  });

  it("returns no entities for an empty partition", async () => {
    const result = await executeQuery(orderModel, adapter, { orderId: "O1" });
    expect(result).toEqual({ success: true, data: { entities: [], warnings: [] } });
  });

  it("reconstructs the entity from every page", async () => {
    const lastKey = { pk: { S: "ORDER#O1" }, sk: { S: "META" } };
    vi.mocked(adapter.query)
      .mockResolvedValueOnce({ items: [orderRecord], lastEvaluatedKey: lastKey })
      .mockResolvedValueOnce({ items: [lineRecord(1, "A"), lineRecord(2, "B")] });

    const result = await executeQuery(orderModel, adapter, { orderId: "O1" });
    expect(adapter.query).toHaveBeenCalledTimes(2);
    expect(vi.mocked(adapter.query).mock.calls[1]?.[0].exclusiveStartKey).toEqual(lastKey);
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.entities).toHaveLength(1);
      expect(result.data.entities[0]?.lines.map((l) => l.sku)).toEqual(["A", "B"]);
    }
  });

  it("fails without a partition key source", async () => {
    const result = await executeQuery(orderModel, adapter, {});
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.message).toBe('Cannot compute key "pk": source "orderId" has no value');
    expect(adapter.query).not.toHaveBeenCalled();
  });

  it("returns a store error when a page fails", async () => {
    vi.mocked(adapter.query)
      .mockResolvedValueOnce({ items: [orderRecord], lastEvaluatedKey: { pk: { S: "ORDER#O1" } } })
      .mockRejectedValueOnce(new Error("throttled"));
    const result = await executeQuery(orderModel, adapter, { orderId: "O1" });
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.message).toBe("query failed: throttled");
  });
});
