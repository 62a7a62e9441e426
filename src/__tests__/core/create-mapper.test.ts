import { describe, it, expect } from "vitest";
import { createMapper } from "../../core/create-mapper.js";
import { createMockLogger, customerModel, customerRecord, lineItemModel, lineRecord, orderModel, orderRecord, validOrder } from "../fixtures.js";

describe("createMapper()", () => {
  it("fills in defaults", () => {
    const mapper = createMapper();
    expect(mapper.config.extraction).toBe("lenient");
    expect(mapper.config.validation).toBe(true);
    expect(mapper.config.fieldEncryptor).toBeUndefined();
    expect(Object.isFrozen(mapper)).toBe(true);
  });

  it("maps entities with the bound configuration", async () => {
    const mapper = createMapper();
    const record = await mapper.toRecord(validOrder, orderModel);
    expect(record).toEqual({ success: true, data: orderRecord });
  });

  it("applies the configured extraction policy", async () => {
    const strict = createMapper({ extraction: "strict" });
    const result = await strict.fromRecord({ ...customerRecord, pk: { S: "T1" } }, customerModel);
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.kind).toBe("keyExtraction");
  });

  it("turns validation off", async () => {
    const mapper = createMapper({ validation: false });
    const result = await mapper.fromRecord({ ...customerRecord, pk: { S: "T1" } }, customerModel);
    expect(result).toEqual({
      success: true,
      data: { pk: "T1", sk: "PROFILE", name: "Ada", email: "ada@example.com", tier: "pro", tenantId: "T1" },
    });
  });

  it("exposes discrimination", () => {
    const mapper = createMapper();
    expect(mapper.matches(orderRecord, orderModel)).toBe(true);
    expect(mapper.matchTier(lineRecord(1, "A"), lineItemModel)).toBe("sortKey");
  });

  it("logs shape ambiguity when resolving", () => {
    const logger = createMockLogger();
    const mapper = createMapper({ logger });
    const resolution = mapper.resolveShape(orderRecord, [orderModel, orderModel]);
    expect(resolution.model).toBe(orderModel);
    expect(logger.warn).toHaveBeenCalledWith("Record matches Order, Order by attribute; using Order", {
      code: "AmbiguousDiscrimination",
      entityIds: ["Order", "Order"],
    });
  });
});
