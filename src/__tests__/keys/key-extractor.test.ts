import { describe, it, expect, vi } from "vitest";
import { defineEntity } from "../../core/define-entity.js";
import { extractComponents, extractFieldsFromKey } from "../../keys/key-extractor.js";
import { parseTemplate } from "../../keys/template-parser.js";
import type { FieldDescriptor, SchemaModel } from "../../types/schema.js";
import {
  appTable,
  createMockLogger,
  customerModel,
  lineItemModel,
  mustBuild,
  orderModel,
} from "../fixtures.js";

const field = (model: SchemaModel, name: string): FieldDescriptor => {
  const found = model.fields.find((f) => f.sourceName === name);
  if (found === undefined) throw new Error(`no field ${name}`);
  return found;
};

describe("extractFieldsFromKey()", () => {
  it("returns no fields for a constant template", () => {
    expect(extractFieldsFromKey(parseTemplate("PROFILE"), "PROFILE")).toEqual({ success: true, data: {} });
  });

  it("extracts several fields using literals as delimiters", () => {
    const template = parseTemplate("TENANT#{{tenantId}}#CUSTOMER#{{customerId}}");
    expect(extractFieldsFromKey(template, "TENANT#T1#CUSTOMER#C1")).toEqual({
      success: true,
      data: { tenantId: "T1", customerId: "C1" },
    });
  });

  it("fails when the key does not start with the template prefix", () => {
    expect(extractFieldsFromKey(parseTemplate("USER#{{userId}}"), "ORDER#1")).toEqual({
      success: false,
      error: 'expected "USER#" at position 0',
    });
  });

  it("fails when a delimiter is missing", () => {
    expect(extractFieldsFromKey(parseTemplate("{{a}}#{{b}}"), "no-delimiter")).toEqual({
      success: false,
      error: 'delimiter "#" not found',
    });
  });

  it("fails on placeholders with nothing between them", () => {
    expect(extractFieldsFromKey(parseTemplate("{{a}}{{b}}"), "ab")).toEqual({
      success: false,
      error: "consecutive placeholders have no delimiter",
    });
  });

  it("returns a frozen object", () => {
    const result = extractFieldsFromKey(parseTemplate("{{id}}"), "123");
    if (result.success) expect(Object.isFrozen(result.data)).toBe(true);
    expect(result.success).toBe(true);
  });
});

describe("extractComponents()", () => {
  it("assigns the positional component to the target", () => {
    const target: Record<string, unknown> = { pk: "T1#C1" };
    expect(extractComponents(target, field(customerModel, "customerId"))).toEqual({ success: true, data: "C1" });
    expect(target).toEqual({ pk: "T1#C1", customerId: "C1" });
  });

  it("decodes numeric components with the field's codec", () => {
    const target: Record<string, unknown> = { sk: "LINE#007" };
    extractComponents(target, field(lineItemModel, "lineNo"));
    expect(target["lineNo"]).toBe(7);
  });

  it("fails when a numeric component is not a number", () => {
    const result = extractComponents({ sk: "LINE#abc" }, field(lineItemModel, "lineNo"));
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.message).toBe('Cannot decode field "lineNo" as number: "abc" is not numeric');
  });

  it("extracts through a template", () => {
    const target: Record<string, unknown> = { pk: "ORDER#O1" };
    extractComponents(target, field(orderModel, "orderId"));
    expect(target["orderId"]).toBe("O1");
  });

  describe("lenient policy", () => {
    it("leaves the field unset and warns when the component is missing", () => {
      const logger = createMockLogger();
      const target: Record<string, unknown> = { pk: "T1" };
      const result = extractComponents(target, field(customerModel, "customerId"), { logger, entityId: "Customer" });
      expect(result).toEqual({ success: true, data: undefined });
      expect(target).toEqual({ pk: "T1" });
      expect(logger.warn).toHaveBeenCalledWith("Extracted key component is missing; leaving field unset", {
        entityId: "Customer",
        field: "customerId",
        source: "pk",
        value: "T1",
      });
    });

    it("treats an empty component as missing", () => {
      const logger = createMockLogger();
      const target: Record<string, unknown> = { sk: "LINE#" };
      const result = extractComponents(target, field(lineItemModel, "lineNo"), { logger });
      expect(result).toEqual({ success: true, data: undefined });
      expect(target).toEqual({ sk: "LINE#" });
      expect(vi.mocked(logger.warn).mock.calls[0]?.[0]).toBe("Extracted key component is missing; leaving field unset");
    });

    it("logs at debug when the source itself is unset", () => {
      const logger = createMockLogger();
      extractComponents({}, field(customerModel, "tenantId"), { logger });
      expect(logger.warn).not.toHaveBeenCalled();
      expect(vi.mocked(logger.debug).mock.calls[0]?.[0]).toBe("Extracted key source is unset");
    });
  });

  describe("strict policy", () => {
    it("fails naming the missing component", () => {
      const result = extractComponents({ pk: "T1" }, field(customerModel, "customerId"), { policy: "strict" });
      expect(result).toEqual({
        success: false,
        error: {
          kind: "keyExtraction",
          message: 'Cannot extract "customerId": "T1" has no component at index 1',
          field: "customerId",
          source: "pk",
          index: 1,
          value: "T1",
        },
      });
    });

    it("fails on an empty component instead of decoding it as zero", () => {
      const result = extractComponents({ sk: "LINE#" }, field(lineItemModel, "lineNo"), { policy: "strict" });
      if (!result.success) {
        expect(result.error.message).toBe('Cannot extract "lineNo": "LINE#" has no component at index 1');
      }
      expect(result.success).toBe(false);
    });

    it("fails on an empty template component", () => {
      const result = extractComponents({ pk: "ORDER#" }, field(orderModel, "orderId"), { policy: "strict" });
      if (!result.success) {
        expect(result.error.message).toBe('Cannot extract "orderId": "ORDER#" does not match its key template');
      }
      expect(result.success).toBe(false);
    });

    it("fails when the source is unset", () => {
      const result = extractComponents({}, field(customerModel, "tenantId"), { policy: "strict" });
      if (!result.success) expect(result.error.message).toBe('Cannot extract "tenantId": source "pk" has no value');
      expect(result.success).toBe(false);
    });

    it("reports a template mismatch", () => {
      const result = extractComponents({ pk: "CUSTOMER#1" }, field(orderModel, "orderId"), { policy: "strict" });
      if (!result.success) {
        expect(result.error.message).toBe('Cannot extract "orderId": "CUSTOMER#1" does not match its key template');
      }
      expect(result.success).toBe(false);
    });

    it("is overridden by a field's own policy", () => {
      const model = mustBuild(
        defineEntity<{ pk: string; sk: string; region?: string }>({
          name: "Region",
          table: appTable,
          fields: {
            pk: { type: "string", key: "partition" },
            sk: { type: "string", key: "sort" },
            region: { type: "string", extractedFrom: { source: "sk", index: 2, policy: "lenient" } },
          },
        }),
      );
      const result = extractComponents({ sk: "A#B" }, field(model, "region"), { policy: "strict" });
      expect(result).toEqual({ success: true, data: undefined });
    });
  });
});
