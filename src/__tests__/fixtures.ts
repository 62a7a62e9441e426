/**
 * Shared test fixtures used across all test files.
 *
 * One table holds three shapes: customers (sort key `PROFILE`), orders
 * (attribute discriminator `entityType = "Order"`) and the order's line items
 * (sort keys `LINE#<n>`).
 */

import { vi } from "vitest";
import { z } from "zod";
import type { RecordStoreAdapter } from "../adapters/adapter.js";
import { buildSchemaModel } from "../core/build-schema.js";
import { defineEntity } from "../core/define-entity.js";
import { defineTable } from "../core/define-table.js";
import type { EntityDefinition } from "../types/entity.js";
import type { FieldEncryptor } from "../types/hooks.js";
import type { MappingLogger } from "../types/logger.js";
import type { FieldDescriptor, SchemaModel } from "../types/schema.js";

// ---------------------------------------------------------------------------
// Table
// ---------------------------------------------------------------------------

export const appTable = defineTable({
  tableName: "AppTable",
  partitionKey: { name: "pk" },
  sortKey: { name: "sk" },
  indexes: {
    byEmail: {
      indexName: "GSI1",
      partitionKey: { name: "gsi1pk" },
      sortKey: { name: "gsi1sk" },
    },
  },
});

// ---------------------------------------------------------------------------
// Customer: Zod-validated, composite partition key
// ---------------------------------------------------------------------------

export const customerSchema = z.object({
  tenantId: z.string(),
  customerId: z.string(),
  pk: z.string().optional(),
  sk: z.string().optional(),
  name: z.string(),
  email: z.string().email(),
  tier: z.enum(["free", "pro"]),
  nickname: z.string().optional(),
});

export type Customer = z.output<typeof customerSchema>;

export const customerEntity = defineEntity<Customer>({
  name: "Customer",
  table: appTable,
  schema: customerSchema,
  fields: {
    tenantId: { type: "string", extractedFrom: { source: "pk", index: 0 } },
    customerId: { type: "string", extractedFrom: { source: "pk", index: 1 } },
    pk: { type: "string", key: "partition", derivedFrom: { sources: ["tenantId", "customerId"] } },
    sk: { type: "string", key: "sort", derivedFrom: { sources: [], template: "PROFILE" } },
    name: { type: "string" },
    email: { type: "string" },
    tier: { type: "enum", enumValues: ["free", "pro"] },
    nickname: { type: "string", nullable: true },
  },
  discriminator: { sortKey: "PROFILE" },
});

// ---------------------------------------------------------------------------
// Order and its line items
// ---------------------------------------------------------------------------

export interface LineItem {
  orderId: string;
  lineNo: number;
  pk?: string;
  sk?: string;
  sku: string;
  quantity: number;
  price: number;
}

export interface Order {
  orderId: string;
  pk?: string;
  sk?: string;
  status: "open" | "shipped";
  total: number;
  placedAt: Date;
  tags?: Set<string>;
  lines: LineItem[];
}

export const lineItemEntity = defineEntity<LineItem>({
  name: "LineItem",
  table: appTable,
  fields: {
    orderId: { type: "string", extractedFrom: { source: "pk", template: "ORDER#{{orderId}}" } },
    lineNo: { type: "number", format: "D3", extractedFrom: { source: "sk", index: 1 } },
    pk: { type: "string", key: "partition", derivedFrom: { sources: ["orderId"], template: "ORDER#{{orderId}}" } },
    sk: { type: "string", key: "sort", derivedFrom: { sources: ["lineNo"], template: "LINE#{{lineNo}}" } },
    sku: { type: "string" },
    quantity: { type: "number" },
    price: { type: "number", format: "F2" },
  },
  discriminator: { sortKey: "LINE#*" },
});

export const orderEntity = defineEntity<Order>({
  name: "Order",
  table: appTable,
  fields: {
    orderId: { type: "string", extractedFrom: { source: "pk", template: "ORDER#{{orderId}}" } },
    pk: { type: "string", key: "partition", derivedFrom: { sources: ["orderId"], template: "ORDER#{{orderId}}" } },
    sk: { type: "string", key: "sort", derivedFrom: { sources: [], template: "META" } },
    status: { type: "enum", enumValues: ["open", "shipped"] },
    total: { type: "number", format: "F2" },
    placedAt: { type: "datetime" },
    tags: { type: "string", collection: "set" },
  },
  relationships: {
    lines: { sortKeyPattern: "LINE#*", target: lineItemEntity, collection: true },
  },
  discriminator: { attribute: { name: "entityType", value: "Order" } },
});

// ---------------------------------------------------------------------------
// Memo: stored nulls and encrypted fields
// ---------------------------------------------------------------------------

export interface Memo {
  id?: string;
  pk?: string;
  sk?: string;
  title?: string;
  body?: string;
  secret?: string;
  score?: number;
}

export const memoEntity = defineEntity<Memo>({
  name: "Memo",
  table: appTable,
  fields: {
    id: { type: "string" },
    pk: { type: "string", key: "partition", derivedFrom: { sources: ["id"], template: "MEMO#{{id}}" } },
    sk: { type: "string", key: "sort", derivedFrom: { sources: [], template: "MEMO" } },
    title: { type: "string" },
    body: { type: "string", nullable: true, storeNull: true },
    secret: { type: "string", nullable: true, encrypted: true },
    score: { type: "number", nullable: true, encrypted: true },
  },
  discriminator: { sortKey: "MEMO" },
});

// ---------------------------------------------------------------------------
// Built models
// ---------------------------------------------------------------------------

/** Builds a model, failing the importing test file when the definition is invalid. */
export const mustBuild = <T extends object>(
  definition: EntityDefinition<T>,
): SchemaModel<T> => {
  const result = buildSchemaModel(definition);
  if (!result.success) throw new Error(result.error.message);
  return result.data;
};

export const customerModel = mustBuild(customerEntity);
export const orderModel = mustBuild(orderEntity);
export const lineItemModel = mustBuild(lineItemEntity);
export const memoModel = mustBuild(memoEntity);

/** A standalone field descriptor for codec-level tests. */
export const fieldDescriptor = (
  overrides: Partial<FieldDescriptor> & Pick<FieldDescriptor, "sourceName" | "scalarType">,
): FieldDescriptor => ({
  storedName: overrides.sourceName,
  isCollection: overrides.collectionKind !== undefined,
  collectionKind: undefined,
  isNullable: false,
  storeNull: false,
  isStored: true,
  keyRole: "none",
  indexName: undefined,
  format: undefined,
  timeZone: undefined,
  enumValues: undefined,
  shape: undefined,
  encrypted: false,
  derivedFrom: undefined,
  extractedFrom: undefined,
  ...overrides,
});

// ---------------------------------------------------------------------------
// Mocks
// ---------------------------------------------------------------------------

export const createMockAdapter = (): RecordStoreAdapter => ({
  putItem: vi.fn().mockResolvedValue(undefined),
  getItem: vi.fn().mockResolvedValue({ item: undefined }),
  query: vi.fn().mockResolvedValue({ items: [], lastEvaluatedKey: undefined }),
});

export const createMockLogger = (): MappingLogger => ({
  debug: vi.fn(),
  warn: vi.fn(),
});

/** Reverses the bytes; applying it twice restores the plaintext. */
const reverseBytes = (bytes: Uint8Array): Uint8Array => bytes.slice().reverse();

export const createMockEncryptor = (): FieldEncryptor => ({
  encrypt: vi.fn(reverseBytes),
  decrypt: vi.fn(reverseBytes),
});

// ---------------------------------------------------------------------------
// Sample data
// ---------------------------------------------------------------------------

export const validCustomer: Customer = {
  tenantId: "T1",
  customerId: "C1",
  name: "Ada",
  email: "ada@example.com",
  tier: "pro",
};

export const customerRecord = {
  pk: { S: "T1#C1" },
  sk: { S: "PROFILE" },
  name: { S: "Ada" },
  email: { S: "ada@example.com" },
  tier: { S: "pro" },
};

export const validOrder: Order = {
  orderId: "O1",
  status: "open",
  total: 25,
  placedAt: new Date("2024-03-01T12:00:00.000Z"),
  tags: new Set(["gift"]),
  lines: [],
};

export const orderRecord = {
  pk: { S: "ORDER#O1" },
  sk: { S: "META" },
  status: { S: "open" },
  total: { N: "25.00" },
  placedAt: { S: "2024-03-01T12:00:00.000Z" },
  tags: { SS: ["gift"] },
  entityType: { S: "Order" },
};

export const lineRecord = (lineNo: number, sku: string) => ({
  pk: { S: "ORDER#O1" },
  sk: { S: `LINE#${String(lineNo).padStart(3, "0")}` },
  sku: { S: sku },
  quantity: { N: "1" },
  price: { N: "12.50" },
});
