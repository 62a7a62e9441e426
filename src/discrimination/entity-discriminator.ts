/**
 * Decides which entity shape a raw record belongs to.
 */

import type { AttributeMap } from "../marshalling/types.js";
import type { MappingWarning } from "../types/operations.js";
import type { AttributeRule, SchemaModel } from "../types/schema.js";
import { matchValue } from "./value-matcher.js";

/** Which rule accepted a record, strongest first. */
export type MatchTier = "attribute" | "sortKey" | "presence";

const TIER_RANK: Readonly<Record<MatchTier, number>> = {
  attribute: 0,
  sortKey: 1,
  presence: 2,
};

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null;

/** `S`, `N` or `BOOL` text of an attribute; undefined for any other value. */
const attributeText = (record: AttributeMap, name: string): string | undefined => {
  const node: unknown = record[name];
  if (!isRecord(node)) return undefined;
  const s = node["S"];
  if (typeof s === "string") return s;
  const n = node["N"];
  if (typeof n === "string") return n;
  const b = node["BOOL"];
  return typeof b === "boolean" ? String(b) : undefined;
};

const isPresent = (record: AttributeMap, name: string): boolean => {
  const node: unknown = record[name];
  return isRecord(node) && node["NULL"] === undefined;
};

const ruleAccepts = (record: AttributeMap, rule: AttributeRule): boolean => {
  const text = attributeText(record, rule.attributeName);
  return text !== undefined && matchValue(rule.matcher, text);
};

/**
 * Reports which rule of `model`'s discriminator accepts `record`, or
 * undefined when none does.
 *
 * An attribute rule whose attribute is present on the record decides alone.
 * Otherwise the sort-key rule applies, and without one, presence of every
 * required attribute.
 */
export const matchTier = (
  record: AttributeMap,
  model: SchemaModel,
): MatchTier | undefined => {
  if (!isRecord(record)) return undefined;
  const rule = model.discriminator;

  if (rule.attribute !== undefined && isPresent(record, rule.attribute.attributeName)) {
    return ruleAccepts(record, rule.attribute) ? "attribute" : undefined;
  }
  if (rule.sortKey !== undefined) {
    return ruleAccepts(record, rule.sortKey) ? "sortKey" : undefined;
  }
  return rule.requiredAttributes.every((name) => isPresent(record, name))
    ? "presence"
    : undefined;
};

/**
 * Whether `record` is an instance of `model`. Never throws, whatever the
 * record holds.
 *
 * @example
 * ```ts
 * matches({ pk: { S: "ORDER#1" }, sk: { S: "META" } }, orderModel); // true
 * matches({ pk: { S: "ORDER#1" }, sk: { S: "LINE#1" } }, orderModel); // false
 * ```
 */
export const matches = (record: AttributeMap, model: SchemaModel): boolean =>
  matchTier(record, model) !== undefined;

/** Outcome of `resolveShape()`. */
export interface ShapeResolution {
  readonly model: SchemaModel | undefined;
  readonly tier: MatchTier | undefined;
  readonly warnings: readonly MappingWarning[];
}

/**
 * Picks the shape a record belongs to among several sharing a table.
 *
 * The strongest tier wins; inside a tier the first model in `models` wins,
 * and an `AmbiguousDiscrimination` warning names every model that matched
 * at that tier.
 */
export const resolveShape = (
  record: AttributeMap,
  models: readonly SchemaModel[],
): ShapeResolution => {
  let best: { model: SchemaModel; tier: MatchTier }[] = [];
  for (const model of models) {
    const tier = matchTier(record, model);
    if (tier === undefined) continue;
    const current = best[0];
    if (current === undefined || TIER_RANK[tier] < TIER_RANK[current.tier]) {
      best = [{ model, tier }];
    } else if (TIER_RANK[tier] === TIER_RANK[current.tier]) {
      best.push({ model, tier });
    }
  }

  const winner = best[0];
  if (winner === undefined) return { model: undefined, tier: undefined, warnings: [] };

  const warnings: MappingWarning[] =
    best.length > 1
      ? [
          {
            code: "AmbiguousDiscrimination",
            message: `Record matches ${best.map((b) => b.model.entityId).join(", ")} by ${winner.tier}; using ${winner.model.entityId}`,
            entityIds: best.map((b) => b.model.entityId),
          },
        ]
      : [];
  return { model: winner.model, tier: winner.tier, warnings };
};
