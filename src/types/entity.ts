/**
 * Declarative entity definition types: the input side of schema building.
 */

import type { StandardSchemaV1 } from "../standard-schema/types.js";
import type { TableDefinition } from "./table.js";

/** Scalar kinds a field can hold. */
export type ScalarType =
  | "string"
  | "number"
  | "boolean"
  | "binary"
  | "datetime"
  | "enum"
  | "nested";

/**
 * How a collection field is stored: `list` as `L`, `set` as `SS`/`NS`/`BS`,
 * `map` as `M` keyed by the object's own keys.
 */
export type CollectionKind = "list" | "set" | "map";

/**
 * What happens when an extracted key component is missing: `lenient` leaves
 * the field unset and logs, `strict` fails the read.
 */
export type ExtractionPolicy = "lenient" | "strict";

/** Key role of a field on the table or on one of its indexes. */
export type KeyRoleConfig =
  | "partition"
  | "sort"
  | { readonly index: string; readonly role: "partition" | "sort" };

/**
 * A field computed from other fields before every write.
 *
 * Without a `template`, source values are joined with `separator`
 * (default `"#"`). With one, `{{source}}` placeholders are substituted, e.g.
 * `"TENANT#{{tenantId}}#CUSTOMER#{{customerId}}"`. A template with no
 * placeholders and no sources yields a constant, e.g. a static `"META"` sort key.
 */
export interface DerivedKeyConfig {
  readonly sources: readonly string[];
  readonly template?: string | undefined;
  readonly separator?: string | undefined;
}

/**
 * A non-stored field parsed out of another field after every read.
 *
 * Positional form: component `index` of the source value split by `separator`
 * (default `"#"`). Template form: the value of the `{{field}}` placeholder
 * named after this field, e.g. `{ source: "pk", template: "TENANT#{{tenantId}}" }`.
 */
export type ExtractedKeyConfig =
  | {
      readonly source: string;
      readonly index: number;
      readonly separator?: string | undefined;
      readonly policy?: ExtractionPolicy | undefined;
    }
  | {
      readonly source: string;
      readonly template: string;
      readonly policy?: ExtractionPolicy | undefined;
    };

/** Declarative description of one field. */
export interface FieldConfig {
  readonly type: ScalarType;
  /** Stored attribute name. Defaults to the table key name for key fields, else the field name. */
  readonly attributeName?: string | undefined;
  readonly collection?: CollectionKind | undefined;
  /** Unset values are allowed. Default `false`. */
  readonly nullable?: boolean | undefined;
  /** Write `{ NULL: true }` for unset values instead of omitting the attribute. */
  readonly storeNull?: boolean | undefined;
  readonly key?: KeyRoleConfig | undefined;
  /**
   * Encode-side format. Numbers: `F<n>` fixed decimals, `D<n>` zero-padded
   * integer. Datetimes: date-fns tokens, or `unix` / `unixMs` for numeric epochs.
   */
  readonly format?: string | undefined;
  /** IANA zone datetimes are rendered in and offset-less text is read in. Default UTC. */
  readonly timeZone?: string | undefined;
  readonly enumValues?: readonly string[] | undefined;
  /** Field layout of a `nested` value. Without one, nested values are marshalled as-is. */
  readonly shape?: Readonly<Record<string, FieldConfig>> | undefined;
  readonly derivedFrom?: DerivedKeyConfig | undefined;
  readonly extractedFrom?: ExtractedKeyConfig | undefined;
  /** Route the value through the configured field encryptor. */
  readonly encrypted?: boolean | undefined;
}

/** Field configs keyed by domain property name. */
export type FieldConfigMap<T> = {
  readonly [K in keyof T & string]?: FieldConfig;
};

/** Element type a relationship property holds. */
export type RelatedType<V> = V extends readonly (infer E)[]
  ? E
  : NonNullable<V>;

/**
 * Records under the same partition key whose sort key matches
 * `sortKeyPattern` populate this property, mapped through `target`.
 *
 * Patterns: `"LINE#*"` prefix, `"*#ARCHIVED"` suffix, `"*NOTE*"` contains,
 * `"A*B"` glob, or a literal that matches itself and `"<literal>#..."`.
 */
export interface RelationshipConfig<R> {
  readonly sortKeyPattern: string;
  readonly target: EntityDefinition<Extract<R, object>>;
  readonly collection: boolean;
}

/** Relationship configs keyed by domain property name. */
export type RelationshipConfigMap<T> = {
  readonly [K in keyof T & string]?: RelationshipConfig<RelatedType<T[K]>>;
};

/**
 * How a raw record is recognised as this entity when a table stores several
 * shapes. The attribute rule wins over the sort-key rule; without either,
 * presence of every required attribute decides.
 */
export interface DiscriminatorConfig {
  readonly attribute?: { readonly name: string; readonly value: string } | undefined;
  readonly sortKey?: string | undefined;
}

/** Configuration input for `defineEntity()`. */
export interface EntityConfig<T extends object> {
  readonly name: string;
  readonly table: TableDefinition;
  readonly fields: FieldConfigMap<T>;
  readonly relationships?: RelationshipConfigMap<T> | undefined;
  readonly discriminator?: DiscriminatorConfig | undefined;
  /** Optional Standard Schema (Zod, Valibot, ArkType...) run on writes and reads. */
  readonly schema?: StandardSchemaV1<unknown, T> | undefined;
}

/** The frozen, immutable entity definition produced by `defineEntity()`. */
export interface EntityDefinition<T extends object = object> {
  readonly name: string;
  readonly table: TableDefinition;
  readonly fields: FieldConfigMap<T>;
  readonly relationships: RelationshipConfigMap<T> | undefined;
  readonly discriminator: DiscriminatorConfig | undefined;
  readonly schema: StandardSchemaV1<unknown, T> | undefined;
}
