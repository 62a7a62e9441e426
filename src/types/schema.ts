/**
 * Built schema model types: the compiled, frozen output of schema building.
 */

import type { ValueMatcher } from "../discrimination/value-matcher.js";
import type { ParsedTemplate } from "../keys/template-parser.js";
import type { StandardSchemaV1 } from "../standard-schema/types.js";
import type {
  CollectionKind,
  EntityDefinition,
  ExtractionPolicy,
  ScalarType,
} from "./entity.js";

/** Key role of a field. Index roles carry the index name on the descriptor. */
export type KeyRole = "none" | "partition" | "sort" | "gsiPartition" | "gsiSort";

/** Compiled derivation rule: sources are resolved descriptors. */
export interface DerivedKeyRule {
  readonly sources: readonly FieldDescriptor[];
  readonly template: ParsedTemplate | undefined;
  readonly separator: string;
}

/** Compiled extraction rule. `policy` is undefined when the mapper default applies. */
export type ExtractedKeyRule =
  | {
      readonly kind: "position";
      readonly source: FieldDescriptor;
      readonly index: number;
      readonly separator: string;
      readonly policy: ExtractionPolicy | undefined;
    }
  | {
      readonly kind: "template";
      readonly source: FieldDescriptor;
      readonly template: ParsedTemplate;
      readonly policy: ExtractionPolicy | undefined;
    };

/** Immutable description of one mapped field. */
export interface FieldDescriptor {
  readonly sourceName: string;
  readonly storedName: string;
  readonly scalarType: ScalarType;
  readonly isCollection: boolean;
  readonly collectionKind: CollectionKind | undefined;
  readonly isNullable: boolean;
  readonly storeNull: boolean;
  /** False for extracted fields, which live only on the domain object. */
  readonly isStored: boolean;
  readonly keyRole: KeyRole;
  readonly indexName: string | undefined;
  readonly format: string | undefined;
  readonly timeZone: string | undefined;
  readonly enumValues: readonly string[] | undefined;
  readonly shape: readonly FieldDescriptor[] | undefined;
  readonly encrypted: boolean;
  readonly derivedFrom: DerivedKeyRule | undefined;
  readonly extractedFrom: ExtractedKeyRule | undefined;
}

/** A record-level rule that matches one stored attribute's text. */
export interface AttributeRule {
  readonly attributeName: string;
  readonly matcher: ValueMatcher;
}

/** How records of one shape are recognised. */
export interface DiscriminatorRule {
  readonly attribute: AttributeRule | undefined;
  readonly sortKey: AttributeRule | undefined;
  /** Stored names of every required stored field; the presence fallback. */
  readonly requiredAttributes: readonly string[];
}

/** A compiled relationship to records sharing the owner's partition key. */
export interface RelationshipDescriptor {
  readonly targetFieldName: string;
  readonly sortKeyPattern: ValueMatcher;
  readonly target: SchemaModel;
  readonly isCollection: boolean;
}

/**
 * The compiled, frozen mapping plan for one entity.
 *
 * @typeParam T - The domain object type
 */
export interface SchemaModel<T extends object = object> {
  readonly entityId: string;
  readonly tableName: string;
  readonly fields: readonly FieldDescriptor[];
  readonly relationships: readonly RelationshipDescriptor[];
  readonly discriminator: DiscriminatorRule;
  readonly partitionKey: FieldDescriptor;
  readonly sortKey: FieldDescriptor | undefined;
  /** Fields written to and read from records, in declaration order. */
  readonly storedFields: readonly FieldDescriptor[];
  /** Derived fields, sources before dependents. */
  readonly derivedOrder: readonly FieldDescriptor[];
  /** Extracted fields, sources before dependents. */
  readonly extractedFields: readonly FieldDescriptor[];
  /** Attribute written on every record when the discriminator is an exact literal. */
  readonly discriminatorLiteral:
    | { readonly attributeName: string; readonly value: string }
    | undefined;
  readonly schema: StandardSchemaV1<unknown, T> | undefined;
  readonly definition: EntityDefinition<T>;
}
