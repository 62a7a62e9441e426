/**
 * Mapper options, warning and operation input/output types.
 */

import type { ExtractionPolicy } from "./entity.js";
import type { FieldEncryptor } from "./hooks.js";
import type { MappingLogger } from "./logger.js";

/** Options every mapping call accepts. */
export interface MappingOptions {
  /** Default: a silent logger. */
  readonly logger?: MappingLogger | undefined;
  /** Required when any mapped field is `encrypted`. */
  readonly fieldEncryptor?: FieldEncryptor | undefined;
  /** Applies to extracted fields without their own policy. Default: `"lenient"`. */
  readonly extraction?: ExtractionPolicy | undefined;
  /** Run the entity's Standard Schema on writes and reads. Default: `true`. */
  readonly validation?: boolean | undefined;
}

/** Non-fatal findings of reconstruction and shape resolution. */
export type MappingWarning =
  | {
      readonly code: "OrphanedChildRecords";
      readonly message: string;
      readonly partitionKey: string;
      readonly recordCount: number;
    }
  | {
      readonly code: "DuplicatePrimaryRecord";
      readonly message: string;
      readonly partitionKey: string;
      readonly recordCount: number;
    }
  | {
      readonly code: "MultipleSingularMatches";
      readonly message: string;
      readonly partitionKey: string;
      readonly field: string;
      readonly recordCount: number;
    }
  | {
      readonly code: "AmbiguousRelationshipMatch";
      readonly message: string;
      readonly partitionKey: string;
      readonly sortKey: string | undefined;
      readonly fields: readonly string[];
    }
  | {
      readonly code: "MissingPartitionKeyValue";
      readonly message: string;
      readonly recordIndex: number;
    }
  | {
      readonly code: "AmbiguousDiscrimination";
      readonly message: string;
      readonly entityIds: readonly string[];
    };

/** Entities rebuilt from a flat record sequence, in first-seen partition order. */
export interface ReconstructionResult<T> {
  readonly entities: readonly T[];
  readonly warnings: readonly MappingWarning[];
}

/** Options for put operations. */
export interface PutOptions extends MappingOptions {
  /** Fail instead of overwriting an existing record with the same key. */
  readonly ifNotExists?: boolean | undefined;
}

/** Options for get operations. */
export interface GetOptions extends MappingOptions {
  readonly consistentRead?: boolean | undefined;
}

/** Options for query operations. */
export interface QueryOptions extends MappingOptions {
  readonly consistentRead?: boolean | undefined;
  /** Page size hint passed to the store. */
  readonly limit?: number | undefined;
}

