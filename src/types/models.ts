/**
 * Model signature type definitions
 */

/**
 * Value types a model may declare for an input or output field.
 */
export const FIELD_TYPES = [
  'string',
  'integer',
  'long',
  'float',
  'double',
  'boolean',
  'binary',
] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

/**
 * A field exactly as a registry reports it. The type is whatever the model
 * declared and may fall outside `FieldType`.
 */
export interface DeclaredField {
  /** Field name, unique within its side of the schema */
  readonly name: string;
  /** Declared value type */
  readonly type: string;
  /** Whether a request must carry this field */
  readonly required: boolean;
}

/**
 * Signature of one model version as stored in the registry.
 *
 * Field order is preserved into the generated contract; it plays no part
 * in compatibility.
 */
export interface DeclaredSchema {
  readonly inputs: readonly DeclaredField[];
  readonly outputs: readonly DeclaredField[];
}

/** A declared field whose type is known to be supported */
export interface FieldSpec extends DeclaredField {
  readonly type: FieldType;
}

/** A declared schema that passed translation checks */
export interface ModelSchema extends DeclaredSchema {
  readonly inputs: readonly FieldSpec[];
  readonly outputs: readonly FieldSpec[];
}

/** Identifier of one registered, immutable snapshot of a model */
export type VersionId = string;

/** Value handed to or returned by a predict function for one field */
export type FieldValue = string | number | bigint | boolean | Uint8Array;

/** One row of model input or output, keyed by field name */
export type FieldRecord = Record<string, FieldValue>;

/**
 * Opaque inference capability: a batch of validated inputs in, a batch of
 * outputs out. May reject.
 */
export type PredictFn = (batch: FieldRecord[]) => Promise<Record<string, unknown>[]>;

/**
 * One loaded model version.
 *
 * Owned by the version cache entry holding it; published handles are
 * read-only and may be invoked concurrently.
 */
export interface VersionHandle {
  readonly versionId: VersionId;
  readonly schema: ModelSchema;
  readonly predict: PredictFn;
  /** Releases resources held by the loaded version (called on eviction) */
  readonly release?: () => void | Promise<void>;
}
