/**
 * Schema Translator
 *
 * Turns a model's declared schema into the request/response contract an
 * endpoint serves. The contract is data (ordered field specs) plus one
 * generic zod validator per side; nothing is generated per model beyond that.
 *
 * Wire encoding:
 * - integer: signed 32-bit, long: safe integer, float: single-precision range
 * - binary: base64 string on the wire, `Buffer` inside predict
 *
 * @module core/schema-translator
 */

import { z } from 'zod';
import {
  FIELD_TYPES,
  type DeclaredField,
  type DeclaredSchema,
  type FieldRecord,
  type FieldSpec,
  type FieldType,
  type ModelSchema,
} from '../types/models.js';
import {
  InvalidSchemaError,
  UnsupportedTypeError,
  zodErrorToValidationError,
} from '../api/errors.js';

const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;
const FLOAT32_MAX = 3.4028234663852886e38;
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/** Output record as written to the wire */
export type WireRecord = Record<string, string | number | boolean>;

/**
 * Ordered, JSON-friendly description of a contract
 */
export interface ContractDescription {
  inputs: Array<{ name: string; type: FieldType; required: boolean }>;
  outputs: Array<{ name: string; type: FieldType; required: boolean }>;
}

/**
 * Request/response contract generated from one schema.
 */
export interface Contract {
  readonly schema: ModelSchema;
  /** Validates one request body into predict input */
  readonly request: z.ZodType<FieldRecord, z.ZodTypeDef, unknown>;
  /** Validates one predict output row into a wire record */
  readonly responseRecord: z.ZodType<WireRecord, z.ZodTypeDef, unknown>;

  /**
   * Parse a raw request body.
   *
   * @throws {ValidationError} when the body does not match the input fields
   */
  parseRequest(raw: unknown): FieldRecord;

  /**
   * Shape predict output into response records, fields in declared order.
   *
   * @throws {z.ZodError} when a row is missing a required output or carries an extra one
   */
  formatResponse(rows: unknown): WireRecord[];

  describe(): ContractDescription;
}

export function isFieldType(value: string): value is FieldType {
  return FIELD_TYPES.some((type) => type === value);
}

/**
 * Check a declared schema and narrow it to supported field types.
 *
 * Returns frozen copies; the input is not modified.
 *
 * @throws {UnsupportedTypeError} for a field type outside the supported set
 * @throws {InvalidSchemaError} for empty outputs, empty or duplicate names
 */
export function normalizeSchema(schema: DeclaredSchema): ModelSchema {
  const inputs = normalizeFields(schema.inputs, 'input');
  const outputs = normalizeFields(schema.outputs, 'output');

  if (outputs.length === 0) {
    throw new InvalidSchemaError('Schema declares no outputs; a model without outputs cannot be served', {
      side: 'output',
    });
  }

  return Object.freeze({ inputs, outputs });
}

function normalizeFields(fields: readonly DeclaredField[], side: 'input' | 'output'): readonly FieldSpec[] {
  const seen = new Set<string>();
  const result: FieldSpec[] = [];

  for (const field of fields) {
    if (field.name.length === 0) {
      throw new InvalidSchemaError(`Schema declares an ${side} field with an empty name`, { side });
    }
    if (seen.has(field.name)) {
      throw new InvalidSchemaError(`Schema declares ${side} field '${field.name}' more than once`, {
        side,
        field: field.name,
      });
    }
    if (!isFieldType(field.type)) {
      throw new UnsupportedTypeError(field.name, field.type);
    }
    seen.add(field.name);
    result.push(Object.freeze({ name: field.name, type: field.type, required: field.required }));
  }

  return Object.freeze(result);
}

/**
 * Validator for a request value of the given type
 */
function requestValue(type: FieldType): z.ZodTypeAny {
  switch (type) {
    case 'string':
      return z.string();
    case 'integer':
      return z.number().int('Must be an integer').min(INT32_MIN).max(INT32_MAX);
    case 'long':
      return z.number().int('Must be an integer').min(Number.MIN_SAFE_INTEGER).max(Number.MAX_SAFE_INTEGER);
    case 'float':
      return z.number().finite().min(-FLOAT32_MAX).max(FLOAT32_MAX);
    case 'double':
      return z.number().finite();
    case 'boolean':
      return z.boolean();
    case 'binary':
      return z
        .string()
        .regex(BASE64_PATTERN, 'Must be base64 encoded')
        .transform((value) => Buffer.from(value, 'base64'));
  }
}

/**
 * Validator for a predict output value of the given type
 */
function responseValue(type: FieldType): z.ZodTypeAny {
  const bigintAsNumber = z.bigint().transform((value) => Number(value));

  switch (type) {
    case 'string':
      return z.string();
    case 'integer':
      return z.union([z.number(), bigintAsNumber]).pipe(z.number().int().min(INT32_MIN).max(INT32_MAX));
    case 'long':
      return z
        .union([z.number(), bigintAsNumber])
        .pipe(z.number().int().min(Number.MIN_SAFE_INTEGER).max(Number.MAX_SAFE_INTEGER));
    case 'float':
      return z.number().finite().min(-FLOAT32_MAX).max(FLOAT32_MAX);
    case 'double':
      return z.number().finite();
    case 'boolean':
      return z.boolean();
    case 'binary':
      return z.union([
        z.instanceof(Uint8Array).transform((value) => Buffer.from(value).toString('base64')),
        z.string().regex(BASE64_PATTERN, 'Must be base64 encoded'),
      ]);
  }
}

function objectShape(
  fields: readonly FieldSpec[],
  valueFor: (type: FieldType) => z.ZodTypeAny
): Record<string, z.ZodTypeAny> {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const field of fields) {
    const value = valueFor(field.type);
    shape[field.name] = field.required ? value : value.optional();
  }
  return shape;
}

/**
 * Translate a declared schema into a contract.
 *
 * @example
 * ```typescript
 * const contract = translateSchema({
 *   inputs: [{ name: 'prompt', type: 'string', required: true }],
 *   outputs: [{ name: 'translation_text', type: 'string', required: true }],
 * });
 * contract.parseRequest({ prompt: 'hi' }); // { prompt: 'hi' }
 * contract.parseRequest({ text: 'hi' });   // throws ValidationError
 * ```
 */
export function translateSchema(declared: DeclaredSchema): Contract {
  const schema = normalizeSchema(declared);
  const outputNames = schema.outputs.map((field) => field.name);

  const request: z.ZodType<FieldRecord, z.ZodTypeDef, unknown> = z
    .object(objectShape(schema.inputs, requestValue))
    .strict();

  const responseRecord: z.ZodType<WireRecord, z.ZodTypeDef, unknown> = z
    .object(objectShape(schema.outputs, responseValue))
    .strict()
    .transform((row) => {
      const ordered: WireRecord = {};
      for (const name of outputNames) {
        if (row[name] !== undefined) {
          ordered[name] = row[name];
        }
      }
      return ordered;
    });

  const responseRows = z.array(responseRecord);

  return Object.freeze({
    schema,
    request,
    responseRecord,

    parseRequest(raw: unknown): FieldRecord {
      const result = request.safeParse(raw);
      if (!result.success) {
        throw zodErrorToValidationError(result.error);
      }
      return result.data;
    },

    formatResponse(rows: unknown): WireRecord[] {
      return responseRows.parse(rows);
    },

    describe(): ContractDescription {
      return {
        inputs: schema.inputs.map((field) => ({ ...field })),
        outputs: schema.outputs.map((field) => ({ ...field })),
      };
    },
  });
}
