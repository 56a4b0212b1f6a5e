/**
 * Schema compatibility
 *
 * Two schemas are compatible when their inputs are equal as sets of
 * (name, type, required) and their outputs are too. Field order is ignored.
 */

import type { DeclaredField, DeclaredSchema } from '../types/models.js';

/**
 * Fields present on one side of a comparison only
 */
export interface SchemaDiff {
  compatible: boolean;
  /** Fields the reference declares that the candidate lacks */
  missingInputs: string[];
  missingOutputs: string[];
  /** Fields the candidate declares that the reference lacks */
  unexpectedInputs: string[];
  unexpectedOutputs: string[];
}

function fieldKey(field: DeclaredField): string {
  return `${field.name}:${field.type}:${field.required ? 'required' : 'optional'}`;
}

function keySet(fields: readonly DeclaredField[]): Set<string> {
  return new Set(fields.map(fieldKey));
}

function difference(a: Set<string>, b: Set<string>): string[] {
  return Array.from(a)
    .filter((key) => !b.has(key))
    .sort();
}

function sameFields(a: readonly DeclaredField[], b: readonly DeclaredField[]): boolean {
  const left = keySet(a);
  const right = keySet(b);
  // Sizes differ when one side repeats a field
  if (a.length !== b.length || left.size !== right.size) {
    return false;
  }
  for (const key of left) {
    if (!right.has(key)) {
      return false;
    }
  }
  return true;
}

export function isCompatible(reference: DeclaredSchema, candidate: DeclaredSchema): boolean {
  return sameFields(reference.inputs, candidate.inputs) && sameFields(reference.outputs, candidate.outputs);
}

/**
 * Compare a candidate schema against a reference, listing the differing fields
 * as `name:type:required|optional` keys.
 */
export function diffSchemas(reference: DeclaredSchema, candidate: DeclaredSchema): SchemaDiff {
  const refInputs = keySet(reference.inputs);
  const refOutputs = keySet(reference.outputs);
  const candInputs = keySet(candidate.inputs);
  const candOutputs = keySet(candidate.outputs);

  return {
    compatible: isCompatible(reference, candidate),
    missingInputs: difference(refInputs, candInputs),
    missingOutputs: difference(refOutputs, candOutputs),
    unexpectedInputs: difference(candInputs, refInputs),
    unexpectedOutputs: difference(candOutputs, refOutputs),
  };
}

function describeFields(fields: readonly DeclaredField[]): string {
  const parts = fields.map((field) => `${field.name}${field.required ? '' : '?'}: ${field.type}`);
  return `{${parts.join(', ')}}`;
}

/**
 * One-line description, e.g. `{prompt: string} -> {translation_text: string}`
 */
export function describeSchema(schema: DeclaredSchema): string {
  return `${describeFields(schema.inputs)} -> ${describeFields(schema.outputs)}`;
}
