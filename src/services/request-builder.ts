import { VariablesValidationError } from '../utils/errors.js';
import type { GraphQLRequest, ValidatedVariables } from '../types/graphql.js';

const REJECTED_OBJECT_TYPES = new Set([
  'Array',
  'Set',
  'WeakMap',
  'WeakSet',
  'Date',
  'RegExp',
  'Promise',
  'ArrayBuffer',
  'SharedArrayBuffer',
  'String',
  'Number',
  'Boolean',
  'Error',
]);

/**
 * Accepts a string-keyed mapping (plain object, null-prototype object or a
 * `Map` whose keys are all strings) or a structured record (instance of a
 * user class). Everything else is rejected before any request is built.
 */
export function validateVariables(value: unknown): ValidatedVariables {
  if (value === null || typeof value !== 'object') {
    throw new VariablesValidationError(
      `expected variables to be a string-keyed mapping or a record, got ${describeShape(value)}`,
      { shape: describeShape(value) }
    );
  }

  if (value instanceof Map) {
    const values: Record<string, unknown> = {};
    for (const [key, entry] of value) {
      if (typeof key !== 'string') {
        throw new VariablesValidationError(
          `expected map key to be string, got ${describeShape(key)}`,
          { shape: 'map', keyShape: describeShape(key) }
        );
      }
      values[key] = entry;
    }
    return { kind: 'mapping', values };
  }

  const tag = builtinTag(value);
  if (REJECTED_OBJECT_TYPES.has(tag) || ArrayBuffer.isView(value)) {
    throw new VariablesValidationError(
      `expected variables to be a string-keyed mapping or a record, got ${describeShape(value)}`,
      { shape: describeShape(value) }
    );
  }

  const prototype: unknown = Object.getPrototypeOf(value);
  if (prototype === Object.prototype || prototype === null) {
    return { kind: 'mapping', values: { ...value } };
  }

  return { kind: 'record', value };
}

export function buildRequestBody(request: GraphQLRequest): string {
  const variables =
    request.variables.kind === 'mapping' ? request.variables.values : request.variables.value;

  try {
    return JSON.stringify({ query: request.query, variables });
  } catch (error) {
    throw new VariablesValidationError(
      'variables cannot be serialized to JSON',
      { operation: request.operation },
      error
    );
  }
}

export function describeShape(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (typeof value !== 'object') {
    return typeof value;
  }
  if (ArrayBuffer.isView(value)) {
    return 'typed array';
  }
  return builtinTag(value).toLowerCase();
}

function builtinTag(value: object): string {
  return Object.prototype.toString.call(value).slice(8, -1);
}
