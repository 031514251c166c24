import type { JSONSchema } from '@toolpilot/core';
import { isRecord } from '@toolpilot/core';

/** A single validation error with location and description. */
export interface ValidationError {
  path: string;
  message: string;
  expected?: string;
}

/** Result of validating tool arguments against a JSON Schema. */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

const SCHEMA_TYPES = ['string', 'number', 'integer', 'boolean', 'object', 'array', 'null'] as const;

/** Known JSON Schema type strings. */
type SchemaType = (typeof SCHEMA_TYPES)[number];

function toSchemaType(value: unknown): SchemaType | undefined {
  return SCHEMA_TYPES.find((t) => t === value);
}

/**
 * Lightweight JSON Schema validator for tool arguments.
 * Covers `type` (single or list), `required`, `properties`,
 * `additionalProperties: false`, `enum` and array `items`, recursively.
 */
export function validateToolArgs(
  args: Readonly<Record<string, unknown>>,
  schema: JSONSchema,
): ValidationResult {
  const errors: ValidationError[] = [];
  validateValue(args, schema, '', errors);
  return { valid: errors.length === 0, errors };
}

function join(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}

function validateValue(
  value: unknown,
  schema: JSONSchema,
  path: string,
  errors: ValidationError[],
): void {
  const expected = declaredTypes(schema.type);
  if (expected.length > 0 && !expected.some((t) => matchesType(value, t))) {
    errors.push({
      path: path || '<root>',
      message: `Expected ${expected.join(' | ')}, got ${typeName(value)}`,
      expected: expected.join(' | '),
    });
    return;
  }

  if (Array.isArray(schema.enum) && !schema.enum.some((option: unknown) => option === value)) {
    errors.push({
      path: path || '<root>',
      message: `Must be one of: ${schema.enum.map((option: unknown) => JSON.stringify(option)).join(', ')}`,
    });
  }

  if (isRecord(value)) {
    validateObject(value, schema, path, errors);
  } else if (Array.isArray(value) && isRecord(schema.items)) {
    const itemSchema = schema.items;
    value.forEach((item: unknown, index) => {
      validateValue(item, itemSchema, `${path}[${index}]`, errors);
    });
  }
}

function validateObject(
  value: Record<string, unknown>,
  schema: JSONSchema,
  path: string,
  errors: ValidationError[],
): void {
  // Check required fields
  if (Array.isArray(schema.required)) {
    for (const key of schema.required) {
      if (typeof key !== 'string') continue;
      if (!(key in value) || value[key] === undefined) {
        errors.push({ path: join(path, key), message: `Missing required field: ${key}` });
      }
    }
  }

  const properties = isRecord(schema.properties) ? schema.properties : {};
  for (const [key, fieldValue] of Object.entries(value)) {
    const propSchema = properties[key];
    if (isRecord(propSchema)) {
      if (fieldValue === undefined) continue;
      validateValue(fieldValue, propSchema, join(path, key), errors);
    } else if (schema.additionalProperties === false) {
      errors.push({ path: join(path, key), message: `Unknown field: ${key}` });
    }
  }
}

function declaredTypes(type: unknown): SchemaType[] {
  const raw: unknown[] = Array.isArray(type) ? type : [type];
  return raw.map(toSchemaType).filter((t): t is SchemaType => t !== undefined);
}

/** Check whether a value matches the expected JSON Schema type. */
function matchesType(value: unknown, expected: SchemaType): boolean {
  switch (expected) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'object':
      return isRecord(value);
    case 'array':
      return Array.isArray(value);
    case 'null':
      return value === null;
  }
}

function typeName(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'number' && !Number.isInteger(value)) return 'number';
  return typeof value;
}

/**
 * Format validation errors into a readable string suitable for model self-correction.
 * Includes the schema's properties and required fields as hints.
 */
export function formatValidationErrors(
  toolName: string,
  errors: ValidationError[],
  schema: JSONSchema,
): string {
  const lines: string[] = [`Invalid arguments for ${toolName}:`];

  for (const err of errors) {
    const suffix = err.expected ? ` (expected: ${err.expected})` : '';
    lines.push(`  - ${err.path}: ${err.message}${suffix}`);
  }

  // Append schema hints
  const properties = isRecord(schema.properties) ? schema.properties : undefined;
  const required = Array.isArray(schema.required)
    ? schema.required.filter((r): r is string => typeof r === 'string')
    : [];

  if (properties) {
    lines.push('');
    lines.push('Schema properties:');
    for (const [name, prop] of Object.entries(properties)) {
      const type = isRecord(prop) && typeof prop.type === 'string' ? prop.type : 'unknown';
      const desc = isRecord(prop) && typeof prop.description === 'string' ? prop.description : '';
      const reqMark = required.includes(name) ? ' (required)' : '';
      lines.push(`  - ${name}: ${type}${reqMark}${desc ? `: ${desc}` : ''}`);
    }
  }

  if (required.length > 0) {
    lines.push('');
    lines.push(`Required fields: ${required.join(', ')}`);
  }

  return lines.join('\n');
}
