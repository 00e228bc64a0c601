import { dereference } from '../schema/builders.js';
import type { PrimitiveKind, SchemaType } from '../schema/types.js';
import type { JsonPrimitive, JsonValue } from '../types.js';
import { TypeConversionError } from '../validation/errors.js';

const INT_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Converts text content to a scalar of the given kind, or returns `undefined`
 * when the text is not a valid literal of that kind.
 */
export function parsePrimitive(text: string, kind: PrimitiveKind): JsonPrimitive | undefined {
  const trimmed = text.trim();
  switch (kind) {
    case 'string':
    case 'anydata':
      return text;
    case 'int': {
      if (!INT_PATTERN.test(trimmed)) return undefined;
      const n = Number(trimmed);
      return Number.isSafeInteger(n) ? n : undefined;
    }
    case 'float':
      if (trimmed === 'NaN') return Number.NaN;
      if (trimmed === 'Infinity' || trimmed === '+Infinity') return Number.POSITIVE_INFINITY;
      if (trimmed === '-Infinity') return Number.NEGATIVE_INFINITY;
      return DECIMAL_PATTERN.test(trimmed) ? Number(trimmed) : undefined;
    case 'decimal':
      return DECIMAL_PATTERN.test(trimmed) ? Number(trimmed) : undefined;
    case 'boolean': {
      const lower = trimmed.toLowerCase();
      if (lower === 'true') return true;
      if (lower === 'false') return false;
      return undefined;
    }
    case 'nil':
      return trimmed === '' || trimmed === 'null' ? null : undefined;
  }
}

function describe(type: SchemaType): string {
  switch (type.kind) {
    case 'primitive':
      return type.primitive;
    case 'array':
      return `${describe(type.elementType)}[]`;
    case 'record':
      return type.name;
    case 'union':
      return type.members.map(describe).join('|');
    case 'map':
      return `map<${describe(type.valueType)}>`;
    case 'reference':
      return type.name;
  }
}

/**
 * Converts text content to the expected type. Union members are tried in
 * declaration order and the first that accepts the text wins.
 *
 * @throws `TypeConversionError` when no conversion applies.
 */
export function convertText(text: string, type: SchemaType, path: string): JsonPrimitive {
  const resolved = dereference(type);
  if (resolved.kind === 'primitive') {
    const value = parsePrimitive(text, resolved.primitive);
    if (value === undefined) {
      throw new TypeConversionError(path, `'${text}' cannot be converted to ${resolved.primitive}`);
    }
    return value;
  }
  if (resolved.kind === 'array') {
    return convertText(text, resolved.elementType, path);
  }
  if (resolved.kind === 'union') {
    for (const member of resolved.members) {
      const candidate = dereference(member);
      if (candidate.kind !== 'primitive') continue;
      const value = parsePrimitive(text, candidate.primitive);
      if (value !== undefined) return value;
    }
  }
  throw new TypeConversionError(path, `'${text}' cannot be converted to ${describe(resolved)}`);
}

function matchesPrimitive(value: JsonValue, kind: PrimitiveKind): boolean {
  switch (kind) {
    case 'anydata':
      return true;
    case 'string':
      return typeof value === 'string';
    case 'int':
      return typeof value === 'number' && Number.isInteger(value);
    case 'float':
    case 'decimal':
      return typeof value === 'number';
    case 'boolean':
      return typeof value === 'boolean';
    case 'nil':
      return value === null;
  }
}

/**
 * Whether a record-shaped runtime value has the structure `type` describes,
 * looking one level deep (records and maps accept any object).
 */
export function matchesShape(value: JsonValue, type: SchemaType): boolean {
  const resolved = dereference(type);
  switch (resolved.kind) {
    case 'primitive':
      return matchesPrimitive(value, resolved.primitive);
    case 'array':
      return Array.isArray(value);
    case 'record':
    case 'map':
      return value !== null && typeof value === 'object' && !Array.isArray(value);
    case 'union':
      return resolved.members.some((member) => matchesShape(value, member));
  }
}

/**
 * Picks the first union member whose shape matches `value`. Non-union types
 * are returned unchanged.
 *
 * @throws `TypeConversionError` when no member matches.
 */
export function selectMember(type: SchemaType, value: JsonValue, path: string): SchemaType {
  const resolved = dereference(type);
  if (resolved.kind !== 'union') return resolved;
  for (const member of resolved.members) {
    if (matchesShape(value, member)) return selectMember(member, value, path);
  }
  throw new TypeConversionError(
    path,
    `value ${JSON.stringify(value)} matches no member of ${describe(resolved)}`,
  );
}

function findStructured(members: readonly SchemaType[]): SchemaType | undefined {
  for (const member of members) {
    const candidate = dereference(member);
    if (candidate.kind === 'union') {
      const nested = findStructured(candidate.members);
      if (nested) return nested;
      continue;
    }
    if (
      candidate.kind === 'record' ||
      candidate.kind === 'map' ||
      (candidate.kind === 'primitive' && candidate.primitive === 'anydata')
    ) {
      return candidate;
    }
  }
  return undefined;
}

/**
 * Picks the type used for element content (child elements present): the
 * first record, map or anydata member of a union.
 *
 * @throws `TypeConversionError` when no member can hold element content.
 */
export function selectStructuredMember(type: SchemaType, path: string): SchemaType {
  const resolved = dereference(type);
  if (resolved.kind !== 'union') return resolved;
  const member = findStructured(resolved.members);
  if (!member) {
    throw new TypeConversionError(path, `element content matches no member of ${describe(resolved)}`);
  }
  return member;
}

export { describe as describeType };
