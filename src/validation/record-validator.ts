import { dereference } from '../schema/builders.js';
import type { RecordType, SchemaType } from '../schema/types.js';
import { isJsonObject } from '../types.js';
import type { JsonObject, JsonValue } from '../types.js';
import { describeType, matchesShape } from '../transform/values.js';
import { RecordValidationError } from './errors.js';
import type { ValidationIssue } from './errors.js';

/**
 * Validates a record-shaped value against its schema type.
 * Collects all issues and throws a single `RecordValidationError` if any are found.
 *
 * Only called when `strict: true`.
 */
export function validateRecord(value: JsonValue, type: SchemaType): void {
  const issues: ValidationIssue[] = [];
  validateValue(value, type, '$', issues);
  if (issues.length > 0) {
    throw new RecordValidationError(issues);
  }
}

function validateValue(value: JsonValue, type: SchemaType, path: string, issues: ValidationIssue[]): void {
  const resolved = dereference(type);

  switch (resolved.kind) {
    case 'primitive':
      if (!matchesShape(value, resolved)) {
        issues.push({ path, message: `Expected a value of type ${resolved.primitive} but received ${JSON.stringify(value)}.` });
      }
      return;

    case 'array':
      if (!Array.isArray(value)) {
        issues.push({ path, message: `Expected an array of ${describeType(resolved.elementType)}.` });
        return;
      }
      if (resolved.fixedSize !== undefined && value.length !== resolved.fixedSize) {
        issues.push({
          path,
          message: `Array expects ${resolved.fixedSize} element(s) but received ${value.length}.`,
        });
      }
      value.forEach((item, i) => validateValue(item, resolved.elementType, `${path}[${i}]`, issues));
      return;

    case 'union': {
      const member = resolved.members.find((m) => matchesShape(value, m));
      if (!member) {
        issues.push({ path, message: `Value matches no member of ${describeType(resolved)}.` });
        return;
      }
      validateValue(value, member, path, issues);
      return;
    }

    case 'map':
      if (!isJsonObject(value)) {
        issues.push({ path, message: `Expected a mapping but received a scalar/array.` });
        return;
      }
      for (const [key, entry] of Object.entries(value)) {
        validateValue(entry, resolved.valueType, `${path}.${key}`, issues);
      }
      return;

    case 'record':
      if (!isJsonObject(value)) {
        issues.push({
          path,
          message: `Record "${resolved.name}" expects an object but received a scalar/array.`,
        });
        return;
      }
      validateFields(value, resolved, path, issues);
      return;
  }
}

function validateFields(obj: JsonObject, record: RecordType, path: string, issues: ValidationIssue[]): void {
  const declared = new Set<string>();

  for (const field of record.fields) {
    declared.add(field.name);
    const fieldPath = `${path}.${field.name}`;
    const fieldValue = obj[field.name];
    if (fieldValue === undefined) {
      if (field.required) {
        const what = field.annotations.attribute ? 'attribute' : 'field';
        issues.push({ path: fieldPath, message: `Required ${what} "${field.name}" is missing.` });
      }
      continue;
    }
    validateValue(fieldValue, field.type, fieldPath, issues);
  }

  for (const [key, entry] of Object.entries(obj)) {
    if (declared.has(key)) continue;
    if (record.restType) {
      // Repeated rest members are collected into an array under one key.
      const restType = record.restType;
      if (Array.isArray(entry) && dereference(restType).kind !== 'array') {
        entry.forEach((item, i) => validateValue(item, restType, `${path}.${key}[${i}]`, issues));
      } else {
        validateValue(entry, restType, `${path}.${key}`, issues);
      }
      continue;
    }
    issues.push({
      path: `${path}.${key}`,
      message: `Unknown property "${key}" not declared in record "${record.name}".`,
    });
  }
}
