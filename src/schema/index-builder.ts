import { SchemaConflictError } from '../validation/errors.js';
import { isAttributeField } from './builders.js';
import { QualifiedName, QualifiedNameMap } from './qualified-name.js';
import type { FieldDescriptor, RecordType, SchemaType } from './types.js';

/**
 * Name → field indexes for one record boundary.
 */
export interface Scope {
  readonly record: RecordType;
  readonly elementIndex: QualifiedNameMap<FieldDescriptor>;
  readonly attributeIndex: QualifiedNameMap<FieldDescriptor>;
  readonly restType?: SchemaType;
}

interface Classification {
  elements: ReadonlyArray<readonly [QualifiedName, FieldDescriptor]>;
  attributes: QualifiedNameMap<FieldDescriptor>;
}

// Classification depends on the record alone, so it is computed once per
// record type and never mutated afterwards. Shadowing depends on the
// enclosing scope and is applied per build.
const classificationCache = new WeakMap<RecordType, Classification>();

function insertUnique(
  index: QualifiedNameMap<FieldDescriptor>,
  name: QualifiedName,
  field: FieldDescriptor,
  record: RecordType,
  path: string,
): void {
  if (index.has(name)) {
    throw new SchemaConflictError(path, record.name, name.localName);
  }
  index.set(name, field);
}

function classify(record: RecordType, path: string): Classification {
  const cached = classificationCache.get(record);
  if (cached) return cached;

  const elements = new QualifiedNameMap<FieldDescriptor>();
  const attributes = new QualifiedNameMap<FieldDescriptor>();
  for (const field of record.fields) {
    const name = QualifiedName.fromAnnotation(field.annotations, field.name);
    insertUnique(isAttributeField(field) ? attributes : elements, name, field, record, path);
  }

  const classification: Classification = { elements: [...elements], attributes };
  classificationCache.set(record, classification);
  return classification;
}

/**
 * Builds the element and attribute indexes of `record`.
 *
 * Element fields whose effective name is an attribute of the enclosing scope
 * are left out of the element index.
 *
 * @throws `SchemaConflictError` when two fields resolve to the same qualified name.
 */
export function buildScope(
  record: RecordType,
  enclosingAttributes: QualifiedNameMap<FieldDescriptor> | undefined,
  path = '$',
): Scope {
  const { elements, attributes } = classify(record, path);
  const elementIndex = new QualifiedNameMap<FieldDescriptor>();
  for (const [name, field] of elements) {
    if (enclosingAttributes?.has(name)) continue;
    elementIndex.set(name, field);
  }
  return { record, elementIndex, attributeIndex: attributes, restType: record.restType };
}
