import { silentLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { dereference, mergeAnnotations } from '../schema/builders.js';
import type {
  ArrayType,
  FieldDescriptor,
  NameNamespaceAnnotation,
  NamespaceAnnotation,
  RecordType,
  SchemaType,
} from '../schema/types.js';
import { isJsonObject } from '../types.js';
import type { JsonObject, JsonValue } from '../types.js';
import { SchemaConflictError, TypeConversionError } from '../validation/errors.js';
import { selectMember } from './values.js';

export interface RecordToDocumentOptions {
  /**
   * Key prefix marking attributes in the document-shaped output.
   * @default '@'
   */
  attributePrefix?: string;
  /**
   * Key holding text content when an element also carries attributes.
   * @default '#content'
   */
  textFieldName?: string;
  logger?: Logger;
}

interface RenderContext {
  attributePrefix: string;
  textFieldName: string;
}

function qualify(local: string, namespace: NamespaceAnnotation | undefined): string {
  return namespace?.prefix ? `${namespace.prefix}:${local}` : local;
}

function xmlnsKey(ctx: RenderContext, namespace: NamespaceAnnotation): string {
  return namespace.prefix
    ? `${ctx.attributePrefix}xmlns:${namespace.prefix}`
    : `${ctx.attributePrefix}xmlns`;
}

function declareNamespace(
  ctx: RenderContext,
  target: JsonObject,
  namespace: NamespaceAnnotation | undefined,
): void {
  if (namespace) {
    target[xmlnsKey(ctx, namespace)] = namespace.uri;
  }
}

/** Name and namespace only: the attribute flag never flows into a child type. */
function nameAndNamespace(annotation: NameNamespaceAnnotation): NameNamespaceAnnotation {
  return { name: annotation.name, namespace: annotation.namespace };
}

/**
 * Stores `value` under `key`. When the key is already taken by a mapping
 * and `value` is a scalar, the value becomes that mapping's text content.
 */
function put(
  ctx: RenderContext,
  target: JsonObject,
  key: string,
  value: JsonValue,
  record: RecordType,
  path: string,
): void {
  if (!Object.prototype.hasOwnProperty.call(target, key)) {
    target[key] = value;
    return;
  }
  const existing = target[key];
  if (
    (value === null || typeof value !== 'object') &&
    isJsonObject(existing) &&
    !Object.prototype.hasOwnProperty.call(existing, ctx.textFieldName)
  ) {
    existing[ctx.textFieldName] = value;
    return;
  }
  throw new SchemaConflictError(path, record.name, key);
}

function renderPrimitiveField(
  ctx: RenderContext,
  out: JsonObject,
  field: FieldDescriptor,
  value: JsonValue,
  record: RecordType,
  path: string,
): void {
  const { name, namespace, attribute } = field.annotations;
  const key = qualify(name ?? field.name, namespace);

  if (attribute) {
    // Unprefixed attributes are never in a namespace, so only prefixed
    // namespaces are declared for them.
    if (namespace?.prefix) declareNamespace(ctx, out, namespace);
    put(ctx, out, `${ctx.attributePrefix}${key}`, value, record, path);
    return;
  }

  if (namespace) {
    const element: JsonObject = { [ctx.textFieldName]: value };
    declareNamespace(ctx, element, namespace);
    put(ctx, out, key, element, record, path);
    return;
  }
  put(ctx, out, key, value, record, path);
}

function renderRecordField(
  ctx: RenderContext,
  out: JsonObject,
  field: FieldDescriptor,
  child: RecordType,
  value: JsonObject,
  record: RecordType,
  path: string,
): void {
  const annotation = mergeAnnotations(child.annotations, nameAndNamespace(field.annotations));
  const content = renderFields(ctx, value, child, path);
  declareNamespace(ctx, content, annotation.namespace);
  put(ctx, out, qualify(annotation.name ?? field.name, annotation.namespace), content, record, path);
}

function renderArrayField(
  ctx: RenderContext,
  out: JsonObject,
  field: FieldDescriptor,
  type: ArrayType,
  value: JsonValue,
  record: RecordType,
  path: string,
): void {
  if (!Array.isArray(value)) {
    throw new TypeConversionError(path, `field '${field.name}' expects an array`);
  }
  const elementType = dereference(type.elementType);

  if (elementType.kind === 'record') {
    // Items are standalone records: their own annotation names the tag.
    const tagAnnotation = mergeAnnotations(nameAndNamespace(field.annotations), elementType.annotations);
    const items = value.map((item, i) =>
      renderArrayItem(ctx, item, elementType, tagAnnotation.namespace, `${path}[${i}]`),
    );
    put(
      ctx,
      out,
      qualify(tagAnnotation.name ?? field.name, tagAnnotation.namespace),
      items,
      record,
      path,
    );
    return;
  }

  const { name, namespace } = field.annotations;
  const items: JsonValue[] = namespace
    ? value.map((item) => {
        const element: JsonObject = {};
        declareNamespace(ctx, element, namespace);
        element[ctx.textFieldName] = item;
        return element;
      })
    : [...value];
  put(ctx, out, qualify(name ?? field.name, namespace), items, record, path);
}

function renderArrayItem(
  ctx: RenderContext,
  item: JsonValue,
  type: RecordType,
  namespace: NamespaceAnnotation | undefined,
  path: string,
): JsonValue {
  if (!isJsonObject(item)) {
    throw new TypeConversionError(path, `expected a record of type '${type.name}'`);
  }
  const content = renderFields(ctx, item, type, path);
  declareNamespace(ctx, content, namespace);
  return content;
}

/**
 * Renders the members of one record value. Keys with no declared field are
 * copied as they are.
 */
function renderFields(ctx: RenderContext, input: JsonObject, record: RecordType, path: string): JsonObject {
  const out: JsonObject = {};
  const fields = new Map(record.fields.map((f) => [f.name, f]));

  for (const [key, value] of Object.entries(input)) {
    const fieldPath = `${path}.${key}`;
    const field = fields.get(key);
    if (!field) {
      out[key] = value;
      continue;
    }

    const type = value === null ? dereference(field.type) : selectMember(field.type, value, fieldPath);
    switch (type.kind) {
      case 'record':
        if (isJsonObject(value)) {
          renderRecordField(ctx, out, field, type, value, record, fieldPath);
        } else if (value === null) {
          renderPrimitiveField(ctx, out, field, value, record, fieldPath);
        } else {
          throw new TypeConversionError(fieldPath, `expected a record of type '${type.name}'`);
        }
        break;
      case 'array':
        if (value === null) {
          renderPrimitiveField(ctx, out, field, value, record, fieldPath);
        } else {
          renderArrayField(ctx, out, field, type, value, record, fieldPath);
        }
        break;
      default:
        renderPrimitiveField(ctx, out, field, value, record, fieldPath);
    }
  }
  return out;
}

function rootName(record: RecordType): string {
  return qualify(record.annotations.name ?? record.name, record.annotations.namespace);
}

/**
 * Renders a record and wraps it under its root element name.
 */
function renderRoot(ctx: RenderContext, input: JsonObject, record: RecordType, path: string): JsonObject {
  const content = renderFields(ctx, input, record, path);
  declareNamespace(ctx, content, record.annotations.namespace);
  return { [rootName(record)]: content };
}

/**
 * Converts a record-shaped value into a document-shaped mapping: renamed
 * tags, `@`-prefixed attributes, injected `xmlns` declarations, and a single
 * root key.
 *
 * A `map` type whose values are arrays of records yields a flat mapping
 * instead: each element is rendered without its root wrapper and kept under
 * the original key.
 *
 * @example
 * ```typescript
 * recordToDocument({ id: '1', name: 'Alice' }, Person);
 * // { Person: { '@id': '1', name: 'Alice' } }
 * ```
 */
export function recordToDocument(
  value: JsonObject,
  type: SchemaType,
  options: RecordToDocumentOptions = {},
): JsonObject {
  const { attributePrefix = '@', textFieldName = '#content', logger = silentLogger } = options;
  const ctx: RenderContext = { attributePrefix, textFieldName };
  const resolved = selectMember(type, value, '$');

  if (resolved.kind === 'record') {
    return renderRoot(ctx, value, resolved, '$');
  }

  if (resolved.kind === 'map') {
    const valueType = dereference(resolved.valueType);
    const elementType = valueType.kind === 'array' ? dereference(valueType.elementType) : undefined;
    if (elementType?.kind === 'record') {
      const out: JsonObject = {};
      for (const [key, entry] of Object.entries(value)) {
        if (!Array.isArray(entry)) {
          throw new TypeConversionError(`$.${key}`, `expected an array of '${elementType.name}' records`);
        }
        out[key] = entry.map((item, i) =>
          renderArrayItem(ctx, item, elementType, elementType.annotations.namespace, `$.${key}[${i}]`),
        );
      }
      return out;
    }
  }

  logger.debug({ kind: resolved.kind }, 'No record type to render; returning the value unchanged');
  return { ...value };
}
