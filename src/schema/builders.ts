import { InternalError } from '../validation/errors.js';
import type {
  ArrayType,
  FieldDescriptor,
  MapType,
  NameNamespaceAnnotation,
  PrimitiveKind,
  PrimitiveType,
  RecordType,
  ReferenceType,
  SchemaType,
  UnionType,
} from './types.js';

export interface FieldOptions extends NameNamespaceAnnotation {
  /** @default true */
  required?: boolean;
}

export interface RecordOptions {
  annotations?: NameNamespaceAnnotation;
  restType?: SchemaType;
}

const primitiveCache = new Map<PrimitiveKind, PrimitiveType>();

function primitive(kind: PrimitiveKind): PrimitiveType {
  let type = primitiveCache.get(kind);
  if (!type) {
    type = Object.freeze({ kind: 'primitive', primitive: kind });
    primitiveCache.set(kind, type);
  }
  return type;
}

function annotationOf(options: NameNamespaceAnnotation): NameNamespaceAnnotation {
  const annotation: NameNamespaceAnnotation = {};
  if (options.name !== undefined) annotation.name = options.name;
  if (options.namespace !== undefined) annotation.namespace = { ...options.namespace };
  if (options.attribute) annotation.attribute = true;
  return Object.freeze(annotation);
}

function field(name: string, type: SchemaType, options: FieldOptions = {}): FieldDescriptor {
  const { required = true, ...annotations } = options;
  // References stay unresolved here: the target may not be defined yet.
  return Object.freeze({
    name,
    type,
    required,
    arrayFixedSize: type.kind === 'array' ? type.fixedSize : undefined,
    annotations: annotationOf(annotations),
  });
}

/**
 * Schema builders. Every value they return is frozen; record types are
 * compared by identity, so build each record once and reuse it.
 *
 * @example
 * ```typescript
 * const Person = t.record('Person', [
 *   t.attribute('id', t.string()),
 *   t.field('name', t.string()),
 *   t.field('email', t.string(), { required: false }),
 * ]);
 * ```
 */
export const t = {
  string: (): PrimitiveType => primitive('string'),
  int: (): PrimitiveType => primitive('int'),
  float: (): PrimitiveType => primitive('float'),
  decimal: (): PrimitiveType => primitive('decimal'),
  boolean: (): PrimitiveType => primitive('boolean'),
  nil: (): PrimitiveType => primitive('nil'),
  anydata: (): PrimitiveType => primitive('anydata'),
  primitive,

  array(elementType: SchemaType, fixedSize?: number): ArrayType {
    if (fixedSize !== undefined && (!Number.isInteger(fixedSize) || fixedSize < 0)) {
      throw new InternalError(`array size must be a non-negative integer, got ${fixedSize}`);
    }
    return Object.freeze({ kind: 'array', elementType, fixedSize });
  },

  union(...members: SchemaType[]): UnionType {
    return Object.freeze({ kind: 'union', members: Object.freeze([...members]) });
  },

  map(valueType: SchemaType): MapType {
    return Object.freeze({ kind: 'map', valueType });
  },

  ref(name: string, resolve: () => SchemaType): ReferenceType {
    return Object.freeze({ kind: 'reference', name, resolve });
  },

  record(name: string, fields: FieldDescriptor[], options: RecordOptions = {}): RecordType {
    return Object.freeze({
      kind: 'record',
      name,
      fields: Object.freeze([...fields]),
      restType: options.restType,
      annotations: annotationOf(options.annotations ?? {}),
    });
  },

  field,

  attribute(name: string, type: SchemaType, options: FieldOptions = {}): FieldDescriptor {
    return field(name, type, { ...options, attribute: true });
  },
};

/**
 * Follows references until a concrete type is reached.
 * Throws `InternalError` on a reference cycle that never reaches a definition.
 */
export function dereference(type: SchemaType): Exclude<SchemaType, ReferenceType> {
  let current: SchemaType = type;
  const seen = new Set<ReferenceType>();
  while (current.kind === 'reference') {
    if (seen.has(current)) {
      throw new InternalError(`type reference '${current.name}' never resolves to a definition`);
    }
    seen.add(current);
    current = current.resolve();
  }
  return current;
}

/**
 * Returns a new annotation where every property present in `override` wins
 * over `base`. Neither argument is modified.
 */
export function mergeAnnotations(
  base: NameNamespaceAnnotation,
  override: NameNamespaceAnnotation,
): NameNamespaceAnnotation {
  return annotationOf({
    name: override.name ?? base.name,
    namespace: override.namespace ?? base.namespace,
    attribute: override.attribute ?? base.attribute,
  });
}

export function isAttributeField(field: FieldDescriptor): boolean {
  return field.annotations.attribute === true;
}
