/**
 * Scalar kinds a primitive schema node can hold.
 * `anydata` accepts any content and converts it generically.
 *
 * Numeric kinds are carried as JS numbers: `int` accepts only safe integers
 * (|n| ≤ 2^53 - 1) and rejects larger literals, and `decimal` keeps the
 * nearest double, so digits beyond double precision are lost. Declare such
 * values as `string` to keep them exact.
 */
export type PrimitiveKind = 'string' | 'int' | 'float' | 'decimal' | 'boolean' | 'nil' | 'anydata';

/**
 * Namespace declared on a record or a field. A missing `prefix` means the
 * default namespace (`xmlns="..."`).
 */
export interface NamespaceAnnotation {
  uri: string;
  prefix?: string;
}

/**
 * Name/namespace metadata attached to a record type or to one of its fields.
 */
export interface NameNamespaceAnnotation {
  /** Markup name that replaces the raw field or type name. */
  name?: string;
  namespace?: NamespaceAnnotation;
  /** Field is rendered and read as an XML attribute instead of an element. */
  attribute?: boolean;
}

export interface PrimitiveType {
  readonly kind: 'primitive';
  readonly primitive: PrimitiveKind;
}

export interface ArrayType {
  readonly kind: 'array';
  readonly elementType: SchemaType;
  /** Exact number of elements required. Undefined for open arrays. */
  readonly fixedSize?: number;
}

export interface FieldDescriptor {
  /** Raw field name — the key used in the record-shaped value. */
  readonly name: string;
  readonly type: SchemaType;
  readonly required: boolean;
  readonly arrayFixedSize?: number;
  readonly annotations: NameNamespaceAnnotation;
}

export interface RecordType {
  readonly kind: 'record';
  /** Type name, used as the root element name when no name annotation is present. */
  readonly name: string;
  readonly fields: readonly FieldDescriptor[];
  /** Type of members not declared in `fields`. Undefined for closed records. */
  readonly restType?: SchemaType;
  readonly annotations: NameNamespaceAnnotation;
}

export interface UnionType {
  readonly kind: 'union';
  readonly members: readonly SchemaType[];
}

/** Open mapping with no wrapping record (string keys → valueType). */
export interface MapType {
  readonly kind: 'map';
  readonly valueType: SchemaType;
}

/** Named type resolved lazily, so record types can refer to themselves. */
export interface ReferenceType {
  readonly kind: 'reference';
  readonly name: string;
  readonly resolve: () => SchemaType;
}

export type SchemaType = PrimitiveType | ArrayType | RecordType | UnionType | MapType | ReferenceType;
