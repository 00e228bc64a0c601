import type { NameNamespaceAnnotation } from './types.js';

/**
 * Namespace URI of a name derived from a field that carries no namespace
 * annotation. Distinct from `""`, which means "explicitly no namespace".
 */
export const NS_ANNOTATION_NOT_DEFINED = '$$ns_annot_not_defined$$';

/**
 * Identifies a markup name. Equality uses the namespace URI and local name
 * only; the prefix is kept for rendering.
 */
export class QualifiedName {
  readonly namespaceUri: string;
  readonly localName: string;
  readonly prefix: string;

  private constructor(namespaceUri: string, localName: string, prefix: string) {
    this.namespaceUri = namespaceUri;
    this.localName = localName;
    this.prefix = prefix;
    Object.freeze(this);
  }

  /** A name read from a document, with its resolved namespace URI. */
  static fromMarkup(namespaceUri: string, localName: string, prefix = ''): QualifiedName {
    return new QualifiedName(namespaceUri, localName, prefix);
  }

  /**
   * The effective name of a schema member: the renamed local name when the
   * annotation carries one, and the annotated namespace or the
   * {@link NS_ANNOTATION_NOT_DEFINED} sentinel.
   */
  static fromAnnotation(annotation: NameNamespaceAnnotation, rawName: string): QualifiedName {
    const localName = annotation.name ?? rawName;
    if (!annotation.namespace) {
      return new QualifiedName(NS_ANNOTATION_NOT_DEFINED, localName, '');
    }
    return new QualifiedName(annotation.namespace.uri, localName, annotation.namespace.prefix ?? '');
  }

  /** Hash key: URI and local name, never the prefix. */
  get key(): string {
    return keyOf(this.namespaceUri, this.localName);
  }

  get hasNamespaceAnnotation(): boolean {
    return this.namespaceUri !== NS_ANNOTATION_NOT_DEFINED;
  }

  equals(other: QualifiedName): boolean {
    return this.namespaceUri === other.namespaceUri && this.localName === other.localName;
  }

  toString(): string {
    const local = this.prefix ? `${this.prefix}:${this.localName}` : this.localName;
    return this.namespaceUri && this.hasNamespaceAnnotation ? `{${this.namespaceUri}}${local}` : local;
  }
}

function keyOf(namespaceUri: string, localName: string): string {
  return `${namespaceUri}\u0000${localName}`;
}

/**
 * Map keyed by {@link QualifiedName} equality. Insertion order is kept.
 */
export class QualifiedNameMap<V> {
  private readonly entries = new Map<string, [QualifiedName, V]>();

  get size(): number {
    return this.entries.size;
  }

  has(name: QualifiedName): boolean {
    return this.entries.has(name.key);
  }

  get(name: QualifiedName): V | undefined {
    return this.entries.get(name.key)?.[1];
  }

  set(name: QualifiedName, value: V): this {
    this.entries.set(name.key, [name, value]);
    return this;
  }

  /**
   * Looks up a name read from a document: the exact name first, then a
   * member declared without a namespace annotation under the same local name.
   */
  resolve(name: QualifiedName): V | undefined {
    const exact = this.entries.get(name.key);
    if (exact) return exact[1];
    return this.entries.get(keyOf(NS_ANNOTATION_NOT_DEFINED, name.localName))?.[1];
  }

  *[Symbol.iterator](): IterableIterator<[QualifiedName, V]> {
    for (const entry of this.entries.values()) {
      yield entry;
    }
  }

  values(): V[] {
    return [...this.entries.values()].map(([, value]) => value);
  }
}
