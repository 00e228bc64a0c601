import { describe, expect, it } from 'vitest';
import { NS_ANNOTATION_NOT_DEFINED, QualifiedName, QualifiedNameMap } from '../src/schema/qualified-name.js';

describe('QualifiedName', () => {
  it('ignores the prefix when comparing names', () => {
    const a = QualifiedName.fromMarkup('urn:books', 'title', 'b');
    const b = QualifiedName.fromMarkup('urn:books', 'title', 'x');
    expect(a.equals(b)).toBe(true);
    expect(a.key).toBe(b.key);
  });

  it('distinguishes names by namespace URI', () => {
    const a = QualifiedName.fromMarkup('urn:books', 'title');
    const b = QualifiedName.fromMarkup('urn:films', 'title');
    expect(a.equals(b)).toBe(false);
  });

  it('keeps the sentinel distinct from the empty namespace', () => {
    const unannotated = QualifiedName.fromAnnotation({}, 'title');
    const noNamespace = QualifiedName.fromAnnotation({ namespace: { uri: '' } }, 'title');
    expect(unannotated.namespaceUri).toBe(NS_ANNOTATION_NOT_DEFINED);
    expect(unannotated.hasNamespaceAnnotation).toBe(false);
    expect(noNamespace.namespaceUri).toBe('');
    expect(noNamespace.hasNamespaceAnnotation).toBe(true);
    expect(unannotated.equals(noNamespace)).toBe(false);
  });

  it('applies the name annotation before construction', () => {
    const name = QualifiedName.fromAnnotation({ name: 'Title', namespace: { uri: 'urn:books', prefix: 'b' } }, 'title');
    expect(name.localName).toBe('Title');
    expect(name.prefix).toBe('b');
    expect(name.toString()).toBe('{urn:books}b:Title');
  });

  it('is immutable', () => {
    const name = QualifiedName.fromMarkup('', 'a');
    expect(Object.isFrozen(name)).toBe(true);
  });
});

describe('QualifiedNameMap', () => {
  it('resolves an exact name before the unannotated fallback', () => {
    const map = new QualifiedNameMap<string>();
    map.set(QualifiedName.fromAnnotation({}, 'title'), 'any');
    map.set(QualifiedName.fromAnnotation({ namespace: { uri: 'urn:books' } }, 'title'), 'books');

    expect(map.resolve(QualifiedName.fromMarkup('urn:books', 'title'))).toBe('books');
    expect(map.resolve(QualifiedName.fromMarkup('urn:films', 'title'))).toBe('any');
    expect(map.resolve(QualifiedName.fromMarkup('', 'title'))).toBe('any');
  });

  it('does not fall back when every entry is annotated', () => {
    const map = new QualifiedNameMap<string>();
    map.set(QualifiedName.fromAnnotation({ namespace: { uri: '' } }, 'title'), 'plain');

    expect(map.resolve(QualifiedName.fromMarkup('', 'title'))).toBe('plain');
    expect(map.resolve(QualifiedName.fromMarkup('urn:books', 'title'))).toBeUndefined();
  });

  it('keeps insertion order', () => {
    const map = new QualifiedNameMap<number>();
    map.set(QualifiedName.fromMarkup('', 'b'), 2);
    map.set(QualifiedName.fromMarkup('', 'a'), 1);
    expect(map.values()).toEqual([2, 1]);
    expect([...map].map(([name]) => name.localName)).toEqual(['b', 'a']);
    expect(map.size).toBe(2);
  });
});
