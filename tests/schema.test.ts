import { describe, expect, it } from 'vitest';
import { dereference, mergeAnnotations, t } from '../src/schema/builders.js';
import { buildScope } from '../src/schema/index-builder.js';
import { QualifiedName } from '../src/schema/qualified-name.js';
import { ScopeStack } from '../src/schema/scope.js';
import type { SchemaType } from '../src/schema/types.js';
import { InternalError, SchemaConflictError } from '../src/validation/errors.js';

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

describe('schema builders', () => {
  it('returns frozen, shared primitive types', () => {
    expect(t.int()).toBe(t.primitive('int'));
    expect(Object.isFrozen(t.string())).toBe(true);
  });

  it('records the fixed size of an array field', () => {
    const field = t.field('items', t.array(t.int(), 3));
    expect(field.arrayFixedSize).toBe(3);
    expect(field.required).toBe(true);
  });

  it('marks attribute fields', () => {
    const field = t.attribute('id', t.string(), { required: false });
    expect(field.annotations).toEqual({ attribute: true });
    expect(field.required).toBe(false);
  });

  it('rejects a negative array size', () => {
    expect(() => t.array(t.int(), -1)).toThrow(InternalError);
  });

  it('follows references, including recursive ones', () => {
    const TreeNode: SchemaType = t.record('TreeNode', [
      t.field('child', t.ref('TreeNode', () => TreeNode), { required: false }),
    ]);
    const ref = t.ref('TreeNode', () => TreeNode);
    expect(dereference(ref)).toBe(TreeNode);
  });

  it('detects a reference cycle with no definition', () => {
    const a: SchemaType = t.ref('A', () => b);
    const b: SchemaType = t.ref('B', () => a);
    expect(() => dereference(a)).toThrow(InternalError);
  });

  it('merges annotations without modifying either side', () => {
    const base = { name: 'Book', namespace: { uri: 'urn:books', prefix: 'b' } };
    const override = { name: 'volume' };
    const merged = mergeAnnotations(base, override);

    expect(merged).toEqual({ name: 'volume', namespace: { uri: 'urn:books', prefix: 'b' } });
    expect(base.name).toBe('Book');
    expect(override).toEqual({ name: 'volume' });
  });
});

// ---------------------------------------------------------------------------
// Index builder
// ---------------------------------------------------------------------------

describe('buildScope', () => {
  it('splits fields into element and attribute indexes', () => {
    const Person = t.record('Person', [
      t.attribute('id', t.int()),
      t.field('name', t.string()),
      t.field('mail', t.string(), { name: 'email' }),
    ]);
    const scope = buildScope(Person, undefined);

    expect(scope.attributeIndex.resolve(QualifiedName.fromMarkup('', 'id'))?.name).toBe('id');
    expect(scope.elementIndex.resolve(QualifiedName.fromMarkup('', 'email'))?.name).toBe('mail');
    expect(scope.elementIndex.resolve(QualifiedName.fromMarkup('', 'mail'))).toBeUndefined();
    expect(scope.elementIndex.size).toBe(2);
  });

  it('keeps the rest type of open records', () => {
    const Open = t.record('Open', [], { restType: t.string() });
    expect(buildScope(Open, undefined).restType).toBe(t.string());
  });

  it('throws SchemaConflictError when two elements share a name', () => {
    const Bad = t.record('Bad', [t.field('a', t.string()), t.field('b', t.string(), { name: 'a' })]);
    expect(() => buildScope(Bad, undefined)).toThrow(SchemaConflictError);
  });

  it('throws SchemaConflictError when two attributes share a name', () => {
    const Bad = t.record('BadAttributes', [
      t.attribute('lang', t.string()),
      t.attribute('language', t.string(), { name: 'lang' }),
    ]);
    expect(() => buildScope(Bad, undefined)).toThrow(/Duplicate field 'lang' in record 'BadAttributes'/);
  });

  it('allows the same local name in different namespaces', () => {
    const Multi = t.record('Multi', [
      t.field('a', t.string(), { name: 'title', namespace: { uri: 'urn:one' } }),
      t.field('b', t.string(), { name: 'title', namespace: { uri: 'urn:two' } }),
    ]);
    const scope = buildScope(Multi, undefined);
    expect(scope.elementIndex.resolve(QualifiedName.fromMarkup('urn:two', 'title'))?.name).toBe('b');
  });

  it('leaves out elements shadowed by an enclosing attribute', () => {
    const Outer = t.record('Outer', [t.attribute('id', t.string())]);
    const Inner = t.record('Inner', [t.field('id', t.string()), t.field('label', t.string())]);
    const outer = buildScope(Outer, undefined);
    const inner = buildScope(Inner, outer.attributeIndex);

    expect(inner.elementIndex.resolve(QualifiedName.fromMarkup('', 'id'))).toBeUndefined();
    expect(inner.elementIndex.resolve(QualifiedName.fromMarkup('', 'label'))?.name).toBe('label');

    // Shadowing is not cached with the record.
    expect(buildScope(Inner, undefined).elementIndex.size).toBe(2);
  });
});

// ---------------------------------------------------------------------------
// Scope stack
// ---------------------------------------------------------------------------

describe('ScopeStack', () => {
  it('pushes and pops scopes in order', () => {
    const Outer = t.record('Outer', [t.attribute('id', t.string())]);
    const Inner = t.record('Inner', [t.field('id', t.string())]);
    const stack = new ScopeStack();

    stack.push(Outer);
    const inner = stack.push(Inner);
    expect(stack.depth).toBe(2);
    expect(inner.elementIndex.size).toBe(0);
    expect(stack.current().record).toBe(Inner);

    expect(stack.pop().record).toBe(Inner);
    expect(stack.current().record).toBe(Outer);
  });

  it('throws InternalError when empty', () => {
    const stack = new ScopeStack();
    expect(() => stack.pop()).toThrow(InternalError);
    expect(() => stack.current()).toThrow(InternalError);
  });
});
