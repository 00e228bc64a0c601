import { describe, expect, it } from 'vitest';
import { t } from '../src/schema/builders.js';
import { recordToDocument } from '../src/transform/record-to-document.js';
import { SchemaConflictError, TypeConversionError } from '../src/validation/errors.js';

const Person = t.record('person', [
  t.attribute('id', t.int()),
  t.field('name', t.string()),
  t.field('age', t.int(), { required: false }),
]);

describe('recordToDocument — names and attributes', () => {
  it('wraps the record under its root element and prefixes attributes', () => {
    expect(recordToDocument({ id: 1, name: 'Alice' }, Person)).toEqual({
      person: { '@id': 1, name: 'Alice' },
    });
  });

  it('uses the name annotation of the record for the root', () => {
    const Named = t.record('PersonRecord', [t.field('name', t.string())], { annotations: { name: 'person' } });
    expect(recordToDocument({ name: 'A' }, Named)).toEqual({ person: { name: 'A' } });
  });

  it('renames fields by their annotation', () => {
    const Account = t.record('account', [t.field('mail', t.string(), { name: 'email' })]);
    expect(recordToDocument({ mail: 'a@example.com' }, Account)).toEqual({
      account: { email: 'a@example.com' },
    });
  });

  it('honours a custom attribute prefix', () => {
    expect(recordToDocument({ id: 1, name: 'A' }, Person, { attributePrefix: '$' })).toEqual({
      person: { $id: 1, name: 'A' },
    });
  });

  it('copies keys with no declared field as they are', () => {
    expect(recordToDocument({ id: 1, name: 'A', note: { text: 'x' } }, Person)).toEqual({
      person: { '@id': 1, name: 'A', note: { text: 'x' } },
    });
  });

  it('keeps null values', () => {
    expect(recordToDocument({ id: 1, name: null }, Person)).toEqual({ person: { '@id': 1, name: null } });
  });
});

describe('recordToDocument — namespaces', () => {
  const Book = t.record('Book', [t.field('title', t.string())], {
    annotations: { name: 'book', namespace: { uri: 'urn:books', prefix: 'b' } },
  });

  it('declares the root namespace and prefixes the root tag', () => {
    expect(recordToDocument({ title: 'Dune' }, Book)).toEqual({
      'b:book': { title: 'Dune', '@xmlns:b': 'urn:books' },
    });
  });

  it('declares a default namespace when the annotation has no prefix', () => {
    const Plain = t.record('book', [t.field('title', t.string())], { annotations: { namespace: { uri: 'urn:books' } } });
    expect(recordToDocument({ title: 'Dune' }, Plain)).toEqual({
      book: { title: 'Dune', '@xmlns': 'urn:books' },
    });
  });

  it('wraps a namespaced scalar field with its declaration', () => {
    const Entry = t.record('entry', [t.field('title', t.string(), { namespace: { uri: 'urn:t', prefix: 't' } })]);
    expect(recordToDocument({ title: 'Dune' }, Entry)).toEqual({
      entry: { 't:title': { '#content': 'Dune', '@xmlns:t': 'urn:t' } },
    });
  });

  it('declares a prefixed attribute namespace on the parent only', () => {
    const Text = t.record('text', [
      t.attribute('lang', t.string(), { namespace: { uri: 'urn:l', prefix: 'l' } }),
      t.attribute('dir', t.string(), { namespace: { uri: 'urn:d' } }),
    ]);
    expect(recordToDocument({ lang: 'en', dir: 'ltr' }, Text)).toEqual({
      text: { '@xmlns:l': 'urn:l', '@l:lang': 'en', '@dir': 'ltr' },
    });
  });

  it('lets the field annotation win over the nested record annotation', () => {
    const Address = t.record('Address', [t.field('city', t.string())], {
      annotations: { name: 'addr', namespace: { uri: 'urn:a', prefix: 'a' } },
    });
    const Customer = t.record('customer', [t.field('address', Address, { name: 'home' })]);
    expect(recordToDocument({ address: { city: 'Oslo' } }, Customer)).toEqual({
      customer: { 'a:home': { city: 'Oslo', '@xmlns:a': 'urn:a' } },
    });
  });

  it('produces the same output on repeated calls', () => {
    const first = recordToDocument({ title: 'Dune' }, Book);
    const second = recordToDocument({ title: 'Dune' }, Book);
    expect(second).toEqual(first);
    expect(Book.annotations).toEqual({ name: 'book', namespace: { uri: 'urn:books', prefix: 'b' } });
  });
});

describe('recordToDocument — arrays', () => {
  const Item = t.record('Item', [t.field('sku', t.string())], { annotations: { name: 'item' } });
  const Order = t.record('order', [t.field('items', t.array(Item))]);

  it('names record array items by the item record annotation', () => {
    expect(recordToDocument({ items: [{ sku: 'A' }, { sku: 'B' }] }, Order)).toEqual({
      order: { item: [{ sku: 'A' }, { sku: 'B' }] },
    });
  });

  it('wraps namespaced scalar array items', () => {
    const Tagged = t.record('tagged', [
      t.field('tag', t.array(t.string()), { namespace: { uri: 'urn:t', prefix: 't' } }),
    ]);
    expect(recordToDocument({ tag: ['x', 'y'] }, Tagged)).toEqual({
      tagged: {
        't:tag': [
          { '@xmlns:t': 'urn:t', '#content': 'x' },
          { '@xmlns:t': 'urn:t', '#content': 'y' },
        ],
      },
    });
  });

  it('rejects a non-array value for an array field', () => {
    expect(() => recordToDocument({ items: { sku: 'A' } }, Order)).toThrow(TypeConversionError);
  });

  it('flattens a mapping of record arrays without a root wrapper', () => {
    const Line = t.record('Line', [t.field('sku', t.string())], {
      annotations: { name: 'line', namespace: { uri: 'urn:l' } },
    });
    expect(recordToDocument({ open: [{ sku: 'A' }], closed: [{ sku: 'B' }, { sku: 'C' }] }, t.map(t.array(Line)))).toEqual({
      open: [{ sku: 'A', '@xmlns': 'urn:l' }],
      closed: [
        { sku: 'B', '@xmlns': 'urn:l' },
        { sku: 'C', '@xmlns': 'urn:l' },
      ],
    });
  });
});

describe('recordToDocument — unions and collisions', () => {
  const Coded = t.record('coded', [t.field('code', t.union(t.int(), t.string()))]);

  it('renders the first union member matching the value', () => {
    expect(recordToDocument({ code: 'A1' }, Coded)).toEqual({ coded: { code: 'A1' } });
    expect(recordToDocument({ code: 7 }, Coded)).toEqual({ coded: { code: 7 } });
  });

  it('fails when no union member matches the value', () => {
    expect(() => recordToDocument({ code: true }, Coded)).toThrow(
      'value true matches no member of int|string [$.code]',
    );
  });

  it('turns a scalar colliding with a mapping into its text content', () => {
    const Detail = t.record('Detail', [t.field('kind', t.string())]);
    const Shared = t.record('shared', [
      t.field('detail', Detail, { name: 'x' }),
      t.field('summary', t.string(), { name: 'x' }),
    ]);
    expect(recordToDocument({ detail: { kind: 'k' }, summary: 'text' }, Shared)).toEqual({
      shared: { x: { kind: 'k', '#content': 'text' } },
    });
  });

  it('throws SchemaConflictError when two scalars collide', () => {
    const Clash = t.record('clash', [t.field('a', t.string(), { name: 'x' }), t.field('b', t.string(), { name: 'x' })]);
    expect(() => recordToDocument({ a: '1', b: '2' }, Clash)).toThrow(SchemaConflictError);
  });
});
