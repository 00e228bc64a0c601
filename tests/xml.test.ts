import { describe, expect, it } from 'vitest';
import { RootElementMismatchError, XmlParseError, XmlRenderError } from '../src/validation/errors.js';
import { renderDocument } from '../src/xml/builder.js';
import type { BuildOptions } from '../src/xml/builder.js';
import type { XmlEvent } from '../src/xml/events.js';
import { readXmlEvents } from '../src/xml/reader.js';

type Flat = [string, string?, string?];

/** Flattens events to [type, '{uri}local' | text, 'attr=value;…'] tuples. */
function flatten(events: Iterable<XmlEvent>): Flat[] {
  const out: Flat[] = [];
  for (const event of events) {
    if (event.type === 'start') {
      const attributes = event.attributes
        .map((a) => `{${a.name.namespaceUri}}${a.name.localName}=${a.value}`)
        .join(';');
      out.push(['start', `{${event.name.namespaceUri}}${event.name.localName}`, attributes]);
    } else if (event.type === 'text') {
      out.push(['text', event.value]);
    } else {
      out.push(['end']);
    }
  }
  return out;
}

// ---------------------------------------------------------------------------
// Reader
// ---------------------------------------------------------------------------

describe('readXmlEvents', () => {
  it('emits start, text and end events in document order', () => {
    expect(flatten(readXmlEvents('<a x="1"><b>t</b><c/></a>'))).toEqual([
      ['start', '{}a', '{}x=1'],
      ['start', '{}b', ''],
      ['text', 't'],
      ['end'],
      ['start', '{}c', ''],
      ['end'],
      ['end'],
    ]);
  });

  it('resolves default and prefixed namespaces', () => {
    const xml = '<r xmlns="urn:d" xmlns:p="urn:p"><p:c p:k="v" k="w"/></r>';
    expect(flatten(readXmlEvents(xml))).toEqual([
      ['start', '{urn:d}r', ''],
      ['start', '{urn:p}c', '{urn:p}k=v;{}k=w'],
      ['end'],
      ['end'],
    ]);
  });

  it('keeps the prefix of a resolved name', () => {
    const [first] = readXmlEvents('<p:r xmlns:p="urn:p"/>');
    expect(first.type).toBe('start');
    if (first.type !== 'start') return;
    expect(first.name.prefix).toBe('p');
  });

  it('decodes entities', () => {
    expect(flatten(readXmlEvents('<a>x &amp; y</a>'))).toContainEqual(['text', 'x & y']);
  });

  it('decodes numeric character references', () => {
    expect(flatten(readXmlEvents('<a k="&#67;">&#65;&#x42;</a>'))).toEqual([
      ['start', '{}a', '{}k=C'],
      ['text', 'AB'],
      ['end'],
    ]);
    expect(flatten(readXmlEvents('<a>&amp;#65;</a>'))).toContainEqual(['text', '&#65;']);
  });

  it('keeps whitespace inside elements and drops it outside the root', () => {
    expect(flatten(readXmlEvents('<?xml version="1.0"?>\n<a> x </a>\n'))).toEqual([
      ['start', '{}a', ''],
      ['text', ' x '],
      ['end'],
    ]);
  });

  it('reads UTF-8 bytes and drops the byte-order mark', () => {
    const bytes = new TextEncoder().encode('\uFEFF<a>é</a>');
    expect(flatten(readXmlEvents(bytes))).toContainEqual(['text', 'é']);
  });

  it('reads a sequence of chunks', () => {
    const chunks = ['<a>', new TextEncoder().encode('chunk'), '</a>'];
    expect(flatten(readXmlEvents(chunks))).toContainEqual(['text', 'chunk']);
  });

  it('accepts a non-UTF-8 encoding declaration', () => {
    const xml = '<?xml version="1.0" encoding="ISO-8859-1"?><a>x</a>';
    expect(flatten(readXmlEvents(xml))).toContainEqual(['text', 'x']);
  });

  it('throws XmlParseError for malformed XML', () => {
    expect(() => readXmlEvents('<a><b></a>')).toThrow(XmlParseError);
  });

  it('throws XmlParseError for an undeclared prefix', () => {
    expect(() => [...readXmlEvents('<p:a/>')]).toThrow(XmlParseError);
  });
});

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

const options: BuildOptions = {
  prettyPrint: false,
  xmlDeclaration: false,
  encoding: 'UTF-8',
  attributePrefix: '@',
  textFieldName: '#content',
};

describe('renderDocument', () => {
  it('renders elements, attributes and text', () => {
    const xml = renderDocument({ person: { '@id': 1, name: 'Alice', age: 30 } }, options);
    expect(xml).toBe('<person id="1"><name>Alice</name><age>30</age></person>');
  });

  it('renders arrays as repeated elements', () => {
    const xml = renderDocument({ list: { item: ['a', 'b'] } }, options);
    expect(xml).toBe('<list><item>a</item><item>b</item></list>');
  });

  it('renders the content field as element text', () => {
    const xml = renderDocument({ price: { '@currency': 'EUR', '#content': 9.5 } }, options);
    expect(xml).toBe('<price currency="EUR">9.5</price>');
  });

  it('escapes text and attribute values', () => {
    const xml = renderDocument({ a: { '@q': 'x<y', '#content': 'a & b' } }, options);
    expect(xml).toContain('q="x&lt;y"');
    expect(xml).toContain('a &amp; b');
  });

  it('includes the XML declaration when requested', () => {
    const xml = renderDocument({ a: 'x' }, { ...options, xmlDeclaration: true });
    expect(xml).toContain('<?xml version="1.0" encoding="UTF-8"?>');
    expect(xml).toContain('<a>x</a>');
  });

  it('writes namespace declarations and prefixed names', () => {
    const xml = renderDocument({ 'b:book': { '@xmlns:b': 'urn:books', 'b:title': 'Dune' } }, options);
    expect(xml).toContain('<b:book');
    expect(xml).toContain('xmlns:b="urn:books"');
    expect(xml).toContain('<b:title>Dune</b:title>');
  });

  it('pretty-prints when requested', () => {
    const xml = renderDocument({ list: { item: ['a', 'b'] } }, { ...options, prettyPrint: true });
    expect(xml).toContain('\n  <item>a</item>');
  });

  it('rejects a document with more than one root', () => {
    expect(() => renderDocument({ a: 'x', b: 'y' }, options)).toThrow(RootElementMismatchError);
  });

  it('rejects an undeclared prefix', () => {
    expect(() => renderDocument({ 'p:a': 'x' }, options)).toThrow(XmlRenderError);
    expect(() => renderDocument({ 'p:a': 'x' }, options)).toThrow("Undeclared namespace prefix 'p' on 'p:a'");
    expect(() => renderDocument({ a: { '@p:k': 'v' } }, options)).toThrow(XmlRenderError);
  });
});
