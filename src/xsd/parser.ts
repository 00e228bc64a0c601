import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { XMLParser } from 'fast-xml-parser';
import { dereference, t } from '../schema/builders.js';
import type { FieldDescriptor, PrimitiveKind, RecordType, SchemaType } from '../schema/types.js';
import { XsdParseError } from '../validation/errors.js';
import type { XsdDefinitions, XsdSchema } from './types.js';

// ---------------------------------------------------------------------------
// Internal raw types (fast-xml-parser output)
// ---------------------------------------------------------------------------

type RawNode = Record<string, unknown>;

// Local names that must always be parsed as arrays, whatever prefix the
// schema binds to the XSD namespace.
const XSD_ARRAY_LOCAL_NAMES = new Set([
  'element',
  'attribute',
  'complexType',
  'simpleType',
  'sequence',
  'all',
  'choice',
  'include',
  'import',
]);

// Built-in XSD simple types and the primitive kind each one reads as.
const XS_PRIMITIVES: Record<string, PrimitiveKind> = {
  string: 'string',
  normalizedString: 'string',
  token: 'string',
  date: 'string',
  time: 'string',
  dateTime: 'string',
  duration: 'string',
  anyURI: 'string',
  base64Binary: 'string',
  hexBinary: 'string',
  ID: 'string',
  IDREF: 'string',
  NMTOKEN: 'string',
  Name: 'string',
  NCName: 'string',
  QName: 'string',
  language: 'string',
  // Integer types beyond the safe integer range are rejected on read.
  integer: 'int',
  int: 'int',
  long: 'int',
  short: 'int',
  byte: 'int',
  positiveInteger: 'int',
  nonNegativeInteger: 'int',
  negativeInteger: 'int',
  nonPositiveInteger: 'int',
  unsignedInt: 'int',
  unsignedLong: 'int',
  unsignedShort: 'int',
  unsignedByte: 'int',
  decimal: 'decimal',
  float: 'float',
  double: 'float',
  boolean: 'boolean',
  anyType: 'anydata',
  anySimpleType: 'string',
};

const CONTENT_FIELD = '#content';

function localOf(name: string): string {
  const colon = name.indexOf(':');
  return colon === -1 ? name : name.slice(colon + 1);
}

// ---------------------------------------------------------------------------
// Prefix normalisation
// ---------------------------------------------------------------------------

/**
 * Renames every key bound to the XSD namespace (`xsd:element`, a bare
 * `element` under a default namespace, …) to its `xs:` form so the rest of
 * the parser can work uniformly.
 */
function normalizeXsPrefix(node: unknown, prefix: string): unknown {
  if (Array.isArray(node)) {
    return node.map((n) => normalizeXsPrefix(n, prefix));
  }
  if (node !== null && typeof node === 'object') {
    const result: RawNode = {};
    for (const [key, value] of Object.entries(node)) {
      let normalizedKey = key;
      if (!key.startsWith('@_') && !key.startsWith('#')) {
        if (prefix === '' && !key.includes(':')) normalizedKey = `xs:${key}`;
        else if (prefix !== '' && key.startsWith(`${prefix}:`)) normalizedKey = `xs:${localOf(key)}`;
      }
      result[normalizedKey] = normalizeXsPrefix(value, prefix);
    }
    return result;
  }
  return node;
}

/**
 * Finds the prefix the document binds to the XSD namespace, from the root
 * `schema` element's key.
 */
function schemaPrefix(parsed: RawNode): string | undefined {
  for (const key of Object.keys(parsed)) {
    if (localOf(key) === 'schema' && !key.startsWith('?')) {
      return key.includes(':') ? key.slice(0, key.indexOf(':')) : '';
    }
  }
  return undefined;
}

/**
 * Normalises the XML encoding declaration to UTF-8.
 *
 * After `readFile(..., 'utf-8')` the content is already a JS string, so a
 * non-UTF-8 declaration no longer describes it and `fast-xml-parser` would
 * reject the document.
 */
function normalizeXmlEncodingDeclaration(content: string): string {
  return content.replace(/(<\?xml\b[^?]*?)\s+encoding=["'][^"']*["']/i, '$1 encoding="UTF-8"');
}

function makeParser(): XMLParser {
  return new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    isArray: (name) => XSD_ARRAY_LOCAL_NAMES.has(localOf(name)),
    allowBooleanAttributes: true,
  });
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function attr(node: RawNode, name: string, fallback = ''): string {
  const value = node[`@_${name}`];
  return value === undefined ? fallback : String(value);
}

function isRawNode(value: unknown): value is RawNode {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * fast-xml-parser returns `""` for empty elements such as `<xs:sequence/>`,
 * so compositor nodes must be coerced before `in` checks.
 */
function asObject(value: unknown): RawNode {
  return isRawNode(value) ? value : {};
}

function children(node: RawNode, key: string): RawNode[] {
  const value = node[key];
  if (!Array.isArray(value)) return value === undefined ? [] : [asObject(value)];
  return value.map(asObject);
}

function first(node: RawNode, key: string): RawNode | undefined {
  return children(node, key)[0];
}

function parseOccurs(value: string): number | 'unbounded' {
  if (value === 'unbounded') return 'unbounded';
  if (value === '') return 1;
  const n = Number.parseInt(value, 10);
  return Number.isNaN(n) ? 1 : n;
}

// ---------------------------------------------------------------------------
// Reading definitions
// ---------------------------------------------------------------------------

function emptyDefinitions(): XsdDefinitions {
  return { elements: new Map(), complexTypes: new Map(), simpleTypes: new Map(), firstElement: '' };
}

function mergeInto(target: XsdDefinitions, source: XsdDefinitions): void {
  for (const [k, v] of source.elements) if (!target.elements.has(k)) target.elements.set(k, v);
  for (const [k, v] of source.complexTypes) if (!target.complexTypes.has(k)) target.complexTypes.set(k, v);
  for (const [k, v] of source.simpleTypes) if (!target.simpleTypes.has(k)) target.simpleTypes.set(k, v);
}

/**
 * Internal recursive implementation. Accepts a `visited` set of already-resolved
 * absolute paths so circular xs:include / xs:import chains do not cause infinite
 * recursion.
 */
async function readDefinitions(
  xsdPath: string,
  baseDir: string | undefined,
  visited: Set<string>,
): Promise<XsdDefinitions> {
  const resolvedPath = baseDir ? resolve(baseDir, xsdPath) : resolve(xsdPath);
  if (visited.has(resolvedPath)) {
    return emptyDefinitions();
  }
  visited.add(resolvedPath);

  let xsdContent: string;
  try {
    xsdContent = normalizeXmlEncodingDeclaration(await readFile(resolvedPath, 'utf-8'));
  } catch (err) {
    throw new XsdParseError(`Cannot read XSD file: ${resolvedPath}`, err);
  }

  let parsed: RawNode;
  try {
    const rawParsed: unknown = makeParser().parse(xsdContent);
    const raw = asObject(rawParsed);
    const prefix = schemaPrefix(raw);
    parsed = prefix === undefined || prefix === 'xs' ? raw : asObject(normalizeXsPrefix(raw, prefix));
  } catch (err) {
    throw new XsdParseError(`Failed to parse XSD XML content from: ${resolvedPath}`, err);
  }

  const schema = parsed['xs:schema'];
  if (schema === undefined) {
    throw new XsdParseError(`Invalid XSD: root element <xs:schema> not found in ${resolvedPath}`);
  }
  const schemaNode = asObject(schema);

  const definitions = emptyDefinitions();
  const targetNamespace = attr(schemaNode, 'targetNamespace');
  if (targetNamespace) definitions.targetNamespace = targetNamespace;

  for (const rawEl of children(schemaNode, 'xs:element')) {
    const name = attr(rawEl, 'name');
    if (!name) continue;
    if (!definitions.firstElement) definitions.firstElement = name;
    definitions.elements.set(name, rawEl);
  }
  for (const rawCt of children(schemaNode, 'xs:complexType')) {
    const name = attr(rawCt, 'name');
    if (name) definitions.complexTypes.set(name, rawCt);
  }
  for (const rawSt of children(schemaNode, 'xs:simpleType')) {
    const name = attr(rawSt, 'name');
    if (!name) continue;
    const restriction = first(rawSt, 'xs:restriction');
    definitions.simpleTypes.set(name, restriction ? attr(restriction, 'base', 'xs:string') : 'xs:string');
  }

  // xs:include and xs:import both contribute definitions; types are looked
  // up by local name, so imported namespaces share one table.
  const schemaBaseDir = dirname(resolvedPath);
  const references = [...children(schemaNode, 'xs:include'), ...children(schemaNode, 'xs:import')];
  for (const reference of references) {
    const schemaLocation = attr(reference, 'schemaLocation');
    if (!schemaLocation) continue;
    mergeInto(definitions, await readDefinitions(schemaLocation, schemaBaseDir, visited));
  }

  return definitions;
}

// ---------------------------------------------------------------------------
// Building schema types
// ---------------------------------------------------------------------------

class SchemaTypeBuilder {
  private readonly records = new Map<string, RecordType>();
  private readonly elements = new Map<string, SchemaType>();

  constructor(private readonly defs: XsdDefinitions) {}

  /** Type of a `type="..."` reference. Unknown names read as strings. */
  typeByName(typeName: string): SchemaType {
    const local = localOf(typeName);
    if (this.defs.complexTypes.has(local)) {
      return t.ref(local, () => this.namedRecord(local));
    }
    return t.primitive(this.primitiveKind(typeName));
  }

  private primitiveKind(typeName: string, seen = new Set<string>()): PrimitiveKind {
    const local = localOf(typeName);
    const base = this.defs.simpleTypes.get(local);
    if (base !== undefined && !seen.has(local)) {
      seen.add(local);
      return this.primitiveKind(base, seen);
    }
    return XS_PRIMITIVES[local] ?? 'string';
  }

  private namedRecord(name: string): RecordType {
    const cached = this.records.get(name);
    if (cached) return cached;
    const raw = this.defs.complexTypes.get(name) ?? {};
    const record = t.record(name, this.fieldsOf(raw, new Set([name])), { restType: this.restOf(raw, new Set()) });
    this.records.set(name, record);
    return record;
  }

  /** Fields of a complex type, base type fields first. */
  private fieldsOf(raw: RawNode, seen: Set<string>): FieldDescriptor[] {
    const fields: FieldDescriptor[] = [];

    const complexContent = first(raw, 'xs:complexContent');
    const extension = complexContent ? first(complexContent, 'xs:extension') : undefined;
    const body = extension ?? raw;
    if (extension) {
      const base = localOf(attr(extension, 'base'));
      const baseRaw = this.defs.complexTypes.get(base);
      if (baseRaw && !seen.has(base)) {
        seen.add(base);
        fields.push(...this.fieldsOf(baseRaw, seen));
      }
    }

    const simpleContent = first(raw, 'xs:simpleContent');
    if (simpleContent) {
      const simpleExtension = first(simpleContent, 'xs:extension') ?? first(simpleContent, 'xs:restriction');
      const base = simpleExtension ? attr(simpleExtension, 'base', 'xs:string') : 'xs:string';
      fields.push(t.field(CONTENT_FIELD, t.primitive(this.primitiveKind(base))));
      if (simpleExtension) fields.push(...children(simpleExtension, 'xs:attribute').map((a) => this.attributeField(a)));
    }

    fields.push(...this.compositorFields(body));
    fields.push(...children(body, 'xs:attribute').map((a) => this.attributeField(a)));
    if (body !== raw) fields.push(...children(raw, 'xs:attribute').map((a) => this.attributeField(a)));
    return fields;
  }

  private compositorFields(node: RawNode): FieldDescriptor[] {
    const fields: FieldDescriptor[] = [];
    for (const kind of ['xs:sequence', 'xs:all', 'xs:choice'] as const) {
      for (const compositor of children(node, kind)) {
        for (const element of children(compositor, 'xs:element')) {
          fields.push(this.elementField(element, kind === 'xs:choice'));
        }
        // Nested compositors (a choice inside a sequence, …).
        fields.push(...this.compositorFields(compositor));
      }
    }
    return fields;
  }

  /** Rest type: anydata when the type (or its base) contains xs:any. */
  private restOf(raw: RawNode, seen: Set<string>): SchemaType | undefined {
    const complexContent = first(raw, 'xs:complexContent');
    const extension = complexContent ? first(complexContent, 'xs:extension') : undefined;
    const body = extension ?? raw;
    if (this.hasWildcard(body)) return t.anydata();
    if (extension) {
      const base = localOf(attr(extension, 'base'));
      const baseRaw = this.defs.complexTypes.get(base);
      if (baseRaw && !seen.has(base)) {
        seen.add(base);
        return this.restOf(baseRaw, seen);
      }
    }
    return undefined;
  }

  private hasWildcard(node: RawNode): boolean {
    for (const kind of ['xs:sequence', 'xs:all', 'xs:choice']) {
      for (const compositor of children(node, kind)) {
        if ('xs:any' in compositor || this.hasWildcard(compositor)) return true;
      }
    }
    return false;
  }

  private elementField(raw: RawNode, inChoice: boolean): FieldDescriptor {
    const ref = attr(raw, 'ref');
    const name = ref ? localOf(ref) : attr(raw, 'name');
    const minOccurs = parseOccurs(attr(raw, 'minOccurs'));
    const maxOccurs = parseOccurs(attr(raw, 'maxOccurs'));
    const min = minOccurs === 'unbounded' ? 1 : minOccurs;

    let type = ref ? this.elementType(name) : this.declaredType(raw, name);
    if (maxOccurs === 'unbounded' || maxOccurs > 1) {
      type = t.array(type, maxOccurs !== 'unbounded' && min === maxOccurs ? maxOccurs : undefined);
    }
    return t.field(name, type, { required: !inChoice && min > 0 });
  }

  private attributeField(raw: RawNode): FieldDescriptor {
    const name = attr(raw, 'name') || localOf(attr(raw, 'ref'));
    const inline = first(raw, 'xs:simpleType');
    const restriction = inline ? first(inline, 'xs:restriction') : undefined;
    const typeName = restriction ? attr(restriction, 'base', 'xs:string') : attr(raw, 'type', 'xs:string');
    return t.attribute(name, t.primitive(this.primitiveKind(typeName)), {
      required: attr(raw, 'use') === 'required',
    });
  }

  /** Type of an `xs:element` declaration: inline complex type, type reference, or string. */
  private declaredType(raw: RawNode, name: string): SchemaType {
    const inline = first(raw, 'xs:complexType');
    if (inline) {
      return t.record(name, this.fieldsOf(inline, new Set()), { restType: this.restOf(inline, new Set()) });
    }
    const inlineSimple = first(raw, 'xs:simpleType');
    const restriction = inlineSimple ? first(inlineSimple, 'xs:restriction') : undefined;
    if (restriction) {
      return t.primitive(this.primitiveKind(attr(restriction, 'base', 'xs:string')));
    }
    const typeName = attr(raw, 'type');
    return typeName ? this.typeByName(typeName) : t.string();
  }

  /** Type of a top-level element, resolved lazily for `ref="..."`. */
  elementType(name: string): SchemaType {
    const raw = this.defs.elements.get(name);
    if (!raw) return t.string();
    return t.ref(name, () => {
      let type = this.elements.get(name);
      if (!type) {
        type = this.declaredType(raw, name);
        this.elements.set(name, type);
      }
      return type;
    });
  }

  /**
   * Root record of a top-level element: its type's fields under the
   * element's name and the schema's target namespace.
   */
  rootType(name: string): SchemaType {
    const raw = this.defs.elements.get(name);
    if (!raw) {
      throw new XsdParseError(`Element "${name}" is not declared at the top level of the schema.`);
    }
    const type = dereference(this.declaredType(raw, name));
    if (type.kind !== 'record') return type;
    const namespace = this.defs.targetNamespace ? { uri: this.defs.targetNamespace } : undefined;
    return t.record(type.name, [...type.fields], {
      restType: type.restType,
      annotations: { name, namespace },
    });
  }
}

/**
 * Reads an XSD file from disk and converts every top-level element into a
 * schema type.
 *
 * @param xsdPath - Absolute or relative path to the .xsd file.
 * @param baseDir - Optional base directory for resolving relative paths.
 */
export async function parseXsd(xsdPath: string, baseDir?: string): Promise<XsdSchema> {
  const definitions = await readDefinitions(xsdPath, baseDir, new Set<string>());
  const builder = new SchemaTypeBuilder(definitions);
  const elements = new Map<string, SchemaType>();
  for (const name of definitions.elements.keys()) {
    elements.set(name, builder.rootType(name));
  }
  return {
    rootElement: definitions.firstElement,
    targetNamespace: definitions.targetNamespace,
    elements,
  };
}
