import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { QualifiedName } from '../schema/qualified-name.js';
import { XmlParseError } from '../validation/errors.js';
import { XML_NAMESPACE } from './events.js';
import type { XmlAttribute, XmlEvent } from './events.js';

/** Raw XML input: text, encoded bytes, or a sequence of chunks of either. */
export type XmlInput = string | Uint8Array | Iterable<string | Uint8Array>;

type RawNode = Record<string, unknown>;

const ATTRIBUTE_PREFIX = '@_';
const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

function isRawNode(value: unknown): value is RawNode {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Normalises the XML encoding declaration to UTF-8.
 *
 * By the time the parser sees the document it is already a JS string, so a
 * non-UTF-8 `encoding` in the declaration no longer describes the content
 * and `fast-xml-parser` would reject it.
 */
function normalizeXmlEncodingDeclaration(content: string): string {
  return content.replace(/(<\?xml\b[^?]*?)\s+encoding=["'][^"']*["']/i, '$1 encoding="UTF-8"');
}

/**
 * Decodes raw input to a string, dropping a leading byte-order mark.
 */
export function decodeXmlInput(input: XmlInput): string {
  let text: string;
  if (typeof input === 'string') {
    text = input;
  } else if (input instanceof Uint8Array) {
    text = new TextDecoder('utf-8').decode(input);
  } else {
    const decoder = new TextDecoder('utf-8');
    const parts: string[] = [];
    for (const chunk of input) {
      parts.push(typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true }));
    }
    parts.push(decoder.decode());
    text = parts.join('');
  }
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

function makeParser(): XMLParser {
  return new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    textNodeName: TEXT_KEY,
    parseTagValue: false,
    parseAttributeValue: false,
    ignoreDeclaration: true,
    ignorePiTags: true,
    // Whitespace in text content is kept.
    trimValues: false,
    // Also expands numeric character references (`&#65;`, `&#x42;`).
    htmlEntities: true,
  });
}

/**
 * In-scope prefix bindings for one element and its ancestors.
 */
class NamespaceContext {
  constructor(
    private readonly bindings: Map<string, string>,
    private readonly parent?: NamespaceContext,
  ) {}

  static root(): NamespaceContext {
    return new NamespaceContext(new Map([['xml', XML_NAMESPACE], ['', '']]));
  }

  lookup(prefix: string): string | undefined {
    return this.bindings.get(prefix) ?? this.parent?.lookup(prefix);
  }

  child(bindings: Map<string, string>): NamespaceContext {
    return bindings.size === 0 ? this : new NamespaceContext(bindings, this);
  }
}

function splitName(raw: string): [prefix: string, local: string] {
  const colon = raw.indexOf(':');
  return colon === -1 ? ['', raw] : [raw.slice(0, colon), raw.slice(colon + 1)];
}

function resolveElementName(raw: string, ns: NamespaceContext): QualifiedName {
  const [prefix, local] = splitName(raw);
  const uri = ns.lookup(prefix);
  if (uri === undefined) {
    throw new XmlParseError(`Undeclared namespace prefix '${prefix}' on element '${raw}'`);
  }
  return QualifiedName.fromMarkup(uri, local, prefix);
}

function resolveAttributes(
  raw: RawNode | undefined,
  ns: NamespaceContext,
): { attributes: XmlAttribute[]; scope: NamespaceContext } {
  const declarations = new Map<string, string>();
  const pending: Array<[string, string]> = [];

  for (const [key, value] of Object.entries(raw ?? {})) {
    const name = key.startsWith(ATTRIBUTE_PREFIX) ? key.slice(ATTRIBUTE_PREFIX.length) : key;
    const text = String(value);
    if (name === 'xmlns') {
      declarations.set('', text);
    } else if (name.startsWith('xmlns:')) {
      declarations.set(name.slice('xmlns:'.length), text);
    } else {
      pending.push([name, text]);
    }
  }

  const scope = ns.child(declarations);
  const attributes = pending.map(([name, value]): XmlAttribute => {
    const [prefix, local] = splitName(name);
    // The default namespace never applies to attributes.
    const uri = prefix === '' ? '' : scope.lookup(prefix);
    if (uri === undefined) {
      throw new XmlParseError(`Undeclared namespace prefix '${prefix}' on attribute '${name}'`);
    }
    return { name: QualifiedName.fromMarkup(uri, local, prefix), value };
  });
  return { attributes, scope };
}

function* walk(nodes: unknown, ns: NamespaceContext, inElement: boolean): Generator<XmlEvent> {
  if (!Array.isArray(nodes)) return;
  for (const node of nodes) {
    if (!isRawNode(node)) continue;
    for (const key of Object.keys(node)) {
      if (key === ATTRIBUTES_KEY) continue;
      if (key === TEXT_KEY) {
        // Outside the root only whitespace can occur.
        if (inElement) yield { type: 'text', value: String(node[key]) };
        continue;
      }
      const rawAttributes = node[ATTRIBUTES_KEY];
      const { attributes, scope } = resolveAttributes(
        isRawNode(rawAttributes) ? rawAttributes : undefined,
        ns,
      );
      yield { type: 'start', name: resolveElementName(key, scope), attributes };
      yield* walk(node[key], scope, true);
      yield { type: 'end' };
    }
  }
}

/**
 * Tokenizes an XML document into namespace-resolved events, in document
 * order. Comments, processing instructions and the declaration are skipped;
 * CDATA sections are read as text.
 *
 * @throws `XmlParseError` if the document is not well-formed or uses an
 *   undeclared prefix.
 */
export function readXmlEvents(input: XmlInput): Iterable<XmlEvent> {
  const xml = normalizeXmlEncodingDeclaration(decodeXmlInput(input));
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new XmlParseError(validation.err.msg, validation.err.line, validation.err.col);
  }

  let parsed: unknown;
  try {
    parsed = makeParser().parse(xml);
  } catch (err) {
    throw new XmlParseError(`Failed to parse XML content: ${err instanceof Error ? err.message : String(err)}`);
  }
  return walk(parsed, NamespaceContext.root(), false);
}
