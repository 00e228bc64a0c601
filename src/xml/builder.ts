import { create } from 'xmlbuilder2';
import type { XMLBuilder } from 'xmlbuilder2/lib/interfaces.js';
import { isJsonObject } from '../types.js';
import type { JsonObject, JsonValue } from '../types.js';
import { RootElementMismatchError, XmlRenderError } from '../validation/errors.js';
import { XML_NAMESPACE, XMLNS_NAMESPACE } from './events.js';

export interface BuildOptions {
  prettyPrint: boolean;
  xmlDeclaration: boolean;
  encoding: string;
  attributePrefix: string;
  textFieldName: string;
}

type Bindings = ReadonlyMap<string, string>;

function splitName(raw: string): [prefix: string, local: string] {
  const colon = raw.indexOf(':');
  return colon === -1 ? ['', raw] : [raw.slice(0, colon), raw.slice(colon + 1)];
}

function scalarText(value: JsonValue): string {
  return value === null ? '' : String(value);
}

/**
 * Reads the namespace declarations of one element's mapping into a new
 * binding set layered over the parent's.
 */
function declaredBindings(value: JsonValue, parent: Bindings, options: BuildOptions): Bindings {
  if (!isJsonObject(value)) return parent;
  const xmlns = `${options.attributePrefix}xmlns`;
  let bindings: Map<string, string> | undefined;
  for (const [key, uri] of Object.entries(value)) {
    let prefix: string;
    if (key === xmlns) prefix = '';
    else if (key.startsWith(`${xmlns}:`)) prefix = key.slice(xmlns.length + 1);
    else continue;
    bindings ??= new Map(parent);
    bindings.set(prefix, scalarText(uri));
  }
  return bindings ?? parent;
}

function namespaceOf(prefix: string, bindings: Bindings, name: string): string | null {
  const uri = bindings.get(prefix);
  if (uri === undefined) {
    if (prefix === '') return null;
    throw new XmlRenderError(`Undeclared namespace prefix '${prefix}' on '${name}'`);
  }
  return uri === '' ? null : uri;
}

function appendElement(
  parent: XMLBuilder,
  name: string,
  value: JsonValue,
  bindings: Bindings,
  options: BuildOptions,
): void {
  if (Array.isArray(value)) {
    for (const item of value) {
      appendElement(parent, name, item, bindings, options);
    }
    return;
  }
  const scope = declaredBindings(value, bindings, options);
  const [prefix] = splitName(name);
  const node = parent.ele(namespaceOf(prefix, scope, name), name);
  writeContent(node, value, scope, options);
}

/**
 * Writes the attributes, text and children of one element.
 */
function writeContent(node: XMLBuilder, value: JsonValue, bindings: Bindings, options: BuildOptions): void {
  const { attributePrefix, textFieldName } = options;
  if (!isJsonObject(value)) {
    if (Array.isArray(value)) {
      // Nested arrays have no element name of their own.
      node.txt(JSON.stringify(value));
      return;
    }
    if (value !== null) node.txt(scalarText(value));
    return;
  }

  for (const [key, val] of Object.entries(value)) {
    if (key === textFieldName) {
      if (val !== null) node.txt(scalarText(val));
      continue;
    }
    if (key.startsWith(attributePrefix)) {
      const attrName = key.slice(attributePrefix.length);
      const [prefix] = splitName(attrName);
      if (attrName === 'xmlns' || prefix === 'xmlns') {
        node.att(XMLNS_NAMESPACE, attrName, scalarText(val));
      } else if (prefix === 'xml') {
        node.att(XML_NAMESPACE, attrName, scalarText(val));
      } else {
        // The default namespace never applies to attributes.
        node.att(prefix ? namespaceOf(prefix, bindings, attrName) : null, attrName, scalarText(val));
      }
      continue;
    }
    appendElement(node, key, val, bindings, options);
  }
}

/**
 * Renders a document-shaped mapping to XML text. The mapping must have
 * exactly one key, the root element.
 */
export function renderDocument(document: JsonObject, options: BuildOptions): string {
  const keys = Object.keys(document);
  if (keys.length !== 1) {
    throw new RootElementMismatchError('$', `A document needs exactly one root element, found ${keys.length}`);
  }
  const [rootName] = keys;

  const xmlDeclarationOptions = options.xmlDeclaration
    ? { version: '1.0', encoding: options.encoding }
    : undefined;

  // create() always produces at least a minimal <?xml version="1.0"?> node.
  // Pass headless:true to end() when the caller doesn't want the declaration.
  const doc = create(xmlDeclarationOptions ?? {});
  appendElement(doc, rootName, document[rootName], new Map([['', '']]), options);

  return doc.end({ prettyPrint: options.prettyPrint, headless: !options.xmlDeclaration });
}
