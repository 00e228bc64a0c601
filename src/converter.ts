import { silentLogger } from './logger.js';
import type { Logger } from './logger.js';
import type { SchemaType } from './schema/types.js';
import { documentToRecord } from './transform/document-to-record.js';
import type { UnknownElementPolicy } from './transform/document-to-record.js';
import { recordToDocument } from './transform/record-to-document.js';
import { isJsonObject } from './types.js';
import type { JsonObject, JsonValue } from './types.js';
import { RootElementMismatchError, XsdParseError } from './validation/errors.js';
import { validateRecord } from './validation/record-validator.js';
import { renderDocument } from './xml/builder.js';
import type { XmlEvent } from './xml/events.js';
import { readXmlEvents } from './xml/reader.js';
import type { XmlInput } from './xml/reader.js';
import { parseXsd } from './xsd/parser.js';
import type { XsdSchema } from './xsd/types.js';

// Re-export for external typing convenience
export type { XsdSchema } from './xsd/types.js';

/**
 * Options shared by every conversion entry point.
 */
export interface ConverterOptions {
  /**
   * Prefix marking attributes in document-shaped mappings and in `anydata`
   * content. e.g. `{ "@id": "123" }` → `<element id="123"/>`
   * @default '@'
   */
  attributePrefix?: string;
  /**
   * Record field holding the text content of an element that also has
   * attributes or children.
   * @default '#content'
   */
  textFieldName?: string;
  /**
   * What to do with a child element that matches no field and no rest type.
   * @default 'ignore'
   */
  unknownElements?: UnknownElementPolicy;
  /**
   * When `true`, validates the record against its type before generating XML.
   * Throws `RecordValidationError` if any constraint is violated.
   * @default false
   */
  strict?: boolean;
  /**
   * Whether to pretty-print the output XML (indentation + newlines).
   * @default false
   */
  prettyPrint?: boolean;
  /**
   * Whether to include an XML declaration (`<?xml version="1.0" encoding="..."?>`).
   * @default true
   */
  xmlDeclaration?: boolean;
  /**
   * Encoding declared in the XML declaration.
   * @default 'UTF-8'
   */
  encoding?: string;
  /**
   * Receives debug and trace output. Silent unless provided.
   */
  logger?: Logger;
}

/**
 * Options for the XSD-driven entry points.
 */
export interface XsdConverterOptions extends ConverterOptions {
  /**
   * Base directory to resolve relative XSD paths.
   * Defaults to `process.cwd()`.
   */
  xsdBaseDir?: string;
  /**
   * Top-level element to bind. Useful when the schema defines several
   * top-level elements and the right one cannot be inferred from the input.
   * @example `{ rootElement: 'purchaseOrder' }`
   */
  rootElement?: string;
}

// ---------------------------------------------------------------------------
// Schema-typed entry points
// ---------------------------------------------------------------------------

/**
 * Converts an event sequence (any pull source of markup events) into a
 * record-shaped value of `type`.
 *
 * @throws `XmlBindingError` subclasses for schema and data failures.
 */
export function fromXmlEvents(
  events: Iterable<XmlEvent>,
  type: SchemaType,
  options: ConverterOptions = {},
): JsonValue {
  const { attributePrefix = '@', textFieldName = '#content', unknownElements = 'ignore', logger = silentLogger } =
    options;
  return documentToRecord(events, type, { attributePrefix, textFieldName, unknownElements, logger });
}

/**
 * Parses an XML document into a record-shaped value of `type`.
 *
 * @throws `XmlParseError`  if the document is not well-formed.
 * @throws `XmlBindingError` subclasses for schema and data failures.
 *
 * @example
 * ```typescript
 * const Person = t.record('person', [t.attribute('id', t.int()), t.field('name', t.string())]);
 * fromXml('<person id="1"><name>Alice</name></person>', Person);
 * // { id: 1, name: 'Alice' }
 * ```
 */
export function fromXml(xml: XmlInput, type: SchemaType, options: ConverterOptions = {}): JsonValue {
  return fromXmlEvents(readXmlEvents(xml), type, options);
}

/**
 * Converts a record-shaped value into a document-shaped mapping (single root
 * key, `@`-prefixed attributes, `xmlns` declarations).
 */
export function toDocument(value: JsonObject, type: SchemaType, options: ConverterOptions = {}): JsonObject {
  const { attributePrefix = '@', textFieldName = '#content', strict = false, logger = silentLogger } = options;
  if (strict) {
    validateRecord(value, type);
  }
  return recordToDocument(value, type, { attributePrefix, textFieldName, logger });
}

/**
 * Renders a record-shaped value of `type` as an XML string.
 *
 * @throws `RecordValidationError`   if `strict: true` and the value violates its type.
 * @throws `RootElementMismatchError` if the value does not render to a single root element.
 * @throws `XmlRenderError`          if a name uses a namespace prefix that is never declared.
 * @throws `XmlBindingError` subclasses for schema and data failures.
 */
export function toXml(value: JsonObject, type: SchemaType, options: ConverterOptions = {}): string {
  const {
    attributePrefix = '@',
    textFieldName = '#content',
    prettyPrint = false,
    xmlDeclaration = true,
    encoding = 'UTF-8',
  } = options;

  const document = toDocument(value, type, options);
  const roots = Object.keys(document);
  if (roots.length !== 1) {
    throw new RootElementMismatchError(
      '$',
      `value renders to ${roots.length} top-level entries; an XML document needs exactly one root element`,
    );
  }
  return renderDocument(document, { prettyPrint, xmlDeclaration, encoding, attributePrefix, textFieldName });
}

// ---------------------------------------------------------------------------
// XSD-driven entry points
// ---------------------------------------------------------------------------

function elementType(schema: XsdSchema, name: string): SchemaType {
  const type = schema.elements.get(name);
  if (!type) {
    throw new XsdParseError(`Element "${name}" is not declared at the top level of the schema.`);
  }
  return type;
}

function* resume(head: IteratorResult<XmlEvent>, rest: Iterator<XmlEvent>): Generator<XmlEvent> {
  if (head.done) return;
  yield head.value;
  let next = rest.next();
  while (!next.done) {
    yield next.value;
    next = rest.next();
  }
}

/**
 * Parses an XML document into a record-shaped value, guided by the provided
 * XSD schema.
 *
 * The root element is bound by priority: the `rootElement` option, then the
 * document's own root when the schema declares it, then the schema's first
 * top-level element.
 *
 * @throws `XsdParseError` if the XSD file cannot be read or parsed.
 * @throws `XmlParseError` if the document is not well-formed.
 * @throws `XmlBindingError` subclasses for schema and data failures.
 *
 * @example
 * ```typescript
 * const order = await convertXmlToJson(xml, './order.xsd', { unknownElements: 'error' });
 * ```
 */
export async function convertXmlToJson(
  xml: XmlInput,
  xsdPath: string,
  options: XsdConverterOptions = {},
): Promise<JsonValue> {
  const { xsdBaseDir, rootElement: rootElementOverride, logger = silentLogger } = options;
  const schema = await parseXsd(xsdPath, xsdBaseDir);

  const events = readXmlEvents(xml)[Symbol.iterator]();
  const head = events.next();
  let rootElement = rootElementOverride ?? schema.rootElement;
  if (!rootElementOverride && !head.done && head.value.type === 'start') {
    const documentRoot = head.value.name.localName;
    if (schema.elements.has(documentRoot)) rootElement = documentRoot;
  }

  logger.debug({ xsdPath, rootElement }, 'Reading XML against XSD');
  return fromXmlEvents(resume(head, events), elementType(schema, rootElement), options);
}

/**
 * Converts a JSON object to an XML string guided by the provided XSD schema.
 *
 * The JSON may be the root record itself or wrapped under its element name
 * (`{ person: { … } }`).
 *
 * @param json     - The JSON data to convert.
 * @param xsdPath  - Path to the `.xsd` schema file (absolute or relative to `xsdBaseDir`).
 * @param options  - Optional configuration.
 * @returns        A string containing the generated XML.
 *
 * @throws `XsdParseError`         if the XSD file cannot be read or parsed.
 * @throws `RecordValidationError` if `strict: true` and the JSON violates schema constraints.
 * @throws `XmlBindingError` subclasses for structural failures during generation.
 *
 * @example
 * ```typescript
 * import { convertJsonToXml } from 'xml-record-mapper';
 *
 * const xml = await convertJsonToXml(
 *   { person: { id: 1, name: 'Alice', age: 30 } },
 *   './person.xsd',
 *   { prettyPrint: true, strict: true }
 * );
 * ```
 */
export async function convertJsonToXml(
  json: JsonObject,
  xsdPath: string,
  options: XsdConverterOptions = {},
): Promise<string> {
  const { xsdBaseDir, rootElement: rootElementOverride, logger = silentLogger } = options;
  const schema = await parseXsd(xsdPath, xsdBaseDir);

  // Priority: explicit option > single-key JSON naming a known element > schema default.
  const keys = Object.keys(json);
  const wrapperKey = keys.length === 1 && schema.elements.has(keys[0]) ? keys[0] : undefined;
  const rootElement = rootElementOverride ?? wrapperKey ?? schema.rootElement;

  const inner = json[rootElement];
  const record = wrapperKey === rootElement && isJsonObject(inner) ? inner : json;

  logger.debug({ xsdPath, rootElement }, 'Writing XML against XSD');
  return toXml(record, elementType(schema, rootElement), options);
}
