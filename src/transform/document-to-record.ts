import { silentLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { dereference, t } from '../schema/builders.js';
import type { QualifiedName } from '../schema/qualified-name.js';
import { ScopeStack } from '../schema/scope.js';
import type { MapType, RecordType, SchemaType } from '../schema/types.js';
import type { JsonObject, JsonValue } from '../types.js';
import {
  ArraySizeMismatchError,
  InternalError,
  MissingRequiredAttributeError,
  MissingRequiredFieldError,
  RootElementMismatchError,
  TypeConversionError,
  UnknownMemberError,
} from '../validation/errors.js';
import type { XmlAttribute, XmlEvent } from '../xml/events.js';
import { convertText, describeType, selectStructuredMember } from './values.js';

/**
 * What to do with a child element that matches no field and no rest type.
 * - `ignore`: drop the element and its subtree.
 * - `error`: fail with `UnknownMemberError`.
 */
export type UnknownElementPolicy = 'ignore' | 'error';

export interface DocumentToRecordOptions {
  /** @default 'ignore' */
  unknownElements?: UnknownElementPolicy;
  /**
   * Record field that receives the text content of its element.
   * @default '#content'
   */
  textFieldName?: string;
  /**
   * Key prefix for attributes inside `anydata` content.
   * @default '@'
   */
  attributePrefix?: string;
  logger?: Logger;
}

type Assign = (value: JsonValue) => void;

interface RecordFrame {
  kind: 'record';
  record: RecordType;
  value: JsonObject;
  text: string[];
  path: string;
  assign: Assign;
}

interface TextFrame {
  kind: 'text';
  type: SchemaType;
  /** Member to switch to when a child element shows up (unions only). */
  structured?: SchemaType;
  name: QualifiedName;
  attributes: XmlAttribute[];
  text: string[];
  path: string;
  assign: Assign;
}

interface AnyFrame {
  kind: 'any';
  value: JsonObject;
  text: string[];
  path: string;
  assign: Assign;
}

interface SkipFrame {
  kind: 'skip';
}

type Frame = RecordFrame | TextFrame | AnyFrame | SkipFrame;

// A map is read like a record with no declared fields.
const mapRecords = new WeakMap<MapType, RecordType>();

function recordForMap(map: MapType): RecordType {
  let record = mapRecords.get(map);
  if (!record) {
    record = t.record('map', [], { restType: map.valueType });
    mapRecords.set(map, record);
  }
  return record;
}

function hasOwn(obj: JsonObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

function isNamespaceDeclaration(attribute: XmlAttribute): boolean {
  const { prefix, localName } = attribute.name;
  return prefix === 'xmlns' || (prefix === '' && localName === 'xmlns');
}

function hasPrimitiveMember(type: SchemaType): boolean {
  const resolved = dereference(type);
  if (resolved.kind === 'primitive') return resolved.primitive !== 'anydata';
  if (resolved.kind === 'union') return resolved.members.some(hasPrimitiveMember);
  return false;
}

/**
 * Appends `value` under `key`, turning a repeated key into an array.
 */
function accumulate(obj: JsonObject, key: string, value: JsonValue): void {
  if (!hasOwn(obj, key)) {
    obj[key] = value;
    return;
  }
  const existing = obj[key];
  if (Array.isArray(existing)) {
    existing.push(value);
  } else {
    obj[key] = [existing, value];
  }
}

/**
 * Builds a record-shaped value from markup events, one event at a time.
 *
 * Each instance converts exactly one document and owns its scope stack.
 *
 * @example
 * ```typescript
 * const transform = new DocumentToRecordTransform(Person);
 * transform.startElement(QualifiedName.fromMarkup('', 'person'), []);
 * transform.startElement(QualifiedName.fromMarkup('', 'name'), []);
 * transform.text('Alice');
 * transform.endElement();
 * transform.endElement();
 * transform.finish(); // { name: 'Alice' }
 * ```
 */
export class DocumentToRecordTransform {
  private readonly frames: Frame[] = [];
  private readonly scopes: ScopeStack;
  private readonly unknownElements: UnknownElementPolicy;
  private readonly textFieldName: string;
  private readonly attributePrefix: string;
  private readonly logger: Logger;
  private root: { value: JsonValue } | undefined;

  constructor(
    private readonly rootType: SchemaType,
    options: DocumentToRecordOptions = {},
  ) {
    const {
      unknownElements = 'ignore',
      textFieldName = '#content',
      attributePrefix = '@',
      logger = silentLogger,
    } = options;
    this.unknownElements = unknownElements;
    this.textFieldName = textFieldName;
    this.attributePrefix = attributePrefix;
    this.logger = logger;
    this.scopes = new ScopeStack(logger);
  }

  startElement(name: QualifiedName, attributes: XmlAttribute[]): void {
    const parent = this.frames.at(-1);
    if (!parent) {
      this.startRoot(name, attributes);
      return;
    }

    switch (parent.kind) {
      case 'skip':
        this.frames.push(parent);
        return;
      case 'any':
        this.openAny(name, attributes, `${parent.path}.${name.localName}`, (value) =>
          accumulate(parent.value, name.localName, value),
        );
        return;
      case 'text':
        this.upgradeTextFrame(parent);
        this.startElement(name, attributes);
        return;
      case 'record':
        this.startChild(parent, name, attributes);
        return;
    }
  }

  text(value: string): void {
    const frame = this.frames.at(-1);
    if (!frame || frame.kind === 'skip') return;
    frame.text.push(value);
  }

  endElement(): void {
    const frame = this.frames.pop();
    if (!frame) {
      throw new InternalError('endElement() called with no open element');
    }
    switch (frame.kind) {
      case 'skip':
        return;
      case 'text':
        frame.assign(convertText(frame.text.join(''), frame.type, frame.path));
        return;
      case 'record':
        this.closeRecord(frame);
        return;
      case 'any':
        frame.assign(this.closeAny(frame));
        return;
    }
  }

  /**
   * Closes every element still open (validating each record scope on the
   * way out) and returns the converted root value.
   */
  finish(): JsonValue {
    while (this.frames.length > 0) {
      this.endElement();
    }
    if (!this.root) {
      throw new TypeConversionError('$', 'document has no root element');
    }
    return this.root.value;
  }

  private startRoot(name: QualifiedName, attributes: XmlAttribute[]): void {
    if (this.root) {
      throw new InternalError('document has more than one root element');
    }
    const path = `$.${name.localName}`;
    const assign: Assign = (value) => {
      this.root = { value };
    };
    const type = selectStructuredMember(this.rootType, path);

    if (type.kind === 'record') {
      const { name: expectedName, namespace } = type.annotations;
      if (expectedName !== undefined && expectedName !== name.localName) {
        throw new RootElementMismatchError(
          path,
          `the record type name '${expectedName}' mismatches the XML name '${name.localName}'`,
        );
      }
      if (namespace !== undefined && namespace.uri !== name.namespaceUri) {
        throw new RootElementMismatchError(
          path,
          `namespace '${name.namespaceUri}' mismatches the namespace '${namespace.uri}' of type '${type.name}'`,
        );
      }
    }
    this.openValue(type, name, attributes, path, assign);
  }

  private startChild(parent: RecordFrame, name: QualifiedName, attributes: XmlAttribute[]): void {
    const scope = this.scopes.current();
    const path = `${parent.path}.${name.localName}`;
    const field = scope.elementIndex.resolve(name);

    if (field) {
      this.openMember(parent, field.name, field.type, name, attributes, path, (value) => {
        if (hasOwn(parent.value, field.name)) {
          throw new TypeConversionError(
            path,
            `field '${field.name}' of type ${describeType(field.type)} does not accept multiple occurrences`,
          );
        }
        parent.value[field.name] = value;
      });
      return;
    }
    if (scope.restType) {
      this.openMember(parent, name.localName, scope.restType, name, attributes, path, (value) =>
        accumulate(parent.value, name.localName, value),
      );
      return;
    }
    if (this.unknownElements === 'error') {
      throw new UnknownMemberError(path, name.localName);
    }
    this.logger.debug({ path, element: name.toString() }, 'Ignoring element with no matching field');
    this.frames.push({ kind: 'skip' });
  }

  /**
   * Opens a child stored under `key` of the parent record. Array types
   * collect every occurrence under the key; other types use `assign`.
   */
  private openMember(
    parent: RecordFrame,
    key: string,
    type: SchemaType,
    name: QualifiedName,
    attributes: XmlAttribute[],
    path: string,
    assign: Assign,
  ): void {
    const resolved = dereference(type);
    if (resolved.kind !== 'array') {
      this.openValue(resolved, name, attributes, path, assign);
      return;
    }
    const existing = parent.value[key];
    const items: JsonValue[] = Array.isArray(existing) ? existing : [];
    parent.value[key] = items;
    this.openValue(resolved.elementType, name, attributes, `${path}[${items.length}]`, (value) => {
      items.push(value);
    });
  }

  private openValue(
    type: SchemaType,
    name: QualifiedName,
    attributes: XmlAttribute[],
    path: string,
    assign: Assign,
  ): void {
    const resolved = dereference(type);
    switch (resolved.kind) {
      case 'record':
        this.openRecord(resolved, attributes, path, assign);
        return;
      case 'map':
        this.openRecord(recordForMap(resolved), attributes, path, assign);
        return;
      case 'array':
        this.openValue(resolved.elementType, name, attributes, path, (value) => assign([value]));
        return;
      case 'union':
        if (!hasPrimitiveMember(resolved)) {
          this.openValue(selectStructuredMember(resolved, path), name, attributes, path, assign);
          return;
        }
        this.frames.push({
          kind: 'text',
          type: resolved,
          structured: this.structuredMemberOf(resolved, path),
          name,
          attributes,
          text: [],
          path,
          assign,
        });
        return;
      case 'primitive':
        if (resolved.primitive === 'anydata') {
          this.openAny(name, attributes, path, assign);
          return;
        }
        this.frames.push({ kind: 'text', type: resolved, name, attributes, text: [], path, assign });
        return;
    }
  }

  private structuredMemberOf(type: SchemaType, path: string): SchemaType | undefined {
    try {
      return selectStructuredMember(type, path);
    } catch (err) {
      if (err instanceof TypeConversionError) return undefined;
      throw err;
    }
  }

  /**
   * A child element arrived inside content expected to be text: switch to
   * the structured union member, or fail.
   */
  private upgradeTextFrame(frame: TextFrame): void {
    if (!frame.structured) {
      throw new TypeConversionError(
        frame.path,
        `expected text content of type ${describeType(frame.type)} but found a child element`,
      );
    }
    this.frames.pop();
    this.openValue(frame.structured, frame.name, frame.attributes, frame.path, frame.assign);
    const opened = this.frames.at(-1);
    if (opened && opened.kind !== 'skip') {
      opened.text.push(...frame.text);
    }
  }

  private openRecord(record: RecordType, attributes: XmlAttribute[], path: string, assign: Assign): void {
    const scope = this.scopes.push(record, path);
    const value: JsonObject = {};

    for (const attribute of attributes) {
      if (isNamespaceDeclaration(attribute)) continue;
      const attrPath = `${path}.@${attribute.name.localName}`;
      const field = scope.attributeIndex.resolve(attribute.name);
      if (field) {
        value[field.name] = convertText(attribute.value, field.type, attrPath);
        continue;
      }
      const rest = scope.restType ? dereference(scope.restType) : undefined;
      if (rest && (rest.kind === 'primitive' || rest.kind === 'union')) {
        value[attribute.name.localName] = convertText(attribute.value, rest, attrPath);
        continue;
      }
      this.logger.debug({ path: attrPath }, 'Ignoring attribute with no matching field');
    }

    this.frames.push({ kind: 'record', record, value, text: [], path, assign });
  }

  private closeRecord(frame: RecordFrame): void {
    const { record, value, path } = frame;
    const text = frame.text.join('');
    const textField = record.fields.find((f) => f.name === this.textFieldName);
    if (textField && (text.trim() !== '' || textField.required)) {
      value[textField.name] = convertText(text, textField.type, `${path}.${textField.name}`);
    } else if (text.trim() !== '') {
      this.logger.debug({ path }, 'Ignoring text content of a record element');
    }

    this.validateScope(record, value, path);
    this.scopes.pop();
    frame.assign(value);
  }

  private validateScope(record: RecordType, value: JsonObject, path: string): void {
    const scope = this.scopes.current();
    for (const field of scope.elementIndex.values()) {
      if (!hasOwn(value, field.name)) {
        if (field.required) {
          throw new MissingRequiredFieldError(`${path}.${field.name}`, record.name, field.name);
        }
        continue;
      }
      const type = dereference(field.type);
      if (type.kind === 'array' && type.fixedSize !== undefined) {
        const items = value[field.name];
        const actual = Array.isArray(items) ? items.length : 1;
        if (actual !== type.fixedSize) {
          throw new ArraySizeMismatchError(`${path}.${field.name}`, field.name, type.fixedSize, actual);
        }
      }
    }

    for (const field of scope.attributeIndex.values()) {
      if (field.required && !hasOwn(value, field.name)) {
        throw new MissingRequiredAttributeError(`${path}.@${field.name}`, record.name, field.name);
      }
    }
  }

  private openAny(name: QualifiedName, attributes: XmlAttribute[], path: string, assign: Assign): void {
    const value: JsonObject = {};
    for (const attribute of attributes) {
      if (isNamespaceDeclaration(attribute)) continue;
      value[`${this.attributePrefix}${attribute.name.localName}`] = attribute.value;
    }
    this.frames.push({ kind: 'any', value, text: [], path, assign });
    this.logger.trace({ path, element: name.toString() }, 'reading anydata content');
  }

  private closeAny(frame: AnyFrame): JsonValue {
    const text = frame.text.join('');
    if (Object.keys(frame.value).length === 0) {
      return text;
    }
    if (text.trim() !== '') {
      frame.value[this.textFieldName] = text;
    }
    return frame.value;
  }
}

/**
 * Converts a complete event sequence (any pull source) to a record-shaped
 * value. A source that stops early has its open elements closed and
 * validated as if the document ended there.
 */
export function documentToRecord(
  events: Iterable<XmlEvent>,
  type: SchemaType,
  options: DocumentToRecordOptions = {},
): JsonValue {
  const transform = new DocumentToRecordTransform(type, options);
  for (const event of events) {
    switch (event.type) {
      case 'start':
        transform.startElement(event.name, event.attributes);
        break;
      case 'text':
        transform.text(event.value);
        break;
      case 'end':
        transform.endElement();
        break;
    }
  }
  return transform.finish();
}
