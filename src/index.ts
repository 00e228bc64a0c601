export {
  convertJsonToXml,
  convertXmlToJson,
  fromXml,
  fromXmlEvents,
  toDocument,
  toXml,
} from './converter.js';
export type { ConverterOptions, XsdConverterOptions, XsdSchema } from './converter.js';

export { t, dereference, mergeAnnotations } from './schema/builders.js';
export type { FieldOptions, RecordOptions } from './schema/builders.js';
export { parseSchemaDescriptor } from './schema/descriptor.js';
export type { FieldExpression, RecordExpression, SchemaDescriptor, TypeExpression } from './schema/descriptor.js';
export { buildScope } from './schema/index-builder.js';
export type { Scope } from './schema/index-builder.js';
export { NS_ANNOTATION_NOT_DEFINED, QualifiedName, QualifiedNameMap } from './schema/qualified-name.js';
export { ScopeStack } from './schema/scope.js';
export type {
  ArrayType,
  FieldDescriptor,
  MapType,
  NameNamespaceAnnotation,
  NamespaceAnnotation,
  PrimitiveKind,
  PrimitiveType,
  RecordType,
  ReferenceType,
  SchemaType,
  UnionType,
} from './schema/types.js';

export { DocumentToRecordTransform, documentToRecord } from './transform/document-to-record.js';
export type { DocumentToRecordOptions, UnknownElementPolicy } from './transform/document-to-record.js';
export { recordToDocument } from './transform/record-to-document.js';
export type { RecordToDocumentOptions } from './transform/record-to-document.js';

export { readXmlEvents } from './xml/reader.js';
export type { XmlInput } from './xml/reader.js';
export type { XmlAttribute, XmlEvent } from './xml/events.js';
export { parseXsd } from './xsd/parser.js';

export { validateRecord } from './validation/record-validator.js';
export {
  ArraySizeMismatchError,
  InternalError,
  MissingRequiredAttributeError,
  MissingRequiredFieldError,
  RecordValidationError,
  RootElementMismatchError,
  SchemaConflictError,
  SchemaDescriptorError,
  TypeConversionError,
  UnknownMemberError,
  XmlBindingError,
  XmlParseError,
  XmlRenderError,
  XsdParseError,
} from './validation/errors.js';
export type { ConversionErrorKind, ValidationIssue } from './validation/errors.js';

export type { JsonArray, JsonObject, JsonPrimitive, JsonValue } from './types.js';
export type { Logger } from './logger.js';
