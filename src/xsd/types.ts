import type { SchemaType } from '../schema/types.js';

/**
 * Raw definitions collected from one XSD file and everything it includes or
 * imports. Nodes are fast-xml-parser output with the XSD prefix normalised
 * to `xs:`.
 */
export interface XsdDefinitions {
  elements: Map<string, Record<string, unknown>>;
  complexTypes: Map<string, Record<string, unknown>>;
  /** Simple type name → the built-in type it restricts. */
  simpleTypes: Map<string, string>;
  /** Name of the first top-level element. Empty for type-library XSDs. */
  firstElement: string;
  targetNamespace?: string;
}

/**
 * An XSD converted into schema types.
 */
export interface XsdSchema {
  /** Name of the root element (first xs:element at schema level). */
  rootElement: string;
  /** xs:schema targetNamespace, if present. */
  targetNamespace?: string;
  /** Record (or primitive) type of every top-level element, keyed by element name. */
  elements: Map<string, SchemaType>;
}
