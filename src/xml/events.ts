import type { QualifiedName } from '../schema/qualified-name.js';

export const XMLNS_NAMESPACE = 'http://www.w3.org/2000/xmlns/';
export const XML_NAMESPACE = 'http://www.w3.org/XML/1998/namespace';

/**
 * An attribute with its namespace resolved. Namespace declarations
 * (`xmlns`, `xmlns:p`) are not attributes.
 */
export interface XmlAttribute {
  name: QualifiedName;
  value: string;
}

/**
 * One markup event, in document order. Names carry the resolved namespace URI
 * (`""` when the name is in no namespace).
 */
export type XmlEvent =
  | { type: 'start'; name: QualifiedName; attributes: XmlAttribute[] }
  | { type: 'text'; value: string }
  | { type: 'end' };
