import { XML_NAMESPACE } from '../xml/tree.js';
import { XSD_NAMESPACE } from './names.js';
import type { AttributeDeclaration, TypeRef } from './types.js';

// Built-in XML Schema datatypes (local names in the XSD namespace).
const XS_BUILT_IN_TYPES = new Set([
  'anyType',
  'anySimpleType',
  'string',
  'normalizedString',
  'token',
  'language',
  'Name',
  'NCName',
  'NMTOKEN',
  'NMTOKENS',
  'ID',
  'IDREF',
  'IDREFS',
  'ENTITY',
  'ENTITIES',
  'QName',
  'NOTATION',
  'anyURI',
  'boolean',
  'decimal',
  'integer',
  'nonPositiveInteger',
  'negativeInteger',
  'nonNegativeInteger',
  'positiveInteger',
  'long',
  'int',
  'short',
  'byte',
  'unsignedLong',
  'unsignedInt',
  'unsignedShort',
  'unsignedByte',
  'float',
  'double',
  'duration',
  'dateTime',
  'date',
  'time',
  'gYearMonth',
  'gYear',
  'gMonthDay',
  'gDay',
  'gMonth',
  'hexBinary',
  'base64Binary',
]);

/**
 * True for `xs:string`, `xs:ID`, … and `xs:anyType`.
 */
export function isBuiltInType(ref: TypeRef): boolean {
  return ref.namespace === XSD_NAMESPACE && XS_BUILT_IN_TYPES.has(ref.localName);
}

export function isAnyType(ref: TypeRef): boolean {
  return ref.namespace === XSD_NAMESPACE && ref.localName === 'anyType';
}

const XML_ATTRIBUTE_TYPES: Record<string, string> = {
  lang: 'language',
  space: 'NCName',
  base: 'anyURI',
  id: 'ID',
};

/**
 * Declarations of the attributes the `xml` namespace predefines
 * (`xml:lang`, `xml:space`, `xml:base`, `xml:id`), or undefined for any other name.
 */
export function xmlNamespaceAttribute(ref: TypeRef): AttributeDeclaration | undefined {
  if (ref.namespace !== XML_NAMESPACE) return undefined;
  const typeName = XML_ATTRIBUTE_TYPES[ref.localName];
  if (!typeName) return undefined;
  return {
    category: 'attribute',
    name: ref,
    source: XML_NAMESPACE,
    type: { prefixed: `xs:${typeName}`, namespace: XSD_NAMESPACE, localName: typeName },
    description: '',
  };
}
