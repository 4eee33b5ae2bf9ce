import type { NamespaceTable, SchemaModel } from './model.js';
import { clarkKey, formatDeclaredType } from './xsd/names.js';
import type { DeclarationCategory, GlobalElementDecl, Occurs } from './xsd/types.js';

export type Use = 'req.' | 'opt.';

export interface AttributeRecord {
  Attribute: string;
  Namespace: string | null;
  Type: string;
  Use: Use;
  Default: string | null;
  Fixed: string | null;
  Description: string | null;
}

export interface ChildRecord {
  Child: string;
  Namespace: string | null;
  Type: string;
  Use: Use;
  Cardinality: string;
  Choice: boolean;
  /** True when the child refers to a global element. */
  Global: boolean;
  Description: string | null;
}

/** One top-level declaration of a category. */
export interface DeclarationRecord {
  Prefix: string | null;
  Name: string;
  /** Clark key. */
  Tag: string;
  /** Location of the declaring document. */
  Source: string;
}

/** Records per global element, keyed by the element's prefixed name. */
export type FlatTable<R> = Record<string, R[]>;

function orNull(value: string | undefined): string | null {
  return value === undefined || value === '' ? null : value;
}

function namespacePrefix(uri: string, namespaces: NamespaceTable): string | null {
  if (!uri) return null;
  return namespaces.prefixFor(uri) ?? uri;
}

export function formatCardinality(minOccurs: number, maxOccurs: Occurs): string {
  return `[${minOccurs}, ${maxOccurs === 'unbounded' ? '∞' : maxOccurs}]`;
}

export function attributeTable(element: GlobalElementDecl, namespaces: NamespaceTable): AttributeRecord[] {
  return element.attributes.map((a): AttributeRecord => ({
    Attribute: a.name,
    Namespace: namespacePrefix(a.namespace, namespaces),
    Type: formatDeclaredType(a.type),
    Use: a.use === 'required' ? 'req.' : 'opt.',
    Default: orNull(a.default),
    Fixed: orNull(a.fixed),
    Description: orNull(a.description),
  }));
}

export function childTable(element: GlobalElementDecl, namespaces: NamespaceTable): ChildRecord[] {
  return element.children.map((c): ChildRecord => ({
    Child: c.name,
    Namespace: namespacePrefix(c.namespace, namespaces),
    Type: formatDeclaredType(c.type),
    Use: c.minOccurs > 0 ? 'req.' : 'opt.',
    Cardinality: formatCardinality(c.minOccurs, c.maxOccurs),
    Choice: c.isChoice,
    Global: c.reference !== undefined,
    Description: orNull(c.description),
  }));
}

/**
 * Attribute records of every global element that has attributes.
 */
export function attributeTables(model: SchemaModel): FlatTable<AttributeRecord> {
  const table: FlatTable<AttributeRecord> = {};
  for (const element of model.elements.values()) {
    if (element.attributes.length > 0) {
      table[element.name.prefixed] = attributeTable(element, model.namespaces);
    }
  }
  return table;
}

/**
 * Child records of every global element that has children.
 */
export function childTables(model: SchemaModel): FlatTable<ChildRecord> {
  const table: FlatTable<ChildRecord> = {};
  for (const element of model.elements.values()) {
    if (element.children.length > 0) {
      table[element.name.prefixed] = childTable(element, model.namespaces);
    }
  }
  return table;
}

/**
 * Every registered declaration of `category`, keyed by Clark key, in
 * registration order.
 */
export function declarationTable(model: SchemaModel, category: DeclarationCategory): Record<string, DeclarationRecord> {
  const table: Record<string, DeclarationRecord> = {};
  for (const declaration of model.registry.declarations(category)) {
    const tag = clarkKey(declaration.name);
    table[tag] = {
      Prefix: namespacePrefix(declaration.name.namespace, model.namespaces),
      Name: declaration.name.localName,
      Tag: tag,
      Source: declaration.source,
    };
  }
  return table;
}

export function complexTypeTable(model: SchemaModel): Record<string, DeclarationRecord> {
  return declarationTable(model, 'complexType');
}

export function simpleTypeTable(model: SchemaModel): Record<string, DeclarationRecord> {
  return declarationTable(model, 'simpleType');
}

export function attributeGroupTable(model: SchemaModel): Record<string, DeclarationRecord> {
  return declarationTable(model, 'attributeGroup');
}

/** Global `xs:attribute` declarations. */
export function attributeTypeTable(model: SchemaModel): Record<string, DeclarationRecord> {
  return declarationTable(model, 'attribute');
}

/** Global `xs:element` declarations. */
export function elementTypeTable(model: SchemaModel): Record<string, DeclarationRecord> {
  return declarationTable(model, 'element');
}
