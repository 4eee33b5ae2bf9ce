// ---------------------------------------------------------------------------
// Names
// ---------------------------------------------------------------------------

/**
 * A qualified name as written in the schema (`prefix:localName`) together with
 * the namespace URI the prefix resolved to. Two refs are the same name when
 * namespace and local name match; the prefix is a schema-local alias.
 */
export interface TypeRef {
  prefixed: string;
  namespace: string;
  localName: string;
}

/**
 * Top-level declaration kinds the registry indexes.
 */
export type DeclarationCategory =
  | 'element'
  | 'attribute'
  | 'complexType'
  | 'simpleType'
  | 'attributeGroup'
  | 'group';

export type Occurs = number | 'unbounded';

export interface Cardinality {
  minOccurs: number;
  maxOccurs: Occurs;
}

/**
 * Either a reference to a named type, or a short description of an anonymous one
 * (`Restriction of type xs:string`, `List of type xs:double`, `Anonymous complexType`).
 */
export type DeclaredType = { kind: 'ref'; ref: TypeRef } | { kind: 'inline'; summary: string };

export interface EnumerationValue {
  value: string;
  description: string;
}

// ---------------------------------------------------------------------------
// Content-model IR (unresolved, as declared)
// ---------------------------------------------------------------------------

/**
 * Inline simpleType body. Enumerations are collected when the type is a
 * restriction with xs:enumeration facets.
 */
export interface SimpleTypeBody {
  summary: string;
  /** Restriction base, when the type is a restriction. */
  base?: TypeRef;
  enumeration: EnumerationValue[];
}

/**
 * A local `xs:element` or an `xs:element ref="…"` inside a content model.
 */
export type ElementParticle =
  | {
      kind: 'element';
      name: string;
      namespace: string;
      type?: TypeRef;
      inlineComplexType?: ComplexTypeBody;
      inlineSimpleType?: SimpleTypeBody;
      cardinality: Cardinality;
      description: string;
    }
  | {
      kind: 'elementRef';
      ref: TypeRef;
      cardinality: Cardinality;
      description: string;
    };

export type Compositor = 'sequence' | 'choice' | 'all';

/**
 * A content-model node. One case per construct; resolved by exhaustive switch.
 *
 * `statedOccurs` holds only the bounds written on a model group or group
 * reference; they override the bounds of the elements it directly contains.
 */
export type ParticleNode =
  | ElementParticle
  | {
      kind: 'modelGroup';
      compositor: Compositor;
      cardinality: Cardinality;
      statedOccurs: Partial<Cardinality>;
      particles: ParticleNode[];
    }
  | { kind: 'groupRef'; ref: TypeRef; cardinality: Cardinality; statedOccurs: Partial<Cardinality> }
  | { kind: 'any'; cardinality: Cardinality };

export type AttributeUse = 'required' | 'optional' | 'prohibited';

/**
 * A local `xs:attribute`, an `xs:attribute ref="…"` or an `xs:attributeGroup ref="…"`.
 */
export type AttributeNode =
  | {
      kind: 'attribute';
      name: string;
      namespace: string;
      type?: TypeRef;
      inlineSimpleType?: SimpleTypeBody;
      use: AttributeUse;
      default?: string;
      fixed?: string;
      description: string;
    }
  | {
      kind: 'attributeRef';
      ref: TypeRef;
      use: AttributeUse;
      default?: string;
      fixed?: string;
      description: string;
    }
  | { kind: 'attributeGroupRef'; ref: TypeRef };

export type Derivation =
  | { kind: 'none' }
  | { kind: 'extension'; base: TypeRef; content: 'complex' | 'simple' }
  | { kind: 'restriction'; base: TypeRef; content: 'complex' | 'simple' };

/**
 * Body of a named or anonymous xs:complexType.
 */
export interface ComplexTypeBody {
  abstract: boolean;
  mixed: boolean;
  derivation: Derivation;
  particle?: ParticleNode;
  attributes: AttributeNode[];
  description: string;
}

// ---------------------------------------------------------------------------
// Top-level declarations (registry entries)
// ---------------------------------------------------------------------------

interface DeclarationBase {
  name: TypeRef;
  /** Location of the schema document declaring it. */
  source: string;
}

export interface ElementDeclaration extends DeclarationBase {
  category: 'element';
  type?: TypeRef;
  inlineComplexType?: ComplexTypeBody;
  inlineSimpleType?: SimpleTypeBody;
  abstract: boolean;
  substitutionGroup?: TypeRef;
  description: string;
}

export interface AttributeDeclaration extends DeclarationBase {
  category: 'attribute';
  type?: TypeRef;
  inlineSimpleType?: SimpleTypeBody;
  default?: string;
  fixed?: string;
  description: string;
}

export interface ComplexTypeDeclaration extends DeclarationBase {
  category: 'complexType';
  body: ComplexTypeBody;
}

export interface SimpleTypeDeclaration extends DeclarationBase {
  category: 'simpleType';
  body: SimpleTypeBody;
  description: string;
}

export interface AttributeGroupDeclaration extends DeclarationBase {
  category: 'attributeGroup';
  attributes: AttributeNode[];
}

export interface GroupDeclaration extends DeclarationBase {
  category: 'group';
  /** The single sequence/choice/all the group wraps. */
  particle?: ParticleNode;
}

export type SchemaDeclaration =
  | ElementDeclaration
  | AttributeDeclaration
  | ComplexTypeDeclaration
  | SimpleTypeDeclaration
  | AttributeGroupDeclaration
  | GroupDeclaration;

export type DeclarationOf<C extends DeclarationCategory> = Extract<SchemaDeclaration, { category: C }>;

// ---------------------------------------------------------------------------
// Resolved model
// ---------------------------------------------------------------------------

/**
 * An attribute of a global element after inheritance and group expansion.
 * `use` is never `prohibited` here.
 */
export interface AttributeDecl {
  readonly name: string;
  readonly namespace: string;
  readonly type: DeclaredType;
  readonly use: 'required' | 'optional';
  readonly default?: string;
  readonly fixed?: string;
  readonly description: string;
  readonly enumeration?: readonly EnumerationValue[];
}

export interface ChildElementDecl {
  readonly name: string;
  readonly namespace: string;
  readonly type: DeclaredType;
  readonly minOccurs: number;
  readonly maxOccurs: Occurs;
  /** True when declared directly inside an xs:choice. */
  readonly isChoice: boolean;
  readonly description: string;
  /** The global element this child refers to, when declared with `ref`. */
  readonly reference?: TypeRef;
}

export interface ResolvedContent {
  readonly attributes: readonly AttributeDecl[];
  readonly children: readonly ChildElementDecl[];
}

export interface GlobalElementDecl extends ResolvedContent {
  readonly name: TypeRef;
  readonly type: DeclaredType;
  readonly abstract: boolean;
  readonly substitutionGroup?: TypeRef;
  readonly description: string;
}

/**
 * A `SchemaChange` record found in schema annotations.
 */
export interface SchemaChange {
  readonly version: string;
  readonly author: string;
  readonly date: string;
  readonly description: string;
}
