import { MalformedDeclarationError, SchemaSourceError } from '../errors.js';
import { parseXmlDocument } from '../xml/tree.js';
import type { XmlNode } from '../xml/tree.js';
import { XSD_NAMESPACE, qnameAttr } from './names.js';
import type {
  AttributeNode,
  AttributeUse,
  Cardinality,
  ComplexTypeBody,
  Compositor,
  Derivation,
  ElementParticle,
  EnumerationValue,
  Occurs,
  ParticleNode,
  SchemaChange,
  SchemaDeclaration,
  SimpleTypeBody,
  TypeRef,
} from './types.js';

/**
 * A schema document reference found in xs:import / xs:include.
 */
export interface SchemaReference {
  kind: 'import' | 'include';
  schemaLocation: string;
  namespace?: string;
}

/**
 * One parsed `xs:schema` document.
 */
export interface SchemaDocument {
  location: string;
  root: XmlNode;
  targetNamespace: string;
  /** Prefix → URI declared on the xs:schema element, in document order. */
  namespaces: ReadonlyArray<readonly [string, string]>;
  version?: string;
  references: SchemaReference[];
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function xsChildren(node: XmlNode): XmlNode[] {
  return node.children.filter((c) => c.namespaceUri === XSD_NAMESPACE);
}

function xsChild(node: XmlNode, localName: string): XmlNode | undefined {
  return node.firstChild(localName, XSD_NAMESPACE);
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Text of the xs:annotation/xs:documentation children of a declaration.
 */
function documentation(node: XmlNode): string {
  const annotation = xsChild(node, 'annotation');
  if (!annotation) return '';
  return collapse(
    annotation
      .childrenNamed('documentation', XSD_NAMESPACE)
      .map((d) => d.text)
      .join(' '),
  );
}

function parseOccurs(value: string | undefined, owner: string, attribute: string): Occurs {
  if (value === undefined) return 1;
  if (value === 'unbounded') return 'unbounded';
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new MalformedDeclarationError(owner, `invalid ${attribute} "${value}"`);
  }
  return n;
}

function parseCardinality(node: XmlNode, owner: string): Cardinality {
  const minOccurs = parseOccurs(node.attr('minOccurs'), owner, 'minOccurs');
  const maxOccurs = parseOccurs(node.attr('maxOccurs'), owner, 'maxOccurs');
  if (minOccurs === 'unbounded') {
    throw new MalformedDeclarationError(owner, 'minOccurs cannot be unbounded');
  }
  if (maxOccurs !== 'unbounded' && minOccurs > maxOccurs) {
    throw new MalformedDeclarationError(owner, `minOccurs ${minOccurs} exceeds maxOccurs ${maxOccurs}`);
  }
  return { minOccurs, maxOccurs };
}

function statedOccurs(node: XmlNode, cardinality: Cardinality): Partial<Cardinality> {
  return {
    ...(node.attr('minOccurs') !== undefined ? { minOccurs: cardinality.minOccurs } : {}),
    ...(node.attr('maxOccurs') !== undefined ? { maxOccurs: cardinality.maxOccurs } : {}),
  };
}

function parseUse(node: XmlNode, owner: string): AttributeUse {
  const use = node.attr('use') ?? 'optional';
  if (use === 'required' || use === 'optional' || use === 'prohibited') return use;
  throw new MalformedDeclarationError(owner, `invalid use "${use}"`);
}

function requireName(node: XmlNode, what: string): string {
  const name = node.attr('name');
  if (!name) {
    throw new MalformedDeclarationError(`<${node.tag}>`, `${what} has neither name nor ref`);
  }
  return name;
}

// ---------------------------------------------------------------------------
// Simple types
// ---------------------------------------------------------------------------

function parseEnumeration(restriction: XmlNode): EnumerationValue[] {
  return restriction.childrenNamed('enumeration', XSD_NAMESPACE).map((e) => ({
    value: e.attr('value') ?? '',
    description: documentation(e),
  }));
}

export function parseSimpleTypeBody(node: XmlNode): SimpleTypeBody {
  const restriction = xsChild(node, 'restriction');
  if (restriction) {
    const base = qnameAttr(restriction, 'base');
    return {
      summary: base ? `Restriction of type ${base.prefixed}` : 'Restriction',
      base,
      enumeration: parseEnumeration(restriction),
    };
  }
  const list = xsChild(node, 'list');
  if (list) {
    const itemType = list.attr('itemType');
    return { summary: itemType ? `List of type ${itemType}` : 'List', enumeration: [] };
  }
  if (xsChild(node, 'union')) {
    return { summary: 'Union', enumeration: [] };
  }
  return { summary: 'Anonymous simpleType', enumeration: [] };
}

// ---------------------------------------------------------------------------
// Attributes
// ---------------------------------------------------------------------------

function parseAttributeNode(node: XmlNode, namespace: string): AttributeNode {
  const ref = qnameAttr(node, 'ref');
  const use = parseUse(node, node.attr('name') ?? ref?.prefixed ?? 'attribute');
  const description = documentation(node);
  if (ref) {
    return {
      kind: 'attributeRef',
      ref,
      use,
      default: node.attr('default'),
      fixed: node.attr('fixed'),
      description,
    };
  }
  const inline = xsChild(node, 'simpleType');
  return {
    kind: 'attribute',
    name: requireName(node, 'attribute'),
    namespace,
    type: qnameAttr(node, 'type'),
    inlineSimpleType: inline ? parseSimpleTypeBody(inline) : undefined,
    use,
    default: node.attr('default'),
    fixed: node.attr('fixed'),
    description,
  };
}

/**
 * The xs:attribute and xs:attributeGroup references directly below `parent`,
 * in document order.
 */
function parseAttributeNodes(parent: XmlNode, namespace: string): AttributeNode[] {
  const nodes: AttributeNode[] = [];
  for (const child of xsChildren(parent)) {
    if (child.localName === 'attribute') {
      nodes.push(parseAttributeNode(child, namespace));
    } else if (child.localName === 'attributeGroup') {
      const ref = qnameAttr(child, 'ref');
      if (!ref) {
        throw new MalformedDeclarationError('<xs:attributeGroup>', 'nested attributeGroup without ref');
      }
      nodes.push({ kind: 'attributeGroupRef', ref });
    }
  }
  return nodes;
}

// ---------------------------------------------------------------------------
// Content models
// ---------------------------------------------------------------------------

function parseElementParticle(node: XmlNode, namespace: string): ElementParticle {
  const ref = qnameAttr(node, 'ref');
  const description = documentation(node);
  if (ref) {
    return { kind: 'elementRef', ref, cardinality: parseCardinality(node, ref.prefixed), description };
  }
  const name = requireName(node, 'element');
  const inlineComplex = xsChild(node, 'complexType');
  const inlineSimple = xsChild(node, 'simpleType');
  return {
    kind: 'element',
    name,
    namespace,
    type: qnameAttr(node, 'type'),
    inlineComplexType: inlineComplex ? parseComplexTypeBody(inlineComplex, namespace) : undefined,
    inlineSimpleType: inlineSimple ? parseSimpleTypeBody(inlineSimple) : undefined,
    cardinality: parseCardinality(node, name),
    description,
  };
}

function parseParticle(node: XmlNode, namespace: string): ParticleNode | undefined {
  switch (node.localName) {
    case 'element':
      return parseElementParticle(node, namespace);
    case 'sequence':
    case 'choice':
    case 'all': {
      const compositor: Compositor =
        node.localName === 'sequence' ? 'sequence' : node.localName === 'choice' ? 'choice' : 'all';
      const particles: ParticleNode[] = [];
      for (const child of xsChildren(node)) {
        const particle = parseParticle(child, namespace);
        if (particle) particles.push(particle);
      }
      const cardinality = parseCardinality(node, `<${node.tag}>`);
      return {
        kind: 'modelGroup',
        compositor,
        cardinality,
        statedOccurs: statedOccurs(node, cardinality),
        particles,
      };
    }
    case 'group': {
      const ref = qnameAttr(node, 'ref');
      if (!ref) throw new MalformedDeclarationError('<xs:group>', 'nested group without ref');
      const cardinality = parseCardinality(node, ref.prefixed);
      return { kind: 'groupRef', ref, cardinality, statedOccurs: statedOccurs(node, cardinality) };
    }
    case 'any':
      return { kind: 'any', cardinality: parseCardinality(node, '<xs:any>') };
    default:
      return undefined;
  }
}

/**
 * The first content-model particle directly below `parent`.
 */
function firstParticle(parent: XmlNode, namespace: string): ParticleNode | undefined {
  for (const child of xsChildren(parent)) {
    const particle = parseParticle(child, namespace);
    if (particle) return particle;
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// ComplexType parsing
// ---------------------------------------------------------------------------

export function parseComplexTypeBody(node: XmlNode, namespace: string): ComplexTypeBody {
  const abstract = node.attr('abstract') === 'true';
  const description = documentation(node);

  for (const content of ['complexContent', 'simpleContent'] as const) {
    const contentNode = xsChild(node, content);
    if (!contentNode) continue;
    const derivationNode = xsChild(contentNode, 'extension') ?? xsChild(contentNode, 'restriction');
    if (!derivationNode) {
      throw new MalformedDeclarationError(`<xs:${content}>`, 'missing extension or restriction');
    }
    const base = qnameAttr(derivationNode, 'base');
    if (!base) {
      throw new MalformedDeclarationError(`<xs:${derivationNode.localName}>`, 'missing base');
    }
    const derivation: Derivation = {
      kind: derivationNode.localName === 'extension' ? 'extension' : 'restriction',
      base,
      content: content === 'complexContent' ? 'complex' : 'simple',
    };
    return {
      abstract,
      mixed: node.attr('mixed') === 'true' || contentNode.attr('mixed') === 'true',
      derivation,
      particle: content === 'complexContent' ? firstParticle(derivationNode, namespace) : undefined,
      attributes: parseAttributeNodes(derivationNode, namespace),
      description,
    };
  }

  return {
    abstract,
    mixed: node.attr('mixed') === 'true',
    derivation: { kind: 'none' },
    particle: firstParticle(node, namespace),
    attributes: parseAttributeNodes(node, namespace),
    description,
  };
}

// ---------------------------------------------------------------------------
// Top-level declarations
// ---------------------------------------------------------------------------

function qualify(name: string, doc: SchemaDocument): TypeRef {
  const prefix = doc.namespaces.find(([, uri]) => uri === doc.targetNamespace)?.[0];
  return {
    prefixed: prefix ? `${prefix}:${name}` : name,
    namespace: doc.targetNamespace,
    localName: name,
  };
}

function parseDeclaration(node: XmlNode, doc: SchemaDocument): SchemaDeclaration | undefined {
  const ns = doc.targetNamespace;
  const source = doc.location;
  switch (node.localName) {
    case 'element': {
      const name = qualify(requireName(node, 'global element'), doc);
      const inlineComplex = xsChild(node, 'complexType');
      const inlineSimple = xsChild(node, 'simpleType');
      return {
        category: 'element',
        name,
        source,
        type: qnameAttr(node, 'type'),
        inlineComplexType: inlineComplex ? parseComplexTypeBody(inlineComplex, ns) : undefined,
        inlineSimpleType: inlineSimple ? parseSimpleTypeBody(inlineSimple) : undefined,
        abstract: node.attr('abstract') === 'true',
        substitutionGroup: qnameAttr(node, 'substitutionGroup'),
        description: documentation(node),
      };
    }
    case 'attribute': {
      const inline = xsChild(node, 'simpleType');
      return {
        category: 'attribute',
        name: qualify(requireName(node, 'global attribute'), doc),
        source,
        type: qnameAttr(node, 'type'),
        inlineSimpleType: inline ? parseSimpleTypeBody(inline) : undefined,
        default: node.attr('default'),
        fixed: node.attr('fixed'),
        description: documentation(node),
      };
    }
    case 'complexType':
      return {
        category: 'complexType',
        name: qualify(requireName(node, 'global complexType'), doc),
        source,
        body: parseComplexTypeBody(node, ns),
      };
    case 'simpleType':
      return {
        category: 'simpleType',
        name: qualify(requireName(node, 'global simpleType'), doc),
        source,
        body: parseSimpleTypeBody(node),
        description: documentation(node),
      };
    case 'attributeGroup':
      return {
        category: 'attributeGroup',
        name: qualify(requireName(node, 'global attributeGroup'), doc),
        source,
        attributes: parseAttributeNodes(node, ns),
      };
    case 'group':
      return {
        category: 'group',
        name: qualify(requireName(node, 'global group'), doc),
        source,
        particle: firstParticle(node, ns),
      };
    default:
      return undefined;
  }
}

/**
 * Every top-level declaration of the document, in document order.
 */
export function parseDeclarations(doc: SchemaDocument): SchemaDeclaration[] {
  const declarations: SchemaDeclaration[] = [];
  for (const child of xsChildren(doc.root)) {
    const declaration = parseDeclaration(child, doc);
    if (declaration) declarations.push(declaration);
  }
  return declarations;
}

// ---------------------------------------------------------------------------
// Document-level information
// ---------------------------------------------------------------------------

/**
 * The schema version: the `version` attribute of xs:schema, else the fixed value
 * of an attribute declaration named `schemaVersion`.
 */
function findSchemaVersion(root: XmlNode): string | undefined {
  const version = root.attr('version');
  if (version) return version;
  for (const node of root.descendants()) {
    if (
      node.localName === 'attribute' &&
      node.namespaceUri === XSD_NAMESPACE &&
      node.attr('name') === 'schemaVersion' &&
      node.attr('fixed')
    ) {
      return node.attr('fixed');
    }
  }
  return undefined;
}

/**
 * `SchemaChange` records (in any namespace) found anywhere in the document,
 * typically below xs:annotation/xs:appinfo.
 */
export function findSchemaChanges(doc: SchemaDocument): SchemaChange[] {
  const changes: SchemaChange[] = [];
  for (const node of doc.root.descendants()) {
    if (node.localName !== 'SchemaChange') continue;
    const description = node.firstChild('Description');
    changes.push({
      version: node.attr('version') ?? '',
      author: node.attr('author') ?? '',
      date: node.attr('date') ?? '',
      description: collapse(description ? description.text : node.text),
    });
  }
  return changes;
}

function declaredNamespaces(root: XmlNode): Array<readonly [string, string]> {
  const namespaces: Array<readonly [string, string]> = [];
  for (const [name, value] of root.attributes) {
    if (name === 'xmlns') namespaces.push(['', value]);
    else if (name.startsWith('xmlns:')) namespaces.push([name.slice('xmlns:'.length), value]);
  }
  return namespaces;
}

/**
 * Wraps the root of a parsed document as a `SchemaDocument`.
 *
 * @param root              - The document root; must be xs:schema.
 * @param location          - Where the document was loaded from.
 * @param inheritedNamespace - Target namespace of the including schema, adopted by
 *                            an included schema that declares none.
 */
export function readSchemaDocument(root: XmlNode, location: string, inheritedNamespace?: string): SchemaDocument {
  if (root.localName !== 'schema' || root.namespaceUri !== XSD_NAMESPACE) {
    throw new SchemaSourceError(location, `Invalid XSD: root element <${root.tag}> is not xs:schema`);
  }

  const references: SchemaReference[] = [];
  for (const child of xsChildren(root)) {
    const kind = child.localName;
    if (kind !== 'import' && kind !== 'include') continue;
    const schemaLocation = child.attr('schemaLocation');
    if (!schemaLocation) continue;
    references.push({ kind, schemaLocation, namespace: child.attr('namespace') });
  }

  return {
    location,
    root,
    targetNamespace: root.attr('targetNamespace') ?? inheritedNamespace ?? '',
    namespaces: declaredNamespaces(root),
    version: findSchemaVersion(root),
    references,
  };
}

/**
 * Parses schema text into a `SchemaDocument`.
 */
export function parseSchemaDocument(content: string, location: string, inheritedNamespace?: string): SchemaDocument {
  return readSchemaDocument(parseXmlDocument(content, location), location, inheritedNamespace);
}
