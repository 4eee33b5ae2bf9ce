import { CyclicTypeError, MalformedDeclarationError, UnresolvedReferenceError } from '../errors.js';
import { logger as defaultLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { isAnyType, isBuiltInType } from './builtins.js';
import { XSD_NAMESPACE, clarkKey } from './names.js';
import type { TypeRegistry } from './registry.js';
import type {
  AttributeDecl,
  AttributeNode,
  AttributeUse,
  Cardinality,
  ChildElementDecl,
  ComplexTypeBody,
  Compositor,
  DeclaredType,
  ElementDeclaration,
  EnumerationValue,
  GlobalElementDecl,
  Occurs,
  ParticleNode,
  ResolvedContent,
  SimpleTypeBody,
  TypeRef,
} from './types.js';

const ANONYMOUS_COMPLEX_TYPE = 'Anonymous complexType';

const ANY_SIMPLE_TYPE: TypeRef = {
  prefixed: 'xs:anySimpleType',
  namespace: XSD_NAMESPACE,
  localName: 'anySimpleType',
};

const EMPTY_CONTENT: ResolvedContent = Object.freeze({
  attributes: Object.freeze([]),
  children: Object.freeze([]),
});

/**
 * Attribute while it is being merged. Unlike `AttributeDecl` it may still be
 * `prohibited`, and remembers whether its type was written or defaulted.
 */
interface AttributeEntry extends Omit<AttributeDecl, 'use'> {
  use: AttributeUse;
  typed: boolean;
}

interface ContentEntries {
  attributes: Map<string, AttributeEntry>;
  children: ChildElementDecl[];
}

function assertNever(value: never): never {
  throw new Error(`Unexpected content-model node: ${JSON.stringify(value)}`);
}

function tighterMax(a: Occurs, b: Occurs): Occurs {
  if (a === 'unbounded') return b;
  if (b === 'unbounded') return a;
  return Math.min(a, b);
}

function toAttributeDecl(entry: AttributeEntry): AttributeDecl {
  const use = entry.use === 'required' ? 'required' : 'optional';
  return Object.freeze({
    name: entry.name,
    namespace: entry.namespace,
    type: entry.type,
    use,
    ...(entry.default !== undefined ? { default: entry.default } : {}),
    ...(entry.fixed !== undefined ? { fixed: entry.fixed } : {}),
    description: entry.description,
    ...(entry.enumeration ? { enumeration: entry.enumeration } : {}),
  });
}

function freezeContent(entries: ContentEntries): ResolvedContent {
  const attributes = [...entries.attributes.values()]
    .filter((a) => a.use !== 'prohibited')
    .map(toAttributeDecl);
  return Object.freeze({
    attributes: Object.freeze(attributes),
    children: Object.freeze(entries.children.map((c) => Object.freeze(c))),
  });
}

function entriesOf(content: ResolvedContent): ContentEntries {
  return {
    attributes: new Map(
      content.attributes.map((a): [string, AttributeEntry] => [a.name, { ...a, typed: true }]),
    ),
    children: [...content.children],
  };
}

export interface WalkerOptions {
  logger?: Logger;
}

/**
 * Resolves the effective attribute set and child sequence of global elements,
 * following extension/restriction chains and expanding group references.
 *
 * Named complexTypes are memoised by Clark key; a walker belongs to one
 * registry and is discarded with it. Anonymous types of local elements are
 * resolved once the enclosing resolution has finished, so an element may
 * nest content of the type or group that declares it.
 */
export class SchemaWalker {
  private readonly memo = new Map<string, ResolvedContent>();
  private readonly anonymousMemo = new WeakMap<ComplexTypeBody, ResolvedContent>();
  /** Declarations currently being resolved, innermost last. */
  private readonly stack: Array<{ key: string; label: string }> = [];
  /** Anonymous child types waiting for the stack to empty. */
  private readonly deferred: Array<{ body: ComplexTypeBody; owner: string }> = [];
  private draining = false;
  private readonly log: Logger;

  constructor(
    private readonly registry: TypeRegistry,
    options: WalkerOptions = {},
  ) {
    this.log = options.logger ?? defaultLogger;
  }

  /**
   * Number of named complexTypes resolved so far.
   */
  get resolvedTypeCount(): number {
    return this.memo.size;
  }

  /**
   * Resolves a global element into its complete, inherited shape.
   */
  resolveElement(decl: ElementDeclaration): GlobalElementDecl {
    const { type, from } = this.elementType(decl);
    let content: ResolvedContent;
    if (from.type) {
      content = this.resolveType(from.type);
    } else if (from.inlineComplexType) {
      content = this.resolveAnonymous(from.inlineComplexType, from.name.prefixed);
    } else {
      content = EMPTY_CONTENT;
    }

    if (decl.substitutionGroup) {
      this.registry.lookup(decl.substitutionGroup, 'element');
    }
    this.settle();

    return Object.freeze({
      name: decl.name,
      type,
      abstract: decl.abstract,
      ...(decl.substitutionGroup ? { substitutionGroup: decl.substitutionGroup } : {}),
      description: decl.description,
      attributes: content.attributes,
      children: content.children,
    });
  }

  /**
   * Resolves a named type. Simple and built-in types have no attributes or children.
   *
   * @throws `UnresolvedReferenceError` when no complexType or simpleType has that name.
   * @throws `CyclicTypeError` when the derivation chain loops back to a type being resolved.
   */
  resolveType(ref: TypeRef): ResolvedContent {
    if (isAnyType(ref)) return EMPTY_CONTENT;

    const key = clarkKey(ref);
    const cached = this.memo.get(key);
    if (cached) return cached;

    const complexType = this.registry.find(ref, 'complexType');
    if (complexType) {
      const resolved = this.guarded(`complexType|${key}`, ref.prefixed, () =>
        this.resolveComplexType(complexType.body, ref.prefixed),
      );
      this.memo.set(key, resolved);
      this.settle();
      return resolved;
    }

    if (isBuiltInType(ref) || this.registry.has(ref, 'simpleType')) return EMPTY_CONTENT;
    throw new UnresolvedReferenceError(ref.prefixed, 'type');
  }

  /**
   * Resolves a complexType body: base first, then the type's own members.
   */
  private resolveComplexType(body: ComplexTypeBody, owner: string): ResolvedContent {
    const own = this.ownContent(body);
    const derivation = body.derivation;
    switch (derivation.kind) {
      case 'none':
        return freezeContent(own);
      case 'extension':
        return freezeContent(this.extend(this.resolveType(derivation.base), own));
      case 'restriction':
        // Restricting xs:anyType is the long form of a plain complexType.
        if (isAnyType(derivation.base)) return freezeContent(own);
        return freezeContent(this.restrict(this.resolveType(derivation.base), own, owner));
      default:
        return assertNever(derivation);
    }
  }

  /**
   * The declared type of a global element. An element without a type of its own
   * takes the type of its substitution-group head.
   */
  elementType(decl: ElementDeclaration): { type: DeclaredType; from: ElementDeclaration } {
    const seen: string[] = [];
    let current = decl;
    for (;;) {
      const key = clarkKey(current.name);
      const at = seen.indexOf(key);
      if (at >= 0) {
        throw new CyclicTypeError([...seen.slice(at), key].map((k) => this.labelOf(k)));
      }
      seen.push(key);

      if (current.type) return { type: { kind: 'ref', ref: current.type }, from: current };
      if (current.inlineComplexType) {
        return { type: { kind: 'inline', summary: ANONYMOUS_COMPLEX_TYPE }, from: current };
      }
      if (current.inlineSimpleType) {
        return { type: { kind: 'inline', summary: current.inlineSimpleType.summary }, from: current };
      }
      if (!current.substitutionGroup) {
        throw new MalformedDeclarationError(decl.name.prefixed, 'global element has no type reference');
      }
      current = this.registry.lookup(current.substitutionGroup, 'element');
    }
  }

  // -------------------------------------------------------------------------
  // Cycle guard
  // -------------------------------------------------------------------------

  private guarded<T>(key: string, label: string, resolve: () => T): T {
    const at = this.stack.findIndex((e) => e.key === key);
    if (at >= 0) {
      throw new CyclicTypeError([...this.stack.slice(at).map((e) => e.label), label]);
    }
    this.stack.push({ key, label });
    try {
      return resolve();
    } catch (err) {
      if (this.stack.length === 1) this.deferred.length = 0;
      throw err;
    } finally {
      this.stack.pop();
    }
  }

  /**
   * Resolves deferred anonymous child types once nothing is on the stack.
   */
  private settle(): void {
    if (this.stack.length > 0 || this.draining) return;
    this.draining = true;
    try {
      for (let next = this.deferred.shift(); next; next = this.deferred.shift()) {
        this.resolveAnonymous(next.body, next.owner);
      }
    } finally {
      this.deferred.length = 0;
      this.draining = false;
    }
  }

  private defer(body: ComplexTypeBody, owner: string): void {
    if (this.anonymousMemo.has(body) || this.deferred.some((d) => d.body === body)) return;
    this.deferred.push({ body, owner });
  }

  private labelOf(elementKey: string): string {
    for (const decl of this.registry.declarations('element')) {
      if (clarkKey(decl.name) === elementKey) return decl.name.prefixed;
    }
    return elementKey;
  }

  private resolveAnonymous(body: ComplexTypeBody, owner: string): ResolvedContent {
    const cached = this.anonymousMemo.get(body);
    if (cached) return cached;
    const resolved = this.resolveComplexType(body, owner);
    this.anonymousMemo.set(body, resolved);
    return resolved;
  }

  // -------------------------------------------------------------------------
  // Own members
  // -------------------------------------------------------------------------

  private ownContent(body: ComplexTypeBody): ContentEntries {
    const attributes = new Map<string, AttributeEntry>();
    this.expandAttributes(body.attributes, attributes);
    const children: ChildElementDecl[] = [];
    if (body.particle) this.collectChildren(body.particle, 'sequence', {}, children);
    return { attributes, children };
  }

  /**
   * Expands attributes and attributeGroup references in document order. A name
   * seen twice keeps its first position and takes the last definition.
   */
  private expandAttributes(nodes: readonly AttributeNode[], into: Map<string, AttributeEntry>): void {
    for (const node of nodes) {
      switch (node.kind) {
        case 'attribute':
        case 'attributeRef': {
          const entry = this.attributeEntry(node);
          into.set(entry.name, entry);
          break;
        }
        case 'attributeGroupRef': {
          const group = this.registry.lookup(node.ref, 'attributeGroup');
          this.guarded(`attributeGroup|${clarkKey(node.ref)}`, node.ref.prefixed, () =>
            this.expandAttributes(group.attributes, into),
          );
          break;
        }
        default:
          assertNever(node);
      }
    }
  }

  private attributeEntry(node: Exclude<AttributeNode, { kind: 'attributeGroupRef' }>): AttributeEntry {
    if (node.kind === 'attribute') {
      const type: DeclaredType = node.type
        ? { kind: 'ref', ref: node.type }
        : node.inlineSimpleType
          ? { kind: 'inline', summary: node.inlineSimpleType.summary }
          : { kind: 'ref', ref: ANY_SIMPLE_TYPE };
      return {
        name: node.name,
        namespace: node.namespace,
        type,
        use: node.use,
        default: node.default,
        fixed: node.fixed,
        description: node.description,
        enumeration: this.enumerationOf(node.type, node.inlineSimpleType),
        typed: node.type !== undefined || node.inlineSimpleType !== undefined,
      };
    }

    const global = this.registry.lookup(node.ref, 'attribute');
    return {
      name: global.name.localName,
      namespace: global.name.namespace,
      type: global.type
        ? { kind: 'ref', ref: global.type }
        : global.inlineSimpleType
          ? { kind: 'inline', summary: global.inlineSimpleType.summary }
          : { kind: 'ref', ref: ANY_SIMPLE_TYPE },
      use: node.use,
      default: node.default ?? global.default,
      fixed: node.fixed ?? global.fixed,
      description: node.description || global.description,
      enumeration: this.enumerationOf(global.type, global.inlineSimpleType),
      typed: true,
    };
  }

  /**
   * Enumeration values of an attribute type, following named restriction bases.
   */
  private enumerationOf(
    ref: TypeRef | undefined,
    inline: SimpleTypeBody | undefined,
  ): readonly EnumerationValue[] | undefined {
    if (inline && inline.enumeration.length > 0) return inline.enumeration;
    const visited = new Set<string>();
    let next = inline ? inline.base : ref;

    while (next && !isBuiltInType(next)) {
      const key = clarkKey(next);
      if (visited.has(key)) {
        throw new CyclicTypeError([...visited, key]);
      }
      visited.add(key);
      const simpleType = this.registry.find(next, 'simpleType');
      if (!simpleType) {
        if (this.registry.has(next, 'complexType')) return undefined;
        throw new UnresolvedReferenceError(next.prefixed, 'simpleType');
      }
      const body = simpleType.body;
      if (body.enumeration.length > 0) return body.enumeration;
      next = body.base;
    }
    return undefined;
  }

  /**
   * Flattens a content model into `out`, tagging each element with the
   * compositor that immediately encloses it. Bounds written on the nearest
   * enclosing sequence or choice replace the element's own; a group
   * reference's bounds apply to the group's compositor.
   */
  private collectChildren(
    node: ParticleNode,
    enclosing: Compositor,
    bounds: Partial<Cardinality>,
    out: ChildElementDecl[],
  ): void {
    switch (node.kind) {
      case 'element':
      case 'elementRef':
        out.push(this.childDecl(node, enclosing === 'choice', bounds));
        return;
      case 'modelGroup': {
        const inner = node.compositor === 'all' ? bounds : node.statedOccurs;
        for (const particle of node.particles) {
          this.collectChildren(particle, node.compositor, inner, out);
        }
        return;
      }
      case 'groupRef': {
        const group = this.registry.lookup(node.ref, 'group');
        const particle = group.particle;
        if (!particle) return;
        const target: ParticleNode =
          particle.kind === 'modelGroup'
            ? { ...particle, statedOccurs: { ...particle.statedOccurs, ...node.statedOccurs } }
            : particle;
        this.guarded(`group|${clarkKey(node.ref)}`, node.ref.prefixed, () =>
          this.collectChildren(target, enclosing, { ...bounds, ...node.statedOccurs }, out),
        );
        return;
      }
      case 'any':
        return;
      default:
        assertNever(node);
    }
  }

  private childDecl(
    node: Extract<ParticleNode, { kind: 'element' | 'elementRef' }>,
    isChoice: boolean,
    bounds: Partial<Cardinality>,
  ): ChildElementDecl {
    const min = bounds.minOccurs ?? node.cardinality.minOccurs;
    const max = bounds.maxOccurs ?? node.cardinality.maxOccurs;

    if (node.kind === 'elementRef') {
      const global = this.registry.lookup(node.ref, 'element');
      return {
        name: global.name.localName,
        namespace: global.name.namespace,
        type: this.elementType(global).type,
        minOccurs: min,
        maxOccurs: max,
        isChoice,
        description: node.description || global.description,
        reference: global.name,
      };
    }

    let type: DeclaredType;
    if (node.type) {
      this.checkTypeExists(node.type);
      type = { kind: 'ref', ref: node.type };
    } else if (node.inlineComplexType) {
      this.defer(node.inlineComplexType, node.name);
      type = { kind: 'inline', summary: ANONYMOUS_COMPLEX_TYPE };
    } else if (node.inlineSimpleType) {
      type = { kind: 'inline', summary: node.inlineSimpleType.summary };
    } else {
      throw new MalformedDeclarationError(node.name, 'child element has no type reference');
    }

    return {
      name: node.name,
      namespace: node.namespace,
      type,
      minOccurs: min,
      maxOccurs: max,
      isChoice,
      description: node.description,
    };
  }

  private checkTypeExists(ref: TypeRef): void {
    if (isBuiltInType(ref)) return;
    if (this.registry.has(ref, 'complexType') || this.registry.has(ref, 'simpleType')) return;
    throw new UnresolvedReferenceError(ref.prefixed, 'type');
  }

  // -------------------------------------------------------------------------
  // Derivation
  // -------------------------------------------------------------------------

  /**
   * Extension: own members after the base's. A redeclared attribute replaces the
   * inherited one in place; a prohibited one removes it.
   */
  private extend(base: ResolvedContent, own: ContentEntries): ContentEntries {
    const merged = entriesOf(base);
    for (const attribute of own.attributes.values()) {
      if (attribute.use === 'prohibited') merged.attributes.delete(attribute.name);
      else merged.attributes.set(attribute.name, attribute);
    }
    merged.children.push(...own.children);
    return merged;
  }

  /**
   * Restriction: members may only narrow their base counterpart. Attributes not
   * mentioned are inherited; children are the restriction's own particles.
   */
  private restrict(base: ResolvedContent, own: ContentEntries, owner: string): ContentEntries {
    const merged = entriesOf(base);

    for (const attribute of own.attributes.values()) {
      const inherited = merged.attributes.get(attribute.name);
      if (!inherited) {
        this.log.warn(`${owner}: restriction drops attribute "${attribute.name}" absent from the base type`);
        continue;
      }
      if (attribute.use === 'prohibited') {
        merged.attributes.delete(attribute.name);
        continue;
      }
      merged.attributes.set(attribute.name, {
        ...inherited,
        type: attribute.typed ? attribute.type : inherited.type,
        use: inherited.use === 'required' || attribute.use === 'required' ? 'required' : 'optional',
        default: attribute.default ?? inherited.default,
        fixed: attribute.fixed ?? inherited.fixed,
        description: attribute.description || inherited.description,
        enumeration: attribute.enumeration ?? inherited.enumeration,
      });
    }

    const pending = new Map<string, ChildElementDecl[]>();
    for (const child of base.children) {
      const list = pending.get(child.name) ?? [];
      list.push(child);
      pending.set(child.name, list);
    }

    const children: ChildElementDecl[] = [];
    for (const child of own.children) {
      const counterpart = pending.get(child.name)?.shift();
      if (!counterpart) {
        this.log.warn(`${owner}: restriction drops child "${child.name}" absent from the base type`);
        continue;
      }
      const lower = Math.max(child.minOccurs, counterpart.minOccurs);
      const upper = tighterMax(child.maxOccurs, counterpart.maxOccurs);
      if (upper !== 'unbounded' && lower > upper) {
        throw new MalformedDeclarationError(
          owner,
          `restriction of "${child.name}" to [${lower}, ${upper}] is outside the base cardinality`,
        );
      }
      children.push({
        ...counterpart,
        type: child.type,
        minOccurs: lower,
        maxOccurs: upper,
        isChoice: child.isChoice,
        description: child.description || counterpart.description,
      });
    }

    return { attributes: merged.attributes, children };
  }
}
