import { resolveModelOptions } from './config.js';
import type { ModelOptions } from './config.js';
import { SchemaModelError, UnresolvedReferenceError } from './errors.js';
import { logger as defaultLogger } from './logger.js';
import type { Logger } from './logger.js';
import { resolveLocation } from './source/schema-source.js';
import { XML_NAMESPACE } from './xml/tree.js';
import { clarkKey } from './xsd/names.js';
import { findSchemaChanges, parseDeclarations, parseSchemaDocument } from './xsd/parser.js';
import type { SchemaDocument } from './xsd/parser.js';
import { TypeRegistry } from './xsd/registry.js';
import { resolveSubstitutionGroups } from './xsd/substitution.js';
import type { SubstitutionGroups } from './xsd/substitution.js';
import type { GlobalElementDecl, SchemaChange, TypeRef } from './xsd/types.js';
import { SchemaWalker } from './xsd/walker.js';

// ---------------------------------------------------------------------------
// Namespace table
// ---------------------------------------------------------------------------

/**
 * Prefix → namespace URI bindings of a schema, in document order, with the
 * target namespace and version of the main document.
 */
export class NamespaceTable {
  private readonly bindings: ReadonlyArray<readonly [string, string]>;
  private readonly implicit: ReadonlySet<string>;

  /**
   * @param implicit - Prefixes bound without any document declaring them.
   */
  constructor(
    bindings: Iterable<readonly [string, string]>,
    public readonly targetNamespace: string,
    public readonly version?: string,
    implicit: Iterable<string> = [],
  ) {
    this.bindings = Object.freeze([...bindings]);
    this.implicit = new Set(implicit);
    Object.freeze(this);
  }

  /**
   * Merges the bindings of every document. `xml` comes first, implicitly
   * unless a document declares it; a prefix bound twice keeps its first URI.
   */
  static fromDocuments(documents: readonly SchemaDocument[], log: Logger = defaultLogger): NamespaceTable {
    const bound = new Map<string, string>([['xml', XML_NAMESPACE]]);
    const declaresXml = documents.some((doc) => doc.namespaces.some(([prefix]) => prefix === 'xml'));
    for (const doc of documents) {
      for (const [prefix, uri] of doc.namespaces) {
        const existing = bound.get(prefix);
        if (existing === undefined) {
          bound.set(prefix, uri);
        } else if (existing !== uri) {
          log.warn(`${doc.location}: prefix "${prefix}" already bound to ${existing}, ignoring ${uri}`);
        }
      }
    }
    const main = documents[0];
    return new NamespaceTable(bound, main?.targetNamespace ?? '', main?.version, declaresXml ? [] : ['xml']);
  }

  get entries(): ReadonlyArray<readonly [string, string]> {
    return this.bindings;
  }

  /**
   * Bindings some document declares, in document order.
   */
  get declared(): ReadonlyArray<readonly [string, string]> {
    return this.bindings.filter(([prefix]) => !this.implicit.has(prefix));
  }

  get size(): number {
    return this.bindings.length;
  }

  uriFor(prefix: string): string | undefined {
    return this.bindings.find(([p]) => p === prefix)?.[1];
  }

  /**
   * First prefix bound to `uri`. Named prefixes are preferred over the default one.
   */
  prefixFor(uri: string): string | undefined {
    const prefixes = this.bindings.filter(([, u]) => u === uri).map(([p]) => p);
    return prefixes.find((p) => p !== '') ?? prefixes[0];
  }
}

// ---------------------------------------------------------------------------
// Model
// ---------------------------------------------------------------------------

/**
 * The resolved form of one schema version. Immutable once built.
 */
export class SchemaModel {
  constructor(
    public readonly namespaces: NamespaceTable,
    public readonly registry: TypeRegistry,
    /** Global elements keyed by Clark key, in declaration order. */
    public readonly elements: ReadonlyMap<string, GlobalElementDecl>,
    public readonly substitutions: SubstitutionGroups,
    public readonly changes: readonly SchemaChange[],
    /** Locations of the documents the model was built from, main document first. */
    public readonly documents: readonly string[],
    private readonly walker: SchemaWalker,
  ) {
    Object.freeze(this);
  }

  get version(): string | undefined {
    return this.namespaces.version;
  }

  get targetNamespace(): string {
    return this.namespaces.targetNamespace;
  }

  elementList(): GlobalElementDecl[] {
    return [...this.elements.values()];
  }

  /**
   * Finds a global element by `TypeRef`, Clark key (`{uri}Panel`), prefixed
   * name (`ocx:Panel`) or bare local name in the target namespace.
   */
  getElement(name: string | TypeRef): GlobalElementDecl | undefined {
    return this.elements.get(this.keyOf(name) ?? '');
  }

  elementsNamed(localName: string): GlobalElementDecl[] {
    return this.elementList().filter((e) => e.name.localName === localName);
  }

  /**
   * Global elements with a child that refers to the named global element, in
   * declaration order.
   *
   * @throws `UnresolvedReferenceError` when no such global element exists.
   */
  parentsOf(name: string | TypeRef): GlobalElementDecl[] {
    const key = this.keyOf(name);
    if (key === undefined || !this.elements.has(key)) {
      throw new UnresolvedReferenceError(typeof name === 'string' ? name : name.prefixed, 'element');
    }
    return this.elementList().filter((parent) =>
      parent.children.some((child) => child.reference !== undefined && clarkKey(child.reference) === key),
    );
  }

  /**
   * Resolves a global element again from its declaration. Gives a result equal
   * to the one held in `elements`.
   *
   * @throws `UnresolvedReferenceError` when no such global element exists.
   */
  resolveElement(name: string | TypeRef): GlobalElementDecl {
    const key = this.keyOf(name);
    const declaration = this.registry
      .declarations('element')
      .find((d) => clarkKey(d.name) === key);
    if (!declaration) {
      throw new UnresolvedReferenceError(typeof name === 'string' ? name : name.prefixed, 'element');
    }
    return this.walker.resolveElement(declaration);
  }

  private keyOf(name: string | TypeRef): string | undefined {
    if (typeof name !== 'string') return clarkKey(name);
    if (name.startsWith('{')) return name;
    const i = name.indexOf(':');
    if (i < 0) return clarkKey({ namespace: this.targetNamespace, localName: name });
    const namespace = this.namespaces.uriFor(name.slice(0, i));
    return namespace === undefined ? undefined : clarkKey({ namespace, localName: name.slice(i + 1) });
  }
}

export interface BuildOptions {
  logger?: Logger;
}

/**
 * Registers every declaration of every document, then resolves all
 * complexTypes, global elements and substitution groups.
 *
 * @param documents - Parsed documents, main document first.
 * @throws `UnresolvedReferenceError`, `CyclicTypeError` or `MalformedDeclarationError`
 *   when the schema is inconsistent; no partial model is returned.
 */
export function buildSchemaModel(documents: readonly SchemaDocument[], options: BuildOptions = {}): SchemaModel {
  const log = options.logger ?? defaultLogger;
  if (documents.length === 0) {
    throw new SchemaModelError('No schema documents to build a model from');
  }

  const registry = new TypeRegistry();
  for (const doc of documents) {
    const declarations = parseDeclarations(doc);
    declarations.forEach((d) => registry.register(d));
    log.debug(`Registered ${declarations.length} declarations from ${doc.location}`);
  }

  const walker = new SchemaWalker(registry, { logger: log });
  for (const complexType of registry.declarations('complexType')) {
    walker.resolveType(complexType.name);
  }

  const elements = new Map<string, GlobalElementDecl>();
  for (const declaration of registry.declarations('element')) {
    elements.set(clarkKey(declaration.name), walker.resolveElement(declaration));
  }
  const substitutions = resolveSubstitutionGroups(elements);
  log.debug(`Resolved ${elements.size} global elements (${walker.resolvedTypeCount} complexTypes)`);

  return new SchemaModel(
    NamespaceTable.fromDocuments(documents, log),
    registry,
    elements,
    substitutions,
    Object.freeze(documents.flatMap(findSchemaChanges)),
    Object.freeze(documents.map((d) => d.location)),
    walker,
  );
}

/**
 * Builds a model from the text of a single, self-contained schema document.
 */
export function parseSchemaModel(content: string, location = 'schema.xsd', options: BuildOptions = {}): SchemaModel {
  return buildSchemaModel([parseSchemaDocument(content, location)], options);
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/**
 * Loads the document at `location` and, unless `followImports` is false,
 * every document it imports or includes, transitively. Each location is
 * loaded once.
 *
 * @throws `SchemaSourceError` when any document cannot be loaded or parsed.
 */
export async function loadSchemaDocuments(
  location: string,
  options: ModelOptions = {},
): Promise<SchemaDocument[]> {
  const { source, followImports, logger: log } = resolveModelOptions(options);
  const documents: SchemaDocument[] = [];
  const visited = new Set<string>();

  const visit = async (target: string, inheritedNamespace?: string): Promise<void> => {
    if (visited.has(target)) return;
    visited.add(target);

    const loaded = await source.load(target);
    const doc = parseSchemaDocument(loaded.content, loaded.location, inheritedNamespace);
    documents.push(doc);
    log.debug(`Loaded ${loaded.location} (targetNamespace "${doc.targetNamespace}")`);

    if (!followImports) return;
    for (const reference of doc.references) {
      const next = resolveLocation(reference.schemaLocation, loaded.location);
      await visit(next, reference.kind === 'include' ? doc.targetNamespace : undefined);
    }
  };

  await visit(resolveLocation(location));
  return documents;
}

/**
 * Loads and resolves the schema at `location`.
 */
export async function loadSchemaModel(location: string, options: ModelOptions = {}): Promise<SchemaModel> {
  const resolved = resolveModelOptions(options);
  try {
    const documents = await loadSchemaDocuments(location, resolved);
    return buildSchemaModel(documents, { logger: resolved.logger });
  } catch (err) {
    resolved.logger.error(`Cannot build schema model from ${location}: ${err instanceof Error ? err.message : String(err)}`);
    throw err;
  }
}
