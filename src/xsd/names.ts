import { MalformedDeclarationError, UnresolvedReferenceError } from '../errors.js';
import type { XmlNode } from '../xml/tree.js';
import type { DeclaredType, TypeRef } from './types.js';

export const XSD_NAMESPACE = 'http://www.w3.org/2001/XMLSchema';

/**
 * Clark notation `{namespace}localName`, the prefix-independent identity of a name.
 */
export function clarkKey(ref: Pick<TypeRef, 'namespace' | 'localName'>): string {
  return `{${ref.namespace}}${ref.localName}`;
}

/**
 * Resolves a QName-valued attribute (`type`, `ref`, `base`, `substitutionGroup`)
 * against the prefixes in scope at `node`. Unprefixed names take the default
 * namespace, or no namespace when none is declared.
 */
export function resolveQName(value: string, node: XmlNode): TypeRef {
  const trimmed = value.trim();
  const i = trimmed.indexOf(':');
  const prefix = i < 0 ? '' : trimmed.slice(0, i);
  const localName = i < 0 ? trimmed : trimmed.slice(i + 1);
  if (!localName) {
    throw new MalformedDeclarationError(value, 'empty qualified name');
  }

  const namespace = node.namespaces.get(prefix);
  if (namespace === undefined) {
    if (prefix) throw new UnresolvedReferenceError(trimmed, 'namespace');
    return { prefixed: trimmed, namespace: '', localName };
  }
  return { prefixed: trimmed, namespace, localName };
}

/**
 * Reads an optional QName attribute of `node`.
 */
export function qnameAttr(node: XmlNode, name: string): TypeRef | undefined {
  const value = node.attr(name);
  return value ? resolveQName(value, node) : undefined;
}

/**
 * Display form of a declared type: the prefixed name, or the inline summary.
 */
export function formatDeclaredType(type: DeclaredType): string {
  return type.kind === 'ref' ? type.ref.prefixed : type.summary;
}

/**
 * Identity of a declared type for comparisons. Refs compare by Clark key.
 */
export function declaredTypeKey(type: DeclaredType): string {
  return type.kind === 'ref' ? clarkKey(type.ref) : `inline:${type.summary}`;
}
