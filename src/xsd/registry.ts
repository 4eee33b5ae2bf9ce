import { MalformedDeclarationError, UnresolvedReferenceError } from '../errors.js';
import { xmlNamespaceAttribute } from './builtins.js';
import { clarkKey } from './names.js';
import type { DeclarationCategory, DeclarationOf, SchemaDeclaration, TypeRef } from './types.js';

export const DECLARATION_CATEGORIES: readonly DeclarationCategory[] = [
  'element',
  'attribute',
  'complexType',
  'simpleType',
  'attributeGroup',
  'group',
];

function registryKey(category: DeclarationCategory, ref: Pick<TypeRef, 'namespace' | 'localName'>): string {
  return `${category}|${clarkKey(ref)}`;
}

/**
 * Index of every top-level declaration of one schema version, keyed by
 * (namespace URI, local name, category).
 *
 * All names are registered before any body is resolved, so declarations may
 * reference each other in any document order. Lookups are pure.
 */
export class TypeRegistry {
  private readonly entries = new Map<string, SchemaDeclaration>();
  private readonly byCategory = new Map<DeclarationCategory, SchemaDeclaration[]>(
    DECLARATION_CATEGORIES.map((c): [DeclarationCategory, SchemaDeclaration[]] => [c, []]),
  );

  /**
   * Inserts a top-level declaration.
   *
   * @throws `MalformedDeclarationError` when the same name is already declared in that category.
   */
  register(declaration: SchemaDeclaration): void {
    const key = registryKey(declaration.category, declaration.name);
    const existing = this.entries.get(key);
    if (existing) {
      throw new MalformedDeclarationError(
        declaration.name.prefixed,
        `duplicate ${declaration.category} (also declared in ${existing.source})`,
      );
    }
    this.entries.set(key, declaration);
    this.byCategory.get(declaration.category)?.push(declaration);
  }

  find<C extends DeclarationCategory>(ref: TypeRef, category: C): DeclarationOf<C> | undefined {
    const found = this.entries.get(registryKey(category, ref));
    return found && isCategory(found, category) ? found : undefined;
  }

  /**
   * Returns the declaration `ref` names in `category`.
   *
   * @throws `UnresolvedReferenceError` naming the reference when it is not declared.
   */
  lookup<C extends DeclarationCategory>(ref: TypeRef, category: C): DeclarationOf<C> {
    const found = this.find(ref, category);
    if (found) return found;
    if (category === 'attribute') {
      const predefined = xmlNamespaceAttribute(ref);
      if (predefined && isCategory(predefined, category)) return predefined;
    }
    throw new UnresolvedReferenceError(ref.prefixed, category);
  }

  has(ref: TypeRef, category: DeclarationCategory): boolean {
    return this.entries.has(registryKey(category, ref));
  }

  /**
   * Declarations of one category in registration order.
   */
  declarations<C extends DeclarationCategory>(category: C): DeclarationOf<C>[] {
    const list = this.byCategory.get(category) ?? [];
    return list.filter((d): d is DeclarationOf<C> => isCategory(d, category));
  }

  count(category: DeclarationCategory): number {
    return this.byCategory.get(category)?.length ?? 0;
  }

  get size(): number {
    return this.entries.size;
  }
}

function isCategory<C extends DeclarationCategory>(
  declaration: SchemaDeclaration,
  category: C,
): declaration is DeclarationOf<C> {
  return declaration.category === category;
}
