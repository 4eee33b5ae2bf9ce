import { CyclicTypeError, UnresolvedReferenceError } from '../errors.js';
import { clarkKey } from './names.js';
import type { GlobalElementDecl, TypeRef } from './types.js';

/**
 * Substitution sets of every head element, keyed by the head's Clark key.
 */
export class SubstitutionGroups {
  constructor(
    private readonly members: ReadonlyMap<string, readonly TypeRef[]>,
    private readonly heads: ReadonlyMap<string, readonly TypeRef[]>,
  ) {}

  /**
   * Elements that may stand in for `head`, directly or transitively.
   */
  membersOf(head: TypeRef): readonly TypeRef[] {
    return this.members.get(clarkKey(head)) ?? [];
  }

  /**
   * Every head `element` may stand in for, nearest first.
   */
  substitutesFor(element: TypeRef): readonly TypeRef[] {
    return this.heads.get(clarkKey(element)) ?? [];
  }

  isHead(element: TypeRef): boolean {
    return this.members.has(clarkKey(element));
  }

  /**
   * Head keys in declaration order.
   */
  get headKeys(): string[] {
    return [...this.members.keys()];
  }
}

/**
 * Builds substitution sets from the `substitutionGroup` links of all global
 * elements: a reverse adjacency list, then depth-first reachability from each head.
 *
 * @param elements - Global elements keyed by Clark key, in declaration order.
 * @throws `UnresolvedReferenceError` when a head is not a global element.
 * @throws `CyclicTypeError` when substitution links form a loop.
 */
export function resolveSubstitutionGroups(
  elements: ReadonlyMap<string, GlobalElementDecl>,
): SubstitutionGroups {
  const direct = new Map<string, TypeRef[]>();
  for (const element of elements.values()) {
    const head = element.substitutionGroup;
    if (!head) continue;
    const headKey = clarkKey(head);
    if (!elements.has(headKey)) {
      throw new UnresolvedReferenceError(head.prefixed, 'element');
    }
    const list = direct.get(headKey) ?? [];
    list.push(element.name);
    direct.set(headKey, list);
  }

  // Walk each element's head chain once so a loop is reported with its members.
  const heads = new Map<string, TypeRef[]>();
  for (const [key, element] of elements) {
    const chain: TypeRef[] = [];
    const seen = [key];
    let head = element.substitutionGroup;
    while (head) {
      const headKey = clarkKey(head);
      const at = seen.indexOf(headKey);
      if (at >= 0) {
        const labels = [element.name, ...chain].map((r) => r.prefixed);
        throw new CyclicTypeError([...labels.slice(at), labels[at]]);
      }
      seen.push(headKey);
      chain.push(head);
      head = elements.get(headKey)?.substitutionGroup;
    }
    if (chain.length > 0) heads.set(key, chain);
  }

  const members = new Map<string, TypeRef[]>();
  for (const headKey of elements.keys()) {
    if (!direct.has(headKey)) continue;
    const reached: TypeRef[] = [];
    const visited = new Set<string>();
    const visit = (key: string): void => {
      for (const member of direct.get(key) ?? []) {
        const memberKey = clarkKey(member);
        if (visited.has(memberKey)) continue;
        visited.add(memberKey);
        reached.push(member);
        visit(memberKey);
      }
    };
    visit(headKey);
    members.set(headKey, reached);
  }

  return new SubstitutionGroups(members, heads);
}
