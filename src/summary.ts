import type { SchemaModel } from './model.js';
import { DECLARATION_CATEGORIES } from './xsd/registry.js';
import type { DeclarationCategory } from './xsd/types.js';

export const UNKNOWN_VERSION = 'unknown';

export type SummaryRow = readonly [label: string, value: string | number];

export interface SchemaSummary {
  readonly version: string;
  readonly targetNamespace: string;
  readonly counts: Readonly<Record<DeclarationCategory, number>>;
  /** Prefix → URI as declared by the documents, in document order. */
  readonly namespaces: ReadonlyArray<readonly [string, string]>;
  /** Everything above as display rows: version, counts, then namespaces. */
  readonly rows: readonly SummaryRow[];
}

/**
 * Statistics of a resolved model. A schema without a version reports `unknown`.
 */
export function summarize(model: SchemaModel): SchemaSummary {
  const version = model.version ?? UNKNOWN_VERSION;
  const { registry } = model;
  const counts: Record<DeclarationCategory, number> = {
    element: registry.count('element'),
    attribute: registry.count('attribute'),
    complexType: registry.count('complexType'),
    simpleType: registry.count('simpleType'),
    attributeGroup: registry.count('attributeGroup'),
    group: registry.count('group'),
  };
  const namespaces = model.namespaces.declared;

  const rows: SummaryRow[] = [
    ['Schema version', version],
    ['Target namespace', model.targetNamespace],
    // Category counts keep registry order.
    ...DECLARATION_CATEGORIES.map((c): SummaryRow => [c, counts[c]]),
    ...namespaces.map(([prefix, uri]): SummaryRow => [prefix ? `xmlns:${prefix}` : 'xmlns', uri]),
  ];

  return Object.freeze({
    version,
    targetNamespace: model.targetNamespace,
    counts: Object.freeze(counts),
    namespaces,
    rows: Object.freeze(rows),
  });
}
