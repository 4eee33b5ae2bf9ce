import type { SchemaModel } from './model.js';
import { clarkKey, declaredTypeKey, formatDeclaredType } from './xsd/names.js';
import type {
  AttributeDecl,
  ChildElementDecl,
  DeclaredType,
  GlobalElementDecl,
  TypeRef,
} from './xsd/types.js';

export type AttributeField = 'use' | 'default' | 'fixed' | 'type';
export type ChildField = 'minOccurs' | 'maxOccurs' | 'isChoice' | 'type';
export type ElementField = 'type' | 'abstract' | 'substitutionGroup';

/** Display value of a field. Types appear as their prefixed name or inline summary. */
export type FieldValue = string | number | boolean | undefined;

/**
 * One field-level difference of an element present in both models.
 * `occurrence` counts same-named children from 0, in declaration order.
 */
export type FieldChange =
  | { kind: 'elementChanged'; field: ElementField; before: FieldValue; after: FieldValue }
  | { kind: 'attributeAdded'; name: string; attribute: AttributeDecl }
  | { kind: 'attributeRemoved'; name: string; attribute: AttributeDecl }
  | { kind: 'attributeChanged'; name: string; field: AttributeField; before: FieldValue; after: FieldValue }
  | { kind: 'childAdded'; name: string; occurrence: number; child: ChildElementDecl }
  | { kind: 'childRemoved'; name: string; occurrence: number; child: ChildElementDecl }
  | {
      kind: 'childChanged';
      name: string;
      occurrence: number;
      field: ChildField;
      before: FieldValue;
      after: FieldValue;
    };

export interface ModifiedElement {
  /** Clark key of the element. */
  readonly key: string;
  readonly name: TypeRef;
  readonly changes: readonly FieldChange[];
}

export interface SchemaChangeSet {
  /** Elements only in the new model, in its order. */
  readonly added: readonly GlobalElementDecl[];
  /** Elements only in the old model, in its order. */
  readonly removed: readonly GlobalElementDecl[];
  /** Elements in both with at least one field change, in the old model's order. */
  readonly modified: readonly ModifiedElement[];
}

interface Comparable {
  /** Identity used for equality. */
  key: string | number | boolean | undefined;
  display: FieldValue;
}

function plain(value: string | number | boolean | undefined): Comparable {
  return { key: value, display: value };
}

function typeValue(type: DeclaredType): Comparable {
  return { key: declaredTypeKey(type), display: formatDeclaredType(type) };
}

function refValue(ref: TypeRef | undefined): Comparable {
  return { key: ref ? clarkKey(ref) : undefined, display: ref?.prefixed };
}

function compareFields<F extends string>(
  fields: ReadonlyArray<readonly [F, Comparable, Comparable]>,
  emit: (field: F, before: FieldValue, after: FieldValue) => void,
): void {
  for (const [field, before, after] of fields) {
    if (before.key !== after.key) emit(field, before.display, after.display);
  }
}

/**
 * Children keyed by name and occurrence: the second `Plate` is `Plate#1`.
 */
function keyedChildren(children: readonly ChildElementDecl[]): Map<string, { child: ChildElementDecl; occurrence: number }> {
  const seen = new Map<string, number>();
  const keyed = new Map<string, { child: ChildElementDecl; occurrence: number }>();
  for (const child of children) {
    const occurrence = seen.get(child.name) ?? 0;
    seen.set(child.name, occurrence + 1);
    keyed.set(`${child.name}#${occurrence}`, { child, occurrence });
  }
  return keyed;
}

function elementChanges(before: GlobalElementDecl, after: GlobalElementDecl): FieldChange[] {
  const changes: FieldChange[] = [];

  compareFields<ElementField>(
    [
      ['type', typeValue(before.type), typeValue(after.type)],
      ['abstract', plain(before.abstract), plain(after.abstract)],
      ['substitutionGroup', refValue(before.substitutionGroup), refValue(after.substitutionGroup)],
    ],
    (field, b, a) => changes.push({ kind: 'elementChanged', field, before: b, after: a }),
  );

  const newAttributes = new Map(after.attributes.map((a): [string, AttributeDecl] => [a.name, a]));
  const oldNames = new Set(before.attributes.map((a) => a.name));
  for (const attribute of before.attributes) {
    const counterpart = newAttributes.get(attribute.name);
    if (!counterpart) {
      changes.push({ kind: 'attributeRemoved', name: attribute.name, attribute });
      continue;
    }
    compareFields<AttributeField>(
      [
        ['use', plain(attribute.use), plain(counterpart.use)],
        ['default', plain(attribute.default), plain(counterpart.default)],
        ['fixed', plain(attribute.fixed), plain(counterpart.fixed)],
        ['type', typeValue(attribute.type), typeValue(counterpart.type)],
      ],
      (field, b, a) => changes.push({ kind: 'attributeChanged', name: attribute.name, field, before: b, after: a }),
    );
  }
  for (const attribute of after.attributes) {
    if (!oldNames.has(attribute.name)) {
      changes.push({ kind: 'attributeAdded', name: attribute.name, attribute });
    }
  }

  const oldChildren = keyedChildren(before.children);
  const newChildren = keyedChildren(after.children);
  for (const [key, { child, occurrence }] of oldChildren) {
    const counterpart = newChildren.get(key)?.child;
    if (!counterpart) {
      changes.push({ kind: 'childRemoved', name: child.name, occurrence, child });
      continue;
    }
    compareFields<ChildField>(
      [
        ['minOccurs', plain(child.minOccurs), plain(counterpart.minOccurs)],
        ['maxOccurs', plain(child.maxOccurs), plain(counterpart.maxOccurs)],
        ['isChoice', plain(child.isChoice), plain(counterpart.isChoice)],
        ['type', typeValue(child.type), typeValue(counterpart.type)],
      ],
      (field, b, a) =>
        changes.push({ kind: 'childChanged', name: child.name, occurrence, field, before: b, after: a }),
    );
  }
  for (const [key, { child, occurrence }] of newChildren) {
    if (!oldChildren.has(key)) {
      changes.push({ kind: 'childAdded', name: child.name, occurrence, child });
    }
  }

  return changes;
}

/**
 * Compares the resolved global elements of two schema versions. Names and
 * types compare by namespace URI and local name, so a renamed prefix is not a change.
 */
export function diff(before: SchemaModel, after: SchemaModel): SchemaChangeSet {
  const added: GlobalElementDecl[] = [];
  const removed: GlobalElementDecl[] = [];
  const modified: ModifiedElement[] = [];

  for (const [key, element] of before.elements) {
    const counterpart = after.elements.get(key);
    if (!counterpart) {
      removed.push(element);
      continue;
    }
    const changes = elementChanges(element, counterpart);
    if (changes.length > 0) {
      modified.push(Object.freeze({ key, name: element.name, changes: Object.freeze(changes) }));
    }
  }
  for (const [key, element] of after.elements) {
    if (!before.elements.has(key)) added.push(element);
  }

  return Object.freeze({
    added: Object.freeze(added),
    removed: Object.freeze(removed),
    modified: Object.freeze(modified),
  });
}

export function isEmptyChangeSet(changes: SchemaChangeSet): boolean {
  return changes.added.length === 0 && changes.removed.length === 0 && changes.modified.length === 0;
}

function show(value: FieldValue): string {
  return value === undefined ? '(none)' : String(value);
}

/**
 * One-line description of a change, e.g. `child CutBy: minOccurs 0 -> 1`.
 */
export function describeChange(change: FieldChange): string {
  switch (change.kind) {
    case 'elementChanged':
      return `${change.field} ${show(change.before)} -> ${show(change.after)}`;
    case 'attributeAdded':
      return `attribute ${change.name} added`;
    case 'attributeRemoved':
      return `attribute ${change.name} removed`;
    case 'attributeChanged':
      return `attribute ${change.name}: ${change.field} ${show(change.before)} -> ${show(change.after)}`;
    case 'childAdded':
      return `child ${change.name} added`;
    case 'childRemoved':
      return `child ${change.name} removed`;
    case 'childChanged':
      return `child ${change.name}: ${change.field} ${show(change.before)} -> ${show(change.after)}`;
  }
}
