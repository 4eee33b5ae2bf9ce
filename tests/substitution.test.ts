import { describe, expect, it } from 'vitest';
import { CyclicTypeError, UnresolvedReferenceError } from '../src/errors.js';
import { OCX, captureError, inlineModel, panelModel } from './helpers.js';

function ocx(localName: string) {
  return { prefixed: `ocx:${localName}`, namespace: OCX, localName };
}

describe('resolveSubstitutionGroups', () => {
  const { substitutions, elements } = panelModel();

  it('lists direct and transitive members in depth-first order', () => {
    expect(substitutions.membersOf(ocx('StructurePart')).map((r) => r.prefixed)).toEqual([
      'ocx:Stiffener',
      'ocx:Bracket',
      'ocx:ThinPlate',
    ]);
    expect(substitutions.membersOf(ocx('Stiffener')).map((r) => r.prefixed)).toEqual(['ocx:Bracket']);
    expect(substitutions.membersOf(ocx('Panel'))).toEqual([]);
  });

  it('lists the heads an element may stand in for, nearest first', () => {
    expect(substitutions.substitutesFor(ocx('Bracket')).map((r) => r.prefixed)).toEqual([
      'ocx:Stiffener',
      'ocx:StructurePart',
    ]);
    expect(substitutions.substitutesFor(ocx('Vessel'))).toEqual([]);
  });

  it('knows the heads in declaration order', () => {
    expect(substitutions.headKeys).toEqual([`{${OCX}}StructurePart`, `{${OCX}}Stiffener`]);
    expect(substitutions.isHead(ocx('Stiffener'))).toBe(true);
    expect(substitutions.isHead(ocx('Bracket'))).toBe(false);
  });

  it('is transitive', () => {
    for (const element of elements.values()) {
      for (const head of substitutions.substitutesFor(element.name)) {
        expect(substitutions.membersOf(head).map((r) => r.localName)).toContain(element.name.localName);
      }
    }
  });

  it('reports a substitution loop with its members', () => {
    const error = captureError(() =>
      inlineModel(`
        <xs:element name="a" type="xs:string" substitutionGroup="t:b"/>
        <xs:element name="b" type="xs:string" substitutionGroup="t:a"/>`),
    );

    expect(error).toBeInstanceOf(CyclicTypeError);
    if (!(error instanceof CyclicTypeError)) return;
    expect(error.chain).toEqual(['t:a', 't:b', 't:a']);
  });

  it('reports a loop between elements that borrow their head’s type', () => {
    const error = captureError(() =>
      inlineModel(`
        <xs:element name="a" substitutionGroup="t:b"/>
        <xs:element name="b" substitutionGroup="t:a"/>`),
    );

    expect(error).toBeInstanceOf(CyclicTypeError);
    if (!(error instanceof CyclicTypeError)) return;
    expect(error.chain).toEqual(['t:a', 't:b', 't:a']);
  });

  it('requires the head to be a global element', () => {
    const error = captureError(() =>
      inlineModel('<xs:element name="a" type="xs:string" substitutionGroup="t:nope"/>'),
    );

    expect(error).toBeInstanceOf(UnresolvedReferenceError);
    if (!(error instanceof UnresolvedReferenceError)) return;
    expect([error.reference, error.category]).toEqual(['t:nope', 'element']);
  });
});
