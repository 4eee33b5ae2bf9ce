import { describe, expect, it } from 'vitest';
import { describeChange, diff, isEmptyChangeSet } from '../src/diff.js';
import { parseSchemaModel } from '../src/model.js';
import { OCX, XSD, inlineModel, panelModel, silentLogger } from './helpers.js';

describe('diff', () => {
  const v1 = panelModel('panel.xsd');
  const v2 = panelModel('panel-v2.xsd');

  it('finds nothing between a model and itself', () => {
    const changes = diff(v1, v1);

    expect(changes).toEqual({ added: [], removed: [], modified: [] });
    expect(isEmptyChangeSet(changes)).toBe(true);
    expect(isEmptyChangeSet(diff(v1, panelModel('panel.xsd')))).toBe(true);
  });

  it('reports a tightened cardinality as a single field change', () => {
    const changes = diff(v1, v2);

    expect(changes.added).toEqual([]);
    expect(changes.removed).toEqual([]);
    expect(changes.modified).toEqual([
      {
        key: `{${OCX}}Panel`,
        name: { prefixed: 'ocx:Panel', namespace: OCX, localName: 'Panel' },
        changes: [{ kind: 'childChanged', name: 'CutBy', occurrence: 0, field: 'minOccurs', before: 0, after: 1 }],
      },
    ]);
    expect(changes.modified[0]?.changes.map(describeChange)).toEqual(['child CutBy: minOccurs 0 -> 1']);
  });

  it('mirrors its result when the models swap places', () => {
    const forward = diff(v1, v2);
    const backward = diff(v2, v1);

    expect(backward.added).toEqual(forward.removed);
    expect(backward.removed).toEqual(forward.added);
    expect(backward.modified[0]?.changes).toEqual([
      { kind: 'childChanged', name: 'CutBy', occurrence: 0, field: 'minOccurs', before: 1, after: 0 },
    ]);
  });

  it('orders removed elements by the old model and added ones by the new', () => {
    const before = inlineModel(`
      <xs:element name="a" type="xs:string"/>
      <xs:element name="b" type="xs:string"/>
      <xs:element name="c" type="xs:string"/>`);
    const after = inlineModel(`
      <xs:element name="c" type="xs:string"/>
      <xs:element name="e" type="xs:string"/>
      <xs:element name="a" type="xs:string"/>
      <xs:element name="d" type="xs:string"/>`);
    const changes = diff(before, after);

    expect(changes.removed.map((e) => e.name.localName)).toEqual(['b']);
    expect(changes.added.map((e) => e.name.localName)).toEqual(['e', 'd']);
    expect(changes.modified).toEqual([]);
  });

  it('compares names by namespace rather than prefix', () => {
    const schema = (prefix: string) => `
      <xs:schema xmlns:xs="${XSD}" xmlns:${prefix}="urn:test" targetNamespace="urn:test">
        <xs:complexType name="T"><xs:attribute name="x" type="xs:string"/></xs:complexType>
        <xs:element name="e" type="${prefix}:T"/>
      </xs:schema>`.trim();
    const logger = silentLogger();
    const before = parseSchemaModel(schema('a'), 'a.xsd', { logger });
    const after = parseSchemaModel(schema('b'), 'b.xsd', { logger });

    expect(after.getElement('b:e')?.type).toEqual({
      kind: 'ref',
      ref: { prefixed: 'b:T', namespace: 'urn:test', localName: 'T' },
    });
    expect(isEmptyChangeSet(diff(before, after))).toBe(true);
  });

  it('lists attribute changes field by field', () => {
    const before = inlineModel(`
      <xs:element name="e">
        <xs:complexType>
          <xs:attribute name="x" type="xs:string" default="1"/>
          <xs:attribute name="y" type="xs:string"/>
        </xs:complexType>
      </xs:element>`);
    const after = inlineModel(`
      <xs:element name="e">
        <xs:complexType>
          <xs:attribute name="x" type="xs:string" use="required"/>
          <xs:attribute name="z" type="xs:string"/>
        </xs:complexType>
      </xs:element>`);

    expect(diff(before, after).modified[0]?.changes.map(describeChange)).toEqual([
      'attribute x: use optional -> required',
      'attribute x: default 1 -> (none)',
      'attribute y removed',
      'attribute z added',
    ]);
  });

  it('matches repeated children by occurrence', () => {
    const model = (last: string) =>
      inlineModel(`
        <xs:element name="e">
          <xs:complexType>
            <xs:sequence>
              <xs:element name="p" type="xs:string" minOccurs="0"/>
              <xs:element name="q" type="xs:string"/>
              <xs:element name="p" type="xs:string" ${last}/>
            </xs:sequence>
          </xs:complexType>
        </xs:element>`);
    const changes = diff(model(''), model('minOccurs="2" maxOccurs="2"')).modified[0]?.changes;

    expect(changes).toEqual([
      { kind: 'childChanged', name: 'p', occurrence: 1, field: 'minOccurs', before: 1, after: 2 },
      { kind: 'childChanged', name: 'p', occurrence: 1, field: 'maxOccurs', before: 1, after: 2 },
    ]);
  });

  it('reports element-level changes before member changes', () => {
    const before = inlineModel(`
      <xs:element name="e" type="xs:string"/>
      <xs:element name="h" type="xs:string"/>`);
    const after = inlineModel(`
      <xs:element name="e" type="xs:int" abstract="true" substitutionGroup="t:h"/>
      <xs:element name="h" type="xs:string"/>`);

    expect(diff(before, after).modified[0]?.changes.map(describeChange)).toEqual([
      'type xs:string -> xs:int',
      'abstract false -> true',
      'substitutionGroup (none) -> t:h',
    ]);
  });

  it('records children added and removed', () => {
    const model = (child: string) =>
      inlineModel(`
        <xs:element name="e">
          <xs:complexType><xs:sequence><xs:element name="${child}" type="xs:string"/></xs:sequence></xs:complexType>
        </xs:element>`);

    expect(diff(model('old'), model('new')).modified[0]?.changes.map(describeChange)).toEqual([
      'child old removed',
      'child new added',
    ]);
  });
});
