import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SchemaModelError, SchemaSourceError, UnresolvedReferenceError } from '../src/errors.js';
import { NamespaceTable, buildSchemaModel, loadSchemaDocuments, loadSchemaModel } from '../src/model.js';
import { XML_NAMESPACE } from '../src/xml/tree.js';
import { parseSchemaDocument } from '../src/xsd/parser.js';
import { OCX, XSD, fixturePath, panelModel, silentLogger, xsd } from './helpers.js';

describe('SchemaModel', () => {
  const model = panelModel();

  it('finds elements by prefixed name, Clark key, local name or TypeRef', () => {
    const panel = model.getElement('ocx:Panel');

    expect(panel?.name.localName).toBe('Panel');
    expect(model.getElement(`{${OCX}}Panel`)).toBe(panel);
    expect(model.getElement('Panel')).toBe(panel);
    expect(model.getElement({ prefixed: 'p:Panel', namespace: OCX, localName: 'Panel' })).toBe(panel);
    expect(model.getElement('zz:Panel')).toBeUndefined();
    expect(model.elementsNamed('Panel')).toEqual([panel]);
  });

  it('keeps global elements in declaration order', () => {
    expect(model.elementList().map((e) => e.name.localName)).toEqual([
      'Panel',
      'Plate',
      'StructurePart',
      'Stiffener',
      'Bracket',
      'ThinPlate',
      'Vessel',
    ]);
  });

  it('finds the global elements that contain an element by reference', () => {
    expect(model.parentsOf('ocx:Plate').map((e) => e.name.prefixed)).toEqual(['ocx:Panel']);
    expect(model.parentsOf('Panel').map((e) => e.name.prefixed)).toEqual(['ocx:Vessel']);
    expect(model.parentsOf('ocx:Vessel')).toEqual([]);
    expect(() => model.parentsOf('ocx:Hull')).toThrow(UnresolvedReferenceError);
  });

  it('is frozen', () => {
    const panel = model.getElement('ocx:Panel');

    expect(Object.isFrozen(model)).toBe(true);
    expect(Object.isFrozen(panel)).toBe(true);
    expect(Object.isFrozen(panel?.attributes)).toBe(true);
    expect(Object.isFrozen(panel?.children[0])).toBe(true);
  });

  it('carries version, target namespace and change history', () => {
    expect(model.version).toBe('1.0');
    expect(model.targetNamespace).toBe(OCX);
    expect(model.changes).toEqual([
      { version: '1.0', author: 'test-author', date: '2026-01-15', description: 'Initial release of the panel schema.' },
    ]);
    expect(model.documents).toEqual([fixturePath('panel.xsd')]);
  });

  it('refuses to resolve an unknown element', () => {
    expect(() => model.resolveElement('ocx:Hull')).toThrow(UnresolvedReferenceError);
  });

  it('needs at least one document', () => {
    expect(() => buildSchemaModel([])).toThrow(SchemaModelError);
  });

  it('logs what it registered and resolved', () => {
    const logger = silentLogger();
    const debug = vi.spyOn(logger, 'debug');
    panelModel('panel.xsd', logger);

    expect(debug.mock.calls).toEqual([
      [`Registered 17 declarations from ${fixturePath('panel.xsd')}`],
      ['Resolved 7 global elements (6 complexTypes)'],
    ]);
  });
});

describe('NamespaceTable', () => {
  it('puts xml first and keeps the first binding of a prefix', () => {
    const logger = silentLogger();
    const warn = vi.spyOn(logger, 'warn');
    const first = parseSchemaDocument(xsd('', 'urn:one'), 'one.xsd');
    const second = parseSchemaDocument(
      `<xs:schema xmlns:xs="${XSD}" xmlns:t="urn:two" xmlns:o="urn:one" targetNamespace="urn:two"/>`,
      'two.xsd',
    );
    const table = NamespaceTable.fromDocuments([first, second], logger);

    expect(table.entries).toEqual([
      ['xml', XML_NAMESPACE],
      ['xs', XSD],
      ['t', 'urn:one'],
      ['o', 'urn:one'],
    ]);
    expect(table.targetNamespace).toBe('urn:one');
    expect(table.uriFor('t')).toBe('urn:one');
    expect(table.prefixFor('urn:one')).toBe('t');
    expect(table.prefixFor('urn:two')).toBeUndefined();
    expect(warn.mock.calls).toEqual([['two.xsd: prefix "t" already bound to urn:one, ignoring urn:two']]);
  });

  it('prefers a named prefix over the default namespace', () => {
    const table = new NamespaceTable(
      [
        ['', 'urn:x'],
        ['x', 'urn:x'],
      ],
      'urn:x',
    );

    expect(table.prefixFor('urn:x')).toBe('x');
    expect(table.size).toBe(2);
  });
});

describe('loadSchemaModel', () => {
  it('follows imports and includes once each', async () => {
    const model = await loadSchemaModel(fixturePath('imports', 'main.xsd'), { logger: silentLogger() });

    expect(model.documents.map((d) => basename(d))).toEqual(['main.xsd', 'common.xsd', 'parts.xsd']);
    expect(model.version).toBe('3.1');
    expect(model.namespaces.entries).toEqual([
      ['xml', XML_NAMESPACE],
      ['xs', XSD],
      ['ship', 'urn:example:ship'],
      ['cmn', 'urn:example:common'],
      ['', 'urn:example:ship'],
    ]);
  });

  it('resolves references across documents', async () => {
    const model = await loadSchemaModel(fixturePath('imports', 'main.xsd'), { logger: silentLogger() });
    const ship = model.getElement('ship:Ship');

    expect(ship?.attributes).toEqual([
      {
        name: 'guid',
        namespace: 'urn:example:common',
        type: { kind: 'ref', ref: { prefixed: 'xs:string', namespace: XSD, localName: 'string' } },
        use: 'required',
        description: 'Global identifier.',
      },
    ]);
    expect(ship?.children.map((c) => [c.name, c.namespace, c.type.kind === 'ref' ? c.type.ref.localName : ''])).toEqual([
      ['Hull', 'urn:example:ship', 'Hull_T'],
      ['Owner', 'urn:example:ship', 'Party_T'],
    ]);
    expect(model.getElement('ship:Hull')?.attributes.map((a) => a.name)).toEqual(['length']);
  });

  it('loads only the main document when imports are not followed', async () => {
    const documents = await loadSchemaDocuments(fixturePath('imports', 'main.xsd'), {
      followImports: false,
      logger: silentLogger(),
    });

    expect(documents.map((d) => basename(d.location))).toEqual(['main.xsd']);
    await expect(
      loadSchemaModel(fixturePath('imports', 'main.xsd'), { followImports: false, logger: silentLogger() }),
    ).rejects.toThrow(UnresolvedReferenceError);
  });

  describe('with a missing import', () => {
    let dir = '';

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'xsd-model-'));
      await writeFile(
        join(dir, 'main.xsd'),
        xsd('<xs:import namespace="urn:gone" schemaLocation="absent.xsd"/>'),
        'utf-8',
      );
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('fails with the location that could not be read and logs it', async () => {
      const logger = silentLogger();
      const error = vi.spyOn(logger, 'error');
      const absent = join(dir, 'absent.xsd');

      await expect(loadSchemaModel(join(dir, 'main.xsd'), { logger })).rejects.toThrow(
        new SchemaSourceError(absent, 'Cannot read schema file'),
      );
      expect(error.mock.calls).toEqual([
        [`Cannot build schema model from ${join(dir, 'main.xsd')}: Cannot read schema file: ${absent}`],
      ]);
    });
  });
});
