import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_CACHE_DIR, resolveModelOptions } from '../src/config.js';
import { SchemaSourceError } from '../src/errors.js';
import { loadSchemaModel } from '../src/model.js';
import {
  DefaultSchemaSource,
  FileSchemaSource,
  HttpSchemaSource,
  listSchemaFiles,
  resolveLocation,
} from '../src/source/schema-source.js';
import type { LoadedSchema, SchemaSource } from '../src/source/schema-source.js';
import { fixturePath, fixturesDir, readFixture, silentLogger } from './helpers.js';

const PANEL_URL = 'https://schemas.example.org/ocx/panel.xsd';

/**
 * An axios instance answering every GET in process.
 */
function stubClient(respond: (url: string) => unknown, calls: string[] = []): AxiosInstance {
  return axios.create({
    adapter: async (config) => {
      const url = config.url ?? '';
      calls.push(url);
      return { data: respond(url), status: 200, statusText: 'OK', headers: {}, config };
    },
  });
}

class RecordingSource implements SchemaSource {
  readonly seen: string[] = [];

  async load(location: string): Promise<LoadedSchema> {
    this.seen.push(location);
    return { location, content: '' };
  }
}

describe('resolveLocation', () => {
  it('resolves relative locations against the referencing document', () => {
    expect(resolveLocation('b.xsd', 'https://example.org/schemas/a.xsd')).toBe('https://example.org/schemas/b.xsd');
    expect(resolveLocation('../c.xsd', '/srv/x/a.xsd')).toBe('/srv/c.xsd');
    expect(resolveLocation('https://example.org/d.xsd', '/srv/x/a.xsd')).toBe('https://example.org/d.xsd');
    expect(resolveLocation('file:///srv/e.xsd')).toBe('/srv/e.xsd');
  });
});

describe('FileSchemaSource', () => {
  const source = new FileSchemaSource();

  it('reads a schema relative to its referencing document', async () => {
    const loaded = await source.load('common.xsd', fixturePath('imports', 'main.xsd'));

    expect(loaded.location).toBe(fixturePath('imports', 'common.xsd'));
    expect(loaded.content).toBe(readFixture('imports', 'common.xsd'));
  });

  it('fails with the missing path', async () => {
    await expect(source.load(fixturePath('nope.xsd'))).rejects.toThrow(
      new SchemaSourceError(fixturePath('nope.xsd'), 'Cannot read schema file'),
    );
  });
});

describe('listSchemaFiles', () => {
  it('lists the schema files of a directory', async () => {
    expect(await listSchemaFiles(fixturesDir)).toEqual([fixturePath('panel-v2.xsd'), fixturePath('panel.xsd')]);
  });

  it('descends into subdirectories on request', async () => {
    expect(await listSchemaFiles(fixturesDir, true)).toEqual([
      fixturePath('imports', 'common.xsd'),
      fixturePath('imports', 'main.xsd'),
      fixturePath('imports', 'parts.xsd'),
      fixturePath('panel-v2.xsd'),
      fixturePath('panel.xsd'),
    ]);
  });

  it('fails for a directory that does not exist', async () => {
    await expect(listSchemaFiles(fixturePath('missing'))).rejects.toThrow(SchemaSourceError);
  });
});

describe('HttpSchemaSource', () => {
  let cacheDir = '';

  beforeEach(async () => {
    cacheDir = await mkdtemp(join(tmpdir(), 'xsd-cache-'));
  });

  afterEach(async () => {
    await rm(cacheDir, { recursive: true, force: true });
  });

  it('fetches a schema once and serves it from the cache afterwards', async () => {
    const calls: string[] = [];
    const client = stubClient(() => '<xs:schema/>', calls);
    const first = new HttpSchemaSource({ client, cacheDir, logger: silentLogger() });

    expect(await first.load(PANEL_URL)).toEqual({ location: PANEL_URL, content: '<xs:schema/>' });
    const cached = first.cachePath(PANEL_URL) ?? '';
    expect(cached.startsWith(cacheDir)).toBe(true);
    expect(cached.endsWith('-panel.xsd')).toBe(true);
    expect(await readFile(cached, 'utf-8')).toBe('<xs:schema/>');

    const second = new HttpSchemaSource({ client, cacheDir, logger: silentLogger() });
    expect(await second.load(PANEL_URL)).toEqual({ location: PANEL_URL, content: '<xs:schema/>' });
    expect(calls).toEqual([PANEL_URL]);
  });

  it('does not cache without a cache directory', async () => {
    const source = new HttpSchemaSource({ client: stubClient(() => '<xs:schema/>'), logger: silentLogger() });

    expect(source.cachePath(PANEL_URL)).toBeUndefined();
    expect((await source.load('other.xsd', PANEL_URL)).location).toBe('https://schemas.example.org/ocx/other.xsd');
  });

  it('returns a fetched schema when the cache cannot be written', async () => {
    const blocker = join(cacheDir, 'blocker');
    await writeFile(blocker, 'not a directory', 'utf-8');
    const logger = silentLogger();
    const warn = vi.spyOn(logger, 'warn');
    const source = new HttpSchemaSource({ client: stubClient(() => '<xs:schema/>'), cacheDir: blocker, logger });
    const cached = source.cachePath(PANEL_URL) ?? '';

    expect(await source.load(PANEL_URL)).toEqual({ location: PANEL_URL, content: '<xs:schema/>' });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0]?.[0]).startsWith(`Cannot cache ${PANEL_URL} at ${cached}: `)).toBe(true);
    expect(await readFile(blocker, 'utf-8')).toBe('not a directory');
  });

  it('wraps transport failures', async () => {
    const client = axios.create({
      adapter: async () => {
        throw new Error('connect ECONNREFUSED');
      },
    });
    const source = new HttpSchemaSource({ client, cacheDir, logger: silentLogger() });

    await expect(source.load(PANEL_URL)).rejects.toThrow(new SchemaSourceError(PANEL_URL, 'Cannot fetch schema'));
    expect(existsSync(source.cachePath(PANEL_URL) ?? '')).toBe(false);
  });

  it('rejects a body that is not text', async () => {
    const source = new HttpSchemaSource({ client: stubClient(() => ({ not: 'xml' })), logger: silentLogger() });

    await expect(source.load(PANEL_URL)).rejects.toThrow(SchemaSourceError);
  });

  it('feeds a model loaded from a URL', async () => {
    const client = stubClient(() => readFixture('panel.xsd'));
    const logger = silentLogger();
    const model = await loadSchemaModel(PANEL_URL, {
      source: new HttpSchemaSource({ client, logger }),
      logger,
    });

    expect(model.documents).toEqual([PANEL_URL]);
    expect(model.getElement('ocx:Panel')?.children.map((c) => c.name)).toContain('CutBy');
  });
});

describe('DefaultSchemaSource', () => {
  it('dispatches on the location scheme', async () => {
    const files = new RecordingSource();
    const remote = new RecordingSource();
    const source = new DefaultSchemaSource(files, remote);

    await source.load('https://example.org/a.xsd');
    await source.load('b.xsd', 'https://example.org/dir/a.xsd');
    await source.load('c.xsd', '/srv/schemas/a.xsd');

    expect(remote.seen).toEqual(['https://example.org/a.xsd', 'https://example.org/dir/b.xsd']);
    expect(files.seen).toEqual(['/srv/schemas/c.xsd']);
  });
});

describe('resolveModelOptions', () => {
  it('applies defaults', () => {
    const options = resolveModelOptions({ cacheDir: 'cache' });

    expect(options.followImports).toBe(true);
    expect(options.cacheDir).toBe(resolve('cache'));
    expect(options.source).toBeInstanceOf(DefaultSchemaSource);
    expect(DEFAULT_CACHE_DIR).toBe('.schema-cache');
  });

  it('keeps what the caller passes', () => {
    const source = new RecordingSource();
    const logger = silentLogger();
    const options = resolveModelOptions({ source, logger, followImports: false });

    expect(options.source).toBe(source);
    expect(options.logger).toBe(logger);
    expect(options.followImports).toBe(false);
  });
});
