import { createHash } from 'node:crypto';
import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { SchemaSourceError } from '../errors.js';
import { logger as defaultLogger } from '../logger.js';
import type { Logger } from '../logger.js';

/**
 * A materialised schema document.
 */
export interface LoadedSchema {
  /** Absolute path or URL the content was read from. */
  location: string;
  content: string;
}

/**
 * Acquires schema documents. Caching and retries are the source's business.
 */
export interface SchemaSource {
  /**
   * @param location   - Path or URL, possibly relative.
   * @param relativeTo - Location of the referencing document, for relative locations.
   * @throws `SchemaSourceError` when the document is unavailable.
   */
  load(location: string, relativeTo?: string): Promise<LoadedSchema>;
}

export function isRemoteLocation(location: string): boolean {
  return /^https?:\/\//i.test(location);
}

/**
 * Resolves `location` against the document that references it.
 */
export function resolveLocation(location: string, relativeTo?: string): string {
  if (isRemoteLocation(location)) return location;
  if (location.startsWith('file://')) return fileURLToPath(location);
  if (relativeTo && isRemoteLocation(relativeTo)) return new URL(location, relativeTo).href;
  return relativeTo ? resolve(dirname(relativeTo), location) : resolve(location);
}

// ---------------------------------------------------------------------------
// Local files
// ---------------------------------------------------------------------------

export class FileSchemaSource implements SchemaSource {
  async load(location: string, relativeTo?: string): Promise<LoadedSchema> {
    const path = resolveLocation(location, relativeTo);
    if (isRemoteLocation(path)) {
      throw new SchemaSourceError(path, 'Not a local schema path');
    }
    try {
      return { location: path, content: await readFile(path, 'utf-8') };
    } catch (err) {
      throw new SchemaSourceError(path, 'Cannot read schema file', err);
    }
  }
}

/**
 * The `.xsd` files of a bundled schema directory, sorted by path.
 */
export async function listSchemaFiles(dir: string, recursive = false): Promise<string[]> {
  const root = resolve(dir);
  let entries;
  try {
    entries = await readdir(root, { withFileTypes: true });
  } catch (err) {
    throw new SchemaSourceError(root, 'Cannot list schema directory', err);
  }

  const files: string[] = [];
  for (const entry of entries) {
    const path = join(root, entry.name);
    if (entry.isDirectory() && recursive) {
      files.push(...(await listSchemaFiles(path, true)));
    } else if (entry.isFile() && entry.name.toLowerCase().endsWith('.xsd')) {
      files.push(path);
    }
  }
  return files.sort();
}

// ---------------------------------------------------------------------------
// Remote documents
// ---------------------------------------------------------------------------

export interface HttpSchemaSourceOptions {
  /** Directory where fetched documents are kept. No caching when omitted. */
  cacheDir?: string;
  client?: AxiosInstance;
  logger?: Logger;
}

/**
 * Fetches schemas over HTTP(S), keeping a copy of each body in `cacheDir`.
 */
export class HttpSchemaSource implements SchemaSource {
  private readonly client: AxiosInstance;
  private readonly cacheDir?: string;
  private readonly log: Logger;

  constructor(options: HttpSchemaSourceOptions = {}) {
    this.client = options.client ?? axios.create({ timeout: 30_000 });
    this.cacheDir = options.cacheDir;
    this.log = options.logger ?? defaultLogger;
  }

  /**
   * Cache file for a URL: a hash of the URL followed by its file name.
   */
  cachePath(url: string): string | undefined {
    if (!this.cacheDir) return undefined;
    const hash = createHash('sha1').update(url).digest('hex').slice(0, 12);
    const name = basename(new URL(url).pathname) || 'schema.xsd';
    return join(this.cacheDir, `${hash}-${name}`);
  }

  async load(location: string, relativeTo?: string): Promise<LoadedSchema> {
    const url = resolveLocation(location, relativeTo);
    if (!isRemoteLocation(url)) {
      throw new SchemaSourceError(url, 'Not a remote schema URL');
    }

    const cached = this.cachePath(url);
    if (cached) {
      const content = await readFile(cached, 'utf-8').catch(() => undefined);
      if (content !== undefined) {
        this.log.debug(`Using cached copy of ${url}`);
        return { location: url, content };
      }
    }

    let content: string;
    try {
      const response = await this.client.get<unknown>(url, { responseType: 'text' });
      if (typeof response.data !== 'string') {
        throw new Error(`unexpected response body of type ${typeof response.data}`);
      }
      content = response.data;
    } catch (err) {
      throw new SchemaSourceError(url, 'Cannot fetch schema', err);
    }
    this.log.debug(`Fetched ${url}`);

    if (cached) {
      try {
        await mkdir(dirname(cached), { recursive: true });
        await writeFile(cached, content, 'utf-8');
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        this.log.warn(`Cannot cache ${url} at ${cached}: ${reason}`);
      }
    }
    return { location: url, content };
  }
}

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

/**
 * Reads local paths from disk and fetches URLs.
 */
export class DefaultSchemaSource implements SchemaSource {
  constructor(
    private readonly files: SchemaSource = new FileSchemaSource(),
    private readonly remote: SchemaSource = new HttpSchemaSource(),
  ) {}

  load(location: string, relativeTo?: string): Promise<LoadedSchema> {
    const resolved = resolveLocation(location, relativeTo);
    return isRemoteLocation(resolved) ? this.remote.load(resolved) : this.files.load(resolved);
  }
}
