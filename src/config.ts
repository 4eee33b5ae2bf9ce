import { resolve } from 'node:path';
import { logger as defaultLogger } from './logger.js';
import type { Logger } from './logger.js';
import { DefaultSchemaSource, FileSchemaSource, HttpSchemaSource } from './source/schema-source.js';
import type { SchemaSource } from './source/schema-source.js';

export const CACHE_DIR_ENV = 'XSD_MODEL_CACHE_DIR';
export const DEFAULT_CACHE_DIR = '.schema-cache';

export interface ModelOptions {
  /**
   * Logger for load and resolution diagnostics.
   * @default the shared console logger
   */
  logger?: Logger;
  /**
   * Where schema documents come from.
   * @default files from disk, URLs over HTTP with an on-disk cache
   */
  source?: SchemaSource;
  /**
   * Whether xs:import and xs:include references are loaded.
   * @default true
   */
  followImports?: boolean;
  /**
   * Cache directory for remote documents. Ignored when `source` is given.
   * @default $XSD_MODEL_CACHE_DIR, else `.schema-cache` in the working directory
   */
  cacheDir?: string;
}

export type ResolvedModelOptions = Required<ModelOptions>;

export function resolveModelOptions(options: ModelOptions = {}): ResolvedModelOptions {
  const logger = options.logger ?? defaultLogger;
  const cacheDir = resolve(options.cacheDir ?? process.env[CACHE_DIR_ENV] ?? DEFAULT_CACHE_DIR);
  const source =
    options.source ??
    new DefaultSchemaSource(new FileSchemaSource(), new HttpSchemaSource({ cacheDir, logger }));
  return {
    logger,
    source,
    followImports: options.followImports ?? true,
    cacheDir,
  };
}
