import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createModelLogger } from '../src/logger.js';
import type { Logger } from '../src/logger.js';
import { parseSchemaModel } from '../src/model.js';
import type { SchemaModel } from '../src/model.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const fixturesDir = resolve(__dirname, 'fixtures');

export const XSD = 'http://www.w3.org/2001/XMLSchema';
export const OCX = 'https://example.org/ocx/1.0';

export function fixturePath(...parts: string[]): string {
  return resolve(fixturesDir, ...parts);
}

export function readFixture(...parts: string[]): string {
  return readFileSync(fixturePath(...parts), 'utf-8');
}

export function readGolden(name: string): unknown {
  return JSON.parse(readFixture('golden', name));
}

/**
 * A logger that records nothing to the console; spy on its methods to assert.
 */
export function silentLogger(): Logger {
  const log = createModelLogger('debug');
  log.silent = true;
  return log;
}

export function panelModel(file = 'panel.xsd', logger: Logger = silentLogger()): SchemaModel {
  return parseSchemaModel(readFixture(file), fixturePath(file), { logger });
}

/**
 * Wraps declarations in an xs:schema whose target namespace is bound to `t`.
 */
export function xsd(body: string, targetNamespace = 'urn:test'): string {
  return `<?xml version="1.0"?>
<xs:schema xmlns:xs="${XSD}" xmlns:t="${targetNamespace}" targetNamespace="${targetNamespace}">
${body}
</xs:schema>`;
}

export function inlineModel(body: string, logger: Logger = silentLogger()): SchemaModel {
  return parseSchemaModel(xsd(body), 'inline.xsd', { logger });
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected an error to be thrown');
}
