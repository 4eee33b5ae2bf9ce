export {
  NamespaceTable,
  SchemaModel,
  buildSchemaModel,
  loadSchemaDocuments,
  loadSchemaModel,
  parseSchemaModel,
} from './model.js';
export type { BuildOptions } from './model.js';

export { summarize, UNKNOWN_VERSION } from './summary.js';
export type { SchemaSummary, SummaryRow } from './summary.js';

export { diff, describeChange, isEmptyChangeSet } from './diff.js';
export type {
  AttributeField,
  ChildField,
  ElementField,
  FieldChange,
  FieldValue,
  ModifiedElement,
  SchemaChangeSet,
} from './diff.js';

export {
  attributeGroupTable,
  attributeTable,
  attributeTables,
  attributeTypeTable,
  childTable,
  childTables,
  complexTypeTable,
  declarationTable,
  elementTypeTable,
  formatCardinality,
  simpleTypeTable,
} from './tables.js';
export type { AttributeRecord, ChildRecord, DeclarationRecord, FlatTable, Use } from './tables.js';

export {
  DefaultSchemaSource,
  FileSchemaSource,
  HttpSchemaSource,
  isRemoteLocation,
  listSchemaFiles,
  resolveLocation,
} from './source/schema-source.js';
export type { HttpSchemaSourceOptions, LoadedSchema, SchemaSource } from './source/schema-source.js';

export { CACHE_DIR_ENV, DEFAULT_CACHE_DIR, resolveModelOptions } from './config.js';
export type { ModelOptions, ResolvedModelOptions } from './config.js';

export { createModelLogger, logger, LOG_LEVEL_ENV } from './logger.js';
export type { Logger } from './logger.js';

export {
  CyclicTypeError,
  MalformedDeclarationError,
  SchemaModelError,
  SchemaSourceError,
  UnresolvedReferenceError,
} from './errors.js';

export { XmlNode, parseXmlDocument } from './xml/tree.js';
export { parseSchemaDocument } from './xsd/parser.js';
export type { SchemaDocument, SchemaReference } from './xsd/parser.js';
export { TypeRegistry } from './xsd/registry.js';
export { SchemaWalker } from './xsd/walker.js';
export { SubstitutionGroups, resolveSubstitutionGroups } from './xsd/substitution.js';
export { clarkKey, formatDeclaredType } from './xsd/names.js';
export type * from './xsd/types.js';
