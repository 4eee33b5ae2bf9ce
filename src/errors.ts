import type { DeclarationCategory } from './xsd/types.js';

/**
 * Base class of every error raised while loading or resolving a schema.
 */
export class SchemaModelError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SchemaModelError';
    Object.setPrototypeOf(this, SchemaModelError.prototype);
  }
}

/**
 * Thrown when a type, group, attributeGroup, attribute, element or
 * substitutionGroup reference names a declaration that is not registered.
 */
export class UnresolvedReferenceError extends SchemaModelError {
  public readonly reference: string;
  public readonly category: DeclarationCategory | 'type' | 'namespace';

  constructor(reference: string, category: DeclarationCategory | 'type' | 'namespace') {
    super(`Unresolved ${category} reference: ${reference}`);
    this.name = 'UnresolvedReferenceError';
    this.reference = reference;
    this.category = category;
    Object.setPrototypeOf(this, UnresolvedReferenceError.prototype);
  }
}

/**
 * Thrown when an extension, restriction, group or substitution chain loops.
 * `chain` starts and ends with the same qualified name.
 */
export class CyclicTypeError extends SchemaModelError {
  public readonly chain: readonly string[];

  constructor(chain: readonly string[]) {
    super(`Cyclic definition: ${chain.join(' -> ')}`);
    this.name = 'CyclicTypeError';
    this.chain = chain;
    Object.setPrototypeOf(this, CyclicTypeError.prototype);
  }
}

/**
 * Thrown when a declaration lacks a structural field it cannot do without.
 */
export class MalformedDeclarationError extends SchemaModelError {
  public readonly declaration: string;

  constructor(declaration: string, reason: string) {
    super(`Malformed declaration ${declaration}: ${reason}`);
    this.name = 'MalformedDeclarationError';
    this.declaration = declaration;
    Object.setPrototypeOf(this, MalformedDeclarationError.prototype);
  }
}

/**
 * Thrown when a schema document cannot be read, fetched or parsed.
 */
export class SchemaSourceError extends SchemaModelError {
  public readonly location: string;
  // Explicit declaration needed as Error.cause requires lib ES2022+.
  public readonly cause?: unknown;

  constructor(location: string, message: string, cause?: unknown) {
    super(`${message}: ${location}`);
    this.name = 'SchemaSourceError';
    this.location = location;
    this.cause = cause;
    Object.setPrototypeOf(this, SchemaSourceError.prototype);
  }
}
