/**
 * Error types raised while loading schemas and pruning them.
 */

/**
 * Base class for every error this library raises on purpose.
 */
export class SchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SchemaError';
  }
}

/**
 * Source position, 1-based line and column.
 */
export interface SourcePosition {
  offset: number;
  line: number;
  column: number;
}

export class SchemaSyntaxError extends SchemaError {
  readonly position: SourcePosition;

  constructor(message: string, position: SourcePosition) {
    super(`${message} at line ${position.line}, column ${position.column}`);
    this.name = 'SchemaSyntaxError';
    this.position = position;
  }
}

export class DuplicateDeclarationError extends SchemaError {
  readonly declaration: string;

  constructor(declaration: string) {
    super(`Type "${declaration}" is declared more than once`);
    this.name = 'DuplicateDeclarationError';
    this.declaration = declaration;
  }
}

export class DanglingReferenceError extends SchemaError {
  readonly reference: string;
  readonly declaration: string;

  constructor(reference: string, declaration: string) {
    super(`Unknown type "${reference}" referenced from "${declaration}"`);
    this.name = 'DanglingReferenceError';
    this.reference = reference;
    this.declaration = declaration;
  }
}

export class ArityMismatchError extends SchemaError {
  readonly reference: string;
  readonly declaration: string;
  readonly expected: number;
  readonly actual: number;

  constructor(reference: string, declaration: string, expected: number, actual: number) {
    super(
      `Type "${reference}" takes ${expected} type argument(s) but ${actual} were given in "${declaration}"`
    );
    this.name = 'ArityMismatchError';
    this.reference = reference;
    this.declaration = declaration;
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * The query left nothing of the root declaration. Callers may fall back to
 * the unpruned schema.
 */
export class RootEliminatedError extends SchemaError {
  readonly root: string;

  constructor(root: string) {
    super(`Pruning eliminated every alternative of root type "${root}"`);
    this.name = 'RootEliminatedError';
    this.root = root;
  }
}

export class UnknownRootError extends SchemaError {
  readonly root: string;

  constructor(root: string) {
    super(`Root type "${root}" is not declared`);
    this.name = 'UnknownRootError';
    this.root = root;
  }
}

export class ConfigError extends SchemaError {
  readonly issues: string[];

  constructor(filePath: string, issues: string[]) {
    super(`Invalid configuration in ${filePath}: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class CartFormatError extends SchemaError {
  constructor(filePath: string, detail: string) {
    super(`Invalid cart in ${filePath}: ${detail}`);
    this.name = 'CartFormatError';
  }
}
