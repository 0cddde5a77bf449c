/**
 * SheetFormula Engine - Structural Errors
 *
 * Failures that abort a parse or an evaluation. They are never visible inside
 * the formula language itself; in-language errors (#DIV/0!, #VALUE!, ...) are
 * ordinary values, see values/Value.ts.
 */

export class FormulaEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Lexing or parsing failed at the given token
 */
export class FormulaSyntaxError extends FormulaEngineError {
  readonly line: number;
  readonly column: number;

  constructor(message: string, line: number, column: number) {
    super(`${message} (line ${line}, column ${column})`);
    this.line = line;
    this.column = column;
  }
}

export class AddressError extends FormulaEngineError {
  readonly address: string;

  constructor(address: string, reason: string) {
    super(`invalid cell address "${address}": ${reason}`);
    this.address = address;
  }
}

/**
 * Base class for lookups a context cannot serve. A scope stack skips a scope
 * that fails with one of these and tries the next one down.
 */
export class ResolutionError extends FormulaEngineError {}

export class UndefinedIdentifierError extends ResolutionError {
  readonly identifier: string;

  constructor(identifier: string) {
    super(`${identifier}: undefined identifier`);
    this.identifier = identifier;
  }
}

export class NotAvailableError extends ResolutionError {
  constructor(operation: string) {
    super(`${operation}: not available`);
  }
}

export class NotCallableError extends FormulaEngineError {
  readonly identifier: string;

  constructor(identifier: string) {
    super(`${identifier}: expression is not callable`);
    this.identifier = identifier;
  }
}

export class ReadOnlyError extends FormulaEngineError {
  constructor(target: string) {
    super(`${target}: read only`);
  }
}

export class IncompatibleValuesError extends FormulaEngineError {
  constructor(left: string, right: string) {
    super(`${left} and ${right} can not be compared`);
  }
}

export class PropertyError extends FormulaEngineError {
  constructor(property: string) {
    super(`${property}: undefined property`);
  }
}

export class ArityError extends FormulaEngineError {
  constructor(name: string, expected: string, received: number) {
    super(`${name}: expected ${expected} argument(s), got ${received}`);
  }
}
