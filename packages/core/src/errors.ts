// ============================================================================
// @fimsmith/core — Error Types
// ============================================================================
//
// Only configuration, I/O and invariant violations are errors. Per-record
// conditions (skipped input, no span found, parser unavailable) are result
// values and never thrown.
// ============================================================================

/**
 * Base error class for all fimsmith errors.
 */
export class FimsmithError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FimsmithError';
  }
}

// ---------------------------------------------------------------------------
// Configuration Errors
// ---------------------------------------------------------------------------

/**
 * Thrown at startup when run options are invalid (bounds, weights, caps).
 */
export class ConfigurationError extends FimsmithError {
  public readonly field?: string;
  public readonly reason?: string;
  public readonly value?: unknown;

  constructor(message: string, options?: { field?: string; reason?: string; value?: unknown }) {
    super(message);
    this.name = 'ConfigurationError';
    this.field = options?.field;
    this.reason = options?.reason;
    this.value = options?.value;
  }
}

// ---------------------------------------------------------------------------
// Invariant Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a span handed to the assembler lies outside its text.
 * Indicates a bug in span selection, not bad input.
 */
export class AssemblerPreconditionError extends FimsmithError {
  public readonly start: number;
  public readonly end: number;
  public readonly textLength: number;

  constructor(start: number, end: number, textLength: number) {
    super(`Span [${start}, ${end}) is not a valid range over text of length ${textLength}.`);
    this.name = 'AssemblerPreconditionError';
    this.start = start;
    this.end = end;
    this.textLength = textLength;
  }
}

// ---------------------------------------------------------------------------
// I/O Errors
// ---------------------------------------------------------------------------

export class InputReadError extends FimsmithError {
  public readonly path: string;

  constructor(path: string, message: string) {
    super(`Cannot read ${path}: ${message}`);
    this.name = 'InputReadError';
    this.path = path;
  }
}

export class OutputWriteError extends FimsmithError {
  public readonly path: string;

  constructor(path: string, message: string) {
    super(`Cannot write ${path}: ${message}`);
    this.name = 'OutputWriteError';
    this.path = path;
  }
}
