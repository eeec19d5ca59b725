// src/core/errors.ts
// Error classes shared across the pipeline

export class FormworkError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = "FormworkError";
  }
}

/** Malformed source text: unterminated list or string, stray ')', or no expression at all. */
export class ParseError extends FormworkError {
  constructor(message: string, public readonly offset?: number) {
    super(message, "PARSE_ERROR");
    this.name = "ParseError";
  }
}

export class SeedError extends FormworkError {
  constructor(message: string) {
    super(message, "SEED_INVALID");
    this.name = "SeedError";
  }
}

export class NamespaceClosedError extends FormworkError {
  constructor(operation: string) {
    super(`namespace is closed: cannot ${operation}`, "NAMESPACE_CLOSED");
    this.name = "NamespaceClosedError";
  }
}

export class ConfigError extends FormworkError {
  constructor(message: string, public readonly problems: string[] = []) {
    super(message, "CONFIG_INVALID");
    this.name = "ConfigError";
  }
}

export function isFormworkError(e: unknown): e is FormworkError {
  return e instanceof FormworkError;
}
