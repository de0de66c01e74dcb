import type { ValidationErrorEntry } from "./ValidationResult.js";

/**
 * Raised while a schema tree is being built: bad options, unknown type tags,
 * empty combinators, malformed definitions.
 */
export class SchemaDefinitionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SchemaDefinitionError";
  }
}

/**
 * Raised by `validateOrFail` when the data does not conform.
 */
export class ValidationError extends Error {
  readonly errors: readonly ValidationErrorEntry[];
  readonly messages: Record<string, string[]>;

  constructor(
    errors: readonly ValidationErrorEntry[],
    messages: Record<string, string[]>
  ) {
    super(errors.map(({ path, message }) => `${path}: ${message}`).join("\n"));
    this.name = "ValidationError";
    this.errors = errors;
    this.messages = messages;
  }
}
