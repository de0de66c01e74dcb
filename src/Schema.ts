import { ValidationError } from "./errors.js";
import { ConsoleLogger } from "./logger/ConsoleLogger.js";
import type { LoggerProvider } from "./logger/LoggerProvider.js";
import { Node } from "./nodes/Node.js";
import { ValidationResult } from "./ValidationResult.js";

/**
 * Options for a Schema.
 */
export interface SchemaOptions {
  logger?: LoggerProvider;
}

/**
 * Entry point for validating data against a built schema tree.
 */
export class Schema {
  private logger: LoggerProvider;

  constructor(
    readonly root: Node,
    private options: SchemaOptions = {}
  ) {
    this.root.finalize();
    this.logger = this.options.logger ?? new ConsoleLogger("info");
  }

  /**
   * Validates `data` and returns every error found.
   */
  validate(data: unknown): ValidationResult {
    const result = this.root.validate(data);

    this.logger.debug(
      result.valid
        ? `"${this.root.type}" schema: valid`
        : `"${this.root.type}" schema: ${result.errors.length} error(s)`
    );

    return result;
  }

  isValid(data: unknown): boolean {
    return this.validate(data).valid;
  }

  /**
   * Validates `data` and returns it with defaults applied.
   *
   * @throws ValidationError carrying every error when the data is invalid.
   */
  validateOrFail(data: unknown): unknown {
    const result = this.validate(data);

    if (!result.valid) {
      this.logger.warn(
        `Validation failed with ${result.errors.length} error(s):`,
        result.messages
      );
      throw new ValidationError(result.errors, result.messages);
    }

    return this.root.cast(data);
  }
}
