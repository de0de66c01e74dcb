import { z } from "zod";
import { SchemaDefinitionError } from "../errors.js";
import { ValidationResult } from "../ValidationResult.js";
import { Node, type TypeCheck } from "./Node.js";
import { nodeOptionsSchema, parseOptions } from "./options.js";

const STRING: readonly TypeCheck[] = [
  { label: "string", test: (value) => typeof value === "string" },
];

function isRegExpSource(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

export const stringOptionsSchema = nodeOptionsSchema
  .extend({
    minLength: z.number().int().nonnegative().optional(),
    maxLength: z.number().int().nonnegative().optional(),
    pattern: z
      .string()
      .refine(isRegExpSource, "Invalid regular expression")
      .optional(),
  })
  .strict();

export type StringNodeOptions = z.input<typeof stringOptionsSchema>;

/**
 * Strings, optionally bounded in length and matched against a pattern.
 * Length counts UTF-16 code units, like `String.length`.
 */
export class StringNode extends Node {
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly pattern?: RegExp;

  constructor(options: StringNodeOptions = {}) {
    const parsed = parseOptions(stringOptionsSchema, options);
    super(parsed);
    this.minLength = parsed.minLength;
    this.maxLength = parsed.maxLength;
    this.pattern =
      parsed.pattern !== undefined ? new RegExp(parsed.pattern) : undefined;
  }

  get type(): string {
    return "string";
  }

  allowedTypes(): readonly TypeCheck[] {
    return STRING;
  }

  validateSelf(): void {
    if (
      this.minLength !== undefined &&
      this.maxLength !== undefined &&
      this.minLength > this.maxLength
    ) {
      throw new SchemaDefinitionError(
        "Option minLength can't be greater than maxLength."
      );
    }
  }

  _validate(data: unknown, result: ValidationResult): unknown {
    const value = super._validate(data, result);
    if (typeof value !== "string") return value;

    if (this.minLength !== undefined && value.length < this.minLength) {
      result.error(
        `String is too short (${value.length} < ${this.minLength}).`
      );
    }

    if (this.maxLength !== undefined && value.length > this.maxLength) {
      result.error(`String is too long (${value.length} > ${this.maxLength}).`);
    }

    if (this.pattern && !this.pattern.test(value)) {
      result.error(
        `String does not match pattern "${this.pattern.source}".`
      );
    }

    return value;
  }
}
