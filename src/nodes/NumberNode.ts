import { z } from "zod";
import { SchemaDefinitionError } from "../errors.js";
import { ValidationResult } from "../ValidationResult.js";
import { Node, type TypeCheck } from "./Node.js";
import { nodeOptionsSchema, parseOptions } from "./options.js";

const NUMBER: readonly TypeCheck[] = [
  { label: "integer", test: (value) => Number.isInteger(value) },
  {
    label: "number",
    test: (value) => typeof value === "number" && Number.isFinite(value),
  },
];

// Decimal factors such as 0.1 are not exact in binary floating point.
function isMultipleOf(value: number, factor: number): boolean {
  const quotient = value / factor;
  return Math.abs(quotient - Math.round(quotient)) < 1e-9;
}

export const numberOptionsSchema = nodeOptionsSchema
  .extend({
    minimum: z.number().optional(),
    maximum: z.number().optional(),
    multipleOf: z.number().positive().optional(),
  })
  .strict();

export type NumberNodeOptions = z.input<typeof numberOptionsSchema>;

/**
 * Finite numbers with optional bounds. `NaN` and `Infinity` are rejected.
 */
export class NumberNode extends Node {
  readonly minimum?: number;
  readonly maximum?: number;
  readonly multipleOf?: number;

  constructor(options: NumberNodeOptions = {}) {
    const parsed = parseOptions(numberOptionsSchema, options);
    super(parsed);
    this.minimum = parsed.minimum;
    this.maximum = parsed.maximum;
    this.multipleOf = parsed.multipleOf;
  }

  get type(): string {
    return "number";
  }

  allowedTypes(): readonly TypeCheck[] {
    return NUMBER;
  }

  validateSelf(): void {
    if (
      this.minimum !== undefined &&
      this.maximum !== undefined &&
      this.minimum > this.maximum
    ) {
      throw new SchemaDefinitionError(
        "Option minimum can't be greater than maximum."
      );
    }
  }

  _validate(data: unknown, result: ValidationResult): unknown {
    const value = super._validate(data, result);
    if (typeof value !== "number") return value;

    if (this.minimum !== undefined && value < this.minimum) {
      result.error(`Value must have a minimum of ${this.minimum}.`);
    }

    if (this.maximum !== undefined && value > this.maximum) {
      result.error(`Value must have a maximum of ${this.maximum}.`);
    }

    if (
      this.multipleOf !== undefined &&
      !isMultipleOf(value, this.multipleOf)
    ) {
      result.error(`Value must be a multiple of ${this.multipleOf}.`);
    }

    return value;
  }
}
