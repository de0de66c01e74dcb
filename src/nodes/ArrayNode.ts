import { z } from "zod";
import { SchemaDefinitionError } from "../errors.js";
import { ValidationResult } from "../ValidationResult.js";
import { deepEqual } from "../utils/value.js";
import { Node, type TypeCheck } from "./Node.js";
import { nodeOptionsSchema, parseOptions } from "./options.js";

const ARRAY: readonly TypeCheck[] = [
  { label: "array", test: (value) => Array.isArray(value) },
];

export const arrayOptionsSchema = nodeOptionsSchema
  .extend({
    minItems: z.number().int().nonnegative().optional(),
    maxItems: z.number().int().nonnegative().optional(),
    unique: z.boolean().optional(),
  })
  .strict();

export type ArrayNodeOptions = z.input<typeof arrayOptionsSchema>;

function hasDuplicates(values: readonly unknown[]): boolean {
  return values.some((value, i) =>
    values.slice(i + 1).some((other) => deepEqual(value, other))
  );
}

/**
 * Sequences. The optional single child is the schema every element is
 * validated against, under `/<index>`.
 */
export class ArrayNode extends Node {
  readonly minItems?: number;
  readonly maxItems?: number;
  readonly unique: boolean;

  constructor(options: ArrayNodeOptions = {}) {
    const parsed = parseOptions(arrayOptionsSchema, options);
    super(parsed);
    this.minItems = parsed.minItems;
    this.maxItems = parsed.maxItems;
    this.unique = parsed.unique ?? false;
  }

  get type(): string {
    return "array";
  }

  get item(): Node | undefined {
    return this.children[0];
  }

  allowedTypes(): readonly TypeCheck[] {
    return ARRAY;
  }

  acceptsChildren(): boolean {
    return true;
  }

  protected checkChild(): void {
    if (this.children.length > 0) {
      throw new SchemaDefinitionError(
        `Node "${this.type}" accepts only one item schema.`
      );
    }
  }

  validateSelf(): void {
    if (
      this.minItems !== undefined &&
      this.maxItems !== undefined &&
      this.minItems > this.maxItems
    ) {
      throw new SchemaDefinitionError(
        "Option minItems can't be greater than maxItems."
      );
    }
  }

  _validate(data: unknown, result: ValidationResult): unknown {
    const value = super._validate(data, result);
    if (!Array.isArray(value)) return value;

    const elements: readonly unknown[] = value;

    if (this.minItems !== undefined && elements.length < this.minItems) {
      result.error(
        `Array has ${elements.length} items but needs at least ${this.minItems}.`
      );
    }

    if (this.maxItems !== undefined && elements.length > this.maxItems) {
      result.error(
        `Array has ${elements.length} items but needs at most ${this.maxItems}.`
      );
    }

    if (this.unique && hasDuplicates(elements)) {
      result.error("Array has duplicate items.");
    }

    const { item } = this;
    if (item) {
      elements.forEach((element, index) => {
        const elementResult = new ValidationResult();
        item._validate(element, elementResult);
        result.merge(elementResult, index);
      });
    }

    return value;
  }

  cast(data: unknown): unknown {
    const value = super.cast(data);
    const { item } = this;
    if (!item || !Array.isArray(value)) return value;

    const elements: readonly unknown[] = value;
    return elements.map((element) => item.cast(element));
  }
}
