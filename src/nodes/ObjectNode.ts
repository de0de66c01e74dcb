import { z } from "zod";
import { SchemaDefinitionError } from "../errors.js";
import { ValidationResult } from "../ValidationResult.js";
import { isPlainObject } from "../utils/value.js";
import { Node, type TypeCheck } from "./Node.js";
import { nodeOptionsSchema, parseOptions } from "./options.js";

const OBJECT: readonly TypeCheck[] = [{ label: "object", test: isPlainObject }];

export const objectOptionsSchema = nodeOptionsSchema
  .extend({
    additionalProperties: z.boolean().optional(),
  })
  .strict();

/**
 * Inherited members such as `toString` count as absent.
 */
function ownValue(object: Record<string, unknown>, key: string): unknown {
  return Object.hasOwn(object, key) ? object[key] : undefined;
}

export type ObjectNodeOptions = z.input<typeof objectOptionsSchema>;

/**
 * Plain mappings. Each child is a property, keyed by the child's name, and
 * is validated under `/<name>`. Undeclared keys are errors unless
 * `additionalProperties` is set.
 */
export class ObjectNode extends Node {
  readonly additionalProperties: boolean;

  constructor(options: ObjectNodeOptions = {}) {
    const parsed = parseOptions(objectOptionsSchema, options);
    super(parsed);
    this.additionalProperties = parsed.additionalProperties ?? false;
  }

  get type(): string {
    return "object";
  }

  allowedTypes(): readonly TypeCheck[] {
    return OBJECT;
  }

  acceptsChildren(): boolean {
    return true;
  }

  protected checkChild(child: Node): void {
    if (child.name === undefined) {
      throw new SchemaDefinitionError(
        "Child nodes of an object must have a name."
      );
    }
    if (this.children.some(({ name }) => name === child.name)) {
      throw new SchemaDefinitionError(
        `Property "${child.name}" is defined more than once.`
      );
    }
  }

  _validate(data: unknown, result: ValidationResult): unknown {
    const value = super._validate(data, result);
    if (!isPlainObject(value)) return value;

    if (!this.additionalProperties) {
      const declared = new Set(this.children.map(({ name }) => name));
      for (const key of Object.keys(value)) {
        if (!declared.has(key)) result.error(`Obsolete property "${key}".`);
      }
    }

    for (const property of this.children) {
      if (property.name === undefined) continue;

      const propertyResult = new ValidationResult();
      property._validate(ownValue(value, property.name), propertyResult);
      result.merge(propertyResult, property.name);
    }

    return value;
  }

  cast(data: unknown): unknown {
    const value = super.cast(data);
    if (!isPlainObject(value)) return value;

    const casted: Record<string, unknown> = { ...value };
    for (const property of this.children) {
      if (property.name === undefined) continue;

      const propertyValue = property.cast(ownValue(value, property.name));
      if (propertyValue !== undefined) casted[property.name] = propertyValue;
    }

    return casted;
  }
}
