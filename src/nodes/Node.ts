import { SchemaDefinitionError, ValidationError } from "../errors.js";
import { ValidationResult } from "../ValidationResult.js";
import { deepEqual, inspectValue, isNil } from "../utils/value.js";
import type { NodeOptions } from "./options.js";

/**
 * Returned by the validation pipeline when checks must stop at this node:
 * the value was absent, or of the wrong type.
 */
export const NO_VALUE: unique symbol = Symbol("NO_VALUE");

/**
 * A runtime shape a node accepts, labelled for error messages.
 */
export type TypeCheck = {
  label: string;
  test: (value: unknown) => boolean;
};

function cloneDefault(value: unknown): unknown {
  try {
    return structuredClone(value);
  } catch (err) {
    throw new SchemaDefinitionError(
      "Option default must be a plain data value.",
      { cause: err }
    );
  }
}

/**
 * Base class of every schema element.
 *
 * A node is built in two phases. The constructor takes the option bag;
 * children are then attached (see `createNode`) and `finalize()` runs the
 * structural self-check and freezes the child list. Only finalized nodes
 * can be validated, and validation never changes a node.
 */
export abstract class Node {
  readonly name?: string;
  readonly required: boolean;
  readonly default: unknown;
  readonly description?: string;
  readonly example: unknown;
  readonly enum?: ReadonlySet<unknown>;

  private parentNode?: Node;
  private readonly childList: Node[] = [];
  private finalized = false;

  protected constructor(options: NodeOptions) {
    this.name = options.name;
    this.required = options.required ?? false;
    this.default = cloneDefault(options.default);
    this.description = options.description;
    this.example = options.example;
    this.enum = options.enum ? new Set(options.enum) : undefined;
  }

  /**
   * Type tag under which the node is registered, e.g. `"any_of"`.
   */
  abstract get type(): string;

  /**
   * Enclosing node. A lookup link only; the parent owns this node.
   */
  get parent(): Node | undefined {
    return this.parentNode;
  }

  get children(): readonly Node[] {
    return this.childList;
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  /**
   * Shapes the value must have. Empty means any shape is accepted.
   */
  allowedTypes(): readonly TypeCheck[] {
    return [];
  }

  /**
   * Whether children can be attached while building.
   */
  acceptsChildren(): boolean {
    return false;
  }

  /**
   * Attaches a child while the node is being built.
   *
   * @throws SchemaDefinitionError once the node is finalized, for nodes
   * without children, or when the child already has a parent.
   */
  attach(child: Node): void {
    if (this.finalized) {
      throw new SchemaDefinitionError(
        `Node "${this.type}" is finalized and cannot take more children.`
      );
    }
    if (!this.acceptsChildren()) {
      throw new SchemaDefinitionError(
        `Node "${this.type}" does not support children.`
      );
    }
    if (child.parentNode) {
      throw new SchemaDefinitionError(
        `Node "${child.type}" already belongs to another node.`
      );
    }

    child.finalize();
    this.checkChild(child);
    child.parentNode = this;
    this.childList.push(child);
  }

  /**
   * Runs `validateSelf` once and freezes the children.
   */
  finalize(): this {
    if (this.finalized) return this;

    this.validateSelf();
    Object.freeze(this.childList);
    this.finalized = true;

    return this;
  }

  /**
   * Structural check of the built node. Throw SchemaDefinitionError on
   * violations.
   */
  validateSelf(): void {}

  /**
   * Hook for nodes that constrain what can be attached.
   */
  protected checkChild(_child: Node): void {}

  /**
   * Validates `data` and returns the collected errors.
   *
   * @throws SchemaDefinitionError if the node was never finalized.
   */
  validate(data: unknown): ValidationResult {
    if (!this.finalized) {
      throw new SchemaDefinitionError(
        `Node "${this.type}" must be finalized before validation.`
      );
    }

    const result = new ValidationResult();
    this._validate(data, result);

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
      throw new ValidationError(result.errors, result.messages);
    }

    return this.cast(data);
  }

  /**
   * Applies defaults: a nil value becomes a copy of the configured default.
   * Without a default, `null` stays `null`.
   */
  cast(data: unknown): unknown {
    if (isNil(data) && this.default !== undefined) {
      return structuredClone(this.default);
    }

    return data;
  }

  /**
   * Generic pipeline shared by all nodes. Subclasses extend it and must call
   * it first; a `NO_VALUE` return means "stop, do not recurse".
   *
   * @returns The effective (possibly defaulted) value, or `NO_VALUE`.
   */
  _validate(data: unknown, result: ValidationResult): unknown {
    if (isNil(data) && this.required) {
      result.error("Value must be given.");
      return NO_VALUE;
    }

    if (isNil(data)) {
      if (this.default === undefined) return NO_VALUE;
      data = this.default;
    }

    const allowed = this.allowedTypes();
    if (allowed.length > 0 && !allowed.some(({ test }) => test(data))) {
      const labels = [...new Set(allowed.map(({ label }) => `"${label}"`))]
        .sort()
        .join(" or ");
      result.error(`Invalid type, expected ${labels}.`);
      return NO_VALUE;
    }

    if (this.enum && !this.includedInEnum(data)) {
      result.error(
        `Value not included in enum ${inspectValue([...this.enum])}.`
      );
    }

    return data;
  }

  private includedInEnum(value: unknown): boolean {
    if (!this.enum) return true;
    if (this.enum.has(value)) return true;

    for (const candidate of this.enum) {
      if (deepEqual(candidate, value)) return true;
    }

    return false;
  }
}
