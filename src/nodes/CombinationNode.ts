import { SchemaDefinitionError } from "../errors.js";
import { ValidationResult } from "../ValidationResult.js";
import { Node } from "./Node.js";
import { type NodeOptions, nodeOptionsSchema, parseOptions } from "./options.js";

/**
 * Base of the combinators: a node whose children ("items") are alternative
 * or cumulative schemas for the same value.
 *
 * Combinators declare no allowed types of their own; shape checks are left
 * to the items.
 */
export abstract class CombinationNode extends Node {
  constructor(options: NodeOptions = {}) {
    super(parseOptions(nodeOptionsSchema, options));
  }

  get items(): readonly Node[] {
    return this.children;
  }

  /**
   * Appends an item. Only possible until the node is finalized.
   */
  addItem(item: Node): this {
    this.attach(item);
    return this;
  }

  acceptsChildren(): boolean {
    return true;
  }

  validateSelf(): void {
    if (this.items.length === 0) {
      throw new SchemaDefinitionError(
        `Node "${this.type}" makes only sense with at least 1 item.`
      );
    }
  }

  /**
   * Checks `data` against `item` in a throwaway sub-result.
   */
  protected matches(
    item: Node,
    data: unknown,
    result: ValidationResult
  ): boolean {
    const probe = result.scoped();
    item._validate(data, probe);

    return probe.valid;
  }

  /**
   * Items `data` validates against cleanly, in declaration order.
   */
  protected matchingItems(data: unknown, result: ValidationResult): Node[] {
    return this.items.filter((item) => this.matches(item, data, result));
  }
}
