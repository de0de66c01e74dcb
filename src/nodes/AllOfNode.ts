import { ValidationResult } from "../ValidationResult.js";
import { isNil } from "../utils/value.js";
import { CombinationNode } from "./CombinationNode.js";
import { NO_VALUE } from "./Node.js";

/**
 * Valid when the value matches every item. All items run against the real
 * result, so each failing item contributes its own errors.
 */
export class AllOfNode extends CombinationNode {
  get type(): string {
    return "all_of";
  }

  _validate(data: unknown, result: ValidationResult): unknown {
    const value = super._validate(data, result);
    if (value === NO_VALUE) return NO_VALUE;

    for (const item of this.items) {
      item._validate(value, result);
    }

    return value;
  }

  cast(data: unknown): unknown {
    const value = super.cast(data);
    if (isNil(value)) return value;

    return this.items.reduce<unknown>((current, item) => item.cast(current), value);
  }
}
