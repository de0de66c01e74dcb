import { ValidationResult } from "../ValidationResult.js";
import { isNil } from "../utils/value.js";
import { CombinationNode } from "./CombinationNode.js";
import { NO_VALUE } from "./Node.js";

/**
 * Valid when the value matches exactly one item; matching several is an
 * error of its own.
 */
export class OneOfNode extends CombinationNode {
  get type(): string {
    return "one_of";
  }

  _validate(data: unknown, result: ValidationResult): unknown {
    const value = super._validate(data, result);
    if (value === NO_VALUE) return NO_VALUE;

    const matches = this.matchingItems(value, result);

    if (matches.length === 0) {
      result.error("Does not match any oneOf condition.");
    } else if (matches.length > 1) {
      result.error("Matches more than one oneOf condition.");
    } else {
      matches[0]._validate(value, result);
    }

    return value;
  }

  cast(data: unknown): unknown {
    const value = super.cast(data);
    if (isNil(value)) return value;

    const matches = this.matchingItems(value, new ValidationResult());
    return matches.length === 1 ? matches[0].cast(value) : value;
  }
}
