import { ValidationResult } from "../ValidationResult.js";
import { isNil } from "../utils/value.js";
import { CombinationNode } from "./CombinationNode.js";
import { NO_VALUE, Node } from "./Node.js";

/**
 * Valid when the value matches at least one item. The first matching item,
 * in declaration order, is the one the value is validated and cast through.
 */
export class AnyOfNode extends CombinationNode {
  get type(): string {
    return "any_of";
  }

  _validate(data: unknown, result: ValidationResult): unknown {
    const value = super._validate(data, result);
    if (value === NO_VALUE) return NO_VALUE;

    const match = this.firstMatch(value, result);

    if (match) {
      match._validate(value, result);
    } else {
      result.error("Does not match any anyOf condition.");
    }

    return value;
  }

  cast(data: unknown): unknown {
    const value = super.cast(data);
    if (isNil(value)) return value;

    const match = this.firstMatch(value, new ValidationResult());
    return match ? match.cast(value) : value;
  }

  private firstMatch(value: unknown, result: ValidationResult): Node | undefined {
    return this.items.find((item) => this.matches(item, value, result));
  }
}
