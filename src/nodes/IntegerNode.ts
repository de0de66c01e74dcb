import { NumberNode } from "./NumberNode.js";
import type { TypeCheck } from "./Node.js";

const INTEGER: readonly TypeCheck[] = [
  { label: "integer", test: (value) => Number.isInteger(value) },
];

export class IntegerNode extends NumberNode {
  get type(): string {
    return "integer";
  }

  allowedTypes(): readonly TypeCheck[] {
    return INTEGER;
  }
}
