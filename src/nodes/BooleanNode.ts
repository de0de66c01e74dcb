import { Node, type TypeCheck } from "./Node.js";
import { type NodeOptions, nodeOptionsSchema, parseOptions } from "./options.js";

const BOOLEAN: readonly TypeCheck[] = [
  { label: "boolean", test: (value) => typeof value === "boolean" },
];

export class BooleanNode extends Node {
  constructor(options: NodeOptions = {}) {
    super(parseOptions(nodeOptionsSchema, options));
  }

  get type(): string {
    return "boolean";
  }

  allowedTypes(): readonly TypeCheck[] {
    return BOOLEAN;
  }
}
