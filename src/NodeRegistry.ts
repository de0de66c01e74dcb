import { SchemaDefinitionError } from "./errors.js";
import { AllOfNode } from "./nodes/AllOfNode.js";
import { AnyOfNode } from "./nodes/AnyOfNode.js";
import { ArrayNode } from "./nodes/ArrayNode.js";
import { BooleanNode } from "./nodes/BooleanNode.js";
import { IntegerNode } from "./nodes/IntegerNode.js";
import { Node } from "./nodes/Node.js";
import { NumberNode } from "./nodes/NumberNode.js";
import { ObjectNode } from "./nodes/ObjectNode.js";
import { OneOfNode } from "./nodes/OneOfNode.js";
import { StringNode } from "./nodes/StringNode.js";

/**
 * Constructor of a concrete node type.
 */
export type NodeClass = new (options?: Record<string, unknown>) => Node;

/**
 * Built-in node registry. Keys are type tags.
 */
export const defaultNodes: Record<string, NodeClass> = {
  boolean: BooleanNode,
  string: StringNode,
  number: NumberNode,
  integer: IntegerNode,
  object: ObjectNode,
  array: ArrayNode,
  any_of: AnyOfNode,
  one_of: OneOfNode,
  all_of: AllOfNode,
};

/**
 * Register or override the node class for a type tag.
 */
export function registerNode(type: string, nodeClass: NodeClass): void {
  defaultNodes[type] = nodeClass;
}

/**
 * Looks up the node class registered for `type`.
 *
 * @throws SchemaDefinitionError if no class is registered.
 */
export function resolveNode(type: string): NodeClass {
  const nodeClass = Object.hasOwn(defaultNodes, type)
    ? defaultNodes[type]
    : undefined;

  if (!nodeClass) {
    throw new SchemaDefinitionError(`Could not find node for type "${type}".`);
  }

  return nodeClass;
}
