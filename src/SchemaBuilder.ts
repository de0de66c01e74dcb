import { SchemaDefinitionError } from "./errors.js";
import { type NodeClass, resolveNode } from "./NodeRegistry.js";
import { Node } from "./nodes/Node.js";

/**
 * Callback that adds children to a node under construction.
 */
export type BuildFn = (builder: NodeBuilder) => void;

/**
 * Collects the children of one node while it is being built.
 */
export class NodeBuilder {
  constructor(private readonly node: Node) {}

  /**
   * Appends an existing node, or creates one from a type tag and appends it.
   *
   * @returns The appended child.
   */
  add(
    child: Node | string | NodeClass,
    options: Record<string, unknown> = {},
    build?: BuildFn
  ): Node {
    const node =
      child instanceof Node ? child : createNode(child, options, build);

    this.node.attach(node);
    return node;
  }
}

/**
 * Creates a finalized node.
 *
 * @param type - Registered type tag or node class.
 * @param options - Option bag of the node type.
 * @param build - Adds children before the node is finalized.
 * @throws SchemaDefinitionError for unknown types, bad options, or a node
 * that fails its self-check.
 */
export function createNode(
  type: string | NodeClass,
  options: Record<string, unknown> = {},
  build?: BuildFn
): Node {
  const nodeClass = typeof type === "string" ? resolveNode(type) : type;
  const node = new nodeClass(options);

  if (build) {
    if (!node.acceptsChildren()) {
      throw new SchemaDefinitionError(
        `Node "${node.type}" does not support children.`
      );
    }
    build(new NodeBuilder(node));
  }

  return node.finalize();
}
