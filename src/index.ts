import { Node } from "./nodes/Node.js";
import { Schema, type SchemaOptions } from "./Schema.js";
import { buildSchema, type SchemaDefinition } from "./SchemaLoader.js";

/**
 * Creates a Schema from a node tree or a plain definition.
 *
 * @param definition - Root node, or a definition object for `buildSchema`.
 * @param options - Logger and other schema options.
 * @returns A Schema ready to validate data.
 * @throws SchemaDefinitionError if the definition cannot be built.
 */
export function defineSchema(
  definition: Node | SchemaDefinition,
  options: SchemaOptions = {}
): Schema {
  const root = definition instanceof Node ? definition : buildSchema(definition);
  return new Schema(root, options);
}

export { Schema } from "./Schema.js";
export type { SchemaOptions } from "./Schema.js";
export { ValidationResult } from "./ValidationResult.js";
export type { ValidationErrorEntry } from "./ValidationResult.js";
export { SchemaDefinitionError, ValidationError } from "./errors.js";
export { Node, NO_VALUE } from "./nodes/Node.js";
export type { TypeCheck } from "./nodes/Node.js";
export { CombinationNode } from "./nodes/CombinationNode.js";
export { AnyOfNode } from "./nodes/AnyOfNode.js";
export { OneOfNode } from "./nodes/OneOfNode.js";
export { AllOfNode } from "./nodes/AllOfNode.js";
export { BooleanNode } from "./nodes/BooleanNode.js";
export { StringNode } from "./nodes/StringNode.js";
export { NumberNode } from "./nodes/NumberNode.js";
export { IntegerNode } from "./nodes/IntegerNode.js";
export { ObjectNode } from "./nodes/ObjectNode.js";
export { ArrayNode } from "./nodes/ArrayNode.js";
export { nodeOptionsSchema, parseOptions } from "./nodes/options.js";
export type { NodeOptions } from "./nodes/options.js";
export { defaultNodes, registerNode, resolveNode } from "./NodeRegistry.js";
export type { NodeClass } from "./NodeRegistry.js";
export { createNode, NodeBuilder } from "./SchemaBuilder.js";
export type { BuildFn } from "./SchemaBuilder.js";
export { buildSchema, loadSchema } from "./SchemaLoader.js";
export type { SchemaDefinition } from "./SchemaLoader.js";
export { parseDefinition, registerParser } from "./parser/index.js";
export type { Parser, ParserOptions } from "./parser/index.js";
export { ConsoleLogger } from "./logger/ConsoleLogger.js";
export type { LoggerProvider, LogLevel } from "./logger/LoggerProvider.js";
