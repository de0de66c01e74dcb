import { z } from "zod";
import { SchemaDefinitionError } from "./errors.js";
import { parseDefinition } from "./parser/index.js";
import { type BuildFn, createNode } from "./SchemaBuilder.js";
import { Node } from "./nodes/Node.js";

/**
 * Plain-data description of a schema tree, e.g. loaded from JSON or YAML.
 *
 * `items` are the children of combinators and the element schema of an
 * array; `properties` are the named children of an object. Every other key
 * is passed to the node as an option.
 */
export type SchemaDefinition = {
  type: string;
  items?: SchemaDefinition[];
  properties?: Record<string, SchemaDefinition>;
  [option: string]: unknown;
};

const definitionSchema: z.ZodType<SchemaDefinition> = z.lazy(() =>
  z
    .object({
      type: z.string(),
      items: z.array(definitionSchema).optional(),
      properties: z.record(definitionSchema).optional(),
    })
    .passthrough()
);

/**
 * Builds a finalized node tree from a definition.
 *
 * @param definition - Definition object, typically parsed from a file.
 * @returns The root node.
 * @throws SchemaDefinitionError if the definition is malformed or a node
 * cannot be built.
 */
export function buildSchema(definition: unknown): Node {
  const parsed = definitionSchema.safeParse(definition);

  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const location = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new SchemaDefinitionError(
      `Invalid schema definition at ${location}: ${issue.message}.`
    );
  }

  return buildNode(parsed.data);
}

/**
 * Parses a definition document and builds its node tree.
 *
 * @param rawContent - Document text, or UTF-8 bytes.
 * @param format - `json`, `yaml`, or a registered format.
 */
export function loadSchema(
  rawContent: string | Uint8Array,
  format: string
): Node {
  return buildSchema(parseDefinition(rawContent, format));
}

function buildNode(definition: SchemaDefinition): Node {
  const { type, items, properties, ...options } = definition;

  let build: BuildFn | undefined;
  if (items !== undefined || properties !== undefined) {
    build = (builder) => {
      for (const item of items ?? []) {
        builder.add(buildNode(item));
      }
      for (const [name, property] of Object.entries(properties ?? {})) {
        builder.add(buildNode({ ...property, name }));
      }
    };
  }

  return createNode(type, options, build);
}
