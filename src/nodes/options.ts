import { z } from "zod";
import { SchemaDefinitionError } from "../errors.js";
import { inspectValue } from "../utils/value.js";

/**
 * Options every node accepts.
 */
export const nodeOptionsSchema = z
  .object({
    name: z.string().optional(),
    required: z.boolean().optional(),
    default: z.unknown().optional(),
    description: z.string().optional(),
    example: z.unknown().optional(),
    enum: z.union([z.array(z.unknown()), z.set(z.unknown())]).optional(),
  })
  .strict();

export type NodeOptions = z.input<typeof nodeOptionsSchema>;

/**
 * Validates an option bag against a node's option schema.
 *
 * @param schema - Strict zod object schema of the node type.
 * @param options - Options as given by the caller.
 * @returns The parsed options.
 * @throws SchemaDefinitionError for unknown keys or badly typed values.
 */
export function parseOptions<S extends z.ZodTypeAny>(
  schema: S,
  options: unknown
): z.output<S> {
  const parsed = schema.safeParse(options ?? {});
  if (parsed.success) return parsed.data;

  const unknownKeys = parsed.error.issues.flatMap((issue) =>
    issue.code === "unrecognized_keys" ? issue.keys : []
  );

  if (unknownKeys.length > 0) {
    throw new SchemaDefinitionError(
      `Options ${inspectValue(unknownKeys)} are not allowed for this node.`
    );
  }

  const [issue] = parsed.error.issues;
  if (issue.path.length === 0) {
    throw new SchemaDefinitionError(
      `Invalid options for this node: ${issue.message}.`
    );
  }

  throw new SchemaDefinitionError(
    `Invalid option "${issue.path.join(".")}" for this node: ${issue.message}.`
  );
}
