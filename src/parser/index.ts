import { SchemaDefinitionError } from "../errors.js";
import { parseJSON } from "./json.js";
import { parseYAML } from "./yaml.js";

/**
 * Parser function type.
 */
export type Parser = (options: ParserOptions) => unknown;

/**
 * Options for all parsers.
 */
export interface ParserOptions {
  /**
   * Raw file content, already decoded to a string.
   */
  rawContent: string;
}

/**
 * Built-in parser registry. Keys are format names.
 */
export const defaultParsers: Record<string, Parser> = {
  json: parseJSON,
  yaml: parseYAML,
};

/**
 * Register or override a parser for a given format.
 */
export function registerParser(format: string, parser: Parser): void {
  defaultParsers[format] = parser;
}

/**
 * Reads a schema definition document in the given format.
 *
 * @param rawContent - Document text, or UTF-8 bytes.
 * @param format - Registered format name (`json`, `yaml`, ...).
 * @returns The parsed, not yet checked, definition.
 * @throws SchemaDefinitionError if no parser is registered or parsing fails.
 */
export function parseDefinition(
  rawContent: string | Uint8Array,
  format: string
): unknown {
  const text =
    rawContent instanceof Uint8Array
      ? new TextDecoder().decode(rawContent)
      : rawContent;

  const parser = Object.hasOwn(defaultParsers, format)
    ? defaultParsers[format]
    : undefined;
  if (!parser) {
    throw new SchemaDefinitionError(`No parser registered for format: ${format}`);
  }

  try {
    return parser({ rawContent: text });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SchemaDefinitionError(
      `Could not parse ${format} schema definition: ${reason}`,
      { cause: err }
    );
  }
}
