import { load } from "js-yaml";

/**
 * Parses a YAML document.
 *
 * @param rawContent - Raw YAML string content.
 * @returns The parsed value.
 * @throws If the document is not valid YAML.
 */
export function parseYAML({ rawContent }: { rawContent: string }): unknown {
  return load(rawContent);
}
