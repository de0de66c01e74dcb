/**
 * Parses a JSON document.
 *
 * @param rawContent - Raw JSON string content.
 * @returns The parsed value.
 * @throws If the input is not valid JSON.
 */
export function parseJSON({ rawContent }: { rawContent: string }): unknown {
  return JSON.parse(rawContent);
}
