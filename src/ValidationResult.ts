import { appendPath, toPath } from "./utils/path.js";

/**
 * A single validation failure, located by its slash-delimited data path.
 */
export type ValidationErrorEntry = {
  path: string;
  message: string;
};

/**
 * Accumulates the errors of one validation run.
 *
 * A result belongs to the call that created it. Nodes never keep a reference
 * to one, so a schema tree can be validated concurrently.
 */
export class ValidationResult {
  private readonly entries: ValidationErrorEntry[] = [];

  constructor(private readonly segments: readonly string[] = []) {}

  /**
   * The data path this result records at by default.
   */
  get path(): string {
    return toPath(this.segments);
  }

  get valid(): boolean {
    return this.entries.length === 0;
  }

  get errors(): readonly ValidationErrorEntry[] {
    return [...this.entries];
  }

  /**
   * Errors grouped by path, in the order the paths were first reported.
   */
  get messages(): Record<string, string[]> {
    const grouped: Record<string, string[]> = {};

    for (const { path, message } of this.entries) {
      (grouped[path] ??= []).push(message);
    }

    return grouped;
  }

  /**
   * Records an error at the current path, or at `path` when given.
   */
  error(message: string, path: string = this.path): void {
    this.entries.push({ path, message });
  }

  /**
   * Takes over the errors of a child validated under `segment`.
   * The child's paths are relative to that segment.
   *
   * @param child - Result the child node was validated into.
   * @param segment - Property name or array index of the child.
   */
  merge(child: ValidationResult, segment: string | number): void {
    const base = toPath([...this.segments, String(segment)]);

    for (const { path, message } of child.entries) {
      this.entries.push({ path: appendPath(base, path), message });
    }
  }

  /**
   * A fresh, empty result at the same path. Used to probe a candidate
   * without touching this one.
   */
  scoped(): ValidationResult {
    return new ValidationResult(this.segments);
  }
}
