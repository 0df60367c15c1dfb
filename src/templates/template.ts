import { join } from "path";

/**
 * A registered template
 *
 * The registry never looks inside a template; it only needs to show one to a
 * human in reports and errors.
 */
export interface Template {
  describe(): string;
}

/**
 * Template backed by a file in a module's template directory
 */
export class FileTemplate implements Template {
  readonly path: string;

  constructor(
    readonly fileName: string,
    readonly directory: string
  ) {
    this.path = join(directory, fileName);
  }

  describe(): string {
    return `file template '${this.path}'`;
  }
}

/**
 * Template declared directly in code
 */
export class InlineTemplate implements Template {
  constructor(readonly source: string) {}

  describe(): string {
    const firstLine = this.source.trimStart().split("\n", 1)[0] ?? "";
    return `inline template '${firstLine.length > 40 ? `${firstLine.slice(0, 40)}...` : firstLine}'`;
  }
}
