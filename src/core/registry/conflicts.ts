import { ConflictError } from "../../lib/errors.js";

import type { ModuleInfo } from "../../modules/module-info.js";
import type { TemplateIndex, TemplateSide } from "./types.js";

/**
 * A template about to be inserted into one of the registries
 */
export type ConflictCandidate =
  | { side: "file"; moduleInfo: ModuleInfo; templateName: string; directory: string }
  | { side: "inline"; moduleInfo: ModuleInfo; templateName: string };

/**
 * An inline and a file template claiming the same name
 */
export interface TemplateConflict {
  templateName: string;
  /** Dotted name of the module owning the inline template */
  module: string;
  /** Directory holding the file template */
  directory: string;
}

/**
 * Cross-checks the file and inline registries
 *
 * Each registry attaches itself under its side; a candidate is checked
 * against the other side only.
 */
export class ConflictChecker {
  private indexes: Map<TemplateSide, TemplateIndex> = new Map();

  attach(side: TemplateSide, index: TemplateIndex): void {
    this.indexes.set(side, index);
  }

  /**
   * Find the entry of the other registry a candidate would collide with
   */
  find(candidate: ConflictCandidate): TemplateConflict | undefined {
    const other: TemplateSide = candidate.side === "file" ? "inline" : "file";
    const location = this.indexes.get(other)?.locate(candidate.moduleInfo, candidate.templateName);
    if (location === undefined) {
      return undefined;
    }

    if (candidate.side === "file") {
      return { templateName: candidate.templateName, module: location, directory: candidate.directory };
    }
    return {
      templateName: candidate.templateName,
      module: candidate.moduleInfo.dottedName,
      directory: location,
    };
  }

  /**
   * Throw a ConflictError if the candidate collides with the other registry
   */
  assertNoConflict(candidate: ConflictCandidate): void {
    const conflict = this.find(candidate);
    if (conflict !== undefined) {
      throw conflictError(conflict);
    }
  }
}

export function conflictError(conflict: TemplateConflict): ConflictError {
  return new ConflictError(
    `Conflicting templates found for name '${conflict.templateName}': ` +
      `the inline template in module '${conflict.module}' conflicts ` +
      `with the file template in directory '${conflict.directory}'`,
    { ...conflict }
  );
}

export function duplicateNameError(templateName: string, directory: string, files: string[]): ConflictError {
  return new ConflictError(
    `Conflicting templates found for name '${templateName}' in directory '${directory}': ` +
      "multiple templates with the same name and different extensions.",
    { templateName, directory, files }
  );
}
