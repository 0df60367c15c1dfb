import type { ModuleInfo } from "../../modules/module-info.js";
import type { TemplateFactory } from "../../templates/factories.js";
import type { Template } from "../../templates/template.js";

/**
 * Receives recoverable anomalies found while registering templates
 */
export type WarningSink = (message: string) => void;

/**
 * Resolves a file extension (without the dot) to a template factory
 */
export interface TemplateFactoryLookup {
  factoryFor(extension: string): TemplateFactory | undefined;
}

/**
 * Which of the two registries an entry lives in
 */
export type TemplateSide = "file" | "inline";

/**
 * A template found in a module's template directory
 */
export interface FileTemplateEntry {
  /** Absolute path, the entry's key */
  path: string;
  directory: string;
  /** File name without its extension */
  name: string;
  extension: string;
  /**
   * Dotted name of the module whose scan created the entry; a later module
   * sharing the directory does not take it over
   */
  module: string;
  template: Template;
  associated: boolean;
}

/**
 * Key of an inline template
 */
export interface InlineTemplateKey {
  module: string;
  name: string;
}

/**
 * A template declared in code
 */
export interface InlineTemplateEntry extends InlineTemplateKey {
  template: Template;
  associated: boolean;
}

/**
 * Answers whether a registry holds a template for a (module, name) pair
 */
export interface TemplateIndex {
  /**
   * Where the template lives (a directory for files, a dotted module name for
   * inline templates), or undefined when there is none
   */
  locate(moduleInfo: ModuleInfo, templateName: string): string | undefined;
}

/**
 * Templates nobody claimed, as reported at the end of a run
 */
export interface UnassociatedReport {
  inline: InlineTemplateKey[];
  files: string[];
}
