import { FileTemplate } from "./template.js";

import type { Template } from "./template.js";

/**
 * Builds a template from a file name and the directory holding it
 */
export type TemplateFactory = (fileName: string, directory: string) => Template;

/**
 * Factory used for every extension the CLI config declares
 */
export const fileTemplateFactory: TemplateFactory = (fileName, directory) =>
  new FileTemplate(fileName, directory);

function normalizeExtension(extension: string): string {
  return extension.startsWith(".") ? extension.slice(1) : extension;
}

/**
 * Maps file extensions to the factories that understand them
 */
export class TemplateFactoryMap {
  private factories: Map<string, TemplateFactory> = new Map();

  /**
   * Register a factory; a leading dot on the extension is ignored
   */
  register(extension: string, factory: TemplateFactory): this {
    this.factories.set(normalizeExtension(extension), factory);
    return this;
  }

  factoryFor(extension: string): TemplateFactory | undefined {
    return this.factories.get(normalizeExtension(extension));
  }

  extensions(): string[] {
    return [...this.factories.keys()];
  }
}

/**
 * Create a factory map with the given extensions mapped to {@link fileTemplateFactory}
 */
export function createFactoryMap(extensions: readonly string[] = []): TemplateFactoryMap {
  const map = new TemplateFactoryMap();
  for (const extension of extensions) {
    map.register(extension, fileTemplateFactory);
  }
  return map;
}
