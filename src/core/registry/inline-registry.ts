import { TemplateLookupError } from "../../lib/errors.js";
import { logger } from "../../lib/logger.js";

import type { ModuleInfo } from "../../modules/module-info.js";
import type { Template } from "../../templates/template.js";
import type { ConflictChecker } from "./conflicts.js";
import type { InlineTemplateEntry, InlineTemplateKey, TemplateIndex } from "./types.js";

const log = logger.child("[templates]");

/**
 * Templates declared in code, keyed by (module dotted name, template name)
 */
export class InlineTemplateRegistry implements TemplateIndex {
  /** module dotted name -> template name -> entry */
  private modules: Map<string, Map<string, InlineTemplateEntry>> = new Map();

  private readonly conflicts: ConflictChecker;

  constructor(options: { conflicts: ConflictChecker }) {
    this.conflicts = options.conflicts;
    this.conflicts.attach("inline", this);
  }

  get size(): number {
    let total = 0;
    for (const templates of this.modules.values()) {
      total += templates.size;
    }
    return total;
  }

  /**
   * Register a template under a module; repeating a key is a no-op
   *
   * @returns the entry stored under the key
   */
  register(moduleInfo: ModuleInfo, templateName: string, template: Template): Readonly<InlineTemplateEntry> {
    const existing = this.find(moduleInfo, templateName);
    if (existing !== undefined) {
      log.debug(`Inline template '${templateName}' in '${moduleInfo.dottedName}' already registered`);
      return existing;
    }

    this.conflicts.assertNoConflict({ side: "inline", moduleInfo, templateName });

    const entry: InlineTemplateEntry = {
      module: moduleInfo.dottedName,
      name: templateName,
      template,
      associated: false,
    };
    let templates = this.modules.get(moduleInfo.dottedName);
    if (templates === undefined) {
      templates = new Map();
      this.modules.set(moduleInfo.dottedName, templates);
    }
    templates.set(templateName, entry);
    return entry;
  }

  /**
   * @throws TemplateLookupError when the module holds no such template
   */
  resolve(moduleInfo: ModuleInfo, templateName: string): Readonly<InlineTemplateEntry> {
    const entry = this.find(moduleInfo, templateName);
    if (entry === undefined) {
      throw new TemplateLookupError(
        `inline template '${templateName}' in '${moduleInfo.dottedName}' cannot be found`,
        templateName,
        { module: moduleInfo.dottedName }
      );
    }
    return entry;
  }

  lookup(moduleInfo: ModuleInfo, templateName: string): Template {
    return this.resolve(moduleInfo, templateName).template;
  }

  locate(moduleInfo: ModuleInfo, templateName: string): string | undefined {
    return this.find(moduleInfo, templateName) === undefined ? undefined : moduleInfo.dottedName;
  }

  /**
   * Mark a template as used; several views in one module may share it
   */
  associate(moduleInfo: ModuleInfo, templateName: string): void {
    const entry = this.find(moduleInfo, templateName);
    if (entry !== undefined) {
      entry.associated = true;
    }
  }

  unassociated(): InlineTemplateKey[] {
    const keys: InlineTemplateKey[] = [];
    for (const templates of this.modules.values()) {
      for (const entry of templates.values()) {
        if (!entry.associated) {
          keys.push({ module: entry.module, name: entry.name });
        }
      }
    }
    return keys;
  }

  clear(): void {
    this.modules.clear();
  }

  private find(moduleInfo: ModuleInfo, templateName: string): InlineTemplateEntry | undefined {
    return this.modules.get(moduleInfo.dottedName)?.get(templateName);
  }
}
