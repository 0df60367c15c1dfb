import { TemplateLookupError } from "../../lib/errors.js";
import { logger } from "../../lib/logger.js";
import { ok, err } from "../../lib/result.js";
import { createFactoryMap } from "../../templates/factories.js";

import { ConflictChecker } from "./conflicts.js";
import { FileTemplateRegistry } from "./file-registry.js";
import { InlineTemplateRegistry } from "./inline-registry.js";

import type { Result } from "../../lib/result.js";
import type { ModuleInfo } from "../../modules/module-info.js";
import type { Template } from "../../templates/template.js";
import type {
  FileTemplateEntry,
  InlineTemplateKey,
  TemplateFactoryLookup,
  UnassociatedReport,
  WarningSink,
} from "./types.js";

/**
 * Capture a lookup miss; any other error propagates
 */
function attemptLookup<T>(lookup: () => T): Result<T, TemplateLookupError> {
  try {
    return ok(lookup());
  } catch (error) {
    if (error instanceof TemplateLookupError) {
      return err(error);
    }
    throw error;
  }
}

/**
 * Options for creating a {@link TemplateRegistry}
 */
export interface TemplateRegistryOptions {
  /** Extension to factory mapping, empty by default */
  factories?: TemplateFactoryLookup;
  /** Where recoverable anomalies go, the `[templates]` logger by default */
  warn?: WarningSink;
}

/**
 * Owns the file and inline registries and resolves names across both
 *
 * Registration happens first, in any order. Views then resolve their
 * templates through {@link lookup}, and a final {@link checkUnassociated}
 * reports templates no view claimed.
 */
export class TemplateRegistry {
  private fileRegistry: FileTemplateRegistry;
  private inlineRegistry: InlineTemplateRegistry;

  private readonly factories: TemplateFactoryLookup;
  private readonly warn: WarningSink;

  constructor(options: TemplateRegistryOptions = {}) {
    this.factories = options.factories ?? createFactoryMap();
    if (options.warn !== undefined) {
      this.warn = options.warn;
    } else {
      const registryLogger = logger.child("[templates]");
      this.warn = (message) => registryLogger.warn(message);
    }
    const [files, inline] = this.createRegistries();
    this.fileRegistry = files;
    this.inlineRegistry = inline;
  }

  get files(): FileTemplateRegistry {
    return this.fileRegistry;
  }

  get inline(): InlineTemplateRegistry {
    return this.inlineRegistry;
  }

  registerDirectory(moduleInfo: ModuleInfo, templateDirName?: string): FileTemplateEntry[] {
    return this.fileRegistry.register(moduleInfo, templateDirName);
  }

  registerInlineTemplate(moduleInfo: ModuleInfo, templateName: string, template: Template): void {
    this.inlineRegistry.register(moduleInfo, templateName, template);
  }

  /**
   * Resolve a name, preferring file templates over inline ones
   *
   * @throws TemplateLookupError from the file registry when neither side has the name
   */
  lookup(moduleInfo: ModuleInfo, templateName: string, markAsAssociated = false): Template {
    const file = attemptLookup(() => this.fileRegistry.resolve(moduleInfo, templateName));
    if (file.success) {
      if (markAsAssociated) {
        this.fileRegistry.associate(file.data.path);
      }
      return file.data.template;
    }

    const inline = attemptLookup(() => this.inlineRegistry.resolve(moduleInfo, templateName));
    if (inline.success) {
      if (markAsAssociated) {
        this.inlineRegistry.associate(moduleInfo, templateName);
      }
      return inline.data.template;
    }

    throw file.error;
  }

  /**
   * Check whether a name resolves without marking anything
   */
  has(moduleInfo: ModuleInfo, templateName: string): boolean {
    return (
      this.fileRegistry.locate(moduleInfo, templateName) !== undefined ||
      this.inlineRegistry.locate(moduleInfo, templateName) !== undefined
    );
  }

  unassociatedFileTemplates(): string[] {
    return this.fileRegistry.unassociated();
  }

  unassociatedInlineTemplates(): InlineTemplateKey[] {
    return this.inlineRegistry.unassociated();
  }

  /**
   * Warn about every template no view claimed
   *
   * Emits one warning per module for inline templates and one per
   * directory for file templates.
   */
  checkUnassociated(): UnassociatedReport {
    const inline = this.unassociatedInlineTemplates();
    const files = this.unassociatedFileTemplates();

    const byModule = new Map<string, string[]>();
    for (const key of inline) {
      const names = byModule.get(key.module) ?? [];
      names.push(key.name);
      byModule.set(key.module, names);
    }
    for (const [module, names] of byModule) {
      this.warn(
        `Found the following unassociated template(s) when registering '${module}': ${names.join(", ")}. ` +
          "Define views that use the template(s) to enable them."
      );
    }

    const byDirectory = new Map<string, string[]>();
    for (const path of files) {
      const entry = this.fileRegistry.get(path);
      if (entry === undefined) continue;
      const names = byDirectory.get(entry.directory) ?? [];
      names.push(`${entry.name}.${entry.extension}`);
      byDirectory.set(entry.directory, names);
    }
    for (const [directory, names] of byDirectory) {
      this.warn(
        `Found the following unassociated template(s) in directory '${directory}': ${names.join(", ")}. ` +
          "Define views that use the template(s) to enable them."
      );
    }

    return { inline, files };
  }

  /**
   * Drop every registered template
   */
  clearAll(): void {
    const [files, inline] = this.createRegistries();
    this.fileRegistry = files;
    this.inlineRegistry = inline;
  }

  private createRegistries(): [FileTemplateRegistry, InlineTemplateRegistry] {
    const conflicts = new ConflictChecker();
    return [
      new FileTemplateRegistry({ factories: this.factories, conflicts, warn: this.warn }),
      new InlineTemplateRegistry({ conflicts }),
    ];
  }
}

/**
 * Create a new TemplateRegistry instance
 */
export function createTemplateRegistry(options: TemplateRegistryOptions = {}): TemplateRegistry {
  return new TemplateRegistry(options);
}
