import { extname, join } from "path";

import { TemplateLookupError } from "../../lib/errors.js";
import { logger } from "../../lib/logger.js";
import { templateDirName } from "../../modules/module-info.js";

import { duplicateNameError } from "./conflicts.js";

import type { ModuleInfo } from "../../modules/module-info.js";
import type { TemplateFactory } from "../../templates/factories.js";
import type { Template } from "../../templates/template.js";
import type { ConflictChecker } from "./conflicts.js";
import type {
  FileTemplateEntry,
  TemplateFactoryLookup,
  TemplateIndex,
  WarningSink,
} from "./types.js";

const log = logger.child("[templates]");

/**
 * Dependencies of a {@link FileTemplateRegistry}
 */
export interface FileTemplateRegistryOptions {
  factories: TemplateFactoryLookup;
  conflicts: ConflictChecker;
  warn: WarningSink;
}

/**
 * A directory entry with a recognized extension
 */
interface ScannedFile {
  fileName: string;
  extension: string;
  factory: TemplateFactory;
}

/**
 * Editor droppings and compiled template caches
 */
export function isIgnoredFile(fileName: string): boolean {
  return fileName.startsWith(".") || fileName.endsWith("~") || fileName.endsWith(".cache");
}

/**
 * Split a file name into base name and extension (without the dot)
 */
export function splitFileName(fileName: string): { name: string; extension: string } {
  const suffix = extname(fileName);
  return {
    name: fileName.slice(0, fileName.length - suffix.length),
    extension: suffix.slice(1),
  };
}

/**
 * Templates discovered in module template directories, keyed by absolute path
 */
export class FileTemplateRegistry implements TemplateIndex {
  private entries: Map<string, FileTemplateEntry> = new Map();

  /** directory -> template name -> path */
  private names: Map<string, Map<string, string>> = new Map();

  /** module dotted name -> every directory it registered, in order */
  private moduleDirectories: Map<string, Set<string>> = new Map();

  private readonly factories: TemplateFactoryLookup;
  private readonly conflicts: ConflictChecker;
  private readonly warn: WarningSink;

  constructor(options: FileTemplateRegistryOptions) {
    this.factories = options.factories;
    this.conflicts = options.conflicts;
    this.warn = options.warn;
    this.conflicts.attach("file", this);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Scan a module's template directory and register every template in it
   *
   * Nothing is inserted unless the whole directory passes the conflict
   * checks. Paths already registered keep their entry (and association).
   *
   * @returns the entries created by this call
   */
  register(moduleInfo: ModuleInfo, dirName: string = templateDirName(moduleInfo)): FileTemplateEntry[] {
    if (moduleInfo.isPackage) {
      log.debug(`Skipping template directory of package '${moduleInfo.dottedName}'`);
      return [];
    }

    const directory = moduleInfo.getResourcePath(dirName);
    const files = moduleInfo.listFiles(directory);
    if (files === undefined) {
      log.debug(`No template directory '${directory}' for '${moduleInfo.dottedName}'`);
      return [];
    }

    const groups = this.groupByName(files, directory);
    const known = this.names.get(directory);
    const pending: FileTemplateEntry[] = [];

    for (const [name, group] of groups) {
      const [first, ...rest] = group;
      if (first === undefined) continue;
      if (rest.length > 0) {
        throw duplicateNameError(name, directory, group.map((file) => file.fileName));
      }

      const path = join(directory, first.fileName);
      const registeredPath = known?.get(name);
      if (registeredPath !== undefined) {
        if (registeredPath !== path) {
          throw duplicateNameError(name, directory, [registeredPath, path]);
        }
        continue;
      }

      const template = first.factory(first.fileName, directory);
      this.conflicts.assertNoConflict({ side: "file", moduleInfo, templateName: name, directory });

      pending.push({
        path,
        directory,
        name,
        extension: first.extension,
        module: moduleInfo.dottedName,
        template,
        associated: false,
      });
    }

    let index = known;
    if (index === undefined) {
      index = new Map();
      this.names.set(directory, index);
    }
    for (const entry of pending) {
      this.entries.set(entry.path, entry);
      index.set(entry.name, entry.path);
    }
    let registered = this.moduleDirectories.get(moduleInfo.dottedName);
    if (registered === undefined) {
      registered = new Set();
      this.moduleDirectories.set(moduleInfo.dottedName, registered);
    }
    registered.add(directory);

    log.debug(`Registered ${pending.length} template(s) from '${directory}'`);
    return pending;
  }

  /**
   * Directories that lookups for a module search, in registration order
   *
   * A module that registered nothing is searched in its default directory.
   */
  templateDirectories(moduleInfo: ModuleInfo): string[] {
    const registered = this.moduleDirectories.get(moduleInfo.dottedName);
    if (registered !== undefined) {
      return [...registered];
    }
    return [moduleInfo.getResourcePath(templateDirName(moduleInfo))];
  }

  /**
   * Find the entry for a template name in a module's template directories
   *
   * The first registered directory holding the name wins.
   *
   * @throws TemplateLookupError when no directory is known or none holds the name
   */
  resolve(moduleInfo: ModuleInfo, templateName: string): Readonly<FileTemplateEntry> {
    const directories = this.templateDirectories(moduleInfo);
    let known = false;
    for (const directory of directories) {
      const index = this.names.get(directory);
      if (index === undefined) continue;
      known = true;
      const path = index.get(templateName);
      const entry = path === undefined ? undefined : this.entries.get(path);
      if (entry !== undefined) {
        return entry;
      }
    }

    const directory = directories.join(", ");
    throw new TemplateLookupError(
      `template '${templateName}' in '${directory}' cannot be found`,
      templateName,
      { directory, reason: known ? "missing-template" : "missing-directory" }
    );
  }

  lookup(moduleInfo: ModuleInfo, templateName: string): Template {
    return this.resolve(moduleInfo, templateName).template;
  }

  locate(moduleInfo: ModuleInfo, templateName: string): string | undefined {
    return this.templateDirectories(moduleInfo).find(
      (directory) => this.names.get(directory)?.has(templateName) === true
    );
  }

  /**
   * Mark the template at a path as used; unknown paths are ignored
   */
  associate(path: string): void {
    const entry = this.entries.get(path);
    if (entry !== undefined) {
      entry.associated = true;
    }
  }

  get(path: string): Readonly<FileTemplateEntry> | undefined {
    return this.entries.get(path);
  }

  /**
   * Paths of every template no view has claimed
   */
  unassociated(): string[] {
    return [...this.entries.values()].filter((entry) => !entry.associated).map((entry) => entry.path);
  }

  clear(): void {
    this.entries.clear();
    this.names.clear();
    this.moduleDirectories.clear();
  }

  private groupByName(files: string[], directory: string): Map<string, ScannedFile[]> {
    const groups: Map<string, ScannedFile[]> = new Map();

    for (const fileName of files) {
      if (isIgnoredFile(fileName)) {
        log.debug(`Ignoring '${fileName}' in '${directory}'`);
        continue;
      }

      const { name, extension } = splitFileName(fileName);
      const factory = this.factories.factoryFor(extension);
      if (factory === undefined) {
        this.warn(`File '${fileName}' has an unrecognized extension in directory '${directory}'`);
        continue;
      }

      let group = groups.get(name);
      if (group === undefined) {
        group = [];
        groups.set(name, group);
      }
      group.push({ fileName, extension, factory });
    }

    return groups;
  }
}
