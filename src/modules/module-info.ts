import { readdirSync, statSync } from "fs";
import { join } from "path";

/**
 * What the registry needs to know about a source module
 */
export interface ModuleInfo {
  /** Fully qualified name, e.g. `shop.views.cart` */
  readonly dottedName: string;
  /** Last segment of the dotted name */
  readonly name: string;
  /** Packages own no template directory of their own */
  readonly isPackage: boolean;
  /** Explicit template directory name, overriding `<name>_templates` */
  readonly templateDir?: string | undefined;

  /**
   * Absolute path of a resource next to the module
   */
  getResourcePath(name: string): string;

  /**
   * Plain file names inside a directory, or undefined when it is not one
   */
  listFiles(directory: string): string[] | undefined;
}

/**
 * Options for a file-system backed module
 */
export interface ModuleInfoOptions {
  dottedName: string;
  /** Directory the module's resources live in */
  directory: string;
  isPackage?: boolean;
  templateDir?: string;
}

/**
 * List the files of a directory, including symbolic links to files
 */
export function listDirectoryFiles(directory: string): string[] | undefined {
  try {
    return readdirSync(directory, { withFileTypes: true })
      .filter(
        (entry) => entry.isFile() || (entry.isSymbolicLink() && isFileLink(join(directory, entry.name)))
      )
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    if (isMissingDirectory(error)) {
      return undefined;
    }
    throw error;
  }
}

/**
 * A symbolic link counts when it resolves to a file; dangling links do not
 */
function isFileLink(path: string): boolean {
  const stats = statSync(path, { throwIfNoEntry: false });
  return stats?.isFile() === true;
}

function isMissingDirectory(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) {
    return false;
  }
  return error.code === "ENOENT" || error.code === "ENOTDIR";
}

/**
 * Create a module backed by a directory on disk
 */
export function createModuleInfo(options: ModuleInfoOptions): ModuleInfo {
  const segments = options.dottedName.split(".");
  return {
    dottedName: options.dottedName,
    name: segments[segments.length - 1] ?? options.dottedName,
    isPackage: options.isPackage ?? false,
    templateDir: options.templateDir,
    getResourcePath: (name) => join(options.directory, name),
    listFiles: listDirectoryFiles,
  };
}

/**
 * Name of the directory a module's file templates live in
 */
export function templateDirName(moduleInfo: ModuleInfo): string {
  return moduleInfo.templateDir ?? `${moduleInfo.name}_templates`;
}
