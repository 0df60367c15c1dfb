/**
 * template-registry - maps (module, name) pairs to file and inline templates
 * and tracks which templates views have claimed
 *
 * @packageDocumentation
 */

// Registry
export {
  VERSION,
  TemplateRegistry,
  createTemplateRegistry,
  FileTemplateRegistry,
  InlineTemplateRegistry,
  ConflictChecker,
  isIgnoredFile,
  splitFileName,
} from "./core/index.js";

export type {
  TemplateRegistryOptions,
  FileTemplateRegistryOptions,
  ConflictCandidate,
  TemplateConflict,
  FileTemplateEntry,
  InlineTemplateEntry,
  InlineTemplateKey,
  TemplateFactoryLookup,
  TemplateIndex,
  TemplateSide,
  UnassociatedReport,
  WarningSink,
} from "./core/index.js";

// Modules
export { createModuleInfo, listDirectoryFiles, templateDirName } from "./modules/index.js";
export type { ModuleInfo, ModuleInfoOptions } from "./modules/index.js";

// Templates
export {
  FileTemplate,
  InlineTemplate,
  TemplateFactoryMap,
  createFactoryMap,
  fileTemplateFactory,
} from "./templates/index.js";
export type { Template, TemplateFactory } from "./templates/index.js";

// Views
export { checkTemplates, templateNameFor } from "./views/index.js";
export type { ViewDeclaration } from "./views/index.js";

// Library utilities
export {
  // Errors
  RegistryError,
  ConflictError,
  TemplateLookupError,
  ViewConfigurationError,
  ConfigError,
  // Result utilities
  ok,
  err,
  tryCatch,
  // Logger
  logger,
  Logger,
} from "./lib/index.js";

export type { Result, LogLevel, LoggerConfig } from "./lib/index.js";
