export { TemplateRegistry, createTemplateRegistry, type TemplateRegistryOptions } from "./template-registry.js";
export {
  FileTemplateRegistry,
  isIgnoredFile,
  splitFileName,
  type FileTemplateRegistryOptions,
} from "./file-registry.js";
export { InlineTemplateRegistry } from "./inline-registry.js";
export {
  ConflictChecker,
  conflictError,
  duplicateNameError,
  type ConflictCandidate,
  type TemplateConflict,
} from "./conflicts.js";
export type {
  FileTemplateEntry,
  InlineTemplateEntry,
  InlineTemplateKey,
  TemplateFactoryLookup,
  TemplateIndex,
  TemplateSide,
  UnassociatedReport,
  WarningSink,
} from "./types.js";
