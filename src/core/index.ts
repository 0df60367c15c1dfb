/**
 * Core registry
 *
 * This module contains:
 * - registry/ - File and inline template registries, conflict checks, unified lookup
 */

export const VERSION = "0.1.0";

export {
  TemplateRegistry,
  createTemplateRegistry,
  FileTemplateRegistry,
  InlineTemplateRegistry,
  ConflictChecker,
  isIgnoredFile,
  splitFileName,
  type TemplateRegistryOptions,
  type FileTemplateRegistryOptions,
  type ConflictCandidate,
  type TemplateConflict,
  type FileTemplateEntry,
  type InlineTemplateEntry,
  type InlineTemplateKey,
  type TemplateFactoryLookup,
  type TemplateIndex,
  type TemplateSide,
  type UnassociatedReport,
  type WarningSink,
} from "./registry/index.js";
