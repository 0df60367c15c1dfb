/**
 * Project Configuration
 *
 * Reads the YAML file describing which modules to check, the template
 * extensions to recognize, and the inline templates and views each module
 * declares.
 */

import { readFileSync } from "fs";
import { dirname, resolve } from "path";

import YAML from "yaml";
import { z } from "zod";

import { ConfigError } from "../lib/errors.js";
import { ok, err, tryCatch } from "../lib/result.js";
import { createModuleInfo } from "../modules/module-info.js";

import type { Result } from "../lib/result.js";
import type { ModuleInfo } from "../modules/module-info.js";

export const DEFAULT_CONFIG_FILE = "templates.yml";

export const DEFAULT_EXTENSIONS = ["pt", "html"] as const;

const DOTTED_NAME = /^[A-Za-z_]\w*(\.[A-Za-z_]\w*)*$/;

/**
 * A view declared by a module
 */
export const ViewConfigSchema = z.object({
  name: z.string().min(1),
  template: z.string().min(1).optional(),
  render: z.boolean().default(false),
  needsTemplate: z.boolean().optional(),
});

/**
 * A module whose templates get registered
 */
export const ModuleConfigSchema = z.object({
  name: z.string().regex(DOTTED_NAME, "Module name must be a dotted identifier"),
  /** Resource root of the module, relative to the config file */
  path: z.string().min(1),
  package: z.boolean().default(false),
  templateDir: z.string().min(1).optional(),
  inline: z.record(z.string()).default({}),
  views: z.array(ViewConfigSchema).default([]),
});

export const ProjectConfigSchema = z.object({
  extensions: z.array(z.string().min(1)).default([...DEFAULT_EXTENSIONS]),
  modules: z.array(ModuleConfigSchema).default([]),
});

export type ViewConfig = z.infer<typeof ViewConfigSchema>;
export type ModuleConfig = z.infer<typeof ModuleConfigSchema>;
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

/**
 * A validated config plus the directory module paths are relative to
 */
export interface LoadedConfig {
  config: ProjectConfig;
  baseDir: string;
}

/**
 * Parse and validate YAML config content
 */
export function parseConfig(content: string, source: string): Result<ProjectConfig, ConfigError> {
  const parsed = tryCatch(() => YAML.parse(content) as unknown);
  if (!parsed.success) {
    return err(new ConfigError(`Invalid YAML in ${source}`, { source, cause: parsed.error.message }));
  }

  // An empty file parses to null
  const validation = ProjectConfigSchema.safeParse(parsed.data ?? {});
  if (!validation.success) {
    return err(
      new ConfigError(`Invalid configuration in ${source}`, {
        source,
        issues: validation.error.issues,
      })
    );
  }

  return ok(validation.data);
}

/**
 * Load a config file from disk
 */
export function loadConfig(filePath: string): Result<LoadedConfig, ConfigError> {
  const absolutePath = resolve(filePath);
  const content = tryCatch(() => readFileSync(absolutePath, "utf-8"));
  if (!content.success) {
    return err(
      new ConfigError(`Failed to read config file: ${absolutePath}`, {
        filePath: absolutePath,
        cause: content.error.message,
      })
    );
  }

  const config = parseConfig(content.data, absolutePath);
  if (!config.success) {
    return config;
  }
  return ok({ config: config.data, baseDir: dirname(absolutePath) });
}

/**
 * Build the module info for a configured module
 */
export function toModuleInfo(module: ModuleConfig, baseDir: string): ModuleInfo {
  return createModuleInfo({
    dottedName: module.name,
    directory: resolve(baseDir, module.path),
    isPackage: module.package,
    ...(module.templateDir !== undefined ? { templateDir: module.templateDir } : {}),
  });
}
