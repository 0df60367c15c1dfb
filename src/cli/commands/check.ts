/**
 * Check command - Register templates, resolve views, report unused templates
 */

import { resolve } from "path";

import ora from "ora";

import { createTemplateRegistry } from "../../core/index.js";
import { logger, tryCatch } from "../../lib/index.js";
import { InlineTemplate, createFactoryMap } from "../../templates/index.js";
import { checkTemplates } from "../../views/index.js";
import { DEFAULT_CONFIG_FILE, loadConfig, toModuleInfo } from "../config.js";
import { formatError, formatReport, isValidOutputFormat } from "../formatters.js";

import type { Command } from "commander";

import type { UnassociatedReport } from "../../core/index.js";
import type { ProjectConfig } from "../config.js";

/**
 * Outcome of checking a project
 */
export interface CheckReport {
  modules: number;
  /** File and inline templates registered */
  templates: number;
  views: number;
  errors: Error[];
  warnings: string[];
  unassociated: UnassociatedReport;
}

/**
 * Run both phases over a project config
 *
 * Every module is registered before any view is resolved, so declaration
 * order in the config does not matter. A failing module or view is
 * recorded and the run continues with the next one.
 */
export function runCheck(config: ProjectConfig, baseDir: string): CheckReport {
  const warnings: string[] = [];
  const errors: Error[] = [];
  const registry = createTemplateRegistry({
    factories: createFactoryMap(config.extensions),
    warn: (message) => warnings.push(message),
  });

  const modules = config.modules.map((module) => ({ module, info: toModuleInfo(module, baseDir) }));

  for (const { module, info } of modules) {
    const registered = tryCatch(() => registry.registerDirectory(info));
    if (!registered.success) {
      errors.push(registered.error);
    }
    for (const [name, source] of Object.entries(module.inline)) {
      const result = tryCatch(() => registry.registerInlineTemplate(info, name, new InlineTemplate(source)));
      if (!result.success) {
        errors.push(result.error);
      }
    }
  }
  logger.debug(`Registered ${registry.files.size} file and ${registry.inline.size} inline template(s)`);

  let views = 0;
  for (const { module, info } of modules) {
    for (const view of module.views) {
      views += 1;
      const result = tryCatch(() =>
        checkTemplates(registry, info, {
          name: view.name,
          template: view.template,
          hasRender: view.render,
          needsTemplate: view.needsTemplate,
        })
      );
      if (!result.success) {
        errors.push(result.error);
      }
    }
  }

  const unassociated = registry.checkUnassociated();

  return {
    modules: modules.length,
    templates: registry.files.size + registry.inline.size,
    views,
    errors,
    warnings,
    unassociated,
  };
}

/**
 * Exit code for a finished check
 */
export function exitCodeFor(report: CheckReport, strict: boolean): number {
  if (report.errors.length > 0) return 1;
  if (strict && report.warnings.length > 0) return 1;
  return 0;
}

export function registerCheckCommand(program: Command): void {
  program
    .command("check [config]")
    .description("Register templates, resolve views and report unassociated templates")
    .option("-o, --output <format>", "Output format: terminal, json", "terminal")
    .option("--strict", "Exit non-zero when warnings were emitted")
    .option("-v, --verbose", "Verbose output")
    .option("-q, --quiet", "Quiet mode (errors only)")
    .action((configPath: string | undefined, options: Record<string, unknown>) => {
      const isQuiet = Boolean(options["quiet"]);
      const isVerbose = Boolean(options["verbose"]);

      if (isQuiet) {
        logger.configure({ level: "error" });
      } else if (isVerbose) {
        logger.configure({ level: "debug" });
      }

      const outputFormat = String(options["output"] ?? "terminal");
      if (!isValidOutputFormat(outputFormat)) {
        console.error(formatError(new Error(`Invalid output format: ${outputFormat}. Use: terminal, json`)));
        process.exit(1);
      }

      const showSpinner = outputFormat === "terminal" && !isQuiet;
      const spinner = showSpinner ? ora("Loading configuration...").start() : null;

      const filePath = resolve(configPath ?? DEFAULT_CONFIG_FILE);
      logger.debug(`Loading configuration from: ${filePath}`);
      const loaded = loadConfig(filePath);
      if (!loaded.success) {
        spinner?.fail("Failed to load configuration");
        console.error(formatError(loaded.error));
        process.exit(1);
      }

      if (spinner) {
        spinner.text = `Checking ${loaded.data.config.modules.length} module(s)...`;
      }
      const report = runCheck(loaded.data.config, loaded.data.baseDir);
      spinner?.stop();

      console.log(formatReport(report, outputFormat));
      process.exit(exitCodeFor(report, Boolean(options["strict"])));
    });
}
