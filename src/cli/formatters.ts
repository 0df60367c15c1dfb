import chalk from "chalk";

import { RegistryError } from "../lib/errors.js";

import type { CheckReport } from "./commands/check.js";

/**
 * Output format types
 */
export type OutputFormat = "terminal" | "json";

export function isValidOutputFormat(format: string): format is OutputFormat {
  return format === "terminal" || format === "json";
}

/**
 * Format an error for terminal output
 */
export function formatError(error: Error): string {
  return chalk.red(`Error: ${error.message}`);
}

/**
 * Format a warning for terminal output
 */
export function formatWarning(message: string): string {
  return chalk.yellow(`Warning: ${message}`);
}

/**
 * Format a success message for terminal output
 */
export function formatSuccess(message: string): string {
  return chalk.green(`✓ ${message}`);
}

function serializeError(error: Error): Record<string, unknown> {
  if (error instanceof RegistryError) {
    return error.toJSON();
  }
  return { name: error.name, message: error.message };
}

/**
 * Format a check report for terminal output
 */
export function formatTerminal(report: CheckReport): string {
  const lines: string[] = [];

  lines.push(
    chalk.bold(
      `Checked ${report.modules} module(s): ${report.templates} template(s), ${report.views} view(s)`
    )
  );

  for (const error of report.errors) {
    lines.push(formatError(error));
  }
  for (const warning of report.warnings) {
    lines.push(formatWarning(warning));
  }

  if (report.errors.length === 0 && report.warnings.length === 0) {
    lines.push(formatSuccess("Every template is associated with a view"));
  } else {
    lines.push(chalk.gray(`${report.errors.length} error(s), ${report.warnings.length} warning(s)`));
  }

  return lines.join("\n");
}

/**
 * Format a check report as JSON
 */
export function formatJson(report: CheckReport): string {
  return JSON.stringify(
    {
      modules: report.modules,
      templates: report.templates,
      views: report.views,
      errors: report.errors.map(serializeError),
      warnings: report.warnings,
      unassociated: report.unassociated,
    },
    null,
    2
  );
}

export function formatReport(report: CheckReport, format: OutputFormat): string {
  return format === "json" ? formatJson(report) : formatTerminal(report);
}
