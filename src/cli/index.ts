#!/usr/bin/env node
/**
 * tmplreg CLI entry point
 *
 * Commands:
 * - check - Register templates, resolve views and report unassociated templates
 */

import { Command } from "commander";

import { VERSION } from "../core/index.js";

import { registerCheckCommand } from "./commands/check.js";

const program = new Command();

program
  .name("tmplreg")
  .description("Template registry checker for module template directories")
  .version(VERSION);

registerCheckCommand(program);

program.parse();
