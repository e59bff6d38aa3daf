#!/usr/bin/env node

/**
 * wit-docs-inject
 * Embed the docs of a WIT package in a component's package-docs section
 */

import { Command } from "commander";
import chalk from "chalk";
import { injectCommand, type InjectOptions } from "./commands/inject.js";
import { handleError } from "./runtime.js";

const program = new Command();

program
  .name("wit-docs-inject")
  .description("Inject package-docs from a .wit source dir into a component")
  .version("0.1.0")
  .requiredOption("--component <path>", "Input component (.wasm) path")
  .requiredOption("--wit-dir <dir>", "WIT package dir whose docstrings you want to embed")
  .option("--out <path>", "Output component path (default: <name>.docs.wasm beside the input)")
  .option("--inplace", "Overwrite the input file in place", false)
  .option("--append", "Keep package-docs sections already in the component")
  .option("-d, --debug", "Enable debug logging")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  })
  .action(async (options: InjectOptions) => {
    await injectCommand(options);
  });

program.parseAsync(process.argv).catch(handleError);
