#!/usr/bin/env node

/**
 * wit-docs-view
 * View documentation from a component's package-docs section
 */

import { Command, Option } from "commander";
import chalk from "chalk";
import { OUTPUT_FORMATS, viewCommand, type ViewOptions } from "./commands/view.js";
import { handleError } from "./runtime.js";

const program = new Command();

program
  .name("wit-docs-view")
  .description("View documentation from a WebAssembly component's package-docs custom section")
  .version("0.1.0")
  .argument("<component>", "Path to the WebAssembly component (.wasm) file")
  .addOption(
    new Option("--format <format>", "Output format").choices(OUTPUT_FORMATS).default("pretty")
  )
  .option("--functions-only", "Show only function documentation")
  .option("--worlds-only", "Show only world documentation")
  .option("-d, --debug", "Enable debug logging")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  })
  .action(async (component: string, options: ViewOptions) => {
    await viewCommand(component, options);
  });

program.parseAsync(process.argv).catch(handleError);
