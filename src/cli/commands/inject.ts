/**
 * inject command - embed WIT docs in a component as a package-docs section
 */

import chalk from "chalk";
import * as path from "node:path";
import { withContext } from "../../core/errors.js";
import type { IDocSource } from "../../core/interfaces/IDocSource.js";
import { WitSourceReader } from "../../core/wit/source-reader.js";
import { SECTION_NAME, encodeDocTree } from "../../core/wasm/section-codec.js";
import { rewriteModule } from "../../core/wasm/module-rewriter.js";
import { createLogger, loadConfig, readBinaryFile, writeBinaryFile } from "../../utils/index.js";
import type { WitDocsConfig } from "../../utils/validation.js";
import { applyLogLevel, stderrSink, type OutputSink } from "../runtime.js";

const logger = createLogger("cli:inject");

export interface InjectOptions {
  /** Input component path */
  component: string;
  /** WIT package directory whose docs are embedded */
  witDir: string;
  /** Output path */
  out?: string;
  /** Overwrite the input component */
  inplace?: boolean;
  /** Keep package-docs sections already in the component */
  append?: boolean;
  debug?: boolean;
}

export interface InjectDependencies {
  docSource?: IDocSource;
  config?: WitDocsConfig;
  /** Where the status line goes (default stderr) */
  status?: OutputSink;
}

export const DOCS_SUFFIX = ".docs.wasm";
export const FALLBACK_SUFFIX = ".docs.injected.wasm";

/**
 * Output path used when neither --out nor --inplace is given: the component's
 * stem plus `.docs.wasm` beside it. An extension-less input is treated as
 * `.wasm` first. If that lands on the input itself, `.docs.injected.wasm` is
 * used instead.
 */
export function deriveOutputPath(component: string): string {
  const withExtension = path.extname(component) === "" ? `${component}.wasm` : component;
  const parent = path.dirname(withExtension);
  const stem = path.basename(withExtension, path.extname(withExtension));

  const derived = path.join(parent, `${stem}${DOCS_SUFFIX}`);
  if (path.resolve(derived) === path.resolve(component)) {
    return path.join(parent, `${stem}${FALLBACK_SUFFIX}`);
  }
  return derived;
}

export function resolveOutputPath(options: Pick<InjectOptions, "component" | "out" | "inplace">): string {
  if (options.inplace) return options.component;
  if (options.out) return options.out;
  return deriveOutputPath(options.component);
}

/**
 * Embed the docs of `witDir` into `component` and write the result
 *
 * @returns The path written
 */
export async function injectCommand(
  options: InjectOptions,
  deps: InjectDependencies = {}
): Promise<string> {
  const config = deps.config ?? loadConfig();
  applyLogLevel(config, options.debug);
  const onExisting = options.append ? "append" : config.onExisting;
  const docSource = deps.docSource ?? new WitSourceReader();
  const status = deps.status ?? stderrSink;

  logger.info({ component: options.component, witDir: options.witDir }, "Injecting package-docs");

  const input = await readBinaryFile(options.component, `reading ${options.component}`);

  const { packageId, tree } = await withContext(
    `parsing WIT dir ${options.witDir}`,
    { filePath: options.witDir },
    () => docSource.read(options.witDir)
  );
  logger.debug({ packageId, worlds: Object.keys(tree.worlds) }, "Extracted package docs");

  const payload = await withContext("encoding package-docs", {}, () => encodeDocTree(tree));

  const rewritten = await withContext(
    "reencoding original component",
    { filePath: options.component },
    () => rewriteModule(input, SECTION_NAME, payload, { onExisting })
  );
  if (rewritten.replaced > 0) {
    logger.info({ replaced: rewritten.replaced }, "Replaced existing package-docs sections");
  }

  const outPath = resolveOutputPath(options);
  await writeBinaryFile(outPath, rewritten.bytes, `writing ${outPath}`);

  status(`${chalk.green("Injected package-docs into")} ${outPath}\n`);
  return outPath;
}
