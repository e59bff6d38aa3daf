/**
 * view command - show the docs embedded in a component
 */

import { MissingDocsError, withContext } from "../../core/errors.js";
import type { DocTree } from "../../core/docs/doc-tree.js";
import type { IWitRenderer } from "../../core/interfaces/IWitRenderer.js";
import { extractDocTree } from "../../core/wasm/section-codec.js";
import { WasmToolsPrinter } from "../../core/wit/wit-printer.js";
import { injectDocs } from "../../core/wit/doc-injector.js";
import { renderJson, renderMarkdown, renderPretty, type DisplayFilters } from "../../core/render/index.js";
import { createLogger, loadConfig, readBinaryFile } from "../../utils/index.js";
import type { WitDocsConfig } from "../../utils/validation.js";
import { applyLogLevel, stdoutSink, type OutputSink } from "../runtime.js";

const logger = createLogger("cli:view");

export const OUTPUT_FORMATS = ["pretty", "json", "markdown", "wit"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

export interface ViewOptions extends DisplayFilters {
  format?: OutputFormat;
  debug?: boolean;
}

export interface ViewDependencies {
  renderer?: IWitRenderer;
  config?: WitDocsConfig;
  output?: OutputSink;
}

/**
 * Render an extracted tree in the requested format. The "wit" format calls
 * `wit` for the component's WIT text and weaves the docs into it.
 */
export function renderDocs(
  tree: DocTree,
  format: OutputFormat,
  filters: DisplayFilters,
  wit: () => string
): string {
  switch (format) {
    case "json":
      return renderJson(tree);
    case "pretty":
      return renderPretty(tree, filters);
    case "markdown":
      return renderMarkdown(tree, filters);
    case "wit":
      return injectDocs(wit(), tree);
  }
}

/**
 * Print the docs embedded in `component`
 *
 * @throws MissingDocsError when the component has no package-docs payload
 */
export async function viewCommand(
  component: string,
  options: ViewOptions = {},
  deps: ViewDependencies = {}
): Promise<void> {
  const config = deps.config ?? loadConfig();
  applyLogLevel(config, options.debug);
  const renderer = deps.renderer ?? new WasmToolsPrinter({ command: config.wasmTools });
  const output = deps.output ?? stdoutSink;
  const format = options.format ?? "pretty";

  const bytes = await readBinaryFile(component, `Failed to read component file ${component}`);

  const tree = await withContext(
    "Failed to extract package-docs from component",
    { filePath: component },
    () => extractDocTree(bytes)
  );
  if (tree === null) {
    throw new MissingDocsError(component);
  }

  logger.debug({ format, worlds: Object.keys(tree.worlds).length }, "Rendering package-docs");
  const filters: DisplayFilters = {
    functionsOnly: options.functionsOnly,
    worldsOnly: options.worldsOnly,
  };
  output(renderDocs(tree, format, filters, () => renderer.render(component)));
}
