/**
 * wit-docs
 *
 * Embed WIT documentation in a WebAssembly component's package-docs custom
 * section, and read it back as JSON, text, markdown or annotated WIT.
 *
 * @module
 */

export * from "./core/index.js";
export {
  injectCommand,
  viewCommand,
  deriveOutputPath,
  renderDocs,
  OUTPUT_FORMATS,
  type OutputFormat,
  type InjectOptions,
  type ViewOptions,
} from "./cli/commands/index.js";
export { loadConfig, type WitDocsConfig } from "./utils/index.js";
