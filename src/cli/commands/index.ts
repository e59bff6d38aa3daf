/**
 * CLI commands, callable without spawning a process
 */

export {
  injectCommand,
  deriveOutputPath,
  resolveOutputPath,
  DOCS_SUFFIX,
  FALLBACK_SUFFIX,
  type InjectOptions,
  type InjectDependencies,
} from "./inject.js";
export {
  viewCommand,
  renderDocs,
  isOutputFormat,
  OUTPUT_FORMATS,
  type OutputFormat,
  type ViewOptions,
  type ViewDependencies,
} from "./view.js";
