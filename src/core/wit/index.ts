/**
 * WIT text handling: reading docs from sources, printing components, and
 * weaving docs back into printed text
 *
 * @module
 */

export { WitSourceReader, PackageDocsBuilder, scanWitSource } from "./source-reader.js";
export { WasmToolsPrinter, type WasmToolsPrinterOptions } from "./wit-printer.js";
export {
  injectDocs,
  splitLines,
  extractWorldName,
  extractFunctionName,
  leadingWhitespace,
  UNKNOWN_WORLD,
} from "./doc-injector.js";
