/**
 * Wasm binary handling: section framing, the package-docs codec, and rewriting
 *
 * @module
 */

export * from "./leb128.js";
export * from "./binary.js";
export * from "./section-codec.js";
export * from "./module-rewriter.js";
