/**
 * Documentation model and name resolution
 *
 * @module
 */

export * from "./doc-tree.js";
export * from "./resolution.js";
