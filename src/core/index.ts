/**
 * Core module - shared by the inject and view commands
 */

// Re-export error classes
export * from "./errors.js";

// Re-export all core modules
export * from "./docs/index.js";
export * from "./wasm/index.js";
export * from "./wit/index.js";
export * from "./render/index.js";

// Re-export interfaces
export * from "./interfaces/index.js";
