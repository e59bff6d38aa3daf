/**
 * Plain renderers: JSON, terminal listing, markdown
 *
 * @module
 */

export * from "./types.js";
export { renderJson } from "./json.js";
export { renderPretty, PRETTY_PLACEHOLDER } from "./pretty.js";
export { renderMarkdown, MARKDOWN_PLACEHOLDER } from "./markdown.js";
