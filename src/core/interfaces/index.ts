/**
 * Core Interfaces Module
 *
 * Seams to the collaborators the core does not own: the WIT source resolver
 * and the tool that prints a component's WIT text. Tests substitute fakes.
 *
 * @module
 */

export type { IWitRenderer } from "./IWitRenderer.js";
export type { IDocSource, PackageDocs } from "./IDocSource.js";
