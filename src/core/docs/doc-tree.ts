/**
 * DocTree - documentation extracted from a WIT package
 *
 * The JSON form of this tree is what the package-docs custom section carries.
 * Fields the tool does not read are kept as they are and never rejected.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Schemas
// =============================================================================

/**
 * Per-function metadata in its object form. `docs: null` reads as no docs.
 */
export const FuncDocsSchema = z
  .object({
    docs: z.string().nullish(),
  })
  .passthrough();

/**
 * A function entry. Older payloads stored only the docs text, so a bare string
 * (or null for "no docs") is accepted alongside the object form.
 */
export const FuncEntrySchema = z.union([FuncDocsSchema, z.string(), z.null()]);

export const FuncMapSchema = z.record(z.string(), FuncEntrySchema);

export const WorldDocsSchema = z
  .object({
    docs: z.string().nullish(),
    func_exports: FuncMapSchema.optional(),
    func_imports: FuncMapSchema.optional(),
    /** Legacy name for func_exports */
    functions: FuncMapSchema.optional(),
  })
  .passthrough();

export const InterfaceDocsSchema = z
  .object({
    docs: z.string().nullish(),
    funcs: FuncMapSchema.optional(),
  })
  .passthrough();

export const DocTreeSchema = z
  .object({
    docs: z.string().nullish(),
    worlds: z.record(z.string(), WorldDocsSchema).default({}),
    interfaces: z.record(z.string(), InterfaceDocsSchema).optional(),
  })
  .passthrough();

// =============================================================================
// Types
// =============================================================================

export type FuncDocs = z.infer<typeof FuncDocsSchema>;
export type FuncEntry = z.infer<typeof FuncEntrySchema>;
export type FuncMap = z.infer<typeof FuncMapSchema>;
export type WorldDocs = z.infer<typeof WorldDocsSchema>;
export type InterfaceDocs = z.infer<typeof InterfaceDocsSchema>;
export type DocTree = z.infer<typeof DocTreeSchema>;

// =============================================================================
// Accessors
// =============================================================================

/**
 * Docs text of a function entry, whichever form it is stored in
 */
export function functionDocs(entry: FuncEntry | undefined): string | undefined {
  if (entry === undefined || entry === null) return undefined;
  if (typeof entry === "string") return entry;
  return entry.docs ?? undefined;
}

/**
 * Create an empty tree
 */
export function createDocTree(): DocTree {
  return { worlds: {} };
}
