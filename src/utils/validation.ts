/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating configuration at runtime, plus helpers shared
 * with the doc tree schema.
 *
 * @module
 */

import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

// =============================================================================
// Configuration Schema
// =============================================================================

/**
 * What to do with package-docs sections already present in a component
 */
export const OnExistingSchema = z.enum(["replace", "append"]);

export type OnExisting = z.infer<typeof OnExistingSchema>;

export const LogLevelSchema = z.custom<LogLevel>(
  (value) => typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value),
  { message: `expected one of ${LOG_LEVELS.join(", ")}` }
);

/**
 * Tool configuration schema
 */
export const WitDocsConfigSchema = z.object({
  /** Executable used to print a component's WIT text */
  wasmTools: z.string().min(1).default("wasm-tools"),

  /** Log level (default comes from LOG_LEVEL or "warn") */
  logLevel: LogLevelSchema.optional(),

  /** Policy for package-docs sections already in the input component */
  onExisting: OnExistingSchema.default("replace"),
});

export type WitDocsConfig = z.infer<typeof WitDocsConfigSchema>;

// =============================================================================
// Validation Helpers
// =============================================================================

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: z.ZodError };

/**
 * Safely validate data against a schema (returns result object)
 */
export function safeValidate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
