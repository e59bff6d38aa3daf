/**
 * WIT printer backed by `wasm-tools component wit`
 *
 * Runs synchronously with no timeout: a hang in the tool is a hang of the
 * command, and any failure aborts it.
 *
 * @module
 */

import { spawnSync } from "node:child_process";
import type { IWitRenderer } from "../interfaces/IWitRenderer.js";
import { ErrorCode, SubprocessError } from "../errors.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("wit-printer");

export interface WasmToolsPrinterOptions {
  /** Executable name or path (default "wasm-tools") */
  command?: string;
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

export class WasmToolsPrinter implements IWitRenderer {
  private readonly command: string;

  constructor(options: WasmToolsPrinterOptions = {}) {
    this.command = options.command ?? "wasm-tools";
  }

  render(componentPath: string): string {
    const args = ["component", "wit", componentPath];
    const display = `${this.command} ${args.join(" ")}`;
    logger.debug({ command: display }, "Printing component WIT");

    const result = spawnSync(this.command, args, { maxBuffer: 256 * 1024 * 1024 });

    if (result.error) {
      const notFound = "code" in result.error && result.error.code === "ENOENT";
      throw new SubprocessError(
        notFound
          ? `Failed to run ${this.command} component wit: ${this.command} not found`
          : `Failed to run ${this.command} component wit: ${result.error.message}`,
        notFound ? ErrorCode.SUBPROCESS_NOT_FOUND : ErrorCode.SUBPROCESS_FAILED,
        { command: display }
      );
    }

    if (result.status !== 0) {
      const stderr = result.stderr.toString("utf-8").trim();
      const reason = result.status === null ? `killed by ${result.signal ?? "signal"}` : `exit code ${result.status}`;
      throw new SubprocessError(
        `${this.command} component wit failed (${reason}): ${stderr}`,
        ErrorCode.SUBPROCESS_FAILED,
        { command: display, exitCode: result.status ?? undefined, stderr }
      );
    }

    try {
      return utf8.decode(result.stdout);
    } catch {
      throw new SubprocessError(
        `Failed to parse ${this.command} output as UTF-8`,
        ErrorCode.SUBPROCESS_OUTPUT_INVALID,
        { command: display }
      );
    }
  }
}
