/**
 * IWitRenderer - source of a component's WIT text
 *
 * The injector weaves documentation into whatever text this returns; it does
 * not care how the text was produced.
 *
 * @module
 */

/**
 * Produces the textual WIT rendering of a compiled component.
 *
 * @example
 * ```typescript
 * const printer = new WasmToolsPrinter({ command: "wasm-tools" });
 * const wit = printer.render("./app.wasm");
 * ```
 */
export interface IWitRenderer {
  /**
   * Render the component's interface as WIT text
   * @param componentPath - Path of the component binary
   * @throws SubprocessError when the renderer is missing, fails, or emits non-UTF-8 output
   */
  render(componentPath: string): string;
}
