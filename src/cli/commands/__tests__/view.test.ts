import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import { isOutputFormat, renderDocs, viewCommand } from "../view.js";
import { EXIT_FAILURE, EXIT_NO_DOCS, exitCodeFor } from "../../runtime.js";
import { SECTION_NAME, encodeDocTree } from "../../../core/wasm/section-codec.js";
import { DecodingError, MissingDocsError, SubprocessError } from "../../../core/errors.js";
import type { IWitRenderer } from "../../../core/interfaces/IWitRenderer.js";
import type { DocTree } from "../../../core/docs/doc-tree.js";
import type { WitDocsConfig } from "../../../utils/validation.js";
import { bytes, customSection, sampleComponent } from "../../../core/wasm/__tests__/fixtures.js";

const config: WitDocsConfig = { wasmTools: "wasm-tools", onExisting: "replace" };

const tree: DocTree = {
  worlds: { app: { docs: "Top level.", func_exports: { run: { docs: "Runs it." } } } },
};

class FakeWitRenderer implements IWitRenderer {
  readonly calls: string[] = [];

  constructor(private readonly text: string) {}

  render(componentPath: string): string {
    this.calls.push(componentPath);
    return this.text;
  }
}

class FailingWitRenderer implements IWitRenderer {
  render(): string {
    throw new SubprocessError("wasm-tools component wit failed (exit code 1): bad component");
  }
}

describe("viewCommand", () => {
  let tempDir: string;
  let componentPath: string;
  let output: string[];
  const collect = (text: string) => {
    output.push(text);
  };

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "view-test-"));
    componentPath = path.join(tempDir, "app.wasm");
    output = [];
    await fs.writeFile(componentPath, bytes(sampleComponent(), customSection(SECTION_NAME, encodeDocTree(tree))));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("prints the pretty listing by default", async () => {
    await viewCommand(componentPath, {}, { config, output: collect });
    expect(output.join("")).toBe("World: app\n  Top level.\n\nExported Functions:\n  run: Runs it.\n\n");
  });

  it("prints JSON", async () => {
    await viewCommand(componentPath, { format: "json" }, { config, output: collect });
    expect(JSON.parse(output.join(""))).toEqual(tree);
  });

  it("prints markdown with filters", async () => {
    await viewCommand(componentPath, { format: "markdown", worldsOnly: true }, { config, output: collect });
    expect(output.join("")).toBe("# World: app\n\nTop level.\n\n");
  });

  it("weaves docs into the printed WIT", async () => {
    const renderer = new FakeWitRenderer("package local:app;\n\nworld app {\n  export run: func();\n}\n");
    await viewCommand(componentPath, { format: "wit" }, { config, renderer, output: collect });

    expect(renderer.calls).toEqual([componentPath]);
    expect(output.join("")).toBe(
      "package local:app;\n\n/// Top level.\nworld app {\n  /// Runs it.\n  export run: func();\n}\n"
    );
  });

  it("does not run the printer for other formats", async () => {
    const renderer = new FakeWitRenderer("");
    await viewCommand(componentPath, { format: "markdown" }, { config, renderer, output: collect });
    expect(renderer.calls).toEqual([]);
  });

  it("propagates printer failures", async () => {
    await expect(
      viewCommand(componentPath, { format: "wit" }, { config, renderer: new FailingWitRenderer(), output: collect })
    ).rejects.toThrow(SubprocessError);
    expect(output).toEqual([]);
  });

  it("reports a component without package-docs as missing docs", async () => {
    await fs.writeFile(componentPath, sampleComponent());
    const result = viewCommand(componentPath, {}, { config, output: collect });

    await expect(result).rejects.toThrow(MissingDocsError);
    await expect(result).rejects.toThrow("No package-docs found in component");
  });

  it("reports a payload-less section as missing docs", async () => {
    await fs.writeFile(componentPath, bytes(sampleComponent(), customSection(SECTION_NAME, [1])));
    await expect(viewCommand(componentPath, {}, { config, output: collect })).rejects.toThrow(MissingDocsError);
  });

  it("propagates a corrupt payload with context", async () => {
    await fs.writeFile(componentPath, bytes(sampleComponent(), customSection(SECTION_NAME, [1, 0x7b])));
    const result = viewCommand(componentPath, {}, { config, output: collect });

    await expect(result).rejects.toThrow(DecodingError);
    await expect(result).rejects.toThrow(/^Failed to extract package-docs from component: Failed to parse package-docs JSON/);
  });
});

describe("exit codes", () => {
  it("uses a dedicated status for missing docs", () => {
    expect(exitCodeFor(new MissingDocsError("a.wasm"))).toBe(EXIT_NO_DOCS);
    expect(exitCodeFor(new DecodingError("bad"))).toBe(EXIT_FAILURE);
    expect(exitCodeFor("boom")).toBe(EXIT_FAILURE);
    expect(EXIT_NO_DOCS).not.toBe(EXIT_FAILURE);
  });
});

describe("output formats", () => {
  it("recognises the four formats", () => {
    expect(["pretty", "json", "markdown", "wit", "yaml"].map(isOutputFormat)).toEqual([
      true,
      true,
      true,
      true,
      false,
    ]);
  });

  it("only asks for WIT text in the wit format", () => {
    let asked = 0;
    const wit = () => {
      asked++;
      return "world app {\n}\n";
    };
    renderDocs(tree, "json", {}, wit);
    expect(asked).toBe(0);
    expect(renderDocs(tree, "wit", {}, wit)).toBe("/// Top level.\nworld app {\n}\n");
    expect(asked).toBe(1);
  });
});
