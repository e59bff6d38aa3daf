import { describe, it, expect } from "vitest";
import { renderJson } from "../json.js";
import { renderPretty } from "../pretty.js";
import { renderMarkdown } from "../markdown.js";
import type { DocTree } from "../../docs/doc-tree.js";

const tree: DocTree = {
  worlds: {
    app: {
      docs: "Top level.",
      func_exports: { run: { docs: "Runs it." }, stop: {} },
      func_imports: { log: { docs: "Logs." } },
    },
    bare: {},
  },
};

describe("renderJson", () => {
  it("prints the tree as indented JSON", () => {
    expect(renderJson({ worlds: { w: { docs: "W." } } })).toBe(
      '{\n  "worlds": {\n    "w": {\n      "docs": "W."\n    }\n  }\n}\n'
    );
  });
});

describe("renderPretty", () => {
  it("lists worlds and functions", () => {
    expect(renderPretty(tree)).toBe(
      [
        "World: app",
        "  Top level.",
        "",
        "Exported Functions:",
        "  run: Runs it.",
        "  stop: (no documentation)",
        "",
        "Imported Functions:",
        "  log: Logs.",
        "",
        "World: bare",
        "  (no documentation)",
        "",
        "",
      ].join("\n")
    );
  });

  it("hides world sections with functionsOnly", () => {
    expect(renderPretty(tree, { functionsOnly: true })).toBe(
      "  run: Runs it.\n  stop: (no documentation)\n\n  log: Logs.\n\n"
    );
  });

  it("hides functions with worldsOnly", () => {
    expect(renderPretty(tree, { worldsOnly: true })).toBe(
      "World: app\n  Top level.\n\nWorld: bare\n  (no documentation)\n\n"
    );
  });

  it("prints nothing per world with both filters", () => {
    expect(renderPretty(tree, { functionsOnly: true, worldsOnly: true })).toBe("");
  });

  it("reports a tree without worlds", () => {
    expect(renderPretty({ worlds: {} })).toBe("No world documentation found\n");
  });

  it("reads exported functions through the alias", () => {
    const legacy: DocTree = { worlds: { w: { docs: "W.", functions: { f: "Old." } } } };
    expect(renderPretty(legacy)).toBe("World: w\n  W.\n\nExported Functions:\n  f: Old.\n\n");
  });
});

describe("renderMarkdown", () => {
  it("renders headings per world and function", () => {
    expect(renderMarkdown(tree)).toBe(
      [
        "# World: app",
        "",
        "Top level.",
        "",
        "## Exported Functions",
        "",
        "### `run`",
        "Runs it.",
        "",
        "### `stop`",
        "*(no documentation)*",
        "",
        "## Imported Functions",
        "",
        "### `log`",
        "Logs.",
        "",
        "# World: bare",
        "",
        "*(no documentation)*",
        "",
        "",
      ].join("\n")
    );
  });

  it("drops section headings with functionsOnly", () => {
    expect(renderMarkdown({ worlds: { w: { func_exports: { f: { docs: "F." } } } } }, { functionsOnly: true })).toBe(
      "### `f`\nF.\n\n"
    );
  });

  it("hides functions with worldsOnly", () => {
    expect(renderMarkdown(tree, { worldsOnly: true })).toBe(
      "# World: app\n\nTop level.\n\n# World: bare\n\n*(no documentation)*\n\n"
    );
  });

  it("does not modify the tree", () => {
    const before = JSON.stringify(tree);
    renderMarkdown(tree, { functionsOnly: true });
    renderPretty(tree, { worldsOnly: true });
    expect(JSON.stringify(tree)).toBe(before);
  });
});
