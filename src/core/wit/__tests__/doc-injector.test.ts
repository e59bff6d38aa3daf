import { describe, it, expect } from "vitest";
import {
  extractFunctionName,
  extractWorldName,
  injectDocs,
  leadingWhitespace,
  splitLines,
} from "../doc-injector.js";
import type { DocTree } from "../../docs/doc-tree.js";

describe("injectDocs", () => {
  it("annotates a world and its export", () => {
    const tree: DocTree = {
      worlds: { app: { docs: "Top level.", func_exports: { run: { docs: "Runs it." } } } },
    };
    const wit = "world app {\n  export run: func();\n}";

    expect(injectDocs(wit, tree)).toBe(
      "/// Top level.\nworld app {\n  /// Runs it.\n  export run: func();\n}\n"
    );
  });

  it("uses the single world when the declared name differs", () => {
    const tree: DocTree = { worlds: { w1: { func_exports: { foo: { docs: "Foo docs." } } } } };
    const wit = "world other {\n  export foo: func();\n}\n";

    expect(injectDocs(wit, tree)).toBe("world other {\n  /// Foo docs.\n  export foo: func();\n}\n");
  });

  it("inserts nothing when several worlds match no name", () => {
    const tree: DocTree = {
      worlds: {
        a: { docs: "A.", func_exports: { foo: { docs: "A foo." } } },
        b: { docs: "B.", func_exports: { foo: { docs: "B foo." } } },
      },
    };
    const wit = "package x:y;\n\nworld c {\n  export foo: func();\n}\n";

    expect(injectDocs(wit, tree)).toBe(wit);
  });

  it("copies the declaration's indentation exactly", () => {
    const tree: DocTree = { worlds: { w: { func_exports: { foo: { docs: "One.\nTwo." } } } } };
    const wit = "world w {\n\t  export foo: func();\n}";

    expect(injectDocs(wit, tree)).toBe("world w {\n\t  /// One.\n\t  /// Two.\n\t  export foo: func();\n}\n");
  });

  it("writes multi-line world docs one comment per line", () => {
    const tree: DocTree = { worlds: { w: { docs: "First.\nSecond." } } };
    expect(injectDocs("world w {\n}\n", tree)).toBe("/// First.\n/// Second.\nworld w {\n}\n");
  });

  it("resolves the functions alias", () => {
    const tree: DocTree = { worlds: { w: { functions: { foo: { docs: "Alias." } } } } };
    expect(injectDocs("world w {\n  export foo: func();\n}", tree)).toBe(
      "world w {\n  /// Alias.\n  export foo: func();\n}\n"
    );
  });

  it("documents import lines from the exported functions", () => {
    const tree: DocTree = {
      worlds: {
        w: {
          func_exports: { foo: { docs: "From exports." } },
          func_imports: { foo: { docs: "From imports." } },
        },
      },
    };
    const wit = "world w {\n  import foo: func();\n}\n";

    expect(injectDocs(wit, tree)).toBe("world w {\n  /// From exports.\n  import foo: func();\n}\n");
  });

  it("documents import lines when func_imports is empty", () => {
    const tree: DocTree = { worlds: { w: { func_exports: { foo: { docs: "A." } }, func_imports: {} } } };
    expect(injectDocs("world w {\n  import foo: func();\n}", tree)).toBe(
      "world w {\n  /// A.\n  import foo: func();\n}\n"
    );
  });

  it("skips imports that only func_imports documents", () => {
    const tree: DocTree = { worlds: { w: { func_imports: { log: { docs: "Logs." } } } } };
    const wit = "world w {\n  import log: func(msg: string);\n}\n";
    expect(injectDocs(wit, tree)).toBe(wit);
  });

  it("writes nothing for null docs", () => {
    const tree: DocTree = { worlds: { w: { docs: null, func_exports: { f: { docs: null } } } } };
    const wit = "world w {\n  export f: func();\n}\n";
    expect(injectDocs(wit, tree)).toBe(wit);
  });

  it("leaves interface imports and unknown lines alone", () => {
    const tree: DocTree = { worlds: { w: { docs: "W." } } };
    const wit = [
      "package local:demo;",
      "",
      "world w {",
      "  import wasi:cli/environment@0.2.0;",
      "  export handler;",
      "  use types.{ item };",
      "}",
    ].join("\n");

    expect(injectDocs(wit, tree)).toBe(
      "package local:demo;\n\n/// W.\nworld w {\n  import wasi:cli/environment@0.2.0;\n  export handler;\n  use types.{ item };\n}\n"
    );
  });

  it("ignores export lines outside a world body", () => {
    const tree: DocTree = { worlds: { w: { func_exports: { foo: { docs: "Foo." } } } } };
    const wit = "interface api {\n  export foo: func();\n}\nworld w {\n}\n  export foo: func();\n";

    expect(injectDocs(wit, tree)).toBe(wit);
  });

  it("ends a world body at the first lone closing brace", () => {
    const tree: DocTree = {
      worlds: { w: { func_exports: { a: { docs: "A." }, b: { docs: "B." } } } },
    };
    const wit = "world w {\n  export a: func();\n  }\n  export b: func();\n}\n";

    expect(injectDocs(wit, tree)).toBe("world w {\n  /// A.\n  export a: func();\n  }\n  export b: func();\n}\n");
  });

  it("handles several worlds in one rendering", () => {
    const tree: DocTree = {
      worlds: {
        first: { docs: "One.", func_exports: { go: { docs: "Go one." } } },
        second: { docs: "Two.", func_exports: { go: { docs: "Go two." } } },
      },
    };
    const wit = "world first {\n  export go: func();\n}\nworld second {\n  export go: func();\n}\n";

    expect(injectDocs(wit, tree)).toBe(
      "/// One.\nworld first {\n  /// Go one.\n  export go: func();\n}\n" +
        "/// Two.\nworld second {\n  /// Go two.\n  export go: func();\n}\n"
    );
  });

  it("strips carriage returns from CRLF input", () => {
    const tree: DocTree = { worlds: { w: { docs: "W." } } };
    expect(injectDocs("world w {\r\n}\r\n", tree)).toBe("/// W.\nworld w {\n}\n");
  });

  it("returns empty output for empty input", () => {
    expect(injectDocs("", { worlds: {} })).toBe("");
  });

  it("emits nothing for empty docs", () => {
    const tree: DocTree = { worlds: { w: { docs: "" } } };
    expect(injectDocs("world w {\n}\n", tree)).toBe("world w {\n}\n");
  });

  it("is deterministic", () => {
    const tree: DocTree = { worlds: { app: { docs: "Top.", func_exports: { run: { docs: "Run." } } } } };
    const wit = "world app {\n  export run: func();\n}\n";
    expect(injectDocs(wit, tree)).toBe(injectDocs(wit, tree));
  });
});

describe("line helpers", () => {
  it("splits like a line iterator", () => {
    expect(splitLines("a\nb\n")).toEqual(["a", "b"]);
    expect(splitLines("a\n\nb")).toEqual(["a", "", "b"]);
    expect(splitLines("a\r\nb")).toEqual(["a", "b"]);
    expect(splitLines("\n")).toEqual([""]);
  });

  it("extracts world names", () => {
    expect(extractWorldName("world app {")).toBe("app");
    expect(extractWorldName("world\tspaced   {")).toBe("spaced");
    expect(extractWorldName("world")).toBe("unknown");
  });

  it("extracts function names before the first colon", () => {
    expect(extractFunctionName("export run: func();")).toBe("run");
    expect(extractFunctionName("import log : func(msg: string);")).toBe("log");
    expect(extractFunctionName("export %type: func();")).toBe("type");
    expect(extractFunctionName("import wasi:cli/environment@0.2.0;")).toBe("wasi");
    expect(extractFunctionName("export handler;")).toBeUndefined();
    expect(extractFunctionName("export: func();")).toBeUndefined();
  });

  it("measures leading whitespace", () => {
    expect(leadingWhitespace("  \tx  ")).toBe("  \t");
    expect(leadingWhitespace("x")).toBe("");
  });
});
