import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { NotBoundError } from "../src/directives/parser.js";
import { stringReferenceExtractor } from "../src/directives/reference.js";
import {
  DEFAULT_PREPROCESSOR_OPTIONS,
  Preprocessor,
  resolvePreprocessorOptions,
} from "../src/preprocessor/index.js";
import {
  InMemoryResourceResolver,
  InMemoryResourceStore,
  type ResolutionResult,
  type ResourceResolver,
} from "../src/resources/index.js";
import { SyntaxTree } from "../src/syntax/index.js";
import type { Resource } from "../src/types.js";
import { IMPORT, resource } from "./_fixtures.js";

// ═══════════════════════════════════════════════════════════════════════════
// Preprocessor
//
// Resolves the include graph below a root (depth-first, cycle and depth
// checks) and hands the dependency-ordered resources to the merge engine.
// ═══════════════════════════════════════════════════════════════════════════

function setup(files: Record<string, string>) {
  const store = new InMemoryResourceStore();
  for (const [id, text] of Object.entries(files)) store.add(resource(id, text));
  const preprocessor = new Preprocessor({
    kind: IMPORT,
    extractor: stringReferenceExtractor,
    resolver: new InMemoryResourceResolver(store),
  });
  const root = (id: string): Resource => {
    const found = store.get(id);
    assert.ok(found, `no resource ${id}`);
    return found;
  };
  return { preprocessor, root };
}

describe("preprocessor: merging", () => {
  test("merges a root with its dependency", async () => {
    const { preprocessor, root } = setup({ main: 'import "lib"\nlet x = 1', lib: "let y = 2" });
    const result = await preprocessor.process(root("main"));
    assert.equal(result.content.toText(), "let y = 2\nlet x = 1");
    assert.equal(result.success, true);
    assert.deepEqual(result.diagnostics, []);
    assert.deepEqual(
      result.resources.map((r) => r.id),
      ["lib", "main"],
    );
    assert.deepEqual(result.sourceMap.query(0), { resource: "lib", originalOffset: 0 });
  });

  test("different spellings of one document load it once under its canonical id", async () => {
    const { preprocessor, root } = setup({
      "src/main": 'import "util"\nimport "../shared/base"\nmain',
      "src/util": 'import "../shared/base"\nutil',
      "shared/base": "base",
    });
    const result = await preprocessor.process(root("src/main"));
    assert.equal(result.content.toText(), "base\nutil\nbase\nmain");
    assert.deepEqual(
      result.resources.map((r) => r.id),
      ["shared/base", "src/util", "src/main"],
    );
  });

  test("a root without directives comes back unchanged", async () => {
    const { preprocessor, root } = setup({ main: "let x = 1" });
    const result = await preprocessor.process(root("main"));
    assert.equal(result.content, root("main").content);
    assert.equal(result.success, true);
  });

  test("the resolver decides identity per occurrence", async () => {
    const files: Record<string, string> = {
      main: 'import "a"\nimport "b"',
      a: 'import "util"',
      b: 'import "util"',
      "a-util": "AU",
      "b-util": "BU",
    };
    // "util" means a different document depending on who imports it
    const resolver: ResourceResolver = {
      async resolve(reference, context): Promise<ResolutionResult> {
        const id = reference === "util" && context ? `${context.id}-util` : reference;
        return { ok: true, resource: resource(id, files[id] ?? "") };
      },
    };
    const preprocessor = new Preprocessor({ kind: IMPORT, extractor: stringReferenceExtractor, resolver });
    const result = await preprocessor.process(resource("main", files.main));
    assert.equal(result.content.toText(), "AU\nBU");
    assert.deepEqual(
      result.resources.map((r) => r.id),
      ["a-util", "a", "b-util", "b", "main"],
    );
  });
});

describe("preprocessor: resolution errors", () => {
  test("a missing import returns the root unmerged", async () => {
    const { preprocessor, root } = setup({ main: 'import "nope"\nrest' });
    const result = await preprocessor.process(root("main"));
    assert.equal(result.success, false);
    assert.equal(result.content, root("main").content);
    assert.deepEqual(result.sourceMap.segments, [
      { generatedStart: 0, resource: "main", originalStart: 0, length: 18 },
    ]);
    const [diagnostic] = result.diagnostics;
    assert.equal(diagnostic.kind, "resolution-failed");
    assert.equal(diagnostic.resource, "main");
    assert.deepEqual(diagnostic.location, { start: 0, end: 0 });
    assert.equal(diagnostic.lineColumn, "1:1");
  });

  test("a cycle is reported with its path", async () => {
    const { preprocessor, root } = setup({ a: 'import "b"\nA', b: 'import "a"\nB' });
    const result = await preprocessor.process(root("a"));
    assert.equal(result.success, false);
    assert.deepEqual(
      result.diagnostics.map((d) => [d.kind, d.resource, d.message]),
      [["circular-dependency", "b", "Circular dependency detected: a -> b -> a"]],
    );
    assert.deepEqual(result.diagnostics[0].cycle, ["a", "b", "a"]);
  });

  test("a self import is a cycle", async () => {
    const { preprocessor, root } = setup({ main: 'import "main"' });
    const result = await preprocessor.process(root("main"));
    assert.deepEqual(result.diagnostics[0].cycle, ["main", "main"]);
  });

  test("includes deeper than maxIncludeDepth are rejected", async () => {
    const { preprocessor, root } = setup({ a: 'import "b"', b: 'import "c"', c: "C" });

    const deep = await preprocessor.process(root("a"), { maxIncludeDepth: 1 });
    assert.deepEqual(
      deep.diagnostics.map((d) => [d.kind, d.resource, d.target, d.message]),
      [["max-depth-exceeded", "b", "c", 'Maximum include depth of 1 exceeded including "c"']],
    );

    const none = await preprocessor.process(root("a"), { maxIncludeDepth: 0 });
    assert.equal(none.diagnostics[0].target, "b");

    const enough = await preprocessor.process(root("a"), { maxIncludeDepth: 2 });
    assert.equal(enough.content.toText(), "C");
  });

  test("the depth limit does not depend on import order", async () => {
    // t sits at depth 2 through s and at depth 3 through a -> s
    const shared = { a: 'import "s"', s: 'import "t"', t: "T" };
    const reports: (string | undefined)[][][] = [];
    for (const main of ['import "s"\nimport "a"', 'import "a"\nimport "s"']) {
      const { preprocessor, root } = setup({ ...shared, main });
      const result = await preprocessor.process(root("main"), { maxIncludeDepth: 2 });
      assert.equal(result.success, false, main);
      assert.equal(result.content, root("main").content, main);
      reports.push(result.diagnostics.map((d) => [d.kind, d.resource, d.target]));
    }
    assert.deepEqual(reports, [
      [["max-depth-exceeded", "a", "s"]],
      [["max-depth-exceeded", "s", "t"]],
    ]);
  });

  test("a reused dependency within the limit is accepted", async () => {
    const { preprocessor, root } = setup({
      main: 'import "s"\nimport "a"',
      a: 'import "s"',
      s: 'import "t"',
      t: "T",
    });
    const result = await preprocessor.process(root("main"), { maxIncludeDepth: 3 });
    assert.equal(result.success, true);
    assert.equal(result.content.toText(), "T\nT");
  });

  test("resolution stops at the first error unless continueOnError is set", async () => {
    const { preprocessor, root } = setup({ main: 'import "x"\nimport "y"' });

    const first = await preprocessor.process(root("main"));
    assert.deepEqual(
      first.diagnostics.map((d) => d.reference),
      ["x"],
    );

    const all = await preprocessor.process(root("main"), { continueOnError: true });
    assert.deepEqual(
      all.diagnostics.map((d) => d.reference),
      ["x", "y"],
    );
  });
});

describe("preprocessor: caller errors", () => {
  test("an unbound root is rejected", async () => {
    const { preprocessor } = setup({});
    await assert.rejects(
      preprocessor.process({ id: "main", content: SyntaxTree.parse('import "a"') }),
      NotBoundError,
    );
  });

  test("invalid options are rejected", async () => {
    const { preprocessor, root } = setup({ main: "x" });
    await assert.rejects(preprocessor.process(root("main"), { maxIncludeDepth: -1 }), RangeError);
  });

  test("an aborted signal stops resolution", async () => {
    const { preprocessor, root } = setup({ main: 'import "lib"', lib: "L" });
    const controller = new AbortController();
    controller.abort();
    await assert.rejects(preprocessor.process(root("main"), { signal: controller.signal }), { name: "AbortError" });
  });
});

describe("resolvePreprocessorOptions", () => {
  test("fills in defaults", () => {
    assert.deepEqual(resolvePreprocessorOptions(), DEFAULT_PREPROCESSOR_OPTIONS);
    assert.deepEqual(resolvePreprocessorOptions({ continueOnError: true }), {
      maxIncludeDepth: 100,
      continueOnError: true,
      signal: undefined,
    });
  });

  test("maxIncludeDepth must be a non-negative integer", () => {
    assert.throws(() => resolvePreprocessorOptions({ maxIncludeDepth: 1.5 }), RangeError);
    assert.throws(() => resolvePreprocessorOptions({ maxIncludeDepth: -1 }), RangeError);
  });
});
