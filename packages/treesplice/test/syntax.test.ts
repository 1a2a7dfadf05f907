import assert from "node:assert/strict";
import { describe, test } from "node:test";
import {
  PatternBuilder,
  Schema,
  sliceTree,
  SyntaxTree,
  treeLength,
  type SyntaxNode,
} from "../src/syntax/index.js";
import { bound, IMPORT } from "./_fixtures.js";

// ═══════════════════════════════════════════════════════════════════════════
// Syntax trees
//
// Trivia attachment, block nesting, schema binding and text slicing of the
// concrete tree the merge engine operates on.
// ═══════════════════════════════════════════════════════════════════════════

function kinds(nodes: readonly SyntaxNode[]): string[] {
  return nodes.map((n) => n.kind);
}

describe("parse: text round-trip", () => {
  test("toText reproduces the input exactly", () => {
    const text = '// head\nimport "a" /* c */\n  let x = (1 + [2])\n\n';
    assert.equal(SyntaxTree.parse(text).toText(), text);
    assert.equal(bound(text).toText(), text);
  });

  test("textLength counts every character", () => {
    const tree = SyntaxTree.parse("ab \n c");
    assert.equal(tree.textLength, 6);
    assert.equal(treeLength(tree), 6);
  });

  test("a document without tokens keeps its text as end trivia", () => {
    const tree = SyntaxTree.parse("  // only\n");
    assert.equal(tree.root.children.length, 0);
    assert.equal(tree.endTrivia, "  // only\n");
    assert.equal(tree.toText(), "  // only\n");
    assert.equal(tree.textLength, 10);
  });

  test("empty tree", () => {
    assert.equal(SyntaxTree.empty.textLength, 0);
    assert.equal(SyntaxTree.empty.toText(), "");
    assert.equal(SyntaxTree.empty.hasSchema, false);
  });
});

describe("parse: trivia attachment", () => {
  test("trailing trivia runs up to and including the first newline", () => {
    const [a, b, c] = SyntaxTree.parse("a  b\n  c").root.children;
    assert.deepEqual([a.position, a.end], [0, 3]);
    assert.deepEqual([b.position, b.end], [3, 5]);
    assert.deepEqual([c.position, c.tokenStart, c.end], [5, 7, 8]);
  });

  test("trivia after the last token trails it", () => {
    const [x] = SyntaxTree.parse("x  \n\n").root.children;
    assert.equal(x.tokenEnd, 1);
    assert.equal(x.end, 5);
  });

  test("comments are trivia", () => {
    const children = SyntaxTree.parse("a /* b */ c // d").root.children;
    assert.deepEqual(
      children.map((n) => n.tokenText),
      ["a", "c"],
    );
  });

  test("token kinds", () => {
    const children = SyntaxTree.parse(`name "s" 'q' 42 + ? §`).root.children;
    assert.deepEqual(kinds(children), [
      "identifier",
      "string",
      "string",
      "number",
      "operator",
      "operator",
      "unknown",
    ]);
  });
});

describe("parse: blocks", () => {
  test("brackets nest", () => {
    const [f, call] = SyntaxTree.parse("f(a, {b})").root.children;
    assert.equal(f.kind, "identifier");
    assert.equal(call.kind, "block");
    assert.deepEqual(
      call.children.map((n) => n.tokenText || n.kind),
      ["(", "a", ",", "block", ")"],
    );
    assert.deepEqual(
      call.children[3].children.map((n) => n.tokenText),
      ["{", "b", "}"],
    );
  });

  test("an unclosed block ends at end of input", () => {
    const tree = SyntaxTree.parse("( a");
    const [block] = tree.root.children;
    assert.equal(block.kind, "block");
    assert.deepEqual(
      block.children.map((n) => n.tokenText),
      ["(", "a"],
    );
    assert.equal(tree.toText(), "( a");
  });

  test("a stray closer stays a plain token", () => {
    const children = SyntaxTree.parse(") x").root.children;
    assert.deepEqual(kinds(children), ["close", "identifier"]);
  });
});

describe("schema binding", () => {
  test("binds directive nodes in document order", () => {
    const tree = bound("import \"a\"\nimport 'b'");
    const nodes = tree.select(IMPORT);
    assert.equal(tree.hasSchema, true);
    assert.deepEqual(
      nodes.map((n) => n.position),
      [0, 11],
    );
    assert.deepEqual(kinds(nodes), [IMPORT, IMPORT]);
  });

  test("binds inside blocks", () => {
    const tree = bound('{ import "c" }');
    const [node] = tree.select(IMPORT);
    assert.equal(node.parent?.kind, "block");
    assert.equal(node.firstToken()?.tokenText, "import");
    assert.equal(node.lastToken()?.tokenText, '"c"');
  });

  test("an unbound parse has no schema and no syntax nodes", () => {
    const tree = SyntaxTree.parse('import "a"');
    assert.equal(tree.hasSchema, false);
    assert.deepEqual(tree.select(IMPORT), []);
  });

  test("the default schema binds nothing but marks the tree as bound", () => {
    const tree = SyntaxTree.parseAndBind('import "a"', Schema.default);
    assert.equal(tree.hasSchema, true);
    assert.deepEqual(tree.select(IMPORT), []);
  });

  test("multi-character symbols match one operator per character", () => {
    const pattern = new PatternBuilder().ident().symbol("=>").number().build();
    assert.equal(pattern.elements.length, 4);
    const schema = Schema.create().defineSyntax("Arrow", pattern).build();
    const [arrow] = SyntaxTree.parseAndBind("x => 1", schema).select("Arrow");
    assert.equal(arrow.children.length, 4);
  });

  test("the first matching definition wins", () => {
    const schema = Schema.create()
      .defineSyntax("Specific", new PatternBuilder().ident("use").string().build())
      .defineSyntax("Generic", new PatternBuilder().ident().string().build())
      .build();
    const tree = SyntaxTree.parseAndBind('use "a"\nload "b"', schema);
    assert.equal(tree.select("Specific").length, 1);
    assert.equal(tree.select("Generic").length, 1);
  });

  test("defining a kind twice throws", () => {
    const pattern = new PatternBuilder().ident().build();
    assert.throws(
      () => Schema.create().defineSyntax("A", pattern).defineSyntax("A", pattern),
      /already defined/,
    );
  });

  test("an empty pattern is rejected", () => {
    assert.throws(() => new PatternBuilder().build(), /at least one element/);
  });
});

describe("tree helpers", () => {
  test("newlinePositions are the offsets after each newline", () => {
    assert.deepEqual(SyntaxTree.parse("a\nb\n").newlinePositions(), [2, 4]);
  });

  test("paths are unique per node", () => {
    const tree = bound("f(a) { import \"x\" }");
    const paths = [...tree.descendants()].map((n) => n.path);
    assert.equal(new Set(paths).size, paths.length);
  });

  test("sliceTree re-parses a range with the same schema", () => {
    const tree = bound('import "a"\nlet x');
    const slice = sliceTree(tree, 11, 5);
    assert.equal(slice.toText(), "let x");
    assert.equal(slice.hasSchema, true);
    assert.equal(sliceTree(tree, 0, 11).select(IMPORT).length, 1);
  });

  test("sliceTree returns the empty tree for zero length", () => {
    assert.equal(sliceTree(bound("abc"), 1, 0), SyntaxTree.empty);
  });

  test("sliceTree rejects ranges outside the text", () => {
    const tree = bound("abc");
    assert.throws(() => sliceTree(tree, 2, 2), RangeError);
    assert.throws(() => sliceTree(tree, -1, 1), RangeError);
    assert.throws(() => sliceTree(tree, 0, 1.5), RangeError);
  });
});
