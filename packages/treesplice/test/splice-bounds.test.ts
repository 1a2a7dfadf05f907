import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { computeSpliceBounds } from "../src/merge/splice-bounds.js";
import { greenSyntax, greenToken } from "../src/syntax/green.js";
import { SyntaxTree } from "../src/syntax/index.js";
import { bound, IMPORT } from "./_fixtures.js";

describe("computeSpliceBounds", () => {
  test("separates leading trivia, content and trailing trivia", () => {
    const tree = bound('let x = 1\n  import "lib"  \nnext');
    const [node] = tree.select(IMPORT);
    assert.equal(node.position, 10);
    assert.deepEqual(computeSpliceBounds(node), { prefixEnd: 12, suffixStart: 24, fullEnd: 27 });
  });

  test("a node without trivia has prefixEnd at its start and suffixStart at its end", () => {
    const [node] = bound('import "lib"').select(IMPORT);
    assert.deepEqual(computeSpliceBounds(node), { prefixEnd: 0, suffixStart: 12, fullEnd: 12 });
  });

  test("works for single tokens", () => {
    const [token] = SyntaxTree.parse("x  ").root.children;
    assert.deepEqual(computeSpliceBounds(token), { prefixEnd: 0, suffixStart: 1, fullEnd: 3 });
  });

  test("bounds are ordered for every node of a tree", () => {
    const tree = bound('// c\nf( import "a" , [ 1 ] )  \n  { import "b" }\n');
    for (const node of tree.descendants()) {
      const bounds = computeSpliceBounds(node);
      assert.ok(bounds, `no bounds for ${node.kind} at ${node.position}`);
      assert.ok(node.position <= bounds.prefixEnd);
      assert.ok(bounds.prefixEnd <= bounds.suffixStart);
      assert.ok(bounds.suffixStart <= bounds.fullEnd);
      assert.equal(bounds.fullEnd, node.end);
    }
  });

  test("a node without tokens has no bounds", () => {
    const tree = SyntaxTree.fromGreen([greenToken("identifier", "x", "", " "), greenSyntax(IMPORT, [])], "", undefined);
    const [, empty] = tree.root.children;
    assert.equal(empty.kind, IMPORT);
    assert.equal(computeSpliceBounds(empty), undefined);
  });
});
