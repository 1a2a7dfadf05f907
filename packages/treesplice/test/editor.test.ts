import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { SyntaxTree } from "../src/syntax/index.js";
import { bound, IMPORT } from "./_fixtures.js";

// ═══════════════════════════════════════════════════════════════════════════
// Syntax editor
//
// Batched replace/remove with trivia preservation. Removed and replaced
// nodes keep their leading and trailing trivia in the output.
// ═══════════════════════════════════════════════════════════════════════════

function firstImport(tree: SyntaxTree) {
  const [node] = tree.select(IMPORT);
  assert.ok(node, "expected an import node");
  return node;
}

describe("editor: remove", () => {
  test("removing a node hands its trivia to the next token", () => {
    const tree = bound('a\nimport "x"\nb');
    const editor = tree.createEditor();
    editor.remove(firstImport(tree));
    assert.equal(editor.commit().toText(), "a\n\nb");
  });

  test("removing the last node keeps the preceding text", () => {
    const tree = bound('a\nimport "x"');
    const editor = tree.createEditor();
    editor.remove(firstImport(tree));
    assert.equal(editor.commit().toText(), "a\n");
  });

  test("removing every token leaves the trivia as end trivia", () => {
    const tree = bound('import "x"  ');
    const editor = tree.createEditor();
    editor.remove(firstImport(tree));
    const result = editor.commit();
    assert.equal(result.root.children.length, 0);
    assert.equal(result.toText(), "  ");
  });

  test("removes inside blocks", () => {
    const tree = bound('f(import "x")');
    const editor = tree.createEditor();
    editor.remove(firstImport(tree));
    assert.equal(editor.commit().toText(), "f()");
  });
});

describe("editor: replace", () => {
  test("replacement nodes take over the node's trivia", () => {
    const tree = bound('a\n  import "x"\nb');
    const editor = tree.createEditor();
    editor.replace(firstImport(tree), bound("q r").root.children);
    assert.equal(editor.commit().toText(), "a\n  q r\nb");
  });

  test("replacing with nothing behaves like removal", () => {
    const tree = bound('a import "x" b');
    const editor = tree.createEditor();
    editor.replace(firstImport(tree), []);
    assert.equal(editor.commit().toText(), "a  b");
  });

  test("several edits apply in one commit", () => {
    const tree = bound('import "a"\nmid\nimport "b"');
    const [first, second] = tree.select(IMPORT);
    const editor = tree.createEditor();
    editor.replace(second, bound("B").root.children);
    editor.replace(first, bound("A").root.children);
    assert.equal(editor.pendingEdits, 2);
    assert.equal(editor.commit().toText(), "A\nmid\nB");
  });

  test("the committed tree keeps the schema", () => {
    const tree = bound('import "x"\nimport "y"');
    const editor = tree.createEditor();
    editor.remove(firstImport(tree));
    const result = editor.commit();
    assert.equal(result.schema, tree.schema);
    assert.equal(result.select(IMPORT).length, 1);
  });

  test("the source tree is not modified", () => {
    const tree = bound('import "x"\nrest');
    const editor = tree.createEditor();
    editor.remove(firstImport(tree));
    editor.commit();
    assert.equal(tree.toText(), 'import "x"\nrest');
  });
});

describe("editor: contract", () => {
  test("commit without edits returns the same tree", () => {
    const tree = bound("a b");
    assert.equal(tree.createEditor().commit(), tree);
  });

  test("commit can only be called once", () => {
    const editor = bound("a").createEditor();
    editor.commit();
    assert.throws(() => editor.commit(), /only be called once/);
  });

  test("editing after commit throws", () => {
    const tree = bound('import "x"');
    const editor = tree.createEditor();
    editor.commit();
    assert.throws(() => editor.remove(firstImport(tree)), /after commit/);
  });

  test("nodes of another tree are rejected", () => {
    const other = bound('import "y"');
    const editor = bound('import "x"').createEditor();
    assert.throws(() => editor.remove(firstImport(other)), /does not belong/);
  });

  test("the root cannot be edited", () => {
    const tree = bound("a");
    assert.throws(() => tree.createEditor().remove(tree.root), /root node/);
  });

  test("block delimiters cannot be edited on their own", () => {
    const tree = SyntaxTree.parse("(a)");
    const [block] = tree.root.children;
    assert.throws(() => tree.createEditor().remove(block.children[0]), /delimiters/);
  });
});
