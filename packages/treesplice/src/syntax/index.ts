export { SyntaxTree, SyntaxNode, ROOT_KIND } from "./tree.js";
export { SyntaxEditor } from "./editor.js";
export { Schema, SchemaBuilder, PatternBuilder } from "./schema.js";
export type { Pattern, PatternElement, SyntaxDefinition } from "./schema.js";
export { treeLength, sliceTree } from "./content.js";
export { SpliceLexer, allTokens } from "./lexer.js";
export type { TokenKind } from "./lexer.js";
export type { GreenNode, GreenToken, GreenBlock, GreenSyntax } from "./green.js";
