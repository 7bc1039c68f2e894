export * from "./ast.js";
export * from "./diagnostics.js";
export { DELIMITER_TEXT, rustStringLiteral, tokenize, tokenText } from "./lexer.js";
export type { LexOptions } from "./lexer.js";
export { parseOuterAttributes } from "./parser/attrs.js";
export { Cursor, describeToken, isKeyword } from "./parser/cursor.js";
export type { SourceText } from "./parser/cursor.js";
export { isBlockLike, parseBlock, parseBlockExpr, parseExpr, parsePattern } from "./parser/expr.js";
export {
  cursorForText,
  expectEnd,
  parseGenericParams,
  parseItemHead,
  parseTypeDeclaration,
  parseTypeDeclarationFrom,
  parseVisibility,
  parseWhereClause,
  scanItems,
} from "./parser/items.js";
export type { ItemHead, SourceItem } from "./parser/items.js";
export { parsePath, parseType } from "./parser/types.js";
export {
  exprToString,
  printBlock,
  printExpr,
  printPattern,
  printStmt,
  printType,
  streamToString,
  tokensToStream,
  tokensToString,
  typeToString,
} from "./print.js";
export type { TokenStream, TokenTree } from "./print.js";
export {
  emitBlockInline,
  emitExpr,
  emitGenericParams,
  emitImplItems,
  emitPath,
  emitPattern,
  emitStmt,
  emitType,
  emitVisibility,
  emitWhereClause,
  writeImplBlock,
} from "./write.js";
