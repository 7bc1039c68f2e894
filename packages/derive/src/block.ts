import {
  cursorForText,
  expectEnd,
  parseBlock,
  printBlock,
  streamToString,
  type RustBlock,
  type RustExpr,
  type RustStmt,
  type Span,
  type TokenStream,
} from "@chainset/syntax";

// Where the fragment came from: the opening quote of the string literal that held it.
export type Anchor = {
  readonly fileName: string;
  readonly start: number;
};

export class BlockContents {
  readonly stmts: readonly RustStmt[];
  readonly span?: Span;

  private constructor(stmts: readonly RustStmt[], span: Span | undefined) {
    this.stmts = Object.freeze([...stmts]);
    if (span) this.span = span;
    Object.freeze(this);
  }

  // The synthetic `{` lands on the quote, so fragment offsets match their place in the literal.
  static parse(text: string, anchor?: Anchor): BlockContents {
    const c = cursorForText(`{${text}}`, {
      fileName: anchor?.fileName ?? "<block>",
      baseOffset: anchor?.start ?? 0,
    });
    const block = parseBlock(c);
    expectEnd(c, "block");
    return new BlockContents(block.stmts, block.span);
  }

  static fromExpr(expr: RustExpr): BlockContents {
    const stmt: RustStmt = expr.span ? { kind: "expr", expr, semi: false, span: expr.span } : { kind: "expr", expr, semi: false };
    return new BlockContents([stmt], expr.span);
  }

  isEmpty(): boolean {
    return this.stmts.length === 0;
  }

  toBlock(): RustBlock {
    return this.span ? { stmts: this.stmts, span: this.span } : { stmts: this.stmts };
  }

  toTokens(): TokenStream {
    return [printBlock(this.toBlock())];
  }

  toString(): string {
    return streamToString(this.toTokens());
  }
}
