import type { Delimiter, Span, Token } from "../ast.js";
import { RustSyntaxError } from "../diagnostics.js";
import { DELIMITER_TEXT, tokenText } from "../lexer.js";

export type SourceText = {
  readonly text: string;
  readonly baseOffset: number;
};

const KEYWORDS = new Set([
  "as",
  "async",
  "await",
  "break",
  "const",
  "continue",
  "crate",
  "dyn",
  "else",
  "enum",
  "extern",
  "false",
  "fn",
  "for",
  "if",
  "impl",
  "in",
  "let",
  "loop",
  "match",
  "mod",
  "move",
  "mut",
  "pub",
  "ref",
  "return",
  "static",
  "struct",
  "trait",
  "true",
  "type",
  "unsafe",
  "use",
  "where",
  "while",
]);

// Path-segment keywords that may start a path.
const PATH_KEYWORDS = new Set(["self", "Self", "super", "crate"]);

export function isKeyword(text: string): boolean {
  return KEYWORDS.has(text);
}

export function describeToken(token: Token | undefined): string {
  if (!token) return "end of input";
  return `'${tokenText(token)}'`;
}

export class Cursor {
  private pos = 0;

  constructor(
    readonly tokens: readonly Token[],
    private readonly eofSpan: Span,
    readonly source?: SourceText
  ) {}

  get index(): number {
    return this.pos;
  }

  reset(index: number): void {
    this.pos = index;
  }

  atEnd(): boolean {
    return this.pos >= this.tokens.length;
  }

  peek(offset = 0): Token | undefined {
    return this.tokens[this.pos + offset];
  }

  next(): Token {
    const token = this.tokens[this.pos];
    if (!token) throw this.fail("a token");
    this.pos++;
    return token;
  }

  spanAt(offset = 0): Span {
    return this.peek(offset)?.span ?? this.eofSpan;
  }

  prevSpan(): Span {
    return this.tokens[this.pos - 1]?.span ?? this.eofSpan;
  }

  spanFrom(startIndex: number): Span {
    const first = this.tokens[startIndex]?.span ?? this.eofSpan;
    const last = this.tokens[this.pos - 1]?.span ?? first;
    return { fileName: first.fileName, start: first.start, end: Math.max(first.end, last.end) };
  }

  fail(expected: string, token: Token | undefined = this.peek()): RustSyntaxError {
    if (!token) {
      return new RustSyntaxError("CHN1102", `expected ${expected}, found end of input`, this.eofSpan);
    }
    return new RustSyntaxError("CHN1101", `expected ${expected}, found ${describeToken(token)}`, token.span);
  }

  isIdent(text?: string, offset = 0): boolean {
    const token = this.peek(offset);
    if (token?.kind !== "ident") return false;
    return text === undefined || token.text === text;
  }

  // A non-keyword identifier (raw identifiers always qualify).
  isName(offset = 0): boolean {
    const token = this.peek(offset);
    return token?.kind === "ident" && !isKeyword(token.text) && !PATH_KEYWORDS.has(token.text);
  }

  isPathStart(offset = 0): boolean {
    const token = this.peek(offset);
    if (token?.kind !== "ident") return this.isPunct("::", offset);
    return !isKeyword(token.text) || PATH_KEYWORDS.has(token.text);
  }

  eatIdent(text: string): boolean {
    if (!this.isIdent(text)) return false;
    this.pos++;
    return true;
  }

  expectIdent(text: string): void {
    if (!this.eatIdent(text)) throw this.fail(`'${text}'`);
  }

  expectName(what = "identifier"): string {
    const token = this.peek();
    if (token?.kind !== "ident" || isKeyword(token.text)) throw this.fail(what);
    this.pos++;
    return token.text;
  }

  isLifetime(offset = 0): boolean {
    return this.peek(offset)?.kind === "lifetime";
  }

  expectLifetime(): string {
    const token = this.peek();
    if (token?.kind !== "lifetime") throw this.fail("lifetime");
    this.pos++;
    return token.text;
  }

  isLiteral(offset = 0): boolean {
    return this.peek(offset)?.kind === "literal";
  }

  // Multi-character operators match runs of joint punctuation.
  isPunct(op: string, offset = 0): boolean {
    for (let i = 0; i < op.length; i++) {
      const token = this.peek(offset + i);
      if (token?.kind !== "punct" || token.text !== op[i]) return false;
      if (i < op.length - 1 && !token.joint) return false;
    }
    return true;
  }

  eatPunct(op: string): boolean {
    if (!this.isPunct(op)) return false;
    this.pos += op.length;
    return true;
  }

  expectPunct(op: string): void {
    if (!this.eatPunct(op)) throw this.fail(`'${op}'`);
  }

  isOpen(delim: Delimiter, offset = 0): boolean {
    const token = this.peek(offset);
    return token?.kind === "open" && token.delim === delim;
  }

  isClose(delim?: Delimiter, offset = 0): boolean {
    const token = this.peek(offset);
    return token?.kind === "close" && (delim === undefined || token.delim === delim);
  }

  expectOpen(delim: Delimiter): void {
    if (!this.isOpen(delim)) throw this.fail(`'${DELIMITER_TEXT[delim][0]}'`);
    this.pos++;
  }

  expectClose(delim: Delimiter): void {
    if (!this.isClose(delim)) throw this.fail(`'${DELIMITER_TEXT[delim][1]}'`);
    this.pos++;
  }

  eatClose(delim: Delimiter): boolean {
    if (!this.isClose(delim)) return false;
    this.pos++;
    return true;
  }

  // Consumes a delimited group and returns its inner tokens.
  takeGroup(): { readonly delim: Delimiter; readonly tokens: readonly Token[] } {
    const open = this.peek();
    if (open?.kind !== "open") throw this.fail("'(', '[' or '{'");
    let depth = 0;
    const start = this.pos;
    while (this.pos < this.tokens.length) {
      const token = this.next();
      if (token.kind === "open") depth++;
      if (token.kind === "close") {
        depth--;
        if (depth === 0) {
          return { delim: open.delim, tokens: this.tokens.slice(start + 1, this.pos - 1) };
        }
      }
    }
    throw this.fail(`'${DELIMITER_TEXT[open.delim][1]}'`);
  }

  // Source text between two token indices, when the original text is known.
  textBetween(startIndex: number, endIndex: number): string | undefined {
    if (!this.source) return undefined;
    const first = this.tokens[startIndex];
    const last = this.tokens[endIndex - 1];
    if (!first || !last) return undefined;
    return this.source.text.slice(first.span.start - this.source.baseOffset, last.span.end - this.source.baseOffset);
  }
}
