import type { Delimiter, Span, Token } from "./ast.js";
import { lexError } from "./diagnostics.js";

export type LexOptions = {
  readonly fileName?: string;
  // Added to every offset, for fragments that live inside a larger file.
  readonly baseOffset?: number;
};

const PUNCT_CHARS = new Set("=<>!~+-*/%^&|@.,;:#$?");

const OPENERS: Readonly<Record<string, Delimiter>> = { "(": "paren", "[": "bracket", "{": "brace" };
const CLOSERS: Readonly<Record<string, Delimiter>> = { ")": "paren", "]": "bracket", "}": "brace" };

export const DELIMITER_TEXT: Readonly<Record<Delimiter, readonly [string, string]>> = {
  paren: ["(", ")"],
  bracket: ["[", "]"],
  brace: ["{", "}"],
};

function isIdentStart(ch: string): boolean {
  return ch === "_" || /^\p{XID_Start}$/u.test(ch);
}

function isIdentContinue(ch: string): boolean {
  return /^\p{XID_Continue}$/u.test(ch);
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

export function rustStringLiteral(value: string): string {
  let out = '"';
  for (const ch of value) {
    switch (ch) {
      case "\\":
        out += "\\\\";
        break;
      case '"':
        out += '\\"';
        break;
      case "\n":
        out += "\\n";
        break;
      case "\r":
        out += "\\r";
        break;
      case "\t":
        out += "\\t";
        break;
      default:
        out += ch;
    }
  }
  return `${out}"`;
}

class Lexer {
  private pos = 0;
  private readonly tokens: Token[] = [];
  private readonly stack: { readonly delim: Delimiter; readonly span: Span }[] = [];
  private readonly fileName: string;
  private readonly baseOffset: number;

  constructor(
    private readonly source: string,
    opts: LexOptions
  ) {
    this.fileName = opts.fileName ?? "<input>";
    this.baseOffset = opts.baseOffset ?? 0;
  }

  private peek(offset = 0): string {
    return this.source[this.pos + offset] ?? "";
  }

  // The whole code point at `pos`; astral characters span two code units.
  private charAt(pos: number): string {
    const cp = this.source.codePointAt(pos);
    return cp === undefined ? "" : String.fromCodePoint(cp);
  }

  private identEnd(from: number): number {
    let p = from;
    while (p < this.source.length) {
      const ch = this.charAt(p);
      if (!isIdentContinue(ch)) break;
      p += ch.length;
    }
    return p;
  }

  private span(start: number, end = this.pos): Span {
    return { fileName: this.fileName, start: this.baseOffset + start, end: this.baseOffset + end };
  }

  private push(token: Token): void {
    this.tokens.push(token);
  }

  run(): Token[] {
    while (this.pos < this.source.length) {
      const ch = this.peek();
      if (/\s/u.test(ch)) {
        this.pos++;
        continue;
      }
      if (ch === "/" && this.peek(1) === "/") {
        this.lineComment();
        continue;
      }
      if (ch === "/" && this.peek(1) === "*") {
        this.blockComment();
        continue;
      }
      const opener = OPENERS[ch];
      if (opener) {
        const span = this.span(this.pos, this.pos + 1);
        this.pos++;
        this.stack.push({ delim: opener, span });
        this.push({ kind: "open", delim: opener, span });
        continue;
      }
      const closer = CLOSERS[ch];
      if (closer) {
        this.close(closer);
        continue;
      }
      if (ch === "'") {
        this.quote();
        continue;
      }
      if (ch === '"') {
        this.push(this.literal(this.pos, this.quoted(this.pos + 1, '"')));
        continue;
      }
      if (this.stringPrefixed()) continue;
      if (isDigit(ch)) {
        this.number();
        continue;
      }
      if (isIdentStart(this.charAt(this.pos))) {
        this.ident();
        continue;
      }
      if (PUNCT_CHARS.has(ch)) {
        const start = this.pos;
        this.pos++;
        this.push({ kind: "punct", text: ch, joint: PUNCT_CHARS.has(this.peek()), span: this.span(start) });
        continue;
      }
      const bad = this.charAt(this.pos);
      throw lexError("CHN1001", `unexpected character '${bad}'`, this.span(this.pos, this.pos + bad.length));
    }
    const open = this.stack.at(-1);
    if (open) {
      const [text] = DELIMITER_TEXT[open.delim];
      throw lexError("CHN1004", `unclosed delimiter '${text}'`, open.span);
    }
    return this.tokens;
  }

  private close(delim: Delimiter): void {
    const span = this.span(this.pos, this.pos + 1);
    const [, text] = DELIMITER_TEXT[delim];
    const open = this.stack.pop();
    if (!open) {
      throw lexError("CHN1005", `unexpected closing delimiter '${text}'`, span);
    }
    if (open.delim !== delim) {
      const [, expected] = DELIMITER_TEXT[open.delim];
      throw lexError("CHN1006", `mismatched closing delimiter '${text}' (expected '${expected}')`, span);
    }
    this.pos++;
    this.push({ kind: "close", delim, span });
  }

  private lineComment(): void {
    const start = this.pos;
    let end = this.source.indexOf("\n", start);
    if (end === -1) end = this.source.length;
    const text = this.source.slice(start, end).replace(/\r$/u, "");
    this.pos = end;
    if (text.startsWith("///") && !text.startsWith("////")) {
      this.docAttribute("outer", text.slice(3), start, start + text.length);
    } else if (text.startsWith("//!")) {
      this.docAttribute("inner", text.slice(3), start, start + text.length);
    }
  }

  private blockComment(): void {
    const start = this.pos;
    let depth = 0;
    let p = start;
    while (p < this.source.length) {
      if (this.source[p] === "/" && this.source[p + 1] === "*") {
        depth++;
        p += 2;
        continue;
      }
      if (this.source[p] === "*" && this.source[p + 1] === "/") {
        depth--;
        p += 2;
        if (depth === 0) break;
        continue;
      }
      p++;
    }
    if (depth !== 0) {
      throw lexError("CHN1003", "unterminated block comment", this.span(start, start + 2));
    }
    this.pos = p;
    const text = this.source.slice(start, p);
    const body = text.slice(3, -2);
    if (text.startsWith("/**") && !text.startsWith("/***") && text !== "/**/") {
      this.docAttribute("outer", body, start, p);
    } else if (text.startsWith("/*!")) {
      this.docAttribute("inner", body, start, p);
    }
  }

  private docAttribute(style: "outer" | "inner", body: string, start: number, end: number): void {
    const span = this.span(start, end);
    this.push({ kind: "punct", text: "#", joint: style === "inner", span });
    if (style === "inner") this.push({ kind: "punct", text: "!", joint: false, span });
    this.push({ kind: "open", delim: "bracket", span });
    this.push({ kind: "ident", text: "doc", span });
    this.push({ kind: "punct", text: "=", joint: false, span });
    this.push({ kind: "literal", text: rustStringLiteral(body), span });
    this.push({ kind: "close", delim: "bracket", span });
  }

  private literal(start: number, end: number): Token {
    let p = end;
    // Literal suffixes (`1u8`, `"x"suffix`) stay part of the literal.
    if (isIdentStart(this.charAt(p))) p = this.identEnd(p);
    this.pos = p;
    return { kind: "literal", text: this.source.slice(start, p), span: this.span(start, p) };
  }

  // Returns the offset just past the closing quote.
  private quoted(from: number, quote: string): number {
    let p = from;
    while (p < this.source.length) {
      const ch = this.source[p];
      if (ch === "\\") {
        p += 2;
        continue;
      }
      if (ch === quote) return p + 1;
      p++;
    }
    const start = from - 1;
    throw lexError(
      "CHN1002",
      quote === '"' ? "unterminated string literal" : "unterminated character literal",
      this.span(start, start + 1)
    );
  }

  private raw(from: number): number {
    let p = from;
    let hashes = 0;
    while (this.source[p] === "#") {
      hashes++;
      p++;
    }
    const start = this.pos;
    if (this.source[p] !== '"') {
      throw lexError("CHN1001", "malformed raw string literal", this.span(start, p));
    }
    const terminator = `"${"#".repeat(hashes)}`;
    const end = this.source.indexOf(terminator, p + 1);
    if (end === -1) {
      throw lexError("CHN1002", "unterminated raw string literal", this.span(start, start + 1));
    }
    return end + terminator.length;
  }

  private stringPrefixed(): boolean {
    const start = this.pos;
    const a = this.peek();
    const b = this.peek(1);
    const c = this.peek(2);
    if ((a === "b" || a === "c") && b === '"') {
      this.push(this.literal(start, this.quoted(start + 2, '"')));
      return true;
    }
    if (a === "b" && b === "'") {
      this.push(this.literal(start, this.quoted(start + 2, "'")));
      return true;
    }
    if (a === "r" && (b === '"' || (b === "#" && (c === '"' || c === "#")))) {
      this.push(this.literal(start, this.raw(start + 1)));
      return true;
    }
    if ((a === "b" || a === "c") && b === "r" && (c === '"' || c === "#")) {
      this.push(this.literal(start, this.raw(start + 2)));
      return true;
    }
    return false;
  }

  private quote(): void {
    const start = this.pos;
    const next = this.peek(1);
    if (next === "\\") {
      this.push(this.literal(start, this.quoted(start + 1, "'")));
      return;
    }
    const after = this.source.codePointAt(start + 1);
    const width = after !== undefined && after > 0xffff ? 2 : 1;
    if (this.peek(1 + width) === "'") {
      this.push(this.literal(start, start + 2 + width));
      return;
    }
    if (isIdentStart(this.charAt(start + 1))) {
      const p = this.identEnd(start + 1);
      this.pos = p;
      this.push({ kind: "lifetime", text: this.source.slice(start, p), span: this.span(start, p) });
      return;
    }
    throw lexError("CHN1002", "unterminated character literal", this.span(start, start + 1));
  }

  private number(): void {
    const start = this.pos;
    let p = start;
    const radix = this.source.slice(p, p + 2);
    if (radix === "0x" || radix === "0o" || radix === "0b") {
      p += 2;
      while (p < this.source.length && /[0-9a-fA-F_]/u.test(this.source[p] ?? "")) p++;
      this.push(this.literal(start, p));
      return;
    }
    while (p < this.source.length && /[0-9_]/u.test(this.source[p] ?? "")) p++;
    const prev = this.tokens.at(-1);
    const prevPrev = this.tokens.at(-2);
    // `t.0.1` is two tuple-index accesses, not a float; `..1.5` still is one.
    const afterDot =
      prev?.kind === "punct" &&
      prev.text === "." &&
      !(prevPrev?.kind === "punct" && prevPrev.text === "." && prevPrev.joint);
    if (!afterDot && this.source[p] === "." && this.source[p + 1] !== "." && !isIdentStart(this.charAt(p + 1))) {
      p++;
      while (p < this.source.length && /[0-9_]/u.test(this.source[p] ?? "")) p++;
    }
    if (!afterDot && (this.source[p] === "e" || this.source[p] === "E")) {
      let q = p + 1;
      if (this.source[q] === "+" || this.source[q] === "-") q++;
      if (isDigit(this.source[q] ?? "")) {
        p = q;
        while (p < this.source.length && /[0-9_]/u.test(this.source[p] ?? "")) p++;
      }
    }
    this.push(this.literal(start, p));
  }

  private ident(): void {
    const start = this.pos;
    const prefix = this.peek() === "r" && this.peek(1) === "#" && isIdentStart(this.charAt(start + 2)) ? 2 : 0;
    const p = this.identEnd(start + prefix);
    this.pos = p;
    this.push({ kind: "ident", text: this.source.slice(start, p), span: this.span(start, p) });
  }
}

export function tokenize(source: string, opts: LexOptions = {}): Token[] {
  return new Lexer(source, opts).run();
}

export function tokenText(token: Token): string {
  switch (token.kind) {
    case "open":
      return DELIMITER_TEXT[token.delim][0];
    case "close":
      return DELIMITER_TEXT[token.delim][1];
    default:
      return token.text;
  }
}
