import type {
  RustAttribute,
  RustBlock,
  RustClosureParam,
  RustExpr,
  RustMatchArm,
  RustPath,
  RustPattern,
  RustStmt,
  RustType,
  Span,
  Token,
} from "../ast.js";
import { joinSpans } from "../ast.js";
import { RustSyntaxError } from "../diagnostics.js";
import { parseOuterAttributes } from "./attrs.js";
import type { Cursor } from "./cursor.js";
import { parseAngleArgs, parsePath, parsePathSegments, parseType } from "./types.js";

export type ExprContext = {
  // Set in `if`/`while`/`match`/`for` heads, where `Path {` opens the body, not a struct literal.
  readonly noStruct?: boolean;
};

const ASSIGN_OPS = ["<<=", ">>=", "+=", "-=", "*=", "/=", "%=", "^=", "&=", "|="] as const;

const BINARY_OPS: readonly (readonly [string, number])[] = [
  ["||", 1],
  ["&&", 2],
  ["==", 3],
  ["!=", 3],
  ["<=", 3],
  [">=", 3],
  ["<<", 7],
  [">>", 7],
  ["<", 3],
  [">", 3],
  ["|", 4],
  ["^", 5],
  ["&", 6],
  ["+", 8],
  ["-", 8],
  ["*", 9],
  ["/", 9],
  ["%", 9],
];

// `let` scrutinees bind tighter than `&&` so `if let A = b && c` chains.
const LET_SCRUTINEE_PREC = 3;

const ITEM_KEYWORDS = new Set(["fn", "struct", "enum", "union", "use", "impl", "mod", "trait", "static", "extern", "macro_rules"]);

export function isBlockLike(expr: RustExpr): boolean {
  switch (expr.kind) {
    case "block":
    case "if":
    case "while":
    case "loop":
    case "for":
    case "match":
      return true;
    case "macro":
      return expr.delim === "brace";
    default:
      return false;
  }
}

function assignOp(c: Cursor): string | undefined {
  for (const op of ASSIGN_OPS) {
    if (c.isPunct(op)) return op;
  }
  if (c.isPunct("=") && !c.isPunct("==") && !c.isPunct("=>")) return "=";
  return undefined;
}

function binaryOp(c: Cursor): readonly [string, number] | undefined {
  if (assignOp(c) !== undefined) return undefined;
  if (c.isPunct("..")) return undefined;
  for (const entry of BINARY_OPS) {
    if (c.isPunct(entry[0])) return entry;
  }
  return undefined;
}

// Whether the next token can begin an operand (used for optional operands of `..`, `return`, `break`).
function canStartExpr(c: Cursor, ctx: ExprContext): boolean {
  const token = c.peek();
  if (!token) return false;
  switch (token.kind) {
    case "close":
      return false;
    case "open":
      return !(token.delim === "brace" && ctx.noStruct);
    case "punct":
      return ["-", "!", "*", "&", "|", "<", ":", "."].includes(token.text) && !c.isPunct("=>");
    case "ident":
      return token.text !== "else" && token.text !== "as";
    default:
      return true;
  }
}

export function parseExpr(c: Cursor, ctx: ExprContext = {}): RustExpr {
  return parseAssign(c, ctx);
}

function parseAssign(c: Cursor, ctx: ExprContext, lhs?: RustExpr): RustExpr {
  const start = c.index;
  const target = parseRange(c, ctx, lhs);
  const op = assignOp(c);
  if (op === undefined) return target;
  c.expectPunct(op);
  const expr = parseAssign(c, ctx);
  return { kind: "assign", op, target, expr, span: spanOver(c, start, target) };
}

function parseRange(c: Cursor, ctx: ExprContext, lhs?: RustExpr): RustExpr {
  const start = c.index;
  let from: RustExpr | undefined;
  if (lhs || !c.isPunct("..")) {
    from = parseBinary(c, ctx, 0, lhs);
  }
  const limits = c.isPunct("..=") ? "..=" : c.isPunct("..") ? ".." : undefined;
  if (!limits) {
    if (from) return from;
    throw c.fail("expression");
  }
  c.expectPunct(limits);
  const to = canStartExpr(c, ctx) ? parseBinary(c, ctx, 0) : undefined;
  if (limits === "..=" && !to) throw c.fail("range end");
  return {
    kind: "range",
    ...(from ? { from } : {}),
    ...(to ? { to } : {}),
    limits,
    span: spanOver(c, start, from),
  };
}

function parseBinary(c: Cursor, ctx: ExprContext, minPrec: number, lhs?: RustExpr): RustExpr {
  const start = c.index;
  let left = lhs ? parseCast(c, lhs) : parseCast(c, parseUnary(c, ctx));
  while (true) {
    const entry = binaryOp(c);
    if (!entry) return left;
    const [op, prec] = entry;
    if (prec <= minPrec) return left;
    c.expectPunct(op);
    const right = parseBinary(c, ctx, prec);
    left = { kind: "binary", op, left, right, span: spanOver(c, start, lhs) };
  }
}

function parseCast(c: Cursor, expr: RustExpr): RustExpr {
  let out = expr;
  while (c.eatIdent("as")) {
    const type: RustType = parseType(c, { allowPlus: false });
    out = { kind: "cast", expr: out, type, span: joinSpans(out.span, type.span) };
  }
  return out;
}

export function parseUnaryExpr(c: Cursor): RustExpr {
  return parseUnary(c, {});
}

function parseUnary(c: Cursor, ctx: ExprContext): RustExpr {
  const start = c.index;
  const op = c.isPunct("-") ? "-" : c.isPunct("!") ? "!" : c.isPunct("*") ? "*" : undefined;
  if (op) {
    c.next();
    const expr = parseUnary(c, ctx);
    return { kind: "unary", op, expr, span: c.spanFrom(start) };
  }
  if (c.eatPunct("&")) {
    const mut = c.eatIdent("mut");
    const expr = parseUnary(c, ctx);
    return { kind: "ref", mut, expr, span: c.spanFrom(start) };
  }
  return parsePostfix(c, parsePrimary(c, ctx), start);
}

function parseCallArgs(c: Cursor): RustExpr[] {
  c.expectOpen("paren");
  const args: RustExpr[] = [];
  while (!c.isClose("paren")) {
    args.push(parseExpr(c));
    if (!c.eatPunct(",")) break;
  }
  c.expectClose("paren");
  return args;
}

function parseMember(c: Cursor): string {
  const token = c.peek();
  if (token?.kind === "literal" && /^[0-9]+$/u.test(token.text)) {
    c.next();
    return token.text;
  }
  return c.expectName("field name");
}

function parsePostfix(c: Cursor, primary: RustExpr, start: number): RustExpr {
  let expr = primary;
  while (true) {
    if (c.eatPunct("?")) {
      expr = { kind: "try", expr, span: c.spanFrom(start) };
      continue;
    }
    if (c.isPunct(".") && !c.isPunct("..")) {
      c.expectPunct(".");
      if (c.eatIdent("await")) {
        expr = { kind: "await", expr, span: c.spanFrom(start) };
        continue;
      }
      const member = parseMember(c);
      if (c.isPunct("::")) {
        c.expectPunct("::");
        const turbofish = parseAngleArgs(c);
        const args = parseCallArgs(c);
        expr = { kind: "method", receiver: expr, name: member, turbofish, args, span: c.spanFrom(start) };
        continue;
      }
      if (c.isOpen("paren")) {
        const args = parseCallArgs(c);
        expr = { kind: "method", receiver: expr, name: member, args, span: c.spanFrom(start) };
        continue;
      }
      expr = { kind: "field", expr, member, span: c.spanFrom(start) };
      continue;
    }
    if (c.isOpen("paren")) {
      const args = parseCallArgs(c);
      expr = { kind: "call", callee: expr, args, span: c.spanFrom(start) };
      continue;
    }
    if (c.isOpen("bracket")) {
      c.expectOpen("bracket");
      const index = parseExpr(c);
      c.expectClose("bracket");
      expr = { kind: "index", expr, index, span: c.spanFrom(start) };
      continue;
    }
    return expr;
  }
}

function parseLabel(c: Cursor): string | undefined {
  if (c.isLifetime() && c.isPunct(":", 1) && !c.isPunct("::", 1)) {
    const label = c.expectLifetime();
    c.expectPunct(":");
    return label;
  }
  return undefined;
}

function parsePrimary(c: Cursor, ctx: ExprContext): RustExpr {
  const start = c.index;
  const token = c.peek();
  if (!token) throw c.fail("expression");

  if (token.kind === "literal") {
    c.next();
    return { kind: "lit", text: token.text, span: token.span };
  }
  if (token.kind === "lifetime") {
    const label = parseLabel(c);
    if (!label) throw c.fail("expression");
    if (c.isIdent("loop") || c.isIdent("while") || c.isIdent("for")) return parseLoopLike(c, label, start);
    if (c.isOpen("brace")) {
      const block = parseBlock(c);
      return { kind: "block", label, block, span: c.spanFrom(start) };
    }
    throw c.fail("loop or block after label");
  }
  if (token.kind === "open") {
    if (token.delim === "brace") return parseBlockExpr(c);
    if (token.delim === "paren") return parseParenOrTuple(c);
    return parseArray(c);
  }
  if (token.kind === "punct") {
    if (c.isPunct("|") || c.isPunct("||")) return parseClosure(c, false);
    if (c.isPunct("<")) return parseQPathExpr(c);
    if (c.isPunct("::")) return parsePathExpr(c, ctx);
    throw c.fail("expression");
  }
  if (token.kind !== "ident") throw c.fail("expression");

  switch (token.text) {
    case "true":
    case "false":
      c.next();
      return { kind: "lit", text: token.text, span: token.span };
    case "if":
      return parseIf(c);
    case "match":
      return parseMatch(c);
    case "loop":
    case "while":
    case "for":
      return parseLoopLike(c, undefined, start);
    case "unsafe": {
      c.next();
      const block = parseBlock(c);
      return { kind: "block", modifier: "unsafe", block, span: c.spanFrom(start) };
    }
    case "async": {
      c.next();
      const move = c.eatIdent("move");
      if (c.isPunct("|") || c.isPunct("||")) throw c.fail("block after 'async'");
      const block = parseBlock(c);
      return { kind: "block", modifier: move ? "async move" : "async", block, span: c.spanFrom(start) };
    }
    case "move":
      c.next();
      return parseClosure(c, true, start);
    case "let": {
      c.next();
      const pat = parsePattern(c);
      c.expectPunct("=");
      const expr = parseBinary(c, { noStruct: true }, LET_SCRUTINEE_PREC);
      return { kind: "let", pat, expr, span: c.spanFrom(start) };
    }
    case "return": {
      c.next();
      const expr = canStartExpr(c, ctx) ? parseExpr(c, ctx) : undefined;
      return { kind: "return", ...(expr ? { expr } : {}), span: c.spanFrom(start) };
    }
    case "break": {
      c.next();
      const label = c.isLifetime() ? c.expectLifetime() : undefined;
      const expr = canStartExpr(c, ctx) ? parseExpr(c, ctx) : undefined;
      return { kind: "break", ...(label ? { label } : {}), ...(expr ? { expr } : {}), span: c.spanFrom(start) };
    }
    case "continue": {
      c.next();
      const label = c.isLifetime() ? c.expectLifetime() : undefined;
      return { kind: "continue", ...(label ? { label } : {}), span: c.spanFrom(start) };
    }
    default:
      if (c.isPathStart()) return parsePathExpr(c, ctx);
      throw c.fail("expression");
  }
}

function parseParenOrTuple(c: Cursor): RustExpr {
  const start = c.index;
  c.expectOpen("paren");
  const elems: RustExpr[] = [];
  let trailingComma = false;
  while (!c.isClose("paren")) {
    elems.push(parseExpr(c));
    trailingComma = c.eatPunct(",");
    if (!trailingComma) break;
  }
  c.expectClose("paren");
  const only = elems[0];
  if (elems.length === 1 && only && !trailingComma) {
    return { kind: "paren", expr: only, span: c.spanFrom(start) };
  }
  return { kind: "tuple", elems, span: c.spanFrom(start) };
}

function parseArray(c: Cursor): RustExpr {
  const start = c.index;
  c.expectOpen("bracket");
  if (c.eatClose("bracket")) return { kind: "array", elems: [], span: c.spanFrom(start) };
  const first = parseExpr(c);
  if (c.eatPunct(";")) {
    const len = parseExpr(c);
    c.expectClose("bracket");
    return { kind: "array_repeat", elem: first, len, span: c.spanFrom(start) };
  }
  const elems: RustExpr[] = [first];
  while (c.eatPunct(",")) {
    if (c.isClose("bracket")) break;
    elems.push(parseExpr(c));
  }
  c.expectClose("bracket");
  return { kind: "array", elems, span: c.spanFrom(start) };
}

function parseQPathExpr(c: Cursor): RustExpr {
  const start = c.index;
  c.expectPunct("<");
  const self = parseType(c);
  const trait = c.eatIdent("as") ? parsePath(c, "type") : undefined;
  if (!c.eatPunct(">")) throw c.fail("'>'");
  c.expectPunct("::");
  const rest = parsePathSegments(c, "expr");
  return { kind: "qpath", self, ...(trait ? { trait } : {}), rest, span: c.spanFrom(start) };
}

function looksLikeStructBody(c: Cursor): boolean {
  // `S {}`, `S { a: ..`, `S { a, ..`, `S { a }`, `S { ..base }`
  if (!c.isOpen("brace")) return false;
  if (c.isClose("brace", 1)) return true;
  if (c.isPunct("..", 1)) return true;
  const first = c.peek(1);
  const isField = first?.kind === "ident" || (first?.kind === "literal" && /^[0-9]+$/u.test(first.text));
  if (!isField) return false;
  return (c.isPunct(":", 2) && !c.isPunct("::", 2)) || c.isPunct(",", 2) || c.isClose("brace", 2);
}

function parsePathExpr(c: Cursor, ctx: ExprContext): RustExpr {
  const start = c.index;
  const path = parsePath(c, "expr");
  if (c.isPunct("!") && !c.isPunct("!=") && c.peek(1)?.kind === "open") {
    c.expectPunct("!");
    const group = c.takeGroup();
    return { kind: "macro", path, delim: group.delim, tokens: group.tokens, span: c.spanFrom(start) };
  }
  if (!ctx.noStruct && looksLikeStructBody(c)) return parseStructLit(c, path, start);
  return { kind: "path", path, span: c.spanFrom(start) };
}

function parseStructLit(c: Cursor, path: RustPath, start: number): RustExpr {
  c.expectOpen("brace");
  const fields: { name: string; expr?: RustExpr }[] = [];
  let base: RustExpr | undefined;
  while (!c.isClose("brace")) {
    if (c.eatPunct("..")) {
      base = parseExpr(c);
      break;
    }
    const name = parseMember(c);
    if (c.eatPunct(":")) {
      fields.push({ name, expr: parseExpr(c) });
    } else {
      fields.push({ name });
    }
    if (!c.eatPunct(",")) break;
  }
  c.expectClose("brace");
  return { kind: "struct", path, fields, ...(base ? { base } : {}), span: c.spanFrom(start) };
}

function parseClosure(c: Cursor, move: boolean, start = c.index): RustExpr {
  const params: RustClosureParam[] = [];
  if (!c.eatPunct("||")) {
    c.expectPunct("|");
    while (!c.isPunct("|")) {
      const pat = parsePatternNoTop(c);
      const type = c.eatPunct(":") ? parseType(c, { allowPlus: false }) : undefined;
      params.push(type ? { pat, type } : { pat });
      if (!c.eatPunct(",")) break;
    }
    c.expectPunct("|");
  }
  if (c.eatPunct("->")) {
    const ret = parseType(c, { allowPlus: false });
    const body = parseBlockExpr(c);
    return { kind: "closure", move, params, ret, body, span: c.spanFrom(start) };
  }
  const body = parseExpr(c);
  return { kind: "closure", move, params, body, span: c.spanFrom(start) };
}

function parseIf(c: Cursor): RustExpr {
  const start = c.index;
  c.expectIdent("if");
  const cond = parseExpr(c, { noStruct: true });
  const then = parseBlock(c);
  if (!c.eatIdent("else")) return { kind: "if", cond, then, span: c.spanFrom(start) };
  const elseStart = c.index;
  const otherwise: RustExpr = c.isIdent("if")
    ? parseIf(c)
    : { kind: "block", block: parseBlock(c), span: c.spanFrom(elseStart) };
  return { kind: "if", cond, then, else: otherwise, span: c.spanFrom(start) };
}

function parseLoopLike(c: Cursor, label: string | undefined, start: number): RustExpr {
  const labelled = label ? { label } : {};
  if (c.eatIdent("loop")) {
    return { kind: "loop", ...labelled, body: parseBlock(c), span: c.spanFrom(start) };
  }
  if (c.eatIdent("while")) {
    const cond = parseExpr(c, { noStruct: true });
    return { kind: "while", ...labelled, cond, body: parseBlock(c), span: c.spanFrom(start) };
  }
  c.expectIdent("for");
  const pat = parsePattern(c);
  c.expectIdent("in");
  const iter = parseExpr(c, { noStruct: true });
  return { kind: "for", ...labelled, pat, iter, body: parseBlock(c), span: c.spanFrom(start) };
}

function parseMatch(c: Cursor): RustExpr {
  const start = c.index;
  c.expectIdent("match");
  const expr = parseExpr(c, { noStruct: true });
  c.expectOpen("brace");
  const arms: RustMatchArm[] = [];
  while (!c.isClose("brace")) {
    const armStart = c.index;
    const pat = parsePattern(c);
    const guard = c.eatIdent("if") ? parseExpr(c) : undefined;
    c.expectPunct("=>");
    const body = parseStatementExpr(c);
    const comma = c.eatPunct(",");
    arms.push({ pat, ...(guard ? { guard } : {}), body, comma, span: c.spanFrom(armStart) });
    if (comma) continue;
    if (c.isClose("brace")) break;
    if (!isBlockLike(body)) throw c.fail("',' or '}'");
  }
  c.expectClose("brace");
  return { kind: "match", expr, arms, span: c.spanFrom(start) };
}

export function parseBlockExpr(c: Cursor): RustExpr {
  const start = c.index;
  const block = parseBlock(c);
  return { kind: "block", block, span: c.spanFrom(start) };
}

function startsBlockLike(c: Cursor): boolean {
  if (c.isOpen("brace")) return true;
  if (c.isLifetime() && c.isPunct(":", 1) && !c.isPunct("::", 1)) return true;
  if (c.isIdent("if") || c.isIdent("match") || c.isIdent("loop") || c.isIdent("while") || c.isIdent("for")) return true;
  if (c.isIdent("unsafe")) return c.isOpen("brace", 1);
  if (c.isIdent("async")) return c.isOpen("brace", 1) || (c.isIdent("move", 1) && c.isOpen("brace", 2));
  return false;
}

// Statements and match arms end after a block-like expression unless a method call or `?` continues it.
function parseStatementExpr(c: Cursor): RustExpr {
  const start = c.index;
  if (!startsBlockLike(c)) return parseExpr(c);
  const expr = parsePrimary(c, {});
  if (c.isPunct("?") || (c.isPunct(".") && !c.isPunct(".."))) {
    return parseAssign(c, {}, parsePostfix(c, expr, start));
  }
  return expr;
}

function isItemStart(c: Cursor): boolean {
  const token = c.peek();
  if (token?.kind !== "ident") return false;
  if (ITEM_KEYWORDS.has(token.text)) {
    // `macro_rules!` and `extern "C"` are items; a path named `union` is not.
    if (token.text === "union") return c.isName(1);
    return true;
  }
  if (token.text === "pub") return true;
  if (token.text === "type") return c.isName(1);
  if (token.text === "const") return c.isName(1) || c.isIdent("_", 1) || isFnQualifier(c, 1);
  if (token.text === "async") return c.isIdent("fn", 1) || c.isIdent("unsafe", 1);
  if (token.text === "unsafe") return c.isIdent("fn", 1) || c.isIdent("impl", 1) || c.isIdent("trait", 1) || c.isIdent("extern", 1);
  return false;
}

function isFnQualifier(c: Cursor, offset: number): boolean {
  return c.isIdent("fn", offset) || c.isIdent("unsafe", offset) || c.isIdent("async", offset) || c.isIdent("extern", offset);
}

// `use`, `static`, `type` and `const` items end at `;` even after a `{ ... }` group.
function endsAtSemicolon(c: Cursor): boolean {
  let offset = 0;
  if (c.isIdent("pub")) {
    offset = 1;
    if (c.isOpen("paren", 1)) {
      let depth = 0;
      do {
        const token = c.peek(offset);
        if (token?.kind === "open") depth++;
        if (token?.kind === "close") depth--;
        offset++;
      } while (depth > 0 && c.peek(offset) !== undefined);
    }
  }
  if (c.isIdent("const", offset)) return !isFnQualifier(c, offset + 1);
  return c.isIdent("use", offset) || c.isIdent("static", offset) || c.isIdent("type", offset);
}

// Items stay opaque: their tokens run to a `;` or a `{ ... }` group at depth zero.
function parseItemTokens(c: Cursor): readonly Token[] {
  const begin = c.index;
  const semicolonOnly = endsAtSemicolon(c);
  while (true) {
    const token = c.peek();
    if (!token || token.kind === "close") throw c.fail("';' or '}' to end the item");
    if (token.kind === "open") {
      c.takeGroup();
      if (token.delim === "brace" && !semicolonOnly) break;
      continue;
    }
    c.next();
    if (token.kind === "punct" && token.text === ";") break;
  }
  return c.tokens.slice(begin, c.index);
}

function parseLocal(c: Cursor, start: number, attrs: readonly RustAttribute[]): RustStmt {
  c.expectIdent("let");
  const pat = parsePattern(c);
  const type = c.eatPunct(":") ? parseType(c) : undefined;
  let init: RustExpr | undefined;
  let otherwise: RustBlock | undefined;
  if (c.eatPunct("=")) {
    init = parseExpr(c);
    if (c.eatIdent("else")) otherwise = parseBlock(c);
  }
  c.expectPunct(";");
  return {
    kind: "let",
    ...(attrs.length > 0 ? { attrs } : {}),
    pat,
    ...(type ? { type } : {}),
    ...(init ? { init } : {}),
    ...(otherwise ? { else: otherwise } : {}),
    span: c.spanFrom(start),
  };
}

function parseStmt(c: Cursor): RustStmt {
  const start = c.index;
  if (c.eatPunct(";")) return { kind: "empty", span: c.spanFrom(start) };
  if (c.isPunct("#!")) {
    throw new RustSyntaxError("CHN1104", "inner attributes are not supported inside blocks", c.spanAt());
  }
  const attrs = parseOuterAttributes(c);
  const withAttrs = attrs.length > 0 ? { attrs } : {};
  if (c.isIdent("let")) return parseLocal(c, start, attrs);
  if (isItemStart(c)) return { kind: "item", ...withAttrs, tokens: parseItemTokens(c), span: c.spanFrom(start) };
  const expr = parseStatementExpr(c);
  if (c.eatPunct(";")) return { kind: "expr", ...withAttrs, expr, semi: true, span: c.spanFrom(start) };
  if (c.isClose("brace") || isBlockLike(expr)) {
    return { kind: "expr", ...withAttrs, expr, semi: false, span: c.spanFrom(start) };
  }
  throw c.fail("';' or '}'");
}

export function parseBlock(c: Cursor): RustBlock {
  const start = c.index;
  c.expectOpen("brace");
  const stmts: RustStmt[] = [];
  while (!c.isClose("brace")) {
    if (c.atEnd()) throw c.fail("'}'");
    stmts.push(parseStmt(c));
  }
  c.expectClose("brace");
  return { stmts, span: c.spanFrom(start) };
}

export function parsePattern(c: Cursor): RustPattern {
  const start = c.index;
  c.eatPunct("|");
  const first = parsePatternNoTop(c);
  if (!c.isPunct("|") || c.isPunct("||")) return first;
  const cases: RustPattern[] = [first];
  while (c.isPunct("|") && !c.isPunct("||")) {
    c.expectPunct("|");
    cases.push(parsePatternNoTop(c));
  }
  return { kind: "or", cases, span: c.spanFrom(start) };
}

function parsePatternList(c: Cursor, close: "paren" | "bracket"): RustPattern[] {
  const elems: RustPattern[] = [];
  while (!c.isClose(close)) {
    elems.push(parsePattern(c));
    if (!c.eatPunct(",")) break;
  }
  c.expectClose(close);
  return elems;
}

function parseLitPattern(c: Cursor): RustPattern {
  const start = c.index;
  const negative = c.eatPunct("-");
  const token = c.next();
  if (token.kind === "literal") return { kind: "lit", negative, text: token.text, span: c.spanFrom(start) };
  if (!negative && token.kind === "ident" && (token.text === "true" || token.text === "false")) {
    return { kind: "lit", negative, text: token.text, span: c.spanFrom(start) };
  }
  throw c.fail("literal pattern", token);
}

function isRangePatternEnd(c: Cursor): boolean {
  return c.isLiteral() || (c.isPunct("-") && c.isLiteral(1)) || c.isPathStart();
}

function parseRangeTail(c: Cursor, from: RustPattern, start: number): RustPattern {
  const limits = c.isPunct("..=") ? "..=" : c.isPunct("..") ? ".." : undefined;
  if (!limits) return from;
  c.expectPunct(limits);
  const to = isRangePatternEnd(c) ? parseRangeBound(c) : undefined;
  return { kind: "range", from, ...(to ? { to } : {}), limits, span: c.spanFrom(start) };
}

function parseRangeBound(c: Cursor): RustPattern {
  if (c.isPathStart()) {
    const start = c.index;
    return { kind: "path", path: parsePath(c, "expr"), span: c.spanFrom(start) };
  }
  return parseLitPattern(c);
}

function parsePatternNoTop(c: Cursor): RustPattern {
  const start = c.index;
  if (c.eatIdent("_")) return { kind: "wild", span: c.spanFrom(start) };
  if (c.isPunct("..=")) {
    c.expectPunct("..=");
    return { kind: "range", to: parseRangeBound(c), limits: "..=", span: c.spanFrom(start) };
  }
  if (c.eatPunct("..")) return { kind: "rest", span: c.spanFrom(start) };
  if (c.eatPunct("&")) {
    const mut = c.eatIdent("mut");
    return { kind: "ref", mut, pat: parsePatternNoTop(c), span: c.spanFrom(start) };
  }
  if (c.isOpen("paren")) {
    c.expectOpen("paren");
    const elems: RustPattern[] = [];
    let trailingComma = false;
    while (!c.isClose("paren")) {
      elems.push(parsePattern(c));
      trailingComma = c.eatPunct(",");
      if (!trailingComma) break;
    }
    c.expectClose("paren");
    const only = elems[0];
    if (elems.length === 1 && only && !trailingComma && only.kind !== "rest") {
      return { kind: "paren", pat: only, span: c.spanFrom(start) };
    }
    return { kind: "tuple", elems, span: c.spanFrom(start) };
  }
  if (c.isOpen("bracket")) {
    c.expectOpen("bracket");
    return { kind: "slice", elems: parsePatternList(c, "bracket"), span: c.spanFrom(start) };
  }
  if (c.isLiteral() || c.isPunct("-") || c.isIdent("true") || c.isIdent("false")) {
    return parseRangeTail(c, parseLitPattern(c), start);
  }
  if (c.isIdent("ref") || c.isIdent("mut")) {
    const byRef = c.eatIdent("ref");
    const mut = c.eatIdent("mut");
    const name = c.expectName("binding name");
    const sub = c.eatPunct("@") ? parsePatternNoTop(c) : undefined;
    return { kind: "ident", byRef, mut, name, ...(sub ? { sub } : {}), span: c.spanFrom(start) };
  }
  if (c.isPathStart()) {
    const path = parsePath(c, "expr");
    const only = path.segments[0];
    if (c.isOpen("paren")) {
      c.expectOpen("paren");
      return { kind: "tuple_struct", path, elems: parsePatternList(c, "paren"), span: c.spanFrom(start) };
    }
    if (c.isOpen("brace")) return parseStructPattern(c, path, start);
    if (c.isPunct("..")) return parseRangeTail(c, { kind: "path", path, span: c.spanFrom(start) }, start);
    if (!path.global && path.segments.length === 1 && only && !only.args) {
      const sub = c.eatPunct("@") ? parsePatternNoTop(c) : undefined;
      return { kind: "ident", byRef: false, mut: false, name: only.name, ...(sub ? { sub } : {}), span: c.spanFrom(start) };
    }
    return { kind: "path", path, span: c.spanFrom(start) };
  }
  throw c.fail("pattern");
}

function parseStructPattern(c: Cursor, path: RustPath, start: number): RustPattern {
  c.expectOpen("brace");
  const fields: { name: string; pat?: RustPattern }[] = [];
  let rest = false;
  while (!c.isClose("brace")) {
    if (c.eatPunct("..")) {
      rest = true;
      break;
    }
    if (c.isIdent("ref") || c.isIdent("mut")) {
      const fieldStart = c.index;
      const byRef = c.eatIdent("ref");
      const mut = c.eatIdent("mut");
      const name = c.expectName("field name");
      fields.push({ name, pat: { kind: "ident", byRef, mut, name, span: c.spanFrom(fieldStart) } });
    } else {
      const name = parseMember(c);
      fields.push(c.eatPunct(":") ? { name, pat: parsePattern(c) } : { name });
    }
    if (!c.eatPunct(",")) break;
  }
  c.expectClose("brace");
  return { kind: "struct", path, fields, rest, span: c.spanFrom(start) };
}

function spanOver(c: Cursor, start: number, lhs: RustExpr | undefined): Span | undefined {
  return joinSpans(lhs?.span, c.spanFrom(start));
}
