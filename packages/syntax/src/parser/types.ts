import type { RustBound, RustGenericArg, RustGenericArgs, RustPath, RustPathSegment, RustType } from "../ast.js";
import type { Cursor } from "./cursor.js";
import { parseBlockExpr, parseExpr, parseUnaryExpr } from "./expr.js";

export type PathMode = "type" | "expr";

function isTurbofish(c: Cursor): boolean {
  const token = c.peek(2);
  return c.isPunct("::") && token?.kind === "punct" && token.text === "<";
}

function expectCloseAngle(c: Cursor): void {
  // Single-character tokens let `>>` close two lists.
  if (!c.eatPunct(">")) throw c.fail("'>'");
}

function parseGenericArg(c: Cursor): RustGenericArg {
  if (c.isLifetime()) return { kind: "lifetime", name: c.expectLifetime() };
  if (c.isLiteral() || (c.isPunct("-") && c.isLiteral(1))) {
    return { kind: "const", expr: parseUnaryExpr(c) };
  }
  if (c.isOpen("brace")) return { kind: "const", expr: parseBlockExpr(c) };
  if (c.isName() && c.isPunct("=", 1) && !c.isPunct("==", 1)) {
    const name = c.expectName();
    c.expectPunct("=");
    return { kind: "binding", name, type: parseType(c) };
  }
  if (c.isName() && c.isPunct(":", 1) && !c.isPunct("::", 1)) {
    const name = c.expectName();
    c.expectPunct(":");
    return { kind: "constraint", name, bounds: parseBounds(c) };
  }
  return { kind: "type", type: parseType(c) };
}

export function parseAngleArgs(c: Cursor): RustGenericArg[] {
  c.expectPunct("<");
  const args: RustGenericArg[] = [];
  while (!c.isPunct(">")) {
    args.push(parseGenericArg(c));
    if (!c.eatPunct(",")) break;
  }
  expectCloseAngle(c);
  return args;
}

function parseParenArgs(c: Cursor): RustGenericArgs {
  c.expectOpen("paren");
  const inputs: RustType[] = [];
  while (!c.isClose("paren")) {
    inputs.push(parseType(c));
    if (!c.eatPunct(",")) break;
  }
  c.expectClose("paren");
  const output = c.eatPunct("->") ? parseType(c, { allowPlus: false }) : undefined;
  return output ? { kind: "paren", inputs, output } : { kind: "paren", inputs };
}

function parseSegmentName(c: Cursor): string {
  const token = c.peek();
  if (token?.kind === "ident" && c.isPathStart()) {
    c.next();
    return token.text;
  }
  throw c.fail("path segment");
}

export function parsePathSegments(c: Cursor, mode: PathMode): RustPathSegment[] {
  const segments: RustPathSegment[] = [];
  while (true) {
    const name = parseSegmentName(c);
    let args: RustGenericArgs | undefined;
    if (isTurbofish(c)) {
      c.expectPunct("::");
      args = { kind: "angle", turbofish: true, args: parseAngleArgs(c) };
    } else if (mode === "type" && c.isPunct("<") && !c.isPunct("<=")) {
      args = { kind: "angle", turbofish: false, args: parseAngleArgs(c) };
    } else if (mode === "type" && c.isOpen("paren")) {
      args = parseParenArgs(c);
    }
    segments.push(args ? { name, args } : { name });
    if (c.isPunct("::") && c.isIdent(undefined, 2)) {
      c.expectPunct("::");
      continue;
    }
    return segments;
  }
}

export function parsePath(c: Cursor, mode: PathMode): RustPath {
  const global = c.eatPunct("::");
  return { global, segments: parsePathSegments(c, mode) };
}

function parseForLifetimes(c: Cursor): string[] {
  if (!c.eatIdent("for")) return [];
  c.expectPunct("<");
  const out: string[] = [];
  while (c.isLifetime()) {
    out.push(c.expectLifetime());
    if (!c.eatPunct(",")) break;
  }
  expectCloseAngle(c);
  return out;
}

export function isBoundStart(c: Cursor): boolean {
  return c.isLifetime() || c.isPunct("?") || c.isIdent("for") || c.isPathStart();
}

function parseBound(c: Cursor): RustBound {
  if (c.isLifetime()) return { kind: "lifetime", name: c.expectLifetime() };
  const forLifetimes = parseForLifetimes(c);
  const maybe = c.eatPunct("?");
  return { kind: "trait", maybe, forLifetimes, path: parsePath(c, "type") };
}

export function parseBounds(c: Cursor): RustBound[] {
  const bounds: RustBound[] = [];
  while (isBoundStart(c)) {
    bounds.push(parseBound(c));
    if (!c.eatPunct("+")) break;
  }
  return bounds;
}

export function parseLifetimeBounds(c: Cursor): string[] {
  const bounds: string[] = [];
  while (c.isLifetime()) {
    bounds.push(c.expectLifetime());
    if (!c.eatPunct("+")) break;
  }
  return bounds;
}

function parseFnPointer(c: Cursor): RustType {
  const start = c.index;
  const unsafe = c.eatIdent("unsafe");
  let abi: string | undefined;
  if (c.eatIdent("extern")) {
    const token = c.peek();
    if (token?.kind === "literal") {
      c.next();
      abi = token.text;
    } else {
      abi = "";
    }
  }
  c.expectIdent("fn");
  const args = parseParenArgs(c);
  if (args.kind !== "paren") throw c.fail("'('");
  return {
    kind: "fn",
    unsafe,
    ...(abi !== undefined ? { abi } : {}),
    inputs: args.inputs,
    ...(args.output ? { output: args.output } : {}),
    span: c.spanFrom(start),
  };
}

export type TypeContext = {
  readonly allowPlus?: boolean;
};

export function parseType(c: Cursor, ctx: TypeContext = {}): RustType {
  const allowPlus = ctx.allowPlus ?? true;
  const start = c.index;

  if (c.isOpen("paren")) {
    c.expectOpen("paren");
    const elems: RustType[] = [];
    let trailingComma = false;
    while (!c.isClose("paren")) {
      elems.push(parseType(c));
      trailingComma = c.eatPunct(",");
      if (!trailingComma) break;
    }
    c.expectClose("paren");
    const only = elems[0];
    if (elems.length === 1 && only && !trailingComma) {
      return { kind: "paren", inner: only, span: c.spanFrom(start) };
    }
    return { kind: "tuple", elems, span: c.spanFrom(start) };
  }
  if (c.eatPunct("!")) return { kind: "never", span: c.spanFrom(start) };
  if (c.eatIdent("_")) return { kind: "infer", span: c.spanFrom(start) };
  if (c.eatPunct("&")) {
    const lifetime = c.isLifetime() ? c.expectLifetime() : undefined;
    const mut = c.eatIdent("mut");
    const inner = parseType(c, { allowPlus: false });
    return { kind: "ref", ...(lifetime ? { lifetime } : {}), mut, inner, span: c.spanFrom(start) };
  }
  if (c.eatPunct("*")) {
    let mut: boolean;
    if (c.eatIdent("mut")) mut = true;
    else if (c.eatIdent("const")) mut = false;
    else throw c.fail("'const' or 'mut'");
    return { kind: "ptr", mut, inner: parseType(c, { allowPlus: false }), span: c.spanFrom(start) };
  }
  if (c.isOpen("bracket")) {
    c.expectOpen("bracket");
    const elem = parseType(c);
    if (c.eatPunct(";")) {
      const len = parseExpr(c);
      c.expectClose("bracket");
      return { kind: "array", elem, len, span: c.spanFrom(start) };
    }
    c.expectClose("bracket");
    return { kind: "slice", inner: elem, span: c.spanFrom(start) };
  }
  if (c.isIdent("fn") || c.isIdent("unsafe") || c.isIdent("extern")) return parseFnPointer(c);
  if (c.eatIdent("impl")) return { kind: "impl", bounds: parseBounds(c), span: c.spanFrom(start) };
  if (c.isIdent("dyn") && isDynBoundStart(c)) {
    c.expectIdent("dyn");
    return { kind: "dyn", explicit: true, bounds: parseBounds(c), span: c.spanFrom(start) };
  }
  if (c.isPunct("<")) {
    c.expectPunct("<");
    const self = parseType(c);
    const trait = c.eatIdent("as") ? parsePath(c, "type") : undefined;
    expectCloseAngle(c);
    c.expectPunct("::");
    const rest = parsePathSegments(c, "type");
    return { kind: "qpath", self, ...(trait ? { trait } : {}), rest, span: c.spanFrom(start) };
  }
  if (c.isIdent("for") || c.isPunct("?")) {
    return { kind: "dyn", explicit: false, bounds: parseBounds(c), span: c.spanFrom(start) };
  }
  if (c.isPathStart()) {
    const path = parsePath(c, "type");
    if (allowPlus && c.isPunct("+")) {
      c.expectPunct("+");
      const first: RustBound = { kind: "trait", maybe: false, forLifetimes: [], path };
      return { kind: "dyn", explicit: false, bounds: [first, ...parseBounds(c)], span: c.spanFrom(start) };
    }
    return { kind: "path", path, span: c.spanFrom(start) };
  }
  throw c.fail("type");
}

function isDynBoundStart(c: Cursor): boolean {
  const next = c.peek(1);
  if (!next) return false;
  if (next.kind === "lifetime") return true;
  if (next.kind === "punct") return next.text === "?";
  return next.kind === "ident";
}
