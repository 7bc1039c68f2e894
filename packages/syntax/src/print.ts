import type {
  Delimiter,
  RustAttribute,
  RustBlock,
  RustBound,
  RustExpr,
  RustGenericArg,
  RustGenericArgs,
  RustPath,
  RustPathSegment,
  RustPattern,
  RustStmt,
  RustType,
  Token,
} from "./ast.js";

export type TokenTree =
  | { readonly kind: "leaf"; readonly text: string }
  | { readonly kind: "group"; readonly delim: Delimiter; readonly stream: TokenStream };

export type TokenStream = readonly TokenTree[];

const leaf = (text: string): TokenTree => ({ kind: "leaf", text });
const group = (delim: Delimiter, stream: TokenStream): TokenTree => ({ kind: "group", delim, stream });
const leaves = (...texts: string[]): TokenTree[] => texts.map(leaf);

export function streamToString(stream: TokenStream): string {
  return stream.map(treeToString).join(" ");
}

function treeToString(tree: TokenTree): string {
  if (tree.kind === "leaf") return tree.text;
  const inner = streamToString(tree.stream);
  switch (tree.delim) {
    case "paren":
      return `(${inner})`;
    case "bracket":
      return `[${inner}]`;
    case "brace":
      return inner === "" ? "{}" : `{ ${inner} }`;
  }
}

// Regroups a flat token list; runs of joint punctuation become one leaf.
export function tokensToStream(tokens: readonly Token[]): TokenStream {
  const stack: TokenTree[][] = [[]];
  const delims: Delimiter[] = [];
  let pending = "";
  const top = (): TokenTree[] => {
    const frame = stack.at(-1);
    if (!frame) throw new Error("Token regrouping lost its frame.");
    return frame;
  };
  const flush = (): void => {
    if (pending === "") return;
    top().push(leaf(pending));
    pending = "";
  };
  for (const token of tokens) {
    if (token.kind === "punct") {
      pending += token.text;
      if (!token.joint) flush();
      continue;
    }
    flush();
    if (token.kind === "open") {
      stack.push([]);
      delims.push(token.delim);
    } else if (token.kind === "close") {
      const inner = stack.pop();
      const delim = delims.pop();
      if (!inner || delim === undefined) throw new Error("Unbalanced token list.");
      top().push(group(delim, inner));
    } else {
      top().push(leaf(token.text));
    }
  }
  flush();
  while (delims.length > 0) {
    const inner = stack.pop();
    const delim = delims.pop();
    if (!inner || delim === undefined) break;
    top().push(group(delim, inner));
  }
  return top();
}

export function tokensToString(tokens: readonly Token[]): string {
  return streamToString(tokensToStream(tokens));
}

function commaSeparated(items: readonly TokenStream[]): TokenTree[] {
  const out: TokenTree[] = [];
  items.forEach((item, i) => {
    if (i > 0) out.push(leaf(","));
    out.push(...item);
  });
  return out;
}

// ---- paths and types ----

export function printGenericArg(arg: RustGenericArg): TokenStream {
  switch (arg.kind) {
    case "lifetime":
      return [leaf(arg.name)];
    case "type":
      return printType(arg.type);
    case "const":
      return printExpr(arg.expr);
    case "binding":
      return [leaf(arg.name), leaf("="), ...printType(arg.type)];
    case "constraint":
      return [leaf(arg.name), leaf(":"), ...printBounds(arg.bounds)];
  }
}

function printAngle(args: readonly RustGenericArg[]): TokenTree[] {
  return [leaf("<"), ...commaSeparated(args.map(printGenericArg)), leaf(">")];
}

function printGenericArgs(args: RustGenericArgs): TokenTree[] {
  if (args.kind === "paren") {
    const out: TokenTree[] = [group("paren", commaSeparated(args.inputs.map(printType)))];
    if (args.output) out.push(leaf("->"), ...printType(args.output));
    return out;
  }
  return args.turbofish ? [leaf("::"), ...printAngle(args.args)] : printAngle(args.args);
}

function printSegments(segments: readonly RustPathSegment[]): TokenTree[] {
  const out: TokenTree[] = [];
  segments.forEach((segment, i) => {
    if (i > 0) out.push(leaf("::"));
    out.push(leaf(segment.name));
    if (segment.args) out.push(...printGenericArgs(segment.args));
  });
  return out;
}

export function printPath(path: RustPath): TokenStream {
  return path.global ? [leaf("::"), ...printSegments(path.segments)] : printSegments(path.segments);
}

function printBound(bound: RustBound): TokenTree[] {
  if (bound.kind === "lifetime") return [leaf(bound.name)];
  const out: TokenTree[] = [];
  if (bound.forLifetimes.length > 0) {
    out.push(leaf("for"), leaf("<"), ...commaSeparated(bound.forLifetimes.map((l) => [leaf(l)])), leaf(">"));
  }
  if (bound.maybe) out.push(leaf("?"));
  out.push(...printPath(bound.path));
  return out;
}

export function printBounds(bounds: readonly RustBound[]): TokenStream {
  const out: TokenTree[] = [];
  bounds.forEach((bound, i) => {
    if (i > 0) out.push(leaf("+"));
    out.push(...printBound(bound));
  });
  return out;
}

function printQSelf(self: RustType, trait: RustPath | undefined, rest: readonly RustPathSegment[]): TokenTree[] {
  const head: TokenTree[] = [leaf("<"), ...printType(self)];
  if (trait) head.push(leaf("as"), ...printPath(trait));
  return [...head, leaf(">"), leaf("::"), ...printSegments(rest)];
}

export function printType(type: RustType): TokenStream {
  switch (type.kind) {
    case "path":
      return printPath(type.path);
    case "qpath":
      return printQSelf(type.self, type.trait, type.rest);
    case "ref": {
      const out: TokenTree[] = [leaf("&")];
      if (type.lifetime) out.push(leaf(type.lifetime));
      if (type.mut) out.push(leaf("mut"));
      return [...out, ...printType(type.inner)];
    }
    case "ptr":
      return [leaf("*"), leaf(type.mut ? "mut" : "const"), ...printType(type.inner)];
    case "slice":
      return [group("bracket", printType(type.inner))];
    case "array":
      return [group("bracket", [...printType(type.elem), leaf(";"), ...printExpr(type.len)])];
    case "tuple": {
      const inner = commaSeparated(type.elems.map(printType));
      if (type.elems.length === 1) inner.push(leaf(","));
      return [group("paren", inner)];
    }
    case "paren":
      return [group("paren", printType(type.inner))];
    case "fn": {
      const out: TokenTree[] = [];
      if (type.unsafe) out.push(leaf("unsafe"));
      if (type.abi !== undefined) out.push(leaf("extern"), ...(type.abi === "" ? [] : [leaf(type.abi)]));
      out.push(leaf("fn"), group("paren", commaSeparated(type.inputs.map(printType))));
      if (type.output) out.push(leaf("->"), ...printType(type.output));
      return out;
    }
    case "impl":
      return [leaf("impl"), ...printBounds(type.bounds)];
    case "dyn":
      return type.explicit ? [leaf("dyn"), ...printBounds(type.bounds)] : printBounds(type.bounds);
    case "never":
      return [leaf("!")];
    case "infer":
      return [leaf("_")];
  }
}

// ---- patterns ----

export function printPattern(pat: RustPattern): TokenStream {
  switch (pat.kind) {
    case "wild":
      return [leaf("_")];
    case "rest":
      return [leaf("..")];
    case "ident": {
      const out: TokenTree[] = [];
      if (pat.byRef) out.push(leaf("ref"));
      if (pat.mut) out.push(leaf("mut"));
      out.push(leaf(pat.name));
      if (pat.sub) out.push(leaf("@"), ...printPattern(pat.sub));
      return out;
    }
    case "lit":
      return pat.negative ? leaves("-", pat.text) : [leaf(pat.text)];
    case "range": {
      const out: TokenTree[] = [];
      if (pat.from) out.push(...printPattern(pat.from));
      out.push(leaf(pat.limits));
      if (pat.to) out.push(...printPattern(pat.to));
      return out;
    }
    case "path":
      return printPath(pat.path);
    case "tuple_struct":
      return [...printPath(pat.path), group("paren", commaSeparated(pat.elems.map(printPattern)))];
    case "struct": {
      const fields: TokenStream[] = pat.fields.map((field) => {
        // `ref mut name` shorthand carries its own binding.
        if (!field.pat) return [leaf(field.name)];
        if (field.pat.kind === "ident" && field.pat.name === field.name && !field.pat.sub) return printPattern(field.pat);
        return [leaf(field.name), leaf(":"), ...printPattern(field.pat)];
      });
      if (pat.rest) fields.push([leaf("..")]);
      return [...printPath(pat.path), group("brace", commaSeparated(fields))];
    }
    case "tuple": {
      const inner = commaSeparated(pat.elems.map(printPattern));
      if (pat.elems.length === 1 && pat.elems[0]?.kind !== "rest") inner.push(leaf(","));
      return [group("paren", inner)];
    }
    case "paren":
      return [group("paren", printPattern(pat.pat))];
    case "slice":
      return [group("bracket", commaSeparated(pat.elems.map(printPattern)))];
    case "ref":
      return [leaf("&"), ...(pat.mut ? [leaf("mut")] : []), ...printPattern(pat.pat)];
    case "or": {
      const out: TokenTree[] = [];
      pat.cases.forEach((p, i) => {
        if (i > 0) out.push(leaf("|"));
        out.push(...printPattern(p));
      });
      return out;
    }
  }
}

// ---- expressions ----

const BINARY_PRECEDENCE: Readonly<Record<string, number>> = {
  "||": 3,
  "&&": 4,
  "==": 5,
  "!=": 5,
  "<": 5,
  ">": 5,
  "<=": 5,
  ">=": 5,
  "|": 6,
  "^": 7,
  "&": 8,
  "<<": 9,
  ">>": 9,
  "+": 10,
  "-": 10,
  "*": 11,
  "/": 11,
  "%": 11,
};

export const PRECEDENCE = {
  assign: 1,
  range: 2,
  compare: 5,
  cast: 12,
  prefix: 13,
  postfix: 14,
  atom: 15,
} as const;

export function binaryPrecedence(op: string): number {
  return BINARY_PRECEDENCE[op] ?? PRECEDENCE.range;
}

const PREC_ASSIGN = PRECEDENCE.assign;
const PREC_RANGE = PRECEDENCE.range;
const PREC_COMPARE = PRECEDENCE.compare;
const PREC_CAST = PRECEDENCE.cast;
const PREC_PREFIX = PRECEDENCE.prefix;
const PREC_POSTFIX = PRECEDENCE.postfix;
const PREC_ATOM = PRECEDENCE.atom;

// Binding strength of an expression as printed, so nodes built by hand get parentheses where needed.
export function exprPrecedence(expr: RustExpr): number {
  switch (expr.kind) {
    case "assign":
    case "closure":
    case "return":
    case "break":
      return PREC_ASSIGN;
    case "range":
      return PREC_RANGE;
    case "binary":
      return binaryPrecedence(expr.op);
    case "let":
      return PREC_COMPARE;
    case "cast":
      return PREC_CAST;
    case "unary":
    case "ref":
      return PREC_PREFIX;
    case "call":
    case "method":
    case "field":
    case "index":
    case "try":
    case "await":
      return PREC_POSTFIX;
    default:
      return PREC_ATOM;
  }
}

export function printExprAt(expr: RustExpr, minPrec: number): TokenStream {
  const printed = printExpr(expr);
  return exprPrecedence(expr) < minPrec ? [group("paren", printed)] : printed;
}

function printArgs(args: readonly RustExpr[]): TokenTree {
  return group("paren", commaSeparated(args.map(printExpr)));
}

function labelPrefix(label: string | undefined): TokenTree[] {
  return label ? [leaf(label), leaf(":")] : [];
}

export function printExpr(expr: RustExpr): TokenStream {
  switch (expr.kind) {
    case "lit":
      return [leaf(expr.text)];
    case "path":
      return printPath(expr.path);
    case "qpath":
      return printQSelf(expr.self, expr.trait, expr.rest);
    case "unary":
      return [leaf(expr.op), ...printExprAt(expr.expr, PREC_PREFIX)];
    case "ref":
      return [leaf("&"), ...(expr.mut ? [leaf("mut")] : []), ...printExprAt(expr.expr, PREC_PREFIX)];
    case "binary": {
      const prec = binaryPrecedence(expr.op);
      return [...printExprAt(expr.left, prec), leaf(expr.op), ...printExprAt(expr.right, prec + 1)];
    }
    case "assign":
      return [...printExprAt(expr.target, PREC_RANGE), leaf(expr.op), ...printExprAt(expr.expr, PREC_ASSIGN)];
    case "cast":
      return [...printExprAt(expr.expr, PREC_CAST), leaf("as"), ...printType(expr.type)];
    case "call":
      return [...printExprAt(expr.callee, PREC_POSTFIX), printArgs(expr.args)];
    case "method": {
      const out: TokenTree[] = [...printExprAt(expr.receiver, PREC_POSTFIX), leaf("."), leaf(expr.name)];
      if (expr.turbofish) out.push(leaf("::"), ...printAngle(expr.turbofish));
      out.push(printArgs(expr.args));
      return out;
    }
    case "field":
      return [...printExprAt(expr.expr, PREC_POSTFIX), leaf("."), leaf(expr.member)];
    case "index":
      return [...printExprAt(expr.expr, PREC_POSTFIX), group("bracket", printExpr(expr.index))];
    case "try":
      return [...printExprAt(expr.expr, PREC_POSTFIX), leaf("?")];
    case "await":
      return [...printExprAt(expr.expr, PREC_POSTFIX), leaf("."), leaf("await")];
    case "range": {
      const out: TokenTree[] = [];
      if (expr.from) out.push(...printExprAt(expr.from, PREC_RANGE + 1));
      out.push(leaf(expr.limits));
      if (expr.to) out.push(...printExprAt(expr.to, PREC_RANGE + 1));
      return out;
    }
    case "tuple": {
      const inner = commaSeparated(expr.elems.map(printExpr));
      if (expr.elems.length === 1) inner.push(leaf(","));
      return [group("paren", inner)];
    }
    case "paren":
      return [group("paren", printExpr(expr.expr))];
    case "array":
      return [group("bracket", commaSeparated(expr.elems.map(printExpr)))];
    case "array_repeat":
      return [group("bracket", [...printExpr(expr.elem), leaf(";"), ...printExpr(expr.len)])];
    case "struct": {
      const fields: TokenStream[] = expr.fields.map((field) =>
        field.expr ? [leaf(field.name), leaf(":"), ...printExpr(field.expr)] : [leaf(field.name)]
      );
      if (expr.base) fields.push([leaf(".."), ...printExpr(expr.base)]);
      return [...printPath(expr.path), group("brace", commaSeparated(fields))];
    }
    case "block": {
      const out: TokenTree[] = labelPrefix(expr.label);
      if (expr.modifier) out.push(...leaves(...expr.modifier.split(" ")));
      out.push(printBlock(expr.block));
      return out;
    }
    case "if": {
      const out: TokenTree[] = [leaf("if"), ...printExpr(expr.cond), printBlock(expr.then)];
      if (expr.else) out.push(leaf("else"), ...printExpr(expr.else));
      return out;
    }
    case "let":
      return [leaf("let"), ...printPattern(expr.pat), leaf("="), ...printExprAt(expr.expr, PREC_COMPARE + 1)];
    case "while":
      return [...labelPrefix(expr.label), leaf("while"), ...printExpr(expr.cond), printBlock(expr.body)];
    case "loop":
      return [...labelPrefix(expr.label), leaf("loop"), printBlock(expr.body)];
    case "for":
      return [
        ...labelPrefix(expr.label),
        leaf("for"),
        ...printPattern(expr.pat),
        leaf("in"),
        ...printExpr(expr.iter),
        printBlock(expr.body),
      ];
    case "match": {
      const arms: TokenTree[] = [];
      for (const arm of expr.arms) {
        arms.push(...printPattern(arm.pat));
        if (arm.guard) arms.push(leaf("if"), ...printExpr(arm.guard));
        arms.push(leaf("=>"), ...printExpr(arm.body));
        if (arm.comma) arms.push(leaf(","));
      }
      return [leaf("match"), ...printExpr(expr.expr), group("brace", arms)];
    }
    case "closure": {
      const out: TokenTree[] = expr.move ? [leaf("move")] : [];
      if (expr.params.length === 0) {
        out.push(leaf("||"));
      } else {
        const params = expr.params.map((p) => (p.type ? [...printPattern(p.pat), leaf(":"), ...printType(p.type)] : printPattern(p.pat)));
        out.push(leaf("|"), ...commaSeparated(params), leaf("|"));
      }
      if (expr.ret) out.push(leaf("->"), ...printType(expr.ret));
      return [...out, ...printExpr(expr.body)];
    }
    case "return":
      return expr.expr ? [leaf("return"), ...printExpr(expr.expr)] : [leaf("return")];
    case "break": {
      const out: TokenTree[] = [leaf("break")];
      if (expr.label) out.push(leaf(expr.label));
      if (expr.expr) out.push(...printExpr(expr.expr));
      return out;
    }
    case "continue":
      return expr.label ? leaves("continue", expr.label) : [leaf("continue")];
    case "macro":
      return [...printPath(expr.path), leaf("!"), group(expr.delim, tokensToStream(expr.tokens))];
  }
}

// ---- statements ----

export function printAttribute(attr: RustAttribute): TokenStream {
  const path = attr.path.flatMap((segment, i) => (i === 0 ? [leaf(segment)] : [leaf("::"), leaf(segment)]));
  return [leaf(attr.style === "inner" ? "#!" : "#"), group("bracket", [...path, ...tokensToStream(attr.tokens)])];
}

function printAttributes(attrs: readonly RustAttribute[] | undefined): TokenTree[] {
  return (attrs ?? []).flatMap((attr) => [...printAttribute(attr)]);
}

export function printStmt(stmt: RustStmt): TokenStream {
  switch (stmt.kind) {
    case "empty":
      return [leaf(";")];
    case "item":
      return [...printAttributes(stmt.attrs), ...tokensToStream(stmt.tokens)];
    case "expr": {
      const out = [...printAttributes(stmt.attrs), ...printExpr(stmt.expr)];
      if (stmt.semi) out.push(leaf(";"));
      return out;
    }
    case "let": {
      const out: TokenTree[] = [...printAttributes(stmt.attrs), leaf("let"), ...printPattern(stmt.pat)];
      if (stmt.type) out.push(leaf(":"), ...printType(stmt.type));
      if (stmt.init) out.push(leaf("="), ...printExpr(stmt.init));
      if (stmt.else) out.push(leaf("else"), printBlock(stmt.else));
      out.push(leaf(";"));
      return out;
    }
  }
}

export function printBlock(block: RustBlock): TokenTree {
  return group("brace", block.stmts.flatMap((stmt) => [...printStmt(stmt)]));
}

export function typeToString(type: RustType): string {
  return streamToString(printType(type));
}

export function exprToString(expr: RustExpr): string {
  return streamToString(printExpr(expr));
}
