import type {
  RustAttribute,
  RustDataShape,
  RustExpr,
  RustField,
  RustNamedField,
  RustGenericParam,
  RustGenerics,
  RustVisibility,
  RustWherePredicate,
  Span,
  Token,
  TypeDeclaration,
} from "../ast.js";
import { RustSyntaxError } from "../diagnostics.js";
import { tokenize, type LexOptions } from "../lexer.js";
import { parseOuterAttributes } from "./attrs.js";
import { Cursor, describeToken } from "./cursor.js";
import { parseBlockExpr, parseUnaryExpr } from "./expr.js";
import { parseBounds, parseLifetimeBounds, parsePath, parseType } from "./types.js";

export function cursorForText(text: string, opts: LexOptions = {}): Cursor {
  const fileName = opts.fileName ?? "<input>";
  const baseOffset = opts.baseOffset ?? 0;
  const tokens = tokenize(text, { fileName, baseOffset });
  const end = baseOffset + text.length;
  return new Cursor(tokens, { fileName, start: end, end }, { text, baseOffset });
}

function isRestrictionKeyword(c: Cursor): boolean {
  return (c.isIdent("crate", 1) || c.isIdent("self", 1) || c.isIdent("super", 1)) && c.isClose("paren", 2);
}

export function parseVisibility(c: Cursor): RustVisibility {
  if (!c.eatIdent("pub")) return { kind: "private" };
  if (!c.isOpen("paren")) return { kind: "pub" };
  if (isRestrictionKeyword(c)) {
    c.expectOpen("paren");
    const token = c.next();
    c.expectClose("paren");
    return { kind: "pub", restriction: token.kind === "ident" ? token.text : "" };
  }
  if (c.isIdent("in", 1)) {
    c.expectOpen("paren");
    c.expectIdent("in");
    const path = parsePath(c, "expr");
    c.expectClose("paren");
    const global = path.global ? "::" : "";
    return { kind: "pub", restriction: `in ${global}${path.segments.map((s) => s.name).join("::")}` };
  }
  // `pub (A, B)` in a tuple struct: the parenthesis belongs to the field type.
  return { kind: "pub" };
}

function parseConstDefault(c: Cursor): RustExpr {
  if (c.isOpen("brace")) return parseBlockExpr(c);
  return parseUnaryExpr(c);
}

function parseGenericParam(c: Cursor): RustGenericParam {
  const start = c.index;
  const attrs = parseOuterAttributes(c);
  if (c.isLifetime()) {
    const name = c.expectLifetime();
    const bounds = c.eatPunct(":") ? parseLifetimeBounds(c) : [];
    return { kind: "lifetime", attrs, name, bounds, span: c.spanFrom(start) };
  }
  if (c.eatIdent("const")) {
    const name = c.expectName("const parameter name");
    c.expectPunct(":");
    const type = parseType(c);
    const def = c.eatPunct("=") ? parseConstDefault(c) : undefined;
    return { kind: "const", attrs, name, type, ...(def ? { default: def } : {}), span: c.spanFrom(start) };
  }
  const name = c.expectName("generic parameter");
  const bounds = c.eatPunct(":") ? parseBounds(c) : [];
  const def = c.eatPunct("=") ? parseType(c) : undefined;
  return { kind: "type", attrs, name, bounds, ...(def ? { default: def } : {}), span: c.spanFrom(start) };
}

export function parseGenericParams(c: Cursor): RustGenericParam[] {
  if (!c.eatPunct("<")) return [];
  const params: RustGenericParam[] = [];
  while (!c.isPunct(">")) {
    params.push(parseGenericParam(c));
    if (!c.eatPunct(",")) break;
  }
  if (!c.eatPunct(">")) throw c.fail("'>'");
  return params;
}

function parseForBinder(c: Cursor): string[] {
  if (!c.isIdent("for") || !c.isPunct("<", 1)) return [];
  c.expectIdent("for");
  c.expectPunct("<");
  const out: string[] = [];
  while (c.isLifetime()) {
    out.push(c.expectLifetime());
    if (!c.eatPunct(",")) break;
  }
  if (!c.eatPunct(">")) throw c.fail("'>'");
  return out;
}

function isWhereEnd(c: Cursor): boolean {
  return c.atEnd() || c.isOpen("brace") || c.isPunct(";") || c.isPunct("=");
}

export function parseWhereClause(c: Cursor): RustWherePredicate[] | undefined {
  if (!c.eatIdent("where")) return undefined;
  const predicates: RustWherePredicate[] = [];
  while (!isWhereEnd(c)) {
    if (c.isLifetime()) {
      const name = c.expectLifetime();
      c.expectPunct(":");
      predicates.push({ kind: "lifetime", name, bounds: parseLifetimeBounds(c) });
    } else {
      const forLifetimes = parseForBinder(c);
      const bounded = parseType(c, { allowPlus: false });
      c.expectPunct(":");
      predicates.push({ kind: "bound", forLifetimes, bounded, bounds: parseBounds(c) });
    }
    if (!c.eatPunct(",")) break;
  }
  return predicates;
}

function parseNamedFields(c: Cursor): RustNamedField[] {
  c.expectOpen("brace");
  const fields: RustNamedField[] = [];
  while (!c.isClose("brace")) {
    const start = c.index;
    const attrs = parseOuterAttributes(c);
    const vis = parseVisibility(c);
    const name = c.expectName("field name");
    c.expectPunct(":");
    const type = parseType(c);
    fields.push({ attrs, vis, name, type, span: c.spanFrom(start) });
    if (!c.eatPunct(",")) break;
  }
  c.expectClose("brace");
  return fields;
}

function parseTupleFields(c: Cursor): RustField[] {
  c.expectOpen("paren");
  const fields: RustField[] = [];
  while (!c.isClose("paren")) {
    const start = c.index;
    const attrs = parseOuterAttributes(c);
    const vis = parseVisibility(c);
    const type = parseType(c);
    fields.push({ attrs, vis, type, span: c.spanFrom(start) });
    if (!c.eatPunct(",")) break;
  }
  c.expectClose("paren");
  return fields;
}

function parseVariants(c: Cursor): string[] {
  c.expectOpen("brace");
  const variants: string[] = [];
  while (!c.isClose("brace")) {
    parseOuterAttributes(c);
    parseVisibility(c);
    variants.push(c.expectName("variant name"));
    if (c.isOpen("paren") || c.isOpen("brace")) c.takeGroup();
    if (c.eatPunct("=")) {
      while (!c.atEnd() && !c.isPunct(",") && !c.isClose("brace")) {
        if (c.peek()?.kind === "open") c.takeGroup();
        else c.next();
      }
    }
    if (!c.eatPunct(",")) break;
  }
  c.expectClose("brace");
  return variants;
}

type StructBody = {
  readonly whereClause?: readonly RustWherePredicate[];
  readonly shape: RustDataShape;
};

function parseStructBody(c: Cursor): StructBody {
  const before = parseWhereClause(c);
  if (c.eatPunct(";")) return { ...(before ? { whereClause: before } : {}), shape: { kind: "unit" } };
  if (c.isOpen("brace")) {
    return { ...(before ? { whereClause: before } : {}), shape: { kind: "named", fields: parseNamedFields(c) } };
  }
  if (before) throw c.fail("'{' or ';'");
  if (!c.isOpen("paren")) throw c.fail("'{', '(' or ';'");
  const fields = parseTupleFields(c);
  const after = parseWhereClause(c);
  c.expectPunct(";");
  return { ...(after ? { whereClause: after } : {}), shape: { kind: "tuple", fields } };
}

export type ItemHead = {
  readonly attrs: readonly RustAttribute[];
  readonly vis: RustVisibility;
  readonly keyword?: string;
};

// Reads attributes, visibility and the item keyword without consuming the rest.
export function parseItemHead(c: Cursor): ItemHead {
  const attrs = parseOuterAttributes(c);
  const vis = parseVisibility(c);
  const token = c.peek();
  return { attrs, vis, ...(token?.kind === "ident" ? { keyword: token.text } : {}) };
}

export function parseTypeDeclarationFrom(c: Cursor): TypeDeclaration {
  const start = c.index;
  const { attrs, vis } = parseItemHead(c);
  let kind: TypeDeclaration["kind"];
  if (c.eatIdent("struct")) kind = "struct";
  else if (c.eatIdent("enum")) kind = "enum";
  else if (c.isIdent("union") && c.isName(1)) {
    c.expectIdent("union");
    kind = "union";
  } else throw c.fail("'struct', 'enum' or 'union'");

  const name = c.expectName("type name");
  const params = parseGenericParams(c);

  let whereClause: readonly RustWherePredicate[] | undefined;
  let shape: RustDataShape;
  if (kind === "struct") {
    const body = parseStructBody(c);
    whereClause = body.whereClause;
    shape = body.shape;
  } else {
    whereClause = parseWhereClause(c);
    shape = kind === "enum" ? { kind: "enum", variants: parseVariants(c) } : { kind: "union", fields: parseNamedFields(c) };
  }
  const generics: RustGenerics = whereClause ? { params, whereClause } : { params };
  return { kind, attrs, vis, name, generics, shape, span: c.spanFrom(start) };
}

export function expectEnd(c: Cursor, what: string): void {
  const token = c.peek();
  if (token) {
    throw new RustSyntaxError("CHN1103", `unexpected ${describeToken(token)} after ${what}`, token.span);
  }
}

export function parseTypeDeclaration(text: string, opts: LexOptions = {}): TypeDeclaration {
  const c = cursorForText(text, opts);
  const decl = parseTypeDeclarationFrom(c);
  expectEnd(c, "type declaration");
  return decl;
}

export type SourceItem = {
  readonly start: number;
  readonly end: number;
  readonly tokens: readonly Token[];
};

function itemRange(tokens: readonly Token[]): SourceItem {
  const first = tokens[0];
  const last = tokens.at(-1);
  if (!first || !last) throw new Error("Empty item range.");
  return { start: first.span.start, end: last.span.end, tokens };
}

// Splits a file into top-level items: each ends at a `;` or a closing `}` at depth zero
// (a `;` right after that brace belongs to the item).
export function scanItems(text: string, opts: LexOptions = {}): SourceItem[] {
  const tokens = tokenize(text, opts);
  const items: SourceItem[] = [];
  let begin = 0;
  let depth = 0;
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token) break;
    if (token.kind === "open") {
      depth++;
      continue;
    }
    if (token.kind === "close") {
      depth--;
      const innerAttr =
        token.delim === "bracket" && depth === 0 && isInnerAttributeStart(tokens, begin);
      if (depth === 0 && (token.delim === "brace" || innerAttr)) {
        let end = i + 1;
        const next = tokens[end];
        if (token.delim === "brace" && next?.kind === "punct" && next.text === ";") end++;
        items.push(itemRange(tokens.slice(begin, end)));
        begin = end;
        i = end - 1;
      }
      continue;
    }
    if (depth === 0 && token.kind === "punct" && token.text === ";") {
      items.push(itemRange(tokens.slice(begin, i + 1)));
      begin = i + 1;
    }
  }
  if (begin < tokens.length) {
    const rest = tokens.slice(begin);
    const first = rest[0];
    const span: Span | undefined = first?.span;
    throw new RustSyntaxError("CHN1102", "expected ';' or '}' to end the item, found end of input", span);
  }
  return items;
}

function isInnerAttributeStart(tokens: readonly Token[], begin: number): boolean {
  const hash = tokens[begin];
  const bang = tokens[begin + 1];
  return hash?.kind === "punct" && hash.text === "#" && bang?.kind === "punct" && bang.text === "!";
}
