import type {
  RustAttribute,
  RustBlock,
  RustBound,
  RustExpr,
  RustGenericArg,
  RustGenericArgs,
  RustGenericParam,
  RustImplBlock,
  RustMethod,
  RustPath,
  RustPathSegment,
  RustPattern,
  RustStmt,
  RustType,
  RustVisibility,
  RustWherePredicate,
} from "./ast.js";
import { binaryPrecedence, exprPrecedence, PRECEDENCE, tokensToString } from "./print.js";

function emitGenericArg(arg: RustGenericArg): string {
  switch (arg.kind) {
    case "lifetime":
      return arg.name;
    case "type":
      return emitType(arg.type);
    case "const":
      return emitExpr(arg.expr);
    case "binding":
      return `${arg.name} = ${emitType(arg.type)}`;
    case "constraint":
      return `${arg.name}: ${emitBounds(arg.bounds)}`;
  }
}

function emitGenericArgs(args: RustGenericArgs): string {
  if (args.kind === "paren") {
    const ret = args.output ? ` -> ${emitType(args.output)}` : "";
    return `(${args.inputs.map(emitType).join(", ")})${ret}`;
  }
  const inner = `<${args.args.map(emitGenericArg).join(", ")}>`;
  return args.turbofish ? `::${inner}` : inner;
}

function emitSegments(segments: readonly RustPathSegment[]): string {
  return segments.map((s) => `${s.name}${s.args ? emitGenericArgs(s.args) : ""}`).join("::");
}

export function emitPath(path: RustPath): string {
  return `${path.global ? "::" : ""}${emitSegments(path.segments)}`;
}

function emitBound(bound: RustBound): string {
  if (bound.kind === "lifetime") return bound.name;
  const binder = bound.forLifetimes.length > 0 ? `for<${bound.forLifetimes.join(", ")}> ` : "";
  return `${binder}${bound.maybe ? "?" : ""}${emitPath(bound.path)}`;
}

export function emitBounds(bounds: readonly RustBound[]): string {
  return bounds.map(emitBound).join(" + ");
}

function emitQSelf(self: RustType, trait: RustPath | undefined, rest: readonly RustPathSegment[]): string {
  const as = trait ? ` as ${emitPath(trait)}` : "";
  return `<${emitType(self)}${as}>::${emitSegments(rest)}`;
}

export function emitType(ty: RustType): string {
  switch (ty.kind) {
    case "path":
      return emitPath(ty.path);
    case "qpath":
      return emitQSelf(ty.self, ty.trait, ty.rest);
    case "ref": {
      const lt = ty.lifetime ? `${ty.lifetime} ` : "";
      const mut = ty.mut ? "mut " : "";
      return `&${lt}${mut}${emitType(ty.inner)}`;
    }
    case "ptr":
      return `*${ty.mut ? "mut" : "const"} ${emitType(ty.inner)}`;
    case "slice":
      return `[${emitType(ty.inner)}]`;
    case "array":
      return `[${emitType(ty.elem)}; ${emitExpr(ty.len)}]`;
    case "tuple": {
      const only = ty.elems[0];
      if (ty.elems.length === 1 && only) return `(${emitType(only)},)`;
      return `(${ty.elems.map(emitType).join(", ")})`;
    }
    case "paren":
      return `(${emitType(ty.inner)})`;
    case "fn": {
      const unsafe = ty.unsafe ? "unsafe " : "";
      const abi = ty.abi === undefined ? "" : ty.abi === "" ? "extern " : `extern ${ty.abi} `;
      const ret = ty.output ? ` -> ${emitType(ty.output)}` : "";
      return `${unsafe}${abi}fn(${ty.inputs.map(emitType).join(", ")})${ret}`;
    }
    case "impl":
      return `impl ${emitBounds(ty.bounds)}`;
    case "dyn":
      return ty.explicit ? `dyn ${emitBounds(ty.bounds)}` : emitBounds(ty.bounds);
    case "never":
      return "!";
    case "infer":
      return "_";
  }
}

export function emitPattern(p: RustPattern): string {
  switch (p.kind) {
    case "wild":
      return "_";
    case "rest":
      return "..";
    case "ident": {
      const prefix = `${p.byRef ? "ref " : ""}${p.mut ? "mut " : ""}`;
      return `${prefix}${p.name}${p.sub ? ` @ ${emitPattern(p.sub)}` : ""}`;
    }
    case "lit":
      return `${p.negative ? "-" : ""}${p.text}`;
    case "range":
      return `${p.from ? emitPattern(p.from) : ""}${p.limits}${p.to ? emitPattern(p.to) : ""}`;
    case "path":
      return emitPath(p.path);
    case "tuple_struct":
      return `${emitPath(p.path)}(${p.elems.map(emitPattern).join(", ")})`;
    case "struct": {
      const fields = p.fields.map((f) => {
        if (!f.pat) return f.name;
        if (f.pat.kind === "ident" && f.pat.name === f.name && !f.pat.sub) return emitPattern(f.pat);
        return `${f.name}: ${emitPattern(f.pat)}`;
      });
      if (p.rest) fields.push("..");
      return fields.length === 0 ? `${emitPath(p.path)} {}` : `${emitPath(p.path)} { ${fields.join(", ")} }`;
    }
    case "tuple": {
      const only = p.elems[0];
      if (p.elems.length === 1 && only && only.kind !== "rest") return `(${emitPattern(only)},)`;
      return `(${p.elems.map(emitPattern).join(", ")})`;
    }
    case "paren":
      return `(${emitPattern(p.pat)})`;
    case "slice":
      return `[${p.elems.map(emitPattern).join(", ")}]`;
    case "ref":
      return `&${p.mut ? "mut " : ""}${emitPattern(p.pat)}`;
    case "or":
      return p.cases.map(emitPattern).join(" | ");
  }
}

function emitExprAt(expr: RustExpr, minPrec: number): string {
  const text = emitExpr(expr);
  return exprPrecedence(expr) < minPrec ? `(${text})` : text;
}

function emitArgs(args: readonly RustExpr[]): string {
  return `(${args.map(emitExpr).join(", ")})`;
}

function emitLabel(label: string | undefined): string {
  return label ? `${label}: ` : "";
}

export function emitBlockInline(block: RustBlock): string {
  if (block.stmts.length === 0) return "{}";
  return `{ ${block.stmts.map(emitStmt).join(" ")} }`;
}

export function emitExpr(expr: RustExpr): string {
  switch (expr.kind) {
    case "lit":
      return expr.text;
    case "path":
      return emitPath(expr.path);
    case "qpath":
      return emitQSelf(expr.self, expr.trait, expr.rest);
    case "unary":
      return `${expr.op}${emitExprAt(expr.expr, PRECEDENCE.prefix)}`;
    case "ref":
      return `&${expr.mut ? "mut " : ""}${emitExprAt(expr.expr, PRECEDENCE.prefix)}`;
    case "binary": {
      const prec = binaryPrecedence(expr.op);
      return `${emitExprAt(expr.left, prec)} ${expr.op} ${emitExprAt(expr.right, prec + 1)}`;
    }
    case "assign":
      return `${emitExprAt(expr.target, PRECEDENCE.range)} ${expr.op} ${emitExprAt(expr.expr, PRECEDENCE.assign)}`;
    case "cast":
      return `${emitExprAt(expr.expr, PRECEDENCE.cast)} as ${emitType(expr.type)}`;
    case "call":
      return `${emitExprAt(expr.callee, PRECEDENCE.postfix)}${emitArgs(expr.args)}`;
    case "method": {
      const turbofish = expr.turbofish ? `::<${expr.turbofish.map(emitGenericArg).join(", ")}>` : "";
      return `${emitExprAt(expr.receiver, PRECEDENCE.postfix)}.${expr.name}${turbofish}${emitArgs(expr.args)}`;
    }
    case "field":
      return `${emitExprAt(expr.expr, PRECEDENCE.postfix)}.${expr.member}`;
    case "index":
      return `${emitExprAt(expr.expr, PRECEDENCE.postfix)}[${emitExpr(expr.index)}]`;
    case "try":
      return `${emitExprAt(expr.expr, PRECEDENCE.postfix)}?`;
    case "await":
      return `${emitExprAt(expr.expr, PRECEDENCE.postfix)}.await`;
    case "range": {
      const from = expr.from ? emitExprAt(expr.from, PRECEDENCE.range + 1) : "";
      const to = expr.to ? emitExprAt(expr.to, PRECEDENCE.range + 1) : "";
      return `${from}${expr.limits}${to}`;
    }
    case "tuple": {
      const only = expr.elems[0];
      if (expr.elems.length === 1 && only) return `(${emitExpr(only)},)`;
      return `(${expr.elems.map(emitExpr).join(", ")})`;
    }
    case "paren":
      return `(${emitExpr(expr.expr)})`;
    case "array":
      return `[${expr.elems.map(emitExpr).join(", ")}]`;
    case "array_repeat":
      return `[${emitExpr(expr.elem)}; ${emitExpr(expr.len)}]`;
    case "struct": {
      const fields = expr.fields.map((f) => (f.expr ? `${f.name}: ${emitExpr(f.expr)}` : f.name));
      if (expr.base) fields.push(`..${emitExpr(expr.base)}`);
      return fields.length === 0 ? `${emitPath(expr.path)} {}` : `${emitPath(expr.path)} { ${fields.join(", ")} }`;
    }
    case "block": {
      const modifier = expr.modifier ? `${expr.modifier} ` : "";
      return `${emitLabel(expr.label)}${modifier}${emitBlockInline(expr.block)}`;
    }
    case "if": {
      const otherwise = expr.else ? ` else ${emitExpr(expr.else)}` : "";
      return `if ${emitExpr(expr.cond)} ${emitBlockInline(expr.then)}${otherwise}`;
    }
    case "let":
      return `let ${emitPattern(expr.pat)} = ${emitExprAt(expr.expr, PRECEDENCE.compare + 1)}`;
    case "while":
      return `${emitLabel(expr.label)}while ${emitExpr(expr.cond)} ${emitBlockInline(expr.body)}`;
    case "loop":
      return `${emitLabel(expr.label)}loop ${emitBlockInline(expr.body)}`;
    case "for":
      return `${emitLabel(expr.label)}for ${emitPattern(expr.pat)} in ${emitExpr(expr.iter)} ${emitBlockInline(expr.body)}`;
    case "match": {
      const arms = expr.arms.map((arm) => {
        const guard = arm.guard ? ` if ${emitExpr(arm.guard)}` : "";
        return `${emitPattern(arm.pat)}${guard} => ${emitExpr(arm.body)}${arm.comma ? "," : ""}`;
      });
      return arms.length === 0 ? `match ${emitExpr(expr.expr)} {}` : `match ${emitExpr(expr.expr)} { ${arms.join(" ")} }`;
    }
    case "closure": {
      const params = expr.params.map((p) => (p.type ? `${emitPattern(p.pat)}: ${emitType(p.type)}` : emitPattern(p.pat)));
      const ret = expr.ret ? ` -> ${emitType(expr.ret)}` : "";
      return `${expr.move ? "move " : ""}|${params.join(", ")}|${ret} ${emitExpr(expr.body)}`;
    }
    case "return":
      return expr.expr ? `return ${emitExpr(expr.expr)}` : "return";
    case "break": {
      const label = expr.label ? ` ${expr.label}` : "";
      return `break${label}${expr.expr ? ` ${emitExpr(expr.expr)}` : ""}`;
    }
    case "continue":
      return expr.label ? `continue ${expr.label}` : "continue";
    case "macro": {
      const inner = tokensToString(expr.tokens);
      const path = emitPath(expr.path);
      if (expr.delim === "paren") return `${path}!(${inner})`;
      if (expr.delim === "bracket") return `${path}![${inner}]`;
      return inner === "" ? `${path}! {}` : `${path}! { ${inner} }`;
    }
  }
}

// Line doc comments would swallow the rest of an inline statement, so they are written as `#[doc = ...]`.
function emitInlineAttributes(attrs: readonly RustAttribute[] | undefined): string {
  return (attrs ?? [])
    .map((attr) => (attr.text.startsWith("//") ? `#[${attr.path.join("::")} ${tokensToString(attr.tokens)}] ` : `${attr.text} `))
    .join("");
}

export function emitStmt(st: RustStmt): string {
  const attrs = st.kind === "empty" ? "" : emitInlineAttributes(st.attrs);
  switch (st.kind) {
    case "empty":
      return ";";
    case "item":
      return `${attrs}${tokensToString(st.tokens)}`;
    case "expr":
      return `${attrs}${emitExpr(st.expr)}${st.semi ? ";" : ""}`;
    case "let": {
      const ty = st.type ? `: ${emitType(st.type)}` : "";
      const init = st.init ? ` = ${emitExpr(st.init)}` : "";
      const otherwise = st.else ? ` else ${emitBlockInline(st.else)}` : "";
      return `${attrs}let ${emitPattern(st.pat)}${ty}${init}${otherwise};`;
    }
  }
}

export function emitVisibility(vis: RustVisibility): string {
  if (vis.kind === "private") return "";
  return vis.restriction ? `pub(${vis.restriction}) ` : "pub ";
}

export type GenericParamsStyle = {
  // `impl<...>` keeps bounds; the self type (`Name<...>`) lists names only.
  readonly bounds: boolean;
};

function emitGenericParam(param: RustGenericParam, style: GenericParamsStyle): string {
  switch (param.kind) {
    case "lifetime":
      return style.bounds && param.bounds.length > 0 ? `${param.name}: ${param.bounds.join(" + ")}` : param.name;
    case "type":
      return style.bounds && param.bounds.length > 0 ? `${param.name}: ${emitBounds(param.bounds)}` : param.name;
    case "const":
      return style.bounds ? `const ${param.name}: ${emitType(param.type)}` : param.name;
  }
}

export function emitGenericParams(params: readonly RustGenericParam[], style: GenericParamsStyle): string {
  if (params.length === 0) return "";
  return `<${params.map((p) => emitGenericParam(p, style)).join(", ")}>`;
}

function emitWherePredicate(pred: RustWherePredicate): string {
  if (pred.kind === "lifetime") return `${pred.name}: ${pred.bounds.join(" + ")}`;
  const binder = pred.forLifetimes.length > 0 ? `for<${pred.forLifetimes.join(", ")}> ` : "";
  const bounds = pred.bounds.length > 0 ? ` ${emitBounds(pred.bounds)}` : "";
  return `${binder}${emitType(pred.bounded)}:${bounds}`;
}

export function emitWhereClause(preds: readonly RustWherePredicate[] | undefined): string {
  if (!preds || preds.length === 0) return "";
  return `where ${preds.map(emitWherePredicate).join(", ")}`;
}

function emitMethod(method: RustMethod, indent: string): string[] {
  const out: string[] = [];
  for (const a of method.attrs) out.push(`${indent}${a.text}`);
  const params = method.params.map((p) => `${p.name}: ${emitType(p.type)}`);
  const all = method.receiver ? [method.receiver, ...params] : params;
  const generics = emitGenericParams(method.generics.params, { bounds: true });
  const ret = method.ret ? ` -> ${emitType(method.ret)}` : "";
  const where = emitWhereClause(method.generics.whereClause);
  const whereText = where === "" ? "" : ` ${where}`;
  out.push(`${indent}${emitVisibility(method.vis)}fn ${method.name}${generics}(${all.join(", ")})${ret}${whereText} {`);
  for (const st of method.body.stmts) out.push(`${indent}  ${emitStmt(st)}`);
  out.push(`${indent}}`);
  return out;
}

// Methods separated by blank lines, indented one level.
export function emitImplItems(methods: readonly RustMethod[]): string[] {
  return methods.flatMap((method, i) => [...(i > 0 ? [""] : []), ...emitMethod(method, "  ")]);
}

export function writeImplBlock(impl: RustImplBlock): string {
  const generics = emitGenericParams(impl.generics.params, { bounds: true });
  const trait = impl.trait ? `${emitPath(impl.trait)} for ` : "";
  const where = emitWhereClause(impl.generics.whereClause);
  const header = `impl${generics} ${trait}${emitType(impl.selfType)}${where === "" ? "" : ` ${where}`} {`;
  return [header, ...emitImplItems(impl.methods), "}"].join("\n");
}
