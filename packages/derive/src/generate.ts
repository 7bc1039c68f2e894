import {
  emitImplItems,
  genericPath,
  identExpr,
  pathType,
  type RustMethod,
  type RustType,
  type RustVisibility,
  type TypeDeclaration,
} from "@chainset/syntax";

import { DEFAULT_FORWARDED_ATTRIBUTES, forwardedAttributes } from "./attrs.js";
import { namedFields } from "./errors.js";
import { freshTypeParam, splitForImpl, type SplitGenerics } from "./generics.js";

export type SetterVisibility = "pub" | "pub(crate)" | "private";

export const SETTER_VISIBILITIES: readonly SetterVisibility[] = ["pub", "pub(crate)", "private"];

export type BuilderOptions = {
  readonly setterVisibility?: SetterVisibility;
  readonly valueParam?: string;
  readonly forwardAttributes?: readonly string[];
};

export type GeneratedMethod = RustMethod;

export type BuilderImpl = {
  readonly typeName: string;
  readonly generics: SplitGenerics;
  readonly valueParam: string;
  readonly methods: readonly GeneratedMethod[];
};

function visibility(setter: SetterVisibility): RustVisibility {
  switch (setter) {
    case "pub":
      return { kind: "pub" };
    case "pub(crate)":
      return { kind: "pub", restriction: "crate" };
    case "private":
      return { kind: "private" };
  }
}

function setter(name: string, type: RustType, valueParam: string, vis: RustVisibility, attrs: GeneratedMethod["attrs"]): GeneratedMethod {
  return {
    attrs,
    vis,
    name,
    generics: {
      params: [
        {
          kind: "type",
          attrs: [],
          name: valueParam,
          bounds: [{ kind: "trait", maybe: false, forLifetimes: [], path: genericPath(["Into"], [{ kind: "type", type }]) }],
        },
      ],
    },
    receiver: "&mut self",
    params: [{ name: "value", type: pathType([valueParam]) }],
    ret: { kind: "ref", mut: true, inner: pathType(["Self"]) },
    body: {
      stmts: [
        {
          kind: "expr",
          semi: true,
          expr: {
            kind: "assign",
            op: "=",
            target: { kind: "field", expr: identExpr("self"), member: name },
            expr: { kind: "method", receiver: identExpr("value"), name: "into", args: [] },
          },
        },
        { kind: "expr", semi: false, expr: identExpr("self") },
      ],
    },
  };
}

export function generateBuilder(decl: TypeDeclaration, options: BuilderOptions = {}): BuilderImpl {
  const fields = namedFields(decl);
  const valueParam = freshTypeParam(decl.generics, options.valueParam ?? "VALUE");
  const vis = visibility(options.setterVisibility ?? "pub");
  const allowed = options.forwardAttributes ?? DEFAULT_FORWARDED_ATTRIBUTES;

  const methods: GeneratedMethod[] = [];
  for (const field of fields) {
    methods.push(setter(field.name, field.type, valueParam, vis, forwardedAttributes(field.attrs, allowed)));
  }

  return {
    typeName: decl.name,
    generics: splitForImpl(decl.generics),
    valueParam,
    methods,
  };
}

// `impl<implGenerics> Name<tyGenerics> where ... {`, built from the split generics.
export function writeBuilderImpl(impl: BuilderImpl): string {
  const { implGenerics, tyGenerics, whereClause } = impl.generics;
  const where = whereClause === "" ? "" : ` ${whereClause}`;
  return [`impl${implGenerics} ${impl.typeName}${tyGenerics}${where} {`, ...emitImplItems(impl.methods), "}"].join("\n");
}
