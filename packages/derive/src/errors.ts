import { DiagnosticError, type RustDataShape, type RustNamedField, type Span, type TypeDeclaration } from "@chainset/syntax";

// A derive target whose shape has no builder (anything but a named-field struct).
export class ShapeError extends DiagnosticError {
  constructor(code: string, message: string, span?: Span) {
    super(code, message, span);
    this.name = "ShapeError";
  }
}

function describeShape(shape: Exclude<RustDataShape, { readonly kind: "named" }>): { readonly code: string; readonly what: string } {
  switch (shape.kind) {
    case "tuple":
      return { code: "CHN2001", what: "a tuple struct" };
    case "unit":
      return { code: "CHN2002", what: "a unit struct" };
    case "enum":
      return { code: "CHN2003", what: "an enum" };
    case "union":
      return { code: "CHN2004", what: "a union" };
  }
}

export function namedFields(decl: TypeDeclaration): readonly RustNamedField[] {
  if (decl.shape.kind === "named") return decl.shape.fields;
  const bad = describeShape(decl.shape);
  throw new ShapeError(
    bad.code,
    `Builder can only be derived for structs with named fields; '${decl.name}' is ${bad.what}`,
    decl.span
  );
}
