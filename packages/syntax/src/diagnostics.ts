import type { Span } from "./ast.js";

export const DIAGNOSTIC_CODES = [
  "CHN1001",
  "CHN1002",
  "CHN1003",
  "CHN1004",
  "CHN1005",
  "CHN1006",
  "CHN1101",
  "CHN1102",
  "CHN1103",
  "CHN1104",
  "CHN2001",
  "CHN2002",
  "CHN2003",
  "CHN2004",
] as const;

export type DiagnosticCode = (typeof DIAGNOSTIC_CODES)[number];

export type DiagnosticDomain = "lex" | "parse" | "shape";

const KNOWN = new Set<string>(DIAGNOSTIC_CODES);

export function isDiagnosticCode(code: string): code is DiagnosticCode {
  return KNOWN.has(code);
}

export function assertDiagnosticCode(code: string): asserts code is DiagnosticCode {
  if (!isDiagnosticCode(code)) {
    throw new Error(`Unregistered diagnostic code '${code}'.`);
  }
}

export function diagnosticDomain(code: DiagnosticCode): DiagnosticDomain {
  if (code.startsWith("CHN10")) return "lex";
  if (code.startsWith("CHN11")) return "parse";
  return "shape";
}

export class DiagnosticError extends Error {
  readonly code: DiagnosticCode;
  readonly span?: Span;

  constructor(code: string, message: string, span?: Span) {
    assertDiagnosticCode(code);
    super(message);
    this.code = code;
    this.span = span;
    this.name = "DiagnosticError";
  }

  get domain(): DiagnosticDomain {
    return diagnosticDomain(this.code);
  }
}

// Malformed token streams: lex errors (unbalanced delimiters, bad literals) and parse errors.
export class RustSyntaxError extends DiagnosticError {
  constructor(code: string, message: string, span?: Span) {
    super(code, message, span);
    this.name = "RustSyntaxError";
  }
}

export function lexError(code: DiagnosticCode, message: string, span: Span): RustSyntaxError {
  return new RustSyntaxError(code, `lex error: ${message}`, span);
}
