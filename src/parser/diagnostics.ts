import type * as AST from "../ast";
import { GrammarError } from "../grammar/errors";
import type { TransformErrorCode } from "./shared";
import { TransformError } from "./shared";

export type DiagnosticSeverity = "error" | "warning";

export type DiagnosticLocation = {
  path?: string;
  line?: number;
  column?: number;
  endLine?: number;
  endColumn?: number;
};

export type FrontendDiagnostic = {
  severity: DiagnosticSeverity;
  message: string;
  code?: TransformErrorCode | "syntax";
  location?: DiagnosticLocation;
};

export class FrontendDiagnosticError extends Error {
  readonly diagnostic: FrontendDiagnostic;

  constructor(diagnostic: FrontendDiagnostic) {
    super(diagnostic.message);
    this.name = "FrontendDiagnosticError";
    this.diagnostic = diagnostic;
  }
}

export function buildFrontendDiagnostic(error: unknown, origin?: string): FrontendDiagnostic {
  if (error instanceof FrontendDiagnosticError) {
    return error.diagnostic;
  }
  if (error instanceof TransformError) {
    return {
      severity: "error",
      code: error.code,
      message: error.message,
      location: toDiagnosticLocation(error.span, origin),
    };
  }
  if (error instanceof GrammarError) {
    const path = error.origin ?? origin;
    const location: DiagnosticLocation | undefined =
      error.line !== undefined ? { path, line: error.line, column: error.column } : path ? { path } : undefined;
    return { severity: "error", code: "syntax", message: error.message, location };
  }
  if (error instanceof Error) {
    return { severity: "error", message: error.message, location: origin ? { path: origin } : undefined };
  }
  return { severity: "error", message: String(error), location: origin ? { path: origin } : undefined };
}

/** `path:line:column: message`, dropping whatever part of the location is unknown. */
export function formatFrontendDiagnostic(diagnostic: FrontendDiagnostic): string {
  const location = diagnostic.location;
  const parts: string[] = [];
  if (location?.path) parts.push(location.path);
  if (location?.line !== undefined) {
    parts.push(String(location.line));
    if (location.column !== undefined) parts.push(String(location.column));
  }
  const prefix = parts.length > 0 ? `${parts.join(":")}: ` : "";
  const severity = diagnostic.severity === "warning" ? "warning: " : "";
  return `${prefix}${severity}${diagnostic.message}`;
}

function toDiagnosticLocation(span: AST.Span | undefined, origin?: string): DiagnosticLocation | undefined {
  if (!span) return origin ? { path: origin } : undefined;
  return {
    path: origin,
    line: span.start.line,
    column: span.start.column,
    endLine: span.end.line,
    endColumn: span.end.column,
  };
}
