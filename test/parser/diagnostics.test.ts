import { describe, expect, test } from "vitest";

import { GrammarError } from "../../src/grammar/errors";
import {
  FrontendDiagnosticError,
  buildFrontendDiagnostic,
  formatFrontendDiagnostic,
} from "../../src/parser/diagnostics";
import { DuplicateDefinitionError } from "../../src/parser/shared";

describe("frontend diagnostics", () => {
  test("transform errors keep their code and span", () => {
    const span = { start: { line: 3, column: 1 }, end: { line: 3, column: 9 } };
    const diagnostic = buildFrontendDiagnostic(new DuplicateDefinitionError("A", span), "top.dv");
    expect(diagnostic).toEqual({
      severity: "error",
      code: "duplicate-definition",
      message: "transformer: 'A' is already defined",
      location: { path: "top.dv", line: 3, column: 1, endLine: 3, endColumn: 9 },
    });
    expect(formatFrontendDiagnostic(diagnostic)).toBe("top.dv:3:1: transformer: 'A' is already defined");
  });

  test("grammar errors prefer their own origin", () => {
    const error = new GrammarError("grammar: unexpected token", { line: 2, column: 4, origin: "a.dv" });
    const diagnostic = buildFrontendDiagnostic(error, "b.dv");
    expect(diagnostic.code).toBe("syntax");
    expect(formatFrontendDiagnostic(diagnostic)).toBe("a.dv:2:4: grammar: unexpected token");
  });

  test("missing location parts are dropped", () => {
    expect(formatFrontendDiagnostic(buildFrontendDiagnostic(new GrammarError("grammar: eof"), "c.dv"))).toBe(
      "c.dv: grammar: eof",
    );
    expect(formatFrontendDiagnostic(buildFrontendDiagnostic(new Error("boom")))).toBe("boom");
    expect(formatFrontendDiagnostic(buildFrontendDiagnostic("plain"))).toBe("plain");
  });

  test("wrapped diagnostics pass through", () => {
    const diagnostic = { severity: "warning" as const, message: "careful" };
    expect(buildFrontendDiagnostic(new FrontendDiagnosticError(diagnostic))).toBe(diagnostic);
    expect(formatFrontendDiagnostic(diagnostic)).toBe("warning: careful");
  });
});
