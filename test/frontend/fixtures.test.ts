import { describe, expect, test } from "vitest";
import { readdirSync } from "node:fs";
import path from "node:path";

import * as AST from "../../src/ast";
import { Parser, parseFile, parseSource } from "../../src/frontend";
import { serializeCircuit } from "../../src/serialize";
import { UnknownModuleError } from "../../src/parser/shared";

const FIXTURE_ROOT = path.resolve(__dirname, "../../fixtures/dv");

function fixture(name: string): string {
  return path.join(FIXTURE_ROOT, name);
}

function stripSpans(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(stripSpans);
  }
  if (!value || typeof value !== "object") {
    return value;
  }
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (key === "span") continue;
    result[key] = stripSpans(entry);
  }
  return result;
}

const fixtures = readdirSync(FIXTURE_ROOT).filter(file => file.endsWith(".dv")).sort();

describe("fixtures", () => {
  test.each(fixtures)("%s re-parses from its canonical form", file => {
    const circuit = parseFile(fixture(file));
    const reparsed = parseSource(serializeCircuit(circuit));
    expect(stripSpans(reparsed.statements)).toEqual(stripSpans(circuit.statements));
    expect(reparsed.context).toEqual(circuit.context);
  });

  test.each(fixtures)("%s has unique top-level names and well-formed instances", file => {
    const circuit = parseFile(fixture(file));
    const names = circuit.context.map(symbol => symbol.name);
    expect(new Set(names).size).toBe(names.length);

    const instances: AST.ModuleInstance[] = [];
    collectInstances(circuit.statements, instances);
    for (const instance of instances) {
      const owner = instance.callee.symbol.owner;
      expect(owner).not.toBeNull();
      const definition = owner === null ? undefined : circuit.definitions[owner];
      expect(definition?.type === "Bind" && definition.value.type === "Module" ? definition.value.params.length : -1).toBe(
        instance.arguments.length,
      );
    }
  });

  test("mini", () => {
    const circuit = parseFile(fixture("mini.dv"));
    expect(serializeCircuit(circuit)).toBe(
      "A -> 0, xor C xor a b\nB -> 1, B\nC -> 0, or and A B and C xor A B\n",
    );
    expect(circuit.context.map(symbol => symbol.name)).toEqual(["A", "B", "C"]);
  });

  test("assert", () => {
    const circuit = parseFile(fixture("assert.dv"));
    const last = circuit.statements[circuit.statements.length - 1];
    expect(stripSpans(last)).toEqual(
      AST.assertStmt(AST.arithXor(AST.symbolRef(AST.symbol("A", 0)), AST.symbolRef(AST.symbol("Ap", 1)))),
    );
  });

  test("mod", () => {
    const circuit = parseFile(fixture("mod.dv"));
    expect(circuit.statements).toHaveLength(9);
    expect(circuit.definitions).toHaveLength(13);
    expect(circuit.context.map(symbol => symbol.name)).toEqual([
      "sum",
      "carry",
      "add2_0",
      "add2_1",
      "carry2",
      "bit0",
      "bit1",
      "overflow",
    ]);
    const lines = serializeCircuit(circuit).split("\n");
    expect(lines[0]).toBe("sum = mod(a_in, b_in, c_in){axb = xor a_in b_in; out xor c_in axb}");
    expect(lines[2]).toBe("add2_0 = mod(a1, a0, b1, b0){out sum(a0, b0, 0)}");
    expect(lines[8]).toBe("assert and and - bit0 1 - bit1 0 - overflow 0");
  });

  test("untyped keeps its contracts", () => {
    const circuit = parseFile(fixture("untyped.dv"));
    const lines = serializeCircuit(circuit).split("\n");
    expect(lines[0]).toBe(
      "sum = mod(a_in, b_in, c_in)[req 1; ens eq res + + a_in b_in c_in]{axb = xor a_in b_in; out xor c_in axb}",
    );
    expect(lines[1].startsWith("carry = mod(a_in, b_in, c_in){")).toBe(true);
    expect(lines[3]).toBe(
      "add2_1 = mod(a1, a0, b1, b0)[req 1; ens eq res + and a0 b0 + a1 b1]{c_0 = carry(a0, b0, 0); out sum(a1, b1, c_0)}",
    );
  });

  test("counter", () => {
    const circuit = parseFile(fixture("counter.dv"));
    expect(serializeCircuit(circuit)).toBe(
      [
        "en -> 0, 1",
        "lo -> 0, xor lo en",
        "hi -> 0, xor hi and lo en",
        "wrap = mux en and lo hi 0",
        "assume eq en 1",
        "assert not and wrap not en",
        "",
      ].join("\n"),
    );
  });

  test("forward depends on the resolution mode", () => {
    expect(parseFile(fixture("forward.dv")).statements).toHaveLength(2);
    expect(() => parseFile(fixture("forward.dv"), { resolution: "sequential" })).toThrow(UnknownModuleError);
  });
});

describe("Parser", () => {
  test("remembers the last tree and circuit", () => {
    const parser = new Parser();
    expect(parser.printTree()).toBe("");
    const circuit = parser.parse("x = 1");
    expect(parser.circuit).toBe(circuit);
    expect(parser.printTree()).toBe("start\n  bind\n    x\n    one\t1\n");
  });

  test("a failed parse clears the previous result", () => {
    const parser = new Parser();
    parser.parse("x = 1");
    expect(() => parser.parse("x = 1; x = 0")).toThrow("transformer: 'x' is already defined");
    expect(parser.tree).not.toBeNull();
    expect(parser.circuit).toBeNull();
  });

  test("parseFile reads from disk", () => {
    const parser = new Parser({ resolution: "sequential" });
    const circuit = parser.parseFile(fixture("mini.dv"));
    expect(circuit.statements).toHaveLength(3);
    expect(parser.tree?.label).toBe("start");
  });
});

function collectInstances(nodes: readonly AST.Node[], found: AST.ModuleInstance[]): void {
  for (const node of nodes) {
    switch (node.type) {
      case "ModuleInstance":
        found.push(node);
        collectInstances(node.arguments, found);
        break;
      case "BinaryExpression":
      case "BinaryTerm":
      case "Mux":
        collectInstances(node.operands, found);
        break;
      case "Not":
        collectInstances([node.operand], found);
        break;
      case "Reg":
        collectInstances([node.next], found);
        break;
      case "Bind":
        collectInstances([node.value], found);
        break;
      case "Assert":
      case "Assume":
      case "PreCond":
      case "PostCond":
        collectInstances([node.cond], found);
        break;
      case "Module":
        collectInstances(node.body, found);
        if (node.out) collectInstances([node.out.value], found);
        break;
      default:
        break;
    }
  }
}
