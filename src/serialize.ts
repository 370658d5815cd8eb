import type {
  Arith,
  Circuit,
  Contract,
  Module,
  Node,
  Out,
  Stmt,
} from "./ast";

/**
 * Renders a node as canonical surface syntax. Operators are written in
 * prefix form (`xor a b`, `mux s t f`), which needs no parentheses and
 * re-parses to the same tree.
 */
export function serialize(node: Node): string {
  switch (node.type) {
    case "Zero":
      return "0";
    case "One":
      return "1";
    case "Skip":
      return "skip";
    case "Fail":
      return "fail";
    case "SymbolRef":
      return node.symbol.name;
    case "BinaryExpression":
      return prefix(node.operator, node.operands);
    case "BinaryTerm":
      return prefix(node.operator, node.operands);
    case "Mux":
      return prefix("mux", node.operands);
    case "ModuleInstance":
      return `${node.callee.symbol.name}(${node.arguments.map((arg) => serialize(arg)).join(", ")})`;
    case "Not":
      return `not ${serialize(node.operand)}`;
    case "Res":
      return "res";
    case "PreCond":
      return `req ${serialize(node.cond)}`;
    case "PostCond":
      return `ens ${serialize(node.cond)}`;
    case "Contract":
      return serializeContract(node);
    case "Out":
      return serializeOut(node);
    case "Module":
      return serializeModule(node);
    case "Reg":
      return `${node.name} -> ${serialize(node.init)}, ${serialize(node.next)}`;
    case "Bind":
      return `${node.name} = ${serialize(node.value)}`;
    case "Assert":
      return `assert ${serialize(node.cond)}`;
    case "Assume":
      return `assume ${serialize(node.cond)}`;
  }
}

function prefix(operator: string, operands: readonly Arith[]): string {
  return [operator, ...operands.map((operand) => serialize(operand))].join(" ");
}

function serializeContract(node: Contract): string {
  return `[${serialize(node.pre)}; ${serialize(node.post)}]`;
}

function serializeOut(node: Out): string {
  return `out ${serialize(node.value)}`;
}

function serializeModule(node: Module): string {
  const parts: string[] = node.body.map((stmt: Stmt) => serialize(stmt));
  if (node.out) {
    parts.push(serializeOut(node.out));
  }
  const contract = node.contract ? serializeContract(node.contract) : "";
  return `mod(${node.params.join(", ")})${contract}{${parts.join("; ")}}`;
}

/** One statement per line, in definition order, each line newline-terminated. */
export function serializeCircuit(circuit: Circuit): string {
  return circuit.statements.map((stmt) => `${serialize(stmt)}\n`).join("");
}
