import type { ParseChild, ParseTree } from "../parser/shared";

const INDENT = "  ";

/**
 * Indented dump of a parse tree, one node per line. A production whose only
 * child is a token is folded onto its label line.
 */
export function prettyTree(root: ParseTree): string {
  const lines: string[] = [];
  writeTree(root, 0, lines);
  return lines.map(line => `${line}\n`).join("");
}

function writeTree(node: ParseTree, depth: number, lines: string[]): void {
  const pad = INDENT.repeat(depth);
  const only = node.children.length === 1 ? node.children[0] : undefined;
  if (only && only.kind === "token") {
    lines.push(`${pad}${node.label}\t${only.value}`);
    return;
  }
  lines.push(`${pad}${node.label}`);
  for (const child of node.children) {
    writeChild(child, depth + 1, lines);
  }
}

function writeChild(child: ParseChild, depth: number, lines: string[]): void {
  if (child.kind === "tree") {
    writeTree(child, depth, lines);
    return;
  }
  lines.push(`${INDENT.repeat(depth)}${child.value}`);
}
