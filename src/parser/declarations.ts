import type { ModuleSignature } from "./context";
import type { ParseChild } from "./shared";
import { isTree, tokenText } from "./shared";

export interface Declaration {
  name: string;
  signature?: ModuleSignature;
}

/**
 * Names a scope's statements will define, read off the tree shape alone so
 * nothing is transformed twice. Module-valued bindings carry their arity.
 */
export function collectDeclarations(statements: ParseChild[]): Declaration[] {
  const declarations: Declaration[] = [];
  for (const stmt of statements) {
    if (!isTree(stmt)) continue;
    switch (stmt.label) {
      case "register":
        declarations.push({ name: tokenText(stmt.children[0]) });
        break;
      case "bind": {
        const value = stmt.children[1];
        const declaration: Declaration = { name: tokenText(stmt.children[0]) };
        if (isTree(value) && value.label === "module") {
          const params = value.children[0];
          declaration.signature = { arity: isTree(params) ? params.children.length : 0 };
        }
        declarations.push(declaration);
        break;
      }
      case "stmt_seq":
        declarations.push(...collectDeclarations(stmt.children));
        break;
      default:
        break;
    }
  }
  return declarations;
}
