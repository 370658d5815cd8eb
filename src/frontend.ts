import fs from "node:fs";

import type * as AST from "./ast";
import { parseTree } from "./grammar/parser";
import { prettyTree } from "./grammar/pretty";
import type { ParseTree } from "./parser/shared";
import type { TransformOptions } from "./parser/transform-context";
import { transformTree } from "./parser/tree-mapper";

export interface FrontendOptions extends TransformOptions {
  /** Path or label reported in syntax errors. */
  origin?: string;
}

/** Source text to `Circuit`. Syntax errors throw `GrammarError`, static ones `TransformError`. */
export function parseSource(source: string, options: FrontendOptions = {}): AST.Circuit {
  const { origin, ...transformOptions } = options;
  return transformTree(parseTree(source, origin), transformOptions);
}

export function parseFile(filePath: string, options: FrontendOptions = {}): AST.Circuit {
  const source = fs.readFileSync(filePath, "utf8");
  return parseSource(source, { origin: filePath, ...options });
}

/**
 * Stateful wrapper that keeps the most recent parse tree and circuit around
 * for inspection.
 */
export class Parser {
  private lastTree: ParseTree | null = null;
  private lastCircuit: AST.Circuit | null = null;

  constructor(private readonly options: FrontendOptions = {}) {}

  get tree(): ParseTree | null {
    return this.lastTree;
  }

  get circuit(): AST.Circuit | null {
    return this.lastCircuit;
  }

  parse(source: string): AST.Circuit {
    return this.run(source, this.options.origin);
  }

  parseFile(filePath: string): AST.Circuit {
    return this.run(fs.readFileSync(filePath, "utf8"), this.options.origin ?? filePath);
  }

  /** Pretty form of the last parse tree, or an empty string before any parse. */
  printTree(): string {
    return this.lastTree ? prettyTree(this.lastTree) : "";
  }

  private run(source: string, origin: string | undefined): AST.Circuit {
    this.lastTree = null;
    this.lastCircuit = null;
    this.lastTree = parseTree(source, origin);
    this.lastCircuit = transformTree(this.lastTree, { resolution: this.options.resolution });
    return this.lastCircuit;
  }
}
