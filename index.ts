export * as AST from "./src/ast";
export { serialize, serializeCircuit } from "./src/serialize";
export { evaluateArith, evaluateExpr, OpenTermError } from "./src/denotation";
export { transformTree } from "./src/parser/tree-mapper";
export type { ResolutionMode, TransformOptions } from "./src/parser/transform-context";
export { SymbolContext } from "./src/parser/context";
export {
  ArityMismatchError,
  DuplicateDefinitionError,
  MalformedTreeError,
  MisplacedResultError,
  MissingOutputError,
  TransformError,
  UnknownModuleError,
  token,
  tree,
} from "./src/parser/shared";
export type { ParseChild, ParseTree, Token, TransformErrorCode } from "./src/parser/shared";
export { buildFrontendDiagnostic, formatFrontendDiagnostic, FrontendDiagnosticError } from "./src/parser/diagnostics";
export type { DiagnosticLocation, FrontendDiagnostic } from "./src/parser/diagnostics";
export { parseTree } from "./src/grammar/parser";
export { prettyTree } from "./src/grammar/pretty";
export { GrammarError } from "./src/grammar/errors";
export { Parser, parseFile, parseSource } from "./src/frontend";
export type { FrontendOptions } from "./src/frontend";
export { findManifestPath, loadConfig, loadManifest, resolveResolutionMode } from "./src/config";
export type { FrontendConfig, ManifestData } from "./src/config";
