import fs from "node:fs";
import path from "node:path";

import { loadConfig, loadNearestManifest, manifestSourcePaths, parseResolutionMode } from "../src/config";
import type { FrontendConfig, ManifestData } from "../src/config";
import { parseFile } from "../src/frontend";
import { parseTree } from "../src/grammar/parser";
import { prettyTree } from "../src/grammar/pretty";
import { buildFrontendDiagnostic, formatFrontendDiagnostic } from "../src/parser/diagnostics";
import type { ResolutionMode } from "../src/parser/transform-context";
import { serializeCircuit } from "../src/serialize";

type CLICommand = "check" | "print" | "tree";

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
  cwd: string;
}

export function consoleIO(): CliIO {
  return {
    stdout: text => console.log(text),
    stderr: text => console.error(text),
    env: process.env,
    cwd: process.cwd(),
  };
}

type ParsedArgs = {
  files: string[];
  resolution?: ResolutionMode;
};

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/** Runs one CLI invocation and returns its exit code. */
export function runCli(argv: string[], io: CliIO = consoleIO()): number {
  if (argv.length === 0) {
    printUsage(io);
    return 1;
  }

  const first = argv[0];
  if (isHelpFlag(first)) {
    printUsage(io);
    return 0;
  }

  if (isVersionFlag(first)) {
    io.stdout(loadConfig(io.env).version);
    return 0;
  }
  if (!isCommand(first)) {
    io.stderr(`unknown command '${first}'`);
    printUsage(io);
    return 1;
  }

  let manifest: ManifestData | null;
  try {
    manifest = loadNearestManifest(io.cwd);
  } catch (error) {
    io.stderr(extractErrorMessage(error));
    return 1;
  }
  const config = loadConfig(io.env, manifest);

  let args: ParsedArgs;
  try {
    args = parseArgs(argv.slice(1));
  } catch (error) {
    io.stderr(extractErrorMessage(error));
    return 1;
  }
  const effective: FrontendConfig = { ...config, resolution: args.resolution ?? config.resolution };

  switch (first) {
    case "check":
      return handleCheckCommand(args.files, manifest, effective, io);
    case "print":
      return handleSingleFile("print", args.files, effective, io, (file, origin) =>
        serializeCircuit(parseFile(file, { resolution: effective.resolution, origin })).trimEnd(),
      );
    case "tree":
      return handleSingleFile("tree", args.files, effective, io, (file, origin) =>
        prettyTree(parseTree(fs.readFileSync(file, "utf8"), origin)).trimEnd(),
      );
  }
}

function handleCheckCommand(
  files: string[],
  manifest: ManifestData | null,
  config: FrontendConfig,
  io: CliIO,
): number {
  let targets = files.map(file => path.resolve(io.cwd, file));
  if (targets.length === 0) {
    if (!manifest || manifest.sources.length === 0) {
      io.stderr("dvrtl check requires at least one file (or a dvrtl.yml listing sources)");
      return 1;
    }
    targets = manifestSourcePaths(manifest);
  }

  let failures = 0;
  for (const target of targets) {
    const display = path.relative(io.cwd, target) || target;
    try {
      const circuit = parseFile(target, { resolution: config.resolution, origin: display });
      io.stdout(`ok ${display} (${circuit.statements.length} statement(s), ${circuit.definitions.length} definition(s))`);
    } catch (error) {
      failures += 1;
      reportError(error, display, config, io);
    }
  }
  if (failures > 0) {
    io.stderr(`${failures} of ${targets.length} file(s) failed`);
    return 1;
  }
  return 0;
}

function handleSingleFile(
  command: CLICommand,
  files: string[],
  config: FrontendConfig,
  io: CliIO,
  render: (file: string, origin: string) => string,
): number {
  if (files.length !== 1) {
    io.stderr(`dvrtl ${command} requires exactly one file`);
    return 1;
  }
  const target = path.resolve(io.cwd, files[0]);
  const display = path.relative(io.cwd, target) || target;
  try {
    io.stdout(render(target, display));
    return 0;
  } catch (error) {
    reportError(error, display, config, io);
    return 1;
  }
}

function reportError(error: unknown, origin: string, config: FrontendConfig, io: CliIO): void {
  io.stderr(formatFrontendDiagnostic(buildFrontendDiagnostic(error, origin)));
  if (config.traceErrors && error instanceof Error && error.stack) {
    io.stderr(error.stack);
  }
}

function parseArgs(args: string[]): ParsedArgs {
  const parsed: ParsedArgs = { files: [] };
  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];
    if (arg === "--resolution" || arg.startsWith("--resolution=")) {
      const value = arg.includes("=") ? arg.slice(arg.indexOf("=") + 1) : args[++index];
      if (value === undefined) {
        throw new UsageError("--resolution requires a value (hoisted or sequential)");
      }
      const mode = parseResolutionMode(value);
      if (!mode) {
        throw new UsageError(`unknown resolution '${value}'`);
      }
      parsed.resolution = mode;
      continue;
    }
    if (arg.startsWith("--")) {
      throw new UsageError(`unknown option '${arg}'`);
    }
    parsed.files.push(arg);
  }
  return parsed;
}

function isCommand(value: string | undefined): value is CLICommand {
  return value === "check" || value === "print" || value === "tree";
}

function isHelpFlag(value: string | undefined): boolean {
  return value === "--help" || value === "-h" || value === "help";
}

function isVersionFlag(value: string | undefined): boolean {
  return value === "--version" || value === "-V" || value === "version";
}

function printUsage(io: CliIO): void {
  io.stdout(`dvrtl front end

Usage:
  dvrtl check [files...]    Parse and validate; without files, checks the sources in dvrtl.yml
  dvrtl print <file>        Print the canonical form of a circuit
  dvrtl tree <file>         Print the parse tree

Options:
  --resolution <mode>   hoisted (default) or sequential name resolution
  --help, -h            Show this message
  --version, -V         Print CLI version

Environment:
  DVRTL_RESOLUTION      Default resolution mode
  DVRTL_TRACE_ERRORS    Print stack traces alongside diagnostics
  DVRTL_VERSION         Override the reported version`);
}

function extractErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
