#!/usr/bin/env node
import { runCli } from "./cli";

function main(): void {
  process.exitCode = runCli(process.argv.slice(2));
}

main();
