#!/usr/bin/env node

// Command-line entry point for pvlq-inspect.

import { runInspect, USAGE } from "./inspect.ts";

const args = process.argv.slice(2);

if (args.length === 0 || args.includes("-h") || args.includes("--help")) {
  console.log(USAGE);
} else {
  const { code, stdout, stderr } = runInspect(args);
  for (const line of stdout) console.log(line);
  for (const line of stderr) console.error(line);
  process.exitCode = code;
}
