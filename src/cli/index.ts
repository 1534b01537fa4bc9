#!/usr/bin/env node
import { writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { createTracer } from "../core/trace.js";
import { UsageError, parseArgs } from "./args.js";
import { USAGE, createCore, runCommand } from "./commands.js";

async function main() {
  const { command, flags } = parseArgs(process.argv.slice(2));
  if (command === undefined || flags["help"] === "true") {
    console.log(USAGE);
    return;
  }

  const tracer = flags["trace"] === "true" ? createTracer((message) => console.error(message)) : undefined;
  const core = createCore(flags, tracer);
  const { exitCode, output } = runCommand(command, flags, core);
  const json = JSON.stringify(output, null, 2) + "\n";

  const outPath = flags["out"];
  if (outPath) {
    await mkdir(dirname(outPath), { recursive: true });
    await writeFile(outPath, json, "utf8");
    console.log(`Wrote ${outPath}`);
  } else {
    process.stdout.write(json);
  }
  process.exitCode = exitCode;
}

main().catch((err) => {
  if (err instanceof UsageError) {
    console.error(`${err.message}\n\n${USAGE}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});
