#!/usr/bin/env node
import { parseCliArgs } from "./args.js";
import { runCli } from "./run.js";

const parsed = parseCliArgs(process.argv.slice(2));

if (!parsed.ok) {
  console.error(parsed.message);
  process.exit(1);
}

const abortController = new AbortController();

process.on("SIGINT", () => {
  if (!abortController.signal.aborted) {
    console.error("Aborting: received SIGINT.");
    abortController.abort();
  }
});

const run = async (): Promise<void> => {
  process.exitCode = await runCli(parsed.options, undefined, abortController.signal);
};

void run();
