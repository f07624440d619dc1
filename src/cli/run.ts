import { createReadStream, createWriteStream, readAll, writeAll } from "../io/streams.js";
import { parse } from "../parser/parser.js";
import { parseValueStream } from "../parser/streamParser.js";
import { format } from "../format/formatter.js";
import { get, getPath, parsePath } from "../lookup/lookup.js";
import { collectStats } from "../value/stats.js";
import type { DocumentStats } from "../value/stats.js";
import { ValueType } from "../value/value.js";
import type { Value } from "../value/value.js";
import type { CliOptions } from "./args.js";

/** Where the CLI sends its output. Documents go to `write`, progress to `log`. */
export type CliConsole = {
  log(message: string): void;
  error(message: string): void;
  write(text: string): void;
};

export const defaultConsole: CliConsole = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
  write: (text) => {
    process.stdout.write(text);
  },
};

const watchStreamError = (
  stream: NodeJS.ReadableStream | NodeJS.WritableStream,
  message: string,
  cleanup: Array<() => void>
): Promise<never> =>
  new Promise((_, reject) => {
    const onError = (error: Error) => {
      reject(new Error(`${message}: ${error.message}`));
    };
    stream.once("error", onError);
    cleanup.push(() => stream.off("error", onError));
  });

const loadDocument = async (
  options: CliOptions,
  signal: AbortSignal | undefined,
  cleanupHandlers: Array<() => void>
): Promise<Value> => {
  const readStream = createReadStream(options.inputPath, signal);
  const readError = watchStreamError(
    readStream,
    `Failed to read input file "${options.inputPath}"`,
    cleanupHandlers
  );
  if (options.stream) {
    return Promise.race([parseValueStream(readStream, { maxDepth: options.maxDepth }), readError]);
  }
  const bytes = await Promise.race([readAll(readStream), readError]);
  return parse(bytes, { maxDepth: options.maxDepth });
};

const reportStats = (out: CliConsole, stats: DocumentStats): void => {
  out.log("Analysis Report:");
  out.log("  Tokens:");
  out.log(`    Objects:  ${stats.tokens.objects}`);
  out.log(`    Arrays:   ${stats.tokens.arrays}`);
  out.log(`    Keys:     ${stats.tokens.keys}`);
  out.log(`    Strings:  ${stats.tokens.strings}`);
  out.log(`    Numbers:  ${stats.tokens.numbers}`);
  out.log(`    Booleans: ${stats.tokens.booleans}`);
  out.log(`    Nulls:    ${stats.tokens.nulls}`);
  out.log(`  Max depth:  ${stats.maxDepth}`);
};

/** Runs one CLI invocation and returns the process exit code. */
export const runCli = async (
  options: CliOptions,
  out: CliConsole = defaultConsole,
  signal?: AbortSignal
): Promise<number> => {
  const cleanupHandlers: Array<() => void> = [];
  try {
    const root = await loadDocument(options, signal, cleanupHandlers);

    if (options.key !== undefined || options.path !== undefined) {
      const found =
        options.path !== undefined ? getPath(root, parsePath(options.path)) : get(root, options.key ?? "");
      const label = options.path ?? options.key;
      if (found.type === ValueType.Unknown) {
        out.error(`Not found: ${label}`);
        return 1;
      }
      out.write(`${format(found)}\n`);
      return 0;
    }

    if (options.stats) {
      reportStats(out, collectStats(root));
      return 0;
    }

    const text = `${format(root)}\n`;
    if (options.outputPath === undefined) {
      out.write(text);
      return 0;
    }

    out.log(`Input JSON: ${options.inputPath}`);
    out.log(`Output JSON: ${options.outputPath}`);
    const outputStream = createWriteStream(options.outputPath, signal);
    const writeError = watchStreamError(
      outputStream,
      `Failed to write output file "${options.outputPath}"`,
      cleanupHandlers
    );
    await Promise.race([writeAll(outputStream, text), writeError]);
    out.log("Success: output written.");
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    out.error(message);
    return 1;
  } finally {
    for (const cleanup of cleanupHandlers) {
      cleanup();
    }
  }
};
