import { DEFAULT_MAX_DEPTH } from "../parser/parser.js";

export type CliOptions = {
  inputPath: string;
  outputPath: string | undefined;
  key: string | undefined;
  path: string | undefined;
  stats: boolean;
  stream: boolean;
  maxDepth: number;
};

export type CliArgsResult =
  | { ok: true; options: CliOptions }
  | { ok: false; message: string };

export const USAGE =
  "Usage: json-tree <input.json> [output.json] " +
  "or json-tree --input <input.json> [--output <output.json>] " +
  "[--get <key>] [--path <a.b.0>] [--stats] [--stream] [--max-depth <n>]";

const VALUE_FLAGS = new Set(["--input", "--output", "--get", "--path", "--max-depth"]);
const BOOLEAN_FLAGS = new Set(["--stats", "--stream"]);

export const parseCliArgs = (args: readonly string[]): CliArgsResult => {
  const consumedArgs = new Set<number>();
  const missingValues: string[] = [];

  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];
    if (arg.startsWith("--") && !VALUE_FLAGS.has(arg) && !BOOLEAN_FLAGS.has(arg)) {
      return { ok: false, message: `Unknown flag: ${arg}` };
    }
  }

  const readFlagValue = (flag: string): string | undefined => {
    const index = args.indexOf(flag);
    if (index === -1) {
      return undefined;
    }

    consumedArgs.add(index);
    const value = args[index + 1];
    if (value !== undefined && !value.startsWith("--")) {
      consumedArgs.add(index + 1);
      return value;
    }
    missingValues.push(flag);
    return undefined;
  };

  const readFlag = (flag: string): boolean => {
    const index = args.indexOf(flag);
    if (index === -1) {
      return false;
    }
    consumedArgs.add(index);
    return true;
  };

  const inputFlag = readFlagValue("--input");
  const outputFlag = readFlagValue("--output");
  const key = readFlagValue("--get");
  const path = readFlagValue("--path");
  const maxDepthFlag = readFlagValue("--max-depth");
  const stats = readFlag("--stats");
  const stream = readFlag("--stream");

  if (missingValues.length > 0) {
    return { ok: false, message: `Missing value for ${missingValues[0]}` };
  }

  const positionalArgs = args.filter((_value, index) => !consumedArgs.has(index));
  const inputPath = inputFlag ?? positionalArgs[0];
  const outputPath = outputFlag ?? (inputFlag ? positionalArgs[0] : positionalArgs[1]);

  if (!inputPath) {
    return { ok: false, message: USAGE };
  }

  let maxDepth = DEFAULT_MAX_DEPTH;
  if (maxDepthFlag !== undefined) {
    maxDepth = Number(maxDepthFlag);
    if (!Number.isInteger(maxDepth) || maxDepth < 1) {
      return { ok: false, message: `Invalid --max-depth value: ${maxDepthFlag}` };
    }
  }

  return {
    ok: true,
    options: { inputPath, outputPath, key, path, stats, stream, maxDepth },
  };
};
