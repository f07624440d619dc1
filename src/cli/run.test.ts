import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterAll, describe, expect, it } from "vitest";
import { DEFAULT_MAX_DEPTH } from "../parser/parser.js";
import type { CliOptions } from "./args.js";
import { runCli } from "./run.js";
import type { CliConsole } from "./run.js";

class RecordingConsole implements CliConsole {
  readonly logs: string[] = [];
  readonly errors: string[] = [];
  output = "";

  log(message: string): void {
    this.logs.push(message);
  }

  error(message: string): void {
    this.errors.push(message);
  }

  write(text: string): void {
    this.output += text;
  }
}

const PAYLOAD = '{"a":{"b":"x"},"list":[10,20],"flag":true}';
const FORMATTED = '{\n\t"a":{\n\t\t"b":"x"\n\t},\n\t"list":[\n\t\t10,\n\t\t20\n\t],\n\t"flag":true\n}\n';

describe("runCli", () => {
  const tempDirs: string[] = [];

  const writeInput = async (content: string): Promise<string> => {
    const dir = await mkdtemp(path.join(tmpdir(), "json-tree-cli-"));
    tempDirs.push(dir);
    const inputPath = path.join(dir, "input.json");
    await writeFile(inputPath, content, "utf8");
    return inputPath;
  };

  const optionsFor = (inputPath: string, overrides: Partial<CliOptions> = {}): CliOptions => ({
    inputPath,
    outputPath: undefined,
    key: undefined,
    path: undefined,
    stats: false,
    stream: false,
    maxDepth: DEFAULT_MAX_DEPTH,
    ...overrides,
  });

  afterAll(async () => {
    for (const dir of tempDirs) {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("prints the formatted document", async () => {
    const out = new RecordingConsole();
    const code = await runCli(optionsFor(await writeInput(PAYLOAD)), out);

    expect(code).toBe(0);
    expect(out.output).toBe(FORMATTED);
    expect(out.logs).toEqual([]);
  });

  it("prints the same document through the stream parser", async () => {
    const out = new RecordingConsole();
    const code = await runCli(optionsFor(await writeInput(PAYLOAD), { stream: true }), out);

    expect(code).toBe(0);
    expect(out.output).toBe(FORMATTED);
  });

  it("writes the formatted document to the output file", async () => {
    const inputPath = await writeInput(PAYLOAD);
    const outputPath = path.join(path.dirname(inputPath), "output.json");
    const out = new RecordingConsole();
    const code = await runCli(optionsFor(inputPath, { outputPath }), out);

    expect(code).toBe(0);
    expect(await readFile(outputPath, "utf8")).toBe(FORMATTED);
    expect(out.logs).toEqual([
      `Input JSON: ${inputPath}`,
      `Output JSON: ${outputPath}`,
      "Success: output written.",
    ]);
  });

  it("prints the value found for a key", async () => {
    const out = new RecordingConsole();
    const code = await runCli(optionsFor(await writeInput(PAYLOAD), { key: "b" }), out);

    expect(code).toBe(0);
    expect(out.output).toBe('"x"\n');
  });

  it("prints the value found at a path", async () => {
    const out = new RecordingConsole();
    const code = await runCli(optionsFor(await writeInput(PAYLOAD), { path: "list.1" }), out);

    expect(code).toBe(0);
    expect(out.output).toBe("20\n");
  });

  it("fails when the key is missing", async () => {
    const out = new RecordingConsole();
    const code = await runCli(optionsFor(await writeInput(PAYLOAD), { key: "zz" }), out);

    expect(code).toBe(1);
    expect(out.errors).toEqual(["Not found: zz"]);
    expect(out.output).toBe("");
  });

  it("prints statistics", async () => {
    const out = new RecordingConsole();
    const code = await runCli(optionsFor(await writeInput(PAYLOAD), { stats: true }), out);

    expect(code).toBe(0);
    expect(out.logs).toEqual([
      "Analysis Report:",
      "  Tokens:",
      "    Objects:  2",
      "    Arrays:   1",
      "    Keys:     4",
      "    Strings:  1",
      "    Numbers:  2",
      "    Booleans: 1",
      "    Nulls:    0",
      "  Max depth:  2",
    ]);
  });

  it("reports parse errors", async () => {
    const out = new RecordingConsole();
    const code = await runCli(optionsFor(await writeInput("123 456")), out);

    expect(code).toBe(1);
    expect(out.errors).toEqual([
      "TrailingData: expected end of input, got '4' at 1:5 (offset 4)",
    ]);
  });

  it("reports unreadable input files", async () => {
    const out = new RecordingConsole();
    const missing = path.join(tmpdir(), "json-tree-missing", "nope.json");
    const code = await runCli(optionsFor(missing), out);

    expect(code).toBe(1);
    expect(out.errors).toHaveLength(1);
    expect(out.errors[0]).toMatch(/ENOENT/);
  });
});
