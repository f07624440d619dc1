import { Readable } from "node:stream";
import { describe, expect, it } from "vitest";
import { parse } from "./parser.js";
import type { TokenSink } from "./streamParser.js";
import { parseJsonStream, parseValueStream, TreeBuilder } from "./streamParser.js";
import { arrayValue, numberValue, stringValue, valueEquals } from "../value/value.js";

type Event =
  | { type: "startObject" }
  | { type: "endObject" }
  | { type: "startArray" }
  | { type: "endArray" }
  | { type: "key"; value: string }
  | { type: "string"; value: string }
  | { type: "number"; value: string }
  | { type: "boolean"; value: boolean }
  | { type: "null" };

class RecordingSink implements TokenSink {
  readonly events: Event[] = [];

  writeStartObject(): void {
    this.events.push({ type: "startObject" });
  }

  writeEndObject(): void {
    this.events.push({ type: "endObject" });
  }

  writeStartArray(): void {
    this.events.push({ type: "startArray" });
  }

  writeEndArray(): void {
    this.events.push({ type: "endArray" });
  }

  writeKey(key: string): void {
    this.events.push({ type: "key", value: key });
  }

  writeString(value: string): void {
    this.events.push({ type: "string", value });
  }

  writeNumber(value: string): void {
    this.events.push({ type: "number", value });
  }

  writeBoolean(value: boolean): void {
    this.events.push({ type: "boolean", value });
  }

  writeNull(): void {
    this.events.push({ type: "null" });
  }
}

const recordTokens = async (payload: string): Promise<RecordingSink> => {
  const sink = new RecordingSink();
  await parseJsonStream(Readable.from([payload]), sink);
  return sink;
};

describe("stream parser", () => {
  it("emits the expected sequence for a small object", async () => {
    const sink = await recordTokens('{"name":"Ada","age":42}');

    expect(sink.events).toEqual([
      { type: "startObject" },
      { type: "key", value: "name" },
      { type: "string", value: "Ada" },
      { type: "key", value: "age" },
      { type: "number", value: "42" },
      { type: "endObject" },
    ]);
  });

  it("handles arrays, objects, strings, numbers, booleans, and nulls", async () => {
    const sink = await recordTokens(
      '{"items":[1,"two",false,null,{"ok":true}],"empty":{},"value":null}'
    );

    expect(sink.events).toEqual([
      { type: "startObject" },
      { type: "key", value: "items" },
      { type: "startArray" },
      { type: "number", value: "1" },
      { type: "string", value: "two" },
      { type: "boolean", value: false },
      { type: "null" },
      { type: "startObject" },
      { type: "key", value: "ok" },
      { type: "boolean", value: true },
      { type: "endObject" },
      { type: "endArray" },
      { type: "key", value: "empty" },
      { type: "startObject" },
      { type: "endObject" },
      { type: "key", value: "value" },
      { type: "null" },
      { type: "endObject" },
    ]);
  });
});

describe("parseValueStream", () => {
  it("builds the same tree as the in-memory parser", async () => {
    const payload =
      '{"items":[1,-2.5e3,"two",false,null,{"ok":true}],"empty":{},"dup":1,"dup":"a\\tb"}';
    const streamed = await parseValueStream(Readable.from([payload]));
    expect(valueEquals(streamed, parse(payload))).toBe(true);
  });

  it("reassembles input split across chunks", async () => {
    const streamed = await parseValueStream(Readable.from(['[1,"a', 'b",', "2]"]));
    expect(streamed).toEqual(arrayValue([numberValue(1), stringValue("ab"), numberValue(2)]));
  });

  it("decodes unicode escapes", async () => {
    const streamed = await parseValueStream(Readable.from(['"\\u0041"']));
    expect(streamed).toEqual(stringValue("A"));
  });

  it("enforces the nesting limit", async () => {
    await expect(parseValueStream(Readable.from(["[[[]]]"]), { maxDepth: 2 })).rejects.toThrow(
      "Nesting exceeds 2 levels"
    );
  });

  it("rejects malformed input", async () => {
    await expect(parseValueStream(Readable.from(['{"a":']))).rejects.toThrow();
  });
});

describe("TreeBuilder", () => {
  it("refuses to hand out a root before one is complete", () => {
    const builder = new TreeBuilder();
    expect(() => builder.getRoot()).toThrow("Token stream ended before a complete JSON value");
    builder.writeStartArray();
    expect(() => builder.getRoot()).toThrow("Token stream ended before a complete JSON value");
  });

  it("rejects unbalanced and misplaced tokens", () => {
    expect(() => new TreeBuilder().writeEndArray()).toThrow("Unbalanced array");
    expect(() => new TreeBuilder().writeKey("k")).toThrow("Key outside of an object");

    const builder = new TreeBuilder();
    builder.writeNull();
    expect(() => builder.writeNull()).toThrow("Token stream holds more than one root value");
  });

  it("rejects numbers outside double range", () => {
    expect(() => new TreeBuilder().writeNumber("1e400")).toThrow("Number out of range: 1e400");
  });
});
