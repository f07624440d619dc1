import { Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { Readable, Transform } from "node:stream";
import pkg from "stream-json";
import {
  arrayValue,
  booleanValue,
  member,
  NULL,
  numberValue,
  objectValue,
  stringValue,
} from "../value/value.js";
import type { Member, Value } from "../value/value.js";
import { DEFAULT_MAX_DEPTH } from "./parser.js";
import type { ParserOptions } from "./parser.js";
const { parser } = pkg;

/**
 * Receives the tokens of one JSON document in order. Numbers arrive as their
 * source text.
 */
export interface TokenSink {
  writeStartObject(): void;
  writeEndObject(): void;
  writeStartArray(): void;
  writeEndArray(): void;
  writeKey(key: string): void;
  writeString(value: string): void;
  writeNumber(value: string): void;
  writeBoolean(value: boolean): void;
  writeNull(): void;
}

type JsonToken = {
  name: string;
  value?: unknown;
};

const writeToken = (sink: TokenSink, token: JsonToken): void => {
  switch (token.name) {
    case "startObject":
      return sink.writeStartObject();
    case "endObject":
      return sink.writeEndObject();
    case "startArray":
      return sink.writeStartArray();
    case "endArray":
      return sink.writeEndArray();
    case "keyValue":
      return sink.writeKey(String(token.value ?? ""));
    case "stringValue":
      return sink.writeString(String(token.value ?? ""));
    case "numberValue":
      if (typeof token.value !== "string") {
        throw new Error("Number token missing value");
      }
      return sink.writeNumber(token.value);
    case "trueValue":
      return sink.writeBoolean(true);
    case "falseValue":
      return sink.writeBoolean(false);
    case "nullValue":
      return sink.writeNull();
    default:
      // string/number chunk tokens duplicate the packed values above
      return;
  }
};

const createSinkStream = (sink: TokenSink): Writable =>
  new Writable({
    objectMode: true,
    write(chunk: JsonToken, _encoding, callback) {
      try {
        writeToken(sink, chunk);
        callback();
      } catch (error) {
        callback(error instanceof Error ? error : new Error(String(error)));
      }
    },
  });

export const createStreamParser = (sink: TokenSink): { parser: Transform; sink: Writable } => {
  const parserStream = parser();
  return { parser: parserStream, sink: createSinkStream(sink) };
};

export const parseJsonStream = async (readable: Readable, sink: TokenSink): Promise<void> => {
  const { parser: parserStream, sink: sinkStream } = createStreamParser(sink);
  await pipeline(readable, parserStream, sinkStream);
};

type Frame =
  | { type: "array"; items: Value[] }
  | { type: "object"; members: Member[]; key: string | undefined };

/** Assembles a token sequence into a `Value` tree. */
export class TreeBuilder implements TokenSink {
  private readonly frames: Frame[] = [];
  private root: Value | undefined;

  constructor(private readonly maxDepth = DEFAULT_MAX_DEPTH) {}

  getRoot(): Value {
    if (this.root === undefined || this.frames.length > 0) {
      throw new Error("Token stream ended before a complete JSON value");
    }
    return this.root;
  }

  private push(value: Value): void {
    if (this.frames.length === 0) {
      if (this.root !== undefined) {
        throw new Error("Token stream holds more than one root value");
      }
      this.root = value;
      return;
    }
    const frame = this.frames[this.frames.length - 1];
    if (frame.type === "array") {
      frame.items.push(value);
      return;
    }
    if (frame.key === undefined) {
      throw new Error("Object value without a key");
    }
    frame.members.push(member(frame.key, value));
    frame.key = undefined;
  }

  private open(frame: Frame): void {
    if (this.frames.length >= this.maxDepth) {
      throw new Error(`Nesting exceeds ${this.maxDepth} levels`);
    }
    this.frames.push(frame);
  }

  writeStartObject(): void {
    this.open({ type: "object", members: [], key: undefined });
  }

  writeEndObject(): void {
    const frame = this.frames.pop();
    if (!frame || frame.type !== "object") throw new Error("Unbalanced object");
    this.push(objectValue(frame.members));
  }

  writeStartArray(): void {
    this.open({ type: "array", items: [] });
  }

  writeEndArray(): void {
    const frame = this.frames.pop();
    if (!frame || frame.type !== "array") throw new Error("Unbalanced array");
    this.push(arrayValue(frame.items));
  }

  writeKey(key: string): void {
    const frame = this.frames[this.frames.length - 1];
    if (!frame || frame.type !== "object") throw new Error("Key outside of an object");
    frame.key = key;
  }

  writeString(value: string): void {
    this.push(stringValue(value));
  }

  writeNumber(value: string): void {
    const number = Number(value);
    if (!Number.isFinite(number)) {
      throw new Error(`Number out of range: ${value}`);
    }
    this.push(numberValue(number));
  }

  writeBoolean(value: boolean): void {
    this.push(booleanValue(value));
  }

  writeNull(): void {
    this.push(NULL);
  }
}

/**
 * Builds a tree from a readable through the stream-json tokenizer. Unlike
 * `parse`, this path decodes `\uXXXX` escapes.
 */
export const parseValueStream = async (
  readable: Readable,
  options: ParserOptions = {}
): Promise<Value> => {
  const builder = new TreeBuilder(options.maxDepth);
  await parseJsonStream(readable, builder);
  return builder.getRoot();
};
