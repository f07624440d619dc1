import {
  arrayValue,
  FALSE,
  member,
  NULL,
  numberValue,
  objectValue,
  stringValue,
  TRUE,
} from "../value/value.js";
import type { Member, Value } from "../value/value.js";
import { Cursor, END } from "./cursor.js";
import { ParseErrorKind } from "./errors.js";

// JSON
//   element  := ws value ws
//   value    := object | array | string | number | "true" | "false" | "null"
//   array    := '[' ws ']' | '[' elements ']'
//   elements := element (',' element)*
//   object   := '{' ws '}' | '{' members '}'
//   members  := member (',' member)*
//   member   := ws string ws ':' element
//
// Lexing and parsing are fused: each rule reads bytes straight off the cursor.

export type ParserOptions = {
  /** Maximum number of nested arrays/objects. */
  maxDepth?: number;
};

export const DEFAULT_MAX_DEPTH = 512;

const TAB = 0x09;
const LINE_FEED = 0x0a;
const CARRIAGE_RETURN = 0x0d;
const SPACE = 0x20;
const QUOTE = 0x22;
const PLUS = 0x2b;
const COMMA = 0x2c;
const MINUS = 0x2d;
const DOT = 0x2e;
const ZERO = 0x30;
const NINE = 0x39;
const COLON = 0x3a;
const UPPER_E = 0x45;
const OPEN_BRACKET = 0x5b;
const BACKSLASH = 0x5c;
const CLOSE_BRACKET = 0x5d;
const LOWER_E = 0x65;
const LOWER_F = 0x66;
const LOWER_N = 0x6e;
const LOWER_T = 0x74;
const LOWER_U = 0x75;
const OPEN_BRACE = 0x7b;
const CLOSE_BRACE = 0x7d;

const ESCAPES: ReadonlyMap<number, string> = new Map([
  [QUOTE, '"'],
  [BACKSLASH, "\\"],
  [0x2f, "/"],
  [0x62, "\b"],
  [LOWER_F, "\f"],
  [LOWER_N, "\n"],
  [0x72, "\r"],
  [LOWER_T, "\t"],
]);

const ESCAPE_LIST = `one of '"', '\\', '/', 'b', 'f', 'n', 'r', 't'`;

const isDigit = (byte: number): boolean => byte >= ZERO && byte <= NINE;

const isWhitespace = (byte: number): boolean =>
  byte === SPACE || byte === LINE_FEED || byte === CARRIAGE_RETURN || byte === TAB;

const decoder = new TextDecoder("utf-8");

const toBytes = (input: Uint8Array | string): Uint8Array =>
  typeof input === "string" ? Buffer.from(input, "utf8") : input;

export class Parser {
  private readonly input: Uint8Array;
  private readonly maxDepth: number;
  private cursor: Cursor;
  private depth = 0;

  constructor(input: Uint8Array | string, options: ParserOptions = {}) {
    this.input = toBytes(input);
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.cursor = new Cursor(this.input);
  }

  /**
   * Parses the whole input as exactly one JSON value.
   *
   * @throws {JsonParseError} on the first grammar violation.
   */
  parse(): Value {
    this.cursor = new Cursor(this.input);
    this.depth = 0;

    this.skipWhitespace();
    if (this.cursor.atEnd) {
      throw this.cursor.fail(ParseErrorKind.UnexpectedEnd, "a JSON value");
    }
    const root = this.parseElement();
    if (!this.cursor.atEnd) {
      throw this.cursor.fail(ParseErrorKind.TrailingData, "end of input");
    }
    return root;
  }

  private skipWhitespace(): void {
    while (isWhitespace(this.cursor.peek())) {
      this.cursor.advance();
    }
  }

  // ws value ws
  private parseElement(): Value {
    this.skipWhitespace();
    const value = this.parseValue();
    this.skipWhitespace();
    return value;
  }

  private parseValue(): Value {
    const byte = this.cursor.peek();
    switch (byte) {
      case END:
        throw this.cursor.fail(ParseErrorKind.UnexpectedEnd, "a JSON value");
      case LOWER_N:
        return this.parseLiteral("null", NULL);
      case LOWER_T:
        return this.parseLiteral("true", TRUE);
      case LOWER_F:
        return this.parseLiteral("false", FALSE);
      case QUOTE:
        return stringValue(this.parseString());
      case OPEN_BRACKET:
        return this.parseArray();
      case OPEN_BRACE:
        return this.parseObject();
      default:
        if (byte === MINUS || isDigit(byte)) {
          return this.parseNumber();
        }
        throw this.cursor.fail(ParseErrorKind.UnexpectedCharacter, "a JSON value");
    }
  }

  private parseLiteral(literal: string, value: Value): Value {
    for (let i = 0; i < literal.length; i += 1) {
      if (this.cursor.peek() !== literal.charCodeAt(i)) {
        throw this.cursor.fail(ParseErrorKind.LiteralMismatch, `'${literal}'`);
      }
      this.cursor.advance();
    }
    return value;
  }

  private skipDigits(): void {
    while (isDigit(this.cursor.peek())) {
      this.cursor.advance();
    }
  }

  private expectDigits(): void {
    if (!isDigit(this.cursor.peek())) {
      throw this.cursor.fail(ParseErrorKind.InvalidNumber, "a digit");
    }
    this.skipDigits();
  }

  private parseNumber(): Value {
    const start = this.cursor.offset;

    if (this.cursor.peek() === MINUS) {
      this.cursor.advance();
    }

    // integer: 0 | [1-9][0-9]*
    const first = this.cursor.peek();
    if (first === ZERO) {
      this.cursor.advance();
      if (isDigit(this.cursor.peek())) {
        throw this.cursor.fail(ParseErrorKind.InvalidNumber, "no digit after a leading zero");
      }
    } else if (isDigit(first)) {
      this.skipDigits();
    } else {
      throw this.cursor.fail(ParseErrorKind.InvalidNumber, "a digit");
    }

    // fraction
    if (this.cursor.peek() === DOT) {
      this.cursor.advance();
      this.expectDigits();
    }

    // exponent
    const marker = this.cursor.peek();
    if (marker === LOWER_E || marker === UPPER_E) {
      this.cursor.advance();
      const sign = this.cursor.peek();
      if (sign === PLUS || sign === MINUS) {
        this.cursor.advance();
      }
      this.expectDigits();
    }

    const text = decoder.decode(this.cursor.slice(start, this.cursor.offset));
    const value = Number(text);
    if (!Number.isFinite(value)) {
      throw this.cursor.fail(ParseErrorKind.InvalidNumber, "a number within double range", start);
    }
    return numberValue(value);
  }

  private parseString(): string {
    if (this.cursor.peek() !== QUOTE) {
      throw this.cursor.fail(
        this.cursor.atEnd ? ParseErrorKind.UnexpectedEnd : ParseErrorKind.UnexpectedCharacter,
        "'\"'"
      );
    }
    this.cursor.advance();

    const parts: string[] = [];
    let segmentStart = this.cursor.offset;
    for (;;) {
      const byte = this.cursor.peek();
      if (byte === END) {
        throw this.cursor.fail(ParseErrorKind.UnterminatedString, "closing '\"'");
      }
      if (byte === QUOTE) {
        parts.push(decoder.decode(this.cursor.slice(segmentStart, this.cursor.offset)));
        this.cursor.advance();
        return parts.join("");
      }
      if (byte === BACKSLASH) {
        parts.push(decoder.decode(this.cursor.slice(segmentStart, this.cursor.offset)));
        this.cursor.advance();
        parts.push(this.parseEscape());
        segmentStart = this.cursor.offset;
        continue;
      }
      if (byte < SPACE) {
        throw this.cursor.fail(ParseErrorKind.UnexpectedCharacter, "an escaped control character");
      }
      this.cursor.advance();
    }
  }

  private parseEscape(): string {
    const byte = this.cursor.peek();
    if (byte === END) {
      throw this.cursor.fail(ParseErrorKind.UnterminatedString, "an escape character");
    }
    const resolved = ESCAPES.get(byte);
    if (resolved === undefined) {
      // \uXXXX is not decoded.
      const expected = byte === LOWER_U ? `${ESCAPE_LIST} (unicode escapes are unsupported)` : ESCAPE_LIST;
      throw this.cursor.fail(ParseErrorKind.InvalidEscape, expected);
    }
    this.cursor.advance();
    return resolved;
  }

  private enter(): void {
    this.depth += 1;
    if (this.depth > this.maxDepth) {
      throw this.cursor.fail(
        ParseErrorKind.NestingTooDeep,
        `at most ${this.maxDepth} nested arrays or objects`
      );
    }
  }

  // '[' ws ']' | '[' elements ']'
  private parseArray(): Value {
    this.enter();
    this.cursor.advance();

    const items: Value[] = [];
    this.skipWhitespace();
    if (this.cursor.peek() === CLOSE_BRACKET) {
      this.cursor.advance();
      this.depth -= 1;
      return arrayValue(items);
    }
    if (this.cursor.atEnd) {
      throw this.cursor.fail(ParseErrorKind.UnterminatedContainer, "']'");
    }

    for (;;) {
      items.push(this.parseElement());
      const byte = this.cursor.peek();
      if (byte === COMMA) {
        this.cursor.advance();
        continue;
      }
      if (byte === CLOSE_BRACKET) {
        this.cursor.advance();
        break;
      }
      throw this.cursor.fail(
        byte === END ? ParseErrorKind.UnterminatedContainer : ParseErrorKind.UnexpectedCharacter,
        "',' or ']'"
      );
    }

    this.depth -= 1;
    return arrayValue(items);
  }

  // '{' ws '}' | '{' members '}'
  private parseObject(): Value {
    this.enter();
    this.cursor.advance();

    const members: Member[] = [];
    this.skipWhitespace();
    if (this.cursor.peek() === CLOSE_BRACE) {
      this.cursor.advance();
      this.depth -= 1;
      return objectValue(members);
    }
    if (this.cursor.atEnd) {
      throw this.cursor.fail(ParseErrorKind.UnterminatedContainer, "'}'");
    }

    for (;;) {
      members.push(this.parseMember());
      const byte = this.cursor.peek();
      if (byte === COMMA) {
        this.cursor.advance();
        continue;
      }
      if (byte === CLOSE_BRACE) {
        this.cursor.advance();
        break;
      }
      throw this.cursor.fail(
        byte === END ? ParseErrorKind.UnterminatedContainer : ParseErrorKind.UnexpectedCharacter,
        "',' or '}'"
      );
    }

    this.depth -= 1;
    return objectValue(members);
  }

  // ws string ws ':' element
  private parseMember(): Member {
    this.skipWhitespace();
    const key = this.parseString();
    this.skipWhitespace();
    if (this.cursor.peek() !== COLON) {
      throw this.cursor.fail(
        this.cursor.atEnd ? ParseErrorKind.UnexpectedEnd : ParseErrorKind.UnexpectedCharacter,
        "':'"
      );
    }
    this.cursor.advance();
    return member(key, this.parseElement());
  }
}

export const parse = (input: Uint8Array | string, options?: ParserOptions): Value =>
  new Parser(input, options).parse();
