import { ValueType } from "../value/value.js";
import type { Member, Value } from "../value/value.js";
import { formatGeneral } from "./number.js";

export type FormatOptions = {
  /** One nesting level of indentation. */
  indent?: string;
  /** Significant digits for numbers. */
  precision?: number;
};

const DEFAULT_INDENT = "\t";
const DEFAULT_PRECISION = 12;

const SHORT_ESCAPES: ReadonlyMap<string, string> = new Map([
  ['"', '\\"'],
  ["\\", "\\\\"],
  ["\b", "\\b"],
  ["\f", "\\f"],
  ["\n", "\\n"],
  ["\r", "\\r"],
  ["\t", "\\t"],
]);

const NEEDS_ESCAPE = /["\\\u0000-\u001f]/g;

export const quoteString = (value: string): string =>
  `"${value.replace(
    NEEDS_ESCAPE,
    (ch) => SHORT_ESCAPES.get(ch) ?? `\\u${ch.charCodeAt(0).toString(16).padStart(4, "0")}`
  )}"`;

/**
 * Pretty printer. Non-empty containers put each child on its own line, one
 * indent deeper than the container; empty containers print as `[]` / `{}`.
 */
export class Formatter {
  private readonly indentUnit: string;
  private readonly precision: number;
  private parts: string[] = [];

  constructor(options: FormatOptions = {}) {
    this.indentUnit = options.indent ?? DEFAULT_INDENT;
    this.precision = options.precision ?? DEFAULT_PRECISION;
  }

  format(root: Value): string {
    this.parts = [];
    this.writeValue(root, 0);
    const text = this.parts.join("");
    this.parts = [];
    return text;
  }

  private writeIndent(depth: number): void {
    this.parts.push(this.indentUnit.repeat(depth));
  }

  private writeValue(value: Value, depth: number): void {
    switch (value.type) {
      case ValueType.Unknown:
        return;
      case ValueType.Null:
        this.parts.push("null");
        return;
      case ValueType.False:
        this.parts.push("false");
        return;
      case ValueType.True:
        this.parts.push("true");
        return;
      case ValueType.Number:
        this.parts.push(formatGeneral(value.value, this.precision));
        return;
      case ValueType.String:
        this.parts.push(quoteString(value.value));
        return;
      case ValueType.Array:
        this.writeArray(value.items, depth);
        return;
      case ValueType.Object:
        this.writeObject(value.members, depth);
        return;
    }
  }

  private writeArray(items: readonly Value[], depth: number): void {
    this.parts.push("[");
    if (items.length === 0) {
      this.parts.push("]");
      return;
    }
    this.parts.push("\n");
    items.forEach((item, index) => {
      this.writeIndent(depth + 1);
      this.writeValue(item, depth + 1);
      this.parts.push(index === items.length - 1 ? "\n" : ",\n");
    });
    this.writeIndent(depth);
    this.parts.push("]");
  }

  private writeObject(members: readonly Member[], depth: number): void {
    this.parts.push("{");
    if (members.length === 0) {
      this.parts.push("}");
      return;
    }
    this.parts.push("\n");
    members.forEach((entry, index) => {
      this.writeIndent(depth + 1);
      this.parts.push(quoteString(entry.key), ":");
      this.writeValue(entry.value, depth + 1);
      this.parts.push(index === members.length - 1 ? "\n" : ",\n");
    });
    this.writeIndent(depth);
    this.parts.push("}");
  }
}

export const format = (root: Value, options?: FormatOptions): string =>
  new Formatter(options).format(root);
