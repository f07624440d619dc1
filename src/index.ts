export {
  ValueType,
  ValueTypeError,
  UNKNOWN,
  NULL,
  TRUE,
  FALSE,
  numberValue,
  stringValue,
  booleanValue,
  arrayValue,
  objectValue,
  member,
  typeName,
  isUnknown,
  isContainer,
  asNumber,
  asString,
  asBoolean,
  asArray,
  asObject,
  arraySize,
  arrayAt,
  objectGet,
  valueEquals,
} from "./value/value.js";
export type { Value, Member, TypeName, NumberValue, StringValue, ArrayValue, ObjectValue, ContainerValue } from "./value/value.js";
export { collectStats } from "./value/stats.js";
export type { DocumentStats } from "./value/stats.js";
export { Parser, parse, DEFAULT_MAX_DEPTH } from "./parser/parser.js";
export type { ParserOptions } from "./parser/parser.js";
export { JsonParseError, ParseErrorKind } from "./parser/errors.js";
export type { SourcePosition } from "./parser/errors.js";
export { createStreamParser, parseJsonStream, parseValueStream, TreeBuilder } from "./parser/streamParser.js";
export type { TokenSink } from "./parser/streamParser.js";
export { Formatter, format, quoteString } from "./format/formatter.js";
export type { FormatOptions } from "./format/formatter.js";
export { formatGeneral } from "./format/number.js";
export { get, getPath, parsePath } from "./lookup/lookup.js";
export type { PathSegment } from "./lookup/lookup.js";
