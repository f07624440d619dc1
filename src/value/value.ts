/**
 * In-memory JSON tree.
 *
 * Every node is a `Value`, discriminated on `type`. Arrays and objects keep
 * source order; objects are member lists rather than maps, so duplicate keys
 * survive parsing and formatting.
 *
 * `Unknown` is the "no such value" sentinel returned by lookups. A successful
 * parse never produces it.
 */

export enum ValueType {
  Unknown = 0,
  Null = 1,
  False = 2,
  True = 3,
  Number = 4,
  String = 5,
  Array = 6,
  Object = 7,
}

export type Member = {
  readonly key: string;
  readonly value: Value;
};

export type Value =
  | { readonly type: ValueType.Unknown }
  | { readonly type: ValueType.Null }
  | { readonly type: ValueType.False }
  | { readonly type: ValueType.True }
  | { readonly type: ValueType.Number; readonly value: number }
  | { readonly type: ValueType.String; readonly value: string }
  | { readonly type: ValueType.Array; readonly items: readonly Value[] }
  | { readonly type: ValueType.Object; readonly members: readonly Member[] };

export type NumberValue = Extract<Value, { type: ValueType.Number }>;
export type StringValue = Extract<Value, { type: ValueType.String }>;
export type ArrayValue = Extract<Value, { type: ValueType.Array }>;
export type ObjectValue = Extract<Value, { type: ValueType.Object }>;
export type ContainerValue = ArrayValue | ObjectValue;

const TYPE_NAMES = [
  "unknown",
  "null",
  "false",
  "true",
  "number",
  "string",
  "array",
  "object",
] as const;

export type TypeName = (typeof TYPE_NAMES)[number];

export const typeName = (type: ValueType): TypeName => TYPE_NAMES[type];

/**
 * Thrown when a typed accessor is called on a value of another type.
 * This is a caller bug: check `value.type` before reaching for a payload.
 */
export class ValueTypeError extends Error {
  readonly expected: string;
  readonly actual: TypeName;

  constructor(expected: string, actual: TypeName) {
    super(`Expected ${expected} value, got ${actual}`);
    this.name = "ValueTypeError";
    this.expected = expected;
    this.actual = actual;
  }
}

export const UNKNOWN: Value = Object.freeze<Value>({ type: ValueType.Unknown });
export const NULL: Value = Object.freeze<Value>({ type: ValueType.Null });
export const TRUE: Value = Object.freeze<Value>({ type: ValueType.True });
export const FALSE: Value = Object.freeze<Value>({ type: ValueType.False });

export const numberValue = (value: number): NumberValue => {
  if (!Number.isFinite(value)) {
    throw new RangeError(`JSON numbers must be finite, got ${value}`);
  }
  return { type: ValueType.Number, value };
};

export const stringValue = (value: string): StringValue => ({
  type: ValueType.String,
  value,
});

export const booleanValue = (value: boolean): Value => (value ? TRUE : FALSE);

export const arrayValue = (items: readonly Value[]): ArrayValue => ({
  type: ValueType.Array,
  items,
});

export const member = (key: string, value: Value): Member => ({ key, value });

export const objectValue = (members: readonly Member[]): ObjectValue => ({
  type: ValueType.Object,
  members,
});

export const isUnknown = (value: Value): boolean => value.type === ValueType.Unknown;

export const isContainer = (value: Value): value is ContainerValue =>
  value.type === ValueType.Array || value.type === ValueType.Object;

export const asNumber = (value: Value): number => {
  if (value.type !== ValueType.Number) {
    throw new ValueTypeError("number", typeName(value.type));
  }
  return value.value;
};

export const asString = (value: Value): string => {
  if (value.type !== ValueType.String) {
    throw new ValueTypeError("string", typeName(value.type));
  }
  return value.value;
};

export const asBoolean = (value: Value): boolean => {
  if (value.type === ValueType.True) return true;
  if (value.type === ValueType.False) return false;
  throw new ValueTypeError("boolean", typeName(value.type));
};

export const asArray = (value: Value): readonly Value[] => {
  if (value.type !== ValueType.Array) {
    throw new ValueTypeError("array", typeName(value.type));
  }
  return value.items;
};

export const asObject = (value: Value): readonly Member[] => {
  if (value.type !== ValueType.Object) {
    throw new ValueTypeError("object", typeName(value.type));
  }
  return value.members;
};

export const arraySize = (value: Value): number => asArray(value).length;

export const arrayAt = (value: Value, index: number): Value => {
  const items = asArray(value);
  if (!Number.isInteger(index) || index < 0 || index >= items.length) {
    return UNKNOWN;
  }
  return items[index];
};

/** Single-level key lookup. Linear scan, first match wins. */
export const objectGet = (value: Value, key: string): Value => {
  for (const entry of asObject(value)) {
    if (entry.key === key) {
      return entry.value;
    }
  }
  return UNKNOWN;
};

export const valueEquals = (left: Value, right: Value): boolean => {
  switch (left.type) {
    case ValueType.Number:
      return right.type === ValueType.Number && left.value === right.value;
    case ValueType.String:
      return right.type === ValueType.String && left.value === right.value;
    case ValueType.Array: {
      if (right.type !== ValueType.Array || left.items.length !== right.items.length) {
        return false;
      }
      const others = right.items;
      return left.items.every((item, index) => valueEquals(item, others[index]));
    }
    case ValueType.Object: {
      if (right.type !== ValueType.Object || left.members.length !== right.members.length) {
        return false;
      }
      const others = right.members;
      return left.members.every((entry, index) => {
        const other = others[index];
        return entry.key === other.key && valueEquals(entry.value, other.value);
      });
    }
    default:
      return left.type === right.type;
  }
};
