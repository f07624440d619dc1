/**
 * Renders a number the way C's `%.<precision>g` does: `precision` significant
 * digits, trailing zeros removed, switching to exponent form when the decimal
 * exponent is below -4 or not below the precision.
 *
 * Values that need more digits than `precision` are rounded, so
 * formatting is not an exact round trip for every double.
 */
export const formatGeneral = (value: number, precision = 12): string => {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Cannot format non-finite number ${value}`);
  }
  const digits = Math.max(1, Math.min(Math.trunc(precision), 17));

  if (value === 0) {
    return Object.is(value, -0) ? "-0" : "0";
  }

  // toExponential rounds to the requested significant digits first, which is
  // what decides between fixed and exponent form.
  const exponential = value.toExponential(digits - 1);
  const markerIndex = exponential.indexOf("e");
  const exponent = Number(exponential.slice(markerIndex + 1));

  if (exponent < -4 || exponent >= digits) {
    const mantissa = stripZeros(exponential.slice(0, markerIndex));
    const sign = exponent < 0 ? "-" : "+";
    const magnitude = String(Math.abs(exponent)).padStart(2, "0");
    return `${mantissa}e${sign}${magnitude}`;
  }

  return stripZeros(value.toFixed(digits - 1 - exponent));
};

const stripZeros = (text: string): string => {
  if (!text.includes(".")) {
    return text;
  }
  return text.replace(/0+$/, "").replace(/\.$/, "");
};
