import { describe, expect, it } from "vitest";
import { formatGeneral } from "./number.js";

describe("formatGeneral", () => {
  it("prints integers without a fraction", () => {
    expect(formatGeneral(123)).toBe("123");
    expect(formatGeneral(-50)).toBe("-50");
    expect(formatGeneral(100)).toBe("100");
    expect(formatGeneral(123456789012)).toBe("123456789012");
  });

  it("keeps the sign of zero", () => {
    expect(formatGeneral(0)).toBe("0");
    expect(formatGeneral(-0)).toBe("-0");
  });

  it("drops trailing zeros from fractions", () => {
    expect(formatGeneral(3.14159)).toBe("3.14159");
    expect(formatGeneral(0.1)).toBe("0.1");
    expect(formatGeneral(0.0001)).toBe("0.0001");
    expect(formatGeneral(2 / 3)).toBe("0.666666666667");
  });

  it("switches to exponent form outside the fixed range", () => {
    expect(formatGeneral(1e-9)).toBe("1e-09");
    expect(formatGeneral(0.00001)).toBe("1e-05");
    expect(formatGeneral(1e21)).toBe("1e+21");
    expect(formatGeneral(1.5e300)).toBe("1.5e+300");
    expect(formatGeneral(1234567890123)).toBe("1.23456789012e+12");
    expect(formatGeneral(999999999999.5)).toBe("1e+12");
  });

  it("honors a custom precision", () => {
    expect(formatGeneral(3.14159, 3)).toBe("3.14");
    expect(formatGeneral(1234, 3)).toBe("1.23e+03");
  });

  it("refuses non-finite numbers", () => {
    expect(() => formatGeneral(Number.NaN)).toThrow(RangeError);
    expect(() => formatGeneral(Number.NEGATIVE_INFINITY)).toThrow(RangeError);
  });
});
