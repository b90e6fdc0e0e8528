/**
 * @file Specs: value rendering
 */
import { formatValue } from "./format";

describe("output/format", () => {
  it("uses one decimal for integral values", () => {
    expect(formatValue(3)).toBe("3.0");
    expect(formatValue(-2)).toBe("-2.0");
    expect(formatValue(0)).toBe("0.0");
    expect(formatValue(-0)).toBe("-0.0");
    expect(formatValue(999999999)).toBe("999999999.0");
  });

  it("uses two decimals otherwise", () => {
    expect(formatValue(3.14159)).toBe("3.14");
    expect(formatValue(Math.fround(0.1))).toBe("0.10");
    expect(formatValue(-0.5)).toBe("-0.50");
  });

  it("rounds exact ties to the even neighbour", () => {
    expect([1.125, 0.375, 2.625, -0.125, 0.625, 1234.875].map(formatValue)).toEqual([
      "1.12",
      "0.38",
      "2.62",
      "-0.12",
      "0.62",
      "1234.88",
    ]);
  });

  it("keeps ordinary rounding away from ties", () => {
    expect([0.126, 2.25, -1.005, -0.001].map(formatValue)).toEqual(["0.13", "2.25", "-1.00", "-0.00"]);
  });

  it("switches to scientific notation from 1e9", () => {
    expect(formatValue(1.5e9)).toBe("1.5e+09");
    expect(formatValue(1e9)).toBe("1e+09");
    expect(formatValue(-2.5e10)).toBe("-2.5e+10");
    expect(formatValue(123456789012)).toBe("1.23457e+11");
    expect(formatValue(1e100)).toBe("1e+100");
  });

  it("names non-finite values", () => {
    expect([Number.NaN, Number.POSITIVE_INFINITY, Number.NEGATIVE_INFINITY].map(formatValue)).toEqual([
      "nan",
      "inf",
      "-inf",
    ]);
  });
});
