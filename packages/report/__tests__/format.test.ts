import { describe, it, expect } from "vitest";
import { formatFixedHalfEven, formatInteger, formatPercentFraction } from "../src/format.js";

describe("integer details", () => {
  it("truncates toward zero without separators", () => {
    expect(formatInteger(123.9)).toBe("123");
    expect(formatInteger(-7.8)).toBe("-7");
    expect(formatInteger(-0.4)).toBe("0");
    expect(formatInteger(1234567)).toBe("1234567");
    expect(formatInteger(1e21)).toBe("1000000000000000000000");
  });
});

describe("two-decimal details", () => {
  it("rounds exact ties half-to-even", () => {
    expect(formatFixedHalfEven(0.125)).toBe("0.12");
    expect(formatFixedHalfEven(0.375)).toBe("0.38");
    expect(formatFixedHalfEven(-0.125)).toBe("-0.12");
    expect(formatFixedHalfEven(2.5, 0)).toBe("2");
    expect(formatFixedHalfEven(1.5, 0)).toBe("2");
    expect(formatFixedHalfEven(0.5, 0)).toBe("0");
  });

  it("rounds non-ties by the stored binary value", () => {
    // 0.455 is stored slightly above the tie
    expect(formatPercentFraction(0.455)).toBe("0.46");
    expect(formatPercentFraction(0.4549)).toBe("0.45");
  });

  it("pads to two decimals", () => {
    expect(formatPercentFraction(0.1)).toBe("0.10");
    expect(formatPercentFraction(1)).toBe("1.00");
    expect(formatPercentFraction(0)).toBe("0.00");
  });
});
