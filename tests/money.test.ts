import { InvalidAmountError } from "../src/common/errors";
import {
  MAX_CENTS,
  assertPositiveCents,
  calculateInterestCents,
  fromCents,
  toCents
} from "../src/common/money";

describe("toCents", () => {
  test("converts decimal amounts exactly", () => {
    expect(toCents(250.5)).toBe(25050);
    expect(toCents("10.10")).toBe(1010);
    expect(toCents(0.01)).toBe(1);
    expect(toCents(1000)).toBe(100000);
  });

  test("rejects sub-cent precision instead of rounding", () => {
    expect(() => toCents(10.005)).toThrow(
      new InvalidAmountError("Amount must have at most 2 decimal places")
    );
  });

  test("rejects values that are not finite decimals", () => {
    expect(() => toCents("abc")).toThrow("Amount must be a decimal number");
    expect(() => toCents(Infinity)).toThrow("Amount must be a finite number");
    expect(() => toCents(3_000_000_000)).toThrow("Amount exceeds allowed limits");
  });
});

test("fromCents returns the decimal amount", () => {
  expect(fromCents(125050)).toBe(1250.5);
  expect(fromCents(5)).toBe(0.05);
  expect(fromCents(0)).toBe(0);
});

describe("assertPositiveCents", () => {
  test("accepts whole positive cents up to the limit", () => {
    expect(() => assertPositiveCents(1)).not.toThrow();
    expect(() => assertPositiveCents(MAX_CENTS)).not.toThrow();
  });

  test("rejects zero, negatives, fractions and oversize amounts", () => {
    expect(() => assertPositiveCents(0)).toThrow("Amount must be greater than zero");
    expect(() => assertPositiveCents(-10)).toThrow(InvalidAmountError);
    expect(() => assertPositiveCents(NaN)).toThrow(InvalidAmountError);
    expect(() => assertPositiveCents(10.5)).toThrow("Amount must be a whole number of cents");
    expect(() => assertPositiveCents(MAX_CENTS + 1)).toThrow("Amount exceeds allowed limits");
  });
});

describe("calculateInterestCents", () => {
  test("applies the daily rate", () => {
    expect(calculateInterestCents(1000000, "0.0005")).toBe(500);
  });

  test("rounds half up to the cent", () => {
    expect(calculateInterestCents(1000, "0.0005")).toBe(1);
    expect(calculateInterestCents(999, "0.0005")).toBe(0);
    expect(calculateInterestCents(1000500, "0.0005")).toBe(500);
    expect(calculateInterestCents(1003000, "0.0005")).toBe(502);
  });

  test("pays nothing on empty balances", () => {
    expect(calculateInterestCents(0, "0.0005")).toBe(0);
    expect(calculateInterestCents(-100, "0.0005")).toBe(0);
  });
});
