import Decimal from "decimal.js";
import { InvalidAmountError } from "./errors";

export const MAX_CENTS = 2_000_000_000_00;

const CENTS_PER_UNIT = 100;

/**
 * Converts a decimal amount (as received over the wire) to integer cents.
 * Rejects values with more than two decimal places rather than rounding them.
 */
export function toCents(amount: number | string): number {
  let value: Decimal;
  try {
    value = new Decimal(amount);
  } catch {
    throw new InvalidAmountError("Amount must be a decimal number");
  }
  if (!value.isFinite()) {
    throw new InvalidAmountError("Amount must be a finite number");
  }
  if (value.decimalPlaces() > 2) {
    throw new InvalidAmountError("Amount must have at most 2 decimal places");
  }
  const cents = value.mul(CENTS_PER_UNIT).toNumber();
  if (!Number.isSafeInteger(cents) || Math.abs(cents) > MAX_CENTS) {
    throw new InvalidAmountError("Amount exceeds allowed limits");
  }
  return cents;
}

export function fromCents(cents: number): number {
  return new Decimal(cents).div(CENTS_PER_UNIT).toNumber();
}

/** Interest on a balance at the given rate, rounded half-up to the cent. */
export function calculateInterestCents(balanceCents: number, rate: string): number {
  if (balanceCents <= 0) {
    return 0;
  }
  return new Decimal(balanceCents)
    .mul(rate)
    .toDecimalPlaces(0, Decimal.ROUND_HALF_UP)
    .toNumber();
}

/** Guards the service layer, which takes cents from callers other than HTTP. */
export function assertPositiveCents(amountCents: number): void {
  if (!Number.isFinite(amountCents) || amountCents <= 0) {
    throw new InvalidAmountError();
  }
  if (!Number.isSafeInteger(amountCents)) {
    throw new InvalidAmountError("Amount must be a whole number of cents");
  }
  if (amountCents > MAX_CENTS) {
    throw new InvalidAmountError("Amount exceeds allowed limits");
  }
}
