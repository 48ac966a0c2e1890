import { InvalidAmountError } from "./errors";

export const MAX_CENTS = 2_000_000_000;

export function validateCents(value: number, label: string) {
  if (Number.isFinite(value) && !Number.isInteger(value)) {
    throw new InvalidAmountError(`${label} must be whole cents`);
  }
  if (!Number.isSafeInteger(value) || value > MAX_CENTS) {
    throw new InvalidAmountError(`${label} exceeds allowed limits`);
  }
}

export function validatePositiveCents(value: number, label = "Amount") {
  if (value <= 0) {
    throw new InvalidAmountError(`${label} must be greater than zero`);
  }
  validateCents(value, label);
}

/** Renders cents as a dollar string: 135250 → "$1352.50", -40000 → "-$400.00". */
export function formatCents(cents: number): string {
  const sign = cents < 0 ? "-" : "";
  const abs = Math.abs(cents);
  const dollars = Math.floor(abs / 100);
  const rest = String(abs % 100).padStart(2, "0");
  return `${sign}$${dollars}.${rest}`;
}
