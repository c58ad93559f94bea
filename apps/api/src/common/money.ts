import { Decimal } from "decimal.js";

export type MoneyValue = Decimal.Value;

export const zero = () => new Decimal(0);

export function dec(value: MoneyValue = 0) {
  return value instanceof Decimal ? value : new Decimal(value);
}

export function add(a: MoneyValue, b: MoneyValue) {
  return dec(a).add(dec(b));
}

export function sub(a: MoneyValue, b: MoneyValue) {
  return dec(a).sub(dec(b));
}

export function mul(a: MoneyValue, b: MoneyValue) {
  return dec(a).mul(dec(b));
}

export function div(a: MoneyValue, b: MoneyValue) {
  return dec(a).div(dec(b));
}

export function sum(values: MoneyValue[]) {
  return values.reduce<Decimal>((total, value) => total.add(dec(value)), zero());
}

export function round2(value: MoneyValue) {
  return dec(value).toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}

export function min(a: MoneyValue, b: MoneyValue) {
  return Decimal.min(dec(a), dec(b));
}

export function max(a: MoneyValue, b: MoneyValue) {
  return Decimal.max(dec(a), dec(b));
}

export function eq(a: MoneyValue, b: MoneyValue) {
  return dec(a).equals(dec(b));
}

export function gt(a: MoneyValue, b: MoneyValue) {
  return dec(a).greaterThan(dec(b));
}

export function gte(a: MoneyValue, b: MoneyValue) {
  return dec(a).greaterThanOrEqualTo(dec(b));
}

export function lt(a: MoneyValue, b: MoneyValue) {
  return dec(a).lessThan(dec(b));
}

export function lte(a: MoneyValue, b: MoneyValue) {
  return dec(a).lessThanOrEqualTo(dec(b));
}

export function toString2(value: MoneyValue) {
  return round2(value).toFixed(2);
}

/** Parses user or storage input, returning null for anything that is not a finite decimal. */
export function tryDec(value: unknown) {
  if (value instanceof Decimal) {
    return value.isFinite() ? value : null;
  }
  if (typeof value !== "number" && typeof value !== "string") {
    return null;
  }
  if (typeof value === "string" && value.trim() === "") {
    return null;
  }
  try {
    const parsed = new Decimal(value);
    return parsed.isFinite() ? parsed : null;
  } catch {
    return null;
  }
}

export function hasAtMostTwoDecimals(value: MoneyValue) {
  return dec(value).decimalPlaces() <= 2;
}
