import { InconsistentTotalsError } from "./billing-errors";
import type { MoneyValue } from "./money";
import { round2, toString2 } from "./money";

export const assertMoneyEq = (expected: MoneyValue, actual: MoneyValue, context = "Totals") => {
  const left = round2(expected);
  const right = round2(actual);
  if (!left.equals(right)) {
    throw new InconsistentTotalsError(context, toString2(left), toString2(right));
  }
};
