const SEQUENCE_WIDTH = 4;

const pad = (value: number, width: number) => String(value).padStart(width, "0");

/**
 * Indian financial year (April to March) of a date, as a four digit label:
 * 2024-04-01 and 2025-03-31 both give "2425".
 */
export const financialYearLabel = (date: Date) => {
  const year = date.getUTCFullYear();
  const startYear = date.getUTCMonth() >= 3 ? year : year - 1;
  return `${pad(startYear % 100, 2)}${pad((startYear + 1) % 100, 2)}`;
};

export const invoiceNumberScope = (prefix: string, invoiceDate: Date) =>
  `${prefix}-${financialYearLabel(invoiceDate)}-`;

export const receiptNumberScope = (prefix: string, paymentDate: Date) => {
  const stamp = `${paymentDate.getUTCFullYear()}${pad(paymentDate.getUTCMonth() + 1, 2)}${pad(
    paymentDate.getUTCDate(),
    2,
  )}`;
  return `${prefix}-${stamp}-`;
};

const parseSequence = (scope: string, assigned: string) => {
  if (!assigned.startsWith(scope)) {
    return null;
  }
  const tail = assigned.slice(scope.length);
  if (!/^\d+$/.test(tail)) {
    return null;
  }
  return Number(tail);
};

/** Next number in a scope: highest existing sequence + 1, ignoring numbers that do not follow the pattern. */
export const nextNumberInScope = (scope: string, existing: readonly string[]) => {
  const highest = existing.reduce((max, assigned) => {
    const sequence = parseSequence(scope, assigned);
    return sequence !== null && sequence > max ? sequence : max;
  }, 0);
  return `${scope}${pad(highest + 1, SEQUENCE_WIDTH)}`;
};
