export const ErrorCodes = {
  VALIDATION_ERROR: "VALIDATION_ERROR",
  NOT_FOUND: "NOT_FOUND",
  CONFLICT: "CONFLICT",
  INTERNAL_SERVER_ERROR: "INTERNAL_SERVER_ERROR",
  INVALID_LINE_ITEM: "INVALID_LINE_ITEM",
  INVALID_INVOICE_INPUT: "INVALID_INVOICE_INPUT",
  INVALID_PAYMENT_AMOUNT: "INVALID_PAYMENT_AMOUNT",
  NO_TARGET_INVOICE_SELECTED: "NO_TARGET_INVOICE_SELECTED",
  ALLOCATION_OVERFLOW: "ALLOCATION_OVERFLOW",
  INCONSISTENT_TOTALS: "INCONSISTENT_TOTALS",
  INVOICE_FINALIZED: "INVOICE_FINALIZED",
  STALE_BALANCE: "STALE_BALANCE",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
