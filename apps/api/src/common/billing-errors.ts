import { ErrorCodes, type ErrorCode } from "@gst-billing/shared";

export type LineItemField = "quantity" | "rate" | "discountPercent" | "taxPercent";
export type InputRejection = "NOT_A_NUMBER" | "NEGATIVE" | "OUT_OF_RANGE";

const rejectionText: Record<InputRejection, string> = {
  NOT_A_NUMBER: "must be a number",
  NEGATIVE: "cannot be negative",
  OUT_OF_RANGE: "must be between 0 and 100",
};

/**
 * Base for every error raised by the calculation, status and allocation code.
 * These carry a stable code and structured details; turning them into
 * user-facing text happens in billing-error-messages.
 */
export abstract class BillingError extends Error {
  abstract readonly code: ErrorCode;

  protected constructor(
    message: string,
    readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidLineItemError extends BillingError {
  readonly code = ErrorCodes.INVALID_LINE_ITEM;

  constructor(
    readonly field: LineItemField,
    readonly reason: InputRejection,
    readonly itemIndex?: number,
  ) {
    const prefix = itemIndex === undefined ? "Line item" : `Item ${itemIndex + 1}`;
    super(`${prefix}: ${field} ${rejectionText[reason]}`, { field, reason, itemIndex });
  }
}

export class InvalidInvoiceInputError extends BillingError {
  readonly code = ErrorCodes.INVALID_INVOICE_INPUT;

  constructor(
    readonly field: "invoiceDiscount" | "otherCharges",
    message: string,
    details: Record<string, unknown> = {},
  ) {
    super(message, { field, ...details });
  }
}

export class InvalidPaymentAmountError extends BillingError {
  readonly code = ErrorCodes.INVALID_PAYMENT_AMOUNT;

  constructor(amount: string) {
    super(`Payment amount ${amount} is invalid`, { amount });
  }
}

export class NoTargetInvoiceSelectedError extends BillingError {
  readonly code = ErrorCodes.NO_TARGET_INVOICE_SELECTED;

  constructor(
    readonly reason: "MISSING" | "TARGET_NOT_OUTSTANDING",
    targetInvoiceId?: string,
  ) {
    super(
      reason === "MISSING"
        ? "Bill-to-bill settlement needs a target invoice"
        : `Invoice ${targetInvoiceId ?? "(unknown)"} has no outstanding balance for this party`,
      { reason, targetInvoiceId },
    );
  }
}

export class AllocationOverflowError extends BillingError {
  readonly code = ErrorCodes.ALLOCATION_OVERFLOW;

  constructor(invoiceId: string, allocated: string, balanceDue: string) {
    super(`Allocation of ${allocated} exceeds balance due ${balanceDue} on invoice ${invoiceId}`, {
      invoiceId,
      allocated,
      balanceDue,
    });
  }
}

export class InconsistentTotalsError extends BillingError {
  readonly code = ErrorCodes.INCONSISTENT_TOTALS;

  constructor(context: string, expected: string, actual: string) {
    super(`${context} does not balance: expected ${expected}, got ${actual}`, { context, expected, actual });
  }
}

export type KnownBillingError =
  | InvalidLineItemError
  | InvalidInvoiceInputError
  | InvalidPaymentAmountError
  | NoTargetInvoiceSelectedError
  | AllocationOverflowError
  | InconsistentTotalsError;
