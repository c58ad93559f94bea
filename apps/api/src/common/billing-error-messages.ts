import { HttpStatus } from "@nestjs/common";
import type { BillingError, KnownBillingError } from "./billing-errors";

export type BillingErrorPresentation = {
  status: HttpStatus;
  message: string;
  hint: string;
};

const SUPPORT_HINT = "Please try again. If this keeps happening, contact support.";

const isKnown = (error: BillingError): error is KnownBillingError =>
  [
    "INVALID_LINE_ITEM",
    "INVALID_INVOICE_INPUT",
    "INVALID_PAYMENT_AMOUNT",
    "NO_TARGET_INVOICE_SELECTED",
    "ALLOCATION_OVERFLOW",
    "INCONSISTENT_TOTALS",
  ].includes(error.code);

/** Turns an engine error into the status, message and hint shown to the user. */
export function describeBillingError(error: BillingError): BillingErrorPresentation {
  if (!isKnown(error)) {
    return { status: HttpStatus.INTERNAL_SERVER_ERROR, message: "Billing calculation failed", hint: SUPPORT_HINT };
  }

  switch (error.code) {
    case "INVALID_LINE_ITEM":
      return {
        status: HttpStatus.BAD_REQUEST,
        message: error.message,
        hint: "Quantity and rate cannot be negative, and percentages must be between 0 and 100.",
      };
    case "INVALID_INVOICE_INPUT":
      return {
        status: HttpStatus.BAD_REQUEST,
        message: error.message,
        hint: "Check the invoice discount and other charges.",
      };
    case "INVALID_PAYMENT_AMOUNT":
      return {
        status: HttpStatus.BAD_REQUEST,
        message: "Payment amount must be greater than zero",
        hint: "Enter an amount above zero with at most two decimal places.",
      };
    case "NO_TARGET_INVOICE_SELECTED":
      return {
        status: HttpStatus.BAD_REQUEST,
        message:
          error.reason === "MISSING"
            ? "Select the invoice this payment settles"
            : "The selected invoice has nothing outstanding for this party",
        hint: "Pick an outstanding invoice, or record the payment as FIFO or advance.",
      };
    case "ALLOCATION_OVERFLOW":
      return { status: HttpStatus.INTERNAL_SERVER_ERROR, message: "Payment allocation failed", hint: SUPPORT_HINT };
    case "INCONSISTENT_TOTALS":
      return { status: HttpStatus.INTERNAL_SERVER_ERROR, message: "Totals did not balance", hint: SUPPORT_HINT };
  }
}
