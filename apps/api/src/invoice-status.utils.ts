import type { InvoiceStatus, LifecycleState } from "@gst-billing/shared";
import { daysBetweenUtc } from "./common/date-range";
import { gt, max, sub, type MoneyValue } from "./common/money";

export const DEFAULT_OVERDUE_AFTER_DAYS = 30;

export type InvoiceStatusSnapshot = {
  lifecycleState: LifecycleState;
  status?: InvoiceStatus | null;
  cancelled?: boolean;
  invoiceDate: Date;
  grandTotal: MoneyValue;
  balanceDue: MoneyValue;
};

export type InvoiceStatusOptions = {
  overdueAfterDays?: number;
};

export function computeBalanceDue(grandTotal: MoneyValue, paidAmount: MoneyValue) {
  return max(0, sub(grandTotal, paidAmount));
}

/**
 * Status of an invoice as of `today`. Cancellation is sticky; overdue only
 * replaces unpaid and partially paid states once more than `overdueAfterDays`
 * whole days have passed since the invoice date.
 */
export function resolveInvoiceStatus(
  snapshot: InvoiceStatusSnapshot,
  today: Date,
  options: InvoiceStatusOptions = {},
): InvoiceStatus {
  if (snapshot.cancelled || snapshot.status === "CANCELLED") {
    return "CANCELLED";
  }
  if (snapshot.lifecycleState === "DRAFT") {
    return "DRAFT";
  }

  const hasBalance = gt(snapshot.balanceDue, 0);
  let status: InvoiceStatus;
  if (!hasBalance && gt(snapshot.grandTotal, 0)) {
    status = "PAID";
  } else if (hasBalance && gt(snapshot.grandTotal, snapshot.balanceDue)) {
    status = "PARTIAL";
  } else {
    status = "UNPAID";
  }

  const overdueAfterDays = options.overdueAfterDays ?? DEFAULT_OVERDUE_AFTER_DAYS;
  if (hasBalance && daysBetweenUtc(snapshot.invoiceDate, today) > overdueAfterDays) {
    return "OVERDUE";
  }
  return status;
}
