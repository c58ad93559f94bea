import { Decimal } from "decimal.js";
import type { InvoiceStatus, LifecycleState, SettlementMode } from "@gst-billing/shared";
import {
  AllocationOverflowError,
  InconsistentTotalsError,
  InvalidPaymentAmountError,
  NoTargetInvoiceSelectedError,
} from "./common/billing-errors";
import { assertMoneyEq } from "./common/money-invariants";
import {
  dec,
  gt,
  hasAtMostTwoDecimals,
  lte,
  min,
  round2,
  sum,
  toString2,
  tryDec,
  zero,
  type MoneyValue,
} from "./common/money";
import { computeBalanceDue, resolveInvoiceStatus, type InvoiceStatusOptions } from "./invoice-status.utils";

export type OutstandingInvoice = {
  id: string;
  invoiceDate: Date;
  grandTotal?: MoneyValue;
  balanceDue: MoneyValue;
};

export type AllocationRequest = {
  amount: MoneyValue;
  outstandingInvoices: readonly OutstandingInvoice[];
  settlementMode: SettlementMode;
  targetInvoiceId?: string | null;
};

export type PlannedAllocation = {
  invoiceId: string;
  amount: Decimal;
  balanceBefore: Decimal;
  balanceAfter: Decimal;
};

export type AllocationResult = Readonly<{
  settlementMode: SettlementMode;
  amount: Decimal;
  allocations: readonly PlannedAllocation[];
  allocatedAmount: Decimal;
  advanceAmount: Decimal;
}>;

const readPaymentAmount = (value: MoneyValue) => {
  const amount = tryDec(value);
  if (!amount || !gt(amount, 0) || !hasAtMostTwoDecimals(amount)) {
    throw new InvalidPaymentAmountError(String(value));
  }
  return amount;
};

const byDateThenId = (a: OutstandingInvoice, b: OutstandingInvoice) => {
  const byDate = a.invoiceDate.getTime() - b.invoiceDate.getTime();
  if (byDate !== 0) {
    return byDate;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
};

/** Largest whole-paisa amount that does not exceed the balance due. */
const allocatableBalance = (invoice: OutstandingInvoice) =>
  dec(invoice.balanceDue).toDecimalPlaces(2, Decimal.ROUND_DOWN);

const allocateTo = (invoice: OutstandingInvoice, remaining: Decimal): PlannedAllocation => {
  const balanceBefore = dec(invoice.balanceDue);
  const amount = min(remaining, allocatableBalance(invoice));
  return { invoiceId: invoice.id, amount, balanceBefore, balanceAfter: balanceBefore.sub(amount) };
};

const planAllocations = (
  amount: Decimal,
  open: OutstandingInvoice[],
  request: AllocationRequest,
): PlannedAllocation[] => {
  switch (request.settlementMode) {
    case "DIRECT":
      return [];
    case "BILL_TO_BILL": {
      if (!request.targetInvoiceId) {
        if (open.length > 0) {
          throw new NoTargetInvoiceSelectedError("MISSING");
        }
        return [];
      }
      const target = open.find((invoice) => invoice.id === request.targetInvoiceId);
      if (!target) {
        throw new NoTargetInvoiceSelectedError("TARGET_NOT_OUTSTANDING", request.targetInvoiceId);
      }
      return [allocateTo(target, amount)];
    }
    case "FIFO": {
      const planned: PlannedAllocation[] = [];
      let remaining = amount;
      for (const invoice of [...open].sort(byDateThenId)) {
        if (lte(remaining, 0)) {
          break;
        }
        const allocation = allocateTo(invoice, remaining);
        planned.push(allocation);
        remaining = remaining.sub(allocation.amount);
      }
      return planned;
    }
  }
};

/**
 * Distributes a payment over a party's outstanding invoices. Whatever is not
 * allocated is kept as an advance; nothing is read from or written to storage.
 */
export function allocatePayment(request: AllocationRequest): AllocationResult {
  const amount = readPaymentAmount(request.amount);
  const open = request.outstandingInvoices.filter((invoice) => gt(allocatableBalance(invoice), 0));

  const allocations = planAllocations(amount, open, request);
  const allocatedAmount = sum(allocations.map((allocation) => allocation.amount));

  const result: AllocationResult = Object.freeze({
    settlementMode: request.settlementMode,
    amount,
    allocations: Object.freeze(allocations),
    allocatedAmount,
    advanceAmount: amount.sub(allocatedAmount),
  });

  assertAllocationResult(result, request.outstandingInvoices);
  return result;
}

/** Checks conservation of the payment and that no invoice receives more than it owes. */
export function assertAllocationResult(result: AllocationResult, outstandingInvoices: readonly OutstandingInvoice[]) {
  const allocated = sum(result.allocations.map((allocation) => allocation.amount));
  assertMoneyEq(result.amount, allocated.add(result.advanceAmount), "Payment allocation");
  if (result.advanceAmount.isNegative()) {
    throw new InconsistentTotalsError("Payment advance", "0.00 or more", toString2(result.advanceAmount));
  }

  const balances = new Map(outstandingInvoices.map((invoice) => [invoice.id, dec(invoice.balanceDue)]));
  for (const allocation of result.allocations) {
    const balanceDue = balances.get(allocation.invoiceId) ?? zero();
    if (!gt(allocation.amount, 0) || gt(allocation.amount, balanceDue)) {
      throw new AllocationOverflowError(allocation.invoiceId, allocation.amount.toString(), balanceDue.toString());
    }
  }
}

export type SerializedAllocationResult = {
  settlementMode: SettlementMode;
  amount: string;
  allocatedAmount: string;
  advanceAmount: string;
  allocations: Array<{ invoiceId: string; amount: string; balanceBefore: string; balanceAfter: string }>;
};

export function serializeAllocationResult(result: AllocationResult): SerializedAllocationResult {
  return {
    settlementMode: result.settlementMode,
    amount: toString2(result.amount),
    allocatedAmount: toString2(result.allocatedAmount),
    advanceAmount: toString2(result.advanceAmount),
    allocations: result.allocations.map((allocation) => ({
      invoiceId: allocation.invoiceId,
      amount: toString2(allocation.amount),
      balanceBefore: toString2(allocation.balanceBefore),
      balanceAfter: toString2(allocation.balanceAfter),
    })),
  };
}

export type InvoiceBalanceSnapshot = {
  id: string;
  lifecycleState: LifecycleState;
  status: InvoiceStatus;
  invoiceDate: Date;
  grandTotal: MoneyValue;
  paidAmount: MoneyValue;
  balanceDue: MoneyValue;
};

export type InvoiceBalanceUpdate = {
  invoiceId: string;
  paidAmount: Decimal;
  balanceDue: Decimal;
  status: InvoiceStatus;
};

export type AllocationAmount = {
  invoiceId: string;
  amount: MoneyValue;
};

const totalsByInvoice = (allocations: readonly AllocationAmount[]) => {
  const totals = new Map<string, Decimal>();
  for (const allocation of allocations) {
    totals.set(allocation.invoiceId, round2(dec(allocation.amount).add(totals.get(allocation.invoiceId) ?? zero())));
  }
  return totals;
};

const snapshotFor = (invoices: readonly InvoiceBalanceSnapshot[], invoiceId: string) => {
  const invoice = invoices.find((candidate) => candidate.id === invoiceId);
  if (!invoice) {
    throw new Error(`Invoice ${invoiceId} is missing from the balance snapshot`);
  }
  return invoice;
};

const withPaidAmount = (
  invoice: InvoiceBalanceSnapshot,
  paidAmount: Decimal,
  today: Date,
  options: InvoiceStatusOptions,
): InvoiceBalanceUpdate => {
  const balanceDue = round2(computeBalanceDue(invoice.grandTotal, paidAmount));
  return {
    invoiceId: invoice.id,
    paidAmount,
    balanceDue,
    status: resolveInvoiceStatus({ ...invoice, balanceDue }, today, options),
  };
};

/** New paid amount, balance and status of every invoice a payment touches. */
export function applyAllocationsToInvoices(
  invoices: readonly InvoiceBalanceSnapshot[],
  allocations: readonly AllocationAmount[],
  today: Date,
  options: InvoiceStatusOptions = {},
): InvoiceBalanceUpdate[] {
  return Array.from(totalsByInvoice(allocations).entries()).map(([invoiceId, amount]) => {
    const invoice = snapshotFor(invoices, invoiceId);
    if (gt(amount, invoice.balanceDue)) {
      throw new AllocationOverflowError(invoiceId, toString2(amount), toString2(invoice.balanceDue));
    }
    return withPaidAmount(invoice, round2(dec(invoice.paidAmount).add(amount)), today, options);
  });
}

/** Inverse of applyAllocationsToInvoices, used when a payment is deleted. */
export function reverseAllocationsFromInvoices(
  invoices: readonly InvoiceBalanceSnapshot[],
  allocations: readonly AllocationAmount[],
  today: Date,
  options: InvoiceStatusOptions = {},
): InvoiceBalanceUpdate[] {
  return Array.from(totalsByInvoice(allocations).entries()).map(([invoiceId, amount]) => {
    const invoice = snapshotFor(invoices, invoiceId);
    const paidAmount = round2(dec(invoice.paidAmount).sub(amount));
    if (paidAmount.isNegative()) {
      throw new InconsistentTotalsError(
        `Reversal on invoice ${invoiceId}`,
        toString2(invoice.paidAmount),
        toString2(amount),
      );
    }
    return withPaidAmount(invoice, paidAmount, today, options);
  });
}

export type PaymentModeSource = {
  mode: string;
  amount: MoneyValue;
  advanceAmount?: MoneyValue;
};

export type PaymentModeSummary = {
  totalCount: number;
  totalAmount: string;
  totalAdvance: string;
  byMode: Record<string, { count: number; amount: string }>;
};

export function summarizePaymentModes(payments: readonly PaymentModeSource[]): PaymentModeSummary {
  const byMode: PaymentModeSummary["byMode"] = {};
  const amounts = new Map<string, Decimal>();

  for (const payment of payments) {
    const mode = payment.mode.trim() || "Other";
    const current = byMode[mode] ?? { count: 0, amount: "0.00" };
    const amount = round2(dec(payment.amount).add(amounts.get(mode) ?? zero()));
    amounts.set(mode, amount);
    byMode[mode] = { count: current.count + 1, amount: amount.toFixed(2) };
  }

  return {
    totalCount: payments.length,
    totalAmount: toString2(sum(payments.map((payment) => payment.amount))),
    totalAdvance: toString2(sum(payments.map((payment) => payment.advanceAmount ?? 0))),
    byMode,
  };
}

export type PartyBalanceSource = {
  outstandingInvoices: readonly Pick<OutstandingInvoice, "balanceDue">[];
  payments: readonly Pick<PaymentModeSource, "advanceAmount">[];
};

export type PartyBalance = {
  outstandingAmount: string;
  outstandingInvoiceCount: number;
  advanceAmount: string;
  netBalance: string;
};

/**
 * What a party still owes on its invoices against the advance credit it holds.
 * A negative net balance means the party is in credit.
 */
export function summarizePartyBalance(source: PartyBalanceSource): PartyBalance {
  const outstanding = round2(sum(source.outstandingInvoices.map((invoice) => invoice.balanceDue)));
  const advance = round2(sum(source.payments.map((payment) => payment.advanceAmount ?? 0)));
  return {
    outstandingAmount: outstanding.toFixed(2),
    outstandingInvoiceCount: source.outstandingInvoices.length,
    advanceAmount: advance.toFixed(2),
    netBalance: outstanding.sub(advance).toFixed(2),
  };
}
