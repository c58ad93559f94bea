import { Decimal } from "decimal.js";
import type { InvoiceStatus, RoundingPolicy, TaxMode } from "@gst-billing/shared";
import { InvalidInvoiceInputError, InvalidLineItemError, type LineItemField } from "./common/billing-errors";
import { assertMoneyEq } from "./common/money-invariants";
import { add, gt, lt, round2, sum, tryDec, zero, type MoneyValue } from "./common/money";

export type InvoiceLineValues = {
  productId?: string;
  description?: string;
  hsnCode?: string;
  quantity: MoneyValue;
  rate: MoneyValue;
  discountPercent?: MoneyValue;
  taxPercent?: MoneyValue;
};

export type CalculatedInvoiceLine = {
  quantity: Decimal;
  rate: Decimal;
  discountPercent: Decimal;
  taxPercent: Decimal;
  itemSubtotal: Decimal;
  discountAmount: Decimal;
  taxableAmount: Decimal;
  taxAmount: Decimal;
  lineTotal: Decimal;
};

export type InvoiceDiscountValues = {
  value: MoneyValue;
  unit: "PERCENT" | "FLAT";
};

export type InvoiceCalculationInput = {
  items: readonly InvoiceLineValues[];
  taxMode: TaxMode;
  invoiceDiscount?: InvoiceDiscountValues | null;
  otherCharges?: MoneyValue | null;
  roundingPolicy: RoundingPolicy;
};

export type InvoiceTotals = Readonly<{
  subtotal: Decimal;
  itemDiscountTotal: Decimal;
  invoiceDiscountAmount: Decimal;
  totalDiscount: Decimal;
  cgst: Decimal;
  sgst: Decimal;
  igst: Decimal;
  totalTax: Decimal;
  otherCharges: Decimal;
  grandTotalRaw: Decimal;
  roundOffAmount: Decimal;
  grandTotal: Decimal;
  isInterstate: boolean;
  isNonGst: boolean;
  itemCount: number;
  roundingPolicy: RoundingPolicy;
}>;

const HUNDRED = new Decimal(100);

const readLineField = (item: InvoiceLineValues, field: LineItemField, index?: number) => {
  const raw = item[field] ?? 0;
  const value = tryDec(raw);
  if (!value) {
    throw new InvalidLineItemError(field, "NOT_A_NUMBER", index);
  }
  if (value.isNegative()) {
    throw new InvalidLineItemError(field, "NEGATIVE", index);
  }
  if ((field === "discountPercent" || field === "taxPercent") && value.greaterThan(HUNDRED)) {
    throw new InvalidLineItemError(field, "OUT_OF_RANGE", index);
  }
  return value;
};

/** Derives the amounts of one line at full precision. */
export function computeLineItem(item: InvoiceLineValues, index?: number): CalculatedInvoiceLine {
  const quantity = readLineField(item, "quantity", index);
  const rate = readLineField(item, "rate", index);
  const discountPercent = readLineField(item, "discountPercent", index);
  const taxPercent = readLineField(item, "taxPercent", index);

  const itemSubtotal = quantity.mul(rate);
  const discountAmount = itemSubtotal.mul(discountPercent).div(HUNDRED);
  const taxableAmount = itemSubtotal.sub(discountAmount);
  const taxAmount = taxableAmount.mul(taxPercent).div(HUNDRED);

  return {
    quantity,
    rate,
    discountPercent,
    taxPercent,
    itemSubtotal,
    discountAmount,
    taxableAmount,
    taxAmount,
    lineTotal: taxableAmount.add(taxAmount),
  };
}

export type GstSplit = {
  cgst: Decimal;
  sgst: Decimal;
  igst: Decimal;
  /** `round2(rawTax)` minus the three heads; non-zero only for odd intra-state amounts. */
  splitDifference: Decimal;
};

/**
 * Splits an unrounded tax amount by tax mode. Intra-state tax is halved and
 * each half rounded on its own, so CGST and SGST are always equal.
 */
export function splitGst(rawTax: Decimal, taxMode: TaxMode): GstSplit {
  switch (taxMode) {
    case "NON_GST":
      return { cgst: zero(), sgst: zero(), igst: zero(), splitDifference: zero() };
    case "OTHER_STATE":
      return { cgst: zero(), sgst: zero(), igst: round2(rawTax), splitDifference: zero() };
    case "SAME_STATE": {
      const half = round2(rawTax.div(2));
      return { cgst: half, sgst: half, igst: zero(), splitDifference: round2(rawTax).sub(half.mul(2)) };
    }
  }
}

export function applyRoundingPolicy(value: Decimal, policy: RoundingPolicy) {
  switch (policy) {
    case "NONE":
      return round2(value);
    case "ROUND_HALF_UP":
      return value.toDecimalPlaces(0, Decimal.ROUND_HALF_UP);
    case "ROUND_DOWN":
      return value.toDecimalPlaces(0, Decimal.ROUND_DOWN);
    case "ROUND_UP":
      return value.toDecimalPlaces(0, Decimal.ROUND_UP);
  }
}

const computeInvoiceDiscount = (discount: InvoiceDiscountValues | null | undefined, base: Decimal) => {
  if (!discount) {
    return zero();
  }
  const value = tryDec(discount.value);
  if (!value || value.isNegative()) {
    throw new InvalidInvoiceInputError("invoiceDiscount", "Invoice discount must be zero or more", {
      value: String(discount.value),
    });
  }
  if (discount.unit === "PERCENT") {
    if (gt(value, HUNDRED)) {
      throw new InvalidInvoiceInputError("invoiceDiscount", "Invoice discount percent cannot exceed 100", {
        value: value.toString(),
      });
    }
    return round2(base.mul(value).div(HUNDRED));
  }
  const flat = round2(value);
  if (gt(flat, base)) {
    throw new InvalidInvoiceInputError("invoiceDiscount", "Invoice discount cannot exceed the discounted subtotal", {
      value: flat.toFixed(2),
      maximum: base.toFixed(2),
    });
  }
  return flat;
};

const readOtherCharges = (value: MoneyValue | null | undefined) => {
  if (value === null || value === undefined) {
    return zero();
  }
  const parsed = tryDec(value);
  if (!parsed || parsed.isNegative()) {
    throw new InvalidInvoiceInputError("otherCharges", "Other charges must be zero or more", { value: String(value) });
  }
  return round2(parsed);
};

/**
 * Computes every line and the invoice totals. Lines on a non-GST invoice
 * carry no tax regardless of their rate.
 */
export function calculateInvoice(input: InvoiceCalculationInput) {
  const isNonGst = input.taxMode === "NON_GST";
  const lines = input.items.map((item, index) => {
    const line = computeLineItem(item, index);
    return isNonGst ? { ...line, taxAmount: zero(), lineTotal: line.taxableAmount } : line;
  });

  const subtotal = round2(sum(lines.map((line) => line.itemSubtotal)));
  const itemDiscountTotal = round2(sum(lines.map((line) => line.discountAmount)));
  const { cgst, sgst, igst, splitDifference } = splitGst(sum(lines.map((line) => line.taxAmount)), input.taxMode);

  const invoiceDiscountAmount = computeInvoiceDiscount(input.invoiceDiscount, subtotal.sub(itemDiscountTotal));
  const totalDiscount = itemDiscountTotal.add(invoiceDiscountAmount);
  const totalTax = cgst.add(sgst).add(igst);
  const otherCharges = readOtherCharges(input.otherCharges);

  const grandTotalRaw = subtotal.sub(totalDiscount).add(totalTax).add(otherCharges);
  // An odd intra-state paisa is booked through round-off.
  const grandTotal = applyRoundingPolicy(grandTotalRaw.add(splitDifference), input.roundingPolicy);
  const roundOffAmount = grandTotal.sub(grandTotalRaw);

  assertMoneyEq(grandTotal, add(grandTotalRaw, roundOffAmount), "Invoice round-off");

  const totals: InvoiceTotals = Object.freeze({
    subtotal,
    itemDiscountTotal,
    invoiceDiscountAmount,
    totalDiscount,
    cgst,
    sgst,
    igst,
    totalTax,
    otherCharges,
    grandTotalRaw,
    roundOffAmount,
    grandTotal,
    isInterstate: input.taxMode === "OTHER_STATE",
    isNonGst,
    itemCount: lines.length,
    roundingPolicy: input.roundingPolicy,
  });

  return { lines, totals };
}

export function calculateInvoiceTotals(input: InvoiceCalculationInput): InvoiceTotals {
  return calculateInvoice(input).totals;
}

export type SerializedInvoiceTotals = {
  [K in keyof InvoiceTotals]: InvoiceTotals[K] extends Decimal ? string : InvoiceTotals[K];
};

export function serializeInvoiceTotals(totals: InvoiceTotals): SerializedInvoiceTotals {
  return {
    subtotal: totals.subtotal.toFixed(2),
    itemDiscountTotal: totals.itemDiscountTotal.toFixed(2),
    invoiceDiscountAmount: totals.invoiceDiscountAmount.toFixed(2),
    totalDiscount: totals.totalDiscount.toFixed(2),
    cgst: totals.cgst.toFixed(2),
    sgst: totals.sgst.toFixed(2),
    igst: totals.igst.toFixed(2),
    totalTax: totals.totalTax.toFixed(2),
    otherCharges: totals.otherCharges.toFixed(2),
    grandTotalRaw: totals.grandTotalRaw.toFixed(2),
    roundOffAmount: totals.roundOffAmount.toFixed(2),
    grandTotal: totals.grandTotal.toFixed(2),
    isInterstate: totals.isInterstate,
    isNonGst: totals.isNonGst,
    itemCount: totals.itemCount,
    roundingPolicy: totals.roundingPolicy,
  };
}

export type HsnSummaryRow = {
  hsnCode: string;
  taxPercent: string;
  itemCount: number;
  taxableValue: string;
  cgst: string;
  sgst: string;
  igst: string;
  totalTax: string;
};

/** Groups lines by HSN code and tax rate, in order of first appearance. */
export function buildHsnSummary(items: readonly InvoiceLineValues[], taxMode: TaxMode): HsnSummaryRow[] {
  const groups = new Map<string, { hsnCode: string; taxPercent: Decimal; lines: CalculatedInvoiceLine[] }>();

  items.forEach((item, index) => {
    const line = computeLineItem(item, index);
    const hsnCode = item.hsnCode?.trim() || "N/A";
    const key = `${hsnCode}|${line.taxPercent.toString()}`;
    const group = groups.get(key) ?? { hsnCode, taxPercent: line.taxPercent, lines: [] };
    group.lines.push(line);
    groups.set(key, group);
  });

  return Array.from(groups.values()).map((group) => {
    const taxableValue = round2(sum(group.lines.map((line) => line.taxableAmount)));
    const { cgst, sgst, igst } = splitGst(sum(group.lines.map((line) => line.taxAmount)), taxMode);
    return {
      hsnCode: group.hsnCode,
      taxPercent: group.taxPercent.toString(),
      itemCount: group.lines.length,
      taxableValue: taxableValue.toFixed(2),
      cgst: cgst.toFixed(2),
      sgst: sgst.toFixed(2),
      igst: igst.toFixed(2),
      totalTax: cgst.add(sgst).add(igst).toFixed(2),
    };
  });
}

export type InvoiceSummarySource = {
  status: InvoiceStatus;
  grandTotal: MoneyValue;
  paidAmount: MoneyValue;
  balanceDue: MoneyValue;
};

export type InvoiceSummary = {
  totalInvoices: number;
  totalAmount: string;
  paidAmount: string;
  outstandingAmount: string;
  paidCount: number;
  pendingCount: number;
  overdueCount: number;
  draftCount: number;
  cancelledCount: number;
};

const OPEN_STATUSES: readonly InvoiceStatus[] = ["UNPAID", "PARTIAL", "PENDING"];

/** Counts and amounts over invoice snapshots; drafts and cancelled invoices add no money. */
export function summarizeInvoices(invoices: readonly InvoiceSummarySource[]): InvoiceSummary {
  const counted = invoices.filter((invoice) => invoice.status !== "DRAFT" && invoice.status !== "CANCELLED");
  const countOf = (predicate: (status: InvoiceStatus) => boolean) =>
    invoices.filter((invoice) => predicate(invoice.status)).length;

  const outstanding = sum(counted.map((invoice) => invoice.balanceDue));

  return {
    totalInvoices: invoices.length,
    totalAmount: round2(sum(counted.map((invoice) => invoice.grandTotal))).toFixed(2),
    paidAmount: round2(sum(counted.map((invoice) => invoice.paidAmount))).toFixed(2),
    outstandingAmount: round2(lt(outstanding, 0) ? zero() : outstanding).toFixed(2),
    paidCount: countOf((status) => status === "PAID"),
    pendingCount: countOf((status) => OPEN_STATUSES.includes(status)),
    overdueCount: countOf((status) => status === "OVERDUE"),
    draftCount: countOf((status) => status === "DRAFT"),
    cancelledCount: countOf((status) => status === "CANCELLED"),
  };
}
