import type { InvoiceRecord } from "../../src/modules/invoices/invoices.repo";

export const PARTY_ID = "party-acme";

/** A final credit invoice of 1180.00 (1000 + 18% CGST/SGST), nothing paid. */
export const buildInvoiceRecord = (overrides: Partial<InvoiceRecord> = {}): InvoiceRecord => ({
  id: "00000000-0000-4000-8000-000000000001",
  invoiceNo: "INV-2425-0001",
  invoiceDate: new Date("2024-06-01T00:00:00.000Z"),
  partyId: PARTY_ID,
  taxMode: "SAME_STATE",
  billType: "CREDIT",
  lifecycleState: "FINAL",
  status: "UNPAID",
  companyGstin: null,
  partyGstin: null,
  invoiceDiscount: null,
  otherCharges: "0.00",
  roundingPolicy: "NONE",
  subtotal: "1000.00",
  itemDiscountTotal: "0.00",
  invoiceDiscountAmount: "0.00",
  totalDiscount: "0.00",
  cgst: "90.00",
  sgst: "90.00",
  igst: "0.00",
  totalTax: "180.00",
  grandTotalRaw: "1180.00",
  roundOffAmount: "0.00",
  grandTotal: "1180.00",
  paidAmount: "0.00",
  balanceDue: "1180.00",
  notes: null,
  createdAt: new Date("2024-06-01T09:00:00.000Z"),
  updatedAt: new Date("2024-06-01T09:00:00.000Z"),
  finalizedAt: new Date("2024-06-01T09:00:00.000Z"),
  cancelledAt: null,
  items: [
    {
      lineNo: 1,
      productId: null,
      description: "Consulting",
      hsnCode: "998311",
      quantity: "1",
      rate: "1000",
      discountPercent: "0",
      taxPercent: "18",
    },
  ],
  ...overrides,
});
