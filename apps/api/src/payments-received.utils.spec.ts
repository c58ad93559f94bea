import {
  AllocationOverflowError,
  InconsistentTotalsError,
  InvalidPaymentAmountError,
  NoTargetInvoiceSelectedError,
} from "./common/billing-errors";
import { dec } from "./common/money";
import {
  allocatePayment,
  applyAllocationsToInvoices,
  assertAllocationResult,
  reverseAllocationsFromInvoices,
  serializeAllocationResult,
  summarizePartyBalance,
  summarizePaymentModes,
  type AllocationResult,
  type InvoiceBalanceSnapshot,
  type OutstandingInvoice,
} from "./payments-received.utils";

const outstanding: OutstandingInvoice[] = [
  { id: "inv-feb", invoiceDate: new Date("2024-02-01T00:00:00.000Z"), balanceDue: "50.00" },
  { id: "inv-jan", invoiceDate: new Date("2024-01-01T00:00:00.000Z"), balanceDue: "100.00" },
];

describe("allocatePayment", () => {
  it("settles the oldest invoices first under FIFO", () => {
    const result = serializeAllocationResult(
      allocatePayment({ amount: 120, outstandingInvoices: outstanding, settlementMode: "FIFO" }),
    );

    expect(result.allocations).toEqual([
      { invoiceId: "inv-jan", amount: "100.00", balanceBefore: "100.00", balanceAfter: "0.00" },
      { invoiceId: "inv-feb", amount: "20.00", balanceBefore: "50.00", balanceAfter: "30.00" },
    ]);
    expect(result.advanceAmount).toBe("0.00");
    expect(result.allocatedAmount).toBe("120.00");
  });

  it("keeps the FIFO remainder as an advance", () => {
    const result = allocatePayment({ amount: "175.50", outstandingInvoices: outstanding, settlementMode: "FIFO" });

    expect(result.allocations.map((allocation) => allocation.amount.toFixed(2))).toEqual(["100.00", "50.00"]);
    expect(result.advanceAmount.toFixed(2)).toBe("25.50");
  });

  it("breaks FIFO date ties by invoice id", () => {
    const sameDay = new Date("2024-03-10T00:00:00.000Z");
    const result = allocatePayment({
      amount: 30,
      outstandingInvoices: [
        { id: "inv-b", invoiceDate: sameDay, balanceDue: 20 },
        { id: "inv-a", invoiceDate: sameDay, balanceDue: 20 },
      ],
      settlementMode: "FIFO",
    });

    expect(result.allocations.map((allocation) => [allocation.invoiceId, allocation.amount.toFixed(2)])).toEqual([
      ["inv-a", "20.00"],
      ["inv-b", "10.00"],
    ]);
  });

  it("ignores invoices with nothing outstanding", () => {
    const result = allocatePayment({
      amount: 10,
      outstandingInvoices: [
        { id: "inv-paid", invoiceDate: new Date("2023-12-01T00:00:00.000Z"), balanceDue: "0.00" },
        ...outstanding,
      ],
      settlementMode: "FIFO",
    });

    expect(result.allocations.map((allocation) => allocation.invoiceId)).toEqual(["inv-jan"]);
  });

  it("never allocates more than a sub-paisa balance due", () => {
    const result = allocatePayment({
      amount: 20,
      outstandingInvoices: [
        { id: "inv-odd", invoiceDate: new Date("2024-01-01T00:00:00.000Z"), balanceDue: "10.005" },
      ],
      settlementMode: "FIFO",
    });

    expect(result.allocations).toHaveLength(1);
    expect(result.allocations[0].amount.toFixed(2)).toBe("10.00");
    expect(result.allocations[0].amount.lte("10.005")).toBe(true);
    expect(result.advanceAmount.toFixed(2)).toBe("10.00");
  });

  it("keeps a bill-to-bill overpayment as an advance", () => {
    const result = allocatePayment({
      amount: 100,
      outstandingInvoices: [{ id: "inv-1", invoiceDate: new Date("2024-01-05T00:00:00.000Z"), balanceDue: 80 }],
      settlementMode: "BILL_TO_BILL",
      targetInvoiceId: "inv-1",
    });

    expect(result.allocations).toHaveLength(1);
    expect(result.allocations[0].amount.toFixed(2)).toBe("80.00");
    expect(result.advanceAmount.toFixed(2)).toBe("20.00");
  });

  it("requires a target invoice for bill-to-bill when invoices are outstanding", () => {
    expect(() =>
      allocatePayment({ amount: 50, outstandingInvoices: outstanding, settlementMode: "BILL_TO_BILL" }),
    ).toThrow(NoTargetInvoiceSelectedError);
  });

  it("rejects a bill-to-bill target that has nothing outstanding", () => {
    expect.assertions(2);
    try {
      allocatePayment({
        amount: 50,
        outstandingInvoices: outstanding,
        settlementMode: "BILL_TO_BILL",
        targetInvoiceId: "inv-unknown",
      });
    } catch (error) {
      expect(error).toBeInstanceOf(NoTargetInvoiceSelectedError);
      if (error instanceof NoTargetInvoiceSelectedError) {
        expect(error.reason).toBe("TARGET_NOT_OUTSTANDING");
      }
    }
  });

  it("records a direct payment entirely as an advance", () => {
    const result = allocatePayment({ amount: "500.00", outstandingInvoices: outstanding, settlementMode: "DIRECT" });

    expect(result.allocations).toEqual([]);
    expect(result.advanceAmount.toFixed(2)).toBe("500.00");
  });

  it.each(["FIFO", "BILL_TO_BILL", "DIRECT"] as const)(
    "conserves the amount under %s with no outstanding invoices",
    (settlementMode) => {
      const result = allocatePayment({ amount: "42.42", outstandingInvoices: [], settlementMode });

      expect(result.allocations).toEqual([]);
      expect(result.advanceAmount.toFixed(2)).toBe("42.42");
    },
  );

  it.each([0, -10, "12.345", "abc"])("rejects a payment amount of %p", (amount) => {
    expect(() => allocatePayment({ amount, outstandingInvoices: outstanding, settlementMode: "FIFO" })).toThrow(
      InvalidPaymentAmountError,
    );
  });

  it("returns a frozen result", () => {
    const result = allocatePayment({ amount: 10, outstandingInvoices: outstanding, settlementMode: "FIFO" });

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.allocations)).toBe(true);
  });
});

describe("assertAllocationResult", () => {
  const base = {
    settlementMode: "FIFO" as const,
    amount: dec(100),
    allocatedAmount: dec(100),
    advanceAmount: dec(0),
  };

  it("rejects results that lose money", () => {
    const result: AllocationResult = {
      ...base,
      advanceAmount: dec(10),
      allocations: [{ invoiceId: "inv-jan", amount: dec(100), balanceBefore: dec(100), balanceAfter: dec(0) }],
    };

    expect(() => assertAllocationResult(result, outstanding)).toThrow(InconsistentTotalsError);
  });

  it("rejects allocations above the invoice balance", () => {
    const result: AllocationResult = {
      ...base,
      allocations: [{ invoiceId: "inv-feb", amount: dec(100), balanceBefore: dec(50), balanceAfter: dec(-50) }],
    };

    expect(() => assertAllocationResult(result, outstanding)).toThrow(AllocationOverflowError);
  });

  it("compares allocations with the unrounded balance", () => {
    const result: AllocationResult = {
      settlementMode: "FIFO",
      amount: dec("10.01"),
      allocatedAmount: dec("10.01"),
      advanceAmount: dec(0),
      allocations: [{ invoiceId: "inv-odd", amount: dec("10.01"), balanceBefore: dec("10.005"), balanceAfter: dec(0) }],
    };
    const invoices = [{ id: "inv-odd", invoiceDate: new Date("2024-01-01T00:00:00.000Z"), balanceDue: "10.005" }];

    expect(() => assertAllocationResult(result, invoices)).toThrow(AllocationOverflowError);
  });
});

describe("invoice balance updates", () => {
  const today = new Date("2024-01-20T00:00:00.000Z");
  const invoices: InvoiceBalanceSnapshot[] = [
    {
      id: "inv-1",
      lifecycleState: "FINAL",
      status: "UNPAID",
      invoiceDate: new Date("2024-01-10T00:00:00.000Z"),
      grandTotal: "1000.00",
      paidAmount: "0.00",
      balanceDue: "1000.00",
    },
    {
      id: "inv-2",
      lifecycleState: "FINAL",
      status: "PARTIAL",
      invoiceDate: new Date("2024-01-12T00:00:00.000Z"),
      grandTotal: "500.00",
      paidAmount: "200.00",
      balanceDue: "300.00",
    },
  ];

  it("applies allocations to paid amount, balance and status", () => {
    const updates = applyAllocationsToInvoices(
      invoices,
      [
        { invoiceId: "inv-1", amount: "400.00" },
        { invoiceId: "inv-2", amount: "300.00" },
      ],
      today,
    );

    expect(
      updates.map((update) => [update.invoiceId, update.paidAmount.toFixed(2), update.balanceDue.toFixed(2), update.status]),
    ).toEqual([
      ["inv-1", "400.00", "600.00", "PARTIAL"],
      ["inv-2", "500.00", "0.00", "PAID"],
    ]);
  });

  it("refuses to allocate beyond the balance due", () => {
    expect(() => applyAllocationsToInvoices(invoices, [{ invoiceId: "inv-2", amount: "300.01" }], today)).toThrow(
      AllocationOverflowError,
    );
  });

  it("restores balances when allocations are reversed", () => {
    const applied = applyAllocationsToInvoices(invoices, [{ invoiceId: "inv-2", amount: "300.00" }], today);
    const afterPayment = invoices.map((invoice) => {
      const update = applied.find((candidate) => candidate.invoiceId === invoice.id);
      return update
        ? { ...invoice, paidAmount: update.paidAmount, balanceDue: update.balanceDue, status: update.status }
        : invoice;
    });

    const [reversed] = reverseAllocationsFromInvoices(afterPayment, [{ invoiceId: "inv-2", amount: "300.00" }], today);

    expect(reversed.paidAmount.toFixed(2)).toBe("200.00");
    expect(reversed.balanceDue.toFixed(2)).toBe("300.00");
    expect(reversed.status).toBe("PARTIAL");
  });

  it("marks a reopened old invoice as overdue", () => {
    const [reversed] = reverseAllocationsFromInvoices(
      [{ ...invoices[0], paidAmount: "1000.00", balanceDue: "0.00", status: "PAID" }],
      [{ invoiceId: "inv-1", amount: "1000.00" }],
      new Date("2024-03-01T00:00:00.000Z"),
    );

    expect(reversed.status).toBe("OVERDUE");
    expect(reversed.balanceDue.toFixed(2)).toBe("1000.00");
  });

  it("refuses to reverse more than was paid", () => {
    expect(() => reverseAllocationsFromInvoices(invoices, [{ invoiceId: "inv-2", amount: "250.00" }], today)).toThrow(
      InconsistentTotalsError,
    );
  });
});

describe("summarizePaymentModes", () => {
  it("groups payments by mode", () => {
    expect(
      summarizePaymentModes([
        { mode: "Cash", amount: "100.00", advanceAmount: "0.00" },
        { mode: "UPI", amount: "250.50", advanceAmount: "50.50" },
        { mode: "Cash", amount: "75.25" },
      ]),
    ).toEqual({
      totalCount: 3,
      totalAmount: "425.75",
      totalAdvance: "50.50",
      byMode: {
        Cash: { count: 2, amount: "175.25" },
        UPI: { count: 1, amount: "250.50" },
      },
    });
  });
});

describe("summarizePartyBalance", () => {
  it("nets outstanding invoices against advances held", () => {
    expect(
      summarizePartyBalance({
        outstandingInvoices: outstanding,
        payments: [{ advanceAmount: "20.50" }, { advanceAmount: "0.00" }, {}],
      }),
    ).toEqual({
      outstandingAmount: "150.00",
      outstandingInvoiceCount: 2,
      advanceAmount: "20.50",
      netBalance: "129.50",
    });
  });

  it("reports a party in credit with a negative net balance", () => {
    expect(summarizePartyBalance({ outstandingInvoices: [], payments: [{ advanceAmount: "750.25" }] })).toEqual({
      outstandingAmount: "0.00",
      outstandingInvoiceCount: 0,
      advanceAmount: "750.25",
      netBalance: "-750.25",
    });
  });
});
