import { ConflictException, Injectable, Logger, NotFoundException } from "@nestjs/common";
import {
  ErrorCodes,
  type AllocationPreviewInput,
  type PaymentReceivedAllocationInput,
  type PaymentReceivedCreateInput,
} from "@gst-billing/shared";
import { DatabaseService, type DbExecutor } from "../../database/database.service";
import { getApiEnv } from "../../common/env";
import { dec, eq, lt, toString2 } from "../../common/money";
import { receiptNumberScope, nextNumberInScope } from "../../common/numbering";
import { resolveInvoiceStatus } from "../../invoice-status.utils";
import {
  allocatePayment,
  applyAllocationsToInvoices,
  reverseAllocationsFromInvoices,
  serializeAllocationResult,
  summarizePartyBalance,
  summarizePaymentModes,
  type AllocationResult,
  type InvoiceBalanceUpdate,
} from "../../payments-received.utils";
import { InvoicesRepository, type InvoiceRecord } from "../invoices/invoices.repo";
import { PaymentsReceivedRepository } from "./payments-received.repo";

export type PaymentListQuery = {
  partyId?: string;
};

const serializeUpdate = (update: InvoiceBalanceUpdate) => ({
  invoiceId: update.invoiceId,
  paidAmount: toString2(update.paidAmount),
  balanceDue: toString2(update.balanceDue),
  status: update.status,
});

@Injectable()
export class PaymentsReceivedService {
  private readonly logger = new Logger(PaymentsReceivedService.name);

  constructor(
    private readonly db: DatabaseService,
    private readonly invoicesRepo: InvoicesRepository,
    private readonly paymentsRepo: PaymentsReceivedRepository,
  ) {}

  async listOutstanding(partyId: string) {
    const invoices = await this.invoicesRepo.listOutstandingForParty(partyId);
    const today = new Date();
    return invoices.map((invoice) => ({
      id: invoice.id,
      invoiceNo: invoice.invoiceNo,
      invoiceDate: invoice.invoiceDate,
      grandTotal: invoice.grandTotal,
      paidAmount: invoice.paidAmount,
      balanceDue: invoice.balanceDue,
      status: resolveInvoiceStatus(invoice, today, this.statusOptions()),
    }));
  }

  async previewAllocation(input: AllocationPreviewInput) {
    const outstanding = await this.invoicesRepo.listOutstandingForParty(input.partyId);
    const result = allocatePayment({
      amount: input.amount,
      outstandingInvoices: outstanding,
      settlementMode: input.settlementMode,
      targetInvoiceId: input.targetInvoiceId,
    });
    return this.describePlan(result, outstanding);
  }

  async createPayment(input: PaymentReceivedCreateInput) {
    const today = new Date();
    const { id, paymentNo, updates } = await this.db.transaction(async (tx) => {
      const outstanding = await this.invoicesRepo.lockOutstandingForParty(input.partyId, tx);
      const result = allocatePayment({
        amount: input.amount,
        outstandingInvoices: outstanding,
        settlementMode: input.settlementMode,
        targetInvoiceId: input.targetInvoiceId,
      });
      if (input.expectedAllocations) {
        this.assertPreviewStillValid(input.expectedAllocations, outstanding, result);
      }

      const assignedNo = await this.assignNumber(input.paymentDate, tx);
      const paymentId = await this.paymentsRepo.insert(
        {
          paymentNo: assignedNo,
          partyId: input.partyId,
          amount: toString2(result.amount),
          paymentDate: input.paymentDate,
          mode: input.mode,
          reference: input.reference,
          notes: input.notes,
          settlementMode: input.settlementMode,
          targetInvoiceId: input.targetInvoiceId,
          advanceAmount: toString2(result.advanceAmount),
          allocations: result.allocations.map((allocation) => ({
            invoiceId: allocation.invoiceId,
            amount: toString2(allocation.amount),
          })),
        },
        tx,
      );

      const invoiceUpdates = applyAllocationsToInvoices(outstanding, result.allocations, today, this.statusOptions());
      await this.invoicesRepo.updateBalances(invoiceUpdates, tx);
      return { id: paymentId, paymentNo: assignedNo, updates: invoiceUpdates };
    });

    this.logger.log(`payment recorded: ${paymentNo}, ${updates.length} invoice(s) updated`);
    return { ...(await this.getPayment(id)), invoiceUpdates: updates.map(serializeUpdate) };
  }

  async listPayments(query: PaymentListQuery = {}) {
    return this.paymentsRepo.list(query);
  }

  async getSummary(query: PaymentListQuery = {}) {
    return summarizePaymentModes(await this.paymentsRepo.list(query));
  }

  async getPartyBalance(partyId: string) {
    const [outstandingInvoices, payments] = await Promise.all([
      this.invoicesRepo.listOutstandingForParty(partyId),
      this.paymentsRepo.list({ partyId }),
    ]);
    return { partyId, ...summarizePartyBalance({ outstandingInvoices, payments }) };
  }

  async getPayment(id: string) {
    const payment = await this.paymentsRepo.findById(id);
    if (!payment) {
      throw new NotFoundException("Payment not found");
    }
    return payment;
  }

  /** Removes a payment and gives each invoice it settled its balance back. */
  async deletePayment(id: string) {
    const today = new Date();
    const { paymentNo, updates } = await this.db.transaction(async (tx) => {
      const payment = await this.paymentsRepo.findByIdForUpdate(id, tx);
      if (!payment) {
        throw new NotFoundException("Payment not found");
      }
      const invoices = await this.invoicesRepo.lockByIds(
        payment.allocations.map((allocation) => allocation.invoiceId),
        tx,
      );
      const invoiceUpdates = reverseAllocationsFromInvoices(
        invoices,
        payment.allocations,
        today,
        this.statusOptions(),
      );
      await this.paymentsRepo.delete(id, tx);
      await this.invoicesRepo.updateBalances(invoiceUpdates, tx);
      return { paymentNo: payment.paymentNo, updates: invoiceUpdates };
    });

    this.logger.log(`payment deleted: ${paymentNo}, ${updates.length} invoice(s) restored`);
    return { id, deleted: true, invoiceUpdates: updates.map(serializeUpdate) };
  }

  private describePlan(result: AllocationResult, invoices: readonly InvoiceRecord[]) {
    const serialized = serializeAllocationResult(result);
    const numbers = new Map(invoices.map((invoice) => [invoice.id, invoice.invoiceNo]));
    return {
      ...serialized,
      allocations: serialized.allocations.map((allocation) => ({
        ...allocation,
        invoiceNo: numbers.get(allocation.invoiceId) ?? null,
      })),
    };
  }

  /**
   * A previewed plan may only be recorded if the invoices still owe at least
   * what the preview assumed and the engine arrives at the same plan.
   */
  private assertPreviewStillValid(
    expected: readonly PaymentReceivedAllocationInput[],
    outstanding: readonly InvoiceRecord[],
    result: AllocationResult,
  ) {
    const balances = new Map(outstanding.map((invoice) => [invoice.id, invoice.balanceDue]));
    const stale = expected.filter((allocation) => lt(balances.get(allocation.invoiceId) ?? 0, allocation.amount));
    const planned = new Map(result.allocations.map((allocation) => [allocation.invoiceId, allocation.amount]));
    const planChanged =
      planned.size !== expected.length ||
      expected.some((allocation) => {
        const amount = planned.get(allocation.invoiceId);
        return !amount || !eq(amount, dec(allocation.amount));
      });

    if (stale.length > 0 || planChanged) {
      throw new ConflictException({
        code: ErrorCodes.STALE_BALANCE,
        message: "Outstanding balances changed since the allocation was previewed",
        hint: "Preview the allocation again and confirm the new plan.",
        details: {
          staleInvoiceIds: stale.map((allocation) => allocation.invoiceId),
          currentPlan: serializeAllocationResult(result).allocations,
        },
      });
    }
  }

  private async assignNumber(paymentDate: Date, tx: DbExecutor) {
    const scope = receiptNumberScope(getApiEnv().RECEIPT_NUMBER_PREFIX, paymentDate);
    await this.paymentsRepo.lockNumberScope(scope, tx);
    return nextNumberInScope(scope, await this.paymentsRepo.listNumbersInScope(scope, tx));
  }

  private statusOptions() {
    return { overdueAfterDays: getApiEnv().INVOICE_OVERDUE_AFTER_DAYS };
  }
}
