import { randomUUID } from "node:crypto";
import type { DatabaseService, DbExecutor } from "../../src/database/database.service";
import type {
  InvoiceListFilter,
  InvoiceRecord,
  InvoiceWrite,
  InvoicesRepository,
} from "../../src/modules/invoices/invoices.repo";
import type {
  PaymentRecord,
  PaymentWrite,
  PaymentsReceivedRepository,
} from "../../src/modules/payments-received/payments-received.repo";
import type { InvoiceBalanceUpdate } from "../../src/payments-received.utils";

type PublicShape<T> = Pick<T, keyof T>;

/** Rows shared by the fake repositories, standing in for the Postgres tables. */
export class InMemoryBillingStore {
  readonly invoices = new Map<string, InvoiceRecord>();
  readonly payments = new Map<string, PaymentRecord>();
}

const uniqueViolation = (constraint: string) =>
  Object.assign(new Error(`duplicate key value violates unique constraint "${constraint}"`), { code: "23505" });

const noopExecutor: DbExecutor = {
  query: async () => [],
};

export const createFakeDatabase = (): PublicShape<DatabaseService> => ({
  query: async () => [],
  transaction: async <T>(work: (tx: DbExecutor) => Promise<T>) => work(noopExecutor),
  ping: async () => undefined,
  onModuleDestroy: async () => undefined,
});

const isOutstanding = (invoice: InvoiceRecord) =>
  invoice.lifecycleState === "FINAL" && invoice.status !== "CANCELLED" && Number(invoice.balanceDue) > 0;

const byDateThenId = (a: InvoiceRecord, b: InvoiceRecord) =>
  a.invoiceDate.getTime() - b.invoiceDate.getTime() || a.id.localeCompare(b.id);

export class FakeInvoicesRepository implements PublicShape<InvoicesRepository> {
  constructor(private readonly store: InMemoryBillingStore) {}

  async list(filter: InvoiceListFilter) {
    return Array.from(this.store.invoices.values())
      .filter((invoice) => !filter.partyId || invoice.partyId === filter.partyId)
      .filter((invoice) => !filter.lifecycleState || invoice.lifecycleState === filter.lifecycleState)
      .sort((a, b) => byDateThenId(b, a));
  }

  async findById(id: string) {
    return this.store.invoices.get(id) ?? null;
  }

  async findByIdForUpdate(id: string) {
    return this.findById(id);
  }

  async lockOutstandingForParty(partyId: string) {
    return this.listOutstandingForParty(partyId);
  }

  async lockByIds(ids: readonly string[]) {
    return Array.from(this.store.invoices.values()).filter((invoice) => ids.includes(invoice.id));
  }

  async listOutstandingForParty(partyId: string) {
    return Array.from(this.store.invoices.values())
      .filter((invoice) => invoice.partyId === partyId && isOutstanding(invoice))
      .sort(byDateThenId);
  }

  async lockNumberScope() {}

  async listNumbersInScope(scope: string) {
    return Array.from(this.store.invoices.values())
      .map((invoice) => invoice.invoiceNo)
      .filter((invoiceNo) => invoiceNo.startsWith(scope));
  }

  async numberExists(invoiceNo: string, _executor?: DbExecutor, excludeId?: string) {
    return Array.from(this.store.invoices.values()).some(
      (invoice) => invoice.invoiceNo === invoiceNo && invoice.id !== excludeId,
    );
  }

  async hasAllocations(invoiceId: string) {
    return Array.from(this.store.payments.values()).some((payment) =>
      payment.allocations.some((allocation) => allocation.invoiceId === invoiceId),
    );
  }

  async insert(data: InvoiceWrite) {
    if (await this.numberExists(data.invoiceNo)) {
      throw uniqueViolation("invoices_invoice_no_key");
    }
    const id = randomUUID();
    const now = new Date();
    this.store.invoices.set(id, this.toRecord(id, data, now, null));
    return id;
  }

  async replace(id: string, data: InvoiceWrite) {
    const existing = this.store.invoices.get(id);
    if (!existing) {
      return;
    }
    this.store.invoices.set(id, this.toRecord(id, data, existing.createdAt, existing.finalizedAt));
  }

  async updateBalances(updates: readonly InvoiceBalanceUpdate[]) {
    for (const update of updates) {
      const existing = this.store.invoices.get(update.invoiceId);
      if (existing) {
        this.store.invoices.set(update.invoiceId, {
          ...existing,
          paidAmount: update.paidAmount.toFixed(2),
          balanceDue: update.balanceDue.toFixed(2),
          status: update.status,
          updatedAt: new Date(),
        });
      }
    }
  }

  async markCancelled(id: string) {
    const existing = this.store.invoices.get(id);
    if (existing) {
      const now = new Date();
      this.store.invoices.set(id, { ...existing, status: "CANCELLED", cancelledAt: now, updatedAt: now });
    }
  }

  private toRecord(id: string, data: InvoiceWrite, createdAt: Date, finalizedAt: Date | null): InvoiceRecord {
    const { items, invoiceDiscount, companyGstin, partyGstin, notes, ...columns } = data;
    return {
      ...columns,
      id,
      companyGstin: companyGstin ?? null,
      partyGstin: partyGstin ?? null,
      invoiceDiscount: invoiceDiscount ?? null,
      notes: notes ?? null,
      createdAt,
      updatedAt: new Date(),
      finalizedAt: data.lifecycleState === "FINAL" ? (finalizedAt ?? new Date()) : null,
      cancelledAt: null,
      items: items.map((item, index) => ({
        lineNo: index + 1,
        productId: item.productId ?? null,
        description: item.description ?? null,
        hsnCode: item.hsnCode ?? null,
        quantity: item.quantity,
        rate: item.rate,
        discountPercent: item.discountPercent,
        taxPercent: item.taxPercent,
      })),
    };
  }
}

export class FakePaymentsReceivedRepository implements PublicShape<PaymentsReceivedRepository> {
  constructor(private readonly store: InMemoryBillingStore) {}

  async list(filter: { partyId?: string }) {
    return Array.from(this.store.payments.values()).filter(
      (payment) => !filter.partyId || payment.partyId === filter.partyId,
    );
  }

  async findById(id: string) {
    return this.store.payments.get(id) ?? null;
  }

  async findByIdForUpdate(id: string) {
    return this.findById(id);
  }

  async lockNumberScope() {}

  async listNumbersInScope(scope: string) {
    return Array.from(this.store.payments.values())
      .map((payment) => payment.paymentNo)
      .filter((paymentNo) => paymentNo.startsWith(scope));
  }

  async insert(data: PaymentWrite) {
    const id = randomUUID();
    const { allocations, reference, notes, targetInvoiceId, ...columns } = data;
    this.store.payments.set(id, {
      ...columns,
      id,
      reference: reference ?? null,
      notes: notes ?? null,
      targetInvoiceId: targetInvoiceId ?? null,
      createdAt: new Date(),
      allocations: allocations.map((allocation) => ({
        ...allocation,
        invoiceNo: this.store.invoices.get(allocation.invoiceId)?.invoiceNo ?? "",
      })),
    });
    return id;
  }

  async delete(id: string) {
    this.store.payments.delete(id);
  }
}
