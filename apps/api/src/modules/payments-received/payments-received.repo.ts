import { Injectable } from "@nestjs/common";
import { settlementModeSchema, type SettlementMode } from "@gst-billing/shared";
import { DatabaseService, type DbExecutor } from "../../database/database.service";
import { parseIsoDate, toIsoDate } from "../../common/date-range";

type PaymentRow = {
  id: string;
  payment_no: string;
  party_id: string;
  amount: string;
  payment_date: string;
  mode: string;
  reference: string | null;
  notes: string | null;
  settlement_mode: string;
  target_invoice_id: string | null;
  advance_amount: string;
  created_at: Date;
};

type AllocationRow = {
  payment_id: string;
  invoice_id: string;
  invoice_no: string;
  amount: string;
};

export type PaymentAllocationRecord = {
  invoiceId: string;
  invoiceNo: string;
  amount: string;
};

export type PaymentRecord = {
  id: string;
  paymentNo: string;
  partyId: string;
  amount: string;
  paymentDate: Date;
  mode: string;
  reference: string | null;
  notes: string | null;
  settlementMode: SettlementMode;
  targetInvoiceId: string | null;
  advanceAmount: string;
  createdAt: Date;
  allocations: PaymentAllocationRecord[];
};

export type PaymentWrite = {
  paymentNo: string;
  partyId: string;
  amount: string;
  paymentDate: Date;
  mode: string;
  reference?: string;
  notes?: string;
  settlementMode: SettlementMode;
  targetInvoiceId?: string;
  advanceAmount: string;
  allocations: Array<{ invoiceId: string; amount: string }>;
};

const PAYMENT_COLUMNS = `
  id, payment_no, party_id, amount::text AS amount, payment_date::text AS payment_date, mode, reference, notes,
  settlement_mode, target_invoice_id, advance_amount::text AS advance_amount, created_at
`;

const toPaymentRecord = (row: PaymentRow, allocations: PaymentAllocationRecord[]): PaymentRecord => ({
  id: row.id,
  paymentNo: row.payment_no,
  partyId: row.party_id,
  amount: row.amount,
  paymentDate: parseIsoDate(row.payment_date),
  mode: row.mode,
  reference: row.reference,
  notes: row.notes,
  settlementMode: settlementModeSchema.parse(row.settlement_mode),
  targetInvoiceId: row.target_invoice_id,
  advanceAmount: row.advance_amount,
  createdAt: row.created_at,
  allocations,
});

@Injectable()
export class PaymentsReceivedRepository {
  constructor(private readonly db: DatabaseService) {}

  async list(filter: { partyId?: string }, executor: DbExecutor = this.db): Promise<PaymentRecord[]> {
    const rows = filter.partyId
      ? await executor.query<PaymentRow>(
          `SELECT ${PAYMENT_COLUMNS} FROM payments_received WHERE party_id = $1
           ORDER BY payment_date DESC, payment_no DESC`,
          [filter.partyId],
        )
      : await executor.query<PaymentRow>(
          `SELECT ${PAYMENT_COLUMNS} FROM payments_received ORDER BY payment_date DESC, payment_no DESC`,
        );
    return this.attachAllocations(rows, executor);
  }

  async findById(id: string, executor: DbExecutor = this.db): Promise<PaymentRecord | null> {
    const rows = await executor.query<PaymentRow>(`SELECT ${PAYMENT_COLUMNS} FROM payments_received WHERE id = $1`, [
      id,
    ]);
    const [payment] = await this.attachAllocations(rows, executor);
    return payment ?? null;
  }

  async findByIdForUpdate(id: string, tx: DbExecutor): Promise<PaymentRecord | null> {
    const rows = await tx.query<PaymentRow>(
      `SELECT ${PAYMENT_COLUMNS} FROM payments_received WHERE id = $1 FOR UPDATE`,
      [id],
    );
    const [payment] = await this.attachAllocations(rows, tx);
    return payment ?? null;
  }

  async lockNumberScope(scope: string, tx: DbExecutor) {
    await tx.query("SELECT pg_advisory_xact_lock(hashtext($1))", [scope]);
  }

  async listNumbersInScope(scope: string, executor: DbExecutor = this.db): Promise<string[]> {
    const rows = await executor.query<{ payment_no: string }>(
      "SELECT payment_no FROM payments_received WHERE starts_with(payment_no, $1)",
      [scope],
    );
    return rows.map((row) => row.payment_no);
  }

  async insert(data: PaymentWrite, tx: DbExecutor): Promise<string> {
    const [row] = await tx.query<{ id: string }>(
      `INSERT INTO payments_received (
         payment_no, party_id, amount, payment_date, mode, reference, notes, settlement_mode, target_invoice_id,
         advance_amount
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
       RETURNING id`,
      [
        data.paymentNo,
        data.partyId,
        data.amount,
        toIsoDate(data.paymentDate),
        data.mode,
        data.reference ?? null,
        data.notes ?? null,
        data.settlementMode,
        data.targetInvoiceId ?? null,
        data.advanceAmount,
      ],
    );
    for (const allocation of data.allocations) {
      await tx.query("INSERT INTO payment_allocations (payment_id, invoice_id, amount) VALUES ($1, $2, $3)", [
        row.id,
        allocation.invoiceId,
        allocation.amount,
      ]);
    }
    return row.id;
  }

  async delete(id: string, tx: DbExecutor) {
    await tx.query("DELETE FROM payments_received WHERE id = $1", [id]);
  }

  private async attachAllocations(rows: PaymentRow[], executor: DbExecutor) {
    if (rows.length === 0) {
      return [];
    }
    const allocationRows = await executor.query<AllocationRow>(
      `SELECT a.payment_id, a.invoice_id, i.invoice_no, a.amount::text AS amount
       FROM payment_allocations a
       JOIN invoices i ON i.id = a.invoice_id
       WHERE a.payment_id = ANY($1::uuid[])
       ORDER BY a.payment_id, i.invoice_date, i.invoice_no`,
      [rows.map((row) => row.id)],
    );
    const byPayment = new Map<string, PaymentAllocationRecord[]>();
    for (const allocation of allocationRows) {
      const list = byPayment.get(allocation.payment_id) ?? [];
      list.push({ invoiceId: allocation.invoice_id, invoiceNo: allocation.invoice_no, amount: allocation.amount });
      byPayment.set(allocation.payment_id, list);
    }
    return rows.map((row) => toPaymentRecord(row, byPayment.get(row.id) ?? []));
  }
}
