import { Injectable } from "@nestjs/common";
import {
  billTypeSchema,
  discountUnitSchema,
  invoiceStatusSchema,
  lifecycleStateSchema,
  roundingPolicySchema,
  taxModeSchema,
  type BillType,
  type DiscountUnit,
  type InvoiceStatus,
  type LifecycleState,
  type RoundingPolicy,
  type TaxMode,
} from "@gst-billing/shared";
import { DatabaseService, type DbExecutor } from "../../database/database.service";
import { parseIsoDate, toIsoDate } from "../../common/date-range";
import type { SerializedInvoiceTotals } from "../../invoices.utils";
import type { InvoiceBalanceUpdate } from "../../payments-received.utils";

type InvoiceRow = {
  id: string;
  invoice_no: string;
  invoice_date: string;
  party_id: string;
  tax_mode: string;
  bill_type: string;
  lifecycle_state: string;
  status: string;
  company_gstin: string | null;
  party_gstin: string | null;
  discount_value: string | null;
  discount_unit: string | null;
  other_charges: string;
  rounding_policy: string;
  subtotal: string;
  item_discount_total: string;
  invoice_discount_amount: string;
  total_discount: string;
  cgst: string;
  sgst: string;
  igst: string;
  total_tax: string;
  grand_total_raw: string;
  round_off_amount: string;
  grand_total: string;
  paid_amount: string;
  balance_due: string;
  notes: string | null;
  created_at: Date;
  updated_at: Date;
  finalized_at: Date | null;
  cancelled_at: Date | null;
};

type InvoiceItemRow = {
  invoice_id: string;
  line_no: number;
  product_id: string | null;
  description: string | null;
  hsn_code: string | null;
  quantity: string;
  rate: string;
  discount_percent: string;
  tax_percent: string;
};

export type InvoiceItemRecord = {
  lineNo: number;
  productId: string | null;
  description: string | null;
  hsnCode: string | null;
  quantity: string;
  rate: string;
  discountPercent: string;
  taxPercent: string;
};

export type InvoiceTotalsColumns = Pick<
  SerializedInvoiceTotals,
  | "subtotal"
  | "itemDiscountTotal"
  | "invoiceDiscountAmount"
  | "totalDiscount"
  | "cgst"
  | "sgst"
  | "igst"
  | "totalTax"
  | "otherCharges"
  | "grandTotalRaw"
  | "roundOffAmount"
  | "grandTotal"
>;

export type InvoiceRecord = InvoiceTotalsColumns & {
  id: string;
  invoiceNo: string;
  invoiceDate: Date;
  partyId: string;
  taxMode: TaxMode;
  billType: BillType;
  lifecycleState: LifecycleState;
  status: InvoiceStatus;
  companyGstin: string | null;
  partyGstin: string | null;
  invoiceDiscount: { value: string; unit: DiscountUnit } | null;
  roundingPolicy: RoundingPolicy;
  paidAmount: string;
  balanceDue: string;
  notes: string | null;
  createdAt: Date;
  updatedAt: Date;
  finalizedAt: Date | null;
  cancelledAt: Date | null;
  items: InvoiceItemRecord[];
};

export type InvoiceItemWrite = {
  productId?: string;
  description?: string;
  hsnCode?: string;
  quantity: string;
  rate: string;
  discountPercent: string;
  taxPercent: string;
};

export type InvoiceWrite = InvoiceTotalsColumns & {
  invoiceNo: string;
  invoiceDate: Date;
  partyId: string;
  taxMode: TaxMode;
  billType: BillType;
  lifecycleState: LifecycleState;
  status: InvoiceStatus;
  companyGstin?: string;
  partyGstin?: string;
  invoiceDiscount?: { value: string; unit: DiscountUnit };
  roundingPolicy: RoundingPolicy;
  paidAmount: string;
  balanceDue: string;
  notes?: string;
  items: InvoiceItemWrite[];
};

export type InvoiceListFilter = {
  partyId?: string;
  lifecycleState?: LifecycleState;
};

const INVOICE_COLUMNS = `
  id, invoice_no, invoice_date::text AS invoice_date, party_id, tax_mode, bill_type, lifecycle_state, status,
  company_gstin, party_gstin, discount_value::text AS discount_value, discount_unit,
  other_charges::text AS other_charges, rounding_policy,
  subtotal::text AS subtotal, item_discount_total::text AS item_discount_total,
  invoice_discount_amount::text AS invoice_discount_amount, total_discount::text AS total_discount,
  cgst::text AS cgst, sgst::text AS sgst, igst::text AS igst, total_tax::text AS total_tax,
  grand_total_raw::text AS grand_total_raw, round_off_amount::text AS round_off_amount,
  grand_total::text AS grand_total, paid_amount::text AS paid_amount, balance_due::text AS balance_due,
  notes, created_at, updated_at, finalized_at, cancelled_at
`;

const ITEM_COLUMNS = `
  invoice_id, line_no, product_id, description, hsn_code, quantity::text AS quantity, rate::text AS rate,
  discount_percent::text AS discount_percent, tax_percent::text AS tax_percent
`;

const toItemRecord = (row: InvoiceItemRow): InvoiceItemRecord => ({
  lineNo: row.line_no,
  productId: row.product_id,
  description: row.description,
  hsnCode: row.hsn_code,
  quantity: row.quantity,
  rate: row.rate,
  discountPercent: row.discount_percent,
  taxPercent: row.tax_percent,
});

const toInvoiceRecord = (row: InvoiceRow, items: InvoiceItemRecord[]): InvoiceRecord => ({
  id: row.id,
  invoiceNo: row.invoice_no,
  invoiceDate: parseIsoDate(row.invoice_date),
  partyId: row.party_id,
  taxMode: taxModeSchema.parse(row.tax_mode),
  billType: billTypeSchema.parse(row.bill_type),
  lifecycleState: lifecycleStateSchema.parse(row.lifecycle_state),
  status: invoiceStatusSchema.parse(row.status),
  companyGstin: row.company_gstin,
  partyGstin: row.party_gstin,
  invoiceDiscount:
    row.discount_value !== null && row.discount_unit !== null
      ? { value: row.discount_value, unit: discountUnitSchema.parse(row.discount_unit) }
      : null,
  otherCharges: row.other_charges,
  roundingPolicy: roundingPolicySchema.parse(row.rounding_policy),
  subtotal: row.subtotal,
  itemDiscountTotal: row.item_discount_total,
  invoiceDiscountAmount: row.invoice_discount_amount,
  totalDiscount: row.total_discount,
  cgst: row.cgst,
  sgst: row.sgst,
  igst: row.igst,
  totalTax: row.total_tax,
  grandTotalRaw: row.grand_total_raw,
  roundOffAmount: row.round_off_amount,
  grandTotal: row.grand_total,
  paidAmount: row.paid_amount,
  balanceDue: row.balance_due,
  notes: row.notes,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
  finalizedAt: row.finalized_at,
  cancelledAt: row.cancelled_at,
  items,
});

const invoiceValues = (data: InvoiceWrite) => [
  data.invoiceNo,
  toIsoDate(data.invoiceDate),
  data.partyId,
  data.taxMode,
  data.billType,
  data.lifecycleState,
  data.status,
  data.companyGstin ?? null,
  data.partyGstin ?? null,
  data.invoiceDiscount?.value ?? null,
  data.invoiceDiscount?.unit ?? null,
  data.otherCharges,
  data.roundingPolicy,
  data.subtotal,
  data.itemDiscountTotal,
  data.invoiceDiscountAmount,
  data.totalDiscount,
  data.cgst,
  data.sgst,
  data.igst,
  data.totalTax,
  data.grandTotalRaw,
  data.roundOffAmount,
  data.grandTotal,
  data.paidAmount,
  data.balanceDue,
  data.notes ?? null,
];

@Injectable()
export class InvoicesRepository {
  constructor(private readonly db: DatabaseService) {}

  async list(filter: InvoiceListFilter, executor: DbExecutor = this.db): Promise<InvoiceRecord[]> {
    const conditions: string[] = [];
    const values: unknown[] = [];
    if (filter.partyId) {
      values.push(filter.partyId);
      conditions.push(`party_id = $${values.length}`);
    }
    if (filter.lifecycleState) {
      values.push(filter.lifecycleState);
      conditions.push(`lifecycle_state = $${values.length}`);
    }
    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const rows = await executor.query<InvoiceRow>(
      `SELECT ${INVOICE_COLUMNS} FROM invoices ${where} ORDER BY invoice_date DESC, invoice_no DESC`,
      values,
    );
    return this.attachItems(rows, executor);
  }

  async findById(id: string, executor: DbExecutor = this.db): Promise<InvoiceRecord | null> {
    const rows = await executor.query<InvoiceRow>(`SELECT ${INVOICE_COLUMNS} FROM invoices WHERE id = $1`, [id]);
    const [invoice] = await this.attachItems(rows, executor);
    return invoice ?? null;
  }

  /** Same as findById but holds a row lock until the transaction ends. */
  async findByIdForUpdate(id: string, tx: DbExecutor): Promise<InvoiceRecord | null> {
    const rows = await tx.query<InvoiceRow>(`SELECT ${INVOICE_COLUMNS} FROM invoices WHERE id = $1 FOR UPDATE`, [id]);
    const [invoice] = await this.attachItems(rows, tx);
    return invoice ?? null;
  }

  /**
   * Final, uncancelled invoices of a party that still owe money, locked for the
   * transaction. Rows are locked in id order, the same order as lockByIds.
   */
  async lockOutstandingForParty(partyId: string, tx: DbExecutor): Promise<InvoiceRecord[]> {
    const rows = await tx.query<InvoiceRow>(
      `SELECT ${INVOICE_COLUMNS} FROM invoices
       WHERE party_id = $1 AND lifecycle_state = 'FINAL' AND status <> 'CANCELLED' AND balance_due > 0
       ORDER BY id
       FOR UPDATE`,
      [partyId],
    );
    return rows.map((row) => toInvoiceRecord(row, []));
  }

  async lockByIds(ids: readonly string[], tx: DbExecutor): Promise<InvoiceRecord[]> {
    if (ids.length === 0) {
      return [];
    }
    const rows = await tx.query<InvoiceRow>(
      `SELECT ${INVOICE_COLUMNS} FROM invoices WHERE id = ANY($1::uuid[]) ORDER BY id FOR UPDATE`,
      [[...ids]],
    );
    return rows.map((row) => toInvoiceRecord(row, []));
  }

  async listOutstandingForParty(partyId: string, executor: DbExecutor = this.db): Promise<InvoiceRecord[]> {
    const rows = await executor.query<InvoiceRow>(
      `SELECT ${INVOICE_COLUMNS} FROM invoices
       WHERE party_id = $1 AND lifecycle_state = 'FINAL' AND status <> 'CANCELLED' AND balance_due > 0
       ORDER BY invoice_date ASC, id ASC`,
      [partyId],
    );
    return rows.map((row) => toInvoiceRecord(row, []));
  }

  /** Serializes number assignment for one numbering scope until the transaction ends. */
  async lockNumberScope(scope: string, tx: DbExecutor) {
    await tx.query("SELECT pg_advisory_xact_lock(hashtext($1))", [scope]);
  }

  async listNumbersInScope(scope: string, executor: DbExecutor = this.db): Promise<string[]> {
    const rows = await executor.query<{ invoice_no: string }>(
      "SELECT invoice_no FROM invoices WHERE starts_with(invoice_no, $1)",
      [scope],
    );
    return rows.map((row) => row.invoice_no);
  }

  async numberExists(invoiceNo: string, executor: DbExecutor = this.db, excludeId?: string) {
    const rows = await executor.query<{ id: string }>(
      "SELECT id FROM invoices WHERE invoice_no = $1 AND ($2::uuid IS NULL OR id <> $2::uuid) LIMIT 1",
      [invoiceNo, excludeId ?? null],
    );
    return rows.length > 0;
  }

  async hasAllocations(invoiceId: string, executor: DbExecutor = this.db) {
    const rows = await executor.query<{ id: string }>(
      "SELECT id FROM payment_allocations WHERE invoice_id = $1 LIMIT 1",
      [invoiceId],
    );
    return rows.length > 0;
  }

  async insert(data: InvoiceWrite, tx: DbExecutor): Promise<string> {
    const values = invoiceValues(data);
    const placeholders = values.map((_, index) => `$${index + 1}`).join(", ");
    const [row] = await tx.query<{ id: string }>(
      `INSERT INTO invoices (
         invoice_no, invoice_date, party_id, tax_mode, bill_type, lifecycle_state, status,
         company_gstin, party_gstin, discount_value, discount_unit, other_charges, rounding_policy,
         subtotal, item_discount_total, invoice_discount_amount, total_discount, cgst, sgst, igst, total_tax,
         grand_total_raw, round_off_amount, grand_total, paid_amount, balance_due, notes
       ) VALUES (${placeholders})
       RETURNING id`,
      values,
    );
    await this.insertItems(row.id, data.items, tx);
    if (data.lifecycleState === "FINAL") {
      await tx.query("UPDATE invoices SET finalized_at = now() WHERE id = $1", [row.id]);
    }
    return row.id;
  }

  /** Rewrites a draft completely, replacing its items. */
  async replace(id: string, data: InvoiceWrite, tx: DbExecutor) {
    const values = invoiceValues(data);
    await tx.query(
      `UPDATE invoices SET
         invoice_no = $1, invoice_date = $2, party_id = $3, tax_mode = $4, bill_type = $5, lifecycle_state = $6,
         status = $7, company_gstin = $8, party_gstin = $9, discount_value = $10, discount_unit = $11,
         other_charges = $12, rounding_policy = $13, subtotal = $14, item_discount_total = $15,
         invoice_discount_amount = $16, total_discount = $17, cgst = $18, sgst = $19, igst = $20, total_tax = $21,
         grand_total_raw = $22, round_off_amount = $23, grand_total = $24, paid_amount = $25, balance_due = $26,
         notes = $27, updated_at = now(),
         finalized_at = CASE WHEN $6 = 'FINAL' THEN COALESCE(finalized_at, now()) ELSE NULL END
       WHERE id = $28`,
      [...values, id],
    );
    await tx.query("DELETE FROM invoice_items WHERE invoice_id = $1", [id]);
    await this.insertItems(id, data.items, tx);
  }

  async updateBalances(updates: readonly InvoiceBalanceUpdate[], tx: DbExecutor) {
    for (const update of updates) {
      await tx.query(
        "UPDATE invoices SET paid_amount = $1, balance_due = $2, status = $3, updated_at = now() WHERE id = $4",
        [update.paidAmount.toFixed(2), update.balanceDue.toFixed(2), update.status, update.invoiceId],
      );
    }
  }

  async markCancelled(id: string, tx: DbExecutor) {
    await tx.query(
      "UPDATE invoices SET status = 'CANCELLED', cancelled_at = now(), updated_at = now() WHERE id = $1",
      [id],
    );
  }

  private async insertItems(invoiceId: string, items: readonly InvoiceItemWrite[], tx: DbExecutor) {
    for (const [index, item] of items.entries()) {
      await tx.query(
        `INSERT INTO invoice_items (
           invoice_id, line_no, product_id, description, hsn_code, quantity, rate, discount_percent, tax_percent
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
        [
          invoiceId,
          index + 1,
          item.productId ?? null,
          item.description ?? null,
          item.hsnCode ?? null,
          item.quantity,
          item.rate,
          item.discountPercent,
          item.taxPercent,
        ],
      );
    }
  }

  private async attachItems(rows: InvoiceRow[], executor: DbExecutor) {
    if (rows.length === 0) {
      return [];
    }
    const itemRows = await executor.query<InvoiceItemRow>(
      `SELECT ${ITEM_COLUMNS} FROM invoice_items WHERE invoice_id = ANY($1::uuid[]) ORDER BY invoice_id, line_no`,
      [rows.map((row) => row.id)],
    );
    const itemsByInvoice = new Map<string, InvoiceItemRecord[]>();
    for (const itemRow of itemRows) {
      const items = itemsByInvoice.get(itemRow.invoice_id) ?? [];
      items.push(toItemRecord(itemRow));
      itemsByInvoice.set(itemRow.invoice_id, items);
    }
    return rows.map((row) => toInvoiceRecord(row, itemsByInvoice.get(row.id) ?? []));
  }
}
