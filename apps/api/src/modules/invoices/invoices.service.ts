import { BadRequestException, ConflictException, Injectable, Logger, NotFoundException } from "@nestjs/common";
import {
  ErrorCodes,
  resolveTaxModeFromGstins,
  type BillType,
  type InvoiceCalculateInput,
  type InvoiceCreateInput,
  type InvoiceStatus,
  type InvoiceUpdateInput,
  type LifecycleState,
  type LineItemInput,
  type PaginatedResponse,
  type RoundingPolicy,
  type TaxMode,
} from "@gst-billing/shared";
import { DatabaseService, isUniqueViolation, type DbExecutor } from "../../database/database.service";
import { getApiEnv } from "../../common/env";
import { dec, zero } from "../../common/money";
import { invoiceNumberScope, nextNumberInScope } from "../../common/numbering";
import {
  buildHsnSummary,
  calculateInvoice,
  calculateInvoiceTotals,
  serializeInvoiceTotals,
  summarizeInvoices,
} from "../../invoices.utils";
import { computeBalanceDue, resolveInvoiceStatus } from "../../invoice-status.utils";
import {
  InvoicesRepository,
  type InvoiceItemRecord,
  type InvoiceItemWrite,
  type InvoiceRecord,
  type InvoiceWrite,
} from "./invoices.repo";

export type InvoiceListQuery = {
  partyId?: string;
  status?: InvoiceStatus;
  lifecycleState?: LifecycleState;
};

export type InvoiceView = InvoiceRecord;

type InvoiceSource = {
  invoiceDate: Date;
  partyId: string;
  taxMode: TaxMode;
  billType: BillType;
  companyGstin?: string;
  partyGstin?: string;
  items: InvoiceItemWrite[];
  invoiceDiscount?: { value: string; unit: "PERCENT" | "FLAT" };
  otherCharges?: string;
  roundingPolicy: RoundingPolicy;
  notes?: string;
};

const toItemWrite = (item: LineItemInput): InvoiceItemWrite => ({
  productId: item.productId,
  description: item.description,
  hsnCode: item.hsnCode,
  quantity: dec(item.quantity).toFixed(),
  rate: dec(item.rate).toFixed(),
  discountPercent: dec(item.discountPercent).toFixed(),
  taxPercent: dec(item.taxPercent).toFixed(),
});

const storedItemToWrite = (item: InvoiceItemRecord): InvoiceItemWrite => ({
  productId: item.productId ?? undefined,
  description: item.description ?? undefined,
  hsnCode: item.hsnCode ?? undefined,
  quantity: item.quantity,
  rate: item.rate,
  discountPercent: item.discountPercent,
  taxPercent: item.taxPercent,
});

const sourceFromRecord = (record: InvoiceRecord): InvoiceSource => ({
  invoiceDate: record.invoiceDate,
  partyId: record.partyId,
  taxMode: record.taxMode,
  billType: record.billType,
  companyGstin: record.companyGstin ?? undefined,
  partyGstin: record.partyGstin ?? undefined,
  items: record.items.map(storedItemToWrite),
  invoiceDiscount: record.invoiceDiscount ?? undefined,
  otherCharges: record.otherCharges,
  roundingPolicy: record.roundingPolicy,
  notes: record.notes ?? undefined,
});

@Injectable()
export class InvoicesService {
  private readonly logger = new Logger(InvoicesService.name);

  constructor(
    private readonly db: DatabaseService,
    private readonly invoicesRepo: InvoicesRepository,
  ) {}

  calculate(input: InvoiceCalculateInput) {
    return serializeInvoiceTotals(calculateInvoiceTotals(input));
  }

  async listInvoices(query: InvoiceListQuery = {}) {
    const records = await this.invoicesRepo.list({ partyId: query.partyId, lifecycleState: query.lifecycleState });
    const today = new Date();
    const invoices = records.map((record) => this.withResolvedStatus(record, today));
    return query.status ? invoices.filter((invoice) => invoice.status === query.status) : invoices;
  }

  async listInvoicePage(
    query: InvoiceListQuery & { page: number; pageSize: number },
  ): Promise<PaginatedResponse<InvoiceView>> {
    const invoices = await this.listInvoices(query);
    const start = (query.page - 1) * query.pageSize;
    return {
      data: invoices.slice(start, start + query.pageSize),
      pageInfo: { page: query.page, pageSize: query.pageSize, total: invoices.length },
    };
  }

  async getSummary(query: InvoiceListQuery = {}) {
    return summarizeInvoices(await this.listInvoices(query));
  }

  async getInvoice(id: string) {
    const record = await this.invoicesRepo.findById(id);
    if (!record) {
      throw new NotFoundException("Invoice not found");
    }
    return this.withResolvedStatus(record, new Date());
  }

  async getHsnSummary(id: string) {
    const invoice = await this.getInvoice(id);
    return {
      invoiceId: invoice.id,
      invoiceNo: invoice.invoiceNo,
      taxMode: invoice.taxMode,
      rows: buildHsnSummary(invoice.items.map(storedItemToWrite), invoice.taxMode),
    };
  }

  async createInvoice(input: InvoiceCreateInput) {
    const source: InvoiceSource = {
      invoiceDate: input.invoiceDate,
      partyId: input.partyId,
      taxMode: this.resolveTaxMode(input.taxMode, input.companyGstin, input.partyGstin),
      billType: input.billType,
      companyGstin: input.companyGstin,
      partyGstin: input.partyGstin,
      items: input.items.map(toItemWrite),
      invoiceDiscount: input.invoiceDiscount
        ? { value: dec(input.invoiceDiscount.value).toFixed(), unit: input.invoiceDiscount.unit }
        : undefined,
      otherCharges: input.otherCharges === undefined ? undefined : dec(input.otherCharges).toFixed(2),
      roundingPolicy: input.roundingPolicy,
      notes: input.notes,
    };
    const lifecycleState: LifecycleState = input.finalize ? "FINAL" : "DRAFT";
    const today = new Date();

    const id = await this.withUniqueNumber(() =>
      this.db.transaction(async (tx) => {
        const invoiceNo = await this.assignNumber(input.invoiceNo, source.invoiceDate, tx);
        return this.invoicesRepo.insert(this.buildWrite(source, invoiceNo, lifecycleState, today), tx);
      }),
    );

    const invoice = await this.getInvoice(id);
    this.logger.log(`invoice ${lifecycleState === "FINAL" ? "finalized" : "drafted"}: ${invoice.invoiceNo}`);
    return invoice;
  }

  async updateInvoice(id: string, input: InvoiceUpdateInput) {
    const today = new Date();
    await this.withUniqueNumber(() =>
      this.db.transaction(async (tx) => {
        const existing = await this.requireDraftForUpdate(id, tx);
        const current = sourceFromRecord(existing);
        const companyGstin = input.companyGstin ?? current.companyGstin;
        const partyGstin = input.partyGstin ?? current.partyGstin;
        const gstinsChanged = input.companyGstin !== undefined || input.partyGstin !== undefined;

        const source: InvoiceSource = {
          invoiceDate: input.invoiceDate ?? current.invoiceDate,
          partyId: input.partyId ?? current.partyId,
          taxMode: gstinsChanged
            ? this.resolveTaxMode(input.taxMode, companyGstin, partyGstin)
            : (input.taxMode ?? current.taxMode),
          billType: input.billType ?? current.billType,
          companyGstin,
          partyGstin,
          items: input.items ? input.items.map(toItemWrite) : current.items,
          invoiceDiscount: input.invoiceDiscount
            ? { value: dec(input.invoiceDiscount.value).toFixed(), unit: input.invoiceDiscount.unit }
            : current.invoiceDiscount,
          otherCharges: input.otherCharges === undefined ? current.otherCharges : dec(input.otherCharges).toFixed(2),
          roundingPolicy: input.roundingPolicy ?? current.roundingPolicy,
          notes: input.notes ?? current.notes,
        };

        const invoiceNo = input.invoiceNo ?? existing.invoiceNo;
        if (invoiceNo !== existing.invoiceNo && (await this.invoicesRepo.numberExists(invoiceNo, tx, id))) {
          throw this.duplicateNumber(invoiceNo);
        }

        await this.invoicesRepo.replace(id, this.buildWrite(source, invoiceNo, "DRAFT", today), tx);
      }),
    );
    return this.getInvoice(id);
  }

  async finalizeInvoice(id: string) {
    const today = new Date();
    const invoiceNo = await this.db.transaction(async (tx) => {
      const existing = await this.requireDraftForUpdate(id, tx, "Invoice is already final");
      await this.invoicesRepo.replace(
        id,
        this.buildWrite(sourceFromRecord(existing), existing.invoiceNo, "FINAL", today),
        tx,
      );
      return existing.invoiceNo;
    });
    this.logger.log(`invoice finalized: ${invoiceNo}`);
    return this.getInvoice(id);
  }

  async cancelInvoice(id: string) {
    await this.db.transaction(async (tx) => {
      const existing = await this.invoicesRepo.findByIdForUpdate(id, tx);
      if (!existing) {
        throw new NotFoundException("Invoice not found");
      }
      if (existing.status === "CANCELLED") {
        throw new ConflictException("Invoice is already cancelled");
      }
      if (existing.lifecycleState !== "FINAL") {
        throw new ConflictException({
          code: ErrorCodes.CONFLICT,
          message: "Only final invoices can be cancelled",
          hint: "Edit or discard the draft instead.",
        });
      }
      if (await this.invoicesRepo.hasAllocations(id, tx)) {
        throw new ConflictException({
          code: ErrorCodes.CONFLICT,
          message: "Invoice has payments allocated to it",
          hint: "Delete the payments against this invoice before cancelling it.",
        });
      }
      await this.invoicesRepo.markCancelled(id, tx);
      this.logger.log(`invoice cancelled: ${existing.invoiceNo}`);
    });
    return this.getInvoice(id);
  }

  private resolveTaxMode(taxMode: TaxMode | undefined, companyGstin?: string, partyGstin?: string) {
    if (taxMode) {
      return taxMode;
    }
    if (!companyGstin || !partyGstin) {
      throw new BadRequestException({
        code: ErrorCodes.VALIDATION_ERROR,
        message: "Tax mode cannot be derived without both GSTINs",
        hint: "Provide a tax mode, or both the company and party GSTIN.",
      });
    }
    return resolveTaxModeFromGstins(companyGstin, partyGstin);
  }

  private withResolvedStatus(record: InvoiceRecord, today: Date): InvoiceView {
    return {
      ...record,
      status: resolveInvoiceStatus(record, today, { overdueAfterDays: getApiEnv().INVOICE_OVERDUE_AFTER_DAYS }),
    };
  }

  private buildWrite(source: InvoiceSource, invoiceNo: string, lifecycleState: LifecycleState, today: Date) {
    const { totals } = calculateInvoice({
      items: source.items,
      taxMode: source.taxMode,
      invoiceDiscount: source.invoiceDiscount,
      otherCharges: source.otherCharges,
      roundingPolicy: source.roundingPolicy,
    });
    const settledOnIssue = lifecycleState === "FINAL" && source.billType === "CASH";
    const paidAmount = settledOnIssue ? totals.grandTotal : zero();
    const balanceDue = computeBalanceDue(totals.grandTotal, paidAmount);
    const status = resolveInvoiceStatus(
      { lifecycleState, invoiceDate: source.invoiceDate, grandTotal: totals.grandTotal, balanceDue },
      today,
      { overdueAfterDays: getApiEnv().INVOICE_OVERDUE_AFTER_DAYS },
    );
    const { isInterstate, isNonGst, itemCount, roundingPolicy, ...amounts } = serializeInvoiceTotals(totals);

    const write: InvoiceWrite = {
      ...source,
      ...amounts,
      roundingPolicy,
      invoiceNo,
      lifecycleState,
      status,
      paidAmount: paidAmount.toFixed(2),
      balanceDue: balanceDue.toFixed(2),
    };
    this.logger.debug(
      `computed ${invoiceNo}: ${itemCount} items, ${isNonGst ? "non-GST" : isInterstate ? "IGST" : "CGST/SGST"}, total ${write.grandTotal}`,
    );
    return write;
  }

  private async requireDraftForUpdate(id: string, tx: DbExecutor, finalMessage = "Final invoices cannot be edited") {
    const existing = await this.invoicesRepo.findByIdForUpdate(id, tx);
    if (!existing) {
      throw new NotFoundException("Invoice not found");
    }
    if (existing.lifecycleState === "FINAL") {
      throw new ConflictException({
        code: ErrorCodes.INVOICE_FINALIZED,
        message: finalMessage,
        hint: "Cancel the invoice and issue a new one instead.",
      });
    }
    return existing;
  }

  private async assignNumber(requested: string | undefined, invoiceDate: Date, tx: DbExecutor) {
    if (requested) {
      if (await this.invoicesRepo.numberExists(requested, tx)) {
        throw this.duplicateNumber(requested);
      }
      return requested;
    }
    const scope = invoiceNumberScope(getApiEnv().INVOICE_NUMBER_PREFIX, invoiceDate);
    await this.invoicesRepo.lockNumberScope(scope, tx);
    return nextNumberInScope(scope, await this.invoicesRepo.listNumbersInScope(scope, tx));
  }

  private async withUniqueNumber<T>(work: () => Promise<T>) {
    try {
      return await work();
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictException({
          code: ErrorCodes.CONFLICT,
          message: "Invoice number already exists",
          hint: "Refresh and retry, or choose a different number.",
        });
      }
      throw error;
    }
  }

  private duplicateNumber(invoiceNo: string) {
    return new ConflictException({
      code: ErrorCodes.CONFLICT,
      message: `Invoice number ${invoiceNo} already exists`,
      hint: "Choose a different number, or leave it blank to assign the next one.",
    });
  }
}
