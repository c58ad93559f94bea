import { Body, Controller, Get, HttpCode, Param, ParseUUIDPipe, Patch, Post, Query } from "@nestjs/common";
import { z } from "zod";
import {
  invoiceCalculateSchema,
  invoiceCreateSchema,
  invoiceStatusSchema,
  invoiceUpdateSchema,
  lifecycleStateSchema,
  pageQuerySchema,
  type InvoiceCalculateInput,
  type InvoiceCreateInput,
  type InvoiceUpdateInput,
} from "@gst-billing/shared";
import { ZodValidationPipe } from "../../common/zod-validation.pipe";
import { InvoicesService } from "./invoices.service";

const emptyToUndefined = (value: unknown) => (value === "" ? undefined : value);

const invoiceFilterSchema = z.object({
  partyId: z.preprocess(emptyToUndefined, z.string().trim().min(1).optional()),
  status: z.preprocess(emptyToUndefined, invoiceStatusSchema.optional()),
  lifecycleState: z.preprocess(emptyToUndefined, lifecycleStateSchema.optional()),
});

const listInvoicesQuerySchema = pageQuerySchema.merge(invoiceFilterSchema);

type InvoiceFilterQuery = z.infer<typeof invoiceFilterSchema>;
type ListInvoicesQuery = z.infer<typeof listInvoicesQuerySchema>;

@Controller("invoices")
export class InvoicesController {
  constructor(private readonly invoices: InvoicesService) {}

  @Post("calculate")
  @HttpCode(200)
  calculate(@Body(new ZodValidationPipe(invoiceCalculateSchema)) body: InvoiceCalculateInput) {
    return this.invoices.calculate(body);
  }

  @Get()
  listInvoices(@Query(new ZodValidationPipe(listInvoicesQuerySchema)) query: ListInvoicesQuery) {
    return this.invoices.listInvoicePage(query);
  }

  @Get("summary")
  getSummary(@Query(new ZodValidationPipe(invoiceFilterSchema)) query: InvoiceFilterQuery) {
    return this.invoices.getSummary(query);
  }

  @Get(":id")
  getInvoice(@Param("id", new ParseUUIDPipe()) id: string) {
    return this.invoices.getInvoice(id);
  }

  @Get(":id/hsn-summary")
  getHsnSummary(@Param("id", new ParseUUIDPipe()) id: string) {
    return this.invoices.getHsnSummary(id);
  }

  @Post()
  createInvoice(@Body(new ZodValidationPipe(invoiceCreateSchema)) body: InvoiceCreateInput) {
    return this.invoices.createInvoice(body);
  }

  @Patch(":id")
  updateInvoice(
    @Param("id", new ParseUUIDPipe()) id: string,
    @Body(new ZodValidationPipe(invoiceUpdateSchema)) body: InvoiceUpdateInput,
  ) {
    return this.invoices.updateInvoice(id, body);
  }

  @Post(":id/finalize")
  @HttpCode(200)
  finalizeInvoice(@Param("id", new ParseUUIDPipe()) id: string) {
    return this.invoices.finalizeInvoice(id);
  }

  @Post(":id/cancel")
  @HttpCode(200)
  cancelInvoice(@Param("id", new ParseUUIDPipe()) id: string) {
    return this.invoices.cancelInvoice(id);
  }
}
