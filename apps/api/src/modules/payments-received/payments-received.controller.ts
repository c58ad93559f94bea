import { Body, Controller, Delete, Get, HttpCode, Param, ParseUUIDPipe, Post, Query } from "@nestjs/common";
import { z } from "zod";
import {
  allocationPreviewSchema,
  paymentReceivedCreateSchema,
  type AllocationPreviewInput,
  type PaymentReceivedCreateInput,
} from "@gst-billing/shared";
import { ZodValidationPipe } from "../../common/zod-validation.pipe";
import { PaymentsReceivedService } from "./payments-received.service";

const emptyToUndefined = (value: unknown) => (value === "" ? undefined : value);

const listPaymentsQuerySchema = z.object({
  partyId: z.preprocess(emptyToUndefined, z.string().trim().min(1).optional()),
});

const partyQuerySchema = z.object({
  partyId: z.string().trim().min(1),
});

type ListPaymentsQuery = z.infer<typeof listPaymentsQuerySchema>;
type PartyQuery = z.infer<typeof partyQuerySchema>;

@Controller("payments-received")
export class PaymentsReceivedController {
  constructor(private readonly payments: PaymentsReceivedService) {}

  @Get("outstanding")
  listOutstanding(@Query(new ZodValidationPipe(partyQuerySchema)) query: PartyQuery) {
    return this.payments.listOutstanding(query.partyId);
  }

  @Get("party-balance")
  getPartyBalance(@Query(new ZodValidationPipe(partyQuerySchema)) query: PartyQuery) {
    return this.payments.getPartyBalance(query.partyId);
  }

  @Post("allocation-preview")
  @HttpCode(200)
  previewAllocation(@Body(new ZodValidationPipe(allocationPreviewSchema)) body: AllocationPreviewInput) {
    return this.payments.previewAllocation(body);
  }

  @Get()
  listPayments(@Query(new ZodValidationPipe(listPaymentsQuerySchema)) query: ListPaymentsQuery) {
    return this.payments.listPayments(query);
  }

  @Get("summary")
  getSummary(@Query(new ZodValidationPipe(listPaymentsQuerySchema)) query: ListPaymentsQuery) {
    return this.payments.getSummary(query);
  }

  @Get(":id")
  getPayment(@Param("id", new ParseUUIDPipe()) id: string) {
    return this.payments.getPayment(id);
  }

  @Post()
  createPayment(@Body(new ZodValidationPipe(paymentReceivedCreateSchema)) body: PaymentReceivedCreateInput) {
    return this.payments.createPayment(body);
  }

  @Delete(":id")
  deletePayment(@Param("id", new ParseUUIDPipe()) id: string) {
    return this.payments.deletePayment(id);
  }
}
