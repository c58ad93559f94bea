import { z } from "zod";
import { moneyPositiveSchema } from "./money";

const emptyToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(emptyToUndefined, z.string().optional());
const optionalUuid = z.preprocess(emptyToUndefined, z.string().uuid().optional());
const requiredUuid = z.string().uuid();
const dateField = z.coerce.date();

export const settlementModeSchema = z.enum(["BILL_TO_BILL", "FIFO", "DIRECT"]);

export type SettlementMode = z.infer<typeof settlementModeSchema>;

export const paymentReceivedAllocationSchema = z.object({
  invoiceId: requiredUuid,
  amount: moneyPositiveSchema,
});

const settlementSchema = z.object({
  partyId: z.string().trim().min(1),
  amount: moneyPositiveSchema,
  settlementMode: settlementModeSchema,
  targetInvoiceId: optionalUuid,
});

const checkTarget = (data: { settlementMode: SettlementMode; targetInvoiceId?: string }, ctx: z.RefinementCtx) => {
  if (data.targetInvoiceId && data.settlementMode !== "BILL_TO_BILL") {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["targetInvoiceId"],
      message: "A target invoice only applies to bill-to-bill settlement.",
    });
  }
};

export const allocationPreviewSchema = settlementSchema.superRefine(checkTarget);

export const paymentReceivedCreateSchema = settlementSchema
  .extend({
    paymentDate: dateField,
    mode: z.string().trim().min(1).max(40),
    reference: optionalString,
    notes: optionalString,
    expectedAllocations: z.array(paymentReceivedAllocationSchema).optional(),
  })
  .superRefine(checkTarget);

export type PaymentReceivedAllocationInput = z.infer<typeof paymentReceivedAllocationSchema>;
export type AllocationPreviewInput = z.infer<typeof allocationPreviewSchema>;
export type PaymentReceivedCreateInput = z.infer<typeof paymentReceivedCreateSchema>;
