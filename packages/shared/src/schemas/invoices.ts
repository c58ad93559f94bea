import { z } from "zod";
import { gstinSchema } from "../gstin";
import { nonNegativeSchema, optionalMoneySchema, percentageSchema, quantitySchema } from "./money";

const emptyToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(emptyToUndefined, z.string().optional());
const optionalGstin = z.preprocess(emptyToUndefined, gstinSchema.optional());
const dateField = z.coerce.date();

export const taxModeSchema = z.enum(["SAME_STATE", "OTHER_STATE", "NON_GST"]);
export const billTypeSchema = z.enum(["CASH", "CREDIT"]);
export const roundingPolicySchema = z.enum(["NONE", "ROUND_HALF_UP", "ROUND_DOWN", "ROUND_UP"]);
export const discountUnitSchema = z.enum(["PERCENT", "FLAT"]);
export const lifecycleStateSchema = z.enum(["DRAFT", "FINAL"]);
export const invoiceStatusSchema = z.enum([
  "DRAFT",
  "PENDING",
  "UNPAID",
  "PARTIAL",
  "PAID",
  "OVERDUE",
  "CANCELLED",
]);

export type TaxMode = z.infer<typeof taxModeSchema>;
export type BillType = z.infer<typeof billTypeSchema>;
export type RoundingPolicy = z.infer<typeof roundingPolicySchema>;
export type DiscountUnit = z.infer<typeof discountUnitSchema>;
export type LifecycleState = z.infer<typeof lifecycleStateSchema>;
export type InvoiceStatus = z.infer<typeof invoiceStatusSchema>;

export const lineItemSchema = z.object({
  productId: optionalString,
  description: optionalString,
  hsnCode: optionalString,
  quantity: quantitySchema,
  rate: nonNegativeSchema,
  discountPercent: percentageSchema.default(0),
  taxPercent: percentageSchema.default(0),
});

export const invoiceDiscountSchema = z.object({
  value: nonNegativeSchema,
  unit: discountUnitSchema,
});

export const invoiceCalculateSchema = z.object({
  items: z.array(lineItemSchema),
  taxMode: taxModeSchema,
  invoiceDiscount: invoiceDiscountSchema.optional(),
  otherCharges: optionalMoneySchema,
  roundingPolicy: roundingPolicySchema,
});

const invoiceBaseSchema = z.object({
  invoiceNo: z.preprocess(emptyToUndefined, z.string().trim().min(1).max(40).optional()),
  invoiceDate: dateField,
  partyId: z.string().trim().min(1),
  taxMode: taxModeSchema.optional(),
  companyGstin: optionalGstin,
  partyGstin: optionalGstin,
  billType: billTypeSchema,
  items: z.array(lineItemSchema).min(1),
  invoiceDiscount: invoiceDiscountSchema.optional(),
  otherCharges: optionalMoneySchema,
  roundingPolicy: roundingPolicySchema,
  notes: optionalString,
});

type TaxModeSource = {
  taxMode?: TaxMode;
  companyGstin?: string;
  partyGstin?: string;
};

const checkTaxModeSource = (data: TaxModeSource, ctx: z.RefinementCtx, required: boolean) => {
  const hasGstinPair = Boolean(data.companyGstin && data.partyGstin);
  if (!data.taxMode && !hasGstinPair && (required || data.companyGstin || data.partyGstin)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["taxMode"],
      message: "Provide a tax mode, or both the company and party GSTIN.",
    });
  }
};

export const invoiceCreateSchema = invoiceBaseSchema
  .extend({
    billType: billTypeSchema.default("CREDIT"),
    finalize: z.boolean().optional().default(false),
  })
  .superRefine((data, ctx) => checkTaxModeSource(data, ctx, true));

export const invoiceUpdateSchema = invoiceBaseSchema
  .partial()
  .superRefine((data, ctx) => checkTaxModeSource(data, ctx, false));

export type LineItemInput = z.infer<typeof lineItemSchema>;
export type InvoiceDiscountInput = z.infer<typeof invoiceDiscountSchema>;
export type InvoiceCalculateInput = z.infer<typeof invoiceCalculateSchema>;
export type InvoiceCreateInput = z.infer<typeof invoiceCreateSchema>;
export type InvoiceUpdateInput = z.infer<typeof invoiceUpdateSchema>;
