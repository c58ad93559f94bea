import { z } from "zod";

const emptyToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const decimalSchema = z.union([
  z.number().finite(),
  z.string().regex(/^-?\d+(\.\d+)?$/, "Must be a valid decimal number"),
]);

const toNumber = (value: string | number) => (typeof value === "number" ? value : Number(value));

/** Amounts, rates and quantities: a decimal number or string, zero or more. */
export const nonNegativeSchema = decimalSchema.refine((value) => toNumber(value) >= 0, {
  message: "Must be greater than or equal to 0",
});

export const moneyPositiveSchema = decimalSchema.refine((value) => toNumber(value) > 0, {
  message: "Must be greater than 0",
});

export const optionalMoneySchema = z.preprocess(emptyToUndefined, nonNegativeSchema.optional());

export const quantitySchema = nonNegativeSchema;

export const percentageSchema = decimalSchema.refine(
  (value) => toNumber(value) >= 0 && toNumber(value) <= 100,
  { message: "Percent must be between 0 and 100" },
);
