import { z } from "zod";
import stateCodes from "./constants/gst-state-codes.json";
import type { TaxMode } from "./schemas/invoices";

const GSTIN_PATTERN = /^[0-9]{2}[A-Z]{5}[0-9]{4}[A-Z][1-9A-Z]Z[0-9A-Z]$/;

const stateNamesByCode: Record<string, string> = stateCodes;

export type GstinValidation =
  | { valid: true; gstin: string; stateCode: string; stateName: string }
  | { valid: false; reason: "LENGTH" | "FORMAT" | "STATE_CODE" };

export function normalizeGstin(value: string) {
  return value.trim().toUpperCase();
}

export function validateGstin(value: string): GstinValidation {
  const gstin = normalizeGstin(value);
  if (gstin.length !== 15) {
    return { valid: false, reason: "LENGTH" };
  }
  if (!GSTIN_PATTERN.test(gstin)) {
    return { valid: false, reason: "FORMAT" };
  }

  const stateCode = gstin.slice(0, 2);
  const stateName = stateNamesByCode[stateCode];
  if (!stateName) {
    return { valid: false, reason: "STATE_CODE" };
  }

  return { valid: true, gstin, stateCode, stateName };
}

export function getStateFromGstin(value: string) {
  const result = validateGstin(value);
  return result.valid ? result.stateName : undefined;
}

/**
 * Supplies within one state carry CGST + SGST, supplies across states carry IGST.
 * Both registrations must be valid GSTINs.
 */
export function resolveTaxModeFromGstins(companyGstin: string, partyGstin: string): TaxMode {
  const company = validateGstin(companyGstin);
  if (!company.valid) {
    throw new Error(`Company GSTIN is invalid (${company.reason})`);
  }
  const party = validateGstin(partyGstin);
  if (!party.valid) {
    throw new Error(`Party GSTIN is invalid (${party.reason})`);
  }
  return company.stateCode === party.stateCode ? "SAME_STATE" : "OTHER_STATE";
}

export const gstinSchema = z
  .string()
  .transform(normalizeGstin)
  .refine((value) => validateGstin(value).valid, { message: "Must be a valid 15-character GSTIN" });
