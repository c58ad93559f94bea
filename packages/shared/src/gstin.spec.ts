import { getStateFromGstin, gstinSchema, resolveTaxModeFromGstins, validateGstin } from "./gstin";

describe("GSTIN helpers", () => {
  it("accepts a well-formed GSTIN and resolves its state", () => {
    expect(validateGstin(" 29abcde1234f1z5 ")).toEqual({
      valid: true,
      gstin: "29ABCDE1234F1Z5",
      stateCode: "29",
      stateName: "Karnataka",
    });
  });

  it("reports why a GSTIN is rejected", () => {
    expect(validateGstin("29ABCDE1234F1Z")).toEqual({ valid: false, reason: "LENGTH" });
    expect(validateGstin("29ABCDE1234F0Z5")).toEqual({ valid: false, reason: "FORMAT" });
    expect(validateGstin("25ABCDE1234F1Z5")).toEqual({ valid: false, reason: "STATE_CODE" });
  });

  it("looks up the state name only for valid registrations", () => {
    expect(getStateFromGstin("27PQRST6789K1Z2")).toBe("Maharashtra");
    expect(getStateFromGstin("27PQRST")).toBeUndefined();
  });

  it("derives the tax mode from the two state codes", () => {
    expect(resolveTaxModeFromGstins("29ABCDE1234F1Z5", "29PQRST6789K1Z2")).toBe("SAME_STATE");
    expect(resolveTaxModeFromGstins("29ABCDE1234F1Z5", "27PQRST6789K1Z2")).toBe("OTHER_STATE");
  });

  it("refuses to derive a tax mode from an invalid GSTIN", () => {
    expect(() => resolveTaxModeFromGstins("29ABCDE1234F1Z5", "99PQRST6789K1Z2")).toThrow(
      "Party GSTIN is invalid (STATE_CODE)",
    );
  });

  it("normalizes GSTINs through the schema", () => {
    expect(gstinSchema.parse("07abcde1234f1z5")).toBe("07ABCDE1234F1Z5");
    expect(gstinSchema.safeParse("not-a-gstin").success).toBe(false);
  });
});
