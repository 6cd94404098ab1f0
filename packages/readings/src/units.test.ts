import { describe, it, expect } from "vitest";
import { mmolToMgDl, isNativeGlucoseUnits, MMOL_TO_MGDL } from "./units.js";

describe("mmolToMgDl", () => {
  it("uses a factor of 18", () => {
    expect(MMOL_TO_MGDL).toBe(18);
    expect(mmolToMgDl(5.5)).toBe(99);
  });

  it("truncates instead of rounding", () => {
    // 6.1 * 18 = 109.8
    expect(mmolToMgDl(6.1)).toBe(109);
  });

  it("truncates negative values toward zero", () => {
    // -0.1 * 18 = -1.8
    expect(mmolToMgDl(-0.1)).toBe(-1);
  });

  it("returns plain zero for tiny negatives", () => {
    expect(Object.is(mmolToMgDl(-0.01), 0)).toBe(true);
  });
});

describe("isNativeGlucoseUnits", () => {
  it("accepts mmol/L in any case", () => {
    expect(isNativeGlucoseUnits("mmol/L")).toBe(true);
    expect(isNativeGlucoseUnits("mmol/l")).toBe(true);
  });

  it("treats missing units as native", () => {
    expect(isNativeGlucoseUnits(undefined)).toBe(true);
    expect(isNativeGlucoseUnits(null)).toBe(true);
  });

  it("rejects mg/dL", () => {
    expect(isNativeGlucoseUnits("mg/dL")).toBe(false);
  });

  it("rejects units that are not a string", () => {
    expect(isNativeGlucoseUnits({ bg: "mmol/L" })).toBe(false);
  });
});
