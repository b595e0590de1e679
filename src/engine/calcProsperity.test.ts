import { describe, expect, it } from "vitest";
import { computeGains, computeProsperity } from "./calcProsperity";
import type { CalcResult, CalculationInput, CalculationOutput } from "./types";

const base: CalculationInput = {
  costPerParticipant: 1000,
  population: 1000,
  deltaMathSd: 0.1,
  deltaGradRatePp: 5,
  deltaCollegeEnrollPp: 3,
  discountRate: 0.03,
  mathGainPerSd: 80000,
  earningsGainHsVsDropout: 300000,
  earningsGainCollegeVsHs: 600000,
  fadeoutFactor: 0.3,
  scenarioMultiplier: 1,
};

function expectOk(result: CalcResult): CalculationOutput {
  if (!result.ok) throw new Error(`expected a defined ratio, got ${result.error.denominator}`);
  return result.output;
}

describe("computeProsperity", () => {
  it("converts the reference program into CPPG and ROI", () => {
    const out = expectOk(computeProsperity(base));

    expect(out.gainFromMath).toBeCloseTo(5600, 6);
    expect(out.gainFromGradRate).toBeCloseTo(15000, 6);
    expect(out.gainFromCollege).toBeCloseTo(18000, 6);
    expect(out.totalGainPerPerson).toBeCloseTo(38600, 6);
    expect(out.cppg).toBeCloseTo(0.0259067, 6);
    if (!out.roi.defined) throw new Error("roi should be defined for a paid program");
    expect(out.roi.value).toBeCloseTo(38.6, 9);
  });

  it("scales cohort totals by population", () => {
    const out = expectOk(computeProsperity(base));

    expect(out.totalCost).toBe(1_000_000);
    expect(out.totalGain).toBeCloseTo(38_600_000, 3);
    expect(out.netGain).toBe(out.totalGain - out.totalCost);
  });

  it("keeps cppg as the inverse of the per-person gain", () => {
    const inputs: CalculationInput[] = [
      base,
      { ...base, costPerParticipant: 12_345, deltaMathSd: 0.42 },
      { ...base, deltaGradRatePp: 0, deltaCollegeEnrollPp: 0.5, fadeoutFactor: 0.9 },
    ];
    for (const input of inputs) {
      const out = expectOk(computeProsperity(input));
      expect(out.cppg * out.totalGainPerPerson).toBeCloseTo(input.costPerParticipant, 8);
      if (!out.roi.defined) throw new Error("roi should be defined for a paid program");
      expect(out.roi.value).toBeCloseTo(1 / out.cppg, 8);
    }
  });

  it("does not lower the total gain when an effect size grows", () => {
    const start = computeGains(base).totalGainPerPerson;
    const bumps: Array<Partial<CalculationInput>> = [
      { deltaMathSd: base.deltaMathSd + 0.05 },
      { deltaGradRatePp: base.deltaGradRatePp + 1 },
      { deltaCollegeEnrollPp: base.deltaCollegeEnrollPp + 1 },
    ];
    for (const bump of bumps) {
      expect(computeGains({ ...base, ...bump }).totalGainPerPerson).toBeGreaterThanOrEqual(start);
    }
  });

  it("zeroes the math gain at full fade-out", () => {
    const gains = computeGains({ ...base, fadeoutFactor: 1, deltaMathSd: 2.5, mathGainPerSd: 123_456 });
    expect(gains.gainFromMath).toBe(0);
  });

  it("reports an undefined ratio when every delta is zero", () => {
    const result = computeProsperity({
      ...base,
      deltaMathSd: 0,
      deltaGradRatePp: 0,
      deltaCollegeEnrollPp: 0,
    });

    expect(result).toEqual({
      ok: false,
      error: { kind: "UndefinedRatio", denominator: "totalGainPerPerson", value: 0 },
      gains: { gainFromMath: 0, gainFromGradRate: 0, gainFromCollege: 0, totalGainPerPerson: 0 },
    });
  });

  it("keeps the gain breakdown when the total is negative", () => {
    const result = computeProsperity({ ...base, deltaMathSd: -1, deltaGradRatePp: 0, deltaCollegeEnrollPp: 0 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.denominator).toBe("totalGainPerPerson");
    expect(result.error.value).toBeCloseTo(-56000, 6);
    expect(result.gains.gainFromMath).toBeCloseTo(-56000, 6);
  });

  it("divides cppg by the scenario multiplier", () => {
    for (const m of [0.5, 0.8, 1.2, 1.5]) {
      const out = expectOk(computeProsperity({ ...base, scenarioMultiplier: m }));
      if (!out.adjustedCppg.defined) throw new Error("adjusted cppg should be defined");
      expect(out.adjustedGainPerPerson).toBeCloseTo(out.totalGainPerPerson * m, 6);
      expect(out.adjustedCppg.value).toBeCloseTo(out.cppg / m, 10);
    }
  });

  it("leaves adjusted cppg undefined for a non-positive multiplier", () => {
    const out = expectOk(computeProsperity({ ...base, scenarioMultiplier: 0 }));

    expect(out.adjustedCppg).toEqual({
      defined: false,
      error: { kind: "UndefinedRatio", denominator: "adjustedGainPerPerson", value: 0 },
    });
  });

  it("leaves roi undefined for a free program", () => {
    const out = expectOk(computeProsperity({ ...base, costPerParticipant: 0 }));

    expect(out.cppg).toBe(0);
    expect(out.roi).toEqual({
      defined: false,
      error: { kind: "UndefinedRatio", denominator: "cppg", value: 0 },
    });
    expect(out.totalCost).toBe(0);
  });

  it("ignores the discount rate", () => {
    const a = computeProsperity(base);
    const b = computeProsperity({ ...base, discountRate: 0.5 });
    expect(b).toEqual(a);
  });
});
