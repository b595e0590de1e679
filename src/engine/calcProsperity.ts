import type {
  CalcResult,
  CalculationInput,
  GainBreakdown,
  Ratio,
  RatioDenominator,
} from "./types";

/** ---------- helpers ---------- */
function undefinedRatio(denominator: RatioDenominator, value: number): Ratio {
  return { defined: false, error: { kind: "UndefinedRatio", denominator, value } };
}

function divide(numerator: number, denominator: number, name: RatioDenominator): Ratio {
  if (denominator <= 0) return undefinedRatio(name, denominator);
  return { defined: true, value: numerator / denominator };
}

/**
 * Converts the proximate effect sizes into present-value lifetime earnings
 * per participant. Terms are summed math → graduation → college.
 */
export function computeGains(input: CalculationInput): GainBreakdown {
  const gainFromMath = input.deltaMathSd * input.mathGainPerSd * (1 - input.fadeoutFactor);
  const gainFromGradRate = (input.deltaGradRatePp / 100) * input.earningsGainHsVsDropout;
  const gainFromCollege = (input.deltaCollegeEnrollPp / 100) * input.earningsGainCollegeVsHs;

  return {
    gainFromMath,
    gainFromGradRate,
    gainFromCollege,
    totalGainPerPerson: gainFromMath + gainFromGradRate + gainFromCollege,
  };
}

/** ---------- main ---------- */
export function computeProsperity(input: CalculationInput): CalcResult {
  const gains = computeGains(input);
  const total = gains.totalGainPerPerson;

  // No meaningful cost-effectiveness ratio without a positive gain
  if (total <= 0) {
    return {
      ok: false,
      error: { kind: "UndefinedRatio", denominator: "totalGainPerPerson", value: total },
      gains,
    };
  }

  const cppg = input.costPerParticipant / total;
  const roi = divide(1, cppg, "cppg"); // undefined for a free program

  const totalCost = input.costPerParticipant * input.population;
  const totalGain = total * input.population;
  const netGain = totalGain - totalCost;

  const adjustedGainPerPerson = total * input.scenarioMultiplier;
  const adjustedCppg = divide(input.costPerParticipant, adjustedGainPerPerson, "adjustedGainPerPerson");

  return {
    ok: true,
    output: {
      ...gains,
      cppg,
      roi,
      totalCost,
      totalGain,
      netGain,
      adjustedGainPerPerson,
      adjustedCppg,
    },
  };
}
