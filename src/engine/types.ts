// Shared input for the calculator (all plain numbers, supplied by the form)
export type CalculationInput = {
  costPerParticipant: number;      // $ per participant, >= 0
  population: number;              // participants served, integer >= 1
  deltaMathSd: number;             // effect size in SD
  deltaGradRatePp: number;         // pct points (0–100 scale)
  deltaCollegeEnrollPp: number;    // pct points (0–100 scale)
  discountRate: number;            // fraction, collected but not applied
  mathGainPerSd: number;           // $ lifetime earnings per 1 SD math
  earningsGainHsVsDropout: number; // $ HS grad vs dropout
  earningsGainCollegeVsHs: number; // $ bachelor's vs HS
  fadeoutFactor: number;           // 0 = no fade, 1 = full fade
  scenarioMultiplier: number;      // sensitivity scalar on gains
};

// Descriptive program fields; shown back to the user, never used in the math
export type ProgramProfile = {
  targetAge: number;
  avgMotivation: number;           // 1 = low, 5 = high
  engagementHoursPerWeek: number;
  persistenceMonths: number;
};

export type GainBreakdown = {
  gainFromMath: number;
  gainFromGradRate: number;
  gainFromCollege: number;
  totalGainPerPerson: number;
};

// Quantity whose non-positive value made a ratio meaningless
export type RatioDenominator = "totalGainPerPerson" | "adjustedGainPerPerson" | "cppg";

export type UndefinedRatio = {
  kind: "UndefinedRatio";
  denominator: RatioDenominator;
  value: number;
};

export type Ratio =
  | { defined: true; value: number }
  | { defined: false; error: UndefinedRatio };

export type CalculationOutput = GainBreakdown & {
  cppg: number;
  roi: Ratio;

  // cohort totals (× population)
  totalCost: number;
  totalGain: number;
  netGain: number;

  // scenario analysis
  adjustedGainPerPerson: number;
  adjustedCppg: Ratio;
};

export type CalcResult =
  | { ok: true; output: CalculationOutput }
  | { ok: false; error: UndefinedRatio; gains: GainBreakdown };
