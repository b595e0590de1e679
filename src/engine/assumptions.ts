// src/engine/assumptions.ts

/**
 * Default inputs and widget ranges for the CPPG form.
 * - Conversion factors are present-value lifetime earnings per participant
 * - Ranges mirror the form widgets; the calculator itself never clamps
 * - Update the factors as new meta-analyses come out
 */

import type { CalculationInput, ProgramProfile } from "./types";

export type FieldSpec = {
  label: string;
  step: number;
  min?: number;
  max?: number;
  integer?: boolean;
  help?: string;
};

// ===== Defaults =====
export const DEFAULT_INPUT: CalculationInput = {
  costPerParticipant: 1_000,
  population: 1_000,

  deltaMathSd: 0.1,
  deltaGradRatePp: 5,
  deltaCollegeEnrollPp: 3,

  discountRate: 0.03,          // 3% real, annual
  mathGainPerSd: 80_000,
  earningsGainHsVsDropout: 300_000,
  earningsGainCollegeVsHs: 600_000,
  fadeoutFactor: 0.3,          // 30% of the test-score gain fades

  scenarioMultiplier: 1.0,
};

export const DEFAULT_PROFILE: ProgramProfile = {
  targetAge: 16,
  avgMotivation: 3,
  engagementHoursPerWeek: 5,
  persistenceMonths: 6,
};

// ===== Widget ranges =====
export const INPUT_FIELDS: Record<keyof CalculationInput, FieldSpec> = {
  costPerParticipant: { label: "Cost per participant ($)", min: 0, step: 100 },
  population: {
    label: "Number of participants served (within 2 years)",
    min: 1,
    step: 100,
    integer: true,
  },

  deltaMathSd: { label: "Δ Math score (SD)", step: 0.05 },
  deltaGradRatePp: { label: "Δ HS graduation rate (pct points)", step: 1 },
  deltaCollegeEnrollPp: { label: "Δ College enrollment (pct points)", step: 1 },

  // entered as a percentage, see percentToFraction
  discountRate: { label: "Real discount rate (%, annual)", step: 0.5 },
  mathGainPerSd: { label: "Lifetime earnings gain per 1 SD math improvement ($)", step: 10_000 },
  earningsGainHsVsDropout: { label: "Lifetime earnings gap: HS grad vs dropout ($)", step: 50_000 },
  earningsGainCollegeVsHs: { label: "Lifetime earnings gap: Bachelor's degree vs HS ($)", step: 50_000 },
  fadeoutFactor: {
    label: "Fade-out factor for test-score impacts (0=no fade, 1=full fade)",
    min: 0,
    max: 1,
    step: 0.05,
    help:
      "Fade-out reduces the earnings gain from test-score improvements. " +
      "A value of 0.3 means 30% of the initial gain fades over time.",
  },

  scenarioMultiplier: {
    label: "Effect size multiplier for scenario analysis",
    min: 0.5,
    max: 1.5,
    step: 0.1,
  },
};

export const PROFILE_FIELDS: Record<keyof ProgramProfile, FieldSpec> = {
  targetAge: { label: "Target age of participants", min: 0, max: 65, step: 1, integer: true },
  avgMotivation: { label: "Average motivation (1=low, 5=high)", min: 1, max: 5, step: 1, integer: true },
  engagementHoursPerWeek: { label: "Average engagement (hrs/week)", min: 0, max: 40, step: 0.5 },
  persistenceMonths: { label: "Average months of persistence", min: 0, max: 48, step: 1, integer: true },
};

/** ---------- helpers ---------- */

/** Bounds a raw widget value to the field's range; NaN falls back to min (or 0). */
export function clampToField(field: FieldSpec, raw: number): number {
  if (!Number.isFinite(raw)) return field.min ?? 0;
  let v = raw;
  if (field.min !== undefined) v = Math.max(field.min, v);
  if (field.max !== undefined) v = Math.min(field.max, v);
  return field.integer ? Math.round(v) : v;
}

export const percentToFraction = (pct: number) => pct / 100;
export const fractionToPercent = (fraction: number) => fraction * 100;
