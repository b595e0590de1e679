import type { Ratio, RatioDenominator } from "@/engine/types";

/* ------------ Format helpers ------------ */
const currencyFormats = new Map<number, Intl.NumberFormat>();

export function money(n: number, digits = 0): string {
  let f = currencyFormats.get(digits);
  if (!f) {
    f = new Intl.NumberFormat("en-US", {
      style: "currency",
      currency: "USD",
      minimumFractionDigits: digits,
      maximumFractionDigits: digits,
    });
    currencyFormats.set(digits, f);
  }
  return f.format(n);
}

const multipleFmt = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 1,
  maximumFractionDigits: 1,
});
export const multiple = (n: number) => `${multipleFmt.format(n)}×`;

const UNDEFINED_TEXT: Record<RatioDenominator, string> = {
  totalGainPerPerson: "Undefined: total gain is zero or negative",
  adjustedGainPerPerson: "Undefined: adjusted gain is zero or negative",
  cppg: "Undefined: program cost is zero",
};

export function ratioText(r: Ratio, fmt: (n: number) => string): string {
  return r.defined ? fmt(r.value) : UNDEFINED_TEXT[r.error.denominator];
}
