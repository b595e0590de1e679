import { INPUT_FIELDS, fractionToPercent, percentToFraction } from "@/engine/assumptions";
import type { CalculationInput } from "@/engine/types";
import { NumberInput, SliderInput } from "./fields";

type Props = {
  input: CalculationInput;
  onInputChange: (key: keyof CalculationInput, value: number) => void;
};

/**
 * Conversion factors from proximate metrics to lifetime earnings.
 * Collapsed by default; most users only touch the effect sizes.
 */
export default function AssumptionsPanel({ input, onInputChange }: Props) {
  return (
    <details className="card assumptions">
      <summary>⚙️ Assumptions for Converting Proximate Metrics to Lifetime Prosperity</summary>
      <p className="hint">
        Adjust the conversion factors and discounting assumptions as new research becomes available.
      </p>

      {/* Widget works in %, the input record holds a fraction */}
      <NumberInput
        field={INPUT_FIELDS.discountRate}
        value={fractionToPercent(input.discountRate)}
        onChange={(pct) => onInputChange("discountRate", percentToFraction(pct))}
      />

      <h3>Conversion Factors (per participant, present-value dollars)</h3>
      <NumberInput
        field={INPUT_FIELDS.mathGainPerSd}
        value={input.mathGainPerSd}
        onChange={(v) => onInputChange("mathGainPerSd", v)}
      />
      <NumberInput
        field={INPUT_FIELDS.earningsGainHsVsDropout}
        value={input.earningsGainHsVsDropout}
        onChange={(v) => onInputChange("earningsGainHsVsDropout", v)}
      />
      <NumberInput
        field={INPUT_FIELDS.earningsGainCollegeVsHs}
        value={input.earningsGainCollegeVsHs}
        onChange={(v) => onInputChange("earningsGainCollegeVsHs", v)}
      />
      <SliderInput
        field={INPUT_FIELDS.fadeoutFactor}
        value={input.fadeoutFactor}
        onChange={(v) => onInputChange("fadeoutFactor", v)}
        format={(v) => v.toFixed(2)}
      />
    </details>
  );
}
