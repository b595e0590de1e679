import { INPUT_FIELDS, PROFILE_FIELDS } from "@/engine/assumptions";
import type { CalculationInput, ProgramProfile } from "@/engine/types";
import { NumberInput, SliderInput } from "./fields";

type Props = {
  input: CalculationInput;
  profile: ProgramProfile;
  onInputChange: (key: keyof CalculationInput, value: number) => void;
  onProfileChange: (key: keyof ProgramProfile, value: number) => void;
};

export default function InterventionInputs({ input, profile, onInputChange, onProfileChange }: Props) {
  const slider = (key: keyof ProgramProfile) => (
    <SliderInput
      field={PROFILE_FIELDS[key]}
      value={profile[key]}
      onChange={(v) => onProfileChange(key, v)}
    />
  );

  return (
    <>
      <div className="grid">
        <div>
          <NumberInput
            field={INPUT_FIELDS.costPerParticipant}
            value={input.costPerParticipant}
            onChange={(v) => onInputChange("costPerParticipant", v)}
          />
          <NumberInput
            field={INPUT_FIELDS.population}
            value={input.population}
            onChange={(v) => onInputChange("population", v)}
          />
          {slider("targetAge")}
        </div>
        <div>
          {slider("avgMotivation")}
          {slider("engagementHoursPerWeek")}
          {slider("persistenceMonths")}
        </div>
      </div>

      <h3>Proximate Impact Metrics</h3>
      <p className="hint">
        Enter effect sizes <strong>per participant</strong> (in absolute terms):
      </p>
      <div className="grid grid-3">
        {(["deltaMathSd", "deltaGradRatePp", "deltaCollegeEnrollPp"] as const).map((key) => (
          <NumberInput
            key={key}
            field={INPUT_FIELDS[key]}
            value={input[key]}
            onChange={(v) => onInputChange(key, v)}
          />
        ))}
      </div>
    </>
  );
}
