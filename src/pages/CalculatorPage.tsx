import { useMemo, useState } from "react";
import AssumptionsPanel from "@/components/AssumptionsPanel";
import InterventionInputs from "@/components/InterventionInputs";
import ResultsPanel from "@/components/ResultsPanel";
import { Section } from "@/components/fields";
import { DEFAULT_INPUT, DEFAULT_PROFILE } from "@/engine/assumptions";
import { computeProsperity } from "@/engine/calcProsperity";
import type { CalculationInput, ProgramProfile } from "@/engine/types";

export default function CalculatorPage({
  initialInput = DEFAULT_INPUT,
  initialProfile = DEFAULT_PROFILE,
}: {
  initialInput?: CalculationInput;
  initialProfile?: ProgramProfile;
}) {
  const [input, setInput] = useState<CalculationInput>(initialInput);
  const [profile, setProfile] = useState<ProgramProfile>(initialProfile);

  // Every edit recomputes the whole output
  const result = useMemo(() => computeProsperity(input), [input]);

  const setInputField = (key: keyof CalculationInput, value: number) =>
    setInput((prev) => ({ ...prev, [key]: value }));
  const setProfileField = (key: keyof ProgramProfile, value: number) =>
    setProfile((prev) => ({ ...prev, [key]: value }));

  return (
    <>
      <Section title="1️⃣ Intervention Inputs">
        <InterventionInputs
          input={input}
          profile={profile}
          onInputChange={setInputField}
          onProfileChange={setProfileField}
        />
      </Section>

      <AssumptionsPanel input={input} onInputChange={setInputField} />

      <Section title="📊 Results">
        <ResultsPanel
          result={result}
          population={input.population}
          profile={profile}
          scenarioMultiplier={input.scenarioMultiplier}
          onScenarioMultiplierChange={(m) => setInputField("scenarioMultiplier", m)}
        />
      </Section>
    </>
  );
}
