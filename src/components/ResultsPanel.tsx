import { INPUT_FIELDS } from "@/engine/assumptions";
import type { CalcResult, GainBreakdown, ProgramProfile } from "@/engine/types";
import { Metric, Row, SliderInput } from "./fields";
import { money, multiple, ratioText } from "./format";
import GainBreakdownChart from "./GainBreakdownChart";

type Props = {
  result: CalcResult;
  population: number;
  profile: ProgramProfile;
  scenarioMultiplier: number;
  onScenarioMultiplierChange: (m: number) => void;
};

export const NON_POSITIVE_GAIN_MESSAGE =
  "Total prosperity gain per participant is zero or negative. Adjust inputs.";

function GainTable({ gains }: { gains: GainBreakdown }) {
  return (
    <div className="rows">
      <Row label="Gain from math scores" value={money(gains.gainFromMath)} />
      <Row label="Gain from HS graduation" value={money(gains.gainFromGradRate)} />
      <Row label="Gain from college enrollment" value={money(gains.gainFromCollege)} />
      <Row label="Total gain per participant" value={money(gains.totalGainPerPerson)} big />
    </div>
  );
}

export default function ResultsPanel({
  result,
  population,
  profile,
  scenarioMultiplier,
  onScenarioMultiplierChange,
}: Props) {
  if (!result.ok) {
    return (
      <>
        <div className="alert" role="alert">
          {NON_POSITIVE_GAIN_MESSAGE}
        </div>
        <GainTable gains={result.gains} />
      </>
    );
  }

  const out = result.output;

  return (
    <>
      <div className="grid">
        <Metric
          label="Cost per $1 of lifetime prosperity gained (CPPG)"
          value={money(out.cppg, 2)}
          help="Lower is better. CPPG < $1 means the intervention is expected to yield net positive lifetime earnings."
        />
        <Metric
          label="Return on Investment (ROI)"
          value={ratioText(out.roi, multiple)}
          help="How many dollars of gain per dollar spent."
        />
      </div>

      <div className="grid">
        <GainTable gains={out} />
        <div className="chart">
          <GainBreakdownChart gains={out} />
        </div>
      </div>

      <h3>Cohort Totals (2-year implementation)</h3>
      <p className="hint">
        Serving {population.toLocaleString("en-US")} participants aged {profile.targetAge}, engaged{" "}
        {profile.engagementHoursPerWeek} hrs/week for {profile.persistenceMonths} months (motivation{" "}
        {profile.avgMotivation}/5).
      </p>
      <div className="rows">
        <Row label="Total program cost" value={money(out.totalCost)} />
        <Row label="Total lifetime prosperity gain" value={money(out.totalGain)} />
        <Row label="Net lifetime prosperity gain" value={money(out.netGain)} big />
      </div>

      <h3>Scenario Analysis</h3>
      <SliderInput
        field={INPUT_FIELDS.scenarioMultiplier}
        value={scenarioMultiplier}
        onChange={onScenarioMultiplierChange}
        format={multiple}
      />
      <p className="scenario">
        With a multiplier of <strong>{multiple(scenarioMultiplier)}</strong> on effect sizes, adjusted
        CPPG = <strong>{ratioText(out.adjustedCppg, (n) => money(n, 2))}</strong>.
      </p>
    </>
  );
}
