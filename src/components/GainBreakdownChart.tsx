import { Pie } from "react-chartjs-2";
import { Chart as ChartJS, ArcElement, Tooltip, Legend } from "chart.js";
import type { GainBreakdown } from "@/engine/types";

ChartJS.register(ArcElement, Tooltip, Legend);

// Pie slices can't be negative; a negative source shows as an empty slice
export default function GainBreakdownChart({ gains }: { gains: GainBreakdown }) {
  const data = {
    labels: ["Math scores", "HS graduation", "College enrollment"],
    datasets: [
      {
        data: [
          Math.max(0, gains.gainFromMath),
          Math.max(0, gains.gainFromGradRate),
          Math.max(0, gains.gainFromCollege),
        ],
        backgroundColor: ["#60a5fa", "#34d399", "#fb7185"],
      },
    ],
  };

  return <Pie data={data} aria-label="Lifetime gain per participant by source" />;
}
