import CalculatorPage from "./pages/CalculatorPage";
import "./styles.css";

export default function App() {
  return (
    <div className="container">
      <div style={{ display: "flex", justifyContent: "space-between", alignItems: "center", marginBottom: 12 }}>
        <h1>📈 Cost per Prosperity Unit (CPPG) Calculator</h1>
        <span className="badge">Prototype</span>
      </div>
      <p>
        Estimate the <strong>cost per prosperity unit (CPPG)</strong> for an education or workforce
        intervention. A <em>prosperity unit</em> here is defined as{" "}
        <strong>one dollar of present-value lifetime earnings gained</strong>. Lower CPPG values = better
        cost-effectiveness.
      </p>

      <CalculatorPage />

      <hr />
      <div className="hint">
        Prototype created for illustrative purposes. Update assumptions with the latest meta-analyses to
        improve accuracy.
      </div>
    </div>
  );
}
