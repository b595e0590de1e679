import React, { useEffect, useState } from "react";
import { clampToField, type FieldSpec } from "@/engine/assumptions";

// "" and a lone "-" are in-progress edits, not zero
const parseDraft = (text: string) => (text.trim() === "" ? Number.NaN : Number(text));

const sameValue = (a: number, b: number) => Math.abs(a - b) <= 1e-9 * Math.max(1, Math.abs(b));

/* ------------ Small UI atoms ------------ */
export function NumberInput({
  field,
  value,
  onChange,
}: {
  field: FieldSpec;
  value: number;
  onChange: (n: number) => void;
}) {
  // Raw text while typing; only finite entries reach onChange, clamped
  const [draft, setDraft] = useState(() => String(value));

  // Follow changes that did not come from this draft
  useEffect(() => {
    setDraft((current) => {
      const n = parseDraft(current);
      return Number.isFinite(n) && sameValue(clampToField(field, n), value) ? current : String(value);
    });
  }, [field, value]);

  const handleChange = (text: string) => {
    setDraft(text);
    const n = parseDraft(text);
    if (Number.isFinite(n)) onChange(clampToField(field, n));
  };

  // Show the clamped value once editing stops
  const handleBlur = () => {
    const n = parseDraft(draft);
    if (!Number.isFinite(n) || clampToField(field, n) !== n) setDraft(String(value));
  };

  return (
    <div className="field">
      <label>
        <span className="field-label">{field.label}</span>
        <input
          type="number"
          inputMode="decimal"
          value={draft}
          step={field.step}
          min={field.min}
          max={field.max}
          onChange={(e) => handleChange(e.target.value)}
          onBlur={handleBlur}
        />
      </label>
      {field.help && <div className="hint">{field.help}</div>}
    </div>
  );
}

export function SliderInput({
  field,
  value,
  onChange,
  format = (n) => String(n),
}: {
  field: FieldSpec;
  value: number;
  onChange: (n: number) => void;
  format?: (n: number) => string;
}) {
  return (
    <div className="field">
      <label>
        <span className="field-label">{field.label}</span>
        <input
          type="range"
          value={value}
          step={field.step}
          min={field.min}
          max={field.max}
          onChange={(e) => onChange(clampToField(field, Number(e.target.value)))}
        />
      </label>
      <div className="slider-value tabular-nums">{format(value)}</div>
      {field.help && <div className="hint">{field.help}</div>}
    </div>
  );
}

export function Row({ label, value, big }: { label: string; value: string; big?: boolean }) {
  return (
    <div className="row">
      <div className="row-label">{label}</div>
      <div className={(big ? "big " : "") + "tabular-nums"}>{value}</div>
    </div>
  );
}

export function Metric({ label, value, help }: { label: string; value: string; help?: string }) {
  return (
    <div className="metric" title={help}>
      <div className="metric-label">{label}</div>
      <div className="metric-value tabular-nums">{value}</div>
    </div>
  );
}

export function Section({ title, children }: { title: string; children: React.ReactNode }) {
  return (
    <section className="card">
      <h2>{title}</h2>
      {children}
    </section>
  );
}
