import React from "react";
import type { PatternMode } from "../simulation/pattern";

interface PatternNotes {
  title: string;
  description: string;
  formula: string;
  terms: string[];
}

export const PATTERN_NOTES: Record<PatternMode, PatternNotes> = {
  "single-slit": {
    title: "Single-Slit Diffraction Pattern",
    description:
      "Shows the diffraction pattern produced by a single slit. " +
      "The central maximum is bright with progressively weaker secondary maxima. " +
      "Narrower slits produce wider diffraction patterns.",
    formula: "I = I₀ (sin β / β)²,  β = π a sin θ / λ",
    terms: ["a = slit width", "θ ≈ y / L (small angle)", "λ = wavelength"],
  },
  "double-slit": {
    title: "Double-Slit Interference Pattern",
    description:
      "Shows the interference pattern produced by two slits. " +
      "Bright fringes occur where waves constructively interfere, " +
      "dark fringes where they destructively interfere. " +
      "Closer slits produce finer fringe spacing.",
    formula: "I = I₀ cos²(π d sin θ / λ)",
    terms: ["d = slit separation", "θ ≈ y / L (small angle)", "λ = wavelength"],
  },
};

export const PhysicsNotes: React.FC<{ mode: PatternMode }> = ({ mode }) => {
  const notes = PATTERN_NOTES[mode];
  return (
    <div className="physics-notes">
      <h3>Physics Notes</h3>
      <div className="formula">{notes.formula}</div>
      <ul>
        {notes.terms.map(term => <li key={term}>{term}</li>)}
      </ul>
    </div>
  );
};
