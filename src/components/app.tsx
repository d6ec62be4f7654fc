import React, { useState, useEffect, useRef, useCallback, useMemo } from "react";
import { PatternCanvas } from "./pattern-canvas";
import { PhysicsNotes, PATTERN_NOTES } from "./physics-notes";
import type { PatternMode, PatternRequest } from "../simulation/pattern";
import type { PatternSummary } from "../types/field-types";
import { plotLayout } from "../rendering/plot-layout";
import {
  WAVELENGTH_RANGE, SLIT_WIDTH_RANGE, SLIT_SEPARATION_RANGE, SCREEN_DISTANCE_RANGE,
  DEFAULT_GRID_SIZE, GRID_SIZE_OPTIONS, AXIS_TICKS, COLOR_SCALE_STOPS, ParamRange,
} from "../constants";
import { hotToColor, hexColor } from "../utils/color-utils";
import { clampToRange, formatParam } from "../utils/param-utils";

import "./app.scss";

function isPatternMode(value: string): value is PatternMode {
  return value === "single-slit" || value === "double-slit";
}

function formatMicrons(value: number | null): string {
  return value === null ? "—" : `${value.toFixed(0)} µm`;
}

interface SliderProps {
  label: string;
  unit: string;
  range: ParamRange;
  value: number;
  testId: string;
  onChange: (value: number) => void;
}

const ParamSlider: React.FC<SliderProps> = ({ label, unit, range, value, testId, onChange }) => (
  <label>
    {label}: {formatParam(value, range, unit)}
    <input type="range" min={range.min} max={range.max} step={range.step} value={value}
      data-testid={testId}
      onChange={e => onChange(clampToRange(Number(e.target.value), range))} />
  </label>
);

export const App = () => {
  const [mode, setMode] = useState<PatternMode>("single-slit");
  const [wavelength, setWavelength] = useState(WAVELENGTH_RANGE.defaultValue);
  const [slitWidth, setSlitWidth] = useState(SLIT_WIDTH_RANGE.defaultValue);
  const [slitSeparation, setSlitSeparation] = useState(SLIT_SEPARATION_RANGE.defaultValue);
  const [screenDistance, setScreenDistance] = useState(SCREEN_DISTANCE_RANGE.defaultValue);
  const [gridSize, setGridSize] = useState(DEFAULT_GRID_SIZE);
  const [summary, setSummary] = useState<PatternSummary | null>(null);

  const controlsRef = useRef<HTMLDivElement>(null);
  const [canvasSize, setCanvasSize] = useState({ width: 800, height: 600 });

  const updateCanvasSize = useCallback(() => {
    const controlsHeight = controlsRef.current?.offsetHeight ?? 0;
    setCanvasSize({
      width: Math.round(window.innerWidth * 2 / 3),
      height: window.innerHeight - controlsHeight,
    });
  }, []);

  useEffect(() => {
    updateCanvasSize();
    window.addEventListener("resize", updateCanvasSize);
    return () => window.removeEventListener("resize", updateCanvasSize);
  }, [updateCanvasSize]);

  const request = useMemo<PatternRequest>(() => (
    mode === "single-slit"
      ? { mode, wavelengthNm: wavelength, slitWidthUm: slitWidth, screenDistanceMm: screenDistance, gridSize }
      : { mode, wavelengthNm: wavelength, slitSeparationUm: slitSeparation, screenDistanceMm: screenDistance, gridSize }
  ), [mode, wavelength, slitWidth, slitSeparation, screenDistance, gridSize]);

  const notes = PATTERN_NOTES[mode];
  const layout = plotLayout(canvasSize.width, canvasSize.height);

  // Color scale bar gradient, top = brightest
  const colorScaleStops: string[] = [];
  for (let i = 0; i < COLOR_SCALE_STOPS; i++) {
    const frac = 1 - i / (COLOR_SCALE_STOPS - 1);
    colorScaleStops.push(hexColor(hotToColor(frac)));
  }
  const gradient = `linear-gradient(to bottom, ${colorScaleStops.join(", ")})`;

  // Tick positions in CSS pixels; tick -1 sits at the left / bottom edge of the plot
  const tickOffset = (t: number) => (t + 1) / 2 * layout.plotSize;

  return (
    <div className="app">
      <div className="controls" ref={controlsRef}>
        <label>
          Pattern:
          <select value={mode} data-testid="mode-select"
            onChange={e => { if (isPatternMode(e.target.value)) setMode(e.target.value); }}>
            <option value="single-slit">Single Slit Diffraction</option>
            <option value="double-slit">Double Slit Interference</option>
          </select>
        </label>
        <ParamSlider label="Wavelength" unit="nm" range={WAVELENGTH_RANGE} value={wavelength}
          testId="wavelength-slider" onChange={setWavelength} />
        {mode === "single-slit"
          ? <ParamSlider label="Slit width (a)" unit={"µm"} range={SLIT_WIDTH_RANGE} value={slitWidth}
              testId="slit-width-slider" onChange={setSlitWidth} />
          : <ParamSlider label="Slit separation (d)" unit={"µm"} range={SLIT_SEPARATION_RANGE}
              value={slitSeparation} testId="slit-separation-slider" onChange={setSlitSeparation} />}
        <ParamSlider label="Screen distance (L)" unit="mm" range={SCREEN_DISTANCE_RANGE} value={screenDistance}
          testId="screen-distance-slider" onChange={setScreenDistance} />
        <label>
          Resolution:
          <select value={gridSize} onChange={e => setGridSize(Number(e.target.value))}>
            {GRID_SIZE_OPTIONS.map(n => <option key={n} value={n}>{n} &times; {n}</option>)}
          </select>
        </label>
      </div>
      <div className="workspace">
        <div className="canvas-container">
          <PatternCanvas
            width={canvasSize.width}
            height={canvasSize.height}
            request={request}
            onSummary={setSummary}
          />
          <div className="plot-title" style={{ left: layout.plotLeft, width: layout.plotSize }}>
            <div>{notes.title}</div>
            <div className="plot-subtitle">&lambda; = {wavelength} nm</div>
          </div>
          {/* Axis labels in normalized screen units */}
          <div className="axis-labels">
            {AXIS_TICKS.map(t => (
              <div key={`x${t}`} className="x-tick"
                style={{ left: layout.plotLeft + tickOffset(t), top: layout.plotTop + layout.plotSize }}>
                {t}
              </div>
            ))}
            {AXIS_TICKS.map(t => (
              <div key={`y${t}`} className="y-tick"
                style={{ left: layout.plotLeft, top: layout.plotTop + layout.plotSize - tickOffset(t) }}>
                {t}
              </div>
            ))}
            <div className="axis-title">Position (normalized)</div>
          </div>
          {/* Color scale bar */}
          <div className="color-scale"
            style={{ top: layout.plotTop, height: layout.plotSize, left: layout.plotLeft + layout.plotSize + 12 }}>
            <div className="color-scale-max-label">1.0</div>
            <div className="color-scale-bar" style={{ background: gradient }} />
            <div className="color-scale-min-label">0.0</div>
            <div className="color-scale-title">Normalized Intensity</div>
          </div>
        </div>
        <div className="side-panel">
          <div className="description">{notes.description}</div>
          <h3>Current Settings</h3>
          <dl className="settings">
            <dt>Wavelength</dt>
            <dd>{formatParam(wavelength, WAVELENGTH_RANGE, "nm")}</dd>
            {mode === "single-slit" ? (
              <>
                <dt>Slit Width</dt>
                <dd>{formatParam(slitWidth, SLIT_WIDTH_RANGE, "µm")}</dd>
                <dt>Central max half-width</dt>
                <dd>{formatMicrons(summary?.centralHalfWidthUm ?? null)}</dd>
              </>
            ) : (
              <>
                <dt>Slit Separation</dt>
                <dd>{formatParam(slitSeparation, SLIT_SEPARATION_RANGE, "µm")}</dd>
                <dt>Fringe spacing</dt>
                <dd>{formatMicrons(summary?.fringeSpacingUm ?? null)}</dd>
              </>
            )}
            <dt>Screen Distance</dt>
            <dd>{formatParam(screenDistance, SCREEN_DISTANCE_RANGE, "mm")}</dd>
          </dl>
          <PhysicsNotes mode={mode} />
        </div>
      </div>
    </div>
  );
};
