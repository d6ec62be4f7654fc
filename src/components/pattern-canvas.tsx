import React, { useRef, useEffect } from "react";
import { createPatternRenderer } from "../rendering/pattern-renderer";
import type { Renderer } from "../rendering/renderer-interface";
import { computePattern, PatternRequest } from "../simulation/pattern";
import type { IntensityField } from "../simulation/intensity-field";
import { summarizePattern } from "../utils/field-utils";
import type { PatternSummary } from "../types/field-types";

interface Props {
  width: number;
  height: number;
  request: PatternRequest;
  onSummary?: (summary: PatternSummary) => void;
}

export const PatternCanvas: React.FC<Props> = ({ width, height, request, onSummary }) => {
  const containerRef = useRef<HTMLDivElement>(null);
  const rendererRef = useRef<Renderer | null>(null);
  const fieldRef = useRef<IntensityField | null>(null);
  const sizeRef = useRef({ width, height });
  sizeRef.current = { width, height };
  const onSummaryRef = useRef(onSummary);
  onSummaryRef.current = onSummary;

  function draw(): void {
    const renderer = rendererRef.current;
    const field = fieldRef.current;
    if (!renderer || !field) return;
    renderer.update(field, sizeRef.current);
  }

  // Create the renderer once; destroy on unmount.
  useEffect(() => {
    const container = containerRef.current;
    if (!container) return;

    let destroyed = false;
    const canvas = document.createElement("canvas");
    container.appendChild(canvas);

    createPatternRenderer(canvas, sizeRef.current.width, sizeRef.current.height)
      .then((renderer) => {
        if (destroyed) {
          renderer.destroy();
          return;
        }
        rendererRef.current = renderer;
        draw();
      })
      .catch((err) => {
        console.error("Failed to initialize renderer:", err);
      });

    return () => {
      destroyed = true;
      rendererRef.current?.destroy();
      rendererRef.current = null;

      // Remove any child canvases from the container
      while (container.firstChild) {
        container.removeChild(container.firstChild);
      }
    };
  // eslint-disable-next-line react-hooks/exhaustive-deps
  }, []);

  // Recompute the field whenever the request changes
  useEffect(() => {
    try {
      const field = computePattern(request);
      fieldRef.current = field;
      onSummaryRef.current?.(summarizePattern(request, field));
      draw();
    } catch (err) {
      console.error("Failed to compute pattern:", err);
    }
  // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [request]);

  // Resize the renderer when dimensions change (no destroy/recreate)
  useEffect(() => {
    rendererRef.current?.resize(width, height);
    draw();
  // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [width, height]);

  return <div ref={containerRef} />;
};
