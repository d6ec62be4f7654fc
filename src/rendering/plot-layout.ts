import { LEFT_MARGIN, RIGHT_MARGIN, BOTTOM_MARGIN } from "../constants";

export interface PlotLayout {
  plotSize: number;
  plotLeft: number;
  plotTop: number;
}

/**
 * Square plot area inside a canvas of the given size, leaving the margins
 * for axis labels and the color scale. Centred horizontally in the space left over.
 */
export function plotLayout(width: number, height: number): PlotLayout {
  const availW = Math.max(0, width - LEFT_MARGIN - RIGHT_MARGIN);
  const availH = Math.max(0, height - BOTTOM_MARGIN);
  const plotSize = Math.floor(Math.min(availW, availH));
  return {
    plotSize,
    plotLeft: LEFT_MARGIN + Math.floor((availW - plotSize) / 2),
    plotTop: Math.floor((availH - plotSize) / 2),
  };
}
