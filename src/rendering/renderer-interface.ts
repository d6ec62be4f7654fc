import type { IField } from "../types/field-types";

export interface RendererOptions {
  width: number;
  height: number;
}

export interface Renderer {
  update(field: IField, opts: RendererOptions): void;
  resize(width: number, height: number): void;
  destroy(): void;
  readonly canvas: HTMLCanvasElement;
}
