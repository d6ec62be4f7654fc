import { Application, BufferImageSource, Sprite, Texture } from "pixi.js";
import { BACKGROUND_COLOR } from "../constants";
import { fieldToRGBA } from "../utils/color-utils";
import type { IField } from "../types/field-types";
import { plotLayout } from "./plot-layout";
import type { Renderer, RendererOptions } from "./renderer-interface";

export async function createPatternRenderer(canvas: HTMLCanvasElement, width: number, height: number):
    Promise<Renderer> {
  const app = new Application();
  await app.init({ canvas, width, height, background: BACKGROUND_COLOR });
  app.ticker.stop();

  const sprite = new Sprite();
  app.stage.addChild(sprite);

  // Texture is rebuilt only when the field resolution changes; otherwise the
  // pixel buffer is rewritten in place and re-uploaded.
  let pixels = new Uint8Array(0);
  let source: BufferImageSource | null = null;
  let texture: Texture | null = null;
  let textureSize = 0;

  function ensureTexture(size: number): BufferImageSource {
    if (source && textureSize === size) return source;

    texture?.destroy(true);
    pixels = new Uint8Array(size * size * 4);
    source = new BufferImageSource({
      resource: pixels,
      width: size,
      height: size,
      format: "rgba8unorm",
    });
    texture = new Texture({ source });
    sprite.texture = texture;
    textureSize = size;
    return source;
  }

  function update(field: IField, opts: RendererOptions): void {
    const src = ensureTexture(field.size);
    fieldToRGBA(field, pixels);
    src.update();

    const layout = plotLayout(opts.width, opts.height);
    sprite.position.set(layout.plotLeft, layout.plotTop);
    sprite.width = layout.plotSize;
    sprite.height = layout.plotSize;

    app.render();
  }

  return {
    canvas,
    update,
    resize(w: number, h: number) {
      app.renderer.resize(w, h);
    },
    destroy() {
      texture?.destroy(true);
      app.destroy();
    },
  };
}
