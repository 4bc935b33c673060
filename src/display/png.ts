import fs from 'fs';
import { PNG } from 'pngjs';
import type { FrameView } from './framebuffer';
import { renderRGBA, type RenderOptions } from './render';

export function encodePng(fb: FrameView, opts: RenderOptions = {}): Buffer {
  const rgba = renderRGBA(fb, opts);
  const png = new PNG({ width: rgba.width, height: rgba.height });
  Buffer.from(rgba.data.buffer, rgba.data.byteOffset, rgba.data.byteLength).copy(png.data);
  return PNG.sync.write(png);
}

export function writePng(fb: FrameView, outPath: string, opts: RenderOptions = {}): void {
  fs.writeFileSync(outPath, encodePng(fb, opts));
}
