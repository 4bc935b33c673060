import type { FrameView } from './framebuffer';

export type RGB = readonly [number, number, number];

export interface RenderOptions {
  scale?: number;
  on?: RGB;
  off?: RGB;
}

// Expand the 1-bit framebuffer to RGBA8888, `scale` device pixels per cell.
export function renderRGBA(fb: FrameView, opts: RenderOptions = {}): { width: number; height: number; data: Uint8Array } {
  const scale = Math.max(1, opts.scale ?? 1) | 0;
  const on = opts.on ?? [0xff, 0xff, 0xff];
  const off = opts.off ?? [0x00, 0x00, 0x00];
  const width = fb.width * scale;
  const height = fb.height * scale;
  const data = new Uint8Array(width * height * 4);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const c = fb.getPixel((x / scale) | 0, (y / scale) | 0) ? on : off;
      const o = (y * width + x) * 4;
      data[o] = c[0];
      data[o + 1] = c[1];
      data[o + 2] = c[2];
      data[o + 3] = 0xff;
    }
  }
  return { width, height, data };
}

// One text line per display row
export function renderText(fb: FrameView, on = '#', off = '.'): string {
  const lines: string[] = [];
  for (let y = 0; y < fb.height; y++) {
    let line = '';
    for (let x = 0; x < fb.width; x++) line += fb.getPixel(x, y) ? on : off;
    lines.push(line);
  }
  return lines.join('\n');
}

// FNV-1a 32-bit over the cell bytes, for golden-frame comparisons
export function frameHash(fb: FrameView): string {
  const cells = fb.snapshot();
  let hash = 0x811c9dc5;
  for (let i = 0; i < cells.length; i++) {
    hash ^= cells[i];
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash.toString(16).padStart(8, '0');
}
