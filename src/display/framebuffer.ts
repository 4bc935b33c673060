export const SCREEN_WIDTH = 64;
export const SCREEN_HEIGHT = 32;

// What renderers may see of the display
export interface FrameView {
  readonly width: number;
  readonly height: number;
  getPixel(x: number, y: number): number;
  countLit(): number;
  snapshot(): Uint8Array;
}

// 64x32 monochrome display, one byte (0/1) per cell, row-major.
export class Framebuffer implements FrameView {
  readonly width = SCREEN_WIDTH;
  readonly height = SCREEN_HEIGHT;
  private cells = new Uint8Array(SCREEN_WIDTH * SCREEN_HEIGHT);

  clear(): void {
    this.cells.fill(0);
  }

  getPixel(x: number, y: number): number {
    if (x < 0 || y < 0 || x >= SCREEN_WIDTH || y >= SCREEN_HEIGHT) return 0;
    return this.cells[y * SCREEN_WIDTH + x];
  }

  /**
   * XOR an 8-pixel-wide sprite onto the screen with its top-left corner at (x, y).
   * Each row byte is drawn MSB first. Pixels past the right or bottom edge are
   * clipped, not wrapped.
   * @returns true when any lit pixel was turned off (collision)
   */
  drawSprite(x: number, y: number, rows: ArrayLike<number>): boolean {
    let collision = false;
    for (let row = 0; row < rows.length; row++) {
      const py = y + row;
      if (py >= SCREEN_HEIGHT) break;
      const bits = rows[row] & 0xff;
      for (let col = 0; col < 8; col++) {
        const px = x + col;
        if (px >= SCREEN_WIDTH) break;
        if ((bits & (0x80 >> col)) === 0) continue;
        const idx = py * SCREEN_WIDTH + px;
        if (this.cells[idx] === 1) collision = true;
        this.cells[idx] ^= 1;
      }
    }
    return collision;
  }

  countLit(): number {
    let c = 0;
    for (let i = 0; i < this.cells.length; i++) c += this.cells[i];
    return c;
  }

  // Read-only view for collaborators: a copy, so they cannot mutate VM state
  snapshot(): Uint8Array {
    return this.cells.slice();
  }
}
