import type { IFrameSource } from '../emulator/types';

export const DISPLAY_WIDTH = 64;
export const DISPLAY_HEIGHT = 32;

export type EdgeMode = 'clip' | 'wrap';

// 64x32 monochrome frame buffer, one byte per cell (0 = off, 1 = on).
export class Display implements IFrameSource {
  readonly width = DISPLAY_WIDTH;
  readonly height = DISPLAY_HEIGHT;
  private readonly cells = new Uint8Array(DISPLAY_WIDTH * DISPLAY_HEIGHT);

  clear(): void {
    this.cells.fill(0);
  }

  getPixel(x: number, y: number): boolean {
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) return false;
    return this.cells[y * this.width + x] === 1;
  }

  // Direct cell access for hosts and tests; opcodes go through drawSprite/clear.
  setPixel(x: number, y: number, on: boolean): void {
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) return;
    this.cells[y * this.width + x] = on ? 1 : 0;
  }

  fill(on: boolean): void {
    this.cells.fill(on ? 1 : 0);
  }

  /**
   * XOR an 8-pixel-wide sprite onto the buffer. The start coordinate always
   * wraps; pixels running past the right or bottom edge are dropped in 'clip'
   * mode and wrap around in 'wrap' mode.
   *
   * @param rows one byte per sprite row, MSB is the leftmost pixel
   * @returns true if any lit cell was turned off
   */
  drawSprite(x: number, y: number, rows: ArrayLike<number>, edge: EdgeMode = 'clip'): boolean {
    const x0 = x % this.width;
    const y0 = y % this.height;
    let collision = false;
    for (let r = 0; r < rows.length; r++) {
      let py = y0 + r;
      if (py >= this.height) {
        if (edge === 'clip') break;
        py %= this.height;
      }
      const bits = rows[r] & 0xff;
      for (let c = 0; c < 8; c++) {
        if (((bits >> (7 - c)) & 1) === 0) continue;
        let px = x0 + c;
        if (px >= this.width) {
          if (edge === 'clip') break;
          px %= this.width;
        }
        const idx = py * this.width + px;
        if (this.cells[idx] === 1) collision = true;
        this.cells[idx] ^= 1;
      }
    }
    return collision;
  }

  litCount(): number {
    let n = 0;
    for (let i = 0; i < this.cells.length; i++) n += this.cells[i];
    return n;
  }

  snapshot(): Uint8Array {
    return this.cells.slice();
  }
}
