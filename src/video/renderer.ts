import type { IFrameSource } from '../emulator/types';
import type { RGB } from '../config/options';

export interface Palette {
  foreground: RGB;
  background: RGB;
}

/**
 * Expand the 1-bit frame into RGBA, each cell becoming a scale x scale block.
 * Output is (width*scale) x (height*scale) pixels, 4 bytes per pixel, row-major.
 */
export function renderFrameRGBA(frame: IFrameSource, palette: Palette, scale = 1): Uint8Array {
  const s = Math.max(1, scale | 0);
  const outW = frame.width * s;
  const outH = frame.height * s;
  const out = new Uint8Array(outW * outH * 4);
  for (let py = 0; py < outH; py++) {
    const cy = Math.floor(py / s);
    for (let px = 0; px < outW; px++) {
      const c = frame.getPixel(Math.floor(px / s), cy) ? palette.foreground : palette.background;
      const o = (py * outW + px) * 4;
      out[o] = c.r;
      out[o + 1] = c.g;
      out[o + 2] = c.b;
      out[o + 3] = 255;
    }
  }
  return out;
}

// One text line per row: on = '#', off = '.'
export function renderFrameAscii(frame: IFrameSource, on = '#', off = '.'): string {
  const lines: string[] = [];
  for (let y = 0; y < frame.height; y++) {
    let line = '';
    for (let x = 0; x < frame.width; x++) line += frame.getPixel(x, y) ? on : off;
    lines.push(line);
  }
  return lines.join('\n');
}

// Two rows per character cell using half blocks, for terminals.
export function renderFrameHalfBlocks(frame: IFrameSource): string {
  const lines: string[] = [];
  for (let y = 0; y < frame.height; y += 2) {
    let line = '';
    for (let x = 0; x < frame.width; x++) {
      const top = frame.getPixel(x, y);
      const bottom = frame.getPixel(x, y + 1);
      line += top && bottom ? '█' : top ? '▀' : bottom ? '▄' : ' ';
    }
    lines.push(line);
  }
  return lines.join('\n');
}
