import fontData from './font.json';

// Built-in hex digit sprites 0-F, 4 pixels wide in the high nibble of each row.
export const FONT_BASE = 0x050;
export const FONT_GLYPH_HEIGHT = fontData.glyphHeight;

function flatten(glyphs: number[][]): Uint8Array {
  if (glyphs.length !== 16) throw new Error(`font.json: expected 16 glyphs, got ${glyphs.length}`);
  const out = new Uint8Array(16 * FONT_GLYPH_HEIGHT);
  glyphs.forEach((rows, digit) => {
    if (rows.length !== FONT_GLYPH_HEIGHT) throw new Error(`font.json: glyph ${digit.toString(16)} has ${rows.length} rows`);
    rows.forEach((row, i) => { out[digit * FONT_GLYPH_HEIGHT + i] = row & 0xff; });
  });
  return out;
}

export const FONT: Uint8Array = flatten(fontData.glyphs);

export function fontAddress(digit: number): number {
  return FONT_BASE + (digit & 0xf) * FONT_GLYPH_HEIGHT;
}
