import fs from 'fs';
import { PNG } from 'pngjs';
import type { IFrameSource } from '../emulator/types';
import { renderFrameRGBA, type Palette } from './renderer';

export function encodeFramePNG(frame: IFrameSource, palette: Palette, scale = 1): Buffer {
  const s = Math.max(1, scale | 0);
  const png = new PNG({ width: frame.width * s, height: frame.height * s });
  const rgba = renderFrameRGBA(frame, palette, s);
  Buffer.from(rgba.buffer, rgba.byteOffset, rgba.byteLength).copy(png.data);
  return PNG.sync.write(png);
}

export async function writeFramePNG(path: string, frame: IFrameSource, palette: Palette, scale = 1): Promise<void> {
  await fs.promises.writeFile(path, encodeFramePNG(frame, palette, scale));
}
