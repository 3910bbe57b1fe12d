import fs from 'fs';
import { CapacityError } from '../emulator/errors';
import { PROGRAM_CAPACITY } from '../memory/memory';

// A ROM is the raw program image: no header, every byte lands at 0x200 onward.
export function validateRom(rom: Uint8Array): Uint8Array {
  if (rom.length > PROGRAM_CAPACITY) throw new CapacityError(rom.length, PROGRAM_CAPACITY);
  return rom;
}

export function loadRomFile(path: string): Uint8Array {
  const raw = fs.readFileSync(path);
  return validateRom(new Uint8Array(raw.buffer, raw.byteOffset, raw.byteLength));
}
