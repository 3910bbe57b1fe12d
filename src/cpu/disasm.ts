import { disassemble } from './opcodes';
import { PROGRAM_START } from '../memory/memory';

const hex = (v: number, w: number) => v.toString(16).toUpperCase().padStart(w, '0');

// "ADDR: WORD  MNEMONIC" for each aligned word; a trailing odd byte prints as DB.
export function disassembleRom(rom: Uint8Array, origin = PROGRAM_START): string[] {
  const lines: string[] = [];
  for (let off = 0; off < rom.length; off += 2) {
    const addr = origin + off;
    if (off + 1 >= rom.length) {
      lines.push(`${hex(addr, 3)}: ${hex(rom[off], 2)}    DB 0x${hex(rom[off], 2)}`);
      break;
    }
    const word = (rom[off] << 8) | rom[off + 1];
    lines.push(`${hex(addr, 3)}: ${hex(word, 4)}  ${disassemble(word)}`);
  }
  return lines;
}
