import { UnknownOpcodeError } from '../emulator/errors';

// Decoded CHIP-8 instruction. Each variant carries only the operand fields it uses:
// x/y are register indices, nn an 8-bit immediate, nnn a 12-bit address, n a 4-bit height.
export type Instruction =
  | { op: 'cls' }
  | { op: 'ret' }
  | { op: 'sys'; nnn: number }
  | { op: 'jp'; nnn: number }
  | { op: 'call'; nnn: number }
  | { op: 'se_imm'; x: number; nn: number }
  | { op: 'sne_imm'; x: number; nn: number }
  | { op: 'se_reg'; x: number; y: number }
  | { op: 'ld_imm'; x: number; nn: number }
  | { op: 'add_imm'; x: number; nn: number }
  | { op: 'ld_reg'; x: number; y: number }
  | { op: 'or'; x: number; y: number }
  | { op: 'and'; x: number; y: number }
  | { op: 'xor'; x: number; y: number }
  | { op: 'add_reg'; x: number; y: number }
  | { op: 'sub'; x: number; y: number }
  | { op: 'shr'; x: number; y: number }
  | { op: 'subn'; x: number; y: number }
  | { op: 'shl'; x: number; y: number }
  | { op: 'sne_reg'; x: number; y: number }
  | { op: 'ld_i'; nnn: number }
  | { op: 'jp_v0'; nnn: number }
  | { op: 'rnd'; x: number; nn: number }
  | { op: 'drw'; x: number; y: number; n: number }
  | { op: 'skp'; x: number }
  | { op: 'sknp'; x: number }
  | { op: 'ld_vx_dt'; x: number }
  | { op: 'ld_key'; x: number }
  | { op: 'ld_dt'; x: number }
  | { op: 'ld_st'; x: number }
  | { op: 'add_i'; x: number }
  | { op: 'ld_font'; x: number }
  | { op: 'bcd'; x: number }
  | { op: 'store'; x: number }
  | { op: 'load'; x: number };

export type Mnemonic = Instruction['op'];

const ALU_OPS = ['ld_reg', 'or', 'and', 'xor', 'add_reg', 'sub', 'shr', 'subn'] as const;

export function decode(word: number): Instruction {
  const w = word & 0xffff;
  const x = (w >> 8) & 0xf;
  const y = (w >> 4) & 0xf;
  const n = w & 0xf;
  const nn = w & 0xff;
  const nnn = w & 0xfff;

  switch (w >> 12) {
    case 0x0:
      if (w === 0x00e0) return { op: 'cls' };
      if (w === 0x00ee) return { op: 'ret' };
      return { op: 'sys', nnn };
    case 0x1: return { op: 'jp', nnn };
    case 0x2: return { op: 'call', nnn };
    case 0x3: return { op: 'se_imm', x, nn };
    case 0x4: return { op: 'sne_imm', x, nn };
    case 0x5:
      if (n === 0) return { op: 'se_reg', x, y };
      break;
    case 0x6: return { op: 'ld_imm', x, nn };
    case 0x7: return { op: 'add_imm', x, nn };
    case 0x8:
      if (n < ALU_OPS.length) return { op: ALU_OPS[n], x, y };
      if (n === 0xe) return { op: 'shl', x, y };
      break;
    case 0x9:
      if (n === 0) return { op: 'sne_reg', x, y };
      break;
    case 0xa: return { op: 'ld_i', nnn };
    case 0xb: return { op: 'jp_v0', nnn };
    case 0xc: return { op: 'rnd', x, nn };
    case 0xd: return { op: 'drw', x, y, n };
    case 0xe:
      if (nn === 0x9e) return { op: 'skp', x };
      if (nn === 0xa1) return { op: 'sknp', x };
      break;
    case 0xf:
      switch (nn) {
        case 0x07: return { op: 'ld_vx_dt', x };
        case 0x0a: return { op: 'ld_key', x };
        case 0x15: return { op: 'ld_dt', x };
        case 0x18: return { op: 'ld_st', x };
        case 0x1e: return { op: 'add_i', x };
        case 0x29: return { op: 'ld_font', x };
        case 0x33: return { op: 'bcd', x };
        case 0x55: return { op: 'store', x };
        case 0x65: return { op: 'load', x };
      }
      break;
  }
  throw new UnknownOpcodeError(w);
}

const h2 = (v: number) => '0x' + v.toString(16).toUpperCase().padStart(2, '0');
const h3 = (v: number) => '0x' + v.toString(16).toUpperCase().padStart(3, '0');
const V = (r: number) => 'V' + r.toString(16).toUpperCase();

// Conventional assembler syntax (Cowgod style), used by traces and the disassembler.
export function formatInstruction(ins: Instruction): string {
  switch (ins.op) {
    case 'cls': return 'CLS';
    case 'ret': return 'RET';
    case 'sys': return `SYS ${h3(ins.nnn)}`;
    case 'jp': return `JP ${h3(ins.nnn)}`;
    case 'call': return `CALL ${h3(ins.nnn)}`;
    case 'se_imm': return `SE ${V(ins.x)}, ${h2(ins.nn)}`;
    case 'sne_imm': return `SNE ${V(ins.x)}, ${h2(ins.nn)}`;
    case 'se_reg': return `SE ${V(ins.x)}, ${V(ins.y)}`;
    case 'ld_imm': return `LD ${V(ins.x)}, ${h2(ins.nn)}`;
    case 'add_imm': return `ADD ${V(ins.x)}, ${h2(ins.nn)}`;
    case 'ld_reg': return `LD ${V(ins.x)}, ${V(ins.y)}`;
    case 'or': return `OR ${V(ins.x)}, ${V(ins.y)}`;
    case 'and': return `AND ${V(ins.x)}, ${V(ins.y)}`;
    case 'xor': return `XOR ${V(ins.x)}, ${V(ins.y)}`;
    case 'add_reg': return `ADD ${V(ins.x)}, ${V(ins.y)}`;
    case 'sub': return `SUB ${V(ins.x)}, ${V(ins.y)}`;
    case 'shr': return `SHR ${V(ins.x)}, ${V(ins.y)}`;
    case 'subn': return `SUBN ${V(ins.x)}, ${V(ins.y)}`;
    case 'shl': return `SHL ${V(ins.x)}, ${V(ins.y)}`;
    case 'sne_reg': return `SNE ${V(ins.x)}, ${V(ins.y)}`;
    case 'ld_i': return `LD I, ${h3(ins.nnn)}`;
    case 'jp_v0': return `JP V0, ${h3(ins.nnn)}`;
    case 'rnd': return `RND ${V(ins.x)}, ${h2(ins.nn)}`;
    case 'drw': return `DRW ${V(ins.x)}, ${V(ins.y)}, ${ins.n}`;
    case 'skp': return `SKP ${V(ins.x)}`;
    case 'sknp': return `SKNP ${V(ins.x)}`;
    case 'ld_vx_dt': return `LD ${V(ins.x)}, DT`;
    case 'ld_key': return `LD ${V(ins.x)}, K`;
    case 'ld_dt': return `LD DT, ${V(ins.x)}`;
    case 'ld_st': return `LD ST, ${V(ins.x)}`;
    case 'add_i': return `ADD I, ${V(ins.x)}`;
    case 'ld_font': return `LD F, ${V(ins.x)}`;
    case 'bcd': return `LD B, ${V(ins.x)}`;
    case 'store': return `LD [I], ${V(ins.x)}`;
    case 'load': return `LD ${V(ins.x)}, [I]`;
  }
}

// Disassemble one word; undecodable data prints as a DW directive.
export function disassemble(word: number): string {
  try {
    return formatInstruction(decode(word));
  } catch (e) {
    if (e instanceof UnknownOpcodeError) return `DW 0x${(word & 0xffff).toString(16).toUpperCase().padStart(4, '0')}`;
    throw e;
  }
}
