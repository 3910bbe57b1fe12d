import type { IKeySource, IMemoryBus, Address, Byte } from '../emulator/types';
import { StackOverflowError, StackUnderflowError, UnknownOpcodeError } from '../emulator/errors';
import type { Display } from '../video/display';
import type { Timers } from '../timer/timers';
import { PROGRAM_START } from '../memory/memory';
import { fontAddress } from '../memory/font';
import { decode, formatInstruction, type Instruction } from './opcodes';
import { quirksFor, type Quirks } from './quirks';

export const STACK_DEPTH = 16;

export interface CPUState {
  V: Uint8Array; // V0..VF, VF doubles as the flag register
  I: number; // 16-bit index register
  PC: Address;
  stack: Address[]; // return addresses, innermost last
  awaitingKey: number | null; // register waiting on FX0A, null while running
}

export interface CPUOptions {
  quirks?: Partial<Quirks>;
  random?: () => Byte; // source for CXNN, must return 0..255
  trace?: boolean; // log every executed instruction
  log?: (line: string) => void;
}

const defaultRandom = (): Byte => Math.floor(Math.random() * 256) & 0xff;

export function initialCPUState(): CPUState {
  return { V: new Uint8Array(16), I: 0, PC: PROGRAM_START, stack: [], awaitingKey: null };
}

export class Chip8CPU {
  state: CPUState = initialCPUState();
  readonly quirks: Quirks;
  private readonly random: () => Byte;
  private readonly log: (line: string) => void;
  trace: boolean;

  constructor(
    private readonly mem: IMemoryBus,
    private readonly display: Display,
    private readonly keys: IKeySource,
    private readonly timers: Timers,
    opts: CPUOptions = {},
  ) {
    this.quirks = quirksFor('modern', opts.quirks);
    this.random = opts.random ?? defaultRandom;
    // eslint-disable-next-line no-console
    this.log = opts.log ?? ((line) => console.log(line));
    this.trace = opts.trace ?? false;
  }

  reset(): void {
    this.state = initialCPUState();
  }

  get waitingForKey(): boolean {
    return this.state.awaitingKey !== null;
  }

  step(): void {
    const s = this.state;
    if (s.awaitingKey !== null) {
      this.pollKey();
      return;
    }

    const fetchPC = s.PC;
    const word = this.mem.read16(fetchPC);
    s.PC = (s.PC + 2) & 0xffff;

    let ins: Instruction;
    try {
      ins = decode(word);
    } catch (e) {
      if (e instanceof UnknownOpcodeError) throw new UnknownOpcodeError(e.opcode, fetchPC);
      throw e;
    }
    if (this.trace) {
      const pc = fetchPC.toString(16).toUpperCase().padStart(4, '0');
      const w = word.toString(16).toUpperCase().padStart(4, '0');
      this.log(`[CPU] 0x${pc}: ${w}  ${formatInstruction(ins)}`);
    }
    this.execute(ins, fetchPC);
  }

  private execute(ins: Instruction, fetchPC: Address): void {
    const s = this.state;
    const V = s.V;
    switch (ins.op) {
      case 'cls':
        this.display.clear();
        return;
      case 'ret': {
        const addr = s.stack.pop();
        if (addr === undefined) throw new StackUnderflowError(fetchPC);
        s.PC = addr;
        return;
      }
      case 'sys': {
        // No VIP machine code to run; treated as an ordinary call so that
        // running into zeroed memory overflows the stack instead of sliding on.
        const pc = fetchPC.toString(16).toUpperCase().padStart(4, '0');
        this.log(`[CPU] warning: SYS ${ins.nnn.toString(16).toUpperCase().padStart(3, '0')} at 0x${pc} handled as CALL`);
        this.call(ins.nnn, fetchPC);
        return;
      }
      case 'jp':
        s.PC = ins.nnn;
        return;
      case 'call':
        this.call(ins.nnn, fetchPC);
        return;
      case 'se_imm':
        if (V[ins.x] === ins.nn) this.skip();
        return;
      case 'sne_imm':
        if (V[ins.x] !== ins.nn) this.skip();
        return;
      case 'se_reg':
        if (V[ins.x] === V[ins.y]) this.skip();
        return;
      case 'ld_imm':
        V[ins.x] = ins.nn;
        return;
      case 'add_imm':
        V[ins.x] = (V[ins.x] + ins.nn) & 0xff;
        return;
      case 'ld_reg':
        V[ins.x] = V[ins.y];
        return;
      case 'or':
        V[ins.x] |= V[ins.y];
        if (this.quirks.logicResetsVF) V[0xf] = 0;
        return;
      case 'and':
        V[ins.x] &= V[ins.y];
        if (this.quirks.logicResetsVF) V[0xf] = 0;
        return;
      case 'xor':
        V[ins.x] ^= V[ins.y];
        if (this.quirks.logicResetsVF) V[0xf] = 0;
        return;
      // Flag-producing ops write the result first and VF last.
      case 'add_reg': {
        const sum = V[ins.x] + V[ins.y];
        V[ins.x] = sum & 0xff;
        V[0xf] = sum > 0xff ? 1 : 0;
        return;
      }
      case 'sub': {
        const a = V[ins.x], b = V[ins.y];
        V[ins.x] = (a - b) & 0xff;
        V[0xf] = a >= b ? 1 : 0;
        return;
      }
      case 'subn': {
        const a = V[ins.x], b = V[ins.y];
        V[ins.x] = (b - a) & 0xff;
        V[0xf] = b >= a ? 1 : 0;
        return;
      }
      case 'shr': {
        const src = this.quirks.shiftReadsVy ? V[ins.y] : V[ins.x];
        V[ins.x] = src >> 1;
        V[0xf] = src & 1;
        return;
      }
      case 'shl': {
        const src = this.quirks.shiftReadsVy ? V[ins.y] : V[ins.x];
        V[ins.x] = (src << 1) & 0xff;
        V[0xf] = (src >> 7) & 1;
        return;
      }
      case 'sne_reg':
        if (V[ins.x] !== V[ins.y]) this.skip();
        return;
      case 'ld_i':
        s.I = ins.nnn;
        return;
      case 'jp_v0': {
        const reg = this.quirks.jumpUsesVx ? (ins.nnn >> 8) & 0xf : 0;
        s.PC = ins.nnn + V[reg];
        return;
      }
      case 'rnd':
        V[ins.x] = this.random() & ins.nn;
        return;
      case 'drw': {
        const rows = new Uint8Array(ins.n);
        for (let r = 0; r < ins.n; r++) rows[r] = this.mem.read8(s.I + r);
        const hit = this.display.drawSprite(V[ins.x], V[ins.y], rows, this.quirks.spriteWrap ? 'wrap' : 'clip');
        V[0xf] = hit ? 1 : 0;
        return;
      }
      case 'skp':
        if (this.keys.isPressed(V[ins.x] & 0xf)) this.skip();
        return;
      case 'sknp':
        if (!this.keys.isPressed(V[ins.x] & 0xf)) this.skip();
        return;
      case 'ld_vx_dt':
        V[ins.x] = this.timers.delay;
        return;
      case 'ld_key':
        s.awaitingKey = ins.x;
        this.pollKey();
        return;
      case 'ld_dt':
        this.timers.delay = V[ins.x];
        return;
      case 'ld_st':
        this.timers.sound = V[ins.x];
        return;
      case 'add_i': {
        const sum = s.I + V[ins.x];
        s.I = sum & 0xffff;
        if (this.quirks.indexOverflowSetsVF) V[0xf] = sum > 0xfff ? 1 : 0;
        return;
      }
      case 'ld_font':
        s.I = fontAddress(V[ins.x]);
        return;
      case 'bcd': {
        const v = V[ins.x];
        this.mem.write8(s.I, Math.floor(v / 100));
        this.mem.write8(s.I + 1, Math.floor(v / 10) % 10);
        this.mem.write8(s.I + 2, v % 10);
        return;
      }
      case 'store':
        for (let r = 0; r <= ins.x; r++) this.mem.write8(s.I + r, V[r]);
        if (this.quirks.loadStoreIncrementsIndex) s.I = (s.I + ins.x + 1) & 0xffff;
        return;
      case 'load':
        for (let r = 0; r <= ins.x; r++) V[r] = this.mem.read8(s.I + r);
        if (this.quirks.loadStoreIncrementsIndex) s.I = (s.I + ins.x + 1) & 0xffff;
        return;
    }
  }

  private call(target: Address, fetchPC: Address): void {
    const s = this.state;
    if (s.stack.length >= STACK_DEPTH) throw new StackOverflowError(fetchPC);
    s.stack.push(s.PC);
    s.PC = target;
  }

  private skip(): void {
    this.state.PC = (this.state.PC + 2) & 0xffff;
  }

  // Completes a pending FX0A once any key is down.
  private pollKey(): void {
    const reg = this.state.awaitingKey;
    if (reg === null) return;
    const key = this.keys.firstPressed();
    if (key === null) return;
    this.state.V[reg] = key;
    this.state.awaitingKey = null;
  }
}
