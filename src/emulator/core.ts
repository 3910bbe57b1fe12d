import { Chip8CPU, type CPUOptions } from '../cpu/cpu';
import { Memory, PROGRAM_CAPACITY } from '../memory/memory';
import { Display } from '../video/display';
import { Keypad } from '../input/keypad';
import { Timers } from '../timer/timers';
import type { IEmulator } from './types';
import { CapacityError, isChip8Error, type Chip8Error } from './errors';

export type EmulatorOptions = CPUOptions;

export class Emulator implements IEmulator {
  readonly memory = new Memory();
  readonly display = new Display();
  readonly keypad = new Keypad();
  readonly timers = new Timers();
  readonly cpu: Chip8CPU;
  // First fault of the session; once set, step() refuses to run until reset().
  private faultValue: Chip8Error | null = null;

  constructor(opts: EmulatorOptions = {}) {
    this.cpu = new Chip8CPU(this.memory, this.display, this.keypad, this.timers, opts);
  }

  static fromProgram(program: ArrayLike<number>, opts: EmulatorOptions = {}): Emulator {
    const emu = new Emulator(opts);
    emu.load(program);
    return emu;
  }

  get fault(): Chip8Error | null { return this.faultValue; }
  get halted(): boolean { return this.faultValue !== null; }

  reset(): void {
    this.memory.reset();
    this.display.clear();
    this.keypad.releaseAll();
    this.timers.reset();
    this.cpu.reset();
    this.faultValue = null;
  }

  // Resets the machine and places the program at 0x200. An image that does not
  // fit is rejected before anything is reset.
  load(program: ArrayLike<number>): void {
    if (program.length > PROGRAM_CAPACITY) throw new CapacityError(program.length, PROGRAM_CAPACITY);
    this.reset();
    this.memory.load(program);
  }

  step(): void {
    if (this.faultValue) throw this.faultValue;
    try {
      this.cpu.step();
    } catch (e) {
      if (isChip8Error(e)) this.faultValue = e;
      throw e;
    }
  }

  tickTimers(): void {
    this.timers.tick();
  }

  isSoundActive(): boolean {
    return this.timers.isSoundActive();
  }
}
