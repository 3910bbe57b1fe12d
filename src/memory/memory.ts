import type { IMemoryBus, Address, Byte, Word } from '../emulator/types';
import { CapacityError, OutOfBoundsError } from '../emulator/errors';
import { FONT, FONT_BASE } from './font';

export const MEMORY_SIZE = 0x1000;
export const PROGRAM_START = 0x200;
export const PROGRAM_CAPACITY = MEMORY_SIZE - PROGRAM_START; // 3584 bytes

// 4 KiB flat address space. Accesses never wrap: anything outside 0x000-0xFFF throws.
export class Memory implements IMemoryBus {
  private readonly bytes = new Uint8Array(MEMORY_SIZE);

  constructor() {
    this.reset();
  }

  reset(): void {
    this.bytes.fill(0);
    this.bytes.set(FONT, FONT_BASE);
  }

  load(program: ArrayLike<number>): void {
    if (program.length > PROGRAM_CAPACITY) throw new CapacityError(program.length, PROGRAM_CAPACITY);
    for (let i = 0; i < program.length; i++) this.bytes[PROGRAM_START + i] = program[i] & 0xff;
  }

  read8(addr: Address): Byte {
    this.check(addr);
    return this.bytes[addr];
  }

  read16(addr: Address): Word {
    this.check(addr);
    this.check(addr + 1);
    return (this.bytes[addr] << 8) | this.bytes[addr + 1];
  }

  write8(addr: Address, value: Byte): void {
    this.check(addr);
    this.bytes[addr] = value & 0xff;
  }

  // Copy of [addr, addr+length); the whole range must be addressable.
  slice(addr: Address, length: number): Uint8Array {
    if (length <= 0) return new Uint8Array(0);
    this.check(addr);
    this.check(addr + length - 1);
    return this.bytes.slice(addr, addr + length);
  }

  private check(addr: number): void {
    if (!Number.isInteger(addr) || addr < 0 || addr >= MEMORY_SIZE) throw new OutOfBoundsError(addr);
  }
}
