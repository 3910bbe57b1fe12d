export type Chip8ErrorKind =
  | 'out_of_bounds'
  | 'capacity'
  | 'unknown_opcode'
  | 'stack_overflow'
  | 'stack_underflow';

const hex = (v: number, width: number) => '0x' + v.toString(16).toUpperCase().padStart(width, '0');

// Every engine fault is fatal to the running session.
export abstract class Chip8Error extends Error {
  abstract readonly kind: Chip8ErrorKind;
}

export class OutOfBoundsError extends Chip8Error {
  readonly kind = 'out_of_bounds';
  constructor(public readonly address: number) {
    super(`Memory access out of bounds at ${hex(address, 4)}`);
    this.name = 'OutOfBoundsError';
  }
}

export class CapacityError extends Chip8Error {
  readonly kind = 'capacity';
  constructor(public readonly size: number, public readonly capacity: number) {
    super(`Program is ${size} bytes; at most ${capacity} fit in memory`);
    this.name = 'CapacityError';
  }
}

export class UnknownOpcodeError extends Chip8Error {
  readonly kind = 'unknown_opcode';
  // pc is the address the word was fetched from, or -1 when decoded standalone
  constructor(public readonly opcode: number, public readonly pc = -1) {
    super(pc >= 0 ? `Unknown opcode ${hex(opcode, 4)} at PC=${hex(pc, 3)}` : `Unknown opcode ${hex(opcode, 4)}`);
    this.name = 'UnknownOpcodeError';
  }
}

export class StackOverflowError extends Chip8Error {
  readonly kind = 'stack_overflow';
  constructor(public readonly pc: number) {
    super(`Call stack overflow (depth 16) at PC=${hex(pc, 3)}`);
    this.name = 'StackOverflowError';
  }
}

export class StackUnderflowError extends Chip8Error {
  readonly kind = 'stack_underflow';
  constructor(public readonly pc: number) {
    super(`Return with empty call stack at PC=${hex(pc, 3)}`);
    this.name = 'StackUnderflowError';
  }
}

export function isChip8Error(e: unknown): e is Chip8Error {
  return e instanceof Chip8Error;
}
