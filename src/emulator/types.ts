export type Byte = number; // 0..255
export type Word = number; // 0..65535
export type Address = number; // 0x000..0xFFF

export interface IMemoryBus {
  read8(addr: Address): Byte;
  read16(addr: Address): Word; // big-endian
  write8(addr: Address, value: Byte): void;
}

// Read side of the display, borrowed by renderers.
export interface IFrameSource {
  readonly width: number;
  readonly height: number;
  getPixel(x: number, y: number): boolean;
}

export interface IKeySource {
  isPressed(key: number): boolean;
  firstPressed(): number | null; // lowest pressed key index
}

export interface IEmulator {
  reset(): void;
  step(): void; // one fetch-decode-execute cycle
  tickTimers(): void; // one 60 Hz timer decrement
}
