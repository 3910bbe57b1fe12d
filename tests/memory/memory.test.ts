import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { Memory, PROGRAM_CAPACITY, PROGRAM_START } from '../../src/memory/memory';
import { FONT, FONT_BASE, fontAddress } from '../../src/memory/font';
import { CapacityError, OutOfBoundsError } from '../../src/emulator/errors';

describe('Memory', () => {
  it('places the font table at 0x050-0x09F after reset', () => {
    const mem = new Memory();
    expect(FONT.length).toBe(80);
    expect(Array.from(mem.slice(FONT_BASE, 80))).toEqual(Array.from(FONT));
    expect(Array.from(mem.slice(0x050, 5))).toEqual([0xf0, 0x90, 0x90, 0x90, 0xf0]); // 0
    expect(Array.from(mem.slice(0x09b, 5))).toEqual([0xf0, 0x80, 0xf0, 0x80, 0x80]); // F
    expect(mem.read8(0x04f)).toBe(0);
    expect(mem.read8(0x0a0)).toBe(0);
  });

  it('computes glyph addresses from the low nibble', () => {
    expect(fontAddress(0x0)).toBe(0x050);
    expect(fontAddress(0xa)).toBe(0x082);
    expect(fontAddress(0x11)).toBe(0x055);
    expect(fontAddress(0xf)).toBe(0x09b);
  });

  it('returns loaded bytes unchanged at 0x200', () => {
    fc.assert(
      fc.property(fc.uint8Array({ maxLength: PROGRAM_CAPACITY }), (program) => {
        const mem = new Memory();
        mem.load(program);
        expect(Array.from(mem.slice(PROGRAM_START, program.length))).toEqual(Array.from(program));
      }),
      { numRuns: 50 }
    );
  });

  it('accepts a program that fills memory exactly and rejects one byte more', () => {
    const mem = new Memory();
    const full = new Uint8Array(PROGRAM_CAPACITY).fill(0xaa);
    mem.load(full);
    expect(mem.read8(0xfff)).toBe(0xaa);

    let err: unknown;
    try { mem.load(new Uint8Array(PROGRAM_CAPACITY + 1)); } catch (e) { err = e; }
    expect(err).toBeInstanceOf(CapacityError);
    if (err instanceof CapacityError) {
      expect(err.size).toBe(3585);
      expect(err.capacity).toBe(3584);
      expect(err.kind).toBe('capacity');
    }
  });

  it('bounds-checks every accessor', () => {
    const mem = new Memory();
    expect(() => mem.read8(0x1000)).toThrow(OutOfBoundsError);
    expect(() => mem.read8(-1)).toThrow(OutOfBoundsError);
    expect(() => mem.write8(0x1000, 1)).toThrow(OutOfBoundsError);
    expect(() => mem.slice(0xffe, 3)).toThrow(OutOfBoundsError);
    try {
      mem.read16(0xfff);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(OutOfBoundsError);
      if (e instanceof OutOfBoundsError) expect(e.address).toBe(0x1000);
    }
  });

  it('reads words big-endian and masks written bytes', () => {
    const mem = new Memory();
    mem.write8(0x300, 0x12);
    mem.write8(0x301, 0x1ab);
    expect(mem.read16(0x300)).toBe(0x12ab);
    expect(mem.read16(0xffe)).toBe(0);
  });

  it('reset wipes program memory', () => {
    const mem = new Memory();
    mem.load([1, 2, 3]);
    mem.reset();
    expect(Array.from(mem.slice(PROGRAM_START, 3))).toEqual([0, 0, 0]);
  });
});
