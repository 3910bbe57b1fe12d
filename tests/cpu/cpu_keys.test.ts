import { describe, it, expect } from 'vitest';
import { mkEmu, run } from '../helpers/program';

describe('CPU: FX0A', () => {
  it('blocks until a key is pressed, then stores it', () => {
    const emu = mkEmu([0xf30a, 0x6001]);
    emu.step();
    expect(emu.cpu.waitingForKey).toBe(true);
    expect(emu.cpu.state.PC).toBe(0x202);
    run(emu, 5);
    expect(emu.cpu.state.PC).toBe(0x202);
    expect(emu.cpu.state.V[0]).toBe(0);

    emu.keypad.setKey(0xb, true);
    emu.step();
    expect(emu.cpu.waitingForKey).toBe(false);
    expect(emu.cpu.state.V[3]).toBe(0xb);
    expect(emu.cpu.state.PC).toBe(0x202);

    emu.step();
    expect(emu.cpu.state.V[0]).toBe(1);
  });

  it('completes in the same step when a key is already down', () => {
    const emu = mkEmu([0xf20a]);
    emu.keypad.setKey(0x9, true);
    emu.keypad.setKey(0x4, true);
    emu.step();
    expect(emu.cpu.waitingForKey).toBe(false);
    expect(emu.cpu.state.V[2]).toBe(0x4);
  });
});

describe('CPU: EX9E / EXA1', () => {
  it('SKP skips only while the key is down', () => {
    const up = mkEmu([0x6005, 0xe09e]);
    run(up, 2);
    expect(up.cpu.state.PC).toBe(0x204);

    const down = mkEmu([0x6005, 0xe09e]);
    down.keypad.setKey(5, true);
    run(down, 2);
    expect(down.cpu.state.PC).toBe(0x206);
  });

  it('SKNP skips only while the key is up', () => {
    const up = mkEmu([0x6005, 0xe0a1]);
    run(up, 2);
    expect(up.cpu.state.PC).toBe(0x206);

    const down = mkEmu([0x6005, 0xe0a1]);
    down.keypad.setKey(5, true);
    run(down, 2);
    expect(down.cpu.state.PC).toBe(0x204);
  });

  it('uses the low nibble of Vx as the key', () => {
    const emu = mkEmu([0x6015, 0xe09e]);
    emu.keypad.setKey(5, true);
    run(emu, 2);
    expect(emu.cpu.state.PC).toBe(0x206);
  });
});
