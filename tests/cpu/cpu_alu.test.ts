import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { mkEmu, run } from '../helpers/program';
import { QUIRK_PRESETS } from '../../src/cpu/quirks';

describe('CPU: register loads and immediate add', () => {
  it('6XNN loads and 7XNN wraps without touching VF', () => {
    const emu = mkEmu([0x6f09, 0x60ff, 0x7002]);
    run(emu, 3);
    expect(emu.cpu.state.V[0]).toBe(0x01);
    expect(emu.cpu.state.V[0xf]).toBe(0x09);
    expect(emu.cpu.state.PC).toBe(0x206);
  });

  it('8XY0 copies Vy into Vx', () => {
    const emu = mkEmu([0x6142, 0x8010]);
    run(emu, 2);
    expect(emu.cpu.state.V[0]).toBe(0x42);
  });
});

describe('CPU: 8XY4 add with carry', () => {
  it('sets VF on carry', () => {
    const emu = mkEmu([0x60ff, 0x6102, 0x8014]);
    run(emu, 3);
    expect(emu.cpu.state.V[0]).toBe(0x01);
    expect(emu.cpu.state.V[0xf]).toBe(1);
  });

  it('clears VF without carry', () => {
    const emu = mkEmu([0x6f01, 0x6010, 0x6120, 0x8014]);
    run(emu, 4);
    expect(emu.cpu.state.V[0]).toBe(0x30);
    expect(emu.cpu.state.V[0xf]).toBe(0);
  });

  it('leaves the flag in VF when VF is the destination', () => {
    const emu = mkEmu([0x6fff, 0x6101, 0x8f14]);
    run(emu, 3);
    expect(emu.cpu.state.V[0xf]).toBe(1);
  });

  it('matches an 8-bit model across random operands', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 255 }), fc.integer({ min: 0, max: 255 }), (a, b) => {
        const emu = mkEmu([0x6000 | a, 0x6100 | b, 0x8014]);
        run(emu, 3);
        expect(emu.cpu.state.V[0]).toBe((a + b) & 0xff);
        expect(emu.cpu.state.V[0xf]).toBe(a + b > 0xff ? 1 : 0);
      }),
      { numRuns: 200 }
    );
  });
});

describe('CPU: subtraction flags are no-borrow', () => {
  it('8XY5 sets VF when Vx >= Vy', () => {
    const emu = mkEmu([0x6005, 0x6103, 0x8015]);
    run(emu, 3);
    expect(emu.cpu.state.V[0]).toBe(2);
    expect(emu.cpu.state.V[0xf]).toBe(1);
  });

  it('8XY5 clears VF on borrow', () => {
    const emu = mkEmu([0x6003, 0x6105, 0x8015]);
    run(emu, 3);
    expect(emu.cpu.state.V[0]).toBe(0xfe);
    expect(emu.cpu.state.V[0xf]).toBe(0);
  });

  it('8XY5 with equal operands gives 0 and VF=1', () => {
    const emu = mkEmu([0x6007, 0x6107, 0x8015]);
    run(emu, 3);
    expect(emu.cpu.state.V[0]).toBe(0);
    expect(emu.cpu.state.V[0xf]).toBe(1);
  });

  it('8XY7 computes Vy - Vx', () => {
    const emu = mkEmu([0x6003, 0x6105, 0x8017]);
    run(emu, 3);
    expect(emu.cpu.state.V[0]).toBe(2);
    expect(emu.cpu.state.V[0xf]).toBe(1);
  });

  it('8XY7 clears VF on borrow', () => {
    const emu = mkEmu([0x6005, 0x6103, 0x8017]);
    run(emu, 3);
    expect(emu.cpu.state.V[0]).toBe(0xfe);
    expect(emu.cpu.state.V[0xf]).toBe(0);
  });

  it('matches an 8-bit model across random operands', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 255 }), fc.integer({ min: 0, max: 255 }), (a, b) => {
        const emu = mkEmu([0x6000 | a, 0x6100 | b, 0x8015]);
        run(emu, 3);
        expect(emu.cpu.state.V[0]).toBe((a - b) & 0xff);
        expect(emu.cpu.state.V[0xf]).toBe(a >= b ? 1 : 0);
      }),
      { numRuns: 200 }
    );
  });
});

describe('CPU: shifts', () => {
  it('8XY6 shifts Vx in place by default', () => {
    const emu = mkEmu([0x6005, 0x61f0, 0x8016]);
    run(emu, 3);
    expect(emu.cpu.state.V[0]).toBe(0x02);
    expect(emu.cpu.state.V[0xf]).toBe(1);
  });

  it('8XY6 shifts Vy into Vx with shiftReadsVy', () => {
    const emu = mkEmu([0x6005, 0x61f0, 0x8016], { quirks: { shiftReadsVy: true } });
    run(emu, 3);
    expect(emu.cpu.state.V[0]).toBe(0x78);
    expect(emu.cpu.state.V[1]).toBe(0xf0);
    expect(emu.cpu.state.V[0xf]).toBe(0);
  });

  it('8XYE shifts left and reports the old MSB', () => {
    const emu = mkEmu([0x6081, 0x800e]);
    run(emu, 2);
    expect(emu.cpu.state.V[0]).toBe(0x02);
    expect(emu.cpu.state.V[0xf]).toBe(1);
  });

  it('8XYE reads Vy under the cosmac preset', () => {
    const emu = mkEmu([0x6081, 0x6140, 0x801e], { quirks: QUIRK_PRESETS.cosmac });
    run(emu, 3);
    expect(emu.cpu.state.V[0]).toBe(0x80);
    expect(emu.cpu.state.V[0xf]).toBe(0);
  });

  it('the original preset reads Vy but keeps VF after logic ops', () => {
    // 200: LD V0,5  202: LD V1,0xF0  204: SHR V0,V1  206: LD VF,1  208: OR V0,V1
    const emu = mkEmu([0x6005, 0x61f0, 0x8016, 0x6f01, 0x8011], { quirks: QUIRK_PRESETS.original });
    run(emu, 3);
    expect(emu.cpu.state.V[0]).toBe(0x78);
    run(emu, 2);
    expect(emu.cpu.state.V[0]).toBe(0xf8);
    expect(emu.cpu.state.V[0xf]).toBe(1);
  });
});

describe('CPU: bitwise logic', () => {
  it('8XY1/2/3 leave VF alone by default', () => {
    const emu = mkEmu([0x6f05, 0x600c, 0x610a, 0x8011]);
    run(emu, 4);
    expect(emu.cpu.state.V[0]).toBe(0x0e);
    expect(emu.cpu.state.V[0xf]).toBe(5);
  });

  it('8XY1/2/3 reset VF with logicResetsVF', () => {
    const emu = mkEmu([0x6f05, 0x600c, 0x610a, 0x8012, 0x6f05, 0x8013], { quirks: { logicResetsVF: true } });
    run(emu, 4);
    expect(emu.cpu.state.V[0]).toBe(0x08);
    expect(emu.cpu.state.V[0xf]).toBe(0);
    run(emu, 2);
    expect(emu.cpu.state.V[0]).toBe(0x02);
    expect(emu.cpu.state.V[0xf]).toBe(0);
  });
});

describe('CPU: CXNN', () => {
  it('masks the random byte with NN', () => {
    const emu = mkEmu([0xc30f, 0xc4f0], { random: () => 0xab });
    run(emu, 2);
    expect(emu.cpu.state.V[3]).toBe(0x0b);
    expect(emu.cpu.state.V[4]).toBe(0xa0);
  });
});
