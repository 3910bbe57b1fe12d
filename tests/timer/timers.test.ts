import { describe, it, expect } from 'vitest';
import { Timers } from '../../src/timer/timers';

describe('Timers', () => {
  it('counts down once per tick and saturates at 0', () => {
    const t = new Timers();
    t.delay = 60;
    t.sound = 2;
    for (let i = 0; i < 60; i++) t.tick();
    expect(t.delay).toBe(0);
    expect(t.sound).toBe(0);
    t.tick();
    expect(t.delay).toBe(0);
  });

  it('masks written values to a byte', () => {
    const t = new Timers();
    t.delay = 0x1ff;
    t.sound = 0x100;
    expect(t.delay).toBe(0xff);
    expect(t.sound).toBe(0);
  });

  it('sound is active while the sound timer is non-zero', () => {
    const t = new Timers();
    expect(t.isSoundActive()).toBe(false);
    t.sound = 1;
    expect(t.isSoundActive()).toBe(true);
    t.tick();
    expect(t.isSoundActive()).toBe(false);
  });

  it('reset clears both', () => {
    const t = new Timers();
    t.delay = 3;
    t.sound = 4;
    t.reset();
    expect(t.delay).toBe(0);
    expect(t.sound).toBe(0);
  });
});
