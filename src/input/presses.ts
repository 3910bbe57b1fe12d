import { ConfigError } from '../config/options';
import type { Keypad } from './keypad';

export interface KeyPress {
  key: number;
  frame: number;
  frames: number; // how long the key stays down
}

// "KEY@FRAME[:FRAMES]" entries separated by commas, KEY a hex digit.
export function parsePresses(raw: string | undefined): KeyPress[] {
  if (!raw) return [];
  return raw.split(',').filter((s) => s.trim().length > 0).map((entry) => {
    const m = entry.trim().match(/^([0-9a-f])@(\d+)(?::(\d+))?$/i);
    if (!m) throw new ConfigError('--press', `expected KEY@FRAME[:FRAMES], got "${entry}"`);
    return { key: parseInt(m[1], 16), frame: Number(m[2]), frames: m[3] ? Math.max(1, Number(m[3])) : 1 };
  });
}

// Press or release scripted keys at the start of the given frame.
export function applyPresses(keypad: Keypad, presses: readonly KeyPress[], frame: number): void {
  for (const p of presses) {
    if (frame === p.frame) keypad.setKey(p.key, true);
    if (frame === p.frame + p.frames) keypad.setKey(p.key, false);
  }
}
