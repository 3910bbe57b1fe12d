import type { IKeySource } from '../emulator/types';

export const KEY_COUNT = 16;

export type KeypadSnapshot = Partial<Record<number, boolean>>;

function checkKey(key: number): void {
  if (!Number.isInteger(key) || key < 0 || key >= KEY_COUNT) {
    throw new RangeError(`Keypad key out of range: ${key}`);
  }
}

// 16-key hex keypad, laid out 1 2 3 C / 4 5 6 D / 7 8 9 E / A 0 B F.
export class Keypad implements IKeySource {
  private readonly down = new Array<boolean>(KEY_COUNT).fill(false);

  setKey(key: number, pressed: boolean): void {
    checkKey(key);
    this.down[key] = pressed;
  }

  // Apply a host snapshot; keys not mentioned keep their state. Nothing is
  // applied if any key is out of range.
  setState(state: KeypadSnapshot): void {
    const entries: [number, boolean][] = [];
    for (const [k, v] of Object.entries(state)) {
      if (v === undefined) continue;
      const key = Number(k);
      checkKey(key);
      entries.push([key, v]);
    }
    for (const [key, v] of entries) this.down[key] = v;
  }

  isPressed(key: number): boolean {
    return this.down[key & 0xf];
  }

  firstPressed(): number | null {
    const idx = this.down.indexOf(true);
    return idx < 0 ? null : idx;
  }

  releaseAll(): void {
    this.down.fill(false);
  }

  pressedKeys(): number[] {
    const out: number[] = [];
    this.down.forEach((d, i) => { if (d) out.push(i); });
    return out;
  }
}
