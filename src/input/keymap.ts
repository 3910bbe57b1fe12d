import { KEY_COUNT } from './keypad';

// Host key name (lower-cased) -> keypad index.
export type KeyMap = ReadonlyMap<string, number>;

// Host keys for keypad 0..F, in keypad index order.
// Physical layout 1234/QWER/ASDF/ZXCV over keypad 123C/456D/789E/A0BF.
export const DEFAULT_KEY_LAYOUT = 'x123qweasdzc4rfv';

// Build a map from a 16-character string: character i is the host key for keypad key i.
export function keyMapFromLayout(layout: string): KeyMap {
  const chars = [...layout.toLowerCase()];
  if (chars.length !== KEY_COUNT) {
    throw new RangeError(`Key layout needs ${KEY_COUNT} characters, got ${chars.length}`);
  }
  const map = new Map<string, number>();
  chars.forEach((ch, key) => {
    if (map.has(ch)) throw new RangeError(`Key layout assigns "${ch}" twice`);
    map.set(ch, key);
  });
  return map;
}

export function lookupKey(map: KeyMap, hostKey: string): number | null {
  return map.get(hostKey.toLowerCase()) ?? null;
}

export const DEFAULT_KEY_MAP: KeyMap = keyMapFromLayout(DEFAULT_KEY_LAYOUT);
