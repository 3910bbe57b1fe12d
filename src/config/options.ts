import { DEFAULT_IPS } from '../emulator/scheduler';
import { DEFAULT_KEY_LAYOUT, keyMapFromLayout, type KeyMap } from '../input/keymap';
import { isQuirkPreset, QUIRK_NAMES, quirksFor, type QuirkName, type QuirkPreset, type Quirks } from '../cpu/quirks';

export class ConfigError extends Error {
  constructor(public readonly option: string, message: string) {
    super(`Invalid ${option}: ${message}`);
    this.name = 'ConfigError';
  }
}

export interface RGB { r: number; g: number; b: number; }

export interface Chip8Config {
  instructionsPerSecond: number; // step cadence
  foregroundColor: RGB; // rendering only
  backgroundColor: RGB; // rendering only
  keyLayout: string; // input translation only; see keyMapFromLayout
  keyMap: KeyMap;
  quirkPreset: QuirkPreset;
  quirks: Quirks;
  trace: boolean;
}

export type Env = Record<string, string | undefined>;
export type Args = Record<string, string>;

export const DEFAULT_FOREGROUND: RGB = { r: 0xff, g: 0xff, b: 0xff };
export const DEFAULT_BACKGROUND: RGB = { r: 0x12, g: 0x12, b: 0x12 };

export function defaultConfig(): Chip8Config {
  return {
    instructionsPerSecond: DEFAULT_IPS,
    foregroundColor: { ...DEFAULT_FOREGROUND },
    backgroundColor: { ...DEFAULT_BACKGROUND },
    keyLayout: DEFAULT_KEY_LAYOUT,
    keyMap: keyMapFromLayout(DEFAULT_KEY_LAYOUT),
    quirkPreset: 'modern',
    quirks: quirksFor('modern'),
    trace: false,
  };
}

// '--name=value' pairs; anything else is ignored.
export function parseArgs(argv: string[]): Args {
  const out: Args = {};
  for (const a of argv) {
    const m = a.match(/^--([^=]+)=(.*)$/);
    if (m) out[m[1]] = m[2];
  }
  return out;
}

export function parseColor(option: string, raw: string): RGB {
  const s = raw.trim().replace(/^#/, '');
  const full = /^[0-9a-f]{3}$/i.test(s) ? [...s].map((c) => c + c).join('') : s;
  if (!/^[0-9a-f]{6}$/i.test(full)) throw new ConfigError(option, `expected #rrggbb or #rgb, got "${raw}"`);
  const v = parseInt(full, 16);
  return { r: (v >> 16) & 0xff, g: (v >> 8) & 0xff, b: v & 0xff };
}

export function parseFlag(option: string, raw: string): boolean {
  const s = raw.trim().toLowerCase();
  if (s === '1' || s === 'true' || s === 'on') return true;
  if (s === '0' || s === 'false' || s === 'off' || s === '') return false;
  throw new ConfigError(option, `expected 0/1/true/false, got "${raw}"`);
}

function parseIps(option: string, raw: string): number {
  const v = Number(raw);
  if (!Number.isFinite(v) || v <= 0) throw new ConfigError(option, `expected a positive number, got "${raw}"`);
  return v;
}

function envQuirkName(name: QuirkName): string {
  return 'CHIP8_QUIRK_' + name.replace(/([a-z])([A-Z])/g, '$1_$2').toUpperCase();
}

interface Sources {
  ips?: string;
  fg?: string;
  bg?: string;
  keys?: string;
  quirks?: string;
  trace?: string;
  quirkOverrides: Partial<Record<QuirkName, string>>;
}

function apply(base: Chip8Config, src: Sources, names: Record<keyof Omit<Sources, 'quirkOverrides'>, string>): Chip8Config {
  const cfg: Chip8Config = { ...base, quirks: { ...base.quirks } };
  if (src.ips !== undefined) cfg.instructionsPerSecond = parseIps(names.ips, src.ips);
  if (src.fg !== undefined) cfg.foregroundColor = parseColor(names.fg, src.fg);
  if (src.bg !== undefined) cfg.backgroundColor = parseColor(names.bg, src.bg);
  if (src.keys !== undefined) {
    try {
      cfg.keyMap = keyMapFromLayout(src.keys);
      cfg.keyLayout = src.keys.toLowerCase();
    } catch (e) {
      throw new ConfigError(names.keys, e instanceof Error ? e.message : String(e));
    }
  }
  if (src.quirks !== undefined) {
    const preset = src.quirks.trim().toLowerCase();
    if (!isQuirkPreset(preset)) throw new ConfigError(names.quirks, `unknown preset "${src.quirks}"`);
    cfg.quirkPreset = preset;
    cfg.quirks = quirksFor(preset);
  }
  for (const q of QUIRK_NAMES) {
    const raw = src.quirkOverrides[q];
    if (raw !== undefined) cfg.quirks[q] = parseFlag(q, raw);
  }
  if (src.trace !== undefined) cfg.trace = parseFlag(names.trace, src.trace);
  return cfg;
}

/**
 * Read CHIP8_* variables: CHIP8_IPS, CHIP8_FG, CHIP8_BG, CHIP8_KEYMAP,
 * CHIP8_QUIRKS (preset), CHIP8_QUIRK_<NAME> (single flag, e.g.
 * CHIP8_QUIRK_SHIFT_READS_VY) and CHIP8_TRACE.
 */
export function configFromEnv(env: Env = process.env, base: Chip8Config = defaultConfig()): Chip8Config {
  const quirkOverrides: Partial<Record<QuirkName, string>> = {};
  for (const q of QUIRK_NAMES) {
    const raw = env[envQuirkName(q)];
    if (raw !== undefined) quirkOverrides[q] = raw;
  }
  return apply(base, {
    ips: env.CHIP8_IPS,
    fg: env.CHIP8_FG,
    bg: env.CHIP8_BG,
    keys: env.CHIP8_KEYMAP,
    quirks: env.CHIP8_QUIRKS,
    trace: env.CHIP8_TRACE,
    quirkOverrides,
  }, { ips: 'CHIP8_IPS', fg: 'CHIP8_FG', bg: 'CHIP8_BG', keys: 'CHIP8_KEYMAP', quirks: 'CHIP8_QUIRKS', trace: 'CHIP8_TRACE' });
}

// Script arguments win over the environment: --ips= --fg= --bg= --keys= --quirks= --trace= --<quirkName>=
export function configFromArgs(args: Args, base: Chip8Config): Chip8Config {
  const quirkOverrides: Partial<Record<QuirkName, string>> = {};
  for (const q of QUIRK_NAMES) {
    if (args[q] !== undefined) quirkOverrides[q] = args[q];
  }
  return apply(base, {
    ips: args.ips,
    fg: args.fg,
    bg: args.bg,
    keys: args.keys,
    quirks: args.quirks,
    trace: args.trace,
    quirkOverrides,
  }, { ips: '--ips', fg: '--fg', bg: '--bg', keys: '--keys', quirks: '--quirks', trace: '--trace' });
}

export function loadConfig(argv: string[], env: Env = process.env): Chip8Config {
  return configFromArgs(parseArgs(argv), configFromEnv(env));
}
