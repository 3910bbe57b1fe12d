import { Emulator } from '../src/emulator/core';
import { Scheduler, TIMER_HZ } from '../src/emulator/scheduler';
import { isChip8Error } from '../src/emulator/errors';
import { loadConfig, parseArgs, type RGB } from '../src/config/options';
import { lookupKey } from '../src/input/keymap';
import { loadRomFile } from '../src/rom/loader';
import { renderFrameHalfBlocks } from '../src/video/renderer';

// Terminals report key presses only; a press is held this long before release.
const KEY_HOLD_MS = 120;
const ESC = '\x1b';
const CTRL_C = '\x03';

const ansiColor = (c: RGB, layer: 38 | 48) => `${ESC}[${layer};2;${c.r};${c.g};${c.b}m`;

function main() {
  const argv = process.argv.slice(2);
  const args = parseArgs(argv);
  const cfg = loadConfig(argv);
  const romPath = args.rom || process.env.CHIP8_ROM;
  if (!romPath) {
    console.error('Usage: npm run play -- --rom=path/to/game.ch8 [--ips=700] [--quirks=modern|original|cosmac|schip|amiga] [--keys=x123qweasdzc4rfv] [--fg=#ffffff] [--bg=#121212]');
    process.exit(1);
  }
  if (!process.stdin.isTTY) {
    console.error('[terminal] stdin is not a TTY; use the screenshot script for headless runs');
    process.exit(1);
  }

  const emu = Emulator.fromProgram(loadRomFile(romPath), { quirks: cfg.quirks });
  const sched = new Scheduler(emu, { instructionsPerSecond: cfg.instructionsPerSecond, onCpuError: 'record' });
  const releases = new Map<number, NodeJS.Timeout>();
  let paused = false;
  let wasSounding = false;

  const out = process.stdout;
  const quit = (code: number) => {
    clearInterval(loop);
    for (const t of releases.values()) clearTimeout(t);
    process.stdin.setRawMode(false);
    process.stdin.pause();
    out.write(`${ESC}[0m${ESC}[?25h\n`);
    process.exit(code);
  };

  process.stdin.setRawMode(true);
  process.stdin.setEncoding('utf8');
  process.stdin.on('data', (chunk: string) => {
    if (chunk === ESC || chunk === CTRL_C) quit(0);
    for (const ch of chunk) {
      if (ch === 'p') {
        paused = !paused;
        if (!paused) sched.resyncClock();
        continue;
      }
      const key = lookupKey(cfg.keyMap, ch);
      if (key === null) continue;
      emu.keypad.setKey(key, true);
      const pending = releases.get(key);
      if (pending) clearTimeout(pending);
      releases.set(key, setTimeout(() => {
        emu.keypad.setKey(key, false);
        releases.delete(key);
      }, KEY_HOLD_MS));
    }
  });

  out.write(`${ESC}[2J${ESC}[?25l`);
  const loop = setInterval(() => {
    if (!paused && !emu.halted) sched.runFrame();

    const sounding = emu.isSoundActive();
    const bell = sounding && !wasSounding ? '\x07' : '';
    wasSounding = sounding;

    let status = paused ? 'PAUSED (p to resume)' : `${cfg.instructionsPerSecond} ips  quirks=${cfg.quirkPreset}  p=pause esc=quit`;
    if (emu.fault) status = `HALTED: ${emu.fault.message}  (esc to quit)`;
    out.write(
      `${ESC}[H${ansiColor(cfg.foregroundColor, 38)}${ansiColor(cfg.backgroundColor, 48)}` +
      renderFrameHalfBlocks(emu.display) +
      `${ESC}[0m\n${status}${ESC}[K${bell}`,
    );

    if (sched.lastCpuError !== undefined && !isChip8Error(sched.lastCpuError)) {
      console.error('[terminal] unexpected error:', sched.lastCpuError);
      quit(1);
    }
  }, 1000 / TIMER_HZ);
}

try {
  main();
} catch (e) {
  console.error('[terminal] error:', e instanceof Error ? e.message : e);
  process.exit(1);
}
