import { Emulator } from '../src/emulator/core';
import { Scheduler } from '../src/emulator/scheduler';
import { isChip8Error } from '../src/emulator/errors';
import { loadConfig, parseArgs } from '../src/config/options';
import { applyPresses, parsePresses } from '../src/input/presses';
import { loadRomFile } from '../src/rom/loader';
import { renderFrameAscii } from '../src/video/renderer';
import { writeFramePNG } from '../src/video/png';

async function main() {
  const argv = process.argv.slice(2);
  const args = parseArgs(argv);
  const cfg = loadConfig(argv);
  const romPath = args.rom || process.env.CHIP8_ROM;
  const outPath = args.out || 'screenshot.png';
  const frames = Number.isFinite(Number(args.frames)) ? Math.max(1, Number(args.frames)) : 120;
  const scale = Number.isFinite(Number(args.scale)) ? Math.max(1, Number(args.scale)) : 8;
  const ascii = (args.ascii ?? '0') !== '0';
  const presses = parsePresses(args.press);

  if (!romPath) {
    console.error('Usage: npm run screenshot -- --rom=path/to/game.ch8 [--out=screenshot.png] [--frames=120] [--ips=700] [--scale=8] [--quirks=modern|original|cosmac|schip|amiga] [--press=5@30:2,a@60] [--ascii=1] [--trace=1]');
    process.exit(1);
  }

  console.log(`[screenshot] ROM: ${romPath}  out: ${outPath}  frames: ${frames}  ips: ${cfg.instructionsPerSecond}  quirks: ${cfg.quirkPreset}  scale: ${scale}`);

  const rom = loadRomFile(romPath);
  const emu = Emulator.fromProgram(rom, { quirks: cfg.quirks, trace: cfg.trace });
  const sched = new Scheduler(emu, { instructionsPerSecond: cfg.instructionsPerSecond, onCpuError: 'record' });

  for (let i = 0; i < frames && !emu.halted; i++) {
    applyPresses(emu.keypad, presses, i);
    sched.stepFrame();
    if (i % 60 === 59) console.log(`[screenshot] stepped ${i + 1} frames`);
  }

  if (sched.lastCpuError !== undefined) {
    const e = sched.lastCpuError;
    if (!isChip8Error(e)) throw e;
    // Still write the frame the program halted on.
    console.error(`[screenshot] halted: ${e.message}`);
  }

  const { steps, timerTicks } = sched.stats();
  console.log(`[screenshot] executed ${steps} instructions, ${timerTicks} timer ticks, ${emu.display.litCount()} lit cells`);
  if (ascii) console.log(renderFrameAscii(emu.display));

  await writeFramePNG(outPath, emu.display, { foreground: cfg.foregroundColor, background: cfg.backgroundColor }, scale);
  console.log(`Wrote ${outPath} (${emu.display.width * scale}x${emu.display.height * scale})`);
}

main().catch((e) => {
  console.error('[screenshot] Unhandled error:', e instanceof Error ? e.message : e);
  process.exit(1);
});
