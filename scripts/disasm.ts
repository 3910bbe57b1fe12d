import { parseArgs } from '../src/config/options';
import { disassembleRom } from '../src/cpu/disasm';
import { loadRomFile } from '../src/rom/loader';

function main() {
  const args = parseArgs(process.argv.slice(2));
  if (!args.rom) {
    console.error('Usage: npm run disasm -- --rom=path/to/game.ch8');
    process.exit(1);
  }
  for (const line of disassembleRom(loadRomFile(args.rom))) console.log(line);
}

try {
  main();
} catch (e) {
  console.error('[disasm] error:', e instanceof Error ? e.message : e);
  process.exit(1);
}
