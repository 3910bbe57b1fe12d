export { Emulator, type EmulatorOptions } from './emulator/core';
export { Scheduler, DEFAULT_IPS, TIMER_HZ, type SchedulerOptions, type FrameResult, type CpuErrorMode } from './emulator/scheduler';
export { ManualClock, systemClock, type Clock } from './emulator/clock';
export * from './emulator/errors';
export { Chip8CPU, STACK_DEPTH, type CPUState, type CPUOptions } from './cpu/cpu';
export { decode, disassemble, formatInstruction, type Instruction, type Mnemonic } from './cpu/opcodes';
export { disassembleRom } from './cpu/disasm';
export { QUIRK_PRESETS, quirksFor, type Quirks, type QuirkPreset } from './cpu/quirks';
export { Memory, MEMORY_SIZE, PROGRAM_START, PROGRAM_CAPACITY } from './memory/memory';
export { FONT, FONT_BASE, fontAddress } from './memory/font';
export { Display, DISPLAY_WIDTH, DISPLAY_HEIGHT, type EdgeMode } from './video/display';
export { renderFrameRGBA, renderFrameAscii, renderFrameHalfBlocks, type Palette } from './video/renderer';
export { encodeFramePNG, writeFramePNG } from './video/png';
export { Keypad, KEY_COUNT } from './input/keypad';
export { DEFAULT_KEY_MAP, keyMapFromLayout, lookupKey, type KeyMap } from './input/keymap';
export { loadConfig, configFromEnv, configFromArgs, defaultConfig, ConfigError, type Chip8Config } from './config/options';
export { loadRomFile, validateRom } from './rom/loader';
