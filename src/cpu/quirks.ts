// Behaviour that differs between historical CHIP-8 interpreters. Each flag
// selects one documented variant; presets bundle the combinations ROMs expect.
export interface Quirks {
  /** 8XY6/8XYE shift Vy into Vx (COSMAC VIP) instead of shifting Vx in place. */
  shiftReadsVy: boolean;
  /** FX1E sets VF=1 when I passes 0xFFF, else VF=0 (Amiga interpreter). */
  indexOverflowSetsVF: boolean;
  /** FX55/FX65 leave I pointing past the last register copied. */
  loadStoreIncrementsIndex: boolean;
  /** 8XY1/8XY2/8XY3 reset VF to 0. */
  logicResetsVF: boolean;
  /** BNNN jumps to NNN + VX (X = high nibble of NNN) instead of NNN + V0. */
  jumpUsesVx: boolean;
  /** Sprite pixels past the screen edge wrap to the opposite side instead of being clipped. */
  spriteWrap: boolean;
}

export type QuirkName = keyof Quirks;
export type QuirkPreset = 'modern' | 'original' | 'cosmac' | 'schip' | 'amiga';

export const QUIRK_NAMES: readonly QuirkName[] = [
  'shiftReadsVy',
  'indexOverflowSetsVF',
  'loadStoreIncrementsIndex',
  'logicResetsVF',
  'jumpUsesVx',
  'spriteWrap',
];

export const QUIRK_PRESETS: Readonly<Record<QuirkPreset, Readonly<Quirks>>> = {
  modern: {
    shiftReadsVy: false,
    indexOverflowSetsVF: false,
    loadStoreIncrementsIndex: false,
    logicResetsVF: false,
    jumpUsesVx: false,
    spriteWrap: false,
  },
  // modern, except shifts read Vy
  original: {
    shiftReadsVy: true,
    indexOverflowSetsVF: false,
    loadStoreIncrementsIndex: false,
    logicResetsVF: false,
    jumpUsesVx: false,
    spriteWrap: false,
  },
  cosmac: {
    shiftReadsVy: true,
    indexOverflowSetsVF: false,
    loadStoreIncrementsIndex: true,
    logicResetsVF: true,
    jumpUsesVx: false,
    spriteWrap: false,
  },
  schip: {
    shiftReadsVy: false,
    indexOverflowSetsVF: false,
    loadStoreIncrementsIndex: false,
    logicResetsVF: false,
    jumpUsesVx: true,
    spriteWrap: false,
  },
  amiga: {
    shiftReadsVy: false,
    indexOverflowSetsVF: true,
    loadStoreIncrementsIndex: false,
    logicResetsVF: false,
    jumpUsesVx: false,
    spriteWrap: false,
  },
};

export function isQuirkPreset(name: string): name is QuirkPreset {
  return Object.prototype.hasOwnProperty.call(QUIRK_PRESETS, name);
}

export function quirksFor(preset: QuirkPreset = 'modern', overrides: Partial<Quirks> = {}): Quirks {
  return { ...QUIRK_PRESETS[preset], ...overrides };
}
