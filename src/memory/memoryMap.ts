// CHIP-8 memory map.
// The interpreter runs natively, so the 0x000-0x1FF region that originally held it
// stores the hex font instead. Programs load at 0x200.
export const MEMORY_MAP = {
  SIZE: 0x1000,
  FONT_START: 0x000,
  PROGRAM_START: 0x200,
  END: 0xfff,
} as const;

export const FONT_GLYPH_BYTES = 5;

// Programs must fit between the load offset and the last addressable byte
export const MAX_ROM_SIZE = MEMORY_MAP.END - MEMORY_MAP.PROGRAM_START;
