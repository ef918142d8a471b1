import type { Byte, Word } from '@core/cpu/types';
import { MemoryAccessError } from '@core/errors';
import { getEnv } from '@utils/env';
import fontRows from './font.json';

export const MEMORY_SIZE = 0x1000;
export const FONT_START = 0x000;
export const FONT_GLYPH_BYTES = 5;
export const PROGRAM_START = 0x200;
export const PROGRAM_CAPACITY = MEMORY_SIZE - PROGRAM_START; // 3584

// 16 hex-digit glyphs, 5 rows each, 4 pixels wide in the high nibble
export const FONTSET: Uint8Array = Uint8Array.from(fontRows.flat());

export class Memory {
  private ram = new Uint8Array(MEMORY_SIZE);

  constructor() {
    // Optional fill pattern for the area above the font, to expose reads of uninitialised memory
    const fill = getEnv('CHIP8_RAM_INIT');
    if (fill) {
      const v = parseInt(fill, 16);
      if (Number.isFinite(v)) this.ram.fill(v & 0xFF, FONT_START + FONTSET.length);
    }
    this.ram.set(FONTSET, FONT_START);
  }

  get size(): number { return this.ram.length; }

  read(addr: Word): Byte {
    this.check(addr);
    return this.ram[addr];
  }

  write(addr: Word, value: Byte): void {
    this.check(addr);
    this.ram[addr] = value & 0xFF;
  }

  // Big-endian 16-bit read (instruction fetch)
  read16(addr: Word): Word {
    return (this.read(addr) << 8) | this.read(addr + 1);
  }

  // Copy bytes at PROGRAM_START, truncating at the end of memory. Returns bytes written.
  loadImage(data: Uint8Array): number {
    const n = Math.min(PROGRAM_CAPACITY, data.length);
    if (n > 0) this.ram.set(data.subarray(0, n), PROGRAM_START);
    return n;
  }

  // Read-only copy of a range, for disassembly and tests
  slice(start: Word, end: Word): Uint8Array {
    this.check(start);
    if (end > start) this.check(end - 1);
    return this.ram.slice(start, end);
  }

  private check(addr: number): void {
    if (!Number.isInteger(addr) || addr < 0 || addr >= MEMORY_SIZE) throw new MemoryAccessError(addr);
  }
}
