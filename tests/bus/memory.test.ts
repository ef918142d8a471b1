import { describe, it, expect } from 'vitest';
import { Memory, FONTSET, MEMORY_SIZE, PROGRAM_START, PROGRAM_CAPACITY } from '@core/bus/memory';
import { MemoryAccessError } from '@core/errors';

describe('Memory', () => {
  it('preloads the 80-byte font at $000', () => {
    const mem = new Memory();
    expect(FONTSET.length).toBe(80);
    expect(Array.from(mem.slice(0x000, 0x050))).toEqual(Array.from(FONTSET));
    expect(mem.read(0x000)).toBe(0xF0);
    expect(mem.read(0x001)).toBe(0x90);
    expect(mem.read(65)).toBe(0xE0);
    expect(mem.read(79)).toBe(0x80);
    expect(mem.read(0x050)).toBe(0x00);
  });

  it('loads an image at $200 and leaves the font alone', () => {
    const mem = new Memory();
    const n = mem.loadImage(new Uint8Array([0x6A, 0x02, 0xD4, 0x55]));
    expect(n).toBe(4);
    expect(mem.read(PROGRAM_START)).toBe(0x6A);
    expect(mem.read(PROGRAM_START + 3)).toBe(0x55);
    expect(mem.read(PROGRAM_START + 4)).toBe(0x00);
    expect(Array.from(mem.slice(0, 80))).toEqual(Array.from(FONTSET));
  });

  it('truncates an oversized image at the end of memory', () => {
    const mem = new Memory();
    const big = new Uint8Array(PROGRAM_CAPACITY + 10).fill(0xAB);
    expect(mem.loadImage(big)).toBe(PROGRAM_CAPACITY);
    expect(mem.read(MEMORY_SIZE - 1)).toBe(0xAB);
    expect(mem.size).toBe(MEMORY_SIZE);
  });

  it('reads 16-bit words big-endian', () => {
    const mem = new Memory();
    mem.write(0x300, 0xD6);
    mem.write(0x301, 0x3E);
    expect(mem.read16(0x300)).toBe(0xD63E);
  });

  it('masks written values to a byte', () => {
    const mem = new Memory();
    mem.write(0x400, 0x1FF);
    expect(mem.read(0x400)).toBe(0xFF);
  });

  it('rejects addresses outside 0..4095', () => {
    const mem = new Memory();
    expect(() => mem.read(MEMORY_SIZE)).toThrow(MemoryAccessError);
    expect(() => mem.write(-1, 0)).toThrow(MemoryAccessError);
    expect(() => mem.read16(MEMORY_SIZE - 1)).toThrow('memory access out of range: $1000');
  });
});
