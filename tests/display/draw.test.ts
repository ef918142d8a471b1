import { describe, it, expect } from 'vitest';
import { Chip8System } from '@core/system/system';
import { Display, DISPLAY_WIDTH, DISPLAY_SIZE, PIXEL_ON } from '@core/display/display';
import { PixelIndexError, PixelStateError } from '@core/errors';
import { exec } from '@test/helpers/cpuh';

function lit(d: Display): number[] {
  const out: number[] = [];
  for (let i = 0; i < 2048; i++) if (d.getPixel(i) === 1) out.push(i);
  return out;
}

describe('Display pixel accessors', () => {
  it('exposes a 64x32 RGB24 buffer', () => {
    const d = new Display();
    expect(d.framebuffer.length).toBe(DISPLAY_SIZE);
    expect(DISPLAY_SIZE).toBe(6144);
  });

  it('setPixel writes all three bytes of the triplet', () => {
    const d = new Display();
    d.setPixel(65, 1); // col 1, row 1
    expect(Array.from(d.framebuffer.slice(195, 198))).toEqual([PIXEL_ON, PIXEL_ON, PIXEL_ON]);
    expect(d.framebuffer[198]).toBe(0);
    expect(d.getPixel(65)).toBe(1);
    d.setPixel(65, 0);
    expect(Array.from(d.framebuffer.slice(195, 198))).toEqual([0, 0, 0]);
  });

  it.each([
    { before: 0, state: 0, after: 0 },
    { before: 0, state: 1, after: 1 },
    { before: 1, state: 0, after: 1 },
    { before: 1, state: 1, after: 0 },
  ] as const)('xorPixel: $before with $state gives $after', ({ before, state, after }) => {
    const d = new Display();
    d.setPixel(10, before);
    d.xorPixel(10, state);
    expect(d.getPixel(10)).toBe(after);
  });

  it('a stored byte other than 0 or 255 is an invariant violation', () => {
    const d = new Display();
    d.framebuffer[15] = 0x7F;
    expect(() => d.getPixel(5)).toThrow(PixelStateError);
    expect(() => d.xorPixel(5, 1)).toThrow('pixel 5 holds 127, expected 0 or 255');
  });

  it('rejects indices outside the grid', () => {
    const d = new Display();
    expect(() => d.getPixel(2048)).toThrow(PixelIndexError);
    expect(() => d.setPixel(-1, 1)).toThrow(PixelIndexError);
  });
});

describe('Dxyn sprite drawing', () => {
  it('draws a font glyph at the given position', () => {
    const sys = new Chip8System();
    const s = sys.cpu.state;
    s.v[0] = 2; s.v[1] = 3;
    s.i = 5; // glyph "1": 0x20 0x60 0x20 0x20 0x70
    exec(sys, 0xD015);
    const row = (r: number, c: number) => (3 + r) * DISPLAY_WIDTH + 2 + c;
    expect(lit(sys.display)).toEqual([
      row(0, 2),
      row(1, 1), row(1, 2),
      row(2, 2),
      row(3, 2),
      row(4, 1), row(4, 2), row(4, 3),
    ]);
    expect(s.v[0xF]).toBe(0);
    expect(s.pc).toBe(0x202);
  });

  it('drawing the same sprite twice erases it and flags a collision', () => {
    const sys = new Chip8System();
    sys.cpu.state.i = 0;
    exec(sys, 0xD005);
    exec(sys, 0xD005);
    expect(sys.display.litCount()).toBe(0);
    expect(sys.cpu.state.v[0xF]).toBe(1);
  });

  it('wraps a sprite at the right edge back onto its own row', () => {
    const sys = new Chip8System();
    const s = sys.cpu.state;
    s.v[0] = 63; s.v[1] = 0;
    s.i = 0x755;
    sys.memory.write(0x755, 0xC0);
    sys.memory.write(0x756, 0xC0);
    sys.setPixel(DISPLAY_WIDTH - 1, 1);
    exec(sys, 0xD012);
    expect(sys.getPixel(DISPLAY_WIDTH - 1)).toBe(0);
    expect(sys.getPixel(DISPLAY_WIDTH * 2 - 1)).toBe(1);
    expect(sys.getPixel(0)).toBe(1);
    expect(sys.getPixel(DISPLAY_WIDTH)).toBe(1);
    expect(lit(sys.display)).toEqual([0, 64, 127]);
    expect(s.v[0xF]).toBe(1);
  });

  it('flags a collision for a lit pixel under a clear sprite bit', () => {
    const sys = new Chip8System();
    const s = sys.cpu.state;
    s.i = 0x300;
    sys.memory.write(0x300, 0x80);
    sys.setPixel(3, 1);
    exec(sys, 0xD001);
    expect(s.v[0xF]).toBe(1);
    expect(lit(sys.display)).toEqual([0, 3]);
  });

  it('rows past the bottom move up 31 rows', () => {
    const sys = new Chip8System();
    const s = sys.cpu.state;
    s.v[0] = 0; s.v[1] = 31;
    s.i = 0x300;
    sys.memory.write(0x300, 0x80);
    sys.memory.write(0x301, 0x80);
    exec(sys, 0xD012);
    expect(lit(sys.display)).toEqual([64, 31 * 64]);
  });

  it('clears VF before drawing', () => {
    const sys = new Chip8System();
    sys.cpu.state.v[0xF] = 1;
    sys.cpu.state.i = 0x300;
    exec(sys, 0xD001);
    expect(sys.cpu.state.v[0xF]).toBe(0);
  });

  it('reads VF as the x coordinate before clearing it', () => {
    const sys = new Chip8System();
    const s = sys.cpu.state;
    s.v[0xF] = 10; s.v[1] = 0;
    s.i = 0x80;
    sys.memory.write(0x80, 0x80);
    exec(sys, 0xDF11);
    expect(lit(sys.display)).toEqual([10]);
    expect(s.v[0xF]).toBe(0);
  });

  it('reads VF as the y coordinate before clearing it', () => {
    const sys = new Chip8System();
    const s = sys.cpu.state;
    s.v[1] = 0; s.v[0xF] = 2;
    s.i = 0x300;
    sys.memory.write(0x300, 0x80);
    exec(sys, 0xD1F1);
    expect(lit(sys.display)).toEqual([2 * DISPLAY_WIDTH]);
    expect(s.v[0xF]).toBe(0);
  });

  it('coordinates that land outside the grid raise a pixel index error', () => {
    const sys = new Chip8System();
    const s = sys.cpu.state;
    s.v[1] = 200;
    s.i = 0x300;
    expect(() => exec(sys, 0xD011)).toThrow(PixelIndexError);
  });
});
