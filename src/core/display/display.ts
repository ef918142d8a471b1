import type { PixelState } from '@core/cpu/types';
import { PixelIndexError, PixelStateError } from '@core/errors';

export const DISPLAY_WIDTH = 64;
export const DISPLAY_HEIGHT = 32;
export const PIXEL_COUNT = DISPLAY_WIDTH * DISPLAY_HEIGHT;
// RGB24: every logical pixel is an identical byte triplet so the buffer can be uploaded as-is
export const BYTES_PER_PIXEL = 3;
export const DISPLAY_SIZE = PIXEL_COUNT * BYTES_PER_PIXEL;
export const PIXEL_ON = 0xFF;
export const PIXEL_OFF = 0x00;

export interface SpriteSource {
  read(addr: number): number;
}

export class Display {
  private fb = new Uint8Array(DISPLAY_SIZE);

  // Live buffer; pixel (col,row) starts at 3*(row*64+col)
  get framebuffer(): Uint8Array { return this.fb; }

  clear(): void { this.fb.fill(PIXEL_OFF); }

  getPixel(index: number): PixelState {
    const base = this.triplet(index);
    // All three bytes are written together, so the first one speaks for the pixel
    const v = this.fb[base];
    if (v === PIXEL_ON) return 1;
    if (v === PIXEL_OFF) return 0;
    throw new PixelStateError(index, v);
  }

  setPixel(index: number, state: PixelState): void {
    const base = this.triplet(index);
    const v = state === 1 ? PIXEL_ON : PIXEL_OFF;
    this.fb[base] = v;
    this.fb[base + 1] = v;
    this.fb[base + 2] = v;
  }

  // Equal states turn the pixel off, different states turn it on
  xorPixel(index: number, state: PixelState): void {
    this.setPixel(index, this.getPixel(index) === state ? 0 : 1);
  }

  /**
   * Draw an n-row sprite read from `src` at `addr` with its top-left at (x, y).
   * Wrapping is applied in two fixed steps per pixel:
   * 1. an index past the last pixel moves up 31 rows;
   * 2. a column past the right edge moves back one row width.
   * Returns true when any pixel under the sprite box was already on.
   */
  drawSprite(src: SpriteSource, addr: number, x: number, y: number, n: number): boolean {
    const start = x + y * DISPLAY_WIDTH;
    let collision = false;
    for (let row = 0; row < n; row++) {
      const bits = src.read(addr + row);
      for (let col = 0; col < 8; col++) {
        const bit: PixelState = (bits & (0x80 >> col)) === 0 ? 0 : 1;
        let target = start + row * DISPLAY_WIDTH + col;
        if (target > PIXEL_COUNT - 1) target -= DISPLAY_WIDTH * (DISPLAY_HEIGHT - 1);
        if (x + col >= DISPLAY_WIDTH) target -= DISPLAY_WIDTH;
        if (this.getPixel(target) === 1) collision = true;
        this.xorPixel(target, bit);
      }
    }
    return collision;
  }

  // Count of lit pixels, for tests and scripts
  litCount(): number {
    let n = 0;
    for (let i = 0; i < PIXEL_COUNT; i++) if (this.fb[i * BYTES_PER_PIXEL] === PIXEL_ON) n++;
    return n;
  }

  private triplet(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= PIXEL_COUNT) throw new PixelIndexError(index);
    return index * BYTES_PER_PIXEL;
  }
}
