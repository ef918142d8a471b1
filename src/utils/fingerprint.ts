import type { Display } from '@core/display/display';
import { PIXEL_COUNT } from '@core/display/display';
import { hex } from '@utils/hex';

const POLY = 0xEDB88320;

// CRC32 (IEEE, reflected), bit at a time
export function crc32(bytes: Uint8Array): number {
  let c = 0xFFFFFFFF;
  for (const b of bytes) {
    c ^= b;
    for (let k = 0; k < 8; k++) c = (c >>> 1) ^ (POLY & -(c & 1));
  }
  return ~c >>> 0;
}

// One bit per pixel, row-major, leftmost pixel in bit 7: 8 bytes per row
export function packFrame(display: Display): Uint8Array {
  const out = new Uint8Array(PIXEL_COUNT / 8);
  for (let p = 0; p < PIXEL_COUNT; p++) {
    if (display.getPixel(p) === 1) out[p >> 3] |= 0x80 >> (p & 7);
  }
  return out;
}

// Stable id of what is on screen, independent of the RGB encoding
export function frameFingerprint(display: Display): string {
  return hex(crc32(packFrame(display)), 8);
}
