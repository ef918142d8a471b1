import fs from 'node:fs';
import { PROGRAM_CAPACITY } from '@core/bus/memory';
import { ImageLoadError, ImageTooLargeError } from '@core/errors';

// Read the whole file up front so a failed read never leaves memory half written
export function readImageFile(path: string): Uint8Array {
  try {
    return new Uint8Array(fs.readFileSync(path));
  } catch (e) {
    throw new ImageLoadError(path, e);
  }
}

export function validateImage(bytes: Uint8Array): Uint8Array {
  if (bytes.length > PROGRAM_CAPACITY) throw new ImageTooLargeError(bytes.length, PROGRAM_CAPACITY);
  return bytes;
}

export function loadImageFile(path: string, opts: { allowOversize?: boolean } = {}): Uint8Array {
  const bytes = readImageFile(path);
  return opts.allowOversize ? bytes : validateImage(bytes);
}
