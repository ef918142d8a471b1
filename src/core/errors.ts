import { hex } from '@utils/hex';

export class Chip8Error extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DecodeError extends Chip8Error {
  constructor(readonly opcode: number, readonly pc: number) {
    super(`unknown opcode $${hex(opcode, 4)} at $${hex(pc, 3)}`);
  }
}

export class StackOverflowError extends Chip8Error {
  constructor(readonly pc: number) {
    super(`stack overflow: call at $${hex(pc, 3)} exceeds 16 levels`);
  }
}

export class StackUnderflowError extends Chip8Error {
  constructor(readonly pc: number) {
    super(`stack underflow: return at $${hex(pc, 3)} with empty stack`);
  }
}

export class MemoryAccessError extends Chip8Error {
  constructor(readonly addr: number) {
    super(`memory access out of range: $${hex(addr, 4)}`);
  }
}

export class PixelStateError extends Chip8Error {
  constructor(readonly index: number, readonly value: number) {
    super(`pixel ${index} holds ${value}, expected 0 or 255`);
  }
}

export class PixelIndexError extends Chip8Error {
  constructor(readonly index: number) {
    super(`pixel index out of range: ${index}`);
  }
}

export class ImageLoadError extends Chip8Error {
  constructor(readonly path: string, cause: unknown) {
    super(`cannot read image ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export class ImageTooLargeError extends Chip8Error {
  constructor(readonly size: number, readonly capacity: number) {
    super(`image is ${size} bytes, only ${capacity} fit above $200`);
  }
}
