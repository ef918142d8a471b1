import { Memory } from '@core/bus/memory';
import { Chip8CPU, type CPUOptions } from '@core/cpu/cpu';
import { Display } from '@core/display/display';
import { Keypad, type HexKey } from '@core/input/keypad';
import type { PixelState } from '@core/cpu/types';
import { loadImageFile } from '@core/image/image';

// One self-contained machine; instances share no state.
export class Chip8System {
  public memory: Memory;
  public display: Display;
  public keypad: Keypad;
  public cpu: Chip8CPU;

  constructor(opts: CPUOptions = {}) {
    this.memory = new Memory();
    this.display = new Display();
    this.keypad = new Keypad();
    this.cpu = new Chip8CPU(this.memory, this.display, this.keypad, opts);
  }

  // Copy an image to $200. Returns the number of bytes that fit.
  loadImage(bytes: Uint8Array): number {
    return this.memory.loadImage(bytes);
  }

  // Read a file and load it; throws ImageLoadError / ImageTooLargeError before memory is touched
  loadImageFile(path: string, opts: { allowOversize?: boolean } = {}): number {
    return this.loadImage(loadImageFile(path, opts));
  }

  step(): void {
    this.cpu.step();
  }

  // Run up to `count` steps; stops early if the CPU throws (the error propagates)
  run(count: number): void {
    for (let i = 0; i < count; i++) this.cpu.step();
  }

  updateKeypad(code: string, pressed: boolean): void {
    this.keypad.update(code, pressed);
  }

  setKey(hex: HexKey, pressed: boolean): void {
    this.keypad.setKey(hex, pressed);
  }

  getPixel(index: number): PixelState { return this.display.getPixel(index); }
  setPixel(index: number, state: PixelState): void { this.display.setPixel(index, state); }
  xorPixel(index: number, state: PixelState): void { this.display.xorPixel(index, state); }

  get framebuffer(): Uint8Array { return this.display.framebuffer; }
  get soundTimer(): number { return this.cpu.soundTimer; }
  get delayTimer(): number { return this.cpu.delayTimer; }
}
