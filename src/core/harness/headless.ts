import { Chip8System } from '@core/system/system';
import type { CPUOptions } from '@core/cpu/cpu';

export interface RunResult {
  cycles: number;
  // pass: the program parked itself in a jump-to-self loop
  reason: 'pass' | 'fail' | 'timeout';
  message?: string;
  pc: number;
}

export interface RunOptions extends CPUOptions {
  maxCycles: number;
  // keys held down for the whole run, as hex slots
  keys?: number[];
}

export function runImage(image: Uint8Array, opts: RunOptions): { sys: Chip8System; result: RunResult } {
  const sys = new Chip8System({ random: opts.random, waitKeyMode: opts.waitKeyMode });
  sys.loadImage(image);
  for (const k of opts.keys ?? []) sys.setKey(k, true);
  return { sys, result: runSystem(sys, opts.maxCycles) };
}

export function runSystem(sys: Chip8System, maxCycles: number): RunResult {
  const cpu = sys.cpu;
  while (cpu.state.cycles < maxCycles) {
    const pc = cpu.state.pc;
    try {
      cpu.step();
    } catch (e) {
      return { cycles: cpu.state.cycles, reason: 'fail', message: e instanceof Error ? e.message : String(e), pc };
    }
    // 1nnn pointing at itself
    if (cpu.state.pc === pc && (cpu.state.opcode & 0xF000) === 0x1000) {
      return { cycles: cpu.state.cycles, reason: 'pass', pc };
    }
  }
  return { cycles: cpu.state.cycles, reason: 'timeout', pc: cpu.state.pc };
}
