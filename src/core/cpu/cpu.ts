import type { Byte, CPUState, WaitKeyMode } from './types';
import { decode, fields } from './decode';
import { HANDLERS, type Machine, type TimerKind } from './instructions';
import { Memory, PROGRAM_START } from '@core/bus/memory';
import { Display } from '@core/display/display';
import { Keypad } from '@core/input/keypad';
import { DecodeError } from '@core/errors';
import { getEnv, parseWindow } from '@utils/env';
import { hex } from '@utils/hex';

export interface CPUOptions {
  random?: () => Byte;
  waitKeyMode?: WaitKeyMode;
}

export function initialState(): CPUState {
  return {
    v: new Uint8Array(16),
    i: 0,
    pc: PROGRAM_START,
    sp: 0,
    stack: new Uint16Array(16),
    delayTimer: 0,
    soundTimer: 0,
    opcode: 0,
    cycles: 0,
  };
}

export class Chip8CPU implements Machine {
  state: CPUState = initialState();
  random: () => Byte;
  waitKeyMode: WaitKeyMode;
  timerHook: ((kind: TimerKind, value: Byte) => void) | null = null;
  // optional external per-instruction trace hook
  private traceHook: ((pc: number, opcode: number) => void) | null = null;
  private traceWindow: { start: number; end: number } | null;

  constructor(readonly memory: Memory, readonly display: Display, readonly keypad: Keypad, opts: CPUOptions = {}) {
    this.random = opts.random ?? (() => Math.floor(Math.random() * 256));
    const envMode = getEnv('CHIP8_WAIT_KEY');
    this.waitKeyMode = opts.waitKeyMode ?? (envMode === 'skip' ? 'skip' : 'block');
    this.traceWindow = parseWindow(getEnv('TRACE_PC_WINDOW'));
    if (getEnv('TRACE_TIMERS') === '1') {
      // eslint-disable-next-line no-console
      this.timerHook = (kind, value) => console.log(`[timer] ${kind}=${value} pc=$${hex(this.state.pc, 3)}`);
    }
  }

  setTraceHook(fn: ((pc: number, opcode: number) => void) | null): void { this.traceHook = fn; }
  setWaitKeyMode(mode: WaitKeyMode): void { this.waitKeyMode = mode; }

  get delayTimer(): Byte { return this.state.delayTimer; }
  get soundTimer(): Byte { return this.state.soundTimer; }

  reset(): void {
    this.state = initialState();
  }

  // Merge the two bytes at PC big-endian into the current opcode
  fetch(): number {
    this.state.opcode = this.memory.read16(this.state.pc);
    return this.state.opcode;
  }

  // Decode and run the current opcode
  execute(): void {
    const op = this.state.opcode;
    const mnemonic = decode(op);
    if (mnemonic === null) throw new DecodeError(op, this.state.pc);
    HANDLERS[mnemonic](this, fields(op));
  }

  tickTimers(): void {
    const s = this.state;
    if (s.delayTimer > 0) s.delayTimer--;
    if (s.soundTimer > 0) s.soundTimer--;
  }

  // One fetch-decode-execute-timer cycle
  step(): void {
    const pc = this.state.pc;
    const op = this.fetch();
    const win = this.traceWindow;
    if (win && this.state.cycles >= win.start && this.state.cycles <= win.end) {
      // eslint-disable-next-line no-console
      console.log(`[trace] pc=$${hex(pc, 3)} op=$${hex(op, 4)} i=$${hex(this.state.i, 3)} cyc=${this.state.cycles}`);
    }
    this.traceHook?.(pc, op);
    this.execute();
    this.tickTimers();
    this.state.cycles++;
  }
}
