import type { Byte, CPUState, WaitKeyMode } from './types';
import type { Fields, Mnemonic } from './decode';
import type { Memory } from '@core/bus/memory';
import type { Display } from '@core/display/display';
import type { Keypad } from '@core/input/keypad';
import { FONT_GLYPH_BYTES, FONT_START } from '@core/bus/memory';
import { StackOverflowError, StackUnderflowError } from '@core/errors';

const VF = 0xF;
const STACK_DEPTH = 16;

export type TimerKind = 'delay' | 'sound';

// Everything an instruction may touch. Handlers never hold on to it between calls.
export interface Machine {
  state: CPUState;
  memory: Memory;
  display: Display;
  keypad: Keypad;
  random: () => Byte;
  waitKeyMode: WaitKeyMode;
  timerHook: ((kind: TimerKind, value: Byte) => void) | null;
}

export type Handler = (m: Machine, f: Fields) => void;

const next = (s: CPUState): void => { s.pc += 2; };
const skipIf = (s: CPUState, cond: boolean): void => { s.pc += cond ? 4 : 2; };

// --- flow ---

const CLS: Handler = (m) => { m.display.clear(); next(m.state); };

const RET: Handler = ({ state: s }) => {
  if (s.sp === 0) throw new StackUnderflowError(s.pc);
  s.sp--;
  s.pc = s.stack[s.sp] + 2;
};

const JP: Handler = ({ state: s }, f) => { s.pc = f.nnn; };

const CALL: Handler = ({ state: s }, f) => {
  if (s.sp >= STACK_DEPTH) throw new StackOverflowError(s.pc);
  s.stack[s.sp] = s.pc;
  s.sp++;
  s.pc = f.nnn;
};

const SE_BYTE: Handler = ({ state: s }, f) => skipIf(s, s.v[f.x] === f.kk);
const SNE_BYTE: Handler = ({ state: s }, f) => skipIf(s, s.v[f.x] !== f.kk);
const SE_REG: Handler = ({ state: s }, f) => skipIf(s, s.v[f.x] === s.v[f.y]);
const SNE_REG: Handler = ({ state: s }, f) => skipIf(s, s.v[f.x] !== s.v[f.y]);

const JP_V0: Handler = ({ state: s }, f) => { s.pc = f.nnn + s.v[0]; };

// --- registers and ALU ---
// v is a Uint8Array, so stores wrap to 8 bits. VF is written before Vx: with x = F the result wins.

const LD_BYTE: Handler = ({ state: s }, f) => { s.v[f.x] = f.kk; next(s); };
const ADD_BYTE: Handler = ({ state: s }, f) => { s.v[f.x] = s.v[f.x] + f.kk; next(s); };
const LD_REG: Handler = ({ state: s }, f) => { s.v[f.x] = s.v[f.y]; next(s); };
const OR: Handler = ({ state: s }, f) => { s.v[f.x] |= s.v[f.y]; next(s); };
const AND: Handler = ({ state: s }, f) => { s.v[f.x] &= s.v[f.y]; next(s); };
const XOR: Handler = ({ state: s }, f) => { s.v[f.x] ^= s.v[f.y]; next(s); };

const ADD_REG: Handler = ({ state: s }, f) => {
  const sum = s.v[f.x] + s.v[f.y];
  s.v[VF] = sum > 0xFF ? 1 : 0;
  s.v[f.x] = sum;
  next(s);
};

// Flag is 1 when no borrow occurs
const SUB: Handler = ({ state: s }, f) => {
  const vx = s.v[f.x], vy = s.v[f.y];
  s.v[VF] = vx >= vy ? 1 : 0;
  s.v[f.x] = vx - vy;
  next(s);
};

const SUBN: Handler = ({ state: s }, f) => {
  const vx = s.v[f.x], vy = s.v[f.y];
  s.v[VF] = vy >= vx ? 1 : 0;
  s.v[f.x] = vy - vx;
  next(s);
};

const SHR: Handler = ({ state: s }, f) => {
  s.v[VF] = s.v[f.x] & 0x01;
  s.v[f.x] >>= 1;
  next(s);
};

// VF receives the raw bit 7 mask (0x00 or 0x80)
const SHL: Handler = ({ state: s }, f) => {
  s.v[VF] = s.v[f.x] & 0x80;
  s.v[f.x] <<= 1;
  next(s);
};

const RND: Handler = (m, f) => {
  const s = m.state;
  s.v[f.x] = (m.random() & 0xFF) & f.kk;
  next(s);
};

// --- memory and I ---

const LD_I: Handler = ({ state: s }, f) => { s.i = f.nnn; next(s); };
const ADD_I: Handler = ({ state: s }, f) => { s.i = (s.i + s.v[f.x]) & 0xFFFF; next(s); };

const LD_F: Handler = ({ state: s }, f) => {
  s.i = FONT_START + (s.v[f.x] & 0xF) * FONT_GLYPH_BYTES;
  next(s);
};

const LD_B: Handler = ({ state: s, memory }, f) => {
  const vx = s.v[f.x];
  const hundreds = Math.floor(vx / 100);
  const tens = Math.floor((vx % 100) / 10);
  const ones = vx % 10;
  memory.write(s.i, hundreds);
  memory.write(s.i + 1, tens);
  memory.write(s.i + 2, ones);
  next(s);
};

const LD_MEM_VX: Handler = ({ state: s, memory }, f) => {
  for (let r = 0; r <= f.x; r++) memory.write(s.i + r, s.v[r]);
  next(s);
};

const LD_VX_MEM: Handler = ({ state: s, memory }, f) => {
  for (let r = 0; r <= f.x; r++) s.v[r] = memory.read(s.i + r);
  next(s);
};

// --- display ---

const DRW: Handler = (m, f) => {
  const s = m.state;
  // Coordinates are read first: either may be VF
  const x = s.v[f.x], y = s.v[f.y];
  s.v[VF] = 0;
  if (m.display.drawSprite(m.memory, s.i, x, y, f.n)) s.v[VF] = 1;
  next(s);
};

// --- keypad ---

const SKP: Handler = (m, f) => skipIf(m.state, m.keypad.isPressed(m.state.v[f.x]));
const SKNP: Handler = (m, f) => skipIf(m.state, !m.keypad.isPressed(m.state.v[f.x]));

// In block mode PC stays put until a key is down, so the next step runs this again
const LD_VX_K: Handler = (m, f) => {
  const s = m.state;
  if (m.waitKeyMode === 'skip') { next(s); return; }
  const key = m.keypad.firstPressed();
  if (key === null) return;
  s.v[f.x] = key;
  next(s);
};

// --- timers ---

const LD_VX_DT: Handler = ({ state: s }, f) => { s.v[f.x] = s.delayTimer; next(s); };

const LD_DT_VX: Handler = (m, f) => {
  const s = m.state;
  s.delayTimer = s.v[f.x];
  m.timerHook?.('delay', s.delayTimer);
  next(s);
};

const LD_ST_VX: Handler = (m, f) => {
  const s = m.state;
  s.soundTimer = s.v[f.x];
  m.timerHook?.('sound', s.soundTimer);
  next(s);
};

export const HANDLERS: Readonly<Record<Mnemonic, Handler>> = {
  CLS, RET, JP, CALL,
  SE_BYTE, SNE_BYTE, SE_REG, LD_BYTE, ADD_BYTE,
  LD_REG, OR, AND, XOR, ADD_REG, SUB, SHR, SUBN, SHL,
  SNE_REG, LD_I, JP_V0, RND, DRW,
  SKP, SKNP,
  LD_VX_DT, LD_VX_K, LD_DT_VX, LD_ST_VX, ADD_I, LD_F, LD_B, LD_MEM_VX, LD_VX_MEM,
};
