export type Byte = number; // 0..255
export type Word = number; // 0..65535
export type PixelState = 0 | 1;

export interface CPUState {
  v: Uint8Array; // V0..VF, VF doubles as carry/borrow/collision flag
  i: Word; // address register
  pc: Word; // program counter
  sp: number; // number of occupied stack slots
  stack: Uint16Array; // return addresses (call-site PC)
  delayTimer: Byte;
  soundTimer: Byte;
  opcode: Word; // last fetched instruction
  cycles: number;
}

// Fx0A behaviour: hold PC until a key is down, or advance immediately
export type WaitKeyMode = 'block' | 'skip';
