import type { Word } from './types';

export type Mnemonic =
  | 'CLS' | 'RET' | 'JP' | 'CALL'
  | 'SE_BYTE' | 'SNE_BYTE' | 'SE_REG' | 'LD_BYTE' | 'ADD_BYTE'
  | 'LD_REG' | 'OR' | 'AND' | 'XOR' | 'ADD_REG' | 'SUB' | 'SHR' | 'SUBN' | 'SHL'
  | 'SNE_REG' | 'LD_I' | 'JP_V0' | 'RND' | 'DRW'
  | 'SKP' | 'SKNP'
  | 'LD_VX_DT' | 'LD_VX_K' | 'LD_DT_VX' | 'LD_ST_VX' | 'ADD_I' | 'LD_F' | 'LD_B' | 'LD_MEM_VX' | 'LD_VX_MEM';

export interface Fields {
  x: number; // bits 8..11
  y: number; // bits 4..7
  n: number; // bits 0..3
  kk: number; // bits 0..7
  nnn: number; // bits 0..11
}

export function fields(opcode: Word): Fields {
  return {
    x: (opcode >>> 8) & 0xF,
    y: (opcode >>> 4) & 0xF,
    n: opcode & 0xF,
    kk: opcode & 0xFF,
    nnn: opcode & 0xFFF,
  };
}

type Secondary = (opcode: Word) => Mnemonic | null;

const group0: Secondary = (op) => {
  switch (op & 0xFF) {
    case 0xE0: return 'CLS';
    case 0xEE: return 'RET';
    default: return null;
  }
};

const ALU: ReadonlyArray<Mnemonic | null> = [
  'LD_REG', 'OR', 'AND', 'XOR', 'ADD_REG', 'SUB', 'SHR', 'SUBN',
  null, null, null, null, null, null, 'SHL', null,
];
const group8: Secondary = (op) => ALU[op & 0xF];

const groupE: Secondary = (op) => {
  switch (op & 0xFF) {
    case 0x9E: return 'SKP';
    case 0xA1: return 'SKNP';
    default: return null;
  }
};

const groupF: Secondary = (op) => {
  switch (op & 0xFF) {
    case 0x07: return 'LD_VX_DT';
    case 0x0A: return 'LD_VX_K';
    case 0x15: return 'LD_DT_VX';
    case 0x18: return 'LD_ST_VX';
    case 0x1E: return 'ADD_I';
    case 0x29: return 'LD_F';
    case 0x33: return 'LD_B';
    case 0x55: return 'LD_MEM_VX';
    case 0x65: return 'LD_VX_MEM';
    default: return null;
  }
};

// Indexed by the top nibble
const PRIMARY: ReadonlyArray<Mnemonic | Secondary> = [
  group0, 'JP', 'CALL', 'SE_BYTE', 'SNE_BYTE', 'SE_REG', 'LD_BYTE', 'ADD_BYTE',
  group8, 'SNE_REG', 'LD_I', 'JP_V0', 'RND', 'DRW', groupE, groupF,
];

// Returns null for an opcode outside the instruction set
export function decode(opcode: Word): Mnemonic | null {
  const entry = PRIMARY[(opcode >>> 12) & 0xF];
  return typeof entry === 'function' ? entry(opcode) : entry;
}
