import type { Byte, Word } from "@core/cpu/types";
import { decode, fields, type Fields, type Mnemonic } from "@core/cpu/decode";
import { hex } from "@utils/hex";

export type ReadByteFn = (addr: Word) => Byte;


export interface DisasmResult {
  opcode: number;
  bytes: [number, number];
  mnemonic: string;
  operand: string;
}

// Mnemonic text and operand layout, in the usual Cowgod reference syntax
const FORMAT: Record<Mnemonic, [string, (f: Fields) => string]> = {
  CLS: ["CLS", () => ""],
  RET: ["RET", () => ""],
  JP: ["JP", (f) => `$${hex(f.nnn, 3)}`],
  CALL: ["CALL", (f) => `$${hex(f.nnn, 3)}`],
  SE_BYTE: ["SE", (f) => `V${hex(f.x, 1)}, #$${hex(f.kk, 2)}`],
  SNE_BYTE: ["SNE", (f) => `V${hex(f.x, 1)}, #$${hex(f.kk, 2)}`],
  SE_REG: ["SE", (f) => `V${hex(f.x, 1)}, V${hex(f.y, 1)}`],
  LD_BYTE: ["LD", (f) => `V${hex(f.x, 1)}, #$${hex(f.kk, 2)}`],
  ADD_BYTE: ["ADD", (f) => `V${hex(f.x, 1)}, #$${hex(f.kk, 2)}`],
  LD_REG: ["LD", (f) => `V${hex(f.x, 1)}, V${hex(f.y, 1)}`],
  OR: ["OR", (f) => `V${hex(f.x, 1)}, V${hex(f.y, 1)}`],
  AND: ["AND", (f) => `V${hex(f.x, 1)}, V${hex(f.y, 1)}`],
  XOR: ["XOR", (f) => `V${hex(f.x, 1)}, V${hex(f.y, 1)}`],
  ADD_REG: ["ADD", (f) => `V${hex(f.x, 1)}, V${hex(f.y, 1)}`],
  SUB: ["SUB", (f) => `V${hex(f.x, 1)}, V${hex(f.y, 1)}`],
  SHR: ["SHR", (f) => `V${hex(f.x, 1)}`],
  SUBN: ["SUBN", (f) => `V${hex(f.x, 1)}, V${hex(f.y, 1)}`],
  SHL: ["SHL", (f) => `V${hex(f.x, 1)}`],
  SNE_REG: ["SNE", (f) => `V${hex(f.x, 1)}, V${hex(f.y, 1)}`],
  LD_I: ["LD", (f) => `I, $${hex(f.nnn, 3)}`],
  JP_V0: ["JP", (f) => `V0, $${hex(f.nnn, 3)}`],
  RND: ["RND", (f) => `V${hex(f.x, 1)}, #$${hex(f.kk, 2)}`],
  DRW: ["DRW", (f) => `V${hex(f.x, 1)}, V${hex(f.y, 1)}, ${f.n}`],
  SKP: ["SKP", (f) => `V${hex(f.x, 1)}`],
  SKNP: ["SKNP", (f) => `V${hex(f.x, 1)}`],
  LD_VX_DT: ["LD", (f) => `V${hex(f.x, 1)}, DT`],
  LD_VX_K: ["LD", (f) => `V${hex(f.x, 1)}, K`],
  LD_DT_VX: ["LD", (f) => `DT, V${hex(f.x, 1)}`],
  LD_ST_VX: ["LD", (f) => `ST, V${hex(f.x, 1)}`],
  ADD_I: ["ADD", (f) => `I, V${hex(f.x, 1)}`],
  LD_F: ["LD", (f) => `F, V${hex(f.x, 1)}`],
  LD_B: ["LD", (f) => `B, V${hex(f.x, 1)}`],
  LD_MEM_VX: ["LD", (f) => `[I], V${hex(f.x, 1)}`],
  LD_VX_MEM: ["LD", (f) => `V${hex(f.x, 1)}, [I]`],
};

export function disasmOpcode(opcode: number): { mnemonic: string; operand: string } {
  const m = decode(opcode);
  if (m === null) return { mnemonic: "???", operand: `$${hex(opcode, 4)}` };
  const [mnemonic, operand] = FORMAT[m];
  return { mnemonic, operand: operand(fields(opcode)) };
}

export function disasmAt(read: ReadByteFn, pc: Word): DisasmResult {
  const hi = read(pc) & 0xFF;
  const lo = read(pc + 1) & 0xFF;
  const opcode = (hi << 8) | lo;
  return { opcode, bytes: [hi, lo], ...disasmOpcode(opcode) };
}

export function formatTraceLine(pc: Word, res: DisasmResult, regs: { v: Uint8Array, i: Word, sp: number }, cycles: number): string {
  const bytesStr = res.bytes.map(b => hex(b, 2)).join(" ");
  const dis = (res.mnemonic + (res.operand ? " " + res.operand : "")).trim();
  const left = `${hex(pc, 3)}  ${bytesStr}  ${dis}`;
  const regCol = 28;
  const pad = left.length < regCol ? " ".repeat(regCol - left.length) : " ";
  const vs = Array.from(regs.v, (b) => hex(b, 2)).join(" ");
  return `${left}${pad}V:${vs} I:${hex(regs.i, 3)} SP:${regs.sp} CYC:${cycles}`;
}
