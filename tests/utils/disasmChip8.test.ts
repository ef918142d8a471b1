import { describe, it, expect } from "vitest";
import { disasmAt, disasmOpcode, formatTraceLine } from "@utils/disasmChip8";

describe("disasmChip8 formatting", () => {
  it("formats operands per instruction shape", () => {
    expect(disasmOpcode(0x00E0)).toEqual({ mnemonic: "CLS", operand: "" });
    expect(disasmOpcode(0x2ABC)).toEqual({ mnemonic: "CALL", operand: "$ABC" });
    expect(disasmOpcode(0x6A02)).toEqual({ mnemonic: "LD", operand: "VA, #$02" });
    expect(disasmOpcode(0xA123)).toEqual({ mnemonic: "LD", operand: "I, $123" });
    expect(disasmOpcode(0xB040)).toEqual({ mnemonic: "JP", operand: "V0, $040" });
    expect(disasmOpcode(0xD125)).toEqual({ mnemonic: "DRW", operand: "V1, V2, 5" });
    expect(disasmOpcode(0xF065)).toEqual({ mnemonic: "LD", operand: "V0, [I]" });
    expect(disasmOpcode(0xF355)).toEqual({ mnemonic: "LD", operand: "[I], V3" });
    expect(disasmOpcode(0xFE0A)).toEqual({ mnemonic: "LD", operand: "VE, K" });
  });

  it("marks unknown opcodes", () => {
    expect(disasmOpcode(0xFFFF)).toEqual({ mnemonic: "???", operand: "$FFFF" });
  });

  it("reads two bytes big-endian and formats a trace line", () => {
    const bytes = [0x60, 0x0A];
    const d = disasmAt((addr) => bytes[addr - 0x200] ?? 0, 0x200);
    expect(d.opcode).toBe(0x600A);
    expect(d.bytes).toEqual([0x60, 0x0A]);
    const line = formatTraceLine(0x200, d, { v: new Uint8Array(16), i: 0, sp: 0 }, 0);
    expect(line.startsWith("200  60 0A  LD V0, #$0A     V:00 00 ")).toBe(true);
    expect(line.endsWith(" 00 I:000 SP:0 CYC:0")).toBe(true);
  });
});
