import { describe, it, expect } from "vitest";
import { disasmAt, disasmRange, flagString, formatTraceLine } from "@utils/disasm6502";

function makeReaderAt(basePc: number, bytes: number[]) {
  return (addr: number) => {
    const idx = (addr - (basePc & 0xFFFF)) & 0xFFFF;
    if (idx >= 0 && idx < bytes.length) return bytes[idx];
    return 0x00;
  };
}

describe("disasm6502 formatting", () => {
  it("formats LDA #$01 as a trace line", () => {
    const read = makeReaderAt(0xC000, [0xA9, 0x01]);
    const d = disasmAt(read, 0xC000);
    expect(d.mnemonic).toBe("LDA");
    expect(d.operand).toBe("#$01");
    const line = formatTraceLine(0xC000, d, { a: 0, x: 0, y: 0, s: 0xFD, pc: 0xC000, p: 0x24, cycles: 7 });
    expect(line).toBe("C000  A9 01     LDA #$01     A=00 X=00 Y=00 SP=FD nv-bdIzc CYC=7");
  });

  it("spells out the status flags", () => {
    expect(flagString(0x24)).toBe("nv-bdIzc");
    expect(flagString(0xC3)).toBe("NV-bdiZC");
    expect(flagString(0x00)).toBe("nv-bdizc");
  });

  it("formats branch target absolute", () => {
    const read = makeReaderAt(0xC002, [0xD0, 0xFE]); // BNE back -2 -> C002
    const d = disasmAt(read, 0xC002);
    expect(d.mnemonic).toBe("BNE");
    expect(d.operand).toBe("$C002");
  });

  it("formats accumulator and indirect modes", () => {
    expect(disasmAt(makeReaderAt(0, [0x0A]), 0).operand).toBe("A");
    const jmp = disasmAt(makeReaderAt(0x0600, [0x6C, 0x34, 0x12]), 0x0600);
    expect(jmp.operand).toBe("($1234)");
    expect(jmp.bytes).toEqual([0x6C, 0x34, 0x12]);
    expect(disasmAt(makeReaderAt(0, [0xB1, 0x80]), 0).operand).toBe("($80),Y");
  });

  it("marks unknown opcodes", () => {
    const d = disasmAt(makeReaderAt(0, [0x02]), 0);
    expect(d).toEqual({ bytes: [0x02], mnemonic: "???", operand: "", len: 1 });
  });

  it("walks consecutive instructions", () => {
    const read = makeReaderAt(0x0600, [0xA9, 0x01, 0x8D, 0x00, 0x02, 0x00]);
    expect(disasmRange(read, 0x0600, 3)).toEqual(["0600  LDA #$01", "0602  STA $0200", "0605  BRK"]);
  });
});
