import { operandLength } from "@core/cpu/addressing";
import { lookup } from "@core/cpu/opcodes";
import type { AddrMode, Byte, CPUState, Word } from "@core/cpu/types";

export type ReadByteFn = (addr: Word) => Byte;

function hex2(v: number) { return (v & 0xFF).toString(16).toUpperCase().padStart(2, "0"); }
function hex4(v: number) { return (v & 0xFFFF).toString(16).toUpperCase().padStart(4, "0"); }

export interface DisasmResult {
  bytes: number[];
  mnemonic: string;
  operand: string;
  len: number;
}

export function disasmAt(read: ReadByteFn, pc: Word): DisasmResult {
  const op = read(pc) & 0xFF;
  const desc = lookup(op);
  if (!desc) return { bytes: [op], mnemonic: "???", operand: "", len: 1 };
  const len = 1 + operandLength(desc.mode);
  const b1 = read((pc + 1) & 0xFFFF) & 0xFF;
  const b2 = read((pc + 2) & 0xFFFF) & 0xFF;
  const bytes = len === 1 ? [op] : len === 2 ? [op, b1] : [op, b1, b2];
  return { bytes, mnemonic: desc.mnemonic, operand: formatOperand(desc.mode, pc, b1, b2), len };
}

function formatOperand(mode: AddrMode, pc: Word, b1: Byte, b2: Byte): string {
  switch (mode) {
    case "IMP": return "";
    case "ACC": return "A";
    case "IMM": return "#$" + hex2(b1);
    case "ZP": return "$" + hex2(b1);
    case "ZPX": return "$" + hex2(b1) + ",X";
    case "ZPY": return "$" + hex2(b1) + ",Y";
    case "ABS": return "$" + hex4(b1 | (b2 << 8));
    case "ABSX": return "$" + hex4(b1 | (b2 << 8)) + ",X";
    case "ABSY": return "$" + hex4(b1 | (b2 << 8)) + ",Y";
    case "REL": {
      // absolute target, relative to the following instruction
      const off = (b1 < 0x80 ? b1 : b1 - 0x100);
      return "$" + hex4(pc + 2 + off);
    }
    case "IND": return "($" + hex4(b1 | (b2 << 8)) + ")";
    case "INDX": return "($" + hex2(b1) + ",X)";
    case "INDY": return "($" + hex2(b1) + "),Y";
  }
}

const FLAG_LETTERS = "NV-BDIZC";

// Set flags upper case, clear ones lower case, bit 5 as '-'
export function flagString(p: Byte): string {
  let out = "";
  for (let i = 0; i < 8; i++) {
    const ch = FLAG_LETTERS[i];
    if (ch === "-") out += ch;
    else out += (p >> (7 - i)) & 1 ? ch : ch.toLowerCase();
  }
  return out;
}

// One line per instruction: address, raw bytes, disassembly, then the registers before it runs
export function formatTraceLine(pc: Word, res: DisasmResult, state: CPUState): string {
  const bytesStr = res.bytes.map(b => hex2(b)).join(" ").padEnd(8, " ");
  const dis = (res.mnemonic + (res.operand ? " " + res.operand : "")).padEnd(12, " ");
  return `${hex4(pc)}  ${bytesStr}  ${dis} A=${hex2(state.a)} X=${hex2(state.x)} Y=${hex2(state.y)} SP=${hex2(state.s)} ${flagString(state.p)} CYC=${state.cycles}`;
}

// Disassemble `count` consecutive instructions starting at pc
export function disasmRange(read: ReadByteFn, pc: Word, count: number): string[] {
  const out: string[] = [];
  let at = pc & 0xFFFF;
  for (let i = 0; i < count; i++) {
    const d = disasmAt(read, at);
    out.push(`${hex4(at)}  ${(d.mnemonic + (d.operand ? " " + d.operand : "")).trim()}`);
    at = (at + d.len) & 0xFFFF;
  }
  return out;
}
