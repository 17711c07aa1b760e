import opcodeData from './opcodes.json';
import { HANDLERS, isMnemonic } from './instructions';
import type { AddrMode, Byte, InstructionDescriptor } from './types';

const MODES: readonly AddrMode[] = ['IMP', 'ACC', 'IMM', 'REL', 'ZP', 'ZPX', 'ZPY', 'ABS', 'ABSX', 'ABSY', 'IND', 'INDX', 'INDY'];

const MODE_NAMES: readonly string[] = MODES;

function isAddrMode(s: string): s is AddrMode {
  return MODE_NAMES.includes(s);
}

// Handlers that write to or jump through their operand's address
const ADDRESS_ONLY: readonly string[] = ['STA', 'STX', 'STY', 'INC', 'DEC', 'JMP', 'JSR'];
const VALUE_MODES: readonly AddrMode[] = ['IMP', 'ACC', 'IMM', 'REL'];

export interface OpcodeRow {
  opcode: number;
  mnemonic: string;
  mode: string;
  cycles: number;
  crossPenalty: boolean;
}

export function buildTable(rows: readonly OpcodeRow[]): ReadonlyArray<InstructionDescriptor | undefined> {
  const table = new Array<InstructionDescriptor | undefined>(256).fill(undefined);
  for (const row of rows) {
    const { opcode, mnemonic, mode, cycles, crossPenalty } = row;
    if (!Number.isInteger(opcode) || opcode < 0 || opcode > 0xff) throw new Error(`opcodes.json: bad opcode ${opcode}`);
    if (!isMnemonic(mnemonic)) throw new Error(`opcodes.json: unknown mnemonic ${mnemonic}`);
    if (!isAddrMode(mode)) throw new Error(`opcodes.json: unknown addressing mode ${mode} for ${mnemonic}`);
    if (ADDRESS_ONLY.includes(mnemonic) && VALUE_MODES.includes(mode)) {
      throw new Error(`opcodes.json: ${mnemonic} needs an address but $${opcode.toString(16)} uses ${mode}`);
    }
    if (table[opcode]) throw new Error(`opcodes.json: duplicate opcode $${opcode.toString(16)}`);
    table[opcode] = Object.freeze({ opcode, mnemonic, handler: HANDLERS[mnemonic], mode, cycles, crossPenalty });
  }
  return Object.freeze(table);
}

const TABLE = buildTable(opcodeData);

export function lookup(opcode: Byte): InstructionDescriptor | undefined {
  return TABLE[opcode & 0xff];
}

export function implementedOpcodes(): number[] {
  const out: number[] = [];
  TABLE.forEach((d, i) => { if (d) out.push(i); });
  return out;
}
