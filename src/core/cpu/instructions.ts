import { StatusFlags } from './flags';
import { operandAddress, operandOffset, operandValue } from './operand';
import type { Byte, CpuContext, Handler, Operand } from './types';

export const MNEMONICS = [
  'ADC', 'AND', 'ASL', 'BCC', 'BCS', 'BEQ', 'BIT', 'BMI', 'BNE', 'BPL', 'BRK', 'BVC', 'BVS', 'CLC',
  'CLD', 'CLI', 'CLV', 'CMP', 'CPX', 'CPY', 'DEC', 'DEX', 'DEY', 'EOR', 'INC', 'INX', 'INY', 'JMP',
  'JSR', 'LDA', 'LDX', 'LDY', 'LSR', 'NOP', 'ORA', 'PHA', 'PHP', 'PLA', 'PLP', 'ROL', 'ROR', 'RTI',
  'RTS', 'SBC', 'SEC', 'SED', 'SEI', 'STA', 'STX', 'STY', 'TAX', 'TAY', 'TSX', 'TXA', 'TXS', 'TYA',
] as const;

export type Mnemonic = typeof MNEMONICS[number];

const MNEMONIC_NAMES: readonly string[] = MNEMONICS;

export function isMnemonic(s: string): s is Mnemonic {
  return MNEMONIC_NAMES.includes(s);
}

// --- Shared arithmetic ---

function adc(cpu: CpuContext, val: Byte) {
  const a = cpu.reg.a;
  const sum = a + val + (cpu.flags.carry ? 1 : 0);
  const result = sum & 0xff;
  cpu.flags.carry = sum > 0xff;
  cpu.flags.setZeroNegative(result);
  cpu.flags.overflow = ((val ^ result) & (a ^ result) & 0x80) !== 0;
  cpu.reg.a = result;
}

function compare(cpu: CpuContext, reg: Byte, val: Byte) {
  cpu.flags.zero = reg === val;
  cpu.flags.carry = reg >= val;
  cpu.flags.negative = (((reg - val) & 0xff) & 0x80) !== 0;
}

// Read-modify-write: accumulator mode hands the handler A as an immediate
function modify(cpu: CpuContext, op: Operand, fn: (v: Byte) => Byte) {
  if (op.kind === 'immediate') {
    cpu.reg.a = fn(op.value) & 0xff;
    cpu.flags.setZeroNegative(cpu.reg.a);
    return;
  }
  const r = fn(cpu.bus.read(op.addr)) & 0xff;
  cpu.bus.write(op.addr, r);
  cpu.flags.setZeroNegative(r);
}

function bump(cpu: CpuContext, op: Operand, delta: 1 | -1) {
  const addr = operandAddress(op);
  const r = (cpu.bus.read(addr) + delta) & 0xff;
  cpu.bus.write(addr, r);
  cpu.flags.setZeroNegative(r);
}

// PLP and RTI ignore bits 4 and 5 of the pulled byte
function pullStatus(cpu: CpuContext) {
  cpu.flags = StatusFlags.unpack(cpu.pop8() & 0xcf);
}

// Control transfers store target-1; the step loop's post-increment lands on the target
const jumpTo = (cpu: CpuContext, target: number) => { cpu.pc = (target - 1) & 0xffff; };

export const HANDLERS: Record<Mnemonic, Handler> = {
  // Arithmetic
  ADC: (cpu, op) => adc(cpu, operandValue(cpu, op)),
  SBC: (cpu, op) => adc(cpu, operandValue(cpu, op) ^ 0xff),

  // Increment / decrement
  INC: (cpu, op) => bump(cpu, op, 1),
  DEC: (cpu, op) => bump(cpu, op, -1),
  INX: (cpu) => { cpu.reg.x = (cpu.reg.x + 1) & 0xff; cpu.flags.setZeroNegative(cpu.reg.x); },
  INY: (cpu) => { cpu.reg.y = (cpu.reg.y + 1) & 0xff; cpu.flags.setZeroNegative(cpu.reg.y); },
  DEX: (cpu) => { cpu.reg.x = (cpu.reg.x - 1) & 0xff; cpu.flags.setZeroNegative(cpu.reg.x); },
  DEY: (cpu) => { cpu.reg.y = (cpu.reg.y - 1) & 0xff; cpu.flags.setZeroNegative(cpu.reg.y); },

  // Loads / stores
  LDA: (cpu, op) => { cpu.reg.a = operandValue(cpu, op); cpu.flags.setZeroNegative(cpu.reg.a); },
  LDX: (cpu, op) => { cpu.reg.x = operandValue(cpu, op); cpu.flags.setZeroNegative(cpu.reg.x); },
  LDY: (cpu, op) => { cpu.reg.y = operandValue(cpu, op); cpu.flags.setZeroNegative(cpu.reg.y); },
  STA: (cpu, op) => cpu.bus.write(operandAddress(op), cpu.reg.a),
  STX: (cpu, op) => cpu.bus.write(operandAddress(op), cpu.reg.x),
  STY: (cpu, op) => cpu.bus.write(operandAddress(op), cpu.reg.y),

  // Transfers
  TAX: (cpu) => { cpu.reg.x = cpu.reg.a; cpu.flags.setZeroNegative(cpu.reg.x); },
  TAY: (cpu) => { cpu.reg.y = cpu.reg.a; cpu.flags.setZeroNegative(cpu.reg.y); },
  TSX: (cpu) => { cpu.reg.x = cpu.reg.sp; cpu.flags.setZeroNegative(cpu.reg.x); },
  TXA: (cpu) => { cpu.reg.a = cpu.reg.x; cpu.flags.setZeroNegative(cpu.reg.a); },
  TXS: (cpu) => { cpu.reg.sp = cpu.reg.x; },
  TYA: (cpu) => { cpu.reg.a = cpu.reg.y; cpu.flags.setZeroNegative(cpu.reg.a); },

  // Stack
  PHA: (cpu) => cpu.push8(cpu.reg.a),
  PHP: (cpu) => cpu.push8(cpu.flags.pack() | 0x30),
  PLA: (cpu) => { cpu.reg.a = cpu.pop8(); cpu.flags.setZeroNegative(cpu.reg.a); },
  PLP: (cpu) => pullStatus(cpu),

  // Logic
  AND: (cpu, op) => { cpu.reg.a &= operandValue(cpu, op); cpu.flags.setZeroNegative(cpu.reg.a); },
  EOR: (cpu, op) => { cpu.reg.a ^= operandValue(cpu, op); cpu.flags.setZeroNegative(cpu.reg.a); },
  ORA: (cpu, op) => { cpu.reg.a |= operandValue(cpu, op); cpu.flags.setZeroNegative(cpu.reg.a); },
  BIT: (cpu, op) => {
    const m = operandValue(cpu, op);
    cpu.flags.zero = (cpu.reg.a & m) === 0;
    cpu.flags.negative = (m & 0x80) !== 0;
    cpu.flags.overflow = (m & 0x40) !== 0;
  },

  // Shifts / rotates
  ASL: (cpu, op) => modify(cpu, op, (v) => { cpu.flags.carry = (v & 0x80) !== 0; return v << 1; }),
  LSR: (cpu, op) => modify(cpu, op, (v) => { cpu.flags.carry = (v & 0x01) !== 0; return v >>> 1; }),
  ROL: (cpu, op) => modify(cpu, op, (v) => {
    const c = cpu.flags.carry ? 1 : 0;
    cpu.flags.carry = (v & 0x80) !== 0;
    return (v << 1) | c;
  }),
  ROR: (cpu, op) => modify(cpu, op, (v) => {
    const c = cpu.flags.carry ? 0x80 : 0;
    cpu.flags.carry = (v & 0x01) !== 0;
    return (v >>> 1) | c;
  }),

  // Compares
  CMP: (cpu, op) => compare(cpu, cpu.reg.a, operandValue(cpu, op)),
  CPX: (cpu, op) => compare(cpu, cpu.reg.x, operandValue(cpu, op)),
  CPY: (cpu, op) => compare(cpu, cpu.reg.y, operandValue(cpu, op)),

  // Branches
  BCC: (cpu, op) => cpu.branch(operandOffset(cpu, op), !cpu.flags.carry),
  BCS: (cpu, op) => cpu.branch(operandOffset(cpu, op), cpu.flags.carry),
  BEQ: (cpu, op) => cpu.branch(operandOffset(cpu, op), cpu.flags.zero),
  BMI: (cpu, op) => cpu.branch(operandOffset(cpu, op), cpu.flags.negative),
  BNE: (cpu, op) => cpu.branch(operandOffset(cpu, op), !cpu.flags.zero),
  BPL: (cpu, op) => cpu.branch(operandOffset(cpu, op), !cpu.flags.negative),
  BVC: (cpu, op) => cpu.branch(operandOffset(cpu, op), !cpu.flags.overflow),
  BVS: (cpu, op) => cpu.branch(operandOffset(cpu, op), cpu.flags.overflow),

  // Jumps and subroutines. PC is on the last byte of JSR here, which is what the hardware pushes.
  JMP: (cpu, op) => jumpTo(cpu, operandAddress(op)),
  JSR: (cpu, op) => { const target = operandAddress(op); cpu.push16(cpu.pc); jumpTo(cpu, target); },
  RTS: (cpu) => { cpu.pc = cpu.pop16(); },
  RTI: (cpu) => { pullStatus(cpu); jumpTo(cpu, cpu.pop16()); },

  // Flags
  CLC: (cpu) => { cpu.flags.carry = false; },
  CLD: (cpu) => { cpu.flags.decimal = false; },
  CLI: (cpu) => { cpu.flags.interruptDisable = false; },
  CLV: (cpu) => { cpu.flags.overflow = false; },
  SEC: (cpu) => { cpu.flags.carry = true; },
  SED: (cpu) => { cpu.flags.decimal = true; },
  SEI: (cpu) => { cpu.flags.interruptDisable = true; },

  NOP: () => {},
  BRK: (cpu) => { cpu.halted = true; },
};
