import type { AddrMode, CpuContext, Operand, Word } from './types';

export interface Resolved {
  operand: Operand;
  crossed: boolean;
}

export function pageCrossed(a: Word, b: Word): boolean {
  return (a & 0xff00) !== (b & 0xff00);
}

const imm = (value: number): Operand => ({ kind: 'immediate', value: value & 0xff });
const adr = (addr: number): Operand => ({ kind: 'address', addr: addr & 0xffff });

// Two-byte pointer read from the zero page; the high byte wraps to $00 after $FF
function zpPointer(cpu: CpuContext, zp: number): Word {
  const lo = cpu.bus.read(zp & 0xff);
  const hi = cpu.bus.read((zp + 1) & 0xff);
  return lo | (hi << 8);
}

/**
 * Consume the operand bytes of the current instruction (advancing PC) and
 * produce the immediate value or effective address, plus whether an indexed
 * computation moved into another page.
 */
export function resolveOperand(mode: AddrMode, cpu: CpuContext): Resolved {
  switch (mode) {
    case 'IMP': return { operand: adr(0), crossed: false };
    case 'ACC': return { operand: imm(cpu.reg.a), crossed: false };
    case 'IMM':
    case 'REL': return { operand: imm(cpu.fetch8()), crossed: false };
    case 'ZP': return { operand: adr(cpu.fetch8()), crossed: false };
    case 'ZPX': return { operand: adr((cpu.fetch8() + cpu.reg.x) & 0xff), crossed: false };
    case 'ZPY': return { operand: adr((cpu.fetch8() + cpu.reg.y) & 0xff), crossed: false };
    case 'ABS': return { operand: adr(cpu.fetch16()), crossed: false };
    case 'ABSX': {
      const base = cpu.fetch16();
      const addr = (base + cpu.reg.x) & 0xffff;
      return { operand: adr(addr), crossed: pageCrossed(base, addr) };
    }
    case 'ABSY': {
      const base = cpu.fetch16();
      const addr = (base + cpu.reg.y) & 0xffff;
      return { operand: adr(addr), crossed: pageCrossed(base, addr) };
    }
    case 'IND': {
      const ptr = cpu.fetch16();
      const lo = cpu.bus.read(ptr);
      const hi = cpu.bus.read((ptr + 1) & 0xffff);
      return { operand: adr(lo | (hi << 8)), crossed: false };
    }
    case 'INDX': {
      const zp = (cpu.fetch8() + cpu.reg.x) & 0xff;
      return { operand: adr(zpPointer(cpu, zp)), crossed: false };
    }
    case 'INDY': {
      const base = zpPointer(cpu, cpu.fetch8());
      const addr = (base + cpu.reg.y) & 0xffff;
      return { operand: adr(addr), crossed: pageCrossed(base, addr) };
    }
  }
}

// Number of operand bytes that follow the opcode
export function operandLength(mode: AddrMode): 0 | 1 | 2 {
  switch (mode) {
    case 'IMP':
    case 'ACC': return 0;
    case 'ABS':
    case 'ABSX':
    case 'ABSY':
    case 'IND': return 2;
    default: return 1;
  }
}
