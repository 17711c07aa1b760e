import { OperandKindError } from '@core/errors';
import type { Byte, CpuContext, Operand, Word } from './types';

export function operandValue(cpu: CpuContext, op: Operand): Byte {
  return op.kind === 'immediate' ? op.value : cpu.bus.read(op.addr);
}

export function operandAddress(op: Operand): Word {
  if (op.kind !== 'address') throw new OperandKindError();
  return op.addr;
}

// Relative-mode displacement, -128..127
export function operandOffset(cpu: CpuContext, op: Operand): number {
  const v = operandValue(cpu, op);
  return v < 0x80 ? v : v - 0x100;
}
