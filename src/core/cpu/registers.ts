import type { Registers } from './types';

export const STACK_PAGE = 0x0100;
export const RESET_VECTOR = 0xFFFC;

export function powerOnRegisters(): Registers {
  return { a: 0, x: 0, y: 0, sp: 0xFD };
}
