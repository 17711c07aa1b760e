import type { Byte } from './types';

// Status flag bits
export const C = 1 << 0;
export const Z = 1 << 1;
export const I = 1 << 2;
export const D = 1 << 3; // stored, but arithmetic stays binary
export const B = 1 << 4;
export const U = 1 << 5; // always reads as 1
export const V = 1 << 6;
export const N = 1 << 7;

// Power-on pattern: I and the unused bit set
export const POWER_ON_STATUS = 0x24;

export class StatusFlags {
  carry = false;
  zero = false;
  interruptDisable = false;
  decimal = false;
  brk = false;
  overflow = false;
  negative = false;

  reset(): void {
    this.carry = false;
    this.zero = false;
    this.interruptDisable = false;
    this.decimal = false;
    this.brk = false;
    this.overflow = false;
    this.negative = false;
  }

  setZeroNegative(v: Byte): void {
    this.zero = (v & 0xFF) === 0;
    this.negative = (v & 0x80) !== 0;
  }

  pack(): Byte {
    return (this.carry ? C : 0)
      | (this.zero ? Z : 0)
      | (this.interruptDisable ? I : 0)
      | (this.decimal ? D : 0)
      | (this.brk ? B : 0)
      | U
      | (this.overflow ? V : 0)
      | (this.negative ? N : 0);
  }

  assign(p: Byte): void {
    this.carry = (p & C) !== 0;
    this.zero = (p & Z) !== 0;
    this.interruptDisable = (p & I) !== 0;
    this.decimal = (p & D) !== 0;
    this.brk = (p & B) !== 0;
    this.overflow = (p & V) !== 0;
    this.negative = (p & N) !== 0;
  }

  static unpack(p: Byte): StatusFlags {
    const f = new StatusFlags();
    f.assign(p);
    return f;
  }
}
