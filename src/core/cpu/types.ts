import type { Bus } from '@core/bus/memory';
import type { StatusFlags } from './flags';

export type Byte = number; // 0..255
export type Word = number; // 0..65535

export type AddrMode =
  | 'IMP'  // implied
  | 'ACC'  // accumulator
  | 'IMM'  // #$nn
  | 'REL'  // signed displacement
  | 'ZP'   // $nn
  | 'ZPX'  // $nn,X
  | 'ZPY'  // $nn,Y
  | 'ABS'  // $nnnn
  | 'ABSX' // $nnnn,X
  | 'ABSY' // $nnnn,Y
  | 'IND'  // ($nnnn)
  | 'INDX' // ($nn,X)
  | 'INDY'; // ($nn),Y

// Produced by the addressing-mode resolver and consumed once by a handler
export type Operand =
  | { kind: 'immediate'; value: Byte }
  | { kind: 'address'; addr: Word };

export interface Registers {
  a: Byte;
  x: Byte;
  y: Byte;
  sp: Byte; // offset into the stack page
}

/**
 * The mutable machine state an instruction handler operates on. Handlers get
 * it for the duration of one call and must not keep a reference to it.
 */
export interface CpuContext {
  readonly bus: Bus;
  reg: Registers;
  flags: StatusFlags;
  pc: Word;
  halted: boolean;
  fetch8(): Byte;
  fetch16(): Word;
  push8(v: Byte): void;
  push16(v: Word): void;
  pop8(): Byte;
  pop16(): Word;
  branch(offset: number, taken: boolean): void;
}

export type Handler = (cpu: CpuContext, operand: Operand) => void;

export interface InstructionDescriptor {
  opcode: Byte;
  mnemonic: string;
  handler: Handler;
  mode: AddrMode;
  cycles: number;
  // Read instructions pay one extra cycle when indexing crosses a page
  crossPenalty: boolean;
}

export interface CPUState {
  a: Byte;
  x: Byte;
  y: Byte;
  s: Byte;
  pc: Word;
  p: Byte; // packed status NV1BDIZC
  cycles: number;
}
