import type { AddrMode, Byte, Word } from '@core/cpu/types';

function hex(v: number, width: number) { return v.toString(16).toUpperCase().padStart(width, '0'); }

export type EmulatorErrorCode = 'UNRESOLVED_OPCODE' | 'OPERAND_KIND' | 'IMAGE_LOAD';

export abstract class EmulatorError extends Error {
  abstract readonly code: EmulatorErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// The byte at PC has no entry in the opcode table
export class UnresolvedOpcodeError extends EmulatorError {
  readonly code = 'UNRESOLVED_OPCODE';

  constructor(readonly opcode: Byte, readonly pc: Word) {
    super(`Opcode not implemented: $${hex(opcode, 2)} at $${hex(pc, 4)}`);
  }
}

// A handler asked for an address from an immediate operand: the opcode table pairs it with the wrong mode
export class OperandKindError extends EmulatorError {
  readonly code = 'OPERAND_KIND';

  constructor(readonly mnemonic?: string, readonly mode?: AddrMode) {
    super(mnemonic && mode
      ? `${mnemonic} needs an address operand but ${mode} resolves to an immediate`
      : 'Address requested from an immediate operand');
  }
}

export type ImageLoadReason = 'not-found' | 'unreadable' | 'too-large' | 'empty';

export class ImageLoadError extends EmulatorError {
  readonly code = 'IMAGE_LOAD';

  constructor(readonly reason: ImageLoadReason, message: string, readonly path?: string) {
    super(message);
  }
}

export type CpuFault = UnresolvedOpcodeError | OperandKindError;
