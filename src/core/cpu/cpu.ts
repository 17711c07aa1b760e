import type { Bus } from '@core/bus/memory';
import { ADDRESS_SPACE } from '@core/bus/memory';
import { ImageLoadError, OperandKindError, UnresolvedOpcodeError } from '@core/errors';
import type { CpuFault } from '@core/errors';
import { resolveOperand, pageCrossed } from './addressing';
import { POWER_ON_STATUS, StatusFlags } from './flags';
import { lookup } from './opcodes';
import { RESET_VECTOR, STACK_PAGE, powerOnRegisters } from './registers';
import type { Byte, CPUState, CpuContext, Registers, Word } from './types';

export const DEFAULT_ORIGIN = 0x0600;

export type StepResult =
  | { ok: true; cycles: number }
  | { ok: false; fault: CpuFault };

export interface RunOutcome {
  reason: 'halted' | 'fault';
  steps: number;
  cycles: number;
  fault?: CpuFault;
}

export type StepCallback = (cpu: CPU6502) => void;
export type TraceHook = (pc: Word, opcode: Byte) => void;

export class CPU6502 implements CpuContext {
  reg: Registers = powerOnRegisters();
  flags: StatusFlags = StatusFlags.unpack(POWER_ON_STATUS);
  pc: Word = 0;
  halted = false;
  // Total cycles charged to the bus since the last reset
  cycles = 0;
  private traceHook: TraceHook | null = null;

  constructor(readonly bus: Bus) {}

  setTraceHook(fn: TraceHook | null) { this.traceHook = fn; }

  reset() {
    this.reg = powerOnRegisters();
    this.flags = StatusFlags.unpack(POWER_ON_STATUS);
    this.halted = false;
    this.cycles = 0;
    this.pc = this.bus.read(RESET_VECTOR) | (this.bus.read(RESET_VECTOR + 1) << 8);
  }

  /**
   * Copy an image into memory at `origin`, point the reset vector at it and
   * reset. Nothing is written when the image does not fit.
   */
  load(image: Uint8Array | readonly number[], origin: Word = DEFAULT_ORIGIN) {
    if (!Number.isInteger(origin) || origin < 0 || origin > 0xffff) {
      throw new ImageLoadError('too-large', `Load origin $${origin.toString(16)} is outside the address space`);
    }
    if (origin + image.length > ADDRESS_SPACE) {
      throw new ImageLoadError('too-large', `Image of ${image.length} bytes does not fit at $${origin.toString(16).padStart(4, '0')}`);
    }
    for (let i = 0; i < image.length; i++) this.bus.write(origin + i, image[i] & 0xff);
    this.bus.write(RESET_VECTOR, origin & 0xff);
    this.bus.write(RESET_VECTOR + 1, (origin >>> 8) & 0xff);
    this.reset();
  }

  getState(): CPUState {
    const { a, x, y, sp } = this.reg;
    return { a, x, y, s: sp, pc: this.pc, p: this.flags.pack(), cycles: this.cycles };
  }

  // Operand bytes: advance PC onto the byte, then read it
  fetch8(): Byte {
    this.pc = (this.pc + 1) & 0xffff;
    return this.bus.read(this.pc);
  }
  fetch16(): Word {
    const lo = this.fetch8();
    const hi = this.fetch8();
    return lo | (hi << 8);
  }

  push8(v: Byte) {
    this.bus.write(STACK_PAGE + this.reg.sp, v & 0xff);
    this.reg.sp = (this.reg.sp - 1) & 0xff;
  }
  pop8(): Byte {
    this.reg.sp = (this.reg.sp + 1) & 0xff;
    return this.bus.read(STACK_PAGE + this.reg.sp);
  }
  push16(v: Word) {
    this.push8((v >>> 8) & 0xff);
    this.push8(v & 0xff);
  }
  pop16(): Word {
    const lo = this.pop8();
    const hi = this.pop8();
    return lo | (hi << 8);
  }

  private charge(n: number) {
    this.cycles += n;
    this.bus.tick(n);
  }

  // PC sits on the displacement byte, so the next instruction is PC+1
  branch(offset: number, taken: boolean) {
    if (!taken) return;
    this.charge(1);
    const next = (this.pc + 1) & 0xffff;
    const target = (next + offset) & 0xffff;
    if (pageCrossed(next, target)) this.charge(1);
    this.pc = (target - 1) & 0xffff;
  }

  step(): StepResult {
    if (this.halted) return { ok: true, cycles: 0 };
    const pcBefore = this.pc;
    const opcode = this.bus.read(pcBefore);
    const desc = lookup(opcode);
    if (!desc) return { ok: false, fault: new UnresolvedOpcodeError(opcode, pcBefore) };
    if (this.traceHook) this.traceHook(pcBefore, opcode);

    const cyclesBefore = this.cycles;
    const { operand, crossed } = resolveOperand(desc.mode, this);
    this.charge(desc.cycles);
    if (crossed && desc.crossPenalty) this.charge(1);
    try {
      desc.handler(this, operand);
    } catch (e) {
      if (e instanceof OperandKindError) return { ok: false, fault: new OperandKindError(desc.mnemonic, desc.mode) };
      throw e;
    }
    this.pc = (this.pc + 1) & 0xffff;
    return { ok: true, cycles: this.cycles - cyclesBefore };
  }

  /**
   * Step until BRK halts the CPU or a step faults, calling `onStep` after
   * every completed instruction. The callback may read and write memory; to
   * stop early it has to throw.
   */
  run(onStep?: StepCallback): RunOutcome {
    let steps = 0;
    while (!this.halted) {
      const r = this.step();
      if (!r.ok) return { reason: 'fault', steps, cycles: this.cycles, fault: r.fault };
      steps++;
      if (onStep) onStep(this);
    }
    return { reason: 'halted', steps, cycles: this.cycles };
  }
}
