import { Memory } from '@core/bus/memory';
import { CPU6502, DEFAULT_ORIGIN } from '@core/cpu/cpu';
import type { RunOutcome, StepResult } from '@core/cpu/cpu';
import type { Byte, Word } from '@core/cpu/types';
import { Display } from '@core/io/display';
import { KeyQueue } from '@core/io/keys';

export const RANDOM_ADDR = 0x00FE;
export const KEY_ADDR = 0x00FF;

// Returns 1..15, the range programs expect at $FE
export type RandomSource = () => Byte;

export const mathRandom: RandomSource = () => 1 + Math.floor(Math.random() * 15);

export interface SystemOptions {
  random?: RandomSource;
  onFrame?: (frame: Uint8Array) => void;
}

/**
 * The small memory-mapped machine easy6502-style programs expect: a random
 * byte at $FE, the last key at $FF and a 32x32 screen at $0200.
 */
export class Easy6502System {
  readonly bus = new Memory();
  readonly cpu = new CPU6502(this.bus);
  readonly keys = new KeyQueue();
  readonly display = new Display();
  private random: RandomSource;
  private onFrame: ((frame: Uint8Array) => void) | null;

  constructor(opts: SystemOptions = {}) {
    this.random = opts.random ?? mathRandom;
    this.onFrame = opts.onFrame ?? null;
  }

  load(image: Uint8Array | readonly number[], origin: Word = DEFAULT_ORIGIN) {
    this.cpu.load(image, origin);
    this.display.refresh(this.bus);
  }

  pressKey(code: Byte) { this.keys.push(code); }

  // Runs between instructions
  hook() {
    const key = this.keys.pop();
    if (key > 0) this.bus.write(KEY_ADDR, key);
    this.bus.write(RANDOM_ADDR, this.random() & 0xFF);
    if (this.display.refresh(this.bus) && this.onFrame) this.onFrame(this.display.frame);
  }

  stepInstruction(): StepResult {
    if (this.cpu.halted) return { ok: true, cycles: 0 };
    const r = this.cpu.step();
    if (r.ok) this.hook();
    return r;
  }

  run(): RunOutcome {
    return this.cpu.run(() => this.hook());
  }
}
