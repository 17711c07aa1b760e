import { DEFAULT_ORIGIN } from '@core/cpu/cpu';
import type { Byte, Word } from '@core/cpu/types';
import { Easy6502System } from '@core/system/system';
import type { RandomSource } from '@core/system/system';

export interface RunResult {
  steps: number;
  cycles: number;
  reason: 'halted' | 'fault' | 'timeout';
  message?: string;
}

export interface HeadlessOptions {
  maxSteps: number;
  origin?: Word;
  random?: RandomSource;
  // Queued before the first instruction and delivered one per step
  keys?: readonly Byte[];
}

// Step until BRK, a fault, or the step budget runs out
export function runHeadless(sys: Easy6502System, maxSteps: number): RunResult {
  let steps = 0;
  while (steps < maxSteps) {
    if (sys.cpu.halted) return { steps, cycles: sys.cpu.cycles, reason: 'halted' };
    const r = sys.stepInstruction();
    if (!r.ok) return { steps, cycles: sys.cpu.cycles, reason: 'fault', message: r.fault.message };
    steps++;
  }
  return { steps, cycles: sys.cpu.cycles, reason: sys.cpu.halted ? 'halted' : 'timeout' };
}

export function runImage(image: Uint8Array | readonly number[], opts: HeadlessOptions): { result: RunResult; system: Easy6502System } {
  const system = new Easy6502System({ random: opts.random });
  system.load(image, opts.origin ?? DEFAULT_ORIGIN);
  for (const k of opts.keys ?? []) system.pressKey(k);
  const result = runHeadless(system, opts.maxSteps);
  return { result, system };
}
