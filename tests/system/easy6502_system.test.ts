import { describe, it, expect } from 'vitest';
import { Easy6502System, KEY_ADDR, RANDOM_ADDR } from '@core/system/system';

describe('Easy6502System', () => {
  it('publishes the pending key and a random byte after each step', () => {
    const sys = new Easy6502System({ random: () => 7 });
    // NOP; LDA $FF; LDX $FE; BRK
    sys.load([0xEA, 0xA5, 0xFF, 0xA6, 0xFE, 0x00]);
    sys.pressKey(0x77);
    const outcome = sys.run();
    expect(outcome.reason).toBe('halted');
    expect(sys.cpu.reg.a).toBe(0x77);
    expect(sys.cpu.reg.x).toBe(7);
    expect(sys.bus.read(KEY_ADDR)).toBe(0x77);
    expect(sys.bus.read(RANDOM_ADDR)).toBe(7);
  });

  it('keeps the last key when the queue is empty', () => {
    const sys = new Easy6502System({ random: () => 1 });
    sys.load([0xEA, 0xEA, 0x00]);
    sys.pressKey(0x61);
    sys.stepInstruction();
    sys.stepInstruction();
    expect(sys.bus.read(KEY_ADDR)).toBe(0x61);
  });

  it('notifies on frame changes only', () => {
    const frames: number[] = [];
    const sys = new Easy6502System({ random: () => 1, onFrame: (f) => frames.push(f[0]) });
    // LDA #$03; STA $0200; BRK
    sys.load([0xA9, 0x03, 0x8D, 0x00, 0x02, 0x00]);
    sys.run();
    expect(frames).toEqual([255]);
    expect(sys.display.pixel(0, 0)).toEqual([255, 0, 0]);
  });

  it('does nothing once halted', () => {
    const sys = new Easy6502System({ random: () => 9 });
    sys.load([0x00]);
    expect(sys.stepInstruction()).toEqual({ ok: true, cycles: 7 });
    sys.bus.write(RANDOM_ADDR, 0);
    expect(sys.stepInstruction()).toEqual({ ok: true, cycles: 0 });
    expect(sys.bus.read(RANDOM_ADDR)).toBe(0);
  });
});
