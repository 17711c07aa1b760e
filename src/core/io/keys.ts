import type { Byte } from '@core/cpu/types';

export type Key = 'W' | 'A' | 'S' | 'D';

// Programs read the last key as its lowercase ASCII code
export const KEY_CODES: Record<Key, Byte> = { W: 0x77, A: 0x61, S: 0x73, D: 0x64 };

export function keyCode(ch: string): Byte | null {
  const k = ch.toUpperCase();
  return k === 'W' || k === 'A' || k === 'S' || k === 'D' ? KEY_CODES[k] : null;
}

// Bounded FIFO of pending key codes; a push onto a full queue drops the oldest entry
export class KeyQueue {
  private data: Byte[] = [];

  constructor(readonly capacity = 32) {}

  get length(): number { return this.data.length; }

  push(code: Byte) {
    if (this.data.length >= this.capacity) this.data.shift();
    this.data.push(code & 0xFF);
  }

  // 0 when nothing is pending
  pop(): Byte {
    return this.data.shift() ?? 0;
  }
}
