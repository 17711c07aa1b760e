import type { Byte, Word } from '@core/cpu/types';

export const ADDRESS_SPACE = 0x10000;

export interface Bus {
  read(addr: Word): Byte;
  write(addr: Word, value: Byte): void;
  // Called wherever the hardware spends cycles, including page-cross and branch penalties
  tick(cycles: number): void;
}

/**
 * Flat 64 KiB RAM. Every 16-bit address is backed by plain storage; any
 * memory-mapped behaviour belongs to whoever embeds the bus.
 */
export class Memory implements Bus {
  private ram = new Uint8Array(ADDRESS_SPACE);
  private elapsed = 0;

  get cycles(): number { return this.elapsed; }

  read(addr: Word): Byte {
    return this.ram[addr & 0xFFFF];
  }

  write(addr: Word, value: Byte): void {
    this.ram[addr & 0xFFFF] = value & 0xFF;
  }

  tick(cycles: number): void {
    if (cycles <= 0) return;
    this.elapsed += cycles;
  }

  readWord(addr: Word): Word {
    const lo = this.read(addr);
    const hi = this.read((addr + 1) & 0xFFFF);
    return lo | (hi << 8);
  }

  // Copy of a region
  slice(start: Word, end: Word): Uint8Array {
    return this.ram.slice(start & 0xFFFF, end);
  }
}
