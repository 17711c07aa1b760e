import type { Bus } from '@core/bus/memory';
import type { Byte } from '@core/cpu/types';

export const SCREEN_BASE = 0x0200;
export const SCREEN_WIDTH = 32;
export const SCREEN_HEIGHT = 32;
export const SCREEN_END = SCREEN_BASE + SCREEN_WIDTH * SCREEN_HEIGHT; // exclusive, $0600

export type RGB = readonly [number, number, number];

const BLACK: RGB = [0, 0, 0];
const WHITE: RGB = [255, 255, 255];
const GREY: RGB = [128, 128, 128];
const RED: RGB = [255, 0, 0];
const GREEN: RGB = [0, 255, 0];
const BLUE: RGB = [0, 0, 255];
const MAGENTA: RGB = [255, 0, 255];
const YELLOW: RGB = [255, 255, 0];
const CYAN: RGB = [0, 255, 255];

export function colorOf(v: Byte): RGB {
  switch (v & 0xFF) {
    case 0: return BLACK;
    case 1: return WHITE;
    case 2: case 9: return GREY;
    case 3: case 10: return RED;
    case 4: case 11: return GREEN;
    case 5: case 12: return BLUE;
    case 6: case 13: return MAGENTA;
    case 7: case 14: return YELLOW;
    default: return CYAN;
  }
}

/**
 * 32x32 screen mapped at $0200-$05FF, one byte per pixel, row-major.
 * The frame is RGB24.
 */
export class Display {
  readonly frame = new Uint8Array(SCREEN_WIDTH * SCREEN_HEIGHT * 3);

  // Rebuild the frame from memory; true when any pixel changed
  refresh(bus: Bus): boolean {
    let changed = false;
    let i = 0;
    for (let addr = SCREEN_BASE; addr < SCREEN_END; addr++) {
      const [r, g, b] = colorOf(bus.read(addr));
      if (this.frame[i] !== r || this.frame[i + 1] !== g || this.frame[i + 2] !== b) {
        this.frame[i] = r; this.frame[i + 1] = g; this.frame[i + 2] = b;
        changed = true;
      }
      i += 3;
    }
    return changed;
  }

  pixel(x: number, y: number): RGB {
    const i = ((y % SCREEN_HEIGHT) * SCREEN_WIDTH + (x % SCREEN_WIDTH)) * 3;
    return [this.frame[i], this.frame[i + 1], this.frame[i + 2]];
  }
}
