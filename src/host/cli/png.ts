import fs from 'node:fs';
import { PNG } from 'pngjs';
import { SCREEN_HEIGHT, SCREEN_WIDTH } from '@core/io/display';

// Scale the RGB24 screen frame up by `scale` and encode it as RGBA PNG
export function encodeFrame(frame: Uint8Array, scale: number): Buffer {
  const w = SCREEN_WIDTH * scale, h = SCREEN_HEIGHT * scale;
  const png = new PNG({ width: w, height: h });
  for (let y = 0; y < h; y++) {
    for (let x = 0; x < w; x++) {
      const src = (Math.floor(y / scale) * SCREEN_WIDTH + Math.floor(x / scale)) * 3;
      const dst = (y * w + x) * 4;
      png.data[dst] = frame[src];
      png.data[dst + 1] = frame[src + 1];
      png.data[dst + 2] = frame[src + 2];
      png.data[dst + 3] = 255;
    }
  }
  return PNG.sync.write(png);
}

export function writeFramePng(path: string, frame: Uint8Array, scale: number) {
  fs.writeFileSync(path, encodeFrame(frame, scale));
}
