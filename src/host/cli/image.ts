import fs from 'node:fs';
import { ADDRESS_SPACE } from '@core/bus/memory';
import type { Word } from '@core/cpu/types';
import { ImageLoadError } from '@core/errors';

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}

// Read a raw binary image; throws ImageLoadError before anything touches emulated memory
export function readImageFile(path: string, origin: Word): Uint8Array {
  let buf: Buffer;
  try {
    buf = fs.readFileSync(path);
  } catch (e) {
    if (isErrnoException(e) && e.code === 'ENOENT') {
      throw new ImageLoadError('not-found', `File not found: ${path}`, path);
    }
    const detail = e instanceof Error ? e.message : String(e);
    throw new ImageLoadError('unreadable', `Cannot read ${path}: ${detail}`, path);
  }
  if (buf.length === 0) throw new ImageLoadError('empty', `Image is empty: ${path}`, path);
  if (origin + buf.length > ADDRESS_SPACE) {
    throw new ImageLoadError('too-large', `Image of ${buf.length} bytes does not fit at $${origin.toString(16).padStart(4, '0')}: ${path}`, path);
  }
  return new Uint8Array(buf);
}
