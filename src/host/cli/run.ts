/* eslint-disable no-console */
import { disasmAt, formatTraceLine } from '@utils/disasm6502';
import { ImageLoadError } from '@core/errors';
import { runHeadless } from '@core/harness/headless';
import { Easy6502System } from '@core/system/system';
import { USAGE, parseArgs } from './config';
import { readImageFile } from './image';
import { writeFramePng } from './png';

function hex2(v: number) { return (v & 0xFF).toString(16).toUpperCase().padStart(2, '0'); }

export function main(argv: readonly string[], env: Record<string, string | undefined>): number {
  const parsed = parseArgs(argv, env);
  if (!parsed.ok) {
    console.error(parsed.error);
    console.error(USAGE);
    return 1;
  }
  const cfg = parsed.config;

  let image: Uint8Array;
  try {
    image = readImageFile(cfg.image, cfg.origin);
  } catch (e) {
    if (e instanceof ImageLoadError) { console.error(`IOERROR: ${e.message}`); return 1; }
    throw e;
  }

  const sys = new Easy6502System();
  sys.load(image, cfg.origin);
  for (const k of cfg.keys) sys.pressKey(k);
  console.log(`Loaded ${cfg.image} (${image.length} bytes) at $${cfg.origin.toString(16).toUpperCase().padStart(4, '0')}`);

  if (cfg.trace) {
    const read = (addr: number) => sys.bus.read(addr);
    sys.cpu.setTraceHook((pc) => {
      console.log(formatTraceLine(pc, disasmAt(read, pc), sys.cpu.getState()));
    });
  }

  const result = runHeadless(sys, cfg.maxSteps);
  const s = sys.cpu.getState();
  console.log(`${result.reason} after ${result.steps} steps, ${result.cycles} cycles  A:${hex2(s.a)} X:${hex2(s.x)} Y:${hex2(s.y)} P:${hex2(s.p)} SP:${hex2(s.s)}`);

  if (cfg.png) {
    writeFramePng(cfg.png, sys.display.frame, cfg.scale);
    console.log(`Wrote ${cfg.png}`);
  }

  if (result.reason === 'fault') {
    console.error(result.message ?? 'CPU fault');
    return 1;
  }
  return 0;
}
