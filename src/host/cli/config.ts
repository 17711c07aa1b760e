import type { Byte, Word } from '@core/cpu/types';
import { DEFAULT_ORIGIN } from '@core/cpu/cpu';
import { keyCode } from '@core/io/keys';

export interface CliConfig {
  image: string;
  origin: Word;
  maxSteps: number;
  trace: boolean;
  png: string | null;
  scale: number;
  keys: Byte[];
}

export type ParseResult =
  | { ok: true; config: CliConfig }
  | { ok: false; error: string };

export const DEFAULT_MAX_STEPS = 10_000_000;

export const USAGE = 'Usage: emu6502 <image.bin> [--origin=0600] [--max-steps=N] [--trace] [--png=out.png] [--scale=10] [--keys=wasd]';

type Env = Record<string, string | undefined>;

function getEnv(env: Env, name: string): string | null { const v = env[name]; return v && v.length > 0 ? v : null; }

/**
 * `--name=value` flags win over the EMU_* environment variables, which win
 * over the defaults.
 */
export function parseArgs(argv: readonly string[], env: Env = {}): ParseResult {
  let image: string | null = null;
  let originHex = getEnv(env, 'EMU_ORIGIN');
  let maxStr = getEnv(env, 'EMU_MAX_STEPS');
  let trace = getEnv(env, 'EMU_TRACE') === '1';
  let png: string | null = null;
  let scaleStr: string | null = null;
  let keyStr = '';

  for (const a of argv) {
    if (a.startsWith('--origin=')) originHex = a.slice(9);
    else if (a.startsWith('--max-steps=')) maxStr = a.slice(12);
    else if (a === '--trace') trace = true;
    else if (a.startsWith('--png=')) png = a.slice(6);
    else if (a.startsWith('--scale=')) scaleStr = a.slice(8);
    else if (a.startsWith('--keys=')) keyStr = a.slice(7);
    else if (a.startsWith('--')) return { ok: false, error: `Unknown option: ${a}` };
    else if (image === null) image = a;
    else return { ok: false, error: `Unexpected argument: ${a}` };
  }
  if (image === null) return { ok: false, error: 'Missing image path' };

  let origin = DEFAULT_ORIGIN;
  if (originHex !== null) {
    const cleaned = originHex.replace(/^(\$|0x)/i, '');
    origin = /^[0-9a-f]{1,4}$/i.test(cleaned) ? parseInt(cleaned, 16) : NaN;
    if (!Number.isInteger(origin)) return { ok: false, error: `Invalid origin: ${originHex}` };
  }

  let maxSteps = DEFAULT_MAX_STEPS;
  if (maxStr !== null) {
    maxSteps = /^\d+$/.test(maxStr) ? parseInt(maxStr, 10) : NaN;
    if (!Number.isSafeInteger(maxSteps) || maxSteps <= 0) return { ok: false, error: `Invalid step limit: ${maxStr}` };
  }

  let scale = 10;
  if (scaleStr !== null) {
    scale = /^\d+$/.test(scaleStr) ? parseInt(scaleStr, 10) : NaN;
    if (!Number.isInteger(scale) || scale < 1 || scale > 64) return { ok: false, error: `Invalid scale: ${scaleStr}` };
  }

  const keys: Byte[] = [];
  for (const ch of keyStr) {
    const code = keyCode(ch);
    if (code === null) return { ok: false, error: `Unsupported key: ${ch}` };
    keys.push(code);
  }

  return { ok: true, config: { image, origin, maxSteps, trace, png, scale, keys } };
}
