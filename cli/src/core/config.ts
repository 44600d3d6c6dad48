/**
 * Runtime configuration for list-splitter.
 *
 * Precedence: CLI flag > environment > default.
 *   LIST_SPLITTER_OUT_DIR   default directory for written archives (default: cwd)
 */

import { resolve } from 'node:path';
import type { SplitVariant } from './split/types.js';

export const OUT_DIR_ENV = 'LIST_SPLITTER_OUT_DIR';

export interface OutputOptions {
  /** Explicit archive path (--out). */
  out?: string;
  /** Directory for the tool's default archive name (--out-dir). */
  outDir?: string;
}

function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const v = env[name]?.trim();
  return v ? v : undefined;
}

/** Where the archive for a run is written. */
export function resolveOutputPath(
  variant: Pick<SplitVariant, 'archiveName'>,
  opts: OutputOptions,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string {
  if (opts.out) return resolve(cwd, opts.out);
  const dir = opts.outDir ?? envValue(env, OUT_DIR_ENV) ?? cwd;
  return resolve(cwd, dir, variant.archiveName);
}
