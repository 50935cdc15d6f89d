import { existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { Env } from '../../config/index.js';

/** Flows bundled with the worker for development. */
export const BUNDLED_FLOWS_DIR = fileURLToPath(new URL('../../../resources/flows/', import.meta.url));

export const DEFAULT_FLOWS_DIR = '/opt/flowqa/flows';

/**
 * Picks the flow directory: explicit override, then FLOWQA_FLOWS_DIR,
 * then the bundled directory when present, then the fixed default.
 */
export function resolveFlowsDir(
  env: Pick<Env, 'FLOWQA_FLOWS_DIR'>,
  override?: string,
  exists: (path: string) => boolean = existsSync,
): string {
  if (override) return override;
  if (env.FLOWQA_FLOWS_DIR) return env.FLOWQA_FLOWS_DIR;
  if (exists(BUNDLED_FLOWS_DIR)) return BUNDLED_FLOWS_DIR;
  return DEFAULT_FLOWS_DIR;
}
