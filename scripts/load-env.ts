/**
 * Load environment variables from .env.local and .env files
 * 
 * Loads in order: .env.local then .env, with override: false so values
 * already in process.env (shell, CI) win.
 * 
 * Runs on import, so scripts import it first and every SIGNALS_* value is in
 * process.env before getAnalysisParamsFromEnv reads it: import './load-env';
 */

import { config } from 'dotenv';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';

export const ENV_FILES = ['.env.local', '.env'] as const;

/**
 * @returns Paths of the env files that were found and loaded
 */
export function loadEnv(cwd: string = process.cwd()): string[] {
  const loaded: string[] = [];

  for (const candidate of ENV_FILES) {
    const path = resolve(cwd, candidate);
    if (existsSync(path)) {
      config({ path, override: false });
      loaded.push(path);
    }
  }

  return loaded;
}

loadEnv();
