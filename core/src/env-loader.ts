import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { existsSync } from 'node:fs';
import type { Logger } from './logger.js';

export interface EnvLoaderOptions {
  /** Receives one debug line per loaded file */
  logger?: Logger;
}

export interface EnvLoaderResult {
  loaded: string[];
}

/** A directory holding the shared catalog is the repository root. */
const ROOT_MARKER = join('catalog', 'key-maps');

function findRepositoryRoot(startDir: string): string | null {
  let current = startDir;
  const root = resolve('/');
  while (current !== root) {
    if (existsSync(resolve(current, ROOT_MARKER))) {
      return current;
    }
    current = dirname(current);
  }
  return null;
}

/**
 * Load environment variables from .env files.
 *
 * Searches for .env files in the following order (first file found takes priority):
 * 1. Repository root (the directory holding catalog/key-maps)
 * 2. Current working directory (as fallback)
 *
 * @param callerUrl - The import.meta.url of the calling module
 */
export function loadEnv(callerUrl: string, options: EnvLoaderOptions = {}): EnvLoaderResult {
  const callerDir = dirname(fileURLToPath(callerUrl));
  const repositoryRoot = findRepositoryRoot(callerDir);
  const loaded: string[] = [];

  if (repositoryRoot) {
    const rootEnvPath = resolve(repositoryRoot, '.env');
    if (existsSync(rootEnvPath)) {
      const result = dotenvConfig({ path: rootEnvPath });
      if (result.parsed) {
        loaded.push(rootEnvPath);
        options.logger?.debug(`[env] Loaded: ${rootEnvPath}`);
      }
    }
  }

  // Fallback; never overrides values already set
  const cwdEnvPath = resolve(process.cwd(), '.env');
  if (!loaded.includes(cwdEnvPath) && existsSync(cwdEnvPath)) {
    const result = dotenvConfig({ path: cwdEnvPath, override: false });
    if (result.parsed) {
      loaded.push(cwdEnvPath);
      options.logger?.debug(`[env] Loaded (fallback): ${cwdEnvPath}`);
    }
  }

  return { loaded };
}
