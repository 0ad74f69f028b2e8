import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { loadEnv } from './env-loader.js';
import { existsSync } from 'node:fs';
import { config as dotenvConfig } from 'dotenv';
import type { Logger } from './logger.js';

vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
}));

vi.mock('dotenv', () => ({
  config: vi.fn(),
}));

function endsWithMarker(path: unknown): boolean {
  return typeof path === 'string' && /catalog[\\/]key-maps$/.test(path);
}

describe('loadEnv', () => {
  const mockExistsSync = vi.mocked(existsSync);
  const mockDotenvConfig = vi.mocked(dotenvConfig);

  beforeEach(() => {
    vi.clearAllMocks();
    mockDotenvConfig.mockReturnValue({ parsed: undefined });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return empty loaded array when no .env files exist', () => {
    mockExistsSync.mockReturnValue(false);

    const result = loadEnv(import.meta.url);

    expect(result.loaded).toEqual([]);
    expect(mockDotenvConfig).not.toHaveBeenCalled();
  });

  it('should load .env from the repository root when the catalog is found', () => {
    mockExistsSync.mockImplementation((path) => endsWithMarker(path) || (typeof path === 'string' && path.endsWith('.env')));
    mockDotenvConfig.mockReturnValue({ parsed: { TEST: 'value' } });

    const result = loadEnv(import.meta.url);

    expect(result.loaded.length).toBeGreaterThan(0);
    expect(mockDotenvConfig).toHaveBeenCalledWith({ path: result.loaded[0] });
  });

  it('should load cwd .env as fallback when the repository root is not found', () => {
    mockExistsSync.mockImplementation((path) => typeof path === 'string' && path.endsWith('.env'));
    mockDotenvConfig.mockReturnValue({ parsed: { FALLBACK: 'value' } });

    const result = loadEnv(import.meta.url);

    expect(result.loaded).toHaveLength(1);
    expect(mockDotenvConfig).toHaveBeenCalledWith(expect.objectContaining({ override: false }));
  });

  it('should report loaded files through the logger', () => {
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    mockExistsSync.mockReturnValue(true);
    mockDotenvConfig.mockReturnValue({ parsed: { TEST: 'value' } });

    loadEnv(import.meta.url, { logger });

    expect(logger.debug).toHaveBeenCalledWith(expect.stringContaining('[env] Loaded:'));
  });

  it('should stay quiet without a logger', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    mockExistsSync.mockReturnValue(true);
    mockDotenvConfig.mockReturnValue({ parsed: { TEST: 'value' } });

    loadEnv(import.meta.url);

    expect(consoleSpy).not.toHaveBeenCalled();
  });
});
