/* eslint-env node */
import process from 'node:process';
import { readFile } from 'node:fs/promises';
import os from 'node:os';
import { resolve } from 'node:path';
import { isLogLevel, LOG_LEVELS, type LogLevel } from '@stratpatch/core';
import { DEFAULT_OUTPUT_DIR } from './output-paths.js';

export interface CliConfig {
  /** Directory for generated outputs when --out is not given */
  outputDir?: string;
  /** Key-path map used instead of the bundled one */
  keyMap?: string;
  logLevel?: LogLevel;
}

/** Settings a command runs with, after config file, environment and flags */
export interface CliSettings {
  outputDir: string;
  keyMapPath?: string;
  logLevel: LogLevel;
}

export function getDefaultCliConfigPath(): string {
  const envPath = process.env.STRATPATCH_CLI_CONFIG;
  if (envPath) {
    return resolve(envPath);
  }
  return resolve(os.homedir(), '.config', 'stratpatch', 'cli-config.json');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readOptionalString(source: Record<string, unknown>, field: string, targetPath: string): string | undefined {
  const value = source[field];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new Error(`CLI config "${targetPath}": "${field}" must be a non-empty string.`);
  }
  return value;
}

/**
 * Reads the CLI config. A missing file means defaults; a file that cannot be
 * parsed is an error.
 */
export async function readCliConfig(configPath?: string): Promise<CliConfig> {
  const targetPath = resolve(configPath ?? getDefaultCliConfigPath());
  let contents: string;
  try {
    contents = await readFile(targetPath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      return {};
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    throw new Error(`CLI config "${targetPath}" is not valid JSON.`, { cause: error });
  }
  if (!isRecord(parsed)) {
    throw new Error(`CLI config "${targetPath}" must be a JSON object.`);
  }

  const logLevel = parsed.logLevel;
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new Error(`CLI config "${targetPath}": "logLevel" must be one of ${LOG_LEVELS.join(', ')}.`);
  }
  return {
    outputDir: readOptionalString(parsed, 'outputDir', targetPath),
    keyMap: readOptionalString(parsed, 'keyMap', targetPath),
    logLevel,
  };
}

export function resolveLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  if (value === undefined || value.length === 0) {
    return fallback;
  }
  if (!isLogLevel(value)) {
    throw new Error(`Unknown log level "${value}". Use one of: ${LOG_LEVELS.join(', ')}.`);
  }
  return value;
}

/**
 * Flags win over STRATPATCH_* variables, which win over the config file.
 */
export function resolveCliSettings(args: {
  config: CliConfig;
  env?: NodeJS.ProcessEnv;
  flags?: { keyMap?: string; logLevel?: string };
}): CliSettings {
  const env = args.env ?? process.env;
  const configLevel = args.config.logLevel ?? 'info';
  const envLevel = resolveLogLevel(env.STRATPATCH_LOG_LEVEL, configLevel);
  const keyMap = args.flags?.keyMap ?? args.config.keyMap;
  return {
    outputDir: resolve(env.STRATPATCH_OUTPUT_DIR || args.config.outputDir || DEFAULT_OUTPUT_DIR),
    keyMapPath: keyMap ? resolve(keyMap) : undefined,
    logLevel: resolveLogLevel(args.flags?.logLevel, envLevel),
  };
}
