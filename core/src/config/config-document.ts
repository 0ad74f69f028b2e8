import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { parseDocument } from 'yaml';
import {
  createParserError,
  createRuntimeError,
  ParserErrorCode,
  RuntimeErrorCode,
} from '../errors/index.js';

/**
 * One leaf of the configuration: a dotted key and its YAML value.
 * Sequences are leaves; nested mappings are flattened, so an empty
 * mapping contributes nothing.
 */
export interface ConfigEntry {
  readonly key: string;
  readonly value: unknown;
}

export interface ConfigDocument {
  /** Leaves in document order */
  readonly entries: readonly ConfigEntry[];
  readonly filePath?: string;
  get(key: string): unknown;
  has(key: string): boolean;
}

function isPlainMapping(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

export function createConfigDocument(
  values: Record<string, unknown>,
  options: { filePath?: string } = {},
): ConfigDocument {
  const entries: ConfigEntry[] = [];
  const index = new Map<string, unknown>();

  const visit = (prefix: string, mapping: Record<string, unknown>): void => {
    for (const [name, value] of Object.entries(mapping)) {
      const key = prefix ? `${prefix}.${name}` : name;
      if (isPlainMapping(value)) {
        visit(key, value);
        continue;
      }
      if (index.has(key)) {
        throw createParserError(
          ParserErrorCode.DUPLICATE_CONFIG_KEY,
          `Configuration sets "${key}" more than once.`,
          {
            filePath: options.filePath,
            context: key,
            suggestion: 'Write the key either dotted or nested, not both.',
          },
        );
      }
      const frozen = Object.freeze({ key, value: freezeValue(value) });
      index.set(key, frozen.value);
      entries.push(frozen);
    }
  };
  visit('', values);

  return Object.freeze({
    entries: Object.freeze(entries),
    filePath: options.filePath,
    get: (key: string) => index.get(key),
    has: (key: string) => index.has(key),
  });
}

function freezeValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return Object.freeze(value.map(freezeValue));
  }
  if (isPlainMapping(value)) {
    return Object.freeze({ ...value });
  }
  return value;
}

/**
 * Parses configuration YAML. The top level must be a mapping; an empty
 * document is an empty configuration.
 */
export function parseConfigDocument(text: string, options: { filePath?: string } = {}): ConfigDocument {
  const document = parseDocument(text, { uniqueKeys: true });
  const [problem] = document.errors;
  if (problem) {
    const position = problem.linePos?.[0];
    throw createParserError(ParserErrorCode.INVALID_CONFIG_YAML, `Configuration is not valid YAML: ${problem.message}`, {
      filePath: options.filePath,
      context: position ? `line ${position.line}, column ${position.col}` : undefined,
      cause: problem,
    });
  }

  const values: unknown = document.toJS();
  if (values === null || values === undefined) {
    return createConfigDocument({}, options);
  }
  if (!isPlainMapping(values)) {
    throw createParserError(
      ParserErrorCode.INVALID_CONFIG_YAML,
      'Configuration must be a mapping of sections to values.',
      { filePath: options.filePath },
    );
  }
  return createConfigDocument(values, options);
}

export async function loadConfigDocument(filePath: string): Promise<ConfigDocument> {
  const absolute = resolve(filePath);
  let text: string;
  try {
    text = await readFile(absolute, 'utf8');
  } catch (error) {
    throw createRuntimeError(RuntimeErrorCode.IO_ERROR, `Cannot read configuration "${absolute}".`, {
      filePath: absolute,
      cause: error,
    });
  }
  return parseConfigDocument(text, { filePath: absolute });
}
