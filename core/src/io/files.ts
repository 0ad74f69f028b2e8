import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { createRuntimeError, RuntimeErrorCode } from '../errors/index.js';
import { decodeTemplateBytes } from './encoding.js';

export interface TemplateFile {
  /** Absolute path */
  path: string;
  text: string;
  /** Encoding the bytes were decoded from */
  encoding: string;
}

/**
 * Reads a template and normalizes it to text.
 */
export async function readTemplateFile(path: string): Promise<TemplateFile> {
  const absolute = resolve(path);
  let bytes: Uint8Array;
  try {
    bytes = await readFile(absolute);
  } catch (error) {
    throw createRuntimeError(RuntimeErrorCode.IO_ERROR, `Cannot read template "${absolute}".`, {
      filePath: absolute,
      cause: error,
      suggestion: 'Check the --template path.',
    });
  }
  const decoded = decodeTemplateBytes(bytes);
  return { path: absolute, text: decoded.text, encoding: decoded.encoding };
}
