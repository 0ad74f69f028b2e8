import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import {
  createParserError,
  createRuntimeError,
  ParserErrorCode,
  RuntimeErrorCode,
} from '../errors/index.js';
import type { TemplateElement } from '../template/types.js';
import {
  findMatches,
  formatPathExpression,
  formatTagPath,
  parsePathExpression,
  type PathExpression,
} from './path-expression.js';
import {
  VALUE_TYPES,
  type CompanionWrite,
  type KeyPathEntry,
  type KeyPathMap,
  type LocationDescriptor,
  type ValueTarget,
  type ValueType,
  type WildcardSection,
} from './types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const CORE_PACKAGE_ROOT = resolve(__dirname, '..', '..');
const CATALOG_SEARCH_ROOTS = [
  resolve(CORE_PACKAGE_ROOT, 'catalog'),
  resolve(CORE_PACKAGE_ROOT, '..', 'catalog'),
];

/** Registry file shipped in the catalog */
export const DEFAULT_KEY_MAP_FILE = 'key-maps/strategy.yaml';

const WILDCARD_FIELD = '*';
const WILDCARD_NAME_PATTERN = /^[A-Za-z_][\w-]*$/;
const CAPTURE_SENTINEL = '\u0000field\u0000';

// =============================================================================
// Raw registry shapes
// =============================================================================

type RawRecord = Record<string, unknown>;

interface RawField {
  type: ValueType;
  path?: string;
  target?: string;
  vars: Record<string, string>;
}

interface RawCompanion {
  path: string;
  target: string;
  value: string;
}

interface RawSection {
  section: string;
  path?: string;
  target: string;
  createAttributes: Array<[string, string]>;
  also: RawCompanion[];
  repeat?: { variable: string; from: number; to: number };
  fields: Array<[string, RawField]>;
}

interface CompileContext {
  filePath?: string;
  layout: ReadonlyMap<string, readonly string[]>;
}

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function isValueType(value: unknown): value is ValueType {
  return VALUE_TYPES.some((type) => type === value);
}

function readOptionalString(value: unknown): string | undefined | null {
  if (value === undefined) {
    return undefined;
  }
  return typeof value === 'string' ? value : null;
}

function registryError(message: string, ctx: { filePath?: string }, context?: string) {
  return createParserError(ParserErrorCode.INVALID_KEY_MAP, message, {
    filePath: ctx.filePath,
    context,
  });
}

// =============================================================================
// Loading
// =============================================================================

export function getDefaultKeyMapPath(): string {
  for (const root of CATALOG_SEARCH_ROOTS) {
    const candidate = resolve(root, DEFAULT_KEY_MAP_FILE);
    if (existsSync(candidate)) {
      return candidate;
    }
  }
  return resolve(CATALOG_SEARCH_ROOTS[CATALOG_SEARCH_ROOTS.length - 1] ?? CORE_PACKAGE_ROOT, DEFAULT_KEY_MAP_FILE);
}

export async function loadKeyPathMap(filePath: string = getDefaultKeyMapPath()): Promise<KeyPathMap> {
  const absolute = resolve(filePath);
  let contents: string;
  try {
    contents = await readFile(absolute, 'utf8');
  } catch (error) {
    throw createRuntimeError(RuntimeErrorCode.IO_ERROR, `Cannot read key-path map "${absolute}".`, {
      filePath: absolute,
      cause: error,
    });
  }
  return parseKeyPathMap(contents, { filePath: absolute });
}

export function parseKeyPathMap(contents: string, options: { filePath?: string } = {}): KeyPathMap {
  let raw: unknown;
  try {
    raw = parseYaml(contents, { merge: true });
  } catch (error) {
    throw createParserError(ParserErrorCode.INVALID_KEY_MAP, 'Key-path map is not valid YAML.', {
      filePath: options.filePath,
      cause: error,
    });
  }
  if (!isRecord(raw)) {
    throw registryError('Key-path map must be a YAML mapping with a "sections" list.', options);
  }
  const layout = parseLayout(raw.layout, options);
  const sections = parseSections(raw.sections, options);
  return compileKeyPathMap(sections, { filePath: options.filePath, layout });
}

function parseLayout(value: unknown, ctx: { filePath?: string }): Map<string, readonly string[]> {
  const layout = new Map<string, readonly string[]>();
  if (value === undefined || value === null) {
    return layout;
  }
  if (!isRecord(value)) {
    throw registryError('"layout" must map parent tag paths to lists of child tag names.', ctx);
  }
  for (const [parent, children] of Object.entries(value)) {
    if (!Array.isArray(children) || !children.every((child) => typeof child === 'string')) {
      throw registryError(`Layout for "${parent}" must be a list of tag names.`, ctx, `layout.${parent}`);
    }
    layout.set(parent, Object.freeze(children.map(String)));
  }
  return layout;
}

function parseSections(value: unknown, ctx: { filePath?: string }): RawSection[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw registryError('Key-path map must declare a non-empty "sections" list.', ctx);
  }
  return value.map((entry, index) => parseSection(entry, index, ctx));
}

function parseSection(value: unknown, index: number, ctx: { filePath?: string }): RawSection {
  const where = `sections[${index}]`;
  if (!isRecord(value)) {
    throw registryError(`Section ${index} must be a mapping.`, ctx, where);
  }
  const section = value.section;
  if (typeof section !== 'string' || section.trim().length === 0) {
    throw registryError(`Section ${index} needs a "section" key prefix.`, ctx, where);
  }
  const path = readOptionalString(value.path);
  if (path === null) {
    throw registryError(`Section "${section}" has a non-string "path".`, ctx, where);
  }
  const target = value.target ?? 'text()';
  if (typeof target !== 'string') {
    throw registryError(`Section "${section}" has a non-string "target".`, ctx, where);
  }

  const createAttributes: Array<[string, string]> = [];
  if (value.createAttributes !== undefined) {
    if (!isRecord(value.createAttributes)) {
      throw registryError(`Section "${section}" createAttributes must be a mapping.`, ctx, where);
    }
    for (const [name, attr] of Object.entries(value.createAttributes)) {
      if (!isScalar(attr)) {
        throw registryError(`createAttributes.${name} in "${section}" must be a scalar.`, ctx, where);
      }
      createAttributes.push([name, String(attr)]);
    }
  }

  const also: RawCompanion[] = [];
  if (value.also !== undefined) {
    if (!Array.isArray(value.also)) {
      throw registryError(`Section "${section}" "also" must be a list.`, ctx, where);
    }
    for (const companion of value.also) {
      if (
        !isRecord(companion) ||
        typeof companion.path !== 'string' ||
        typeof companion.target !== 'string' ||
        !isScalar(companion.value)
      ) {
        throw registryError(`Companion writes in "${section}" need path, target and value.`, ctx, where);
      }
      also.push({ path: companion.path, target: companion.target, value: String(companion.value) });
    }
  }

  let repeat: RawSection['repeat'];
  if (value.repeat !== undefined) {
    const raw = value.repeat;
    if (
      !isRecord(raw) ||
      typeof raw.var !== 'string' ||
      !Number.isInteger(raw.from) ||
      !Number.isInteger(raw.to) ||
      Number(raw.from) > Number(raw.to)
    ) {
      throw registryError(`Section "${section}" repeat needs var, from and to (from <= to).`, ctx, where);
    }
    repeat = { variable: raw.var, from: Number(raw.from), to: Number(raw.to) };
  }

  if (!isRecord(value.fields) || Object.keys(value.fields).length === 0) {
    throw registryError(`Section "${section}" must declare at least one field.`, ctx, where);
  }
  const fields = Object.entries(value.fields).map(([name, field]): [string, RawField] => [
    name,
    parseField(section, name, field, ctx),
  ]);

  return { section, path, target, createAttributes, also, repeat, fields };
}

function parseField(section: string, name: string, value: unknown, ctx: { filePath?: string }): RawField {
  const where = `${section}.${name}`;
  if (isValueType(value)) {
    return { type: value, vars: {} };
  }
  const type = isRecord(value) ? value.type : undefined;
  if (!isRecord(value) || !isValueType(type)) {
    throw registryError(
      `Field "${where}" must be one of ${VALUE_TYPES.join(', ')} or a mapping with a "type".`,
      ctx,
      where,
    );
  }
  const path = readOptionalString(value.path);
  const target = readOptionalString(value.target);
  if (path === null || target === null) {
    throw registryError(`Field "${where}" path and target must be strings.`, ctx, where);
  }
  const vars: Record<string, string> = {};
  if (value.vars !== undefined) {
    if (!isRecord(value.vars)) {
      throw registryError(`Field "${where}" vars must be a mapping.`, ctx, where);
    }
    for (const [variable, replacement] of Object.entries(value.vars)) {
      if (!isScalar(replacement)) {
        throw registryError(`Field "${where}" var "${variable}" must be a scalar.`, ctx, where);
      }
      vars[variable] = String(replacement);
    }
  }
  return { type, path, target, vars };
}

// =============================================================================
// Compilation
// =============================================================================

function substitute(template: string, vars: Record<string, string>, ctx: CompileContext, where: string): string {
  return template.replace(/\{(\w+)\}/g, (_match, name: string) => {
    const replacement = vars[name];
    if (replacement === undefined) {
      throw registryError(`Unknown placeholder "{${name}}" in "${template}".`, ctx, where);
    }
    return replacement;
  });
}

export function parseTarget(target: string, ctx: { filePath?: string } = {}, where?: string): ValueTarget {
  const trimmed = target.trim();
  if (trimmed === 'text()') {
    return { kind: 'text' };
  }
  if (/^@[A-Za-z_][\w.:-]*$/.test(trimmed)) {
    return { kind: 'attribute', name: trimmed.slice(1) };
  }
  throw registryError(`Target "${target}" must be text() or @attribute.`, ctx, where);
}

export function formatTarget(target: ValueTarget): string {
  return target.kind === 'text' ? 'text()' : `@${target.name}`;
}

export function formatLocation(location: LocationDescriptor): string {
  return `${formatPathExpression(location.path)}/${formatTarget(location.target)}`;
}

function buildLocation(
  path: PathExpression,
  target: ValueTarget,
  createAttributes: ReadonlyArray<readonly [string, string]>,
  ctx: CompileContext,
): LocationDescriptor {
  const slots = path.map((_step, index) =>
    index === 0 ? undefined : ctx.layout.get(formatTagPath(path.slice(0, index))),
  );
  return Object.freeze({
    path: Object.freeze(path),
    target: Object.freeze(target),
    slots: Object.freeze(slots),
    createAttributes: Object.freeze(createAttributes.map((pair) => Object.freeze(pair))),
  });
}

function compileEntry(
  raw: RawSection,
  fieldName: string,
  field: RawField,
  vars: Record<string, string>,
  ctx: CompileContext,
): KeyPathEntry {
  const key = `${raw.section}.${fieldName}`;
  const allVars = { ...vars, field: fieldName, ...field.vars };
  const pathTemplate = field.path ?? raw.path;
  if (pathTemplate === undefined) {
    throw registryError(`Field "${key}" has no path and its section declares none.`, ctx, key);
  }
  const path = parsePathExpression(substitute(pathTemplate, allVars, ctx, key));
  const target = parseTarget(field.target ?? raw.target, ctx, key);
  const companions: CompanionWrite[] = raw.also.map((companion) => ({
    location: buildLocation(
      parsePathExpression(substitute(companion.path, allVars, ctx, key)),
      parseTarget(companion.target, ctx, key),
      [],
      ctx,
    ),
    value: substitute(companion.value, allVars, ctx, key),
  }));
  return Object.freeze({
    key,
    section: raw.section,
    field: fieldName,
    valueType: field.type,
    location: buildLocation(path, target, raw.createAttributes, ctx),
    companions: Object.freeze(companions),
  });
}

interface CompiledWildcard {
  info: WildcardSection;
  raw: RawSection;
  field: RawField;
  capturePath: PathExpression;
}

function compileWildcard(raw: RawSection, field: RawField, ctx: CompileContext): CompiledWildcard {
  const pathTemplate = field.path ?? raw.path;
  if (raw.repeat || pathTemplate === undefined) {
    throw registryError(`Wildcard section "${raw.section}" needs a path and cannot repeat.`, ctx, raw.section);
  }
  const capturePath = parsePathExpression(
    substitute(pathTemplate, { ...field.vars, field: CAPTURE_SENTINEL }, ctx, raw.section),
  ).map((step) => ({
    name: step.name,
    predicates: step.predicates.map((predicate) =>
      predicate.value === CAPTURE_SENTINEL ? { ...predicate, value: '', capture: true } : predicate,
    ),
  }));
  if (!capturePath.some((step) => step.predicates.some((predicate) => predicate.capture))) {
    throw registryError(
      `Wildcard section "${raw.section}" must use {field} as a predicate value, e.g. [@key='{field}'].`,
      ctx,
      raw.section,
    );
  }
  return {
    info: Object.freeze({
      section: raw.section,
      valueType: field.type,
      pathTemplate,
      target: parseTarget(field.target ?? raw.target, ctx, raw.section),
    }),
    raw,
    field,
    capturePath,
  };
}

function compileKeyPathMap(sections: RawSection[], ctx: CompileContext): KeyPathMap {
  const entries = new Map<string, KeyPathEntry>();
  const wildcards: CompiledWildcard[] = [];

  const register = (entry: KeyPathEntry) => {
    if (entries.has(entry.key)) {
      throw registryError(`Key "${entry.key}" is declared more than once.`, ctx, entry.key);
    }
    entries.set(entry.key, entry);
  };

  for (const raw of sections) {
    for (const [name, field] of raw.fields) {
      if (name === WILDCARD_FIELD) {
        wildcards.push(compileWildcard(raw, field, ctx));
        continue;
      }
      if (!raw.repeat) {
        register(compileEntry(raw, name, field, {}, ctx));
        continue;
      }
      for (let index = raw.repeat.from; index <= raw.repeat.to; index += 1) {
        const vars = { [raw.repeat.variable]: String(index) };
        register(compileEntry(raw, substitute(name, vars, ctx, raw.section), field, vars, ctx));
      }
    }
  }

  const staticEntries = Object.freeze([...entries.values()]);
  const wildcardInfo = Object.freeze(wildcards.map((wildcard) => wildcard.info));

  // Wildcard keys compile on every lookup; the registry holds no state after this point.
  const resolveWildcard = (key: string): KeyPathEntry | undefined => {
    for (const wildcard of wildcards) {
      const prefix = `${wildcard.raw.section}.`;
      if (!key.startsWith(prefix)) {
        continue;
      }
      const fieldName = key.slice(prefix.length);
      if (!WILDCARD_NAME_PATTERN.test(fieldName)) {
        continue;
      }
      return compileEntry(wildcard.raw, fieldName, wildcard.field, {}, ctx);
    }
    return undefined;
  };

  return Object.freeze({
    source: ctx.filePath,
    resolve(key: string): KeyPathEntry | undefined {
      return entries.get(key) ?? resolveWildcard(key);
    },
    entries(): readonly KeyPathEntry[] {
      return staticEntries;
    },
    wildcards(): readonly WildcardSection[] {
      return wildcardInfo;
    },
    enumerate(section: string, root: TemplateElement): string[] {
      const names: string[] = [];
      for (const wildcard of wildcards) {
        if (wildcard.raw.section !== section) {
          continue;
        }
        for (const match of findMatches(root, wildcard.capturePath)) {
          const [name] = match.captures;
          if (name !== undefined && !names.includes(name)) {
            names.push(name);
          }
        }
      }
      return names;
    },
  });
}
