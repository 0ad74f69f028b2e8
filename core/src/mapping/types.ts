import type { TemplateElement } from '../template/types.js';
import type { PathExpression } from './path-expression.js';

export type ValueType = 'string' | 'integer' | 'number' | 'boolean' | 'date';

export const VALUE_TYPES: readonly ValueType[] = ['string', 'integer', 'number', 'boolean', 'date'];

export type ValueTarget = { kind: 'text' } | { kind: 'attribute'; name: string };

/**
 * Where a value lives in the template.
 */
export interface LocationDescriptor {
  path: PathExpression;
  target: ValueTarget;
  /**
   * Child order of each step's parent, aligned with `path`. Created
   * elements are placed by it; `undefined` means "append".
   */
  slots: ReadonlyArray<readonly string[] | undefined>;
  /** Attributes written on the leaf element when it has to be created */
  createAttributes: ReadonlyArray<readonly [string, string]>;
}

/**
 * Fixed write that accompanies an entry, e.g. switching a condition on
 * when its threshold is set.
 */
export interface CompanionWrite {
  location: LocationDescriptor;
  value: string;
}

export interface KeyPathEntry {
  /** Dotted configuration key, e.g. "build_mode.Islands" */
  key: string;
  section: string;
  field: string;
  valueType: ValueType;
  location: LocationDescriptor;
  companions: readonly CompanionWrite[];
}

/**
 * A section accepting any field name, such as building blocks.
 */
export interface WildcardSection {
  section: string;
  valueType: ValueType;
  /** Path template with the `{field}` placeholder */
  pathTemplate: string;
  target: ValueTarget;
}

export interface KeyPathMap {
  /** File the map was compiled from, when loaded from disk */
  readonly source?: string;
  resolve(key: string): KeyPathEntry | undefined;
  /** Every statically declared entry, in registry order */
  entries(): readonly KeyPathEntry[];
  wildcards(): readonly WildcardSection[];
  /**
   * Field names of a wildcard section that exist in a template, in
   * document order.
   */
  enumerate(section: string, root: TemplateElement): string[];
}
