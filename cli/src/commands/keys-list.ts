import {
  DIRECTIVES,
  formatPathExpression,
  formatTarget,
  loadKeyPathMap,
  type ValueType,
} from '@stratpatch/core';

export interface KeysListOptions {
  keyMapPath?: string;
}

export interface KeyListing {
  key: string;
  path: string;
  target: string;
  type: ValueType;
}

export interface KeysListResult {
  source?: string;
  keys: KeyListing[];
  /** Sections that take any field name, listed as `<section>.<name>` */
  wildcards: KeyListing[];
  directives: Array<{ key: string; grammar: string; description: string }>;
}

export async function runKeysList(options: KeysListOptions = {}): Promise<KeysListResult> {
  const keyMap = await loadKeyPathMap(options.keyMapPath);

  const keys = keyMap.entries().map((entry) => ({
    key: entry.key,
    path: formatPathExpression(entry.location.path),
    target: formatTarget(entry.location.target),
    type: entry.valueType,
  }));
  const wildcards = keyMap.wildcards().map((section) => ({
    key: `${section.section}.<name>`,
    path: section.pathTemplate.replaceAll('{field}', '<name>'),
    target: formatTarget(section.target),
    type: section.valueType,
  }));
  const directives = DIRECTIVES.map((directive) => ({
    key: directive.key,
    grammar: directive.grammar,
    description: directive.description,
  }));

  return { source: keyMap.source, keys, wildcards, directives };
}
