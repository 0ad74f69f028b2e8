/**
 * Path expressions locate one element from the template root.
 *
 * Grammar (a small XPath subset):
 *
 *   path      := step ('/' step)*
 *   step      := Name predicate*
 *   predicate := '[' (Name '/')* '@' Name '=' quoted ']'
 *
 * `Params/Param[@key='Islands']` selects the Param whose key attribute is
 * "Islands". A predicate may look through child elements:
 * `Condition[Left-Side/Column-Value/@column='NetProfit']`.
 */

import { createParserError, ParserErrorCode } from '../errors/index.js';
import { childElements, type TemplateElement } from '../template/types.js';

export interface PathPredicate {
  /** Child element names walked from the step element before reading the attribute */
  path: readonly string[];
  attribute: string;
  value: string;
  /** Matches any value and reports it; used to enumerate wildcard sections */
  capture?: boolean;
}

export interface PathStep {
  name: string;
  predicates: readonly PathPredicate[];
}

export type PathExpression = readonly PathStep[];

export interface PathMatch {
  element: TemplateElement;
  /** Values read by capturing predicates, in path order */
  captures: string[];
}

const NAME_PATTERN = /^[A-Za-z_][\w.:-]*$/;
const PREDICATE_PATTERN =
  /^((?:[A-Za-z_][\w.:-]*\/)*)@([A-Za-z_][\w.:-]*)\s*=\s*(?:'([^']*)'|"([^"]*)")$/;

export function parsePathExpression(source: string): PathExpression {
  const fail = (reason: string) =>
    createParserError(ParserErrorCode.INVALID_PATH_EXPRESSION, `Invalid path expression "${source}": ${reason}.`);

  const steps: PathStep[] = [];
  let index = 0;
  while (index < source.length) {
    let end = index;
    while (end < source.length && source[end] !== '[' && source[end] !== '/') {
      end += 1;
    }
    const name = source.slice(index, end).trim();
    if (!NAME_PATTERN.test(name)) {
      throw fail(name.length === 0 ? `empty step at offset ${index}` : `"${name}" is not an element name`);
    }
    index = end;

    const predicates: PathPredicate[] = [];
    while (source[index] === '[') {
      const close = findPredicateEnd(source, index + 1);
      if (close < 0) {
        throw fail(`unterminated predicate on step "${name}"`);
      }
      const body = source.slice(index + 1, close).trim();
      const match = PREDICATE_PATTERN.exec(body);
      if (!match) {
        throw fail(`predicate "[${body}]" must look like [@name='value']`);
      }
      const [, through = '', attribute = '', single, double] = match;
      predicates.push({
        path: through.split('/').filter((segment) => segment.length > 0),
        attribute,
        value: single ?? double ?? '',
      });
      index = close + 1;
    }

    steps.push({ name, predicates });
    if (index < source.length) {
      if (source[index] !== '/') {
        throw fail(`unexpected "${source[index]}" at offset ${index}`);
      }
      index += 1;
      if (index === source.length) {
        throw fail('trailing "/"');
      }
    }
  }

  if (steps.length === 0) {
    throw fail('path is empty');
  }
  return steps;
}

function findPredicateEnd(source: string, from: number): number {
  let quote: string | undefined;
  for (let index = from; index < source.length; index += 1) {
    const char = source[index];
    if (quote) {
      if (char === quote) {
        quote = undefined;
      }
    } else if (char === "'" || char === '"') {
      quote = char;
    } else if (char === ']') {
      return index;
    }
  }
  return -1;
}

export function formatPredicate(predicate: PathPredicate): string {
  const through = predicate.path.map((segment) => `${segment}/`).join('');
  const value = predicate.capture ? '*' : predicate.value;
  const quoted = value.includes("'") ? `"${value}"` : `'${value}'`;
  return `[${through}@${predicate.attribute}=${quoted}]`;
}

export function formatPathExpression(path: PathExpression): string {
  return path.map((step) => `${step.name}${step.predicates.map(formatPredicate).join('')}`).join('/');
}

/**
 * Tag names only, e.g. "Strategy/BuildMode" for layout lookups.
 */
export function formatTagPath(path: PathExpression): string {
  return path.map((step) => step.name).join('/');
}

/**
 * Elements reached by walking `names` down from `element`, any branch.
 */
export function descend(element: TemplateElement, names: readonly string[]): TemplateElement[] {
  let frontier = [element];
  for (const name of names) {
    frontier = frontier.flatMap((current) => childElements(current).filter((child) => child.name === name));
  }
  return frontier;
}

/**
 * Evaluates one predicate. Returns the attribute value that satisfied it,
 * or undefined when it does not hold.
 */
export function evaluatePredicate(element: TemplateElement, predicate: PathPredicate): string | undefined {
  for (const candidate of descend(element, predicate.path)) {
    const value = candidate.attributes.get(predicate.attribute);
    if (value === undefined) {
      continue;
    }
    if (predicate.capture || value === predicate.value) {
      return value;
    }
  }
  return undefined;
}

function matchStep(element: TemplateElement, step: PathStep, captures: string[]): string[] | undefined {
  if (element.name !== step.name) {
    return undefined;
  }
  const next = [...captures];
  for (const predicate of step.predicates) {
    const value = evaluatePredicate(element, predicate);
    if (value === undefined) {
      return undefined;
    }
    if (predicate.capture) {
      next.push(value);
    }
  }
  return next;
}

/**
 * All elements the path selects, starting with the root itself.
 */
export function findMatches(root: TemplateElement, path: PathExpression): PathMatch[] {
  const [first, ...rest] = path;
  if (!first) {
    return [];
  }
  const rootCaptures = matchStep(root, first, []);
  if (!rootCaptures) {
    return [];
  }

  let frontier: PathMatch[] = [{ element: root, captures: rootCaptures }];
  for (const step of rest) {
    const next: PathMatch[] = [];
    for (const match of frontier) {
      for (const child of childElements(match.element)) {
        const captures = matchStep(child, step, match.captures);
        if (captures) {
          next.push({ element: child, captures });
        }
      }
    }
    frontier = next;
  }
  return frontier;
}
