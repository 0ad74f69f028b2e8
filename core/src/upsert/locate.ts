import { findMatches } from '../mapping/path-expression.js';
import type { LocationDescriptor, ValueTarget } from '../mapping/types.js';
import { childElements, textContent, type TemplateElement } from '../template/types.js';

export type LocateResult =
  | { kind: 'found'; element: TemplateElement }
  /** `ancestor` is the deepest existing element; `depth` counts the steps it covers */
  | { kind: 'missing'; ancestor: TemplateElement; depth: number }
  | { kind: 'ambiguous'; depth: number; count: number }
  | { kind: 'outside-root'; rootName: string };

/**
 * Finds the element a location points at, or the deepest existing ancestor
 * it would be created under.
 */
export function locate(root: TemplateElement, location: LocationDescriptor): LocateResult {
  const { path } = location;
  for (let depth = path.length; depth >= 1; depth -= 1) {
    const matches = findMatches(root, path.slice(0, depth));
    if (matches.length > 1) {
      return { kind: 'ambiguous', depth, count: matches.length };
    }
    const [match] = matches;
    if (match) {
      return depth === path.length
        ? { kind: 'found', element: match.element }
        : { kind: 'missing', ancestor: match.element, depth };
    }
  }
  return { kind: 'outside-root', rootName: root.name };
}

export function readValue(element: TemplateElement, target: ValueTarget): string | undefined {
  if (target.kind === 'attribute') {
    return element.attributes.get(target.name);
  }
  return textContent(element);
}

/**
 * Text can only be written into elements without element children.
 */
export function canWriteText(element: TemplateElement): boolean {
  return childElements(element).length === 0;
}
