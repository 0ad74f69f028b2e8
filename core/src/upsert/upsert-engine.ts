import {
  createRuntimeError,
  createValidationError,
  RuntimeErrorCode,
  ValidationErrorCode,
} from '../errors/index.js';
import type { ConfigDocument } from '../config/config-document.js';
import { noopLogger, type Logger } from '../logger.js';
import { descend, type PathStep } from '../mapping/path-expression.js';
import type { KeyPathMap, LocationDescriptor, ValueTarget } from '../mapping/types.js';
import { planPatch, type PatchPlan, type PlannedWrite } from '../planning/patch-planner.js';
import {
  childElements,
  createElement,
  createText,
  type TemplateDocument,
  type TemplateElement,
  type TemplateNode,
} from '../template/types.js';
import { canWriteText, locate, readValue } from './locate.js';

export interface UpsertOptions {
  logger?: Logger;
}

export interface UpsertReport {
  /** Writes that changed the tree, in plan order */
  applied: PlannedWrite[];
  /** Writes whose value was already in place */
  unchanged: PlannedWrite[];
  /** Locations of elements created along the way */
  created: string[];
}

/**
 * How new elements are indented. `unit` is undefined for templates written
 * without line breaks, where nothing but the element is inserted.
 */
interface Indentation {
  unit?: string;
}

const NEWLINE_WHITESPACE = /^\s*\n\s*$/;

function isWhitespaceText(node: TemplateNode | undefined): boolean {
  return node !== undefined && node.kind === 'text' && /^\s*$/.test(node.value);
}

function trailingIndent(node: TemplateNode | undefined): string | undefined {
  if (node === undefined || node.kind !== 'text' || !NEWLINE_WHITESPACE.test(node.value)) {
    return undefined;
  }
  return node.value.slice(node.value.lastIndexOf('\n') + 1);
}

function detectIndentation(root: TemplateElement): Indentation {
  for (const child of root.children) {
    const indent = trailingIndent(child);
    if (indent !== undefined) {
      return { unit: indent };
    }
  }
  return {};
}

/** Root-first chain of elements ending at `target` */
function ancestry(root: TemplateElement, target: TemplateElement): TemplateElement[] | undefined {
  if (root === target) {
    return [root];
  }
  for (const child of childElements(root)) {
    const chain = ancestry(child, target);
    if (chain) {
      return [root, ...chain];
    }
  }
  return undefined;
}

function indentOf(root: TemplateElement, element: TemplateElement, indentation: Indentation): string {
  const chain = ancestry(root, element) ?? [element];
  let indent = '';
  for (let index = 1; index < chain.length; index += 1) {
    const parent = chain[index - 1];
    const child = chain[index];
    if (!parent || !child) {
      continue;
    }
    const position = parent.children.indexOf(child);
    indent = trailingIndent(parent.children[position - 1]) ?? indent + (indentation.unit ?? '');
  }
  return indent;
}

// =============================================================================
// Insertion
// =============================================================================

function slotIndex(slot: readonly string[] | undefined, name: string): number {
  return slot ? slot.indexOf(name) : -1;
}

/**
 * Index in `parent.children` before which a new element goes. Follows the
 * parent's layout when the element has a slot there; appends otherwise.
 */
function insertionPoint(parent: TemplateElement, name: string, slot: readonly string[] | undefined): {
  index: number;
  /** Existing element the new one is placed next to */
  sibling?: TemplateElement;
  before: boolean;
} {
  const rank = slotIndex(slot, name);
  let lastElement = -1;
  let after = -1;
  let before = -1;

  parent.children.forEach((node, index) => {
    if (node.kind !== 'element') {
      return;
    }
    lastElement = index;
    if (rank < 0) {
      return;
    }
    const siblingRank = slotIndex(slot, node.name);
    if (siblingRank >= 0 && siblingRank <= rank) {
      after = index;
    } else if (siblingRank > rank && before < 0) {
      before = index;
    }
  });

  const pick = (index: number, isBefore: boolean) => {
    const node = parent.children[index];
    return { index: isBefore ? index : index + 1, sibling: node?.kind === 'element' ? node : undefined, before: isBefore };
  };
  if (after >= 0) {
    return pick(after, false);
  }
  if (before >= 0) {
    return pick(before, true);
  }
  if (lastElement >= 0) {
    return pick(lastElement, false);
  }
  return { index: parent.children.length, before: false };
}

function insertChild(
  parent: TemplateElement,
  child: TemplateElement,
  slot: readonly string[] | undefined,
  parentIndent: string,
  indentation: Indentation,
): string {
  const childIndent = parentIndent + (indentation.unit ?? '');
  const point = insertionPoint(parent, child.name, slot);

  if (indentation.unit === undefined) {
    parent.children.splice(point.index, 0, child);
    return childIndent;
  }

  if (!point.sibling) {
    if (parent.children.every(isWhitespaceText)) {
      parent.children = [createText(`\n${childIndent}`), child, createText(`\n${parentIndent}`)];
    } else {
      parent.children.push(child);
    }
    return childIndent;
  }

  const siblingPosition = parent.children.indexOf(point.sibling);
  const siblingIndent = trailingIndent(parent.children[siblingPosition - 1]) ?? childIndent;
  if (point.before) {
    parent.children.splice(point.index, 0, child, createText(`\n${siblingIndent}`));
  } else {
    parent.children.splice(point.index, 0, createText(`\n${siblingIndent}`), child);
  }
  return siblingIndent;
}

function createStepElement(step: PathStep): TemplateElement {
  const element = createElement(
    step.name,
    step.predicates
      .filter((predicate) => predicate.path.length === 0)
      .map((predicate): [string, string] => [predicate.attribute, predicate.value]),
  );
  element.selfClosing = true;
  return element;
}

/**
 * Creates the children a step's predicates look through, so the new element
 * satisfies them: `Condition[Left-Side/Column-Value/@column='x']` gets a
 * Left-Side/Column-Value child with column="x".
 */
function satisfyNestedPredicates(
  element: TemplateElement,
  step: PathStep,
  elementIndent: string,
  indentation: Indentation,
): void {
  for (const predicate of step.predicates) {
    if (predicate.path.length === 0) {
      continue;
    }
    let current = element;
    let currentIndent = elementIndent;
    for (const name of predicate.path) {
      const [existing] = descend(current, [name]);
      if (existing) {
        current = existing;
        currentIndent += indentation.unit ?? '';
        continue;
      }
      const created = createElement(name);
      created.selfClosing = true;
      currentIndent = insertChild(current, created, undefined, currentIndent, indentation);
      current = created;
    }
    setAttribute(current, predicate.attribute, predicate.value);
  }
}

// =============================================================================
// Writes
// =============================================================================

function setAttribute(element: TemplateElement, name: string, value: string): void {
  if (element.attributes.get(name) === value) {
    return;
  }
  element.attributes.set(name, value);
  // The verbatim start tag no longer matches
  delete element.rawStartTag;
}

function setText(element: TemplateElement, value: string): void {
  const first = element.children.findIndex((node) => node.kind === 'text' || node.kind === 'cdata');
  const kept: TemplateNode[] = element.children.filter((node) => node.kind !== 'text' && node.kind !== 'cdata');
  if (value.length > 0) {
    kept.splice(first < 0 ? kept.length : first, 0, createText(value));
  }
  element.children = kept;
}

function writeValue(element: TemplateElement, target: ValueTarget, value: string, key: string): void {
  if (target.kind === 'attribute') {
    setAttribute(element, target.name, value);
    return;
  }
  if (!canWriteText(element)) {
    throw createRuntimeError(
      RuntimeErrorCode.TEXT_TARGET_HAS_CHILDREN,
      `"${key}" would replace the text of an element that has child elements.`,
      { key, context: `<${element.name}>` },
    );
  }
  setText(element, value);
}

function ensureElement(
  root: TemplateElement,
  location: LocationDescriptor,
  key: string,
  indentation: Indentation,
  created: string[],
): TemplateElement {
  const located = locate(root, location);
  if (located.kind === 'found') {
    return located.element;
  }
  if (located.kind !== 'missing') {
    throw createValidationError(
      ValidationErrorCode.AMBIGUOUS_LOCATION,
      `"${key}" does not point at a single element of the template.`,
      { key },
    );
  }

  let parent = located.ancestor;
  let parentIndent = indentOf(root, parent, indentation);
  for (let index = located.depth; index < location.path.length; index += 1) {
    const step = location.path[index];
    if (!step) {
      break;
    }
    const element = createStepElement(step);
    const indent = insertChild(parent, element, location.slots[index], parentIndent, indentation);
    satisfyNestedPredicates(element, step, indent, indentation);
    created.push(location.path.slice(0, index + 1).map((s) => s.name).join('/'));
    parent = element;
    parentIndent = indent;
  }
  for (const [name, value] of location.createAttributes) {
    if (!parent.attributes.has(name)) {
      parent.attributes.set(name, value);
    }
  }
  return parent;
}

/**
 * Applies a plan to the tree it was computed for. Values already in place
 * leave their element untouched, so applying twice changes nothing more.
 */
export function applyPlan(document: TemplateDocument, plan: PatchPlan, options: UpsertOptions = {}): UpsertReport {
  const logger = options.logger ?? noopLogger;
  const indentation = detectIndentation(document.root);
  const report: UpsertReport = { applied: [], unchanged: [], created: [] };

  for (const write of plan.writes) {
    const element = ensureElement(document.root, write.location, write.key, indentation, report.created);
    if (readValue(element, write.location.target) === write.value) {
      report.unchanged.push(write);
      continue;
    }
    writeValue(element, write.location.target, write.value, write.key);
    report.applied.push(write);
    logger.debug(`${write.key}: ${write.currentValue ?? '(absent)'} -> ${write.value}`);
  }

  return report;
}

/**
 * Plans and applies a configuration in one step.
 */
export function applyConfiguration(
  document: TemplateDocument,
  config: ConfigDocument,
  keyMap: KeyPathMap,
  options: UpsertOptions = {},
): UpsertReport {
  const plan = planPatch({ document, config, keyMap, logger: options.logger });
  return applyPlan(document, plan, options);
}
