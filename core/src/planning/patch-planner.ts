import {
  buildValidationResult,
  createErrorIssue,
  createWarningIssue,
  RuntimeErrorCode,
  validationFailure,
  ValidationErrorCode,
  WarningCode,
  type ValidationIssue,
} from '../errors/index.js';
import type { ConfigDocument } from '../config/config-document.js';
import { expandDirective, isDirectiveKey, type DirectiveContext } from '../expansion/directives.js';
import { noopLogger, type Logger } from '../logger.js';
import { formatLocation } from '../mapping/key-path-map.js';
import type { KeyPathMap, LocationDescriptor } from '../mapping/types.js';
import type { TemplateDocument } from '../template/types.js';
import { canWriteText, locate, readValue } from '../upsert/locate.js';
import { assertValidConfiguration, checkWrite } from '../validation/config-validator.js';

export type WriteAction = 'update' | 'create' | 'unchanged';

/** Where a write came from: the configuration itself, or the directive that produced it */
export type WriteOrigin = { kind: 'config' } | { kind: 'directive'; directive: string };

export interface PlannedWrite {
  key: string;
  origin: WriteOrigin;
  /** Set for writes that accompany another key, e.g. switching a condition on */
  companion: boolean;
  location: LocationDescriptor;
  /** Printable form of the location; equal locations have equal ids */
  locationId: string;
  value: string;
  /** Value in the template before patching; undefined when absent */
  currentValue?: string;
  action: WriteAction;
}

export interface PatchPlan {
  writes: readonly PlannedWrite[];
  /** Soft issues, e.g. locations that will be created */
  warnings: readonly ValidationIssue[];
}

export interface PlanPatchInput {
  document: TemplateDocument;
  config: ConfigDocument;
  keyMap: KeyPathMap;
  logger?: Logger;
  /** Called as each stage completes */
  onStage?: (stage: 'validated' | 'expanded') => void;
}

interface RequestedWrite {
  key: string;
  value: unknown;
  origin: WriteOrigin;
}

function describeOrigin(origin: WriteOrigin): string {
  return origin.kind === 'config' ? 'configuration' : origin.directive;
}

/**
 * Validates and expands a configuration, then resolves every write against
 * the template. Throws on the first failed stage; the template is not
 * touched.
 */
export function planPatch(input: PlanPatchInput): PatchPlan {
  const { document, config, keyMap } = input;
  const logger = input.logger ?? noopLogger;
  const filePath = config.filePath;

  // Validated
  assertValidConfiguration(config, keyMap);
  input.onStage?.('validated');

  // Expanded
  const context: DirectiveContext = {
    document: config,
    currentValue(key) {
      const entry = keyMap.resolve(key);
      if (!entry) {
        return undefined;
      }
      const located = locate(document.root, entry.location);
      return located.kind === 'found' ? readValue(located.element, entry.location.target) : undefined;
    },
    enumerate: (section) => keyMap.enumerate(section, document.root),
    isMapped: (key) => keyMap.resolve(key) !== undefined,
  };

  const requested: RequestedWrite[] = [];
  for (const { key, value } of config.entries) {
    if (!isDirectiveKey(key)) {
      requested.push({ key, value, origin: { kind: 'config' } });
      continue;
    }
    const expanded = expandDirective(key, value, context);
    logger.debug(`Expanded ${key} into ${expanded.length} write(s).`);
    for (const write of expanded) {
      requested.push({ ...write, origin: { kind: 'directive', directive: key } });
    }
  }

  input.onStage?.('expanded');

  // Resolved
  const issues: ValidationIssue[] = [];
  const writes: PlannedWrite[] = [];
  const byLocation = new Map<string, PlannedWrite>();

  const addWrite = (request: RequestedWrite, location: LocationDescriptor, value: string, companion: boolean) => {
    const locationId = formatLocation(location);
    const existing = byLocation.get(locationId);
    if (existing) {
      if (existing.value !== value) {
        issues.push(
          createErrorIssue(
            ValidationErrorCode.CONFLICTING_WRITES,
            `"${request.key}" (${describeOrigin(request.origin)}) writes "${value}" to ${locationId}, ` +
              `which "${existing.key}" (${describeOrigin(existing.origin)}) sets to "${existing.value}".`,
            { filePath, key: request.key, context: locationId },
            'Keep only one of the two keys, or give them the same value.',
          ),
        );
      }
      return;
    }

    const located = locate(document.root, location);
    let currentValue: string | undefined;
    let action: WriteAction = 'create';
    switch (located.kind) {
      case 'ambiguous':
        issues.push(
          createErrorIssue(
            ValidationErrorCode.AMBIGUOUS_LOCATION,
            `"${request.key}" points at ${located.count} elements of the template.`,
            { filePath, key: request.key, context: locationId },
            'Add a predicate to the key-path map so the path selects one element.',
          ),
        );
        return;
      case 'outside-root':
        issues.push(
          createErrorIssue(
            ValidationErrorCode.AMBIGUOUS_LOCATION,
            `"${request.key}" does not start at the template root <${located.rootName}>.`,
            { filePath, key: request.key, context: locationId },
          ),
        );
        return;
      case 'missing':
        break;
      case 'found':
        if (location.target.kind === 'text' && !canWriteText(located.element)) {
          issues.push(
            createErrorIssue(
              RuntimeErrorCode.TEXT_TARGET_HAS_CHILDREN,
              `"${request.key}" would replace the text of an element that has child elements.`,
              { filePath, key: request.key, context: locationId },
            ),
          );
          return;
        }
        currentValue = readValue(located.element, location.target);
        action = currentValue === value ? 'unchanged' : 'update';
        break;
    }

    const write: PlannedWrite = {
      key: request.key,
      origin: request.origin,
      companion,
      location,
      locationId,
      value,
      currentValue,
      action,
    };
    byLocation.set(locationId, write);
    writes.push(write);
  };

  for (const request of requested) {
    const checked = checkWrite(request.key, request.value, keyMap, filePath);
    if (!checked.ok) {
      issues.push(checked.issue);
      continue;
    }
    addWrite(request, checked.entry.location, checked.value, false);
    for (const companion of checked.entry.companions) {
      addWrite(request, companion.location, companion.value, true);
    }
  }

  const result = buildValidationResult(issues);
  if (!result.valid) {
    throw validationFailure(result, filePath);
  }

  const warnings = writes
    .filter((write) => write.action === 'create')
    .map((write) =>
      createWarningIssue(WarningCode.LOCATION_WILL_BE_CREATED, `${write.locationId} will be created.`, {
        key: write.key,
      }),
    );

  logger.debug(
    `Planned ${writes.length} write(s): ${countActions(writes, 'update')} update, ` +
      `${countActions(writes, 'create')} create, ${countActions(writes, 'unchanged')} unchanged.`,
  );
  return { writes, warnings };
}

export function countActions(writes: readonly PlannedWrite[], action: WriteAction): number {
  return writes.filter((write) => write.action === action).length;
}

export function hasChanges(plan: PatchPlan): boolean {
  return plan.writes.some((write) => write.action !== 'unchanged');
}
