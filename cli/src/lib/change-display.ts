import {
	countActions,
	countDiffLines,
	formatValidationIssue,
	type Logger,
	type PatchPlan,
	type PlannedWrite,
} from '@stratpatch/core';
import chalk from 'chalk';

/**
 * One line per planned write:
 * `~` update, `+` create, `=` already in place.
 */
export function formatPlannedWrite(write: PlannedWrite): string {
	const label = write.companion ? `${write.key} ${chalk.dim(`-> ${write.locationId}`)}` : write.key;
	switch (write.action) {
		case 'update':
			return `${chalk.yellow('~')} ${label}: ${JSON.stringify(write.currentValue ?? '')} -> ${chalk.bold(JSON.stringify(write.value))}`;
		case 'create':
			return `${chalk.green('+')} ${label}: ${chalk.bold(JSON.stringify(write.value))} ${chalk.dim('(new)')}`;
		case 'unchanged':
			return chalk.dim(`= ${write.key}: ${JSON.stringify(write.value)}`);
	}
}

export function formatPlanCounts(plan: PatchPlan): string {
	const update = countActions(plan.writes, 'update');
	const create = countActions(plan.writes, 'create');
	const unchanged = countActions(plan.writes, 'unchanged');
	return `${update} updated, ${create} created, ${unchanged} unchanged`;
}

/**
 * Display the planned changes and their warnings.
 */
export function displayPlannedChanges(plan: PatchPlan, logger: Logger): void {
	logger.info(`\n${chalk.bold('=== Planned Changes ===')}`);
	logger.info(`${chalk.bold('Writes')}: ${formatPlanCounts(plan)}`);
	for (const write of plan.writes) {
		logger.info(`  ${formatPlannedWrite(write)}`);
	}
	for (const warning of plan.warnings) {
		logger.warn(formatValidationIssue(warning));
	}
	logger.info('');
}

/**
 * Colour a unified diff line by line.
 */
export function colorizeDiff(diff: string): string {
	return diff
		.split('\n')
		.map((line) => {
			if (line.startsWith('+++') || line.startsWith('---')) {
				return chalk.bold(line);
			}
			if (line.startsWith('@@')) {
				return chalk.cyan(line);
			}
			if (line.startsWith('+')) {
				return chalk.green(line);
			}
			if (line.startsWith('-')) {
				return chalk.red(line);
			}
			return line;
		})
		.join('\n');
}

export function displayDiffPreview(diff: string, logger: Logger): void {
	logger.info(`\n${chalk.bold('=== Diff Preview (dry run) ===')}`);
	if (diff.length === 0) {
		logger.info(chalk.dim('No changes.'));
		return;
	}
	const { added, removed } = countDiffLines(diff);
	logger.info(colorizeDiff(diff.trimEnd()));
	logger.info(chalk.dim(`${added} line(s) added, ${removed} line(s) removed`));
}
