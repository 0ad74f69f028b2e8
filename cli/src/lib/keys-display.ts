import type { Logger } from '@stratpatch/core';
import chalk from 'chalk';
import type { KeyListing, KeysListResult } from '../commands/keys-list.js';

function padColumn(value: string, width: number): string {
	return value.padEnd(width, ' ');
}

/**
 * Lines of a key table: key, type, then the location it writes to.
 */
export function formatKeyTable(rows: KeyListing[]): string[] {
	const keyWidth = Math.max(0, ...rows.map((row) => row.key.length));
	const typeWidth = Math.max(0, ...rows.map((row) => row.type.length));
	return rows.map(
		(row) =>
			`  ${chalk.blue(padColumn(row.key, keyWidth))}  ${padColumn(row.type, typeWidth)}  ${chalk.dim(`${row.path}/${row.target}`)}`,
	);
}

export function displayKeysList(result: KeysListResult, logger: Logger): void {
	if (result.source) {
		logger.info(`${chalk.bold('Key-path map')}: ${result.source}`);
	}

	logger.info(`\n${chalk.bold(`=== Keys (${result.keys.length}) ===`)}`);
	for (const line of formatKeyTable(result.keys)) {
		logger.info(line);
	}

	if (result.wildcards.length > 0) {
		logger.info(`\n${chalk.bold('=== Open sections ===')}`);
		for (const line of formatKeyTable(result.wildcards)) {
			logger.info(line);
		}
	}

	logger.info(`\n${chalk.bold('=== Directives ===')}`);
	for (const directive of result.directives) {
		logger.info(`  ${chalk.blue(directive.key)}: ${directive.grammar}`);
		logger.info(`    ${chalk.dim(directive.description)}`);
	}
}
