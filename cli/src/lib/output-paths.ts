import { basename, extname, resolve } from 'node:path';

export const DEFAULT_OUTPUT_DIR = 'out';

const pad = (value: number) => String(value).padStart(2, '0');

/**
 * Local time as YYYY-MM-DDTHH-mm, safe in file names.
 */
export function formatRunStamp(date: Date): string {
	return (
		`${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
		`T${pad(date.getHours())}-${pad(date.getMinutes())}`
	);
}

export function defaultOutputPath(templatePath: string, outputDir: string, now: Date): string {
	const name = basename(templatePath);
	const extension = extname(name);
	const stem = extension ? name.slice(0, -extension.length) : name;
	return resolve(outputDir, `${stem}_${formatRunStamp(now)}.xml`);
}

/**
 * The diff sits beside the output with its extension replaced.
 */
export function diffPathFor(outputPath: string): string {
	const extension = extname(outputPath);
	if (!extension || extension === '.diff') {
		return `${outputPath}.diff`;
	}
	return `${outputPath.slice(0, -extension.length)}.diff`;
}
