#!/usr/bin/env node
/* eslint-env node */
import process from 'node:process';
import meow from 'meow';
import chalk from 'chalk';
import {
  createLogger,
  formatError,
  formatValidationIssue,
  isPatchError,
  loadEnv,
  type Logger,
} from '@stratpatch/core';
import { runKeysList } from './commands/keys-list.js';
import { runPatch, type PatchCommandResult } from './commands/patch.js';
import { displayDiffPreview, displayPlannedChanges, formatPlanCounts } from './lib/change-display.js';
import { readCliConfig, resolveCliSettings } from './lib/cli-config.js';
import { displayKeysList } from './lib/keys-display.js';

loadEnv(import.meta.url);

const cli = meow(
  `\nUsage\n  $ stratpatch <command> [options]\n\nCommands\n  patch        Apply a YAML configuration to an XML strategy template\n  keys:list    List every configuration key, open section and directive\n\nOptions (patch)\n  --template   Template to patch (required)\n  --cfg        YAML configuration (required)\n  --out        Output file (default: <outputDir>/<template>_<YYYY-MM-DDTHH-mm>.xml)\n  --dry-run    Print planned changes and a diff preview, write nothing\n  --validate   Verify every planned value in the result\n  --key-map    Key-path map to use instead of the bundled one\n  --log-level  debug | info | warn | error | silent\n\nExamples\n  $ stratpatch patch --template=templates/Mean-Reversal.xml --cfg=configs/mean-reversion.yaml\n  $ stratpatch patch --template=templates/Mean-Reversal.xml --cfg=configs/mean-reversion.yaml --dry-run\n  $ stratpatch patch --template=a.xml --cfg=b.yaml --out=out/patched.xml --validate\n  $ stratpatch keys:list\n`,
  {
    importMeta: import.meta,
    flags: {
      template: { type: 'string' },
      cfg: { type: 'string' },
      out: { type: 'string' },
      dryRun: { type: 'boolean', default: false },
      validate: { type: 'boolean', default: false },
      keyMap: { type: 'string' },
      logLevel: { type: 'string' },
    },
  },
);

async function main(): Promise<void> {
  const [command, ...rest] = cli.input;
  const flags = cli.flags;

  if (!command) {
    cli.showHelp(0);
    return;
  }
  if (rest.length > 0) {
    console.error(`Error: ${command} takes no positional arguments.`);
    process.exitCode = 1;
    return;
  }

  const settings = resolveCliSettings({
    config: await readCliConfig(),
    flags: { keyMap: flags.keyMap, logLevel: flags.logLevel },
  });
  const logger = createLogger({ level: settings.logLevel });

  switch (command) {
    case 'patch': {
      if (!flags.template || !flags.cfg) {
        logger.error('Error: --template and --cfg are required for patch.');
        logger.error('Example: stratpatch patch --template=templates/Mean-Reversal.xml --cfg=configs/mean-reversion.yaml');
        process.exitCode = 1;
        return;
      }
      const result = await runPatch({
        templatePath: flags.template,
        configPath: flags.cfg,
        outputPath: flags.out,
        outputDir: settings.outputDir,
        keyMapPath: settings.keyMapPath,
        dryRun: flags.dryRun,
        validate: flags.validate,
        logger,
      });
      printPatchSummary(logger, result);
      return;
    }
    case 'keys:list': {
      const result = await runKeysList({ keyMapPath: settings.keyMapPath });
      displayKeysList(result, logger);
      return;
    }
    default:
      logger.error(`Unknown command "${command}". Run "stratpatch --help" for usage.`);
      process.exitCode = 1;
  }
}

function printPatchSummary(logger: Logger, result: PatchCommandResult): void {
  if (result.dryRun) {
    displayPlannedChanges(result.plan, logger);
    displayDiffPreview(result.diff, logger);
    logger.info(`\n${chalk.dim(`Dry run: nothing was written to ${result.outputPath}.`)}`);
  } else {
    for (const warning of result.plan.warnings) {
      logger.warn(formatValidationIssue(warning));
    }
    logger.info(chalk.green('Patched template written.'));
    const bullet = chalk.dim('•');
    const details: Array<[string, string]> = [
      [chalk.bold('Template'), result.templatePath],
      [chalk.bold('Output'), result.outputPath],
      [chalk.bold('Diff'), result.diffPath],
      [chalk.bold('Writes'), formatPlanCounts(result.plan)],
    ];
    for (const [label, value] of details) {
      logger.info(`${bullet} ${label}: ${value}`);
    }
  }
  if (result.verification) {
    logger.info(chalk.green(`Verified ${result.plan.writes.length} planned value(s).`));
  }
}

function reportFailure(error: unknown): void {
  if (isPatchError(error)) {
    console.error(chalk.red(formatError(error)));
    const extra = error.issues?.slice(1) ?? [];
    for (const issue of extra) {
      console.error(formatValidationIssue(issue));
    }
  } else {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  }
  process.exitCode = 1;
}

void main().catch(reportFailure);
