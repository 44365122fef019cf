#!/usr/bin/env node
/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  gaeb-boq parse <file> --phase A|B
  gaeb-boq merge <reference> <priced> [--phase A|B] [--match-key K] [--tolerance T] [--records] [--strict]
*/

import { parseArgs } from 'util';
import { BoqError, ConfigError } from './boq/errors';
import { ConsoleLogger } from './common/console-logger';
import { resolveConfig } from './common/config';
import type { BoqConfig } from './common/config';
import type { Logger } from './common/logger';
import { toBoqRecords } from './export/records';
import { mergeBoq } from './merge/merge-engine';
import { parseBoqFile } from './parser/parse-boq';

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
/** `--strict` and the merge report has conflicts or unmatched entries. */
export const EXIT_REPORT_NOT_CLEAN = 2;

export interface CliIo {
  stdout: (text: string) => void;
  env: NodeJS.ProcessEnv;
}

const USAGE = [
  'usage: gaeb-boq parse <file> --phase A|B',
  '       gaeb-boq merge <reference> <priced> [--phase A|B] [--match-key ordinalPath|itemId|label]',
  '                      [--tolerance <decimal>] [--vat-rate <decimal>] [--records] [--strict]',
].join('\n');

const OPTIONS = {
  phase: { type: 'string' },
  'match-key': { type: 'string' },
  tolerance: { type: 'string' },
  'vat-rate': { type: 'string' },
  'log-level': { type: 'string' },
  records: { type: 'boolean' },
  strict: { type: 'boolean' },
} as const;

function parseCommandLine(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
  } catch (err) {
    throw new ConfigError([err instanceof Error ? err.message : String(err), USAGE]);
  }
}

function printJson(io: CliIo, value: unknown): void {
  io.stdout(`${JSON.stringify(value, null, 2)}\n`);
}

function runParse(files: string[], config: BoqConfig, logger: Logger, io: CliIo): number {
  if (files.length !== 1) throw new ConfigError([`parse takes one file, got ${files.length}`]);
  if (!config.phase) throw new ConfigError(['phase: required for parse (--phase A|B or GAEB_PHASE)']);
  const tree = parseBoqFile(files[0], config.phase, { logger, vatRate: config.vatRate });
  printJson(io, toBoqRecords(tree));
  return EXIT_OK;
}

function runMerge(files: string[], config: BoqConfig, logger: Logger, io: CliIo, withRecords: boolean, strict: boolean): number {
  if (files.length !== 2) throw new ConfigError([`merge takes a reference and a priced file, got ${files.length} file(s)`]);
  const options = { logger, vatRate: config.vatRate };
  const reference = parseBoqFile(files[0], config.phase ?? 'A', options);
  const priced = parseBoqFile(files[1], 'B', options);
  const { tree, report } = mergeBoq(reference, priced, {
    logger,
    matchKey: config.matchKey,
    quantityTolerance: config.quantityTolerance,
  });
  printJson(io, withRecords ? { report, records: toBoqRecords(tree) } : { report });

  const { conflicts, unmatchedReference, unmatchedPriced } = report.summary;
  if (strict && conflicts + unmatchedReference + unmatchedPriced > 0) {
    logger.warn(`report is not clean: ${conflicts} conflict(s), ${unmatchedReference + unmatchedPriced} unmatched`);
    return EXIT_REPORT_NOT_CLEAN;
  }
  return EXIT_OK;
}

/**
 * Run one command. Errors of the BoQ pipeline are logged and turned into exit code 1;
 * anything else is a bug and propagates.
 */
export function runCli(argv: string[], io: CliIo = { stdout: (text) => process.stdout.write(text), env: process.env }): number {
  let logger: Logger = new ConsoleLogger('info');
  try {
    const { values, positionals } = parseCommandLine(argv);
    const config = resolveConfig(
      {
        phase: values.phase,
        matchKey: values['match-key'],
        quantityTolerance: values.tolerance,
        vatRate: values['vat-rate'],
        logLevel: values['log-level'],
      },
      io.env
    );
    logger = new ConsoleLogger(config.logLevel);

    const [command, ...files] = positionals;
    switch (command) {
      case 'parse':
        return runParse(files, config, logger, io);
      case 'merge':
        return runMerge(files, config, logger, io, values.records ?? false, values.strict ?? false);
      default:
        throw new ConfigError([command ? `unknown command "${command}"` : 'missing command', USAGE]);
    }
  } catch (err) {
    if (!(err instanceof BoqError)) throw err;
    logger.error(err.message);
    return EXIT_ERROR;
  }
}

if (require.main === module) {
  process.exitCode = runCli(process.argv.slice(2));
}
