import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { basename, dirname, extname, join, resolve } from 'path';
import {
  VerificationEngine,
  createDocument,
  findPotentialMisses,
  type PotentialMiss,
  type VerificationRun,
} from '@clausecheck/core';
import { toVerificationConfig, type Config } from '../config/index.js';
import { consoleOutput, getConfig, type CommandOutput, type GlobalOptions } from '../context.js';
import {
  InputFileError,
  groundTruthToRecords,
  isRecord,
  parseGroundTruth,
  prepareGroundTruth,
  readDocumentFile,
  readJsonFile,
  writeJsonFile,
  writeTextFile,
} from '../io/index.js';
import { formatAuditChecklist } from '../output/index.js';
import { formatRecordLine, trackProgress } from '../reporting/progress.js';

export interface AuditOptions {
  output?: string;
  prepare?: boolean;
  threshold?: number;
}

export interface AuditCommandInput {
  documentPath: string;
  truthPath: string;
  options: AuditOptions;
  config: Config;
  json?: boolean;
  output?: CommandOutput;
  date?: Date;
}

export interface AuditCommandResult {
  run: VerificationRun;
  misses: PotentialMiss[];
  checklistPath: string;
}

export function parseThreshold(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new InvalidArgumentError('Expected a number between 0 and 1.');
  }
  return parsed;
}

/** `<ground-truth dir>/<document stem>_audit.md` */
export function defaultChecklistPath(documentPath: string, truthPath: string): string {
  const stem = basename(documentPath, extname(documentPath));
  return join(dirname(resolve(truthPath)), `${stem}_audit.md`);
}

export function auditCommand(input: AuditCommandInput): AuditCommandResult {
  const { documentPath, truthPath, options, config } = input;
  const output = input.output ?? consoleOutput;

  const raw = readJsonFile(truthPath);
  if (!isRecord(raw)) {
    throw new InputFileError(`Ground-truth file ${truthPath} must hold a JSON object`, truthPath);
  }
  const records = groundTruthToRecords(parseGroundTruth(raw, truthPath));

  if (options.prepare) {
    writeJsonFile(truthPath, prepareGroundTruth(raw));
    output.err(chalk.dim(`  Added audit fields to ${truthPath}`));
  }

  const document = createDocument(readDocumentFile(documentPath));
  const engine = new VerificationEngine({ document, config: toVerificationConfig(config) });
  trackProgress(engine, { silent: input.json, log: output.err });
  const run = engine.run(records);

  const claimedTexts = run.records.map(scored => scored.record.claimedSourceText);
  const misses = findPotentialMisses(document, claimedTexts, {
    threshold: options.threshold ?? config.coverage.threshold,
  });

  const checklistPath = options.output ? resolve(options.output) : defaultChecklistPath(documentPath, truthPath);
  writeTextFile(checklistPath, formatAuditChecklist({
    documentName: basename(documentPath, extname(documentPath)),
    records: run.records,
    misses,
    maxMisses: config.coverage.max_misses,
    date: input.date,
  }));

  if (input.json) {
    output.out(JSON.stringify({
      checklist: checklistPath,
      summary: run.summary,
      potentialMisses: misses.length,
      failures: run.failures,
    }, null, 2));
  } else {
    for (const scored of run.records) {
      output.out(`  ${formatRecordLine(scored)}`);
    }
    output.out('');
    output.out(`  Potential missed clauses: ${misses.length}`);
    output.out(chalk.dim(`  Checklist: ${checklistPath}`));
  }

  return { run, misses, checklistPath };
}

export function registerAuditCommand(program: Command): void {
  program
    .command('audit')
    .description('Build an audit checklist for a ground-truth file')
    .argument('<document>', 'Plain-text contract')
    .argument('<ground-truth>', 'Ground-truth JSON file')
    .option('--output <path>', 'Checklist path (default: <ground-truth dir>/<document>_audit.md)')
    .option('--prepare', 'Add audit bookkeeping fields to the ground-truth file')
    .option('--threshold <ratio>', 'Similarity at which a clause counts as covered', parseThreshold)
    .action((documentPath: string, truthPath: string, options: AuditOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      auditCommand({
        documentPath,
        truthPath,
        options,
        config: getConfig(),
        json: globalOpts.json,
      });
    });
}
