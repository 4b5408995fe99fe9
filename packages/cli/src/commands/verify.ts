import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { basename, resolve } from 'path';
import { VerificationEngine, type VerificationRun } from '@clausecheck/core';
import { expandTilde, toVerificationConfig, type Config, type OutputFormat } from '../config/index.js';
import { consoleOutput, getConfig, type CommandOutput, type GlobalOptions } from '../context.js';
import { readDocumentFile, readRecordsFile } from '../io/index.js';
import { formatJson, formatMarkdown, resolveFilename, writeReport } from '../output/index.js';
import { trackProgress } from '../reporting/progress.js';

export interface VerifyOptions {
  output?: OutputFormat;
  outputDir?: string;
  strict?: boolean;
}

export interface VerifyCommandInput {
  documentPath: string;
  recordsPath: string;
  options: VerifyOptions;
  config: Config;
  json?: boolean;
  verbose?: boolean;
  output?: CommandOutput;
  date?: Date;
}

export interface VerifyCommandResult {
  run: VerificationRun;
  /** Absent with --json, where the report goes to stdout. */
  reportPath?: string;
}

export function parseOutputFormat(value: string): OutputFormat {
  if (value === 'markdown' || value === 'json') return value;
  throw new InvalidArgumentError('Expected "markdown" or "json".');
}

export function verifyCommand(input: VerifyCommandInput): VerifyCommandResult {
  const { documentPath, recordsPath, options, config } = input;
  const output = input.output ?? consoleOutput;
  const date = input.date ?? new Date();

  const document = readDocumentFile(documentPath);
  const records = readRecordsFile(recordsPath);

  const engine = new VerificationEngine({ document, config: toVerificationConfig(config) });
  trackProgress(engine, { verbose: input.verbose, silent: input.json, log: output.err });
  const run = engine.run(records);
  const documentName = basename(documentPath);

  if (input.json) {
    output.out(formatJson({ run, documentName, date }));
    return { run };
  }

  const format = options.output ?? config.output.format;
  const content = format === 'json'
    ? formatJson({ run, documentName, date })
    : formatMarkdown({ run, documentName, date });
  const reportPath = writeReport({
    outputDir: resolve(expandTilde(options.outputDir ?? config.output.dir)),
    filename: resolveFilename(documentPath, 'verification', date),
    format,
    content,
  });

  const { summary } = run;
  output.err('');
  output.err(
    `  ${chalk.green(`${summary.byStatus.exact} exact`)}  ` +
    `${chalk.yellow(`${summary.byStatus.likely} likely`)}  ` +
    `${chalk.red(`${summary.byStatus.flagged} flagged`)}`,
  );
  if (summary.humanReview.length > 0) {
    output.err(chalk.yellow(`  Human review: ${summary.humanReview.join(', ')}`));
  }
  if (run.failures.length > 0) {
    output.err(chalk.yellow(`  Invalid records: ${run.failures.length}`));
  }
  output.err(chalk.dim(`  Report: ${reportPath}`));

  return { run, reportPath };
}

export function registerVerifyCommand(program: Command): void {
  program
    .command('verify')
    .description('Check claimed source quotes against a contract')
    .argument('<document>', 'Plain-text contract')
    .argument('<records>', 'JSON records file (array, or ground-truth layout)')
    .option('-o, --output <format>', 'Report format (markdown|json)', parseOutputFormat)
    .option('--output-dir <dir>', 'Report directory')
    .option('--strict', 'Exit 1 when any record needs human review')
    .action((documentPath: string, recordsPath: string, options: VerifyOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const { run } = verifyCommand({
        documentPath,
        recordsPath,
        options,
        config: getConfig(),
        json: globalOpts.json,
        verbose: globalOpts.verbose,
      });

      if (options.strict && run.summary.humanReview.length > 0) {
        process.exitCode = 1;
      }
    });
}
