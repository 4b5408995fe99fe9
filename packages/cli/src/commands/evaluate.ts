import { Command } from 'commander';
import { basename } from 'path';
import { evaluateRecords, parseCandidateRecords, type EvaluationReport } from '@clausecheck/core';
import type { Config } from '../config/index.js';
import { consoleOutput, getConfig, type CommandOutput, type GlobalOptions } from '../context.js';
import { readRecordsFile } from '../io/index.js';
import { formatEvaluation } from '../output/index.js';

export interface EvaluateCommandInput {
  recordsPath: string;
  truthPath: string;
  config: Config;
  json?: boolean;
  output?: CommandOutput;
  date?: Date;
}

export function evaluateCommand(input: EvaluateCommandInput): EvaluationReport {
  const { recordsPath, truthPath, config } = input;
  const output = input.output ?? consoleOutput;

  const system = parseCandidateRecords(readRecordsFile(recordsPath));
  const truth = parseCandidateRecords(readRecordsFile(truthPath));

  const report = evaluateRecords(system, truth, {
    obligationThreshold: config.evaluation.obligation_threshold,
    riskThreshold: config.evaluation.risk_threshold,
  });

  if (input.json) {
    output.out(JSON.stringify(report, null, 2));
  } else {
    output.out(formatEvaluation({
      report,
      systemName: basename(recordsPath),
      truthName: basename(truthPath),
      date: input.date,
    }));
  }

  return report;
}

export function registerEvaluateCommand(program: Command): void {
  program
    .command('evaluate')
    .description('Score extracted records against a ground-truth file')
    .argument('<records>', 'Extracted records (JSON array, or ground-truth layout)')
    .argument('<ground-truth>', 'Ground-truth JSON file')
    .action((recordsPath: string, truthPath: string, _options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      evaluateCommand({ recordsPath, truthPath, config: getConfig(), json: globalOpts.json });
    });
}
