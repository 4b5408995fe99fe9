import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfigWithMeta } from './config/index.js';
import { setConfig, type GlobalOptions } from './context.js';
import { registerVerifyCommand } from './commands/verify.js';
import { registerAuditCommand } from './commands/audit.js';
import { registerEvaluateCommand } from './commands/evaluate.js';
import { registerConfigCommand } from './commands/config.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('clausecheck')
    .description('Verify the source quotes of extracted contract obligations')
    .version(VERSION)
    .option('-v, --verbose', 'Print one line per record')
    .option('--json', 'Machine-readable JSON output')
    .option('-c, --config <path>', 'Path to config file');

  registerVerifyCommand(program);
  registerAuditCommand(program);
  registerEvaluateCommand(program);
  registerConfigCommand(program);

  program.hook('preAction', (_thisCommand, actionCommand) => {
    const chain = getCommandChain(actionCommand, program);

    // Skip config loading for 'config init'
    if (chain[0] === 'config' && chain[1] === 'init') {
      return;
    }

    const opts = actionCommand.optsWithGlobals<GlobalOptions>();
    const { config, configFileExists, configPath } = loadConfigWithMeta({ configPath: opts.config });

    if (opts.verbose && !opts.json) {
      console.error(chalk.dim(configFileExists ? `  Config: ${configPath}` : '  Config: defaults'));
    }

    setConfig(config);
  });

  return program;
}

function getCommandChain(cmd: Command, root: Command): string[] {
  const chain: string[] = [];
  let current: Command | null = cmd;
  while (current && current !== root) {
    chain.unshift(current.name());
    current = current.parent;
  }
  return chain;
}
