import chalk from 'chalk';
import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { dirname, resolve } from 'path';

export interface InitCommandOptions {
  configPath?: string;
  homeDir?: string;
  logger?: (...args: unknown[]) => void;
}

function expandTilde(pathValue: string, homeDirectory: string): string {
  if (pathValue === '~') {
    return homeDirectory;
  }
  if (pathValue.startsWith('~/')) {
    return resolve(homeDirectory, pathValue.slice(2));
  }
  return pathValue;
}

function resolveConfigPath(configPath: string | undefined, homeDirectory: string): string {
  if (configPath) {
    return expandTilde(configPath, homeDirectory);
  }
  return resolve(homeDirectory, '.clausecheck', 'config.yaml');
}

export const CONFIG_TEMPLATE = `# clausecheck configuration

# Source-text verification
verification:
  t_high: 0.98             # similarity for an exact match
  t_low: 0.6               # below this a quote is flagged
  severity_penalty: 0.05   # raises the auto-include bar for high-severity records
  min_source_length: 10    # shorter quotes get a warning

# Coverage scan for audits
coverage:
  threshold: 0.7           # a clause this similar to a quote counts as covered
  max_misses: 10           # rows in the checklist's "Missed by AI" table

# Ground-truth evaluation
evaluation:
  obligation_threshold: 0.6
  risk_threshold: 0.5

# Reports
output:
  format: markdown         # markdown | json
  dir: "./output"
`;

export async function initCommand(options: InitCommandOptions = {}): Promise<void> {
  const log = options.logger ?? console.log;
  const homeDirectory = options.homeDir ?? homedir();

  const configPath = resolveConfigPath(options.configPath, homeDirectory);
  const configDir = dirname(configPath);

  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true });
    log(chalk.green('Created directory:'), configDir);
  }

  if (existsSync(configPath)) {
    log(chalk.yellow('Config already exists at:'), configPath);
    log(chalk.yellow('Run with --config <path> to use a different location.'));
    return;
  }

  writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
  log(chalk.green('Created config file:'), configPath);
  log('');
  log(chalk.cyan('Next steps:'));
  log('  1. Edit', configPath, 'to tune the thresholds');
  log('  2. Run', chalk.green('clausecheck verify contract.txt records.json'));
}
