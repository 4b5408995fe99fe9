import type { Config } from './config/index.js';
import { ConfigError } from './config/index.js';

export interface GlobalOptions {
  verbose?: boolean;
  json?: boolean;
  config?: string;
}

let _config: Config | null = null;

export function getConfig(): Config {
  if (!_config) {
    throw new ConfigError('Config not loaded. Run "clausecheck config init" first.');
  }
  return _config;
}

export function setConfig(config: Config): void {
  _config = config;
}

export function resetConfig(): void {
  _config = null;
}

/** Where commands print. Reports go to `out`, status lines to `err`. */
export interface CommandOutput {
  out: (text: string) => void;
  err: (text: string) => void;
}

export const consoleOutput: CommandOutput = {
  out: text => console.log(text),
  err: text => console.error(text),
};
