import { readFileSync, existsSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { resolve } from 'path';
import { parse, stringify } from 'yaml';
import type { VerificationConfig } from '@clausecheck/core';
import { ConfigSchema, ConfigDefaults, type Config } from './schema.js';

const DEFAULT_CONFIG_PATH = '.clausecheck/config.yaml';

function getDefaultConfigPath(): string {
  return resolve(homedir(), DEFAULT_CONFIG_PATH);
}

export function expandTilde(path: string): string {
  if (path.startsWith('~/') || path === '~') {
    return resolve(homedir(), path.slice(2));
  }
  return path;
}

function resolveEnvVar(value: string): string {
  if (value.startsWith('env:')) {
    const envKey = value.slice(4);
    const envVal = process.env[envKey];
    return envVal ? envVal : value;
  }
  if (value.startsWith('${') && value.endsWith('}')) {
    const envKey = value.slice(2, -1);
    const envVal = process.env[envKey];
    return envVal ? envVal : value;
  }
  if (value.startsWith('$')) {
    const envKey = value.slice(1);
    const envVal = process.env[envKey];
    return envVal ? envVal : value;
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stripNullValues(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return undefined;
  }
  if (Array.isArray(obj)) {
    return obj.filter(item => item !== null).map(stripNullValues);
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (value !== null) {
        result[key] = stripNullValues(value);
      }
    }
    return result;
  }
  return obj;
}

function resolveEnvVarsInObject(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }
  if (typeof obj === 'string') {
    return resolveEnvVar(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(resolveEnvVarsInObject);
  }
  if (isRecord(obj)) {
    const resolved: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      resolved[key] = resolveEnvVarsInObject(value);
    }
    return resolved;
  }
  return obj;
}

export interface LoadConfigOptions {
  configPath?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface LoadConfigResult {
  config: Config;
  configPath: string;
  configFileExists: boolean;
}

function copyDefaults(): Config {
  return {
    verification: { ...ConfigDefaults.verification },
    coverage: { ...ConfigDefaults.coverage },
    evaluation: { ...ConfigDefaults.evaluation },
    output: { ...ConfigDefaults.output },
  };
}

function readYamlDocument(configPath: string): unknown {
  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch {
    throw new ConfigError(`Failed to read config file: ${configPath}`);
  }

  try {
    return parse(fileContent);
  } catch {
    throw new ConfigError(`Failed to parse config file: ${configPath}`);
  }
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  return loadConfigWithMeta(options).config;
}

export function loadConfigWithMeta(options: LoadConfigOptions = {}): LoadConfigResult {
  const configPath = getConfigPath(options.configPath);
  const configFileExists = existsSync(configPath);
  const result = copyDefaults();

  if (configFileExists) {
    const rawConfig = readYamlDocument(configPath);

    if (rawConfig !== null && rawConfig !== undefined) {
      const resolvedConfig = resolveEnvVarsInObject(stripNullValues(rawConfig));
      const validated = ConfigSchema.safeParse(resolvedConfig);

      if (!validated.success) {
        const issues = validated.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
        throw new ConfigError(`Invalid config: ${issues}`);
      }

      const { verification, coverage, evaluation, output } = validated.data;
      if (verification) {
        result.verification = { ...result.verification, ...verification };
      }
      if (coverage) {
        result.coverage = { ...result.coverage, ...coverage };
      }
      if (evaluation) {
        result.evaluation = { ...result.evaluation, ...evaluation };
      }
      if (output) {
        result.output = { ...result.output, ...output };
      }
    }
  }

  if (result.verification.t_low > result.verification.t_high) {
    throw new ConfigError('Invalid config: verification.t_low must not exceed verification.t_high');
  }

  return { config: result, configPath, configFileExists };
}

/** Map the YAML verification section onto the core's config shape. */
export function toVerificationConfig(config: Config): VerificationConfig {
  return {
    exactThreshold: config.verification.t_high,
    acceptThreshold: config.verification.t_low,
    severityPenalty: config.verification.severity_penalty,
    minSourceLength: config.verification.min_source_length,
  };
}

export function getConfigPath(configPath?: string): string {
  if (configPath) {
    return expandTilde(configPath);
  }
  return getDefaultConfigPath();
}

function coerceValue(value: string): string | number | boolean {
  const numValue = Number(value);
  if (!isNaN(numValue) && value.trim() !== '') return numValue;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

export function setConfigValue(key: string, value: string, options: LoadConfigOptions = {}): void {
  const configPath = getConfigPath(options.configPath);

  if (!existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}. Run 'clausecheck config init' first.`);
  }

  const parsed = readYamlDocument(configPath);
  const doc: Record<string, unknown> = isRecord(parsed) ? parsed : {};

  // Navigate dot-notation key
  const keys = key.split('.');
  let current = doc;
  for (const segment of keys.slice(0, -1)) {
    const next = current[segment];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[segment] = created;
      current = created;
    }
  }
  current[keys[keys.length - 1]] = coerceValue(value);

  // Validate modified config (strip nulls from YAML comments)
  const validated = ConfigSchema.safeParse(stripNullValues(doc));
  if (!validated.success) {
    const issues = validated.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new ConfigError(`Invalid config after setting ${key}: ${issues}`);
  }

  writeFileSync(configPath, stringify(doc), 'utf-8');
}
