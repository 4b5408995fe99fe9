#!/usr/bin/env node

import chalk from 'chalk';
import { InvalidInputError, InvalidRecordError } from '@clausecheck/core';
import { ConfigError } from './config/index.js';
import { InputFileError } from './io/index.js';
import { createProgram } from './program.js';

function isKnownError(error: unknown): error is Error {
  return (
    error instanceof ConfigError ||
    error instanceof InputFileError ||
    error instanceof InvalidRecordError ||
    error instanceof InvalidInputError
  );
}

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    if (isKnownError(error)) {
      console.error(chalk.red(error.message));
    } else {
      console.error(error);
    }
    process.exit(1);
  });
