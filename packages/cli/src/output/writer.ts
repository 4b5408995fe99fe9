import { basename, extname, join } from 'node:path';
import type { OutputFormat } from '../config/index.js';
import { writeTextFile } from '../io/index.js';
import { formatDate } from './markdown.js';

export interface WriteReportOptions {
  outputDir: string;
  /** File name without extension. */
  filename: string;
  format: OutputFormat;
  content: string;
}

/** `<document stem>-<suffix>-<date>`, e.g. `lease-verification-2026-01-15`. */
export function resolveFilename(documentPath: string, suffix: string, date: Date = new Date()): string {
  const stem = basename(documentPath, extname(documentPath));
  return `${stem}-${suffix}-${formatDate(date)}`;
}

export function getExtension(format: OutputFormat): string {
  switch (format) {
    case 'json': return '.json';
    case 'markdown': return '.md';
  }
}

/** Write a rendered report into the output directory and return its path. */
export function writeReport(options: WriteReportOptions): string {
  const { outputDir, filename, format, content } = options;
  const path = join(outputDir, `${filename}${getExtension(format)}`);
  writeTextFile(path, content);
  return path;
}
