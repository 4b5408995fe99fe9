import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';

export class InputFileError extends Error {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message);
    this.name = 'InputFileError';
  }
}

const BYTE_ORDER_MARK = '\uFEFF';

function readText(path: string): string {
  if (!existsSync(path)) {
    throw new InputFileError(`File not found: ${path}`, path);
  }
  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InputFileError(`Failed to read ${path}: ${reason}`, path);
  }
}

/** Read a plain-text contract. A leading byte-order mark is dropped. */
export function readDocumentFile(path: string): string {
  const text = readText(path);
  return text.startsWith(BYTE_ORDER_MARK) ? text.slice(1) : text;
}

export function readJsonFile(path: string): unknown {
  const text = readText(path);
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InputFileError(`Invalid JSON in ${path}: ${reason}`, path);
  }
}

export function writeJsonFile(path: string, data: unknown): void {
  writeFileSync(path, JSON.stringify(data, null, 2) + '\n', 'utf-8');
}

/** Write text, creating the parent directory. A trailing newline is added when missing. */
export function writeTextFile(path: string, content: string): void {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  writeFileSync(path, content.endsWith('\n') ? content : content + '\n', 'utf-8');
}
