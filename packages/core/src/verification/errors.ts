import type { ZodIssue } from 'zod';

export class InvalidRecordError extends Error {
  constructor(
    message: string,
    public readonly issues: ZodIssue[],
    public readonly index?: number,
    public readonly recordId?: string,
  ) {
    super(message);
    this.name = 'InvalidRecordError';
  }
}

export class InvalidInputError extends Error {
  constructor(
    message: string,
    public readonly issues: ZodIssue[] = [],
  ) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ');
}
