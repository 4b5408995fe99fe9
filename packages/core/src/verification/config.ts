import { z } from 'zod';
import { InvalidInputError, formatIssues } from './errors.js';

/**
 * Tunable constants of the verification core. Callers pass one of these
 * instead of the core carrying inline thresholds.
 */
export interface VerificationConfig {
  /** T_high: similarity at or above which a quote counts as an exact match. */
  exactThreshold: number;
  /** T_low: minimum similarity for a near match; anything below is flagged. */
  acceptThreshold: number;
  /** Added to the auto-include bar for high-severity records. */
  severityPenalty: number;
  /** Quotes shorter than this (in characters) get a reviewer note. */
  minSourceLength: number;
}

export const DEFAULT_VERIFICATION_CONFIG: Readonly<VerificationConfig> = Object.freeze({
  exactThreshold: 0.98,
  acceptThreshold: 0.6,
  severityPenalty: 0.05,
  minSourceLength: 10,
});

const ratio = z.number().min(0).max(1);

export const VerificationConfigSchema = z.object({
  exactThreshold: ratio,
  acceptThreshold: ratio,
  severityPenalty: ratio,
  minSourceLength: z.number().int().min(0),
}).strict().superRefine((config, ctx) => {
  if (config.acceptThreshold > config.exactThreshold) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'acceptThreshold must not exceed exactThreshold',
      path: ['acceptThreshold'],
    });
  }
});

/**
 * Merge overrides onto the defaults and validate the result.
 */
export function resolveVerificationConfig(overrides: Partial<VerificationConfig> = {}): VerificationConfig {
  const defaults = DEFAULT_VERIFICATION_CONFIG;
  const result = VerificationConfigSchema.safeParse({
    exactThreshold: overrides.exactThreshold ?? defaults.exactThreshold,
    acceptThreshold: overrides.acceptThreshold ?? defaults.acceptThreshold,
    severityPenalty: overrides.severityPenalty ?? defaults.severityPenalty,
    minSourceLength: overrides.minSourceLength ?? defaults.minSourceLength,
  });
  if (!result.success) {
    throw new InvalidInputError(
      `Invalid verification config: ${formatIssues(result.error.issues)}`,
      result.error.issues,
    );
  }
  return result.data;
}
