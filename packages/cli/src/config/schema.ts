import { z } from 'zod';

const ratio = z.number().min(0).max(1);

const verificationSchema = z.object({
  t_high: ratio.optional(),
  t_low: ratio.optional(),
  severity_penalty: ratio.optional(),
  min_source_length: z.number().int().min(0).optional(),
}).strict();

const coverageSchema = z.object({
  threshold: ratio.optional(),
  max_misses: z.number().int().min(0).optional(),
}).strict();

const evaluationSchema = z.object({
  obligation_threshold: ratio.optional(),
  risk_threshold: ratio.optional(),
}).strict();

const outputSchema = z.object({
  format: z.enum(['markdown', 'json']).optional(),
  dir: z.string().min(1).optional(),
}).strict();

const ConfigSchema = z.object({
  verification: verificationSchema.optional(),
  coverage: coverageSchema.optional(),
  evaluation: evaluationSchema.optional(),
  output: outputSchema.optional(),
}).strict();

export type RawConfig = z.infer<typeof ConfigSchema>;

export type OutputFormat = 'markdown' | 'json';

export interface Config {
  verification: {
    /** Similarity at or above which a quote is an exact match. */
    t_high: number;
    /** Similarity below which a quote is flagged. */
    t_low: number;
    severity_penalty: number;
    min_source_length: number;
  };
  coverage: {
    threshold: number;
    /** Rows shown in the "Missed by AI" table of an audit checklist. */
    max_misses: number;
  };
  evaluation: {
    obligation_threshold: number;
    risk_threshold: number;
  };
  output: {
    format: OutputFormat;
    dir: string;
  };
}

export const ConfigDefaults: Config = {
  verification: {
    t_high: 0.98,
    t_low: 0.6,
    severity_penalty: 0.05,
    min_source_length: 10,
  },
  coverage: {
    threshold: 0.7,
    max_misses: 10,
  },
  evaluation: {
    obligation_threshold: 0.6,
    risk_threshold: 0.5,
  },
  output: {
    format: 'markdown',
    dir: './output',
  },
};

export { ConfigSchema };
