import { z } from 'zod';
import { HTTP_CONSTANTS } from './constants.js';

const TIMER_LIMIT_MESSAGE = `Must be at most ${HTTP_CONSTANTS.MAX_TIMER_DELAY_MS}`;

const HttpUrlSchema = z
  .string()
  .trim()
  .url('Must be an absolute URL')
  .refine((value) => /^https?:\/\//i.test(value), 'Must use http or https');

const PositiveIntSchema = z
  .number()
  .int('Must be an integer')
  .positive('Must be positive')
  .max(HTTP_CONSTANTS.MAX_TIMER_DELAY_MS, TIMER_LIMIT_MESSAGE);

export const PubmedConfigSchema = z
  .object({
    efetchUrl: HttpUrlSchema.optional(),
    apiKey: z.string().min(1).optional(),
    email: z.string().email().optional(),
    tool: z.string().min(1).optional()
  })
  .strict();

export const GroundingConfigSchema = z
  .object({
    baseUrl: HttpUrlSchema.optional()
  })
  .strict();

export const HttpConfigSchema = z
  .object({
    timeoutMs: PositiveIntSchema.optional(),
    retryDelaysMs: z
      .array(z.number().int().nonnegative().max(HTTP_CONSTANTS.MAX_TIMER_DELAY_MS, TIMER_LIMIT_MESSAGE))
      .optional()
  })
  .strict();

/**
 * Shape of ~/.pmid-annotate/config.json and ./.pmid-annotate/config.json
 */
export const PmidAnnotateConfigSchema = z
  .object({
    resolver: z.string().min(1).optional(),
    pubmed: PubmedConfigSchema.optional(),
    grounding: GroundingConfigSchema.optional(),
    http: HttpConfigSchema.optional()
  })
  .strict();

export type PubmedConfig = z.infer<typeof PubmedConfigSchema>;
export type GroundingConfig = z.infer<typeof GroundingConfigSchema>;
export type HttpConfig = z.infer<typeof HttpConfigSchema>;
export type PmidAnnotateConfig = z.infer<typeof PmidAnnotateConfigSchema>;

export interface ConfigSource {
  global: PmidAnnotateConfig | null;
  project: PmidAnnotateConfig | null;
  env: PmidAnnotateConfig;
}
