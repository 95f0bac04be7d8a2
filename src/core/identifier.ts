import { z } from 'zod';
import { IDENTIFIER_CONSTANTS } from '../config/constants.js';

/**
 * A PubMed ID as given on the command line.
 * `value` is the canonical decimal form used for lookups and file names.
 */
export interface Pmid {
  readonly raw: string;
  readonly value: string;
}

const PmidSchema = z
  .string()
  .trim()
  .min(1, 'must not be empty')
  .regex(/^\d+$/, 'expected digits only')
  .transform((digits) => digits.replace(/^0+(?=\d)/, ''))
  .refine((digits) => digits !== '0', 'must be greater than zero')
  .refine(
    (digits) => digits.length <= IDENTIFIER_CONSTANTS.MAX_DIGITS,
    `must be at most ${IDENTIFIER_CONSTANTS.MAX_DIGITS} digits`
  );

export type PmidParseResult =
  | { success: true; pmid: Pmid }
  | { success: false; reason: string };

export function tryParsePmid(raw: string): PmidParseResult {
  const parsed = PmidSchema.safeParse(raw);
  if (!parsed.success) {
    return { success: false, reason: parsed.error.issues[0]?.message ?? 'invalid PMID' };
  }
  return { success: true, pmid: { raw, value: parsed.data } };
}
