/**
 * Centralized configuration constants for pmid-annotate
 */

/**
 * NCBI E-utilities
 * https://www.ncbi.nlm.nih.gov/books/NBK25499/#chapter4.EFetch
 */
export const PUBMED_CONSTANTS = {
  EFETCH_URL: 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils/efetch.fcgi',

  /** Database queried by eFetch */
  DATABASE: 'pubmed',

  /** Requested record format */
  RETMODE: 'xml',
} as const;

/**
 * Gilda grounding service
 * https://grounding.indra.bio/apidocs
 */
export const GROUNDING_CONSTANTS = {
  BASE_URL: 'https://grounding.indra.bio',

  ANNOTATE_ENDPOINT: '/annotate',
} as const;

/**
 * HTTP Configuration
 */
export const HTTP_CONSTANTS = {
  /** Per-request timeout in milliseconds */
  DEFAULT_TIMEOUT_MS: 5000,

  /** Delays before each retry of a 429 response (milliseconds) */
  RETRY_DELAYS_MS: [1000, 2000, 5000] as readonly number[],

  /** Longest delay a Node timer accepts (milliseconds) */
  MAX_TIMER_DELAY_MS: 2_147_483_647,

  /** Characters of an error response body kept for diagnostics */
  ERROR_BODY_PREVIEW: 200,
} as const;

/**
 * Identifier Configuration
 */
export const IDENTIFIER_CONSTANTS = {
  /** Longest canonical PMID accepted */
  MAX_DIGITS: 10,
} as const;

/**
 * Local configuration file locations
 */
export const CONFIG_CONSTANTS = {
  DIRECTORY_NAME: '.pmid-annotate',

  FILE_NAME: 'config.json',
} as const;
