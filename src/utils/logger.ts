/**
 * Levelled logger for pmid-annotate.
 *
 * Every log line goes to stderr: stdout is reserved for the payload the
 * command prints. Messages and metadata pass through secret redaction
 * before they are written.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogValue = string | number | boolean | null | undefined | LogValue[] | { [key: string]: LogValue };

export interface LogMetadata {
  [key: string]: LogValue;
}

export type OutputSink = (text: string) => void;

const REDACTION_TEXT = '[REDACTED]';

const SECRET_VALUE_PATTERNS: RegExp[] = [
  /Bearer\s+[A-Za-z0-9._-]{20,}/gi, // Bearer tokens
  /eyJ[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{5,}/g, // JWT
  /(?:api|secret|token|password)[\s:=]+[A-Za-z0-9._-]{8,}/gi // generic key=value secrets
];

// E-utilities take the key as a query parameter, so it shows up inside URLs
const QUERY_SECRET_PATTERN = /([?&](?:api_key|apikey|token)=)[^&#\s"]+/gi;

const DEFAULT_ENV_NAMES = [
  'NCBI_API_KEY',
  'PMID_ANNOTATE_NCBI_API_KEY'
];

const SENSITIVE_TOKEN_SET = new Set([
  'token',
  'secret',
  'password',
  'authorization',
  'bearer',
  'cookie',
  'apikey'
]);

const SENSITIVE_KEY_NAMES = new Set([
  'api_key',
  'apikey',
  'access_token'
]);

interface RedactionContext {
  envNames: string[];
  envNameSet: Set<string>;
  customKeySet: Set<string>;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function parseConfiguredList(raw?: string): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function normalizeKeyName(key: string): string {
  return key
    .replace(/([a-z])([A-Z])/g, '$1_$2')
    .replace(/[^a-zA-Z0-9]+/g, '_')
    .replace(/_{2,}/g, '_')
    .replace(/^_+|_+$/g, '')
    .toLowerCase();
}

function buildRedactionContext(): RedactionContext {
  const customKeys = parseConfiguredList(process.env.PMID_ANNOTATE_REDACT_KEYS);
  const customEnvNames = parseConfiguredList(process.env.PMID_ANNOTATE_REDACT_ENV_VARS);
  const envNames = [...DEFAULT_ENV_NAMES, ...customEnvNames];

  return {
    envNames,
    envNameSet: new Set(envNames.map((name) => normalizeKeyName(name))),
    customKeySet: new Set(customKeys.map((name) => normalizeKeyName(name)))
  };
}

function shouldRedactKeyName(key: string, context: RedactionContext): boolean {
  const normalized = normalizeKeyName(key);
  const tokens = normalized.split('_').filter(Boolean);

  if (context.customKeySet.has(normalized) || context.envNameSet.has(normalized)) {
    return true;
  }

  if (SENSITIVE_KEY_NAMES.has(normalized)) return true;

  if (tokens.includes('api') && tokens.includes('key')) return true;

  return tokens.some((token) => SENSITIVE_TOKEN_SET.has(token));
}

function redactStringValue(value: string, context: RedactionContext): string {
  let redacted = value;

  for (const envName of context.envNames) {
    const pattern = new RegExp(`\\b${escapeRegExp(envName)}\\s*=\\s*([^\\s;]+)`, 'gi');
    redacted = redacted.replace(pattern, `${envName}=${REDACTION_TEXT}`);
  }

  redacted = redacted.replace(QUERY_SECRET_PATTERN, `$1${REDACTION_TEXT}`);

  for (const pattern of SECRET_VALUE_PATTERNS) {
    pattern.lastIndex = 0;
    redacted = redacted.replace(pattern, REDACTION_TEXT);
  }

  return redacted;
}

function redactValue(value: LogValue, context: RedactionContext): LogValue {
  if (value === null || value === undefined) return value;

  if (typeof value === 'string') {
    return redactStringValue(value, context);
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, context));
  }

  const redactedObj: { [key: string]: LogValue } = {};
  for (const [childKey, childValue] of Object.entries(value)) {
    redactedObj[childKey] = shouldRedactKeyName(childKey, context)
      ? REDACTION_TEXT
      : redactValue(childValue, context);
  }
  return redactedObj;
}

function redactMetadata(meta: LogMetadata | undefined, context: RedactionContext): LogMetadata | undefined {
  if (!meta) return undefined;

  const redactedMeta: LogMetadata = {};
  for (const [key, value] of Object.entries(meta)) {
    redactedMeta[key] = shouldRedactKeyName(key, context)
      ? REDACTION_TEXT
      : redactValue(value, context);
  }

  return redactedMeta;
}

export function redactLogData(message: string, meta?: LogMetadata): { message: string; meta?: LogMetadata } {
  const context = buildRedactionContext();
  const safeMessage = redactStringValue(message, context);
  const safeMeta = redactMetadata(meta, context);

  return { message: safeMessage, meta: safeMeta };
}

export function parseLogLevel(level: string | undefined, fallback: LogLevel): LogLevel {
  if (!level) return fallback;

  switch (level.toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
      return LogLevel.SILENT;
    default:
      return fallback;
  }
}

class Logger {
  private level: LogLevel;
  private readonly quiet: boolean;
  private sink: OutputSink = (text) => {
    process.stderr.write(text);
  };

  constructor() {
    this.quiet = process.env.PMID_ANNOTATE_QUIET === 'true';
    this.level = parseLogLevel(
      process.env.PMID_ANNOTATE_LOG_LEVEL,
      this.quiet ? LogLevel.ERROR : LogLevel.WARN
    );
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= this.level;
  }

  private formatMessage(level: string, message: string, meta?: LogMetadata): string {
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [${level}]`;
    const { message: safeMessage, meta: safeMeta } = redactLogData(message, meta);

    if (safeMeta && Object.keys(safeMeta).length > 0) {
      const metaStr = JSON.stringify(safeMeta);
      return `${prefix} ${safeMessage} ${metaStr}`;
    }

    return `${prefix} ${safeMessage}`;
  }

  private write(level: LogLevel, label: string, message: string, meta?: LogMetadata): void {
    if (!this.shouldLog(level)) return;
    this.sink(`${this.formatMessage(label, message, meta)}\n`);
  }

  debug(message: string, meta?: LogMetadata): void {
    this.write(LogLevel.DEBUG, 'DEBUG', message, meta);
  }

  info(message: string, meta?: LogMetadata): void {
    this.write(LogLevel.INFO, 'INFO', message, meta);
  }

  warn(message: string, meta?: LogMetadata): void {
    this.write(LogLevel.WARN, 'WARN', message, meta);
  }

  isQuiet(): boolean {
    return this.quiet;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Redirect log output. Returns the previous sink so callers can restore it.
   */
  setSink(sink: OutputSink): OutputSink {
    const previous = this.sink;
    this.sink = sink;
    return previous;
  }
}

export const logger = new Logger();

let stdoutSink: OutputSink = (text) => {
  process.stdout.write(text);
};

/**
 * Print to stdout without logging metadata.
 * This is the only path by which the CLI writes its payload.
 */
export function print(message: string): void {
  stdoutSink(`${message}\n`);
}

export function setStdoutSink(sink: OutputSink): OutputSink {
  const previous = stdoutSink;
  stdoutSink = sink;
  return previous;
}

export const log = {
  debug: (message: string, meta?: LogMetadata) => logger.debug(message, meta),
  warn: (message: string, meta?: LogMetadata) => logger.warn(message, meta),
  isQuiet: () => logger.isQuiet(),
};
