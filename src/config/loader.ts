import fs from 'fs';
import path from 'path';
import os from 'os';
import { CONFIG_CONSTANTS, HTTP_CONSTANTS } from './constants.js';
import { PmidAnnotateConfigSchema } from './types.js';
import type { ConfigSource, PmidAnnotateConfig, PubmedConfig } from './types.js';
import { log } from '../utils/logger.js';

export interface ConfigLocation {
  /** Home directory holding the global config; defaults to os.homedir() */
  homeDir?: string;
  /** Project directory holding the project config; defaults to cwd */
  basePath?: string;
  env?: NodeJS.ProcessEnv;
}

export function getGlobalConfigPath(homeDir = os.homedir()): string {
  return path.join(homeDir, CONFIG_CONSTANTS.DIRECTORY_NAME, CONFIG_CONSTANTS.FILE_NAME);
}

export function getProjectConfigPath(basePath = '.'): string {
  return path.join(path.resolve(basePath), CONFIG_CONSTANTS.DIRECTORY_NAME, CONFIG_CONSTANTS.FILE_NAME);
}

/**
 * Read and validate one config file. A missing file yields null; an
 * unreadable or invalid one is reported and also yields null.
 */
function readConfigFile(configPath: string, label: string): PmidAnnotateConfig | null {
  if (!fs.existsSync(configPath)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (error) {
    log.warn(`Failed to read ${label} config`, {
      path: configPath,
      error: error instanceof Error ? error.message : String(error)
    });
    return null;
  }

  const parsed = PmidAnnotateConfigSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn(`Ignoring invalid ${label} config`, {
      path: configPath,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    });
    return null;
  }

  return parsed.data;
}

/**
 * Read global configuration from ~/.pmid-annotate/config.json
 */
export function readGlobalConfig(homeDir?: string): PmidAnnotateConfig | null {
  return readConfigFile(getGlobalConfigPath(homeDir), 'global');
}

/**
 * Read project-local configuration from .pmid-annotate/config.json
 */
export function readProjectConfig(basePath = '.'): PmidAnnotateConfig | null {
  return readConfigFile(getProjectConfigPath(basePath), 'project');
}

function parseTimerDelay(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return !isNaN(parsed) && parsed > 0 && parsed <= HTTP_CONSTANTS.MAX_TIMER_DELAY_MS ? parsed : undefined;
}

/**
 * Read configuration from environment variables.
 * Values that do not validate are dropped with a warning.
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): PmidAnnotateConfig {
  const config: PmidAnnotateConfig = {};

  if (env.PMID_ANNOTATE_RESOLVER) {
    config.resolver = env.PMID_ANNOTATE_RESOLVER;
  }

  const pubmed: PubmedConfig = {};
  const apiKey = env.PMID_ANNOTATE_NCBI_API_KEY || env.NCBI_API_KEY;
  if (env.PMID_ANNOTATE_EFETCH_URL) pubmed.efetchUrl = env.PMID_ANNOTATE_EFETCH_URL;
  if (apiKey) pubmed.apiKey = apiKey;
  if (env.PMID_ANNOTATE_NCBI_EMAIL) pubmed.email = env.PMID_ANNOTATE_NCBI_EMAIL;
  if (env.PMID_ANNOTATE_NCBI_TOOL) pubmed.tool = env.PMID_ANNOTATE_NCBI_TOOL;
  if (Object.keys(pubmed).length > 0) {
    config.pubmed = pubmed;
  }

  if (env.PMID_ANNOTATE_GROUNDING_URL) {
    config.grounding = { baseUrl: env.PMID_ANNOTATE_GROUNDING_URL };
  }

  const timeoutMs = parseTimerDelay(env.PMID_ANNOTATE_TIMEOUT_MS);
  if (timeoutMs !== undefined) {
    config.http = { timeoutMs };
  } else if (env.PMID_ANNOTATE_TIMEOUT_MS) {
    log.warn('Ignoring invalid PMID_ANNOTATE_TIMEOUT_MS', { value: env.PMID_ANNOTATE_TIMEOUT_MS });
  }

  const parsed = PmidAnnotateConfigSchema.safeParse(config);
  if (!parsed.success) {
    log.warn('Ignoring invalid environment configuration', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    });
    return {};
  }

  return parsed.data;
}

/**
 * Deep merge configuration objects
 * Later configs override earlier ones
 */
export function mergeConfigs(...configs: (PmidAnnotateConfig | null)[]): PmidAnnotateConfig {
  const result: PmidAnnotateConfig = {};

  for (const config of configs) {
    if (!config) continue;

    if (config.resolver) {
      result.resolver = config.resolver;
    }

    if (config.pubmed) {
      result.pubmed = { ...result.pubmed, ...config.pubmed };
    }

    if (config.grounding) {
      result.grounding = { ...result.grounding, ...config.grounding };
    }

    if (config.http) {
      result.http = { ...result.http, ...config.http };
    }
  }

  return result;
}

/**
 * Load merged configuration from all sources
 * Priority: env > project > global
 */
export function loadConfig(location: ConfigLocation = {}): PmidAnnotateConfig {
  const sources = getConfigSources(location);
  return mergeConfigs(sources.global, sources.project, sources.env);
}

/**
 * Get configuration sources for debugging
 */
export function getConfigSources(location: ConfigLocation = {}): ConfigSource {
  return {
    global: readGlobalConfig(location.homeDir),
    project: readProjectConfig(location.basePath),
    env: readEnvConfig(location.env)
  };
}
