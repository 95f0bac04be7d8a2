import type { FetchLike } from '../http/client.js';
import type { Resolver } from '../resolvers/index.js';
import type { OutputSink } from '../utils/logger.js';
import type { Sleep } from '../utils/retry.js';

/**
 * Everything the front-end takes from its surroundings.
 * Each field defaults to the real process resource when omitted.
 */
export interface CliContext {
  stdout?: OutputSink;
  stderr?: OutputSink;
  /** Replaces the resolver chosen by configuration */
  resolver?: Resolver;
  fetchImpl?: FetchLike;
  sleep?: Sleep;
  cwd?: string;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
}
