import fs from 'fs/promises';
import path from 'path';
import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import { HTTP_CONSTANTS } from '../../config/constants.js';
import { loadConfig } from '../../config/loader.js';
import { resolveResolverOptions } from '../../config/resolver.js';
import { tryParsePmid } from '../../core/identifier.js';
import type { Pmid } from '../../core/identifier.js';
import type { InvocationResult } from '../../core/types.js';
import { createResolver } from '../../resolvers/index.js';
import type { Resolver } from '../../resolvers/index.js';
import { startSpinner } from '../../utils/cli-ui.js';
import { log, logger, LogLevel, print } from '../../utils/logger.js';
import type { CliContext } from '../context.js';
import { formatResult, outputFileName } from '../format.js';

export interface AnnotateOptions {
  save?: boolean;
  abstract?: boolean;
  compact?: boolean;
  timeout?: number;
  verbose?: boolean;
}

function parsePmidArgument(value: string): Pmid {
  const result = tryParsePmid(value);
  if (!result.success) {
    throw new InvalidArgumentError(`PMID ${result.reason}.`);
  }
  return result.pmid;
}

function parseTimeout(value: string): number {
  const timeout = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
  if (!Number.isSafeInteger(timeout) || timeout <= 0) {
    throw new InvalidArgumentError('Timeout must be a positive integer (milliseconds).');
  }
  if (timeout > HTTP_CONSTANTS.MAX_TIMER_DELAY_MS) {
    throw new InvalidArgumentError(`Timeout must be at most ${HTTP_CONSTANTS.MAX_TIMER_DELAY_MS} milliseconds.`);
  }
  return timeout;
}

function buildResolver(options: AnnotateOptions, context: CliContext): Resolver {
  const config = loadConfig({ homeDir: context.homeDir, basePath: context.cwd, env: context.env });
  const resolverOptions = resolveResolverOptions(config, {
    timeoutMs: options.timeout,
    fetchImpl: context.fetchImpl,
    sleep: context.sleep
  });
  return createResolver(config.resolver ?? 'auto', resolverOptions);
}

export async function runAnnotate(pmid: Pmid, options: AnnotateOptions, context: CliContext = {}): Promise<void> {
  if (options.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  const resolver = context.resolver ?? buildResolver(options, context);
  log.debug('Resolving identifier', { pmid: pmid.value, resolver: resolver.getName() });

  const spinner = startSpinner(`Resolving PMID ${pmid.value}`);
  let result: InvocationResult;
  try {
    result = await resolver.resolve(pmid, { abstractOnly: options.abstract === true });
  } catch (error) {
    spinner.stop();
    throw error;
  }

  if (!result.success) {
    spinner.fail(chalk.red(`PMID ${pmid.value} could not be resolved`));
    throw result.error;
  }
  spinner.stop();

  const output = formatResult(result, options);

  if (options.save) {
    const target = path.resolve(context.cwd ?? process.cwd(), outputFileName(result, options));
    await fs.writeFile(target, `${output}\n`, 'utf8');
    const what = result.annotations === null ? 'abstract' : 'annotations';
    print(chalk.green(`Saved ${what} for PMID ${pmid.value} to ${target}`));
    return;
  }

  print(output);
}

export function registerAnnotateCommand(program: Command, context: CliContext = {}): void {
  program
    .argument('<pmid>', 'PubMed article ID', parsePmidArgument)
    .option('--save', 'write the result to <pmid>.json (or <pmid>.txt with --abstract) instead of stdout')
    .option('--abstract', 'print the extracted abstract and skip annotation')
    .option('--compact', 'print the annotations as single-line JSON')
    .option('--timeout <ms>', 'per-request timeout in milliseconds', parseTimeout)
    .option('-v, --verbose', 'log request details to stderr')
    .action(async (pmid: Pmid, options: AnnotateOptions) => {
      await runAnnotate(pmid, options, context);
    });
}
