import ora from 'ora';
import chalk from 'chalk';
import { log } from './logger.js';

export type Spinner = ReturnType<typeof ora>;

/**
 * Progress spinner on stderr. Silent unless stderr is an interactive
 * terminal, so piped output and tests see nothing from it.
 */
export function startSpinner(text: string): Spinner {
  return ora({
    text: chalk.white(text),
    color: 'cyan',
    stream: process.stderr,
    isSilent: !process.stderr.isTTY || log.isQuiet()
  }).start();
}
