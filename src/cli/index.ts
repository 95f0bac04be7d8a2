import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import chalk from 'chalk';
import { Command, CommanderError } from 'commander';
import { registerAnnotateCommand } from './commands/annotate-cmd.js';
import type { CliContext } from './context.js';
import { ExitCode, toExitOutcome } from './exit-codes.js';
import { logger, setStdoutSink } from '../utils/logger.js';
import type { OutputSink } from '../utils/logger.js';

export { ExitCode } from './exit-codes.js';
export type { CliContext } from './context.js';

function readPackageVersion(): string {
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = path.dirname(__filename);
  const packageJsonPath = path.join(__dirname, '..', '..', 'package.json');
  const packageJson: { version?: unknown } = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
  return typeof packageJson.version === 'string' ? packageJson.version : '0.0.0';
}

const writeStdout: OutputSink = (text) => {
  process.stdout.write(text);
};

const writeStderr: OutputSink = (text) => {
  process.stderr.write(text);
};

/**
 * Parse arguments, run the command and return the exit code.
 * Never throws: every failure is reported on stderr and mapped to an ExitCode.
 */
export async function runCli(argv: string[] = process.argv, context: CliContext = {}): Promise<ExitCode> {
  const stdout = context.stdout ?? writeStdout;
  const stderr = context.stderr ?? writeStderr;

  const previousStdout = setStdoutSink(stdout);
  const previousStderr = logger.setSink(stderr);
  const previousLevel = logger.getLevel();

  try {
    const program = new Command();

    program
      .name('pmid-annotate')
      .description('Fetch a PubMed abstract by PMID and annotate it with the Gilda grounding service')
      .version(readPackageVersion(), '-V, --version')
      .exitOverride()
      .configureOutput({
        writeOut: stdout,
        writeErr: stderr,
        outputError: (str, write) => write(chalk.red(str))
      })
      .showHelpAfterError('(add --help for additional information)')
      .allowExcessArguments(false);

    registerAnnotateCommand(program, context);

    await program.parseAsync(argv);
    return ExitCode.Success;
  } catch (error) {
    // commander has already written its own message
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? ExitCode.Success : ExitCode.Usage;
    }

    const outcome = toExitOutcome(error);
    stderr(`${chalk.red(outcome.diagnostic)}\n`);
    return outcome.code;
  } finally {
    setStdoutSink(previousStdout);
    logger.setSink(previousStderr);
    logger.setLevel(previousLevel);
  }
}
