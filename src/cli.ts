import { Command } from 'commander';
import { ZodError } from 'zod';
import { createProvider, processIo, runDashboard, type ProviderFactory } from './app.js';
import {
  DEFAULT_HISTORY_SIZE,
  DEFAULT_INTERVAL_MS,
  DEFAULT_TIMEOUT_MS,
  createConfig,
  type Config,
  type RawOptions,
} from './config/env.js';
import { createLogger, createStderrSink } from './core/logger.js';
import { printProbe, printSnapshot } from './headless.js';

export const VERSION = '0.1.0';

/** Terminal output of a command, separated so tests can capture it. */
export interface CliOutput {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleOutput: CliOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

const ENVIRONMENT_PREFIX = 'GPUWATCH_';

function issueLabel(path: (string | number)[]): string {
  const key = path.join('.');
  return key.startsWith(ENVIRONMENT_PREFIX) ? `environment ${key}` : `--${key}`;
}

/** One-line diagnostic naming the error class, for stderr. */
export function describeFailure(error: unknown): string {
  if (error instanceof ZodError) {
    const issues = error.issues.map(issue => `${issueLabel(issue.path)}: ${issue.message}`).join('; ');
    return `InvalidOptions: ${issues}`;
  }
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}

export interface CliResult {
  exitCode: number;
}

export function createProgram(
  output: CliOutput = consoleOutput,
  result: CliResult = { exitCode: 0 },
  makeProvider: ProviderFactory = createProvider,
): Command {
  const program = new Command();

  const configFrom = (): Config => createConfig(program.opts<RawOptions>());

  program
    .name('gpuwatch')
    .description('Flicker-free terminal dashboard for NVIDIA GPU telemetry')
    .version(VERSION)
    .option('-i, --interval <ms>', 'refresh interval in milliseconds', String(DEFAULT_INTERVAL_MS))
    .option('-n, --history <samples>', 'samples kept per sparkline', String(DEFAULT_HISTORY_SIZE))
    .option('-t, --timeout <ms>', 'nvidia-smi timeout in milliseconds', String(DEFAULT_TIMEOUT_MS))
    .option('--no-processes', 'skip the running process query')
    .addHelpText(
      'after',
      `
Environment:
  GPUWATCH_NVIDIA_SMI  nvidia-smi executable (default: nvidia-smi)
  GPUWATCH_LOG_LEVEL   debug | info | warn | error (default: warn)

Logs are written to stderr only when it is redirected, e.g. gpuwatch 2>gpuwatch.log
Keys: q / Ctrl+C quit, r redraw`,
    )
    .action(async () => {
      const config = configFrom();
      const io = processIo(config);
      await runDashboard(config, { ...io, provider: makeProvider(config, io.logger) });
    });

  program
    .command('snapshot')
    .description('print one poll as JSON and exit')
    .action(async () => {
      const config = configFrom();
      const logger = createLogger(config.log_level, createStderrSink());
      await printSnapshot(makeProvider(config, logger), output.out);
    });

  program
    .command('check')
    .description('diagnose access to GPU telemetry')
    .action(async () => {
      const config = configFrom();
      const logger = createLogger(config.log_level, createStderrSink());
      const ok = printProbe(await makeProvider(config, logger).probe(), output.out);
      if (!ok) result.exitCode = 1;
    });

  return program;
}

/** Parse argv and run; resolves with the exit code instead of exiting. */
export async function run(
  argv: string[],
  output: CliOutput = consoleOutput,
  makeProvider: ProviderFactory = createProvider,
): Promise<number> {
  const result: CliResult = { exitCode: 0 };
  try {
    await createProgram(output, result, makeProvider).parseAsync(argv);
    return result.exitCode;
  } catch (error) {
    output.err(`gpuwatch: ${describeFailure(error)}`);
    return 1;
  }
}
