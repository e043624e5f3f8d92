import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { join } from 'path';
import { isAbortError, writeJsonFile, type RunLog, type SessionSnapshot } from '@starsift/core';
import { getConfig, type GlobalOptions } from '../context.js';
import type { Config } from '../config/index.js';
import { buildOrchestrator, type RuntimeHooks } from '../runtime.js';
import { RunReporter } from '../reporter.js';
import { consoleIO, errorMessage, type CommandIO } from '../io.js';

export const DEMO_THRESHOLD = 1.0;
export const DEMO_OUTPUT_FILE = 'readme_demo_output.json';

export interface RunCommandOptions {
  iterations?: number;
  /** Seconds between iterations. */
  interval?: number;
  sources?: string[];
  threshold?: number;
  demo?: boolean;
}

export interface RunCommandContext {
  verbose?: boolean;
  json?: boolean;
  io?: CommandIO;
  /** Show a spinner while fetching. */
  interactive?: boolean;
  signal?: AbortSignal;
}

export type RunCommandResult =
  | { mode: 'once'; path: string; log: RunLog; warnings: string[] }
  | { mode: 'continuous'; session: SessionSnapshot; runs: string[]; warnings: string[] };

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parseNonNegativeNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative number.');
  }
  return parsed;
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Must be a number.');
  }
  return parsed;
}

export function parseList(value: string): string[] {
  return value.split(',').map(part => part.trim()).filter(part => part.length > 0);
}

/**
 * Run one cycle, or several with a pause between them. In JSON mode nothing
 * is rendered; warnings are collected into the result instead.
 */
export async function runCommand(
  config: Config,
  options: RunCommandOptions = {},
  context: RunCommandContext = {},
): Promise<RunCommandResult> {
  const io = context.io ?? consoleIO;
  const warnings: string[] = [];
  const reporter = context.json
    ? undefined
    : new RunReporter({ verbose: context.verbose, spinner: context.interactive, io });

  const warn = (message: string) => {
    warnings.push(message);
    reporter?.warn(message);
  };
  const hooks: RuntimeHooks = {
    onWarning: warn,
    onSourceError: err => warn(`Source ${err.source} failed: ${err.message}`),
    onUnknownSource: name => warn(`Unknown source: ${name}`),
    onMemoryError: err => warn(err.message),
  };

  const threshold = options.threshold ?? (options.demo ? DEMO_THRESHOLD : undefined);
  const orchestrator = buildOrchestrator(config, { sources: options.sources, threshold }, hooks);
  const detach = reporter?.attach(orchestrator);
  if (context.verbose && !orchestrator.usesModel) {
    reporter?.note('No GEMINI_API_KEY set; summaries are built locally.');
  }

  const runs: string[] = [];
  orchestrator.on('run:complete', event => {
    runs.push(event.path);
    if (options.demo) {
      writeJsonFile(join(orchestrator.outputDir, DEMO_OUTPUT_FILE), event.log);
    }
  });

  try {
    const iterations = options.iterations ?? 1;
    if (iterations === 1) {
      const { log, path } = await orchestrator.runOnce(context.signal);
      return { mode: 'once', path, log, warnings };
    }

    const session = await orchestrator.runContinuous({
      iterations,
      intervalMs: (options.interval ?? 2) * 1000,
      signal: context.signal,
    });
    return { mode: 'continuous', session, runs, warnings };
  } catch (err) {
    if (isAbortError(err, context.signal)) {
      reporter?.error('Run aborted');
    } else {
      reporter?.error(`Run failed: ${errorMessage(err)}`);
    }
    throw err;
  } finally {
    detach?.();
    orchestrator.removeAllListeners();
  }
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Fetch, analyze, score, summarize and store items')
    .option('-n, --iterations <n>', 'Number of processing cycles', parsePositiveInt, 1)
    .option('-i, --interval <seconds>', 'Seconds between cycles', parseNonNegativeNumber, 2)
    .option('-s, --sources <list>', 'Comma-separated sources (local,arxiv,nasa_apod,nasa_mission)', parseList)
    .option('-t, --threshold <score>', 'Override the scoring threshold', parseNumber)
    .option('--demo', `Lower the threshold to ${DEMO_THRESHOLD} and also write ${DEMO_OUTPUT_FILE}`)
    .action(async (options: RunCommandOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const config = getConfig();

      const controller = new AbortController();
      const onSigint = () => controller.abort();
      process.once('SIGINT', onSigint);

      try {
        const result = await runCommand(config, options, {
          verbose: globalOpts.verbose,
          json: globalOpts.json,
          interactive: process.stderr.isTTY === true,
          signal: controller.signal,
        });

        if (globalOpts.json) {
          console.log(JSON.stringify(result, null, 2));
        } else if (result.mode === 'continuous') {
          console.log(chalk.green.bold(`✓ Completed ${result.session.runs}/${result.session.iterationsRequested} runs`));
          console.log(chalk.dim(`  Total processed: ${result.session.totalProcessed}`));
        }
      } catch (err) {
        if (globalOpts.json) {
          console.log(JSON.stringify({ error: errorMessage(err) }, null, 2));
        }
        process.exitCode = 1;
      } finally {
        process.off('SIGINT', onSigint);
      }
    });
}
