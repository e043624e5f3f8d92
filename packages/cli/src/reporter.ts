import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type {
  FetchCompleteEvent,
  ItemErrorEvent,
  ItemSkippedEvent,
  ItemStoredEvent,
  Orchestrator,
  RunCompleteEvent,
  RunStartEvent,
  SessionUpdateEvent,
  SummaryFallbackEvent,
} from '@starsift/core';
import { consoleIO, type CommandIO } from './io.js';

export interface ReporterOptions {
  verbose?: boolean;
  /** Show an ora spinner while fetching. Only sensible on an interactive stderr. */
  spinner?: boolean;
  io?: CommandIO;
}

function itemLabel(event: { id: string; title?: string }): string {
  return event.title ? `${event.title} ${chalk.dim(`(${event.id})`)}` : event.id;
}

function formatScore(score: number): string {
  return score.toFixed(1);
}

/**
 * Renders orchestrator events for humans. Progress goes to stderr, the
 * per-run summary to stdout.
 */
export class RunReporter {
  private readonly verbose: boolean;
  private readonly useSpinner: boolean;
  private readonly io: CommandIO;
  private spinner: Ora | undefined;

  constructor(options: ReporterOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.useSpinner = options.spinner ?? false;
    this.io = options.io ?? consoleIO;
  }

  /** Subscribe to an orchestrator; returns a function that unsubscribes. */
  attach(orchestrator: Orchestrator): () => void {
    const onRunStart = (event: RunStartEvent) => this.runStart(event);
    const onFetchComplete = (event: FetchCompleteEvent) => this.fetchComplete(event);
    const onSkipped = (event: ItemSkippedEvent) => this.itemSkipped(event);
    const onStored = (event: ItemStoredEvent) => this.itemStored(event);
    const onItemError = (event: ItemErrorEvent) => this.itemError(event);
    const onFallback = (event: SummaryFallbackEvent) => this.summaryFallback(event);
    const onRunComplete = (event: RunCompleteEvent) => this.runComplete(event);
    const onSession = (event: SessionUpdateEvent) => this.sessionUpdate(event);

    orchestrator.on('run:start', onRunStart);
    orchestrator.on('fetch:complete', onFetchComplete);
    orchestrator.on('item:skipped', onSkipped);
    orchestrator.on('item:stored', onStored);
    orchestrator.on('item:error', onItemError);
    orchestrator.on('summary:fallback', onFallback);
    orchestrator.on('run:complete', onRunComplete);
    orchestrator.on('session:update', onSession);

    return () => {
      orchestrator.off('run:start', onRunStart);
      orchestrator.off('fetch:complete', onFetchComplete);
      orchestrator.off('item:skipped', onSkipped);
      orchestrator.off('item:stored', onStored);
      orchestrator.off('item:error', onItemError);
      orchestrator.off('summary:fallback', onFallback);
      orchestrator.off('run:complete', onRunComplete);
      orchestrator.off('session:update', onSession);
    };
  }

  note(message: string): void {
    this.pauseSpinner(() => this.io.err(chalk.dim(`  ${message}`)));
  }

  warn(message: string): void {
    this.pauseSpinner(() => this.io.err(chalk.yellow(`  ! ${message}`)));
  }

  error(message: string): void {
    if (this.spinner) {
      this.spinner.fail(chalk.red(message));
      this.spinner = undefined;
      return;
    }
    this.io.err(chalk.red(message));
  }

  private runStart(event: RunStartEvent): void {
    if (event.iteration !== undefined && event.iterations !== undefined) {
      this.io.err(chalk.cyan.bold(`Run ${event.iteration}/${event.iterations}`) + chalk.dim(`  ${event.timestamp}`));
    } else {
      this.io.err(chalk.cyan.bold('Run') + chalk.dim(`  ${event.timestamp}`));
    }
    if (this.useSpinner) {
      this.spinner = ora({ text: 'Fetching items', prefixText: chalk.dim(' ') }).start();
    }
  }

  private fetchComplete(event: FetchCompleteEvent): void {
    const text = `Fetched ${event.count} items`;
    if (this.spinner) {
      this.spinner.succeed(text);
      this.spinner = undefined;
      return;
    }
    this.io.err(chalk.dim(`  ${text}`));
  }

  private itemSkipped(event: ItemSkippedEvent): void {
    this.io.err(chalk.dim(`  - skipped ${event.id}  score ${formatScore(event.score)}`));
    if (this.verbose) {
      for (const reason of event.reasons) {
        this.io.err(chalk.dim(`      ${reason}`));
      }
    }
  }

  private itemStored(event: ItemStoredEvent): void {
    const verb = event.updated ? 'updated' : 'stored';
    this.io.err(
      `  ${chalk.green('✓')} ${verb} ${itemLabel(event)}` +
      chalk.dim(`  score ${formatScore(event.score)}  ${event.summaryMethod} summary`),
    );
  }

  private itemError(event: ItemErrorEvent): void {
    this.io.err(`  ${chalk.red('✗')} ${event.id} ${chalk.red(event.error.message)}`);
  }

  private summaryFallback(event: SummaryFallbackEvent): void {
    this.warn(`${event.id}: ${event.reason}. Using local summary.`);
  }

  private runComplete(event: RunCompleteEvent): void {
    const { log } = event;
    const meanScore = log.metrics.meanScore.toFixed(2);
    const passRate = `${Math.round(log.metrics.passRate * 100)}%`;
    this.io.out(
      chalk.green.bold(`✓ Processed ${log.processedItems}/${log.items.length} items`) +
      chalk.dim(`  ${(event.durationMs / 1000).toFixed(1)}s`),
    );
    this.io.out(chalk.dim(`  Mean score: ${meanScore}  Pass rate: ${passRate}`));
    this.io.out(chalk.dim(`  Log: ${event.path}`));
  }

  private sessionUpdate(event: SessionUpdateEvent): void {
    if (this.verbose) {
      this.io.err(chalk.dim(`  Session: ${event.path}`));
    }
  }

  private pauseSpinner(write: () => void): void {
    if (!this.spinner) {
      write();
      return;
    }
    this.spinner.clear();
    write();
    this.spinner.render();
  }
}
