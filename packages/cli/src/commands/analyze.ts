import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync, readFileSync } from 'fs';
import { analyze, score, type AnalysisRecord, type ScoreResult } from '@starsift/core';
import { getConfig, type GlobalOptions } from '../context.js';
import { expandTilde, type Config } from '../config/index.js';
import { toExtractorConfig, toScorerConfig } from '../runtime.js';
import { consoleIO, errorMessage, type CommandIO } from '../io.js';
import { parseNumber } from './run.js';

interface AnalyzeOptions {
  text?: boolean;
  threshold?: number;
}

export interface AnalyzeResult {
  analysis: AnalysisRecord;
  evaluation: ScoreResult;
}

/** Analyze and score one text with the configured extractor and scorer. */
export function analyzeText(config: Config, text: string, threshold?: number): AnalyzeResult {
  const analysis = analyze(text, toExtractorConfig(config));
  const evaluation = score(analysis, toScorerConfig(config, threshold));
  return { analysis, evaluation };
}

export function readInput(input: string, literal: boolean): string {
  if (literal) return input;
  const path = expandTilde(input);
  if (!existsSync(path)) {
    throw new Error(`File not found: ${path}`);
  }
  return readFileSync(path, 'utf-8');
}

function formatList(values: readonly (string | number)[]): string {
  return values.length > 0 ? values.join(', ') : chalk.dim('none');
}

export function renderAnalysis(result: AnalyzeResult, threshold: number, io: CommandIO = consoleIO): void {
  const { analysis, evaluation } = result;

  io.out(chalk.bold('Analysis'));
  io.out(`  Words: ${analysis.wordCount}  Sentences: ${analysis.sentenceCount}`);
  io.out(`  Keywords: ${formatList(analysis.keywords)}`);
  io.out(`  Numbers: ${formatList(analysis.numbers)}`);
  io.out(`  Measurements: ${formatList(analysis.measurements.map(m => m.raw))}`);
  if (analysis.claims.length > 0) {
    io.out('  Claims:');
    for (const claim of analysis.claims) {
      io.out(`    - ${claim}`);
    }
  }
  io.out(`  Snippet: ${chalk.dim(analysis.snippet)}`);
  io.out('');

  const verdict = evaluation.passed ? chalk.green.bold('PASS') : chalk.red.bold('FAIL');
  io.out(`${chalk.bold('Score')} ${evaluation.score} ${verdict} ${chalk.dim(`(threshold ${threshold})`)}`);
  for (const reason of evaluation.reasons) {
    io.out(chalk.dim(`  ${reason}`));
  }
}

export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze')
    .description('Analyze and score a single text file')
    .argument('<file>', 'Path to a text file (or the text itself with --text)')
    .option('--text', 'Treat the argument as literal text')
    .option('-t, --threshold <score>', 'Override the scoring threshold', parseNumber)
    .action(async (input: string, options: AnalyzeOptions, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const config = getConfig();

      let text: string;
      try {
        text = readInput(input, options.text === true);
      } catch (err) {
        console.error(chalk.red(errorMessage(err)));
        process.exitCode = 1;
        return;
      }

      const threshold = options.threshold ?? config.scoring.threshold;
      const result = analyzeText(config, text, threshold);

      if (globalOpts.json) {
        console.log(JSON.stringify(result, null, 2));
        return;
      }
      renderAnalysis(result, threshold);
    });
}
