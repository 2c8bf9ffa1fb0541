#!/usr/bin/env node
import { readFileSync } from 'fs';
import { Command } from 'commander';
import chalk from 'chalk';
import * as dotenv from 'dotenv';
import { DateRange } from '../common/dates.js';
import { ConfigurationError, errorMessage, PipelineError } from '../common/errors.js';
import { createLogger, setLogLevel } from '../common/logger.js';
import { DEFAULT_CONFIG_PATH, loadConfig } from '../config/loader.js';
import { PipelineConfig } from '../config/types.js';
import { SentimentPipeline } from '../pipeline/pipeline.js';
import { createScorerRegistry } from '../scoring/scorerRegistry.js';
import { isSentimentModel, SentimentModel } from '../scoring/types.js';
import { MemoryPipelineStore } from '../store/memoryStore.js';
import { RedisPipelineStore } from '../store/redisStore.js';

dotenv.config();

const logger = createLogger('CLI');

type GlobalOptions = {
  config: string;
  memory?: boolean;
};

interface RangeOptions {
  from: string;
  to: string;
}

interface InputOptions {
  input: string;
}

interface ScoreOptions extends RangeOptions {
  model?: string;
  rescore?: boolean;
}

interface CompareOptions extends RangeOptions {
  title: string;
}

interface RunOptions extends RangeOptions {
  input?: string;
  survey?: string;
}

const program = new Command();

program
  .name('sentiment-pipeline')
  .description('Score, aggregate and compare audience sentiment per title')
  .version('0.1.0')
  .option('-c, --config <path>', 'Pipeline config file', DEFAULT_CONFIG_PATH)
  .option('--memory', 'Use an in-process store instead of Redis');

/**
 * Read a JSON Lines file. Unparseable lines become null so they are
 * rejected and counted downstream.
 */
function readJsonLines(filePath: string): unknown[] {
  const records: unknown[] = [];
  const lines = readFileSync(filePath, 'utf8').split(/\r?\n/);
  lines.forEach((line, index) => {
    if (line.trim().length === 0) return;
    try {
      records.push(JSON.parse(line));
    } catch (error) {
      logger.warn('Unparseable input line', { file: filePath, line: index + 1, error: errorMessage(error) });
      records.push(null);
    }
  });
  return records;
}

function toRange(options: RangeOptions): DateRange {
  return { from: options.from, to: options.to };
}

function toModel(value: string | undefined): SentimentModel | undefined {
  if (value === undefined) return undefined;
  if (!isSentimentModel(value)) {
    throw new ConfigurationError(`Unknown model "${value}"`, { model: value });
  }
  return value;
}

function print(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

async function withPipeline(task: (pipeline: SentimentPipeline, signal: AbortSignal) => Promise<void>): Promise<void> {
  const globals = program.opts<GlobalOptions>();
  let config: PipelineConfig;
  try {
    config = loadConfig(globals.config);
  } catch (error) {
    console.error(chalk.red(`Configuration error: ${errorMessage(error)}`));
    process.exitCode = 2;
    return;
  }
  setLogLevel(config.logLevel);

  const store = globals.memory ? new MemoryPipelineStore() : RedisPipelineStore.connect(config.store);
  const pipeline = new SentimentPipeline(config, store, createScorerRegistry(config));

  const controller = new AbortController();
  const onInterrupt = () => {
    console.error(chalk.yellow('Interrupted, finishing in-flight work...'));
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    await task(pipeline, controller.signal);
  } catch (error) {
    const code = error instanceof PipelineError ? error.code : 'UNEXPECTED';
    console.error(chalk.red(`${code}: ${errorMessage(error)}`));
    process.exitCode = 1;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
    await pipeline.close();
  }
}

program
  .command('ingest')
  .description('Normalize and store collector records (JSON Lines)')
  .requiredOption('-i, --input <file>', 'Records file')
  .action((options: InputOptions) =>
    withPipeline(async (pipeline, signal) => {
      const result = await pipeline.ingest(readJsonLines(options.input), { signal });
      console.error(chalk.green(`Ingested ${result.ingested}, merged ${result.merged}, rejected ${result.rejected}`));
      print(result);
    })
  );

program
  .command('survey')
  .description('Store survey responses (JSON Lines)')
  .requiredOption('-i, --input <file>', 'Responses file')
  .action((options: InputOptions) =>
    withPipeline(async (pipeline, signal) => {
      const result = await pipeline.ingestSurvey(readJsonLines(options.input), { signal });
      console.error(chalk.green(`Stored ${result.stored}, duplicates ${result.duplicates}, rejected ${result.rejected}`));
      print(result);
    })
  );

program
  .command('score')
  .description('Score stored items in a date range')
  .requiredOption('--from <date>', 'First day (YYYY-MM-DD)')
  .requiredOption('--to <date>', 'Last day (YYYY-MM-DD)')
  .option('-m, --model <model>', 'lexicon or transformer')
  .option('--rescore', 'Overwrite existing scores')
  .action((options: ScoreOptions) =>
    withPipeline(async (pipeline, signal) => {
      const model = toModel(options.model);
      const outcome = await pipeline.score(toRange(options), { model, rescore: options.rescore, signal });
      console.error(chalk.green(`Scored ${outcome.scores.length}, skipped ${outcome.skipped}, deferred ${outcome.deferred.length}`));
      print({
        scoredByModel: outcome.scoredByModel,
        skipped: outcome.skipped,
        failures: outcome.failures,
        deferred: outcome.deferred.length,
        cancelled: outcome.cancelled
      });
    })
  );

program
  .command('aggregate')
  .description('Recompute daily aggregates in a date range')
  .requiredOption('--from <date>', 'First day (YYYY-MM-DD)')
  .requiredOption('--to <date>', 'Last day (YYYY-MM-DD)')
  .action((options: RangeOptions) =>
    withPipeline(async (pipeline, signal) => {
      const outcome = await pipeline.aggregate(toRange(options), { signal });
      print({
        recomputed: outcome.aggregates.length,
        failures: outcome.failures,
        cancelled: outcome.cancelled
      });
      if (outcome.failures.length > 0) {
        console.error(chalk.red(`${outcome.failures.length} buckets failed`));
        process.exitCode = 1;
      }
    })
  );

program
  .command('compare')
  .description('Report social/survey alignment for a title')
  .requiredOption('-t, --title <id>', 'Title id')
  .requiredOption('--from <date>', 'First day (YYYY-MM-DD)')
  .requiredOption('--to <date>', 'Last day (YYYY-MM-DD)')
  .action((options: CompareOptions) =>
    withPipeline(async pipeline => {
      print(await pipeline.compare(options.title, toRange(options)));
    })
  );

program
  .command('run')
  .description('Ingest, score and aggregate in one pass')
  .requiredOption('--from <date>', 'First day (YYYY-MM-DD)')
  .requiredOption('--to <date>', 'Last day (YYYY-MM-DD)')
  .option('-i, --input <file>', 'Records file (JSON Lines)')
  .option('-s, --survey <file>', 'Survey responses file (JSON Lines)')
  .action((options: RunOptions) =>
    withPipeline(async (pipeline, signal) => {
      const summary = await pipeline.run({
        records: options.input ? readJsonLines(options.input) : undefined,
        responses: options.survey ? readJsonLines(options.survey) : undefined,
        range: toRange(options),
        signal
      });
      print(summary);

      const status = summary.aggregationFailures > 0 ? chalk.red : summary.cancelled ? chalk.yellow : chalk.green;
      console.error(status(`Run ${summary.runId}: ${summary.aggregatesRecomputed} aggregates, ${summary.aggregationFailures} failures`));
      if (summary.aggregationFailures > 0) {
        process.exitCode = 1;
      }
    })
  );

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(errorMessage(error)));
  process.exitCode = 1;
});
