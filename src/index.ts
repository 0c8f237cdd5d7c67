#!/usr/bin/env node
import 'reflect-metadata';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { config, logger } from './config';
import { initializeTracing, shutdownTracing } from './utils/tracing';
import { isPipelineError } from './utils/errors';
import { Orchestrator } from './modules/Orchestrator';
import { RecordKind } from './types';

// Initialize tracing before anything else
initializeTracing();

// stdout carries only the JSON result; logs go to stderr
function printResult(result: unknown): void {
  process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
}

function isAborted(result: object): boolean {
  return 'status' in result && result.status === 'aborted';
}

function isRecordKind(value: unknown): value is RecordKind {
  return value === 'job' || value === 'chat';
}

/**
 * Opens the store, runs one operation and closes everything again.
 * Returns the process exit code.
 */
async function runOnce(operation: (orchestrator: Orchestrator) => Promise<object>): Promise<number> {
  const orchestrator = new Orchestrator(config);

  try {
    await orchestrator.initialize();
    const result = await operation(orchestrator);
    printResult(result);
    return isAborted(result) ? 1 : 0;
  } catch (error) {
    if (!isPipelineError(error)) {
      throw error;
    }
    printResult({ status: 'aborted', reason: error.code, error: error.message });
    return 1;
  } finally {
    await orchestrator.stop();
  }
}

async function serve(): Promise<void> {
  const orchestrator = new Orchestrator(config);

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Graceful shutdown initiated');
    try {
      await orchestrator.stop();
      await shutdownTracing();
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await orchestrator.start();
}

async function main(): Promise<void> {
  logger.debug({ env: config.env, store: config.store.path, browser: config.browser.endpoint }, 'Configuration loaded');

  let exitCode: number | undefined;

  await yargs(hideBin(process.argv))
    .scriptName('job-scrape-ingest')
    .usage('Usage: $0 <command> [options]')
    .command('ingest', 'Capture the current browser page and store its records', {}, async () => {
      exitCode = await runOnce((orchestrator) => orchestrator.runIngestion());
    })
    .command(
      'maintain',
      'Deduplicate, prune and check the store',
      (args) =>
        args.option('check-only', {
          type: 'boolean',
          describe: 'Report duplicates and store health without changing anything',
          default: false,
        }),
      async (argv) => {
        exitCode = await runOnce((orchestrator) => orchestrator.runMaintenance({ checkOnly: argv.checkOnly }));
      }
    )
    .command(
      'pending <providerKind> [recordKind]',
      'Print the oldest record still missing an artifact of the given kind',
      (args) =>
        args
          .positional('providerKind', { type: 'string', demandOption: true, describe: 'Artifact kind, e.g. cover_letter' })
          .positional('recordKind', { type: 'string', choices: ['job', 'chat'], describe: 'Only consider this record kind' }),
      async (argv) => {
        const recordKind = isRecordKind(argv.recordKind) ? argv.recordKind : undefined;
        exitCode = await runOnce(async (orchestrator) => ({
          record: await orchestrator.store.findLatestWithoutArtifact(argv.providerKind, recordKind),
        }));
      }
    )
    .command('serve', 'Run the HTTP admin surface and the cron schedules', {}, async () => {
      await serve();
    })
    .example('$0 ingest', 'Ingest the page open in the debug browser')
    .example('$0 maintain --check-only', 'Report store health only')
    .demandCommand(1)
    .strict()
    .help()
    .alias('h', 'help')
    .parseAsync();

  if (exitCode !== undefined) {
    await shutdownTracing();
    process.exit(exitCode);
  }
}

// Handle uncaught errors
process.on('uncaughtException', async (error) => {
  logger.error({ error }, 'Uncaught exception');
  await shutdownTracing();
  process.exit(1);
});

process.on('unhandledRejection', async (reason) => {
  logger.error({ reason }, 'Unhandled rejection');
  await shutdownTracing();
  process.exit(1);
});

main().catch(async (error) => {
  logger.error({ error }, 'Command failed');
  await shutdownTracing();
  process.exit(1);
});
