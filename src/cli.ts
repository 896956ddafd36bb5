#!/usr/bin/env node
import { ENV, validateEnv } from './config/env';
import { buildSiteConfig } from './config/site';
import { discoverSeasons } from './collectors/seasons';
import { createFetcher } from './http/fetcher';
import { combineAll } from './output/csv-writer';
import { runPipeline } from './pipeline';
import { errorMessage } from './errors';
import { logger, setLogLevel } from './utils/logger';
import { USAGE, exitCodeFor, isCommand, parseArgs, type CliArgs, type Command } from './cli-args';

// ── Main ──

async function main(args: CliArgs, command: Command): Promise<number> {
  const env = {
    ...ENV,
    SL_BASE_URL: args.baseUrl ?? ENV.SL_BASE_URL,
    DATA_DIR: args.outDir ?? ENV.DATA_DIR,
    REQUEST_TIMEOUT_MS: args.timeoutMs ?? ENV.REQUEST_TIMEOUT_MS,
  };
  validateEnv(env);

  if (command === 'combine') {
    await combineAll(env.DATA_DIR);
    return 0;
  }

  const site = buildSiteConfig(env.SL_BASE_URL);
  const fetcher = createFetcher({
    timeoutMs: env.REQUEST_TIMEOUT_MS,
    maxRetries: env.MAX_RETRIES,
    retryDelayMs: env.RETRY_DELAY_MS,
  });

  if (command === 'seasons') {
    const seasons = await discoverSeasons(fetcher, site);
    for (const season of seasons) {
      console.log(`${season.label}\t${season.url}`);
    }
    return 0;
  }

  const summary = await runPipeline({
    fetcher,
    site,
    dataRoot: env.DATA_DIR,
    pageDelayMs: env.PAGE_DELAY_MS,
    seasons: args.seasons,
    includeCurrent: args.includeCurrent,
    skipCombine: command === 'scrape' || args.skipCombine,
  });

  logger.info(`\n${'='.repeat(60)}`);
  logger.info('Collection Complete!');
  logger.info(`${'='.repeat(60)}`);
  for (const result of summary.seasons) {
    logger.info(`${result.season.label}: ${result.records} teams, ${result.incomplete.length} incomplete`);
  }
  if (summary.combinedPath) {
    logger.info(`Combined: ${summary.combinedPath}`);
  }
  if (summary.failedSeasons.length > 0) {
    logger.error(`No records for: ${summary.failedSeasons.join(', ')}`);
  }
  return exitCodeFor(summary);
}

// ── Entry Point ──

const args = parseArgs(process.argv.slice(2));

if (args.debug) {
  setLogLevel('debug');
}

if (!isCommand(args.command)) {
  console.log(USAGE);
  process.exit(0);
}

main(args, args.command)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    logger.error(`Pipeline failed: ${errorMessage(err)}`);
    process.exit(1);
  });
