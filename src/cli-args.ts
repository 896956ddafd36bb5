import type { RunSummary } from './pipeline';
import { logger } from './utils/logger';

// ── CLI Argument Parsing ──

export const COMMANDS = ['all', 'scrape', 'seasons', 'combine'] as const;
export type Command = (typeof COMMANDS)[number];

export interface CliArgs {
  command: string;
  seasons: string[];
  includeCurrent: boolean;
  skipCombine: boolean;
  outDir?: string;
  baseUrl?: string;
  timeoutMs?: number;
  debug: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
  const result: CliArgs = {
    command: argv[0] && !argv[0].startsWith('--') ? argv[0] : 'all',
    seasons: [],
    includeCurrent: false,
    skipCombine: false,
    debug: false,
  };

  const start = argv[0] === result.command ? 1 : 0;
  for (let i = start; i < argv.length; i++) {
    switch (argv[i]) {
      case '--season':
        if (argv[i + 1]) result.seasons.push(argv[++i]);
        break;
      case '--include-current':
        result.includeCurrent = true;
        break;
      case '--skip-combine':
        result.skipCombine = true;
        break;
      case '--out':
        result.outDir = argv[++i];
        break;
      case '--base-url':
        result.baseUrl = argv[++i];
        break;
      case '--timeout':
        result.timeoutMs = parseInt(argv[++i] ?? '', 10);
        break;
      case '--debug':
        result.debug = true;
        break;
      default:
        logger.warn(`Ignoring unknown option: ${argv[i]}`);
    }
  }

  return result;
}

export function isCommand(value: string): value is Command {
  const known: readonly string[] = COMMANDS;
  return known.includes(value);
}

/** Non-zero when anything requested came back empty. */
export function exitCodeFor(summary: RunSummary): number {
  return summary.failedSeasons.length > 0 || summary.unknownSeasons.length > 0 ? 1 : 0;
}

export const USAGE = `
Usage: npx ts-node src/cli.ts <command> [options]

Commands:
  all               Scrape every past season, then build the combined CSV
  scrape            Scrape seasons without building the combined CSV
  seasons           List the seasons found in the season menu
  combine           Combine the season CSVs already under the output folder

Options:
  --season "Label"  Only this season (repeatable), e.g. --season 2023-2024
  --include-current Also scrape the season in progress
  --skip-combine    Same as the scrape command
  --out <dir>       Output folder (default: DATA_DIR or SuperLeague_Data)
  --base-url <url>  Site base URL (default: SL_BASE_URL)
  --timeout <ms>    Per-request timeout (default: REQUEST_TIMEOUT_MS)
  --debug           Enable debug logging

Examples:
  npx ts-node src/cli.ts all
  npx ts-node src/cli.ts scrape --season 2022-2023 --debug
  npx ts-node src/cli.ts seasons
  npx ts-node src/cli.ts combine --out ./data
`;
