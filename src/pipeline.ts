import type { SiteConfig } from './config/site';
import type { PageFetcher } from './http/fetcher';
import type { SeasonRef, SeasonSelection } from './extractors/seasons';
import type { MalformedCardPolicy } from './extractors/teams';
import type { TeamStatRecord } from './extractors/team-stats';
import { discoverSeasons } from './collectors/seasons';
import { discoverTeams } from './collectors/season-teams';
import { collectTeamStatistics, type IncompleteEntry } from './collectors/team-statistics';
import { combineTables, writeSeasonTable } from './output/csv-writer';
import { delay } from './utils/delay';
import { logger } from './utils/logger';

export interface PipelineOptions {
  fetcher: PageFetcher;
  site: SiteConfig;
  dataRoot: string;
  pageDelayMs?: number;
  /** Season labels to scrape; all discovered seasons when empty. */
  seasons?: string[];
  /** The first menu entry is the season in progress and is skipped unless set. */
  includeCurrent?: boolean;
  skipCombine?: boolean;
  seasonSelection?: SeasonSelection;
  onMalformedCard?: MalformedCardPolicy;
}

export interface SeasonResult {
  season: SeasonRef;
  tablePath: string | null;
  /** Rows written to the season table. */
  records: number;
  incomplete: IncompleteEntry[];
}

export interface RunSummary {
  seasons: SeasonResult[];
  /** Requested labels that are not in the season menu. */
  unknownSeasons: string[];
  /** Seasons that produced no records at all. */
  failedSeasons: string[];
  combinedPath: string | null;
}

export function selectSeasons(
  discovered: SeasonRef[],
  requested: string[] = [],
  includeCurrent = false
): { selected: SeasonRef[]; unknown: string[] } {
  if (requested.length > 0) {
    const wanted = new Set(requested);
    const selected = discovered.filter((s) => wanted.has(s.label));
    const known = new Set(discovered.map((s) => s.label));
    return { selected, unknown: requested.filter((label) => !known.has(label)) };
  }
  return { selected: includeCurrent ? discovered : discovered.slice(1), unknown: [] };
}

async function runSeason(season: SeasonRef, options: PipelineOptions): Promise<SeasonResult> {
  const pageDelayMs = options.pageDelayMs ?? 0;
  const result: SeasonResult = { season, tablePath: null, records: 0, incomplete: [] };

  const roster = await discoverTeams(options.fetcher, season, options.site, options.onMalformedCard);
  if (roster.status === 'incomplete') {
    result.incomplete.push(roster.entry);
    return result;
  }

  const records: TeamStatRecord[] = [];
  for (const team of roster.teams) {
    await delay(pageDelayMs);
    const outcome = await collectTeamStatistics(options.fetcher, team, { pageDelayMs });
    if (outcome.status === 'complete') {
      records.push(outcome.record);
    } else {
      result.incomplete.push(outcome.entry);
    }
  }

  if (records.length === 0) {
    logger.error(`No records collected for ${season.label}`);
    return result;
  }

  const written = await writeSeasonTable(records, season.label, options.dataRoot);
  result.tablePath = written.filePath;
  result.records = written.rowCount;
  return result;
}

export async function runPipeline(options: PipelineOptions): Promise<RunSummary> {
  const discovered = await discoverSeasons(options.fetcher, options.site, options.seasonSelection);
  const { selected, unknown } = selectSeasons(discovered, options.seasons, options.includeCurrent);

  for (const label of unknown) {
    logger.warn(`Season not found in the season menu: ${label}`);
  }

  const summary: RunSummary = { seasons: [], unknownSeasons: unknown, failedSeasons: [], combinedPath: null };

  for (const season of selected) {
    logger.info(`\n${'='.repeat(60)}`);
    logger.info(`Processing season: ${season.label}`);
    logger.info(`${'='.repeat(60)}`);

    const result = await runSeason(season, options);
    summary.seasons.push(result);
    if (result.records === 0) {
      summary.failedSeasons.push(season.label);
    }
    for (const entry of result.incomplete) {
      logger.warn(`Incomplete: ${entry.subject} (${entry.url}): ${entry.reason}`);
    }
  }

  const written = summary.seasons.flatMap((s) => (s.tablePath ? [s.tablePath] : []));
  if (!options.skipCombine && written.length > 0) {
    summary.combinedPath = await combineTables(written, options.dataRoot);
  }

  return summary;
}
