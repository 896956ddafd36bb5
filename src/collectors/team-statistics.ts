import type { PageFetcher } from '../http/fetcher';
import type { TeamRef } from '../extractors/teams';
import { extractTeamStats, toStatsUrl, type MissingFieldHandler, type TeamStatRecord } from '../extractors/team-stats';
import { delay } from '../utils/delay';
import { logger } from '../utils/logger';

export interface IncompleteEntry {
  subject: string;
  url: string;
  reason: string;
}

export type TeamStatsOutcome =
  | { status: 'complete'; team: TeamRef; record: TeamStatRecord }
  | { status: 'incomplete'; team: TeamRef; entry: IncompleteEntry };

export interface CollectTeamOptions {
  pageDelayMs?: number;
  onMissing?: MissingFieldHandler;
}

export async function collectTeamStatistics(
  fetcher: PageFetcher,
  team: TeamRef,
  options: CollectTeamOptions = {}
): Promise<TeamStatsOutcome> {
  logger.info(`Collecting team statistics: ${team.name}...`);

  const info = await fetcher(team.url);
  if (!info.ok) {
    logger.error(`Failed team info page for ${team.name}: ${info.error.message}`);
    return { status: 'incomplete', team, entry: { subject: team.name, url: team.url, reason: info.error.message } };
  }

  await delay(options.pageDelayMs ?? 0);

  const statsUrl = toStatsUrl(team.url);
  const stats = await fetcher(statsUrl);
  if (!stats.ok) {
    logger.error(`Failed team stats page for ${team.name}: ${stats.error.message}`);
    return { status: 'incomplete', team, entry: { subject: team.name, url: statsUrl, reason: stats.error.message } };
  }

  const record = extractTeamStats(info.html, stats.html, options.onMissing);
  if (record.team === null) {
    logger.warn(`No team name found on ${team.url}`);
  }
  logger.debug(`Collected ${Object.keys(record).length - 1} stats for ${team.name}`);
  return { status: 'complete', team, record };
}
