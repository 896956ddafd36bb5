import type { SiteConfig } from '../config/site';
import type { PageFetcher } from '../http/fetcher';
import type { SeasonRef } from '../extractors/seasons';
import { extractTeams, type MalformedCardPolicy, type TeamRef } from '../extractors/teams';
import { MalformedPageError } from '../errors';
import { logger } from '../utils/logger';
import type { IncompleteEntry } from './team-statistics';

export type SeasonTeamsOutcome =
  | { status: 'complete'; teams: TeamRef[] }
  | { status: 'incomplete'; entry: IncompleteEntry };

export async function discoverTeams(
  fetcher: PageFetcher,
  season: SeasonRef,
  site: SiteConfig,
  onMalformed: MalformedCardPolicy = 'skip'
): Promise<SeasonTeamsOutcome> {
  logger.info(`Collecting teams for season ${season.label}...`);

  const page = await fetcher(season.url);
  if (!page.ok) {
    logger.error(`Failed roster page for ${season.label}: ${page.error.message}`);
    return { status: 'incomplete', entry: { subject: season.label, url: season.url, reason: page.error.message } };
  }

  const teams = extractTeams(page.html, site.baseUrl, { onMalformed, source: season.url });
  if (teams.length === 0) {
    throw new MalformedPageError('No team cards found', season.url);
  }

  logger.info(`Found ${teams.length} teams for ${season.label}`);
  return { status: 'complete', teams };
}
