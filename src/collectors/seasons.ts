import type { SiteConfig } from '../config/site';
import type { PageFetcher } from '../http/fetcher';
import { extractSeasons, type SeasonRef, type SeasonSelection } from '../extractors/seasons';
import { logger } from '../utils/logger';

/**
 * Reads the season menu off the teams index. Without it there is nothing to
 * iterate, so any failure here throws.
 */
export async function discoverSeasons(
  fetcher: PageFetcher,
  site: SiteConfig,
  selection: SeasonSelection = 'season-links'
): Promise<SeasonRef[]> {
  logger.info(`Discovering seasons from ${site.teamsUrl}...`);

  const page = await fetcher(site.teamsUrl);
  if (!page.ok) {
    throw page.error;
  }

  const seasons = extractSeasons(page.html, site.baseUrl, selection);
  logger.info(`Found ${seasons.length} seasons`);
  return seasons;
}
