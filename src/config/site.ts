/**
 * Fixed structure of the Super League site. Every selector here is tied to
 * the site's current markup.
 */
export interface SiteConfig {
  baseUrl: string;
  teamsUrl: string;
}

export const TEAMS_PATH = 'teams/';

export const SELECTORS = {
  // Several lists share this class; the season menu is one of them.
  seasonNavigation: 'ul.sub-current',
  teamCard: 'a.team-card',
  teamCardName: 'h4',
  teamName: 'div.container.fix-font-size.vertical-center',
  statsWrapper: 'div.team-stats-wrapper',
  totalStatsRow: 'div.total-stats-content div.row-team-info',
  totalStatsLabel: 'div.bold',
  totalStatsValue: 'div.text-right',
} as const;

export interface StatPairSelector {
  slot: string;
  label: string;
  value: string;
}

export const WRAPPER_STAT_PAIRS: readonly StatPairSelector[] = [
  { slot: 'position', label: 'div.position', value: 'div.bold.position-value' },
  { slot: 'points', label: 'div.points', value: 'div.bold.points-value' },
  { slot: 'games', label: 'div.games', value: 'div.bold.games-value' },
];

// Team pages come in two variants that differ by one path segment.
export const INFO_SEGMENT = 'info';
export const STATS_SEGMENT = 'teamStats';

export const SEASON_LABEL_PATTERN = /^\d{4}\s*-\s*\d{4}$/;

export function buildSiteConfig(baseUrl: string): SiteConfig {
  const normalized = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  return {
    baseUrl: normalized,
    teamsUrl: new URL(TEAMS_PATH, normalized).toString(),
  };
}

/** Absolute URL for a link on the site, or null when the href cannot be parsed. */
export function resolveHref(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}
