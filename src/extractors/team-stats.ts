import * as cheerio from 'cheerio';
import {
  INFO_SEGMENT,
  SELECTORS,
  STATS_SEGMENT,
  WRAPPER_STAT_PAIRS,
} from '../config/site';
import { MissingFieldError } from '../errors';
import { logger } from '../utils/logger';

/**
 * Flat stat label → value mapping for one team. Labels come straight from the
 * page, so the key set differs between teams and seasons.
 */
export interface TeamStatRecord {
  team: string | null;
  [stat: string]: string | null;
}

export type MissingFieldHandler = (err: MissingFieldError) => void;

const logMissing: MissingFieldHandler = (err) => {
  logger.warn(`Expected divs not found in one of the stat rows: ${err.message}`);
};

// Structural view of a cheerio selection, enough to read its first node's text.
interface TextSelection {
  length: number;
  first(): { text(): string };
}

function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function textOf(found: TextSelection): string | undefined {
  return found.length > 0 ? cleanText(found.first().text()) : undefined;
}

export function extractTeamName(infoHtml: string): string | null {
  const $ = cheerio.load(infoHtml);
  return textOf($(SELECTORS.teamName)) ?? null;
}

/** Swaps every path segment that is exactly `info` for `teamStats`; host and query stay as they are. */
export function toStatsUrl(infoUrl: string): string {
  const url = new URL(infoUrl);
  url.pathname = url.pathname
    .split('/')
    .map((segment) => (segment === INFO_SEGMENT ? STATS_SEGMENT : segment))
    .join('/');
  return url.toString();
}

/**
 * Builds the record from both team pages: the three headline pairs of every
 * stats wrapper, then the team name, then the total-stats rows. A repeated
 * label keeps the value written last.
 */
export function extractTeamStats(
  infoHtml: string,
  statsHtml: string,
  onMissing: MissingFieldHandler = logMissing
): TeamStatRecord {
  const $ = cheerio.load(statsHtml);
  // A Map keeps labels such as `__proto__` as plain keys.
  const stats = new Map<string, string | null>();

  const put = (slot: string, label: string | undefined, value: string | undefined) => {
    if (label === undefined || value === undefined) {
      const missing = label === undefined && value === undefined ? 'both' : label === undefined ? 'label' : 'value';
      onMissing(new MissingFieldError(slot, missing));
      return;
    }
    stats.set(label, value);
  };

  $(SELECTORS.statsWrapper).each((_, wrapper) => {
    const $wrapper = $(wrapper);
    for (const pair of WRAPPER_STAT_PAIRS) {
      put(pair.slot, textOf($wrapper.find(pair.label)), textOf($wrapper.find(pair.value)));
    }
  });

  stats.set('team', extractTeamName(infoHtml));

  $(SELECTORS.totalStatsRow).each((index, row) => {
    const $row = $(row);
    put(
      `total stats row ${index + 1}`,
      textOf($row.find(SELECTORS.totalStatsLabel)),
      textOf($row.find(SELECTORS.totalStatsValue))
    );
  });

  return { ...Object.fromEntries(stats), team: stats.get('team') ?? null };
}
