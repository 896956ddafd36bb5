import * as cheerio from 'cheerio';
import { SELECTORS, SEASON_LABEL_PATTERN, resolveHref } from '../config/site';
import { MalformedPageError } from '../errors';

export interface SeasonRef {
  readonly label: string;
  readonly url: string;
}

/**
 * How to pick the season menu among the lists sharing its class.
 * - `season-links`: the first list whose links all read like `2023-2024`
 * - `second-to-last`: the list at index `length - 2`, the site's fixed layout
 */
export type SeasonSelection = 'season-links' | 'second-to-last';

export interface SeasonLink {
  href: string | undefined;
  label: string | undefined;
}

export function isSeasonNavigation(links: SeasonLink[]): boolean {
  return links.length > 0 && links.every((l) => l.label !== undefined && SEASON_LABEL_PATTERN.test(l.label));
}

export function extractSeasons(
  html: string,
  baseUrl: string,
  selection: SeasonSelection = 'season-links'
): SeasonRef[] {
  const $ = cheerio.load(html);
  const candidates = $(SELECTORS.seasonNavigation)
    .toArray()
    .map((list) =>
      $(list)
        .find('a')
        .toArray()
        .map((anchor): SeasonLink => {
          const $a = $(anchor);
          const item = $a.find('li').first();
          return {
            href: $a.attr('href'),
            label: item.length > 0 ? item.text().trim() : undefined,
          };
        })
    );

  let links: SeasonLink[] | undefined;
  if (selection === 'second-to-last') {
    if (candidates.length < 2) {
      throw new MalformedPageError(
        `Expected at least 2 "${SELECTORS.seasonNavigation}" lists, found ${candidates.length}`,
        'season index'
      );
    }
    links = candidates[candidates.length - 2];
  } else {
    links = candidates.find(isSeasonNavigation);
    if (!links) {
      throw new MalformedPageError(
        `None of ${candidates.length} "${SELECTORS.seasonNavigation}" lists links to seasons`,
        'season index'
      );
    }
  }

  return links.map((link, index) => {
    if (!link.href || link.label === undefined) {
      throw new MalformedPageError(`Season link #${index + 1} has no ${link.href ? 'label' : 'href'}`, 'season index');
    }
    const url = resolveHref(link.href, baseUrl);
    if (url === null) {
      throw new MalformedPageError(`Season link #${index + 1} has an invalid href "${link.href}"`, 'season index');
    }
    return { label: link.label, url };
  });
}
