import * as cheerio from 'cheerio';
import { SELECTORS, resolveHref } from '../config/site';
import { MalformedPageError } from '../errors';
import { logger } from '../utils/logger';

export interface TeamRef {
  readonly name: string;
  readonly url: string;
}

export type MalformedCardPolicy = 'skip' | 'abort';

export interface ExtractTeamsOptions {
  onMalformed?: MalformedCardPolicy;
  source?: string;
}

export function extractTeams(html: string, baseUrl: string, options: ExtractTeamsOptions = {}): TeamRef[] {
  const policy = options.onMalformed ?? 'skip';
  const $ = cheerio.load(html);
  const teams: TeamRef[] = [];

  $(SELECTORS.teamCard).each((index, card) => {
    const $card = $(card);
    const href = $card.attr('href');
    const heading = $card.find(SELECTORS.teamCardName).first();
    const url = href ? resolveHref(href, baseUrl) : null;

    let problem: string | undefined;
    if (!href) problem = 'no href';
    else if (url === null) problem = `an invalid href "${href}"`;
    else if (heading.length === 0) problem = `no "${SELECTORS.teamCardName}" heading`;

    if (problem !== undefined || url === null) {
      const err = new MalformedPageError(`Team card #${index + 1} has ${problem ?? 'no href'}`, options.source);
      if (policy === 'abort') throw err;
      logger.warn(`Skipping team card: ${err.message}`);
      return;
    }

    teams.push({ name: heading.text().trim(), url });
  });

  return teams;
}
