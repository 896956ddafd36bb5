import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { buildSiteConfig } from '../src/config/site';
import { discoverSeasons } from '../src/collectors/seasons';
import { discoverTeams } from '../src/collectors/season-teams';
import { collectTeamStatistics } from '../src/collectors/team-statistics';
import { FetchError, MalformedPageError } from '../src/errors';
import { readTable } from '../src/output/csv-writer';
import { runPipeline, selectSeasons } from '../src/pipeline';
import {
  BASE_URL,
  fakeFetcher,
  loadFixture,
  rosterPage,
  seasonIndexPage,
  teamPage,
} from './helpers/fake-fetcher';

const site = buildSiteConfig(BASE_URL);
const TEAMS_URL = 'https://www.slgr.gr/en/teams/';

const CURRENT = { label: '2024-2025', url: 'https://www.slgr.gr/en/teams/23/' };
const PAST = { label: '2023-2024', url: 'https://www.slgr.gr/en/teams/22/' };

let dataRoot: string;

beforeEach(async () => {
  dataRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'sl-pipeline-'));
});

afterEach(async () => {
  await fs.rm(dataRoot, { recursive: true, force: true });
});

function leaguePages(): Record<string, string> {
  return {
    [TEAMS_URL]: seasonIndexPage([
      { label: CURRENT.label, href: '/en/teams/23/' },
      { label: PAST.label, href: '/en/teams/22/' },
    ]),
    [PAST.url]: rosterPage([
      { name: 'Team A', href: '/team/1/' },
      { name: 'Team B', href: '/team/2/' },
    ]),
    'https://www.slgr.gr/team/1/': teamPage('Team A', { rank: '3', points: '42' }),
    'https://www.slgr.gr/team/2/': teamPage('Team B', { rank: '5', points: '30' }),
  };
}

describe('buildSiteConfig', () => {
  it('derives the teams index from the base URL', () => {
    expect(buildSiteConfig('https://www.slgr.gr/en')).toEqual({
      baseUrl: 'https://www.slgr.gr/en/',
      teamsUrl: TEAMS_URL,
    });
  });
});

describe('collectors', () => {
  it('discovers seasons from the teams index', async () => {
    const fetcher = fakeFetcher({ [TEAMS_URL]: loadFixture('teams-index.html') });
    const seasons = await discoverSeasons(fetcher, site);
    expect(seasons.map((s) => s.label)).toEqual(['2024-2025', '2023-2024', '2022-2023']);
  });

  it('throws when the teams index cannot be fetched', async () => {
    await expect(discoverSeasons(fakeFetcher({}), site)).rejects.toBeInstanceOf(FetchError);
  });

  it('marks a season incomplete when its roster cannot be fetched', async () => {
    const outcome = await discoverTeams(fakeFetcher({}), PAST, site);
    expect(outcome).toEqual({
      status: 'incomplete',
      entry: { subject: PAST.label, url: PAST.url, reason: `HTTP 404 for ${PAST.url}` },
    });
  });

  it('throws when a roster page has no team cards', async () => {
    const fetcher = fakeFetcher({ [PAST.url]: '<html><body></body></html>' });
    await expect(discoverTeams(fetcher, PAST, site)).rejects.toBeInstanceOf(MalformedPageError);
  });

  it('fetches the info page then the stats page of a team', async () => {
    const team = { name: 'A.E.K.', url: 'https://www.slgr.gr/en/team/1047/info/' };
    const fetcher = fakeFetcher({
      [team.url]: loadFixture('team-info.html'),
      'https://www.slgr.gr/en/team/1047/teamStats/': loadFixture('team-stats.html'),
    });

    const outcome = await collectTeamStatistics(fetcher, team);

    expect(fetcher.requests).toEqual([team.url, 'https://www.slgr.gr/en/team/1047/teamStats/']);
    expect(outcome.status).toBe('complete');
    if (outcome.status === 'complete') {
      expect(outcome.record.team).toBe('A.E.K.');
      expect(outcome.record.Points).toBe('71');
    }
  });

  it('stops at a failed stats page instead of building a partial record', async () => {
    const team = { name: 'A.E.K.', url: 'https://www.slgr.gr/en/team/1047/info/' };
    const fetcher = fakeFetcher({ [team.url]: loadFixture('team-info.html') });

    const outcome = await collectTeamStatistics(fetcher, team);

    expect(outcome).toEqual({
      status: 'incomplete',
      team,
      entry: {
        subject: 'A.E.K.',
        url: 'https://www.slgr.gr/en/team/1047/teamStats/',
        reason: 'HTTP 404 for https://www.slgr.gr/en/team/1047/teamStats/',
      },
    });
  });
});

describe('selectSeasons', () => {
  const seasons = [CURRENT, PAST, { label: '2022-2023', url: 'https://www.slgr.gr/en/teams/21/' }];

  it('skips the season in progress by default', () => {
    expect(selectSeasons(seasons).selected.map((s) => s.label)).toEqual(['2023-2024', '2022-2023']);
  });

  it('keeps the season in progress when asked to', () => {
    expect(selectSeasons(seasons, [], true).selected).toHaveLength(3);
  });

  it('restricts to requested labels and reports unknown ones', () => {
    expect(selectSeasons(seasons, ['2024-2025', '1999-2000'])).toEqual({
      selected: [CURRENT],
      unknown: ['1999-2000'],
    });
  });
});

describe('runPipeline', () => {
  it('writes one row per team for the season', async () => {
    const summary = await runPipeline({ fetcher: fakeFetcher(leaguePages()), site, dataRoot });

    expect(summary.failedSeasons).toEqual([]);
    expect(summary.seasons).toHaveLength(1);
    const [season] = summary.seasons;
    expect(season.records).toBe(2);
    expect(season.tablePath).toBe(path.join(dataRoot, '2023-2024', 'team_stats_2023-2024.csv'));

    expect(await readTable(path.join(dataRoot, '2023-2024', 'team_stats_2023-2024.csv'))).toEqual([
      { team: 'Team A', rank: '3', points: '42', season: '2023-2024' },
      { team: 'Team B', rank: '5', points: '30', season: '2023-2024' },
    ]);
  });

  it('combines the tables written in the run', async () => {
    const summary = await runPipeline({ fetcher: fakeFetcher(leaguePages()), site, dataRoot });

    expect(summary.combinedPath).toBe(path.join(dataRoot, 'combined_team_stats.csv'));
    expect(await readTable(path.join(dataRoot, 'combined_team_stats.csv'))).toHaveLength(2);
  });

  it('leaves the combined table out when skipped', async () => {
    const summary = await runPipeline({ fetcher: fakeFetcher(leaguePages()), site, dataRoot, skipCombine: true });

    expect(summary.combinedPath).toBeNull();
    await expect(fs.access(path.join(dataRoot, 'combined_team_stats.csv'))).rejects.toThrow();
  });

  it('reports the rows left after dropping duplicate teams', async () => {
    const pages = leaguePages();
    pages[PAST.url] = rosterPage([
      { name: 'Team A', href: '/team/1/' },
      { name: 'Team A', href: '/team/1/' },
      { name: 'Team B', href: '/team/2/' },
    ]);

    const summary = await runPipeline({ fetcher: fakeFetcher(pages), site, dataRoot, skipCombine: true });

    const [season] = summary.seasons;
    expect(season.records).toBe(2);
    expect(await readTable(path.join(dataRoot, '2023-2024', 'team_stats_2023-2024.csv'))).toHaveLength(2);
  });

  it('records a team whose page fails and keeps the others', async () => {
    const pages = leaguePages();
    delete pages['https://www.slgr.gr/team/2/'];

    const summary = await runPipeline({ fetcher: fakeFetcher(pages), site, dataRoot });

    const [season] = summary.seasons;
    expect(season.records).toBe(1);
    expect(season.incomplete.map((e) => e.subject)).toEqual(['Team B']);
  });

  it('reports a requested season that produced no records', async () => {
    const pages = leaguePages();
    delete pages['https://www.slgr.gr/team/1/'];
    delete pages['https://www.slgr.gr/team/2/'];

    const summary = await runPipeline({ fetcher: fakeFetcher(pages), site, dataRoot });

    expect(summary.failedSeasons).toEqual(['2023-2024']);
    expect(summary.seasons[0].tablePath).toBeNull();
    expect(summary.combinedPath).toBeNull();
  });

  it('fails the run when the season menu is missing', async () => {
    const fetcher = fakeFetcher({ [TEAMS_URL]: '<html><body><ul class="sub-current"></ul></body></html>' });
    await expect(runPipeline({ fetcher, site, dataRoot })).rejects.toBeInstanceOf(MalformedPageError);
  });
});
