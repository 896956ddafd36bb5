import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import type { TeamStatRecord } from '../extractors/team-stats';
import { logger } from '../utils/logger';

export const COMBINED_FILE_NAME = 'combined_team_stats.csv';
const SEASON_FILE_PREFIX = 'team_stats_';

export type Row = Record<string, string | null>;

export type SeasonRecord = TeamStatRecord & { season: string };

export interface Table {
  columns: string[];
  rows: Row[];
}

/**
 * Season labels become directory and file names, so anything a filesystem
 * would reject is replaced.
 */
export function seasonDirName(label: string): string {
  const cleaned = label.trim().replace(/[\\/:*?"<>|\u0000-\u001f]/g, '_');
  return cleaned === '' || cleaned === '.' || cleaned === '..' ? '_' : cleaned;
}

export function seasonTablePath(dataRoot: string, seasonLabel: string): string {
  const dir = seasonDirName(seasonLabel);
  return path.join(dataRoot, dir, `${SEASON_FILE_PREFIX}${dir}.csv`);
}

/** Union of all keys in first-seen order; cells a row lacks stay empty. */
export function buildTable(rows: Row[]): Table {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }
  return { columns, rows };
}

function rowKey(row: Row, columns: string[]): string {
  return JSON.stringify(columns.map((c) => row[c] ?? ''));
}

export function toSeasonTable(records: TeamStatRecord[], seasonLabel: string): Table {
  const withSeason: SeasonRecord[] = records.map((record) => ({ ...record, season: seasonLabel }));
  const { columns, rows } = buildTable(withSeason);

  const seen = new Set<string>();
  const unique = rows.filter((row) => {
    const key = rowKey(row, columns);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });

  if (unique.length < rows.length) {
    logger.debug(`Dropped ${rows.length - unique.length} duplicate rows for ${seasonLabel}`);
  }
  return { columns, rows: unique };
}

export function serializeTable(table: Table): string {
  return stringify(table.rows, { header: true, columns: table.columns });
}

async function writeTable(filePath: string, table: Table): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, serializeTable(table), 'utf8');
}

export interface WrittenTable {
  filePath: string;
  /** Rows in the file, after duplicates were dropped. */
  rowCount: number;
}

export async function writeSeasonTable(
  records: TeamStatRecord[],
  seasonLabel: string,
  dataRoot: string
): Promise<WrittenTable> {
  const table = toSeasonTable(records, seasonLabel);
  const filePath = seasonTablePath(dataRoot, seasonLabel);
  await writeTable(filePath, table);
  logger.info(`Saved data for ${seasonLabel} to ${filePath} (${table.rows.length} rows)`);
  return { filePath, rowCount: table.rows.length };
}

function isRow(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.values(value).every((cell) => typeof cell === 'string')
  );
}

export async function readTable(filePath: string): Promise<Row[]> {
  const content = await fs.readFile(filePath, 'utf8');
  const parsed: unknown = parse(content, { columns: true, skip_empty_lines: true, bom: true });
  if (!Array.isArray(parsed) || !parsed.every(isRow)) {
    throw new Error(`Unexpected CSV structure in ${filePath}`);
  }
  return parsed;
}

/**
 * Concatenates the given season tables, in the given order, into the combined
 * file under `dataRoot`. Only the listed files are read.
 */
export async function combineTables(tablePaths: string[], dataRoot: string): Promise<string> {
  if (tablePaths.length === 0) {
    throw new Error('No season tables to combine');
  }

  const rows: Row[] = [];
  for (const tablePath of tablePaths) {
    const tableRows = await readTable(tablePath);
    logger.debug(`Read ${tableRows.length} rows from ${tablePath}`);
    rows.push(...tableRows);
  }

  const combinedPath = path.join(dataRoot, COMBINED_FILE_NAME);
  await writeTable(combinedPath, buildTable(rows));
  logger.info(`Combined CSV saved to ${combinedPath} (${rows.length} rows from ${tablePaths.length} seasons)`);
  return combinedPath;
}

/** Season tables under `dataRoot`, one directory level down, sorted by path. */
export async function findSeasonTables(dataRoot: string): Promise<string[]> {
  const found: string[] = [];
  const entries = await fs.readdir(dataRoot, { withFileTypes: true });
  const dirs = entries.filter((e) => e.isDirectory()).map((e) => e.name).sort();

  for (const dir of dirs) {
    const files = await fs.readdir(path.join(dataRoot, dir));
    for (const file of files.sort()) {
      if (file.startsWith(SEASON_FILE_PREFIX) && file.endsWith('.csv')) {
        found.push(path.join(dataRoot, dir, file));
      }
    }
  }
  return found;
}

export async function combineAll(dataRoot: string): Promise<string> {
  const tablePaths = await findSeasonTables(dataRoot);
  logger.info(`Found ${tablePaths.length} season tables under ${dataRoot}`);
  return combineTables(tablePaths, dataRoot);
}
