/**
 * Bar file parsers
 * 
 * Turn an already-retrieved daily series (CSV or JSON text) into a
 * PriceSeries. Order is preserved as written; validateSeries decides
 * whether it is usable.
 */

import { InvalidInputError } from '../errors';
import type { PriceBar } from '../types';
import { validateSeries } from './validateSeries';

const OPTIONAL_FIELDS = ['open', 'high', 'low', 'volume'] as const;

type OptionalField = (typeof OPTIONAL_FIELDS)[number];

// Timestamps such as "2024-01-02 00:00:00-05:00" keep only the day
function toBarDate(raw: string): string {
  return raw.trim().slice(0, 10);
}

function parseNumberCell(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const parsed = Number(raw.trim());
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Parse CSV with a header row. Columns are matched case-insensitively;
 * Date and Close are required, Open/High/Low/Volume are kept when present.
 * 
 * @throws InvalidInputError on a missing column, a bad row, or an invalid series
 */
export function parseBarsCsv(text: string): PriceBar[] {
  const lines = text.split(/\r?\n/).map((l) => l.trim());
  const headerLine = lines.findIndex((l) => l !== '');
  if (headerLine < 0) {
    throw new InvalidInputError('CSV is empty');
  }

  const headerCols = lines[headerLine].toLowerCase().split(',').map((c) => c.trim());
  const dateIdx = headerCols.indexOf('date');
  const closeIdx = headerCols.indexOf('close');
  if (dateIdx < 0 || closeIdx < 0) {
    throw new InvalidInputError(`CSV missing Date or Close column. Header: ${lines[headerLine]}`);
  }

  const bars: PriceBar[] = [];
  for (let i = headerLine + 1; i < lines.length; i++) {
    const line = lines[i];
    if (line === '') continue;

    const parts = line.split(',');
    const dateCell = parts[dateIdx];
    const close = parseNumberCell(parts[closeIdx]);
    if (dateCell === undefined || dateCell.trim() === '' || close === undefined) {
      throw new InvalidInputError(`CSV line ${i + 1} has no usable Date/Close: "${line}"`);
    }

    const bar: PriceBar = { date: toBarDate(dateCell), close };
    for (const field of OPTIONAL_FIELDS) {
      const idx = headerCols.indexOf(field);
      const value = idx < 0 ? undefined : parseNumberCell(parts[idx]);
      if (value !== undefined) {
        bar[field] = value;
      }
    }
    bars.push(bar);
  }

  validateSeries(bars);
  return bars;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readOptional(record: Record<string, unknown>, field: OptionalField): number | undefined {
  const value = record[field];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Parse a JSON array of `{ date, close, open?, high?, low?, volume? }`
 * 
 * @throws InvalidInputError on invalid JSON, a non-array, a bad item, or an invalid series
 */
export function parseBarsJson(text: string): PriceBar[] {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidInputError(`Bar JSON could not be parsed: ${reason}`);
  }

  if (!Array.isArray(data)) {
    throw new InvalidInputError('Bar JSON must be an array of bars');
  }

  const bars = data.map((item: unknown, i): PriceBar => {
    const date = isRecord(item) ? item['date'] : undefined;
    const close = isRecord(item) ? item['close'] : undefined;
    if (!isRecord(item) || typeof date !== 'string' || typeof close !== 'number') {
      throw new InvalidInputError(`Bar ${i} must have a string date and a numeric close`);
    }
    const bar: PriceBar = { date: toBarDate(date), close };
    for (const field of OPTIONAL_FIELDS) {
      const value = readOptional(item, field);
      if (value !== undefined) {
        bar[field] = value;
      }
    }
    return bar;
  });

  validateSeries(bars);
  return bars;
}
