/**
 * Load a local bar file (.csv or .json)
 */

import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { InvalidInputError } from '../errors';
import type { PriceBar } from '../types';
import { parseBarsCsv, parseBarsJson } from './parseBars';

export function loadBarsFile(path: string): PriceBar[] {
  const ext = extname(path).toLowerCase();
  if (ext !== '.csv' && ext !== '.json') {
    throw new InvalidInputError(`Unsupported bar file type "${ext || '(none)'}": use .csv or .json`);
  }

  const text = readFileSync(path, 'utf8');
  return ext === '.csv' ? parseBarsCsv(text) : parseBarsJson(text);
}
