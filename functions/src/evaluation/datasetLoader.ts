import fs from 'fs';
import path from 'path';
import type { DatasetEntry } from '../models/event';
import { parseCsvRows } from '../utils/csv';
import { toTagName } from '../utils/text';

const GROUND_TRUTH_COLUMNS = ['tag1', 'tag2', 'tag3'];

export function parseDataset(text: string): DatasetEntry[] {
  const entries: DatasetEntry[] = [];

  parseCsvRows(text).forEach((row, index) => {
    const title = row.title?.trim() ?? '';
    const tags = GROUND_TRUTH_COLUMNS
      .map(column => toTagName(row[column] ?? ''))
      .filter(tag => tag.length > 0);

    if (!title || tags.length === 0) {
      return;
    }

    const id = row.id?.trim() || `row-${index + 1}`;
    entries.push({
      event: {
        id,
        title,
        organizer: row.organizer || null,
        subtype: row.subtype || null,
        teaser: row.teaser || null,
        description: row.description || null,
      },
      groundTruth: { eventId: id, tags: Array.from(new Set(tags)) },
    });
  });

  return entries;
}

export function loadDataset(filePath: string): DatasetEntry[] {
  const entries = parseDataset(fs.readFileSync(filePath, 'utf8'));
  console.log(`[EVALUATION] Loaded ${entries.length} records from ${filePath}`);
  return entries;
}

/**
 * Maps a dataset name from a request onto a CSV file inside the data
 * directory. Only bare `.csv` file names are accepted.
 */
export function resolveDatasetPath(dataDir: string, name: string): string {
  const trimmed = name.trim();
  if (!/^[\w.-]+\.csv$/i.test(trimmed) || trimmed.startsWith('.')) {
    throw new Error('dataset must be a .csv file name inside the data directory');
  }
  return path.join(dataDir, trimmed);
}
