/**
 * Image information table reader
 *
 * The tail of a PAR file holds one whitespace-separated row per image. Column
 * positions come from the profile's column map instead of fixed offsets.
 */

import type { ImageColumnMap } from '../types/bids';
import { logger } from '../utils/logger';
import { parseFloatValue, parseIntValue } from './values';

// "# === IMAGE INFORMATION ===" but not "# === IMAGE INFORMATION DEFINITION ==="
const SECTION_HEADER = /#\s*===\s*IMAGE INFORMATION\s*=+[^\n]*\n/i;
const NEXT_SECTION = /^#\s*===/m;

export class ImageTable {
  private constructor(
    private readonly rows: string[][],
    readonly columns: ImageColumnMap
  ) {}

  static parse(content: string, columns: ImageColumnMap): ImageTable {
    const header = SECTION_HEADER.exec(content);
    if (!header) {
      return new ImageTable([], columns);
    }

    let section = content.slice(header.index + header[0].length);
    const end = NEXT_SECTION.exec(section);
    if (end) section = section.slice(0, end.index);

    const rows: string[][] = [];
    let skipped = 0;

    for (const line of section.split(/\r?\n/)) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith('#') || !/^\d/.test(trimmed)) continue;

      const parts = trimmed.split(/\s+/);
      if (parts.length < columns.minColumns) {
        skipped++;
        continue;
      }
      rows.push(parts);
    }

    if (skipped > 0) {
      logger.debug({ skipped, minColumns: columns.minColumns }, 'Skipped short image information rows');
    }

    return new ImageTable(rows, columns);
  }

  get rowCount(): number {
    return this.rows.length;
  }

  /** Value of a column in the first row, as a number */
  first(column: keyof Omit<ImageColumnMap, 'minColumns'>): number | null {
    if (this.rows.length === 0) return null;
    return parseFloatValue(this.rows[0][this.columns[column]]);
  }

  /** First integer value of a column (in row order, within `limit` rows) accepted by `accept` */
  findInteger(
    column: keyof Omit<ImageColumnMap, 'minColumns'>,
    accept: (value: number) => boolean,
    limit = this.rows.length
  ): number | null {
    for (const row of this.rows.slice(0, limit)) {
      const value = parseIntValue(row[this.columns[column]]);
      if (value !== null && accept(value)) return value;
    }
    return null;
  }

  /** Highest slice number seen in the table */
  maxSliceNumber(): number | null {
    let max: number | null = null;
    for (const row of this.rows) {
      const slice = parseIntValue(row[this.columns.sliceNumber]);
      if (slice !== null && (max === null || slice > max)) max = slice;
    }
    return max;
  }
}
