import { Injectable } from '@nestjs/common';
import {
  AlignedRow,
  AlignedTable,
  KeywordSeries,
  RegionSeries,
  RequestMode,
} from '@trendlens/shared-types';
import { ShapeMismatchError } from '../errors/trends.errors';

function uniqueLabels(series: Array<{ label: string }>): string[] {
  const labels = series.map((s) => s.label);
  const duplicate = labels.find((label, i) => labels.indexOf(label) !== i);
  if (duplicate !== undefined) {
    throw new ShapeMismatchError(`Duplicate column "${duplicate}"`, { columns: labels });
  }
  return labels;
}

function emptyValues(columns: string[]): Record<string, number | null> {
  const values: Record<string, number | null> = {};
  for (const column of columns) values[column] = null;
  return values;
}

/**
 * Lays decoded series side by side. Values are copied as the upstream scaled
 * them: globally for explore responses, per keyword for the batch showcase.
 */
@Injectable()
export class SeriesAlignerService {
  align(series: KeywordSeries[], mode: RequestMode): AlignedTable {
    const columns = uniqueLabels(series);
    return mode === 'multirange'
      ? this.byPosition(series, columns)
      : this.byTimestamp(series, columns);
  }

  /**
   * Rows keyed by region code, or by name when the upstream sent no code
   */
  alignRegions(series: RegionSeries[]): AlignedTable {
    const columns = uniqueLabels(series);
    const rows = new Map<string, AlignedRow>();

    for (const s of series) {
      for (const point of s.points) {
        const key = point.regionCode || point.regionName;
        let row = rows.get(key);
        if (!row) {
          row = {
            key,
            name: point.regionName,
            values: emptyValues(columns),
            isPartial: false,
          };
          rows.set(key, row);
        }
        row.values[s.label] = point.value;
      }
    }

    return { index: 'region', columns, rows: [...rows.values()] };
  }

  private byTimestamp(series: KeywordSeries[], columns: string[]): AlignedTable {
    const rows = new Map<string, AlignedRow>();

    for (const s of series) {
      for (const point of s.points) {
        let row = rows.get(point.timestamp);
        if (!row) {
          row = {
            key: point.timestamp,
            values: emptyValues(columns),
            isPartial: false,
          };
          rows.set(point.timestamp, row);
        }
        row.values[s.label] = point.value;
        row.isPartial = row.isPartial || point.isPartial;
      }
    }

    // ISO strings in UTC sort chronologically
    const sorted = [...rows.values()].sort((a, b) =>
      a.key < b.key ? -1 : a.key > b.key ? 1 : 0
    );
    return { index: 'timestamp', columns, rows: sorted };
  }

  /**
   * Multirange columns cover different absolute ranges, so row i holds the
   * i-th point of every column along with that column's own timestamp
   */
  private byPosition(series: KeywordSeries[], columns: string[]): AlignedTable {
    const length = Math.max(0, ...series.map((s) => s.points.length));
    const rows: AlignedRow[] = [];

    for (let i = 0; i < length; i++) {
      const timestamps: Record<string, string> = {};
      const row: AlignedRow = {
        key: String(i),
        values: emptyValues(columns),
        timestamps,
        isPartial: false,
      };
      for (const s of series) {
        const point = s.points[i];
        if (!point) continue;
        row.values[s.label] = point.value;
        timestamps[s.label] = point.timestamp;
        row.isPartial = row.isPartial || point.isPartial;
      }
      rows.push(row);
    }

    return { index: 'position', columns, rows };
  }
}
