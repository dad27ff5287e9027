import { AlignedTable } from '@trendlens/shared-types';

export type Cell = string | number | boolean;

/**
 * Header row plus one row per table row, as the export formats lay it out.
 * Missing values become empty cells.
 */
export function tableToMatrix(table: AlignedTable): Cell[][] {
  const { columns, rows } = table;

  switch (table.index) {
    case 'timestamp':
      return [
        ['Time (UTC)', ...columns, 'Partial'],
        ...rows.map((row) => [
          row.key,
          ...columns.map((c) => row.values[c] ?? ''),
          row.isPartial,
        ]),
      ];

    case 'region':
      return [
        ['Region code', 'Region', ...columns],
        ...rows.map((row) => [
          row.key,
          row.name ?? '',
          ...columns.map((c) => row.values[c] ?? ''),
        ]),
      ];

    case 'position':
      // each range keeps its own clock
      return [
        ['Position', ...columns.flatMap((c) => [`${c} (time)`, c]), 'Partial'],
        ...rows.map((row) => [
          Number(row.key),
          ...columns.flatMap((c) => [row.timestamps?.[c] ?? '', row.values[c] ?? '']),
          row.isPartial,
        ]),
      ];
  }
}

/**
 * RFC 4180 CSV, every cell quoted
 */
export function matrixToCsv(matrix: Cell[][]): string {
  return matrix
    .map((row) => row.map((cell) => `"${String(cell).replace(/"/g, '""')}"`).join(','))
    .join('\n');
}
