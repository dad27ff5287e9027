import { Controller, Get, Query, Res, Logger } from '@nestjs/common';
import { Response } from 'express';
import * as XLSX from 'xlsx';
import { AlignedTable } from '@trendlens/shared-types';
import { TrendsService } from '../services/trends.service';
import { Cell, matrixToCsv, tableToMatrix } from '../utils/table-matrix';
import { toErrorResponse } from './error-response';
import {
  ExportReport,
  exportQuerySchema,
  interestQuerySchema,
  invalidQuery,
  regionQuerySchema,
  showcaseQuerySchema,
} from './query.schemas';

type ExportResult = {
  table: AlignedTable;
  summary: Cell[][];
};

@Controller('export')
export class ExportController {
  private readonly logger = new Logger(ExportController.name);

  constructor(private readonly trendsService: TrendsService) {}

  /**
   * GET /api/export/csv?report=interest&keywords=...
   * Aligned table of a report as CSV
   */
  @Get('csv')
  async exportCsv(@Query() query: Record<string, string>, @Res() res: Response) {
    const report = await this.runReport(query, res);
    if (!report) return;

    this.logger.log(`Exporting ${report.name} CSV (${report.result.table.rows.length} rows)`);

    res.setHeader('Content-Type', 'text/csv');
    res.setHeader('Content-Disposition', `attachment; filename="${report.name}.csv"`);
    res.send(matrixToCsv(tableToMatrix(report.result.table)));
  }

  /**
   * GET /api/export/excel?report=region&keywords=...
   * Summary sheet plus the aligned table
   */
  @Get('excel')
  async exportExcel(@Query() query: Record<string, string>, @Res() res: Response) {
    const report = await this.runReport(query, res);
    if (!report) return;

    this.logger.log(`Exporting ${report.name} Excel (${report.result.table.rows.length} rows)`);

    const wb = XLSX.utils.book_new();
    const summarySheet = XLSX.utils.aoa_to_sheet([
      ['Trends Report'],
      [],
      ['Generated', new Date().toISOString()],
      ...report.result.summary,
    ]);
    XLSX.utils.book_append_sheet(wb, summarySheet, 'Summary');
    XLSX.utils.book_append_sheet(
      wb,
      XLSX.utils.aoa_to_sheet(tableToMatrix(report.result.table)),
      'Data'
    );

    const buffer = XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' });

    res.setHeader(
      'Content-Type',
      'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet'
    );
    res.setHeader('Content-Disposition', `attachment; filename="${report.name}.xlsx"`);
    res.send(buffer);
  }

  /**
   * Run the requested report; on failure the error envelope is already sent
   */
  private async runReport(
    query: Record<string, string>,
    res: Response
  ): Promise<{ name: string; result: ExportResult } | null> {
    const parsed = exportQuerySchema.safeParse(query);
    if (!parsed.success) {
      res.json(invalidQuery(parsed.error));
      return null;
    }

    try {
      const result = await this.buildReport(parsed.data.report, query, res);
      if (!result) return null;
      const stamp = new Date().toISOString().slice(0, 10);
      return { name: `trendlens-${parsed.data.report}-${stamp}`, result };
    } catch (error) {
      res.json(toErrorResponse(error, this.logger));
      return null;
    }
  }

  private async buildReport(
    report: ExportReport,
    query: Record<string, string>,
    res: Response
  ): Promise<ExportResult | null> {
    switch (report) {
      case 'interest': {
        const parsed = interestQuerySchema.safeParse(query);
        if (!parsed.success) {
          res.json(invalidQuery(parsed.error));
          return null;
        }
        const { keywords, timeframe, geo, category, property } = parsed.data;
        const data = await this.trendsService.interestOverTime({
          keywords,
          timeframes: timeframe,
          geos: geo,
          category,
          property,
        });
        return {
          table: data.table,
          summary: [
            ['Report', 'Interest over time'],
            ['Mode', data.mode],
            ['Timeframes', data.timeframes.join(' | ')],
            ['Geos', data.geos.map((g) => g || 'Worldwide').join(', ')],
          ],
        };
      }

      case 'region': {
        const parsed = regionQuerySchema.safeParse(query);
        if (!parsed.success) {
          res.json(invalidQuery(parsed.error));
          return null;
        }
        const { geo, ...rest } = parsed.data;
        const data = await this.trendsService.interestByRegion({ ...rest, geos: geo });
        return {
          table: data.table,
          summary: [
            ['Report', 'Interest by region'],
            ['Timeframe', data.timeframe],
            ['Geo', data.geo || 'Worldwide'],
            ['Resolution', data.resolution],
          ],
        };
      }

      case 'showcase': {
        const parsed = showcaseQuerySchema.safeParse(query);
        if (!parsed.success) {
          res.json(invalidQuery(parsed.error));
          return null;
        }
        const data = await this.trendsService.showcaseTimeline(parsed.data);
        return {
          table: data.table,
          summary: [
            ['Report', 'Showcase timeline'],
            ['Window', data.window],
            ['Geo', data.geo],
            ['Requested', data.requestedAt],
            ['Scale', 'Each keyword 0-100 against its own peak'],
          ],
        };
      }
    }
  }
}
