import fs from 'node:fs';
import path from 'node:path';
import ExcelJS, { type Fill } from 'exceljs';
import { logger } from '../../logger.js';
import type { TabularLayout } from '../../types.js';
import { BLOCK_GAP_ROWS } from '../../pipeline/report/reportCompiler.js';
import type { ReportCollaborator } from '../types.js';

const HEADER_FILL: Fill = {
  type: 'pattern',
  pattern: 'solid',
  fgColor: { argb: 'FFD9EBD9' },
};

export function sheetNameFor(groupKey: string): string {
  const cleaned = groupKey.replace(/[[\]:*?/\\]/g, '_').trim();
  return (cleaned || 'Sheet').slice(0, 31);
}

/**
 * Writes compiled layouts into an xlsx workbook, one worksheet per group.
 * Appending to a sheet that already has rows continues below them after the
 * block gap, so earlier reports are kept.
 */
export class XlsxReportWriter implements ReportCollaborator {
  private readonly workbook = new ExcelJS.Workbook();
  private loaded = false;

  constructor(private readonly outputPath: string) {}

  private async ensureLoaded(): Promise<void> {
    if (this.loaded) {
      return;
    }
    this.loaded = true;
    if (fs.existsSync(this.outputPath)) {
      await this.workbook.xlsx.readFile(this.outputPath);
    }
  }

  async appendSheet(groupKey: string, layout: TabularLayout): Promise<void> {
    await this.ensureLoaded();
    const name = sheetNameFor(groupKey);
    const sheet = this.workbook.getWorksheet(name) ?? this.workbook.addWorksheet(name);

    if (sheet.columnCount === 0) {
      sheet.columns = [
        { key: 'date', width: 12 },
        { key: 'description', width: 48 },
        { key: 'amount', width: 14 },
        { key: 'category', width: 18 },
      ];
    }

    // Row numbers follow the layout exactly; existing content only shifts the start.
    const offset = sheet.actualRowCount > 0 ? sheet.rowCount + BLOCK_GAP_ROWS : 0;

    layout.rows.forEach((row, index) => {
      const excelRow = sheet.getRow(offset + index + 1);
      if (row.kind === 'header') {
        const cell = excelRow.getCell(1);
        cell.value = row.cells[0];
        cell.font = { bold: true };
        cell.fill = HEADER_FILL;
      } else if (row.kind === 'transaction') {
        const [date, description, amount, category] = row.cells;
        excelRow.getCell(1).value = date;
        excelRow.getCell(2).value = description;
        const amountCell = excelRow.getCell(3);
        amountCell.value = Number(amount);
        amountCell.numFmt = '0.00';
        if (category) {
          excelRow.getCell(4).value = category;
        }
      }
      excelRow.commit();
    });

    logger.debug({ group: groupKey, sheet: name, rows: layout.rows.length, offset }, 'Sheet appended');
  }

  get sheetNames(): string[] {
    return this.workbook.worksheets.map((sheet) => sheet.name);
  }

  async flush(): Promise<string> {
    await this.ensureLoaded();
    fs.mkdirSync(path.dirname(this.outputPath), { recursive: true });
    await this.workbook.xlsx.writeFile(this.outputPath);
    return this.outputPath;
  }
}
